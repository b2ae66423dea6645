import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(value => value === 'true' || value === '1');

export const extractQuerySchema = z.object({
  url: z.string().url('Invalid URL'),
  writeSubtitles: booleanFlag,
  writeAutomaticCaptions: booleanFlag,
  listSubtitles: booleanFlag,
});

export const extractOptionsSchema = z.object({
  writeSubtitles: z.boolean().optional(),
  writeAutomaticCaptions: z.boolean().optional(),
  listSubtitles: z.boolean().optional(),
});

export const batchExtractSchema = z.object({
  urls: z.array(z.string().url('Invalid URL')).min(1, 'At least one URL is required').max(50),
  options: extractOptionsSchema.default({}),
});

