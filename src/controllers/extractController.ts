import { Request, Response, NextFunction } from 'express';
import type { ExtractorRegistry } from '../services/extractors/index.js';
import { validate } from '../utils/validate.js';
import { batchExtractSchema, extractQuerySchema } from '../utils/schemas.js';

/**
 * Handlers bound to a registry so the app can be built around a stub client in tests
 */
export function createExtractController(registry: ExtractorRegistry) {
  async function extract(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { url, writeSubtitles, writeAutomaticCaptions, listSubtitles } = validate(extractQuerySchema, req.query);
      const record = await registry.extract(url, { writeSubtitles, writeAutomaticCaptions, listSubtitles });
      res.json(record);
    } catch (error) {
      next(error);
    }
  }

  async function extractBatch(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { urls, options } = validate(batchExtractSchema, req.body);
      const results = await registry.extractMany(urls, options);
      res.json({
        results,
        succeeded: results.filter(r => r.success).length,
        failed: results.filter(r => !r.success).length,
      });
    } catch (error) {
      next(error);
    }
  }

  function listExtractors(_req: Request, res: Response): void {
    res.json(
      registry.getExtractors().map(extractor => ({
        name: extractor.name,
        description: extractor.description,
      }))
    );
  }

  return { extract, extractBatch, listExtractors };
}
