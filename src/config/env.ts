import 'dotenv/config';

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('3001'),
  CORS_ORIGIN: z.string().default('*'),

  // Outbound HTTP client
  HTTP_TIMEOUT_MS: z.string().transform(Number).default('20000'),
  HTTP_USER_AGENT: z
    .string()
    .default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'),

  // Cookie header of a logged-in browser session; login itself is not handled here
  SESSION_COOKIE: z.string().optional(),
  SESSION_COOKIE_DOMAIN: z.string().default('microsoftstream.com'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = parsed.data;
export type Env = typeof env;
