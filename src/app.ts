import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { env } from './config/env.js';
import routes from './routes/index.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { ExtractorRegistry } from './services/extractors/index.js';

export interface AppDependencies {
  registry: ExtractorRegistry;
}

export function createApp({ registry }: AppDependencies): express.Express {
  const app = express();

  // Trust proxy - required for rate limiting to work correctly behind reverse proxy
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());

  app.use(cors({ origin: env.CORS_ORIGIN === '*' ? '*' : env.CORS_ORIGIN.split(',') }));

  // Rate limiting - disabled in test environment
  if (env.NODE_ENV !== 'test') {
    // Each extraction fans out into several upstream requests
    const limiter = rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      max: 100,
      message: { error: 'Too many requests, please try again later.' },
      keyGenerator: (req: express.Request): string => {
        const forwarded = req.headers['cf-connecting-ip'];
        return (typeof forwarded === 'string' && forwarded) || req.ip || 'x';
      },
    });
    app.use('/api/extract', limiter);
  }

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  // Routes
  app.use('/api', routes(registry));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use(errorHandler);

  return app;
}
