import { Router } from 'express';
import type { ExtractorRegistry } from '../services/extractors/index.js';
import extractRoutes from './extract.js';
import { createExtractController } from '../controllers/extractController.js';

export default function routes(registry: ExtractorRegistry): Router {
  const router = Router();

  router.use('/extract', extractRoutes(registry));
  router.get('/extractors', createExtractController(registry).listExtractors);

  // Health check
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return router;
}
