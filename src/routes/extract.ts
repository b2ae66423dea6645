import { Router } from 'express';
import type { ExtractorRegistry } from '../services/extractors/index.js';
import { createExtractController } from '../controllers/extractController.js';

export default function extractRoutes(registry: ExtractorRegistry): Router {
  const router = Router();
  const controller = createExtractController(registry);

  router.get('/', controller.extract);
  router.post('/batch', controller.extractBatch);

  return router;
}
