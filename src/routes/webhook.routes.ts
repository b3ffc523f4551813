import { Router } from 'express';
import type { ExportController } from '../controllers/export.controller';
import { validate, schemas } from '../middleware/validate';

export const createWebhookRoutes = (controller: ExportController): Router => {
  const router = Router();

  router.post('/artifact-ready', validate(schemas.artifactReady), controller.artifactReady);

  return router;
};
