import { Router } from 'express';
import type { ExportController } from '../controllers/export.controller';
import { createExportRoutes } from './export.routes';
import { createWebhookRoutes } from './webhook.routes';

export const createApiRoutes = (controller: ExportController): Router => {
  const router = Router();

  // Mount routes
  router.use('/texts', createExportRoutes(controller));
  router.use('/webhooks', createWebhookRoutes(controller));

  // Health check for API
  router.get('/health', (req, res) => {
    res.json({
      success: true,
      message: 'API is running',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
