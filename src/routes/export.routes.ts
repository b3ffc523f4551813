import { Router } from 'express';
import type { ExportController } from '../controllers/export.controller';
import { validate, schemas } from '../middleware/validate';

export const createExportRoutes = (controller: ExportController): Router => {
  const router = Router();

  router.post('/:textId/export', validate(schemas.exportRequest), controller.requestExport);
  router.get('/:textId/export/status', controller.getExportStatus);
  router.get('/:textId/export/download', controller.downloadExport);

  return router;
};
