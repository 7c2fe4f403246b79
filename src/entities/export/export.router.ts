import { Router } from 'express';
import * as controller from './export.controller';
import { ExportService } from './export.service';

export function createExportRouter(service: ExportService): Router {
  const router = Router();

  router.get('/crm', controller.exportToCrm(service));

  return router;
}
