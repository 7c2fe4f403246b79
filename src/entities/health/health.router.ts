import { Router } from 'express';
import * as controller from './health.controller';
import { HealthService } from './health.service';

export function createHealthRouter(service: HealthService): Router {
  const router = Router();

  router.get('/', controller.getRoot(service));
  router.get('/test', controller.getDiagnostics(service));

  return router;
}
