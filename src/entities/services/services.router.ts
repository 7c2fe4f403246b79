import { Router } from 'express';
import * as controller from './services.controller';
import { ServicesService } from './services.service';

export function createServicesRouter(service: ServicesService): Router {
  const router = Router();

  router.get('/', controller.listServices(service));
  router.post('/', controller.createService(service));

  return router;
}
