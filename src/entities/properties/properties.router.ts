import { Router } from 'express';
import * as controller from './properties.controller';
import { PropertiesService } from './properties.service';

export function createPropertiesRouter(service: PropertiesService): Router {
  const router = Router();

  router.get('/', controller.listProperties(service));
  router.post('/', controller.createProperty(service));
  router.get('/:identifier', controller.getProperty(service));
  router.put('/:id', controller.replaceProperty(service));
  router.patch('/:id/status', controller.updatePropertyStatus(service));

  return router;
}
