import { Router } from 'express';
import * as controller from './seo.controller';
import { SeoService } from './seo.service';

export function createSeoRouter(service: SeoService): Router {
  const router = Router();

  router.get('/:kind/:slug', controller.getSeo(service));

  return router;
}
