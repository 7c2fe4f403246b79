import { Router } from 'express';
import * as controller from './leads.controller';
import { LeadsService } from './leads.service';

export function createLeadsRouter(service: LeadsService): Router {
  const router = Router();

  router.post('/', controller.createLead(service));
  router.get('/', controller.listLeads(service));

  return router;
}
