import { Router } from 'express';
import {
  createPropertiesRouter,
  createServicesRouter,
  createLeadsRouter,
  createSeoRouter,
  createExportRouter,
  PropertiesService,
  ServicesService,
  LeadsService,
  SeoService,
  ExportService,
} from './entities';

export interface ApiServices {
  properties: PropertiesService;
  services: ServicesService;
  leads: LeadsService;
  seo: SeoService;
  export: ExportService;
}

export function createApiRouter(services: ApiServices): Router {
  const apiRouter = Router();

  apiRouter.use('/properties', createPropertiesRouter(services.properties));

  apiRouter.use('/services', createServicesRouter(services.services));

  apiRouter.use('/leads', createLeadsRouter(services.leads));

  apiRouter.use('/seo', createSeoRouter(services.seo));

  // Placeholder CRM export
  apiRouter.use('/export', createExportRouter(services.export));

  return apiRouter;
}
