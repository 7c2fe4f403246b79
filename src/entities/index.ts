import { createPropertiesRouter } from './properties/properties.router';
import { createServicesRouter } from './services/services.router';
import { createLeadsRouter } from './leads/leads.router';
import { createSeoRouter } from './seo/seo.router';
import { createExportRouter } from './export/export.router';
import { createHealthRouter } from './health/health.router';
import { PropertiesService } from './properties/properties.service';
import { ServicesService } from './services/services.service';
import { LeadsService } from './leads/leads.service';
import { SeoService } from './seo/seo.service';
import { ExportService } from './export/export.service';
import { HealthService } from './health/health.service';

export {
  createPropertiesRouter,
  createServicesRouter,
  createLeadsRouter,
  createSeoRouter,
  createExportRouter,
  createHealthRouter,
  PropertiesService,
  ServicesService,
  LeadsService,
  SeoService,
  ExportService,
  HealthService,
};
