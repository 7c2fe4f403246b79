import 'express-async-errors';
import express, { Express } from 'express';
import cors from 'cors';
import EnvVars from './config/env';
import { createApiRouter } from './router';
import { errorHandler } from './other/errorHandler';
import { Store } from './lib/db/types';
import { LeadForwarder } from './lib/crm/lead-forwarder';
import {
  PropertiesService,
  ServicesService,
  LeadsService,
  SeoService,
  ExportService,
  HealthService,
  createHealthRouter,
} from './entities';

export interface ServerDependencies {
  store: Store;
  leadForwarder: LeadForwarder;
  databaseUrlConfigured: boolean;
  corsOrigin?: string;
}

function corsOrigins(value: string): string | string[] {
  return value === '*' ? value : value.split(',').map((origin) => origin.trim());
}

/**
 * Builds the Express app. The store is passed down to every service; nothing
 * here reaches for a global connection.
 */
export function createServer(deps: ServerDependencies): Express {
  const { store } = deps;
  const app = express();

  app.use(cors({ origin: corsOrigins(deps.corsOrigin ?? EnvVars.CorsOrigin), credentials: true }));
  app.use(express.json());

  app.use('/', createHealthRouter(new HealthService(store, deps.databaseUrlConfigured)));

  app.use('/api', createApiRouter({
    properties: new PropertiesService(store),
    services: new ServicesService(store),
    leads: new LeadsService(store, deps.leadForwarder),
    seo: new SeoService(store),
    export: new ExportService(store),
  }));

  app.use(errorHandler);

  return app;
}
