import 'module-alias/register';
import './pre-start'; // Must be the first import
import { Server } from 'http';
import logger from 'jet-logger';
import EnvVars from './config/env';
import { createServer } from './server';
import { connectStore } from './lib/db/mongo';
import { seedDemoData } from './lib/db/seed';
import { Store } from './lib/db/types';
import { createCrmClient } from './lib/crm/crmClient';
import { CrmLeadForwarder } from './lib/crm/lead-forwarder';

// **** Run **** //

const SERVER_START_MSG = 'Express server started on port: ' + EnvVars.Port;

async function seedIfEnabled(store: Store): Promise<void> {
  if (!EnvVars.SeedDemoData || store.status === 'unavailable') {
    return;
  }
  try {
    const result = await seedDemoData(store.db);
    logger.info(`[Seed] Done: ${result.properties} properties, ${result.services} services`);
  } catch (error) {
    logger.err('[Seed] Demo data seeding failed');
    logger.err(error, true);
  }
}

const startServer = async (): Promise<{ server: Server; store: Store }> => {
  const store = await connectStore({
    url: EnvVars.Database.Url,
    name: EnvVars.Database.Name,
    timeoutMs: EnvVars.Database.TimeoutMs,
  });
  await seedIfEnabled(store);

  const leadForwarder = new CrmLeadForwarder(
    EnvVars.Crm.ApiKey,
    createCrmClient({ baseUrl: EnvVars.Crm.BaseUrl, timeoutMs: EnvVars.Crm.TimeoutMs }),
  );
  if (!leadForwarder.enabled) {
    logger.info('[CRM] HUBSPOT_API_KEY is not set, lead forwarding disabled');
  }

  const app = createServer({
    store,
    leadForwarder,
    databaseUrlConfigured: Boolean(EnvVars.Database.Url),
  });
  const server = app.listen(EnvVars.Port, () => logger.info(SERVER_START_MSG));
  return { server, store };
};

startServer()
  .then(({ server, store }) => {
    // Graceful shutdown
    const gracefulShutdown = () => {
      logger.info('Shutting down gracefully...');
      server.close(() => {
        const closeStore = store.status === 'available' ? store.close() : Promise.resolve();
        closeStore
          .then(() => {
            logger.info('Database connection closed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.err('Error during shutdown');
            logger.err(error, true);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', gracefulShutdown);
    process.on('SIGINT', gracefulShutdown);
  })
  .catch((error: unknown) => {
    logger.err('Failed to start server');
    logger.err(error, true);
    process.exit(1);
  });
