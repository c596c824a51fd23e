// src/server.ts
// What: HTTP server entrypoint.
// How: Validates configuration, builds and initializes the services (embedding provider and store must be usable,
//      otherwise startup fails), then listens on PORT. SIGINT/SIGTERM close the server and the store.

import { getConfig } from './config/env.js';
import { createApp } from './app.js';
import logger from './logging.js';
import { createServices } from './services/container.js';

async function main(): Promise<void> {
  const config = getConfig();
  const services = await createServices(config);
  await services.init();

  const app = createApp(services);
  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT, vault: config.VAULT_PATH, store: services.store.kind }, 'Server listening');
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      services
        .close()
        .then(() => logger.info('Shutdown complete'))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error while closing services');
          process.exitCode = 1;
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exitCode = 1;
});
