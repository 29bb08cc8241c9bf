/**
 * API Server
 * HTTP server entry point
 */

import { createApp } from './app';
import { config } from './config';
import { cleanupServices, initializeServices } from './init';
import { validateEnvironment } from './validateEnv';

async function start() {
  try {
    validateEnvironment();
  } catch (error) {
    /* eslint-disable no-console */
    console.error('Environment validation failed:');
    console.error(error instanceof Error ? error.message : error);
    /* eslint-enable no-console */
    process.exit(1);
  }

  const services = await initializeServices();
  const app = createApp(services);

  const server = app.listen(config.port, () => {
    /* eslint-disable no-console */
    console.log(`Escrow API listening on port ${config.port}`);
    console.log(`Environment: ${config.nodeEnv}`);
    console.log(`API base URL: http://localhost:${config.port}${config.apiPrefix}`);
    /* eslint-enable no-console */
  });

  const shutdown = (signal: string) => {
    /* eslint-disable no-console */
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      cleanupServices()
        .then(() => {
          console.log('Server closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Cleanup failed:', error);
          process.exit(1);
        });
    });
    /* eslint-enable no-console */
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

start().catch((error: unknown) => {
  /* eslint-disable no-console */
  console.error('Failed to start server:', error);
  /* eslint-enable no-console */
  process.exit(1);
});
