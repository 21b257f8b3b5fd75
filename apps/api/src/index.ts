/**
 * Pipewright API Server
 */

import { createChildLogger, getConfig, validateConfig } from '@pipewright/shared';
import { buildApp } from './app.js';
import { initializeServices, shutdownServices } from './services/index.js';

const logger = createChildLogger({ component: 'API' });

async function main() {
  const validation = validateConfig();
  if (!validation.valid) {
    logger.error({ errors: validation.errors }, 'Invalid configuration');
    process.exit(1);
  }

  const config = getConfig();
  const services = await initializeServices(config);
  const app = await buildApp(services, config);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await app.close();
    await shutdownServices(services);
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(`Server started on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Unhandled error');
  process.exit(1);
});
