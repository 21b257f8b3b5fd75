/**
 * Fastify application assembly
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import type { Config } from '@pipewright/shared';
import { registerRoutes } from './routes/index.js';
import { registerWebSocket } from './websocket/index.js';
import type { AppServices } from './services/index.js';

// Extend Fastify instance with services
declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
  }
}

/**
 * Assemble the Fastify app around initialized services
 */
export async function buildApp(services: AppServices, config: Config): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
  });

  // Decorate app with services for dependency injection
  app.decorate('services', services);

  await app.register(cors, {
    origin: config.server.corsOrigin === '*' ? true : config.server.corsOrigin.split(','),
    credentials: true,
  });

  await app.register(websocket);

  await registerRoutes(app);
  await registerWebSocket(app);

  return app;
}
