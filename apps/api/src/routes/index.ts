/**
 * API Routes
 */

import type { FastifyInstance } from 'fastify';
import { healthRoutes } from './health.js';
import { webhookRoutes } from './webhooks.js';
import { runsRoutes } from './runs.js';

export async function registerRoutes(app: FastifyInstance): Promise<void> {
  // API version prefix
  app.register(
    async (api) => {
      // Health check routes
      api.register(healthRoutes);

      // Repository webhooks (schedule runs)
      api.register(webhookRoutes);

      // Run status queries
      api.register(runsRoutes, { prefix: '/runs' });
    },
    { prefix: '/api/v1' }
  );
}
