/**
 * Health check routes
 */
import type { FastifyInstance } from 'fastify';

export async function healthRoutes(app: FastifyInstance): Promise<void> {
  // Basic health check
  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });

  // Active workflow and cache configuration
  app.get('/health/pipeline', async () => {
    const definition = app.services.orchestrator.getDefinition();
    return {
      status: 'ok',
      workflow: definition.name,
      toolchain: definition.toolchain,
      triggers: definition.triggers,
      cacheStore: app.services.cacheStore,
      activeRuns: app.services.orchestrator.getRegistry().list().filter((run) => run.finishedAt === undefined).length,
    };
  });
}
