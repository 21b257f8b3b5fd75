/**
 * Pipeline run routes
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { PIPELINE_STATES } from '@pipewright/shared';

const stateValues = [
  PIPELINE_STATES.IDLE,
  PIPELINE_STATES.BUILDING,
  PIPELINE_STATES.TESTING,
  PIPELINE_STATES.SUCCEEDED,
  PIPELINE_STATES.FAILED,
] as const;

const listRunsQuerySchema = z.object({
  state: z.enum(stateValues).optional(),
  branch: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export async function runsRoutes(app: FastifyInstance): Promise<void> {
  /**
   * GET /runs
   * List runs, newest first
   */
  app.get('/', async (request, reply) => {
    const parsed = listRunsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Invalid query',
        details: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
    }

    const runs = app.services.orchestrator.getRegistry().list(parsed.data);
    return reply.send({ data: runs, total: runs.length });
  });

  /**
   * GET /runs/:id
   */
  app.get<{ Params: { id: string } }>('/:id', async (request, reply) => {
    const run = app.services.orchestrator.getRegistry().get(request.params.id);
    if (!run) {
      return reply.status(404).send({ error: 'Run not found' });
    }
    return reply.send({ data: run });
  });
}
