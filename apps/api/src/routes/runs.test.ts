/**
 * Run Routes Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { RunRegistry, type PipelineOrchestrator } from '@pipewright/core';
import { PIPELINE_STATES, type PipelineRun } from '@pipewright/shared';
import { runsRoutes } from './runs.js';

const createRun = (id: string, overrides: Partial<PipelineRun> = {}): PipelineRun => ({
  id,
  trigger: { kind: 'push', branch: 'master', receivedAt: new Date('2026-01-01T00:00:00Z') },
  state: PIPELINE_STATES.SUCCEEDED,
  workDir: '/tmp/source',
  steps: [],
  createdAt: new Date('2026-01-01T00:00:00Z'),
  ...overrides,
});

describe('Run Routes', () => {
  let app: FastifyInstance;
  let registry: RunRegistry;

  beforeEach(async () => {
    registry = new RunRegistry();
    registry.add(createRun('run-1', { state: PIPELINE_STATES.FAILED, failureReason: 'Build failed with exit code 101' }));
    registry.add(createRun('run-2'));

    app = Fastify({ logger: false });
    app.decorate('services', {
      orchestrator: { getRegistry: () => registry } as unknown as PipelineOrchestrator,
      cacheStore: 'memory',
    });
    await app.register(runsRoutes, { prefix: '/api/v1/runs' });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /api/v1/runs', () => {
    it('should list runs newest first', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/runs' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body) as { data: Array<{ id: string }>; total: number };
      expect(body.data.map((r) => r.id)).toEqual(['run-2', 'run-1']);
      expect(body.total).toBe(2);
    });

    it('should filter by state', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/runs?state=FAILED' });

      const body = JSON.parse(response.body) as { data: Array<{ id: string; failureReason: string }> };
      expect(body.data).toHaveLength(1);
      expect(body.data[0]?.failureReason).toBe('Build failed with exit code 101');
    });

    it('should reject an unknown state', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/runs?state=PAUSED' });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /api/v1/runs/:id', () => {
    it('should return a run', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/runs/run-2' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body) as { data: { id: string; state: string } };
      expect(body.data).toMatchObject({ id: 'run-2', state: 'SUCCEEDED' });
    });

    it('should return 404 for an unknown run', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/runs/missing' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({ error: 'Run not found' });
    });
  });
});
