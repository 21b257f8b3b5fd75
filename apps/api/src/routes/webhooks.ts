/**
 * Webhook routes
 * Receives GitHub push and pull_request deliveries and schedules pipeline runs
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { ValidationError, createChildLogger } from '@pipewright/shared';
import { normalizeGitHubEvent } from '@pipewright/core';

const logger = createChildLogger({ component: 'WebhookAPI' });

const SIGNATURE_PREFIX = 'sha256=';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Check an x-hub-signature-256 header against the raw request body
 */
export function verifySignature(secret: string, body: string, signature: string | undefined): boolean {
  if (!signature?.startsWith(SIGNATURE_PREFIX)) return false;

  const expected = Buffer.from(
    SIGNATURE_PREFIX + createHmac('sha256', secret).update(body).digest('hex')
  );
  const actual = Buffer.from(signature);
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

export async function webhookRoutes(app: FastifyInstance): Promise<void> {
  // Keep the raw body; the signature covers the exact bytes sent
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  /**
   * POST /webhooks/github
   */
  app.post('/webhooks/github', async (request, reply) => {
    const eventName = headerValue(request.headers['x-github-event']);
    if (!eventName) {
      return reply.status(400).send({ error: 'Missing x-github-event header' });
    }

    const rawBody = typeof request.body === 'string' ? request.body : '';
    const { webhookSecret } = app.services;
    if (webhookSecret) {
      const signature = headerValue(request.headers['x-hub-signature-256']);
      if (!verifySignature(webhookSecret, rawBody, signature)) {
        logger.warn({ eventName }, 'Webhook signature mismatch');
        return reply.status(401).send({ error: 'Invalid signature' });
      }
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody);
    } catch {
      return reply.status(400).send({ error: 'Request body is not valid JSON' });
    }

    try {
      const normalized = normalizeGitHubEvent(eventName, payload);
      if (!normalized.event) {
        return reply.status(200).send({ scheduled: false, reason: normalized.ignored });
      }

      const result = app.services.orchestrator.schedule(normalized.event);
      if (!result.scheduled) {
        return reply.status(200).send({ scheduled: false, reason: result.reason });
      }

      logger.info({ eventName, runId: result.run.id, branch: normalized.event.branch }, 'Run scheduled from webhook');
      return reply.status(202).send({ scheduled: true, runId: result.run.id });
    } catch (error) {
      if (error instanceof ValidationError) {
        return reply.status(400).send({ error: error.message, code: error.code });
      }
      throw error;
    }
  });
}
