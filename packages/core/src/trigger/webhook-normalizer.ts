/**
 * GitHub webhook normalisation
 * Converts push and pull_request deliveries into trigger events
 */

import { z } from 'zod';
import { TRIGGER_KINDS, ValidationError, type TriggerEvent } from '@pipewright/shared';

const BRANCH_REF_PREFIX = 'refs/heads/';

/** Pull request actions that change the code under test */
const PULL_REQUEST_UPDATE_ACTIONS = new Set(['opened', 'synchronize', 'reopened']);

const repositorySchema = z
  .object({
    full_name: z.string().optional(),
    clone_url: z.string().optional(),
  })
  .optional();

const pushPayloadSchema = z.object({
  ref: z.string().min(1),
  after: z.string().optional(),
  deleted: z.boolean().optional(),
  repository: repositorySchema,
});

const pullRequestPayloadSchema = z.object({
  action: z.string(),
  number: z.number().int(),
  pull_request: z.object({
    base: z.object({ ref: z.string().min(1) }),
    head: z.object({ sha: z.string().min(1) }),
  }),
  repository: repositorySchema,
});

export type WebhookNormalization =
  | { event: TriggerEvent; ignored?: undefined }
  | { event?: undefined; ignored: string };

function parsePayload<T>(schema: z.ZodType<T>, payload: unknown, eventName: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ValidationError(`Malformed ${eventName} payload: ${issues.join('; ')}`, {
      eventName,
      issues,
    });
  }
  return parsed.data;
}

/**
 * Normalise a webhook delivery.
 * Unrelated event names are ignored; malformed payloads of a known event throw ValidationError.
 */
export function normalizeGitHubEvent(
  eventName: string,
  payload: unknown,
  receivedAt: Date = new Date()
): WebhookNormalization {
  switch (eventName) {
    case TRIGGER_KINDS.PUSH: {
      const push = parsePayload(pushPayloadSchema, payload, eventName);
      if (!push.ref.startsWith(BRANCH_REF_PREFIX)) {
        return { ignored: `ref '${push.ref}' is not a branch` };
      }
      if (push.deleted) {
        return { ignored: `branch deletion for '${push.ref}'` };
      }
      return {
        event: {
          kind: TRIGGER_KINDS.PUSH,
          branch: push.ref.slice(BRANCH_REF_PREFIX.length),
          commit: push.after,
          repository: push.repository?.full_name,
          repositoryUrl: push.repository?.clone_url,
          receivedAt,
        },
      };
    }

    case TRIGGER_KINDS.PULL_REQUEST: {
      const pr = parsePayload(pullRequestPayloadSchema, payload, eventName);
      if (!PULL_REQUEST_UPDATE_ACTIONS.has(pr.action)) {
        return { ignored: `pull_request action '${pr.action}' does not update code` };
      }
      return {
        event: {
          kind: TRIGGER_KINDS.PULL_REQUEST,
          branch: pr.pull_request.base.ref,
          commit: pr.pull_request.head.sha,
          pullRequest: pr.number,
          repository: pr.repository?.full_name,
          repositoryUrl: pr.repository?.clone_url,
          receivedAt,
        },
      };
    }

    default:
      return { ignored: `event '${eventName}' is not a trigger` };
  }
}
