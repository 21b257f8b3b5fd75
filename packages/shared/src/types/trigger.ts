/**
 * Repository event types
 */

export const TRIGGER_KINDS = {
  PUSH: 'push',
  PULL_REQUEST: 'pull_request',
} as const;

export type TriggerKind = (typeof TRIGGER_KINDS)[keyof typeof TRIGGER_KINDS];

/**
 * A repository event carrying a branch reference.
 * For pull requests `branch` is the base (target) branch.
 */
export interface TriggerEvent {
  kind: TriggerKind;
  branch: string;
  /** Commit to build, when known */
  commit?: string;
  /** Clone URL of the repository, when the event came from a remote host */
  repositoryUrl?: string;
  /** Full repository name, e.g. owner/name */
  repository?: string;
  /** Pull request number for pull_request events */
  pullRequest?: number;
  receivedAt: Date;
}

/**
 * Branch filters per event kind, as in a workflow's `on:` section.
 * A kind with no entry never triggers.
 */
export type TriggerFilters = Partial<Record<TriggerKind, string[]>>;

export type TriggerDecision =
  | { scheduled: true; event: TriggerEvent }
  | { scheduled: false; reason: string };
