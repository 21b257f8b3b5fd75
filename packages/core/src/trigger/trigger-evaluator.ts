/**
 * Trigger Evaluator
 * Decides whether a repository event schedules a pipeline run
 */

import {
  createChildLogger,
  type TriggerEvent,
  type TriggerFilters,
  type TriggerDecision,
} from '@pipewright/shared';

export class TriggerEvaluator {
  private readonly filters: TriggerFilters;
  private logger = createChildLogger({ component: 'TriggerEvaluator' });

  constructor(filters: TriggerFilters) {
    this.filters = filters;
  }

  /**
   * Watch a single branch for both pushes and pull requests
   */
  static forBranch(branch: string): TriggerEvaluator {
    return new TriggerEvaluator({ push: [branch], pull_request: [branch] });
  }

  /**
   * Branch names are compared exactly; no glob patterns.
   */
  evaluate(event: TriggerEvent): TriggerDecision {
    const branches = this.filters[event.kind];

    if (!branches) {
      this.logger.debug({ kind: event.kind }, 'Event kind not watched');
      return { scheduled: false, reason: `${event.kind} events are not watched` };
    }

    if (!branches.includes(event.branch)) {
      this.logger.debug({ kind: event.kind, branch: event.branch }, 'Branch not watched');
      return { scheduled: false, reason: `branch '${event.branch}' is not watched` };
    }

    return { scheduled: true, event };
  }

  getFilters(): TriggerFilters {
    return this.filters;
  }
}
