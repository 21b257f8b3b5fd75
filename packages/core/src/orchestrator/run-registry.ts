/**
 * Run Registry
 * Bounded in-memory record of pipeline runs for status queries
 */

import { PIPELINE_STATES, type PipelineRun, type PipelineState } from '@pipewright/shared';

const DEFAULT_MAX_RETAINED_RUNS = 100;

export interface RunQuery {
  state?: PipelineState;
  branch?: string;
  limit?: number;
}

function isFinished(run: PipelineRun): boolean {
  return run.state === PIPELINE_STATES.SUCCEEDED || run.state === PIPELINE_STATES.FAILED;
}

export class RunRegistry {
  // Insertion order is creation order
  private runs = new Map<string, PipelineRun>();

  constructor(private readonly maxRetainedRuns = DEFAULT_MAX_RETAINED_RUNS) {}

  add(run: PipelineRun): void {
    this.runs.set(run.id, run);
    this.prune();
  }

  get(id: string): PipelineRun | undefined {
    return this.runs.get(id);
  }

  /**
   * Runs matching the query, newest first
   */
  list(query: RunQuery = {}): PipelineRun[] {
    const matches = [...this.runs.values()]
      .reverse()
      .filter((run) => !query.state || run.state === query.state)
      .filter((run) => !query.branch || run.trigger.branch === query.branch);
    return query.limit ? matches.slice(0, query.limit) : matches;
  }

  get size(): number {
    return this.runs.size;
  }

  /**
   * Evict the oldest finished runs above the retention limit.
   * Runs still in progress are never evicted.
   */
  prune(): void {
    let excess = this.runs.size - this.maxRetainedRuns;
    if (excess <= 0) return;

    for (const [id, run] of this.runs) {
      if (excess <= 0) break;
      if (isFinished(run)) {
        this.runs.delete(id);
        excess--;
      }
    }
  }
}
