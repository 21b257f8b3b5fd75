/**
 * Pipeline Runner
 * Runs the build step, then the test step, driving the run's state machine
 */

import {
  PIPELINE_STATES,
  createChildLogger,
  type PipelineDefinition,
  type StepResult,
} from '@pipewright/shared';
import type { PipelineStateMachine } from '../state-machine/index.js';
import type { StepContext, StepExecutor } from './step-executor.js';

export interface PipelineOutcome {
  succeeded: boolean;
  steps: StepResult[];
  failureReason?: string;
}

export class PipelineRunner {
  private logger = createChildLogger({ component: 'PipelineRunner' });

  constructor(private readonly executor: StepExecutor) {}

  /**
   * Run build then test. A failed build leaves the test step skipped.
   * The state machine must be IDLE on entry and is terminal on return.
   */
  async run(
    definition: PipelineDefinition,
    context: StepContext,
    stateMachine: PipelineStateMachine
  ): Promise<PipelineOutcome> {
    stateMachine.transition(PIPELINE_STATES.BUILDING, 'run_started');

    const build = await this.executor.execute(definition.build, context);
    if (build.status !== 'success') {
      const failureReason = `${definition.build.label} failed with exit code ${build.exitCode ?? 1}`;
      stateMachine.transition(PIPELINE_STATES.FAILED, 'build_failed');
      this.logger.warn({ runId: context.runId, exitCode: build.exitCode }, 'Build failed, skipping tests');
      return {
        succeeded: false,
        steps: [build, this.executor.skip(definition.test)],
        failureReason,
      };
    }

    stateMachine.transition(PIPELINE_STATES.TESTING, 'build_succeeded');

    const test = await this.executor.execute(definition.test, context);
    if (test.status !== 'success') {
      stateMachine.transition(PIPELINE_STATES.FAILED, 'tests_failed');
      return {
        succeeded: false,
        steps: [build, test],
        failureReason: `${definition.test.label} failed with exit code ${test.exitCode ?? 1}`,
      };
    }

    stateMachine.transition(PIPELINE_STATES.SUCCEEDED, 'tests_passed');
    return { succeeded: true, steps: [build, test] };
  }
}
