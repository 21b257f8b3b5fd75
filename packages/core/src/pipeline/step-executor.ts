/**
 * Step Executor
 * Runs one workflow step in the run workspace and records its result
 */

import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  logStepCompletion,
  type StepDefinition,
  type StepOutputChunk,
  type StepResult,
} from '@pipewright/shared';
import { runShellCommand, type CommandRunner } from './command-runner.js';

interface StepExecutorEvents {
  output: (chunk: StepOutputChunk) => void;
}

export interface StepExecutorOptions {
  runner?: CommandRunner;
  /** Per-step timeout in ms, 0 disables it */
  timeoutMs?: number;
}

export interface StepContext {
  runId: string;
  cwd: string;
  env: Record<string, string>;
}

export class StepExecutor extends EventEmitter<StepExecutorEvents> {
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private logger = createChildLogger({ component: 'StepExecutor' });

  constructor(options: StepExecutorOptions = {}) {
    super();
    this.runner = options.runner ?? runShellCommand;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /**
   * Execute a step. Failures, including a command that cannot start, are
   * reported on the result rather than thrown.
   */
  async execute(step: StepDefinition, context: StepContext): Promise<StepResult> {
    const startedAt = new Date();
    this.logger.info({ runId: context.runId, step: step.name, command: step.run }, `Running ${step.label}`);

    const result = await this.runner(step.run, {
      cwd: context.cwd,
      env: context.env,
      timeoutMs: this.timeoutMs,
      onOutput: (stream, data) => {
        this.emit('output', { runId: context.runId, step: step.name, stream, data });
      },
    });

    let output = result.output;
    if (result.error) {
      output = output ? `${output}\n${result.error}` : result.error;
    }
    if (result.timedOut) {
      output = `${output}\nStep '${step.label}' timed out after ${this.timeoutMs}ms`;
    }

    const failed = result.exitCode !== 0 || result.timedOut;
    const exitCode = failed && result.exitCode === 0 ? 1 : result.exitCode;

    logStepCompletion(context.runId, step.name, exitCode, result.durationMs);

    return {
      name: step.name,
      label: step.label,
      command: step.run,
      status: failed ? 'failure' : 'success',
      exitCode,
      output,
      startedAt,
      finishedAt: new Date(),
      durationMs: result.durationMs,
    };
  }

  /**
   * Record a step that was never run
   */
  skip(step: StepDefinition): StepResult {
    return {
      name: step.name,
      label: step.label,
      command: step.run,
      status: 'skipped',
      output: '',
    };
  }
}
