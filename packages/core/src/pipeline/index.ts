/**
 * Pipeline execution
 */

export { PipelineRunner } from './pipeline-runner.js';
export type { PipelineOutcome } from './pipeline-runner.js';
export { StepExecutor } from './step-executor.js';
export type { StepContext, StepExecutorOptions } from './step-executor.js';
export { runShellCommand } from './command-runner.js';
export type { CommandOptions, CommandResult, CommandRunner, OutputStream } from './command-runner.js';
