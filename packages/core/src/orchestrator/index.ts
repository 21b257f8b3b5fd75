/**
 * Pipeline Orchestrator
 * Schedules runs from repository events and drives them to completion
 */

export { PipelineOrchestrator } from './pipeline-orchestrator.js';
export type {
  PipelineOrchestratorDependencies,
  PipelineOrchestratorConfig,
  OrchestratorEvents,
  ScheduleResult,
  ToolchainSource,
  WorkspaceCheckout,
} from './pipeline-orchestrator.js';

export { RunRegistry } from './run-registry.js';
export type { RunQuery } from './run-registry.js';
