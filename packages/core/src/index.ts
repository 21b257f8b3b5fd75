/**
 * @pipewright/core
 * Trigger evaluation, toolchain provisioning, build-output caching and pipeline execution
 */

// Workflow definitions
export * from './workflow/index.js';

// Triggers
export * from './trigger/index.js';

// Toolchain
export * from './toolchain/index.js';

// Cache
export * from './cache/index.js';

// Pipeline execution
export * from './pipeline/index.js';

// State machine
export * from './state-machine/index.js';

// Orchestrator
export * from './orchestrator/index.js';
