/**
 * Pipeline run types
 */

import type { TriggerEvent } from './trigger.js';

// Pipeline States
export const PIPELINE_STATES = {
  IDLE: 'IDLE',
  BUILDING: 'BUILDING',
  TESTING: 'TESTING',
  SUCCEEDED: 'SUCCEEDED',
  FAILED: 'FAILED',
} as const;

export type PipelineState = (typeof PIPELINE_STATES)[keyof typeof PIPELINE_STATES];

export const STEP_NAMES = {
  BUILD: 'build',
  TEST: 'test',
} as const;

export type StepName = (typeof STEP_NAMES)[keyof typeof STEP_NAMES];

export type StepStatus = 'pending' | 'running' | 'success' | 'failure' | 'skipped';

/**
 * A single step of a pipeline definition
 */
export interface StepDefinition {
  name: StepName;
  /** Display name from the workflow file */
  label: string;
  /** Shell command */
  run: string;
}

/**
 * Parsed workflow: what a run executes
 */
export interface PipelineDefinition {
  name: string;
  triggers: {
    push?: string[];
    pull_request?: string[];
  };
  env: Record<string, string>;
  toolchain: string;
  cachePath: string;
  build: StepDefinition;
  test: StepDefinition;
}

export interface StepResult {
  name: StepName;
  label: string;
  command: string;
  status: StepStatus;
  exitCode?: number;
  /** stdout and stderr, interleaved in arrival order */
  output: string;
  startedAt?: Date;
  finishedAt?: Date;
  durationMs?: number;
}

export interface ToolchainInfo {
  channel: string;
  /** First line of `rustc -vV` */
  version: string;
  fingerprint: string;
}

export interface CacheRestoreOutcome {
  key: string;
  hit: boolean;
  fileCount: number;
  /** Set when the store failed and the restore degraded to a miss */
  error?: string;
}

export interface CacheSaveOutcome {
  key: string;
  saved: boolean;
  /** True when the store already held identical contents */
  unchanged: boolean;
  fileCount: number;
  sizeBytes: number;
  error?: string;
}

export interface PipelineRun {
  id: string;
  trigger: TriggerEvent;
  state: PipelineState;
  workDir: string;
  toolchain?: ToolchainInfo;
  cacheKey?: string;
  steps: StepResult[];
  cacheRestore?: CacheRestoreOutcome;
  cacheSave?: CacheSaveOutcome;
  failureReason?: string;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  durationMs?: number;
}

export interface StepOutputChunk {
  runId: string;
  step: StepName;
  stream: 'stdout' | 'stderr';
  data: string;
}
