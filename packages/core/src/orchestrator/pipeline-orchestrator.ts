/**
 * Pipeline Orchestrator
 *
 * Drives a scheduled run end to end:
 *
 *   trigger → checkout → provision toolchain → restore cache
 *           → build → test → save cache → SUCCEEDED / FAILED
 *
 * Each run gets its own state machine. Runs cloned from a repository URL get
 * their own workspace and proceed concurrently; runs that build in the shared
 * source directory are queued so only one of them touches it at a time. The
 * cache store is the only state shared between concurrent runs.
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import { rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
  PIPELINE_STATES,
  createChildLogger,
  wrapError,
  type PipelineDefinition,
  type PipelineRun,
  type StepOutputChunk,
  type ToolchainInfo,
  type TriggerEvent,
} from '@pipewright/shared';
import type { CheckoutRequest, CheckoutResult } from '@pipewright/git';
import { CacheManager, deriveCacheKey, resolveHostOs } from '../cache/index.js';
import { PipelineRunner, StepExecutor, type CommandRunner } from '../pipeline/index.js';
import { PipelineStateMachine, type StateChange } from '../state-machine/index.js';
import { TriggerEvaluator } from '../trigger/index.js';
import { RunRegistry } from './run-registry.js';

export interface ToolchainSource {
  provision(channel: string): Promise<ToolchainInfo>;
}

export interface WorkspaceCheckout {
  checkout(request: CheckoutRequest): Promise<CheckoutResult>;
}

export interface PipelineOrchestratorDependencies {
  definition: PipelineDefinition;
  cacheManager: CacheManager;
  provisioner: ToolchainSource;
  /** Required for events that carry a repository URL */
  checkout?: WorkspaceCheckout;
  /** Replaces the shell runner for build and test steps */
  commandRunner?: CommandRunner;
  registry?: RunRegistry;
}

export interface PipelineOrchestratorConfig {
  /** Parent directory of per-run clones */
  workDir: string;
  /** Workspace for events without a repository URL */
  sourceDir: string;
  /** Overrides the OS half of the cache key */
  hostOs?: string;
  stepTimeoutMs: number;
  /** Remove per-run clones once the run has finished */
  cleanupWorkspaces: boolean;
}

export interface OrchestratorEvents {
  'run:scheduled': (run: PipelineRun) => void;
  'run:state': (run: PipelineRun, change: StateChange) => void;
  'step:output': (chunk: StepOutputChunk) => void;
  'run:completed': (run: PipelineRun) => void;
}

export type ScheduleResult =
  | { scheduled: true; run: PipelineRun; completion: Promise<PipelineRun> }
  | { scheduled: false; reason: string };

const DEFAULT_CONFIG: PipelineOrchestratorConfig = {
  workDir: './work',
  sourceDir: '.',
  stepTimeoutMs: 0,
  cleanupWorkspaces: true,
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PipelineOrchestrator extends EventEmitter<OrchestratorEvents> {
  private readonly definition: PipelineDefinition;
  private readonly cacheManager: CacheManager;
  private readonly provisioner: ToolchainSource;
  private readonly checkoutService: WorkspaceCheckout | undefined;
  private readonly registry: RunRegistry;
  private readonly config: PipelineOrchestratorConfig;
  private readonly evaluator: TriggerEvaluator;
  private readonly stepExecutor: StepExecutor;
  private readonly pipelineRunner: PipelineRunner;
  private inFlight = new Map<string, Promise<PipelineRun>>();
  /** Tail of the queue of runs waiting on each workspace directory */
  private workspaceQueues = new Map<string, Promise<void>>();
  private logger = createChildLogger({ component: 'PipelineOrchestrator' });

  constructor(
    dependencies: PipelineOrchestratorDependencies,
    config: Partial<PipelineOrchestratorConfig> = {}
  ) {
    super();
    this.definition = dependencies.definition;
    this.cacheManager = dependencies.cacheManager;
    this.provisioner = dependencies.provisioner;
    this.checkoutService = dependencies.checkout;
    this.registry = dependencies.registry ?? new RunRegistry();
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.evaluator = new TriggerEvaluator(this.definition.triggers);
    this.stepExecutor = new StepExecutor({
      runner: dependencies.commandRunner,
      timeoutMs: this.config.stepTimeoutMs,
    });
    this.stepExecutor.on('output', (chunk) => this.emit('step:output', chunk));
    this.pipelineRunner = new PipelineRunner(this.stepExecutor);
  }

  getRegistry(): RunRegistry {
    return this.registry;
  }

  getDefinition(): PipelineDefinition {
    return this.definition;
  }

  /**
   * Evaluate the event and, if it matches, start a run in the background
   */
  schedule(event: TriggerEvent): ScheduleResult {
    const decision = this.evaluator.evaluate(event);
    if (!decision.scheduled) {
      this.logger.info({ kind: event.kind, branch: event.branch, reason: decision.reason }, 'Event ignored');
      return decision;
    }

    const run = this.createRun(event);
    this.registry.add(run);
    this.logger.info({ runId: run.id, kind: event.kind, branch: event.branch, commit: event.commit }, 'Run scheduled');
    this.emit('run:scheduled', run);

    const completion = this.execute(run).finally(() => {
      this.inFlight.delete(run.id);
    });
    this.inFlight.set(run.id, completion);

    return { scheduled: true, run, completion };
  }

  /**
   * Evaluate the event and run the pipeline to completion.
   * Returns null when the event does not trigger a run.
   */
  async handleEvent(event: TriggerEvent): Promise<PipelineRun | null> {
    const result = this.schedule(event);
    if (!result.scheduled) return null;
    return result.completion;
  }

  /**
   * Resolves once every scheduled run has finished
   */
  async waitForIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }

  /**
   * Execute a registered run. Never rejects: any failure ends the run FAILED.
   */
  async execute(run: PipelineRun): Promise<PipelineRun> {
    const stateMachine = new PipelineStateMachine(run.id);
    stateMachine.on('state:changed', (change) => {
      run.state = change.to;
      this.emit('run:state', run, change);
    });

    run.startedAt = new Date();

    try {
      await this.withWorkspace(run, () => this.runStages(run, stateMachine));
    } catch (error) {
      const wrapped = wrapError(error, { runId: run.id, state: stateMachine.getState() });
      this.logger.error({ runId: run.id, error: wrapped.message, code: wrapped.code }, 'Run aborted');
      if (!stateMachine.isTerminal()) {
        this.failBeforeSteps(run, stateMachine, wrapped.message);
      }
    }

    return this.complete(run);
  }

  /**
   * Run `task` once every earlier run on the same workspace has finished
   */
  private async withWorkspace<T>(run: PipelineRun, task: () => Promise<T>): Promise<T> {
    const previous = this.workspaceQueues.get(run.workDir);
    if (previous) {
      this.logger.info({ runId: run.id, workDir: run.workDir }, 'Waiting for workspace');
    }

    const current = (previous ?? Promise.resolve()).then(task);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.workspaceQueues.set(run.workDir, tail);

    try {
      return await current;
    } finally {
      if (this.workspaceQueues.get(run.workDir) === tail) {
        this.workspaceQueues.delete(run.workDir);
      }
    }
  }

  private createRun(event: TriggerEvent): PipelineRun {
    const id = randomUUID();
    const workDir = event.repositoryUrl
      ? resolve(this.config.workDir, id)
      : resolve(this.config.sourceDir);

    return {
      id,
      trigger: event,
      state: PIPELINE_STATES.IDLE,
      workDir,
      steps: [],
      createdAt: new Date(),
    };
  }

  private async runStages(run: PipelineRun, stateMachine: PipelineStateMachine): Promise<void> {
    const { trigger } = run;

    // Workspace
    if (trigger.repositoryUrl) {
      if (!this.checkoutService) {
        this.failBeforeSteps(run, stateMachine, 'No checkout service configured for remote repositories');
        return;
      }
      const checkout = await this.checkoutService.checkout({
        repositoryUrl: trigger.repositoryUrl,
        branch: trigger.branch,
        commit: trigger.commit,
        workDir: run.workDir,
        ...(trigger.pullRequest !== undefined && { pullRequest: trigger.pullRequest }),
      });
      if (!checkout.success) {
        this.failBeforeSteps(run, stateMachine, `Checkout failed: ${checkout.error ?? 'unknown error'}`);
        return;
      }
    }

    // Toolchain
    let toolchain: ToolchainInfo;
    try {
      toolchain = await this.provisioner.provision(this.definition.toolchain);
    } catch (error) {
      this.failBeforeSteps(run, stateMachine, describe(error));
      return;
    }
    run.toolchain = toolchain;

    // Cache restore
    const cacheKey = deriveCacheKey(resolveHostOs(this.config.hostOs), toolchain.fingerprint);
    const cacheDir = join(run.workDir, this.definition.cachePath);
    run.cacheKey = cacheKey;
    run.cacheRestore = await this.cacheManager.restore(cacheKey, cacheDir);

    // Build and test; the cache is saved whatever the outcome
    try {
      const outcome = await this.pipelineRunner.run(
        this.definition,
        {
          runId: run.id,
          cwd: run.workDir,
          env: { ...this.definition.env, RUSTUP_TOOLCHAIN: toolchain.channel },
        },
        stateMachine
      );
      run.steps = outcome.steps;
      run.failureReason = outcome.failureReason;
    } finally {
      run.cacheSave = await this.cacheManager.save(cacheKey, cacheDir);
    }
  }

  /**
   * End a run that never reached its first step
   */
  private failBeforeSteps(run: PipelineRun, stateMachine: PipelineStateMachine, reason: string): void {
    run.failureReason = reason;
    if (run.steps.length === 0) {
      run.steps = [this.stepExecutor.skip(this.definition.build), this.stepExecutor.skip(this.definition.test)];
    }
    if (stateMachine.getState() === PIPELINE_STATES.IDLE) {
      stateMachine.transition(PIPELINE_STATES.FAILED, 'setup_failed');
    } else if (!stateMachine.isTerminal()) {
      stateMachine.transition(PIPELINE_STATES.FAILED, 'aborted');
    }
  }

  private async complete(run: PipelineRun): Promise<PipelineRun> {
    run.finishedAt = new Date();
    run.durationMs = run.finishedAt.getTime() - (run.startedAt ?? run.createdAt).getTime();

    this.logger.info(
      {
        runId: run.id,
        state: run.state,
        cacheKey: run.cacheKey,
        cacheHit: run.cacheRestore?.hit,
        cacheSaved: run.cacheSave?.saved,
        durationMs: run.durationMs,
        failureReason: run.failureReason,
      },
      `Run ${run.state === PIPELINE_STATES.SUCCEEDED ? 'succeeded' : 'failed'}`
    );

    if (this.config.cleanupWorkspaces && run.trigger.repositoryUrl) {
      await rm(run.workDir, { recursive: true, force: true }).catch((error: unknown) => {
        this.logger.warn({ runId: run.id, error: describe(error) }, 'Workspace cleanup failed');
      });
    }

    this.registry.prune();
    this.emit('run:completed', run);
    return run;
  }
}
