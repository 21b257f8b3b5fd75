/**
 * API Services Module
 * Builds the pipeline orchestrator and its collaborators from configuration
 */

import { resolve } from 'node:path';
import {
  CacheManager,
  FileSystemCacheStore,
  MemoryCacheStore,
  PipelineOrchestrator,
  RunRegistry,
  ToolchainProvisioner,
  loadWorkflow,
  type CacheStore,
} from '@pipewright/core';
import { CheckoutService } from '@pipewright/git';
import { createChildLogger, getConfig, type Config } from '@pipewright/shared';
import {
  broadcastRunCompleted,
  broadcastRunState,
  broadcastStepOutput,
} from '../websocket/index.js';

const logger = createChildLogger({ component: 'Services' });

export interface AppServices {
  orchestrator: PipelineOrchestrator;
  cacheStore: Config['cache']['store'];
  /** Enables webhook signature verification when set */
  webhookSecret?: string;
}

function createCacheStore(config: Config): CacheStore {
  if (config.cache.store === 'memory') {
    return new MemoryCacheStore();
  }
  return new FileSystemCacheStore(resolve(config.cache.dir));
}

/**
 * Initialize all services
 */
export async function initializeServices(config: Config = getConfig()): Promise<AppServices> {
  const definition = await loadWorkflow(config.pipeline.workflowPath, {
    watchedBranch: config.trigger.watchedBranch,
  });

  const orchestrator = new PipelineOrchestrator(
    {
      definition,
      cacheManager: new CacheManager({ store: createCacheStore(config) }),
      provisioner: new ToolchainProvisioner(),
      checkout: new CheckoutService(),
      registry: new RunRegistry(config.pipeline.maxRetainedRuns),
    },
    {
      workDir: config.pipeline.workDir,
      sourceDir: config.pipeline.sourceDir,
      hostOs: config.cache.hostOs,
      stepTimeoutMs: config.pipeline.stepTimeoutMs,
      cleanupWorkspaces: config.pipeline.cleanupWorkspaces,
    }
  );

  orchestrator.on('run:state', broadcastRunState);
  orchestrator.on('step:output', broadcastStepOutput);
  orchestrator.on('run:completed', broadcastRunCompleted);

  logger.info(
    {
      workflow: definition.name,
      toolchain: definition.toolchain,
      triggers: definition.triggers,
      cacheStore: config.cache.store,
    },
    'Services initialized'
  );

  return {
    orchestrator,
    cacheStore: config.cache.store,
    webhookSecret: config.trigger.webhookSecret,
  };
}

/**
 * Let in-flight runs finish before the process exits
 */
export async function shutdownServices(services: AppServices): Promise<void> {
  const active = services.orchestrator.getRegistry().list().filter((run) => run.finishedAt === undefined);
  if (active.length > 0) {
    logger.info({ activeRuns: active.length }, 'Waiting for active runs to finish');
  }
  await services.orchestrator.waitForIdle();
  logger.info('Services shut down');
}
