/**
 * Configuration management for Pipewright
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors/index.js';

// Load environment variables - try the working directory first, then the
// monorepo root (apps/api may be started from its own directory)
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  // dotenv never overrides variables that are already set
  dotenvConfig({ path: envPath });
}

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((val) => val === true || val === 'true' || val === '1');

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Server
  server: z.object({
    port: z.coerce.number().default(3000),
    host: z.string().default('0.0.0.0'),
    corsOrigin: z.string().default('*'),
  }),

  // Triggers
  trigger: z.object({
    watchedBranch: z.string().min(1).default('master'),
    /** Enables x-hub-signature-256 verification of incoming webhooks */
    webhookSecret: z.string().optional(),
  }),

  // Pipeline execution
  pipeline: z.object({
    /** Workflow YAML file; the built-in definition is used when unset */
    workflowPath: z.string().optional(),
    workDir: z.string().default('./work'),
    /** Local checkout used for events that carry no repository URL */
    sourceDir: z.string().default('.'),
    /** Per-step timeout in ms, 0 disables it */
    stepTimeoutMs: z.coerce.number().int().nonnegative().default(0),
    maxRetainedRuns: z.coerce.number().int().positive().default(100),
    /** Remove per-run workspaces once the run has finished */
    cleanupWorkspaces: booleanish.default(true),
  }),

  // Build-output cache
  cache: z.object({
    store: z.enum(['filesystem', 'memory']).default('filesystem'),
    dir: z.string().default('./data/cache'),
    /** Overrides the OS half of the cache key */
    hostOs: z.string().optional(),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    server: {
      port: process.env.PORT,
      host: process.env.HOST,
      corsOrigin: process.env.CORS_ORIGIN,
    },

    trigger: {
      watchedBranch: process.env.PIPEWRIGHT_WATCHED_BRANCH,
      webhookSecret: process.env.GITHUB_WEBHOOK_SECRET || undefined,
    },

    pipeline: {
      workflowPath: process.env.PIPEWRIGHT_WORKFLOW_PATH || undefined,
      workDir: process.env.PIPEWRIGHT_WORK_DIR,
      sourceDir: process.env.PIPEWRIGHT_SOURCE_DIR,
      stepTimeoutMs: process.env.PIPEWRIGHT_STEP_TIMEOUT_MS,
      maxRetainedRuns: process.env.PIPEWRIGHT_MAX_RETAINED_RUNS,
      cleanupWorkspaces: process.env.PIPEWRIGHT_CLEANUP_WORKSPACES,
    },

    cache: {
      store: process.env.PIPEWRIGHT_CACHE_STORE,
      dir: process.env.PIPEWRIGHT_CACHE_DIR,
      hostOs: process.env.PIPEWRIGHT_HOST_OS || undefined,
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  return parsed.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { valid: false, errors: error.issues };
    }
    throw error;
  }
}
