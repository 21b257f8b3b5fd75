/**
 * Workflow Loader
 * Reads a GitHub Actions style workflow file into a pipeline definition.
 *
 * Only single-job workflows are accepted. Within the job:
 * - `actions/checkout` is implied by the workspace checkout
 * - `dtolnay/rust-toolchain@<channel>` selects the toolchain channel
 * - `actions/cache` names the build-output directory
 * - the two `run` steps are the build and test steps, in that order
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';
import {
  STEP_NAMES,
  ValidationError,
  createChildLogger,
  type PipelineDefinition,
} from '@pipewright/shared';

const logger = createChildLogger({ component: 'WorkflowLoader' });

const DEFAULT_TOOLCHAIN = 'stable';
const DEFAULT_CACHE_PATH = 'target';

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const branchFilterSchema = z
  .object({
    branches: z.array(z.string().min(1)).min(1).optional(),
  })
  .nullable();

const stepSchema = z
  .object({
    name: z.string().min(1).optional(),
    id: z.string().optional(),
    uses: z.string().min(1).optional(),
    run: z.string().min(1).optional(),
    with: z.record(z.string(), scalarSchema).optional(),
  })
  .refine((step) => (step.uses === undefined) !== (step.run === undefined), {
    message: 'a step needs exactly one of uses or run',
  });

type WorkflowStep = z.infer<typeof stepSchema>;

const jobSchema = z.object({
  'runs-on': z.string().optional(),
  steps: z.array(stepSchema).min(1),
});

const workflowSchema = z.object({
  name: z.string().min(1).default('pipeline'),
  on: z
    .object({
      push: branchFilterSchema.optional(),
      pull_request: branchFilterSchema.optional(),
    })
    .refine((on) => on.push !== undefined || on.pull_request !== undefined, {
      message: 'at least one of push or pull_request is required',
    }),
  env: z.record(z.string(), scalarSchema).default({}),
  jobs: z
    .record(z.string(), jobSchema)
    .refine((jobs) => Object.keys(jobs).length === 1, {
      message: 'exactly one job is supported',
    }),
});

type BranchFilter = z.infer<typeof branchFilterSchema>;

export interface WorkflowLoadOptions {
  /** Applied to every event kind listed without an explicit branches filter */
  watchedBranch: string;
}

/**
 * Built-in workflow used when no file is configured
 */
export function createDefaultWorkflow(watchedBranch: string): PipelineDefinition {
  return {
    name: 'Rust',
    triggers: {
      push: [watchedBranch],
      pull_request: [watchedBranch],
    },
    env: { CARGO_TERM_COLOR: 'always' },
    toolchain: DEFAULT_TOOLCHAIN,
    cachePath: DEFAULT_CACHE_PATH,
    build: { name: STEP_NAMES.BUILD, label: 'Build', run: 'cargo build --verbose' },
    test: { name: STEP_NAMES.TEST, label: 'Run tests', run: 'cargo test --verbose' },
  };
}

function actionName(uses: string): { action: string; ref: string | undefined } {
  const at = uses.indexOf('@');
  return at === -1
    ? { action: uses, ref: undefined }
    : { action: uses.slice(0, at), ref: uses.slice(at + 1) };
}

/**
 * Parse workflow YAML text
 * @param source - Shown in validation errors (usually the file path)
 */
export function parseWorkflow(
  text: string,
  options: WorkflowLoadOptions,
  source = '<inline>'
): PipelineDefinition {
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Workflow ${source} is not valid YAML: ${message}`, { source });
  }

  const parsed = workflowSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.') || '<root>'}: ${e.message}`);
    throw new ValidationError(`Workflow ${source} is invalid: ${issues.join('; ')}`, {
      source,
      issues,
    });
  }

  const workflow = parsed.data;
  const [job] = Object.values(workflow.jobs);
  if (!job) {
    throw new ValidationError(`Workflow ${source} is invalid: jobs: exactly one job is supported`, {
      source,
    });
  }

  let toolchain = DEFAULT_TOOLCHAIN;
  let cachePath = DEFAULT_CACHE_PATH;
  const runSteps: Array<WorkflowStep & { run: string }> = [];

  for (const step of job.steps) {
    if (step.run !== undefined) {
      runSteps.push({ ...step, run: step.run });
      continue;
    }

    const { action, ref } = actionName(step.uses ?? '');
    switch (action) {
      case 'actions/checkout':
        break;
      case 'dtolnay/rust-toolchain':
        toolchain = step.with?.toolchain ?? ref ?? DEFAULT_TOOLCHAIN;
        break;
      case 'actions/cache': {
        // Multi-line paths are not supported; the first entry names the directory
        const path = step.with?.path?.split('\n')[0]?.trim();
        if (path) cachePath = path;
        break;
      }
      default:
        throw new ValidationError(`Workflow ${source} uses unsupported action '${action}'`, {
          source,
          action,
        });
    }
  }

  const [build, test, ...extra] = runSteps;
  if (!build || !test || extra.length > 0) {
    throw new ValidationError(
      `Workflow ${source} is invalid: expected exactly two run steps (build, then test), found ${runSteps.length}`,
      { source }
    );
  }

  const branchesFor = (filter: BranchFilter | undefined): string[] | undefined => {
    if (filter === undefined) return undefined;
    return filter?.branches ?? [options.watchedBranch];
  };

  return {
    name: workflow.name,
    triggers: {
      push: branchesFor(workflow.on.push),
      pull_request: branchesFor(workflow.on.pull_request),
    },
    env: workflow.env,
    toolchain,
    cachePath,
    build: { name: STEP_NAMES.BUILD, label: build.name ?? 'Build', run: build.run },
    test: { name: STEP_NAMES.TEST, label: test.name ?? 'Test', run: test.run },
  };
}

/**
 * Load a workflow from disk
 */
export async function loadWorkflowFromFile(
  path: string,
  options: WorkflowLoadOptions
): Promise<PipelineDefinition> {
  const text = await readFile(path, 'utf-8');
  const definition = parseWorkflow(text, options, path);
  logger.info({ path, name: definition.name, toolchain: definition.toolchain }, 'Workflow loaded');
  return definition;
}

/**
 * Load the configured workflow, or the built-in one when no path is given
 */
export async function loadWorkflow(
  path: string | undefined,
  options: WorkflowLoadOptions
): Promise<PipelineDefinition> {
  if (!path) {
    return createDefaultWorkflow(options.watchedBranch);
  }
  return loadWorkflowFromFile(path, options);
}
