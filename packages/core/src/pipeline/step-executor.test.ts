/**
 * Step Executor Tests
 */
import { describe, it, expect, vi } from 'vitest';
import type { StepDefinition, StepOutputChunk } from '@pipewright/shared';
import { StepExecutor } from './step-executor.js';
import type { CommandOptions, CommandResult } from './command-runner.js';

const BUILD: StepDefinition = { name: 'build', label: 'Build', run: 'cargo build --verbose' };
const CONTEXT = { runId: 'run-1', cwd: '/tmp/work/run-1', env: { CARGO_TERM_COLOR: 'always' } };

const result = (overrides: Partial<CommandResult> = {}): CommandResult => ({
  exitCode: 0,
  stdout: '',
  stderr: '',
  output: '',
  durationMs: 12,
  timedOut: false,
  ...overrides,
});

describe('StepExecutor', () => {
  it('should run the step command in the workspace with the run environment', async () => {
    const runner = vi.fn(async (_command: string, _options: CommandOptions) => result());
    const executor = new StepExecutor({ runner, timeoutMs: 5000 });

    await executor.execute(BUILD, CONTEXT);

    expect(runner).toHaveBeenCalledWith(
      'cargo build --verbose',
      expect.objectContaining({
        cwd: '/tmp/work/run-1',
        env: { CARGO_TERM_COLOR: 'always' },
        timeoutMs: 5000,
      })
    );
  });

  it('should record a successful step', async () => {
    const runner = vi.fn(async (_command: string, _options: CommandOptions) =>
      result({ output: 'Compiling widget v0.1.0\n' })
    );
    const step = await new StepExecutor({ runner }).execute(BUILD, CONTEXT);

    expect(step).toMatchObject({
      name: 'build',
      label: 'Build',
      command: 'cargo build --verbose',
      status: 'success',
      exitCode: 0,
      output: 'Compiling widget v0.1.0\n',
      durationMs: 12,
    });
    expect(step.startedAt).toBeInstanceOf(Date);
    expect(step.finishedAt).toBeInstanceOf(Date);
  });

  it('should keep the full output of a failed step', async () => {
    const runner = vi.fn(async (_command: string, _options: CommandOptions) =>
      result({ exitCode: 101, output: 'error[E0425]: cannot find value `x`\n' })
    );
    const step = await new StepExecutor({ runner }).execute(BUILD, CONTEXT);

    expect(step.status).toBe('failure');
    expect(step.exitCode).toBe(101);
    expect(step.output).toBe('error[E0425]: cannot find value `x`\n');
  });

  it('should report a command that cannot start as a failure', async () => {
    const runner = vi.fn(async (_command: string, _options: CommandOptions) =>
      result({ exitCode: 1, error: 'spawn /bin/sh ENOENT' })
    );
    const step = await new StepExecutor({ runner }).execute(BUILD, CONTEXT);

    expect(step.status).toBe('failure');
    expect(step.exitCode).toBe(1);
    expect(step.output).toBe('spawn /bin/sh ENOENT');
  });

  it('should report a timed out step as a failure', async () => {
    const runner = vi.fn(async (_command: string, _options: CommandOptions) =>
      result({ exitCode: 1, timedOut: true, output: 'Compiling\n' })
    );
    const step = await new StepExecutor({ runner, timeoutMs: 1000 }).execute(BUILD, CONTEXT);

    expect(step.status).toBe('failure');
    expect(step.output).toBe("Compiling\n\nStep 'Build' timed out after 1000ms");
  });

  it('should emit output chunks as they arrive', async () => {
    const runner = vi.fn(async (_command: string, options: CommandOptions) => {
      options.onOutput?.('stdout', 'Compiling\n');
      options.onOutput?.('stderr', 'warning\n');
      return result();
    });
    const executor = new StepExecutor({ runner });
    const chunks: StepOutputChunk[] = [];
    executor.on('output', (chunk) => chunks.push(chunk));

    await executor.execute(BUILD, CONTEXT);

    expect(chunks).toEqual([
      { runId: 'run-1', step: 'build', stream: 'stdout', data: 'Compiling\n' },
      { runId: 'run-1', step: 'build', stream: 'stderr', data: 'warning\n' },
    ]);
  });

  it('should record a skipped step without running it', () => {
    const runner = vi.fn();
    const step = new StepExecutor({ runner }).skip(BUILD);

    expect(step).toEqual({
      name: 'build',
      label: 'Build',
      command: 'cargo build --verbose',
      status: 'skipped',
      output: '',
    });
    expect(runner).not.toHaveBeenCalled();
  });
});
