/**
 * Command Runner Tests against a real shell
 */
import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { runShellCommand } from './command-runner.js';

describe.skipIf(process.platform === 'win32')('runShellCommand with a real shell', () => {
  it('should capture output and exit code', async () => {
    const result = await runShellCommand('echo built; echo warned >&2; exit 3', { cwd: tmpdir() });

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('built\n');
    expect(result.stderr).toBe('warned\n');
    expect(result.timedOut).toBe(false);
  });

  it('should end a step whose children outlive the timeout', async () => {
    const result = await runShellCommand('sleep 5; echo done', { cwd: tmpdir(), timeoutMs: 200 });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.durationMs).toBeLessThan(2000);
  });
});
