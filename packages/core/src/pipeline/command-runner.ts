/**
 * Shell command execution
 */

import { spawn } from 'node:child_process';

export type OutputStream = 'stdout' | 'stderr';

export interface CommandOptions {
  cwd: string;
  /** Merged over the inherited process environment */
  env?: Record<string, string>;
  /** Kill the process after this many ms; 0 or unset waits forever */
  timeoutMs?: number;
  onOutput?: (stream: OutputStream, data: string) => void;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr, interleaved in arrival order */
  output: string;
  durationMs: number;
  timedOut: boolean;
  /** Set when the process could not be started */
  error?: string;
}

export type CommandRunner = (command: string, options: CommandOptions) => Promise<CommandResult>;

// The shell gets its own process group so a timeout reaches its children too
const USE_PROCESS_GROUP = process.platform !== 'win32';

/**
 * Run a command line through the shell and collect its output.
 * Never rejects: spawn failures resolve with exit code 1 and `error` set.
 * A timed-out command resolves as soon as the timer fires, with exit code 1.
 */
export const runShellCommand: CommandRunner = (command, options) => {
  const startTime = Date.now();

  return new Promise((resolve) => {
    const proc = spawn(command, {
      cwd: options.cwd,
      shell: true,
      detached: USE_PROCESS_GROUP,
      env: { ...process.env, ...options.env },
    });

    let stdout = '';
    let stderr = '';
    let output = '';
    let timedOut = false;
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (exitCode: number, error?: string) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({
        exitCode,
        stdout,
        stderr,
        output,
        durationMs: Date.now() - startTime,
        timedOut,
        error,
      });
    };

    const terminate = () => {
      if (!USE_PROCESS_GROUP || proc.pid === undefined) {
        proc.kill('SIGTERM');
        return;
      }
      try {
        process.kill(-proc.pid, 'SIGTERM');
      } catch {
        // No such group: signal the shell alone
        proc.kill('SIGTERM');
      }
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        terminate();
        // Grandchildren may hold the pipes open after the shell exits
        proc.stdout?.destroy();
        proc.stderr?.destroy();
        finish(1);
      }, options.timeoutMs);
    }

    proc.stdout?.on('data', (data: Buffer) => {
      if (settled) return;
      const text = data.toString();
      stdout += text;
      output += text;
      options.onOutput?.('stdout', text);
    });

    proc.stderr?.on('data', (data: Buffer) => {
      if (settled) return;
      const text = data.toString();
      stderr += text;
      output += text;
      options.onOutput?.('stderr', text);
    });

    proc.on('close', (exitCode: number | null) => {
      finish(exitCode ?? 1);
    });

    proc.on('error', (error: Error) => {
      finish(1, error.message);
    });
  });
};
