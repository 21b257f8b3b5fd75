/**
 * Toolchain Provisioner Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { ProvisioningError } from '@pipewright/shared';
import { ToolchainProvisioner, computeFingerprint } from './toolchain-provisioner.js';
import type { CommandOptions, CommandResult } from '../pipeline/command-runner.js';

const RUSTC_OUTPUT = [
  'rustc 1.80.0 (051478957 2024-07-21)',
  'binary: rustc',
  'commit-hash: 051478957371ee0084a7c0913941d2a8c4757bb9',
  'host: x86_64-unknown-linux-gnu',
  'release: 1.80.0',
  '',
].join('\n');

const result = (overrides: Partial<CommandResult> = {}): CommandResult => ({
  exitCode: 0,
  stdout: '',
  stderr: '',
  output: '',
  durationMs: 5,
  timedOut: false,
  ...overrides,
});

const createRunner = (rustc: Partial<CommandResult> = { stdout: RUSTC_OUTPUT }) =>
  vi.fn(async (command: string, _options: CommandOptions) =>
    command.startsWith('rustc') ? result(rustc) : result()
  );

describe('computeFingerprint', () => {
  it('should return 16 hex characters', () => {
    expect(computeFingerprint(RUSTC_OUTPUT)).toMatch(/^[0-9a-f]{16}$/);
  });

  it('should ignore surrounding whitespace', () => {
    expect(computeFingerprint(`${RUSTC_OUTPUT}\n\n`)).toBe(computeFingerprint(RUSTC_OUTPUT.trim()));
  });

  it('should change when the version changes', () => {
    const newer = RUSTC_OUTPUT.replace(/1\.80\.0/g, '1.81.0');
    expect(computeFingerprint(newer)).not.toBe(computeFingerprint(RUSTC_OUTPUT));
  });
});

describe('ToolchainProvisioner', () => {
  it('should install the channel and fingerprint the compiler', async () => {
    const runner = createRunner();
    const provisioner = new ToolchainProvisioner({ runner, cwd: '/tmp/work' });

    const info = await provisioner.provision('stable');

    expect(runner).toHaveBeenNthCalledWith(
      1,
      'rustup toolchain install stable --profile minimal --no-self-update',
      { cwd: '/tmp/work' }
    );
    expect(runner).toHaveBeenNthCalledWith(2, 'rustc +stable -vV', { cwd: '/tmp/work' });
    expect(info).toEqual({
      channel: 'stable',
      version: 'rustc 1.80.0 (051478957 2024-07-21)',
      fingerprint: computeFingerprint(RUSTC_OUTPUT),
    });
  });

  it('should fail when rustup exits non-zero', async () => {
    const runner = vi.fn(async (_command: string, _options: CommandOptions) =>
      result({ exitCode: 1, stderr: "error: invalid toolchain name: 'nightly-bogus'\n" })
    );
    const provisioner = new ToolchainProvisioner({ runner });

    await expect(provisioner.provision('nightly-bogus')).rejects.toThrow(
      "Failed to provision toolchain 'nightly-bogus': rustup exited with code 1: error: invalid toolchain name: 'nightly-bogus'"
    );
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it('should fail when rustc cannot be started', async () => {
    const runner = createRunner({ exitCode: 1, error: 'spawn ENOENT' });
    const provisioner = new ToolchainProvisioner({ runner });

    await expect(provisioner.provision('stable')).rejects.toThrow(
      "Failed to provision toolchain 'stable': rustc exited with code 1: spawn ENOENT"
    );
  });

  it('should fail when rustc prints nothing', async () => {
    const provisioner = new ToolchainProvisioner({ runner: createRunner({ stdout: '' }) });

    await expect(provisioner.provision('stable')).rejects.toThrow(ProvisioningError);
  });

  it('should reject channel names that are not plain identifiers', async () => {
    const runner = createRunner();
    const provisioner = new ToolchainProvisioner({ runner });

    await expect(provisioner.provision('stable; rm -rf /')).rejects.toThrow(
      "Failed to provision toolchain 'stable; rm -rf /': invalid channel name"
    );
    expect(runner).not.toHaveBeenCalled();
  });
});
