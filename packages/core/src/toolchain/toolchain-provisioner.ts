/**
 * Toolchain Provisioner
 * Installs a rustup toolchain channel and fingerprints the resolved compiler
 */

import { createHash } from 'node:crypto';
import { ProvisioningError, createChildLogger, type ToolchainInfo } from '@pipewright/shared';
import { runShellCommand, type CommandRunner } from '../pipeline/command-runner.js';

const CHANNEL_PATTERN = /^[A-Za-z0-9._-]+$/;
const FINGERPRINT_LENGTH = 16;

export interface ToolchainProvisionerOptions {
  runner?: CommandRunner;
  /** Directory the rustup and rustc commands run in */
  cwd?: string;
}

/**
 * Short stable hash of `rustc -vV` output
 */
export function computeFingerprint(versionOutput: string): string {
  return createHash('sha256').update(versionOutput.trim()).digest('hex').slice(0, FINGERPRINT_LENGTH);
}

export class ToolchainProvisioner {
  private readonly runner: CommandRunner;
  private readonly cwd: string;
  private logger = createChildLogger({ component: 'ToolchainProvisioner' });

  constructor(options: ToolchainProvisionerOptions = {}) {
    this.runner = options.runner ?? runShellCommand;
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Install (or verify) the channel and resolve its version and fingerprint.
   * Throws ProvisioningError when either command fails.
   */
  async provision(channel: string): Promise<ToolchainInfo> {
    if (!CHANNEL_PATTERN.test(channel)) {
      throw new ProvisioningError(channel, 'invalid channel name');
    }

    this.logger.info({ channel }, 'Provisioning toolchain');

    const install = await this.runner(
      `rustup toolchain install ${channel} --profile minimal --no-self-update`,
      { cwd: this.cwd }
    );
    if (install.exitCode !== 0) {
      throw new ProvisioningError(channel, this.describeFailure('rustup', install.exitCode, install.error ?? install.stderr));
    }

    const version = await this.runner(`rustc +${channel} -vV`, { cwd: this.cwd });
    if (version.exitCode !== 0) {
      throw new ProvisioningError(channel, this.describeFailure('rustc', version.exitCode, version.error ?? version.stderr));
    }

    const versionLine = version.stdout.trim().split('\n')[0]?.trim() ?? '';
    if (!versionLine) {
      throw new ProvisioningError(channel, 'rustc reported no version');
    }

    const info: ToolchainInfo = {
      channel,
      version: versionLine,
      fingerprint: computeFingerprint(version.stdout),
    };

    this.logger.info(info, 'Toolchain ready');
    return info;
  }

  private describeFailure(tool: string, exitCode: number, detail: string): string {
    const text = detail.trim();
    return text ? `${tool} exited with code ${exitCode}: ${text}` : `${tool} exited with code ${exitCode}`;
  }
}
