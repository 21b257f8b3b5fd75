/**
 * Checkout Service
 * Prepares a run workspace from a repository event
 */

import { createLogger, type Logger } from '@pipewright/shared';
import { LocalGitClient } from './client/local-git-client.js';
import { type GitConfig, type CheckoutRequest, type CheckoutResult, DEFAULT_GIT_CONFIG } from './types.js';

export interface CheckoutServiceOptions {
  config?: Partial<GitConfig>;
  logger?: Logger;
  client?: LocalGitClient;
}

export class CheckoutService {
  private readonly logger: Logger;
  private readonly localGit: LocalGitClient;

  constructor(options: CheckoutServiceOptions = {}) {
    const config = { ...DEFAULT_GIT_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('CheckoutService');
    this.localGit = options.client ?? new LocalGitClient({ config, logger: this.logger });
  }

  /**
   * Clone the repository into the workspace and check out the requested commit.
   * Reuses an existing clone in the same directory.
   */
  async checkout(request: CheckoutRequest): Promise<CheckoutResult> {
    const { repositoryUrl, branch, commit, pullRequest, workDir } = request;

    this.logger.info({ repositoryUrl, branch, commit, pullRequest, workDir }, 'Checking out workspace');

    try {
      const isRepo = await this.localGit.isGitRepo(workDir);
      if (isRepo) {
        await this.localGit.fetch(workDir, branch);
      } else {
        await this.localGit.clone(repositoryUrl, workDir, branch);
      }

      // Pull request commits may live only in a fork; the base repository
      // publishes them under pull/<n>/head
      if (pullRequest !== undefined) {
        await this.localGit.fetch(workDir, `pull/${pullRequest}/head`);
      }

      // A fresh clone already sits on the branch head
      const fetched = isRepo || pullRequest !== undefined;
      const target = commit ?? (fetched ? 'FETCH_HEAD' : undefined);
      if (target) {
        await this.localGit.checkout(workDir, target);
      }

      const head = await this.localGit.head(workDir);
      return { success: true, path: workDir, commit: head };
    } catch (error: unknown) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown checkout error';
      this.logger.error({ error: errorMessage, workDir }, 'Checkout failed');
      return { success: false, path: workDir, error: errorMessage };
    }
  }
}
