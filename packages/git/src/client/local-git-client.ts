/**
 * Local Git Client
 * Handles local git operations using simple-git
 */

import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger, type Logger } from '@pipewright/shared';
import { type GitConfig, DEFAULT_GIT_CONFIG } from '../types.js';

export interface LocalGitClientOptions {
  config?: Partial<GitConfig>;
  logger?: Logger;
}

export class LocalGitClient {
  private readonly config: GitConfig;
  private readonly logger: Logger;

  constructor(options: LocalGitClientOptions = {}) {
    this.config = { ...DEFAULT_GIT_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('LocalGitClient');
  }

  /**
   * Get a simple-git instance for a repository path
   */
  private getGit(repoPath: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir: repoPath,
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: true,
    };
    return simpleGit(options);
  }

  /**
   * Check if a directory is a git repository
   */
  async isGitRepo(path: string): Promise<boolean> {
    try {
      return await this.getGit(path).checkIsRepo();
    } catch {
      return false;
    }
  }

  /**
   * Clone a remote repository
   */
  async clone(remoteUrl: string, localPath: string, branch?: string): Promise<void> {
    this.logger.info({ remoteUrl, localPath, branch }, 'Cloning repository');

    // Ensure parent directory exists
    await mkdir(dirname(localPath), { recursive: true });

    const cloneArgs: string[] = [];
    if (this.config.depth > 0) cloneArgs.push('--depth', String(this.config.depth));
    if (branch) cloneArgs.push('--branch', branch);

    await simpleGit().clone(remoteUrl, localPath, cloneArgs);

    this.logger.info({ localPath }, 'Repository cloned');
  }

  /**
   * Fetch a single ref from the remote
   */
  async fetch(repoPath: string, ref: string): Promise<void> {
    await this.getGit(repoPath).fetch(this.config.remoteName, ref);
  }

  /**
   * Checkout a branch or commit
   */
  async checkout(repoPath: string, target: string): Promise<void> {
    await this.getGit(repoPath).checkout(target);
    this.logger.info({ repoPath, target }, 'Checked out');
  }

  /**
   * Resolve HEAD to a commit hash
   */
  async head(repoPath: string): Promise<string> {
    return this.getGit(repoPath).revparse(['HEAD']);
  }
}
