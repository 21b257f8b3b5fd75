/**
 * Git checkout types
 */

export interface GitConfig {
  /** Clone depth; 0 clones the full history */
  depth: number;
  /** Remote name used for fetches */
  remoteName: string;
}

export interface CheckoutRequest {
  /** Clone URL of the repository */
  repositoryUrl: string;
  /** Branch to fetch */
  branch: string;
  /** Commit to check out; the branch head when omitted */
  commit?: string;
  /** Pull request number; its head ref is fetched so commits from forks resolve */
  pullRequest?: number;
  /** Directory the repository is cloned into */
  workDir: string;
}

export interface CheckoutResult {
  success: boolean;
  path: string;
  /** Resolved HEAD after checkout */
  commit?: string;
  error?: string;
}

export const DEFAULT_GIT_CONFIG: GitConfig = {
  depth: 0,
  remoteName: 'origin',
};
