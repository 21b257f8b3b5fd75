/**
 * Checkout Service Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CheckoutService } from './checkout-service.js';
import type { LocalGitClient } from './client/local-git-client.js';

const createMockClient = () => ({
  isGitRepo: vi.fn().mockResolvedValue(false),
  clone: vi.fn().mockResolvedValue(undefined),
  fetch: vi.fn().mockResolvedValue(undefined),
  checkout: vi.fn().mockResolvedValue(undefined),
  head: vi.fn().mockResolvedValue('abc123def456'),
});

describe('CheckoutService', () => {
  let client: ReturnType<typeof createMockClient>;
  let service: CheckoutService;

  beforeEach(() => {
    client = createMockClient();
    service = new CheckoutService({ client: client as unknown as LocalGitClient });
  });

  it('should clone and check out the requested commit into an empty workspace', async () => {
    const result = await service.checkout({
      repositoryUrl: 'https://example.test/acme/widget.git',
      branch: 'master',
      commit: 'abc123def456',
      workDir: '/tmp/work/run-1',
    });

    expect(client.clone).toHaveBeenCalledWith(
      'https://example.test/acme/widget.git',
      '/tmp/work/run-1',
      'master'
    );
    expect(client.fetch).not.toHaveBeenCalled();
    expect(client.checkout).toHaveBeenCalledWith('/tmp/work/run-1', 'abc123def456');
    expect(result).toEqual({ success: true, path: '/tmp/work/run-1', commit: 'abc123def456' });
  });

  it('should stay on the cloned branch head when no commit is given', async () => {
    await service.checkout({
      repositoryUrl: 'https://example.test/acme/widget.git',
      branch: 'master',
      workDir: '/tmp/work/run-2',
    });

    expect(client.checkout).not.toHaveBeenCalled();
  });

  it('should fetch instead of cloning when the workspace is already a repository', async () => {
    client.isGitRepo.mockResolvedValue(true);

    await service.checkout({
      repositoryUrl: 'https://example.test/acme/widget.git',
      branch: 'master',
      workDir: '/tmp/work/run-3',
    });

    expect(client.clone).not.toHaveBeenCalled();
    expect(client.fetch).toHaveBeenCalledWith('/tmp/work/run-3', 'master');
    expect(client.checkout).toHaveBeenCalledWith('/tmp/work/run-3', 'FETCH_HEAD');
  });

  it('should fetch the pull request head before checking out its commit', async () => {
    const result = await service.checkout({
      repositoryUrl: 'https://example.test/acme/widget.git',
      branch: 'master',
      commit: 'f0f0f0f0',
      pullRequest: 42,
      workDir: '/tmp/work/run-5',
    });

    expect(client.clone).toHaveBeenCalledWith('https://example.test/acme/widget.git', '/tmp/work/run-5', 'master');
    expect(client.fetch).toHaveBeenCalledWith('/tmp/work/run-5', 'pull/42/head');
    expect(client.fetch.mock.invocationCallOrder[0]).toBeLessThan(client.checkout.mock.invocationCallOrder[0] ?? 0);
    expect(client.checkout).toHaveBeenCalledWith('/tmp/work/run-5', 'f0f0f0f0');
    expect(result.success).toBe(true);
  });

  it('should check out the fetched pull request head when no commit is given', async () => {
    await service.checkout({
      repositoryUrl: 'https://example.test/acme/widget.git',
      branch: 'master',
      pullRequest: 7,
      workDir: '/tmp/work/run-6',
    });

    expect(client.fetch).toHaveBeenCalledWith('/tmp/work/run-6', 'pull/7/head');
    expect(client.checkout).toHaveBeenCalledWith('/tmp/work/run-6', 'FETCH_HEAD');
  });

  it('should report failure instead of throwing when git fails', async () => {
    client.clone.mockRejectedValue(new Error('repository not found'));

    const result = await service.checkout({
      repositoryUrl: 'https://example.test/acme/missing.git',
      branch: 'master',
      workDir: '/tmp/work/run-4',
    });

    expect(result).toEqual({
      success: false,
      path: '/tmp/work/run-4',
      error: 'repository not found',
    });
  });
});
