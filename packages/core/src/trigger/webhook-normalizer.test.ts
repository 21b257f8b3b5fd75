/**
 * Webhook Normalizer Tests
 */
import { describe, it, expect } from 'vitest';
import { ValidationError } from '@pipewright/shared';
import { normalizeGitHubEvent } from './webhook-normalizer.js';

const receivedAt = new Date('2026-01-01T00:00:00Z');

const repository = {
  full_name: 'acme/widget',
  clone_url: 'https://example.test/acme/widget.git',
};

describe('normalizeGitHubEvent', () => {
  describe('push', () => {
    it('should strip refs/heads/ and keep the pushed commit', () => {
      const result = normalizeGitHubEvent(
        'push',
        { ref: 'refs/heads/master', after: 'abc123', repository },
        receivedAt
      );

      expect(result).toEqual({
        event: {
          kind: 'push',
          branch: 'master',
          commit: 'abc123',
          repository: 'acme/widget',
          repositoryUrl: 'https://example.test/acme/widget.git',
          receivedAt,
        },
      });
    });

    it('should keep slashes in branch names', () => {
      const result = normalizeGitHubEvent('push', { ref: 'refs/heads/feature/x' }, receivedAt);
      expect(result.event?.branch).toBe('feature/x');
    });

    it('should ignore tag pushes', () => {
      const result = normalizeGitHubEvent('push', { ref: 'refs/tags/v1.0.0' }, receivedAt);
      expect(result).toEqual({ ignored: "ref 'refs/tags/v1.0.0' is not a branch" });
    });

    it('should ignore branch deletions', () => {
      const result = normalizeGitHubEvent(
        'push',
        { ref: 'refs/heads/master', deleted: true },
        receivedAt
      );
      expect(result).toEqual({ ignored: "branch deletion for 'refs/heads/master'" });
    });

    it('should reject a payload without a ref', () => {
      expect(() => normalizeGitHubEvent('push', { after: 'abc123' })).toThrow(ValidationError);
    });
  });

  describe('pull_request', () => {
    const payload = (action: string) => ({
      action,
      number: 42,
      pull_request: { base: { ref: 'master' }, head: { sha: 'def456' } },
      repository,
    });

    it('should use the base branch and the head commit', () => {
      const result = normalizeGitHubEvent('pull_request', payload('opened'), receivedAt);

      expect(result).toEqual({
        event: {
          kind: 'pull_request',
          branch: 'master',
          commit: 'def456',
          pullRequest: 42,
          repository: 'acme/widget',
          repositoryUrl: 'https://example.test/acme/widget.git',
          receivedAt,
        },
      });
    });

    it.each(['synchronize', 'reopened'])('should accept the %s action', (action) => {
      expect(normalizeGitHubEvent('pull_request', payload(action)).event).toBeDefined();
    });

    it('should ignore actions that do not change code', () => {
      expect(normalizeGitHubEvent('pull_request', payload('labeled'))).toEqual({
        ignored: "pull_request action 'labeled' does not update code",
      });
    });

    it('should reject a payload without a base branch', () => {
      expect(() =>
        normalizeGitHubEvent('pull_request', {
          action: 'opened',
          number: 1,
          pull_request: { head: { sha: 'def456' } },
        })
      ).toThrow(/Malformed pull_request payload/);
    });
  });

  it('should ignore unrelated events', () => {
    expect(normalizeGitHubEvent('ping', { zen: 'Keep it simple' })).toEqual({
      ignored: "event 'ping' is not a trigger",
    });
  });
});
