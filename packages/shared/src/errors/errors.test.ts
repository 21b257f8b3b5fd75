/**
 * Error Hierarchy Tests
 */
import { describe, it, expect } from 'vitest';
import {
  CacheError,
  ConfigurationError,
  DeltaError,
  InvalidTransitionError,
  PipewrightError,
  ProvisioningError,
  StateMachineError,
  isRetryableError,
  wrapError,
} from './index.js';

describe('errors', () => {
  it('should carry a code and category', () => {
    const error = new ProvisioningError('nightly', 'rustup exited with code 1');

    expect(error.message).toBe("Failed to provision toolchain 'nightly': rustup exited with code 1");
    expect(error.code).toBe('E2001');
    expect(error.channel).toBe('nightly');
    expect(error.context).toMatchObject({ category: 'PROVISIONING', severity: 'HIGH', retryable: false });
    expect(error).toBeInstanceOf(PipewrightError);
  });

  it('should name both states of an invalid transition', () => {
    const error = new InvalidTransitionError('BUILDING', 'SUCCEEDED');

    expect(error.message).toBe('Invalid state transition: BUILDING -> SUCCEEDED');
    expect(error.code).toBe('E5001');
    expect(error).toBeInstanceOf(StateMachineError);
  });

  it('should mark cache errors retryable', () => {
    expect(isRetryableError(new CacheError('Linux-t1', 'disk full'))).toBe(true);
    expect(isRetryableError(new Error('disk full'))).toBe(false);
  });

  it('should join configuration issues into the message', () => {
    const error = new ConfigurationError(['cache.store: Invalid enum value', 'server.port: Expected number']);

    expect(error.message).toBe('Invalid configuration: cache.store: Invalid enum value; server.port: Expected number');
    expect(error.context.severity).toBe('CRITICAL');
  });

  it('should record which delta operation failed', () => {
    const error = new DeltaError('apply', 'Invalid magic number');

    expect(error.operation).toBe('apply');
    expect(error.code).toBe('E7001');
    expect(error.context.category).toBe('DELTA');
  });

  it('should serialize to JSON', () => {
    const json = new CacheError('Linux-t1', 'disk full').toJSON();

    expect(json).toMatchObject({ name: 'CacheError', code: 'E3001', message: 'disk full' });
    expect(typeof json.timestamp).toBe('string');
  });

  describe('wrapError', () => {
    it('should pass Pipewright errors through', () => {
      const error = new CacheError('Linux-t1', 'disk full');
      expect(wrapError(error)).toBe(error);
    });

    it('should wrap plain errors with the original name', () => {
      const wrapped = wrapError(new TypeError('bad input'), { runId: 'run-1' });

      expect(wrapped.code).toBe('E9999');
      expect(wrapped.message).toBe('bad input');
      expect(wrapped.context).toMatchObject({ originalError: 'TypeError', runId: 'run-1' });
    });

    it('should wrap non-error values', () => {
      expect(wrapError('boom').message).toBe('boom');
    });
  });
});
