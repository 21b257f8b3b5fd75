/**
 * Custom error hierarchy for Pipewright
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'PROVISIONING'
  | 'CACHE'
  | 'STATE_MACHINE'
  | 'CONFIGURATION'
  | 'DELTA'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  runId?: string;
  state?: string;
  [key: string]: unknown;
}

/**
 * Base error class for Pipewright
 */
export class PipewrightError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'PipewrightError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (webhook payloads, workflow files)
 */
export class ValidationError extends PipewrightError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Toolchain provisioning failed; the run aborts before any step
 */
export class ProvisioningError extends PipewrightError {
  public readonly channel: string;

  constructor(channel: string, reason: string, context: Partial<ErrorContext> = {}) {
    super(`Failed to provision toolchain '${channel}': ${reason}`, 'E2001', {
      category: 'PROVISIONING',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'ProvisioningError';
    this.channel = channel;
  }
}

/**
 * Cache store errors. Never fatal to a run.
 */
export class CacheError extends PipewrightError {
  public readonly key: string;

  constructor(key: string, message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'CACHE',
      severity: 'LOW',
      retryable: true,
      ...context,
    });
    this.name = 'CacheError';
    this.key = key;
  }
}

/**
 * State machine errors
 */
export class StateMachineError extends PipewrightError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'STATE_MACHINE',
      severity: 'HIGH',
      retryable: false,
      ...context,
    });
    this.name = 'StateMachineError';
  }
}

export class InvalidTransitionError extends StateMachineError {
  constructor(fromState: string, toState: string, context: Partial<ErrorContext> = {}) {
    super(`Invalid state transition: ${fromState} -> ${toState}`, 'E5001', {
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends PipewrightError {
  /** One `path: message` entry per invalid setting */
  public readonly issues: string[];

  constructor(issues: string[], context: Partial<ErrorContext> = {}) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'E6001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      retryable: false,
      ...context,
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Delta patch generation or application failed
 */
export class DeltaError extends PipewrightError {
  public readonly operation: 'generate' | 'apply';

  constructor(operation: 'generate' | 'apply', message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E7001', {
      category: 'DELTA',
      severity: 'MEDIUM',
      retryable: false,
      ...context,
    });
    this.name = 'DeltaError';
    this.operation = operation;
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof PipewrightError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): PipewrightError {
  if (error instanceof PipewrightError) {
    return error;
  }

  if (error instanceof Error) {
    return new PipewrightError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new PipewrightError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
