/**
 * Structured logging for Pipewright
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// Re-export pino's Logger type for convenience
export type Logger = PinoLogger;

export interface LogContext {
  runId?: string;
  component?: string;
  step?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Create base logger
function createBaseLogger(level: LogLevel = 'info') {
  return pino({
    level,
    transport:
      process.env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    base: {
      service: 'pipewright',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

// Singleton logger instance
let loggerInstance: PinoLogger | null = null;

export function getLogger(): PinoLogger {
  if (!loggerInstance) {
    const envLevel = process.env.LOG_LEVEL;
    loggerInstance = createBaseLogger(isLogLevel(envLevel) ? envLevel : 'info');
  }
  return loggerInstance;
}

// Create child logger with context
export function createChildLogger(context: LogContext): PinoLogger {
  return getLogger().child(context);
}

// Convenience function to create a named logger
export function createLogger(name: string): PinoLogger {
  return createChildLogger({ component: name });
}

// Structured event logging for pipeline state changes
export function logStateTransition(
  runId: string,
  fromState: string,
  toState: string,
  reason: string
): void {
  getLogger().info(
    {
      event: 'state_transition',
      runId,
      fromState,
      toState,
      reason,
    },
    `Pipeline state: ${fromState} -> ${toState}`
  );
}

export function logStepCompletion(
  runId: string,
  step: string,
  exitCode: number,
  durationMs: number
): void {
  getLogger().info(
    {
      event: 'step_completed',
      runId,
      step,
      exitCode,
      durationMs,
    },
    `Step ${step} exited with ${exitCode} after ${durationMs}ms`
  );
}
