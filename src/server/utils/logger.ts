import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for run context (query, run ID)
 */
export const runContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRunContext(): Record<string, unknown> {
  return runContext.getStore() || {};
}

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is pino.LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(isDevelopment: boolean, isTest: boolean): pino.LevelWithSilent {
  const requested = process.env.LOG_LEVEL;
  if (isLevel(requested)) {
    return requested;
  }
  if (isTest) return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const isTest = process.env.NODE_ENV === 'test';
  const isDevelopment = process.env.NODE_ENV !== 'production' && !isTest;
  const usePretty = isDevelopment && process.env.LOG_PRETTY !== 'false';
  const options: pino.LoggerOptions = {
    level: resolveLevel(isDevelopment, isTest),
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'deepsearch',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Run context (query, run ID) is attached at log time, so long-lived component loggers pick it up
    mixin: () => getRunContext(),
  };

  // Logs go to stderr so CLI output on stdout stays machine-readable
  if (usePretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
