/**
 * Retry Utility
 *
 * Centralized retry with a configurable delay policy. The pipeline favours bounded
 * latency, so callers use one retry with a fixed backoff; exponential backoff
 * stays available for adapters that want it.
 */

import { logger } from './logger.js';
import { errorMessage } from '../types/errors.js';

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Number of retries after the first attempt (default: 1) */
  maxRetries?: number;
  /** Delay before the first retry in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Backoff multiplier; 1 gives a fixed delay (default: 1) */
  multiplier?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Decide whether an error is worth another attempt (default: always) */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry with the failed attempt number (1-based) */
  onRetry?: (attempt: number, error: unknown) => void;
  sleep?: Sleep;
}

const DEFAULT_RETRY_CONFIG = {
  maxRetries: 1,
  initialDelay: 1000,
  multiplier: 1,
  maxDelay: 30000,
} as const;

function calculateDelay(retryIndex: number, initialDelay: number, multiplier: number, maxDelay: number): number {
  return Math.min(initialDelay * Math.pow(multiplier, retryIndex), maxDelay);
}

/**
 * Retry an operation
 *
 * @param operation - The operation to retry; receives the 1-based attempt number
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, URL)
 * @returns Result of the operation
 * @throws The last error if all retries are exhausted
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxRetries = DEFAULT_RETRY_CONFIG.maxRetries,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    isRetryable = () => true,
    onRetry,
    sleep = realSleep,
  } = config;

  const totalAttempts = maxRetries + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        logger.debug({ attempt, totalAttempts, context }, 'Operation succeeded after retry');
      }
      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryable(error) || attempt >= totalAttempts) {
        logger.debug(
          { attempt, totalAttempts, error: errorMessage(error), context },
          'Operation failed, not retrying'
        );
        throw error;
      }

      const delay = calculateDelay(attempt - 1, initialDelay, multiplier, maxDelay);
      logger.debug(
        { attempt, totalAttempts, delay, error: errorMessage(error), context },
        'Retrying operation'
      );
      onRetry?.(attempt, error);
      await sleep(delay);
    }
  }

  throw lastError instanceof Error ? lastError : new Error('Operation failed after retries');
}
