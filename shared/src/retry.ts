/**
 * Retry helpers for calls to external services
 */

import { DEFAULT_RETRY_CONFIG, type RetryConfig } from './types.js';
import { createLogger, type Logger } from './logger.js';

export interface RetryOptions extends Partial<RetryConfig> {
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: Error) => boolean;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Receives the retry warnings; defaults to a `retry` logger at LOG_LEVEL */
  logger?: Logger;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, config: RetryConfig): number {
  return Math.min(
    config.baseDelay * Math.pow(config.backoffMultiplier, attempt),
    config.maxDelay
  );
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config: RetryConfig = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelay: options.baseDelay ?? DEFAULT_RETRY_CONFIG.baseDelay,
    maxDelay: options.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY_CONFIG.backoffMultiplier,
  };
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? createLogger('retry');

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === config.maxRetries || (options.shouldRetry && !options.shouldRetry(lastError))) {
        break;
      }

      const delay = backoffDelay(attempt, config);

      logger.warn(`Retry attempt ${attempt + 1}/${config.maxRetries}`, {
        error: lastError.message,
        nextRetryIn: delay,
      });

      await sleep(delay);
    }
  }

  throw lastError ?? new Error('Retry loop exited without a result');
}
