/**
 * Seat Pack Reconciler - Retry With Backoff
 * =========================================
 * Bounded exponential backoff used for optimistic-lock conflicts
 */

import { log } from './log';

// ================================================
// RETRY CONFIGURATION
// ================================================

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 100,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
};

export interface RetryOptions {
  config?: RetryConfig;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function computeBackoffDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  return Math.min(config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt), config.maxDelayMs);
}

// ================================================
// RETRY LOOP
// ================================================

/**
 * Run `operation`, retrying errors accepted by `shouldRetry` up to
 * `maxRetries` extra times. Anything else is rethrown immediately.
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  context: string,
  options: RetryOptions = {}
): Promise<T> {
  const config = options.config ?? DEFAULT_RETRY_CONFIG;
  const shouldRetry = options.shouldRetry ?? (() => true);
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await operation();
      if (attempt > 0) {
        log.debug(`✅ ${context} succeeded on attempt ${attempt + 1}`);
      }
      return result;
    } catch (error) {
      if (attempt >= config.maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, config);
      log.warn(`⚠️ ${context} failed (attempt ${attempt + 1}), retrying in ${delay}ms...`);
      await wait(delay);
    }
  }
}
