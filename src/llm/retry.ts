import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

export class RateLimitedError extends Error {
  constructor(
    message: string,
    readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'RateLimitedError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry `fn` while it fails with a rate limit, backing off linearly
 * unless the provider named a wait. Other errors pass straight through.
 */
export async function withRateLimitRetry<T>(
  label: string,
  fn: () => Promise<T>,
  isRateLimited: (err: unknown) => boolean,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < LIMITS.MAX_LLM_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimited(err)) throw err;
      lastError = err;

      if (attempt === LIMITS.MAX_LLM_RETRIES - 1) break;

      const waitMs = err instanceof RateLimitedError && err.retryAfterMs !== undefined
        ? err.retryAfterMs
        : (attempt + 1) * TIMEOUTS.RATE_LIMIT_WAIT;
      log.warn(`${label} rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await sleep(waitMs);
    }
  }

  const message = lastError instanceof Error ? lastError.message : String(lastError);
  throw new Error(`${label}: still rate limited after ${String(LIMITS.MAX_LLM_RETRIES)} attempts (${message})`);
}
