import type { ReachabilityPolicy } from '../config/schema.js';
import { UnreachableError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_REACHABILITY: ReachabilityPolicy = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 5000,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: ReachabilityPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

/**
 * Run a connectivity check, retrying only UnreachableError with exponential
 * backoff. Never wrap a mutating command in this.
 */
export async function withReachabilityRetry<T>(
  host: string,
  check: () => Promise<T>,
  policy: ReachabilityPolicy = DEFAULT_REACHABILITY,
  wait: Sleep = sleep
): Promise<T> {
  let lastError: UnreachableError | null = null;

  for (let attempt = 0; attempt < policy.attempts; attempt++) {
    try {
      return await check();
    } catch (err) {
      if (!(err instanceof UnreachableError)) {
        throw err;
      }
      lastError = err;
      if (attempt + 1 >= policy.attempts) {
        break;
      }

      const delayMs = backoffDelay(policy, attempt);
      logger.warn('Host unreachable, retrying connectivity check', {
        host,
        attempt: attempt + 1,
        attempts: policy.attempts,
        delayMs,
        error: err.message,
      });
      await wait(delayMs);
    }
  }

  if (lastError) {
    throw lastError;
  }
  throw new UnreachableError(host, 'no connectivity check attempts configured');
}
