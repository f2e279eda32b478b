import { MAX_ATTEMPTS, BASE_RETRY_DELAY_MS } from '../constants.js';
import { toProjectFieldsError, type ProjectFieldsError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { fail, ok, type Result } from './result.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: MAX_ATTEMPTS,
  baseDelayMs: BASE_RETRY_DELAY_MS,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (1-based): base, 2*base, 4*base, ...
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(2, attempt - 1);
}

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or the policy
 * runs out of attempts. Never throws.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  options: { policy?: RetryPolicy; sleep?: Sleep; logger?: Logger } = {},
): Promise<Result<T>> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? sleep;
  const log = options.logger ?? defaultLogger;

  let lastError: ProjectFieldsError | undefined;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return ok(await fn());
    } catch (err) {
      lastError = toProjectFieldsError(err);
      if (!lastError.retryable) {
        return fail(lastError);
      }
      if (attempt < policy.maxAttempts) {
        const delay = backoffDelay(policy, attempt);
        log.warn(`${label} failed (attempt ${attempt}/${policy.maxAttempts}), retrying in ${delay}ms...`);
        await wait(delay);
      }
    }
  }
  log.debug(`${label} failed after ${policy.maxAttempts} attempts`);
  return fail(lastError ?? toProjectFieldsError(new Error(`${label}: no attempts made`)));
}
