/**
 * retryController.ts — Backoff/retry around a single-try call.
 *
 * The policy is a value, not hard-coded sleeps: tests pass a zero-delay
 * policy, production builds one from `EngineConfig.retry`.  The controller
 * works for anything shaped like an attempt (`status`, `reason`,
 * `attemptNumber`), which lets the Account Pipeline reuse it for logins.
 *
 * Exhausting the attempts returns the LAST outcome unchanged apart from its
 * attempt number; there is no separate "retries exhausted" reason.
 */

import type { RetrySettings } from '../core/config';
import type { OutcomeStatus } from '../core/types';

export type FailureClass = 'retryable' | 'terminal';

export interface RetryPolicy extends RetrySettings {
  classify: (reason: string) => FailureClass;
  /** [0, 1) source for jitter.  Defaults to Math.random. */
  random?: () => number;
  /** Defaults to a timer-based sleep that wakes early on abort. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface Attempt {
  status: OutcomeStatus;
  reason: string;
  attemptNumber: number;
}

const RETRYABLE_REASONS: ReadonlySet<string> = new Set([
  'network_error',
  'timeout',
  'network_unreachable',
  'service_unavailable',
]);

export function classifyReason(reason: string): FailureClass {
  return RETRYABLE_REASONS.has(reason) ? 'retryable' : 'terminal';
}

export function createRetryPolicy(
  settings: RetrySettings,
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  return { ...settings, classify: classifyReason, ...overrides };
}

/** No waiting at all; for tests and dry runs. */
export function zeroDelayPolicy(maxAttempts = 3): RetryPolicy {
  return createRetryPolicy(
    { maxAttempts, baseDelayMs: 0, multiplier: 1, jitterMs: 0, maxDelayMs: 0 },
    { sleep: async () => undefined },
  );
}

/**
 * Delay before attempt `attempt + 1`:
 *   min(base * multiplier^(attempt-1) + jitter, maxDelay)
 */
export function computeBackoff(policy: RetryPolicy, attempt: number): number {
  const random = policy.random ?? Math.random;
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const jitter = random() * policy.jitterMs;
  return Math.max(0, Math.min(exponential + jitter, policy.maxDelayMs));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Invoke `call` until it succeeds, fails terminally, or runs out of attempts.
 *
 * A cancellation observed during backoff stops retrying and returns the last
 * outcome; an attempt already in flight is always allowed to finish.
 */
export async function executeWithRetry<T extends Attempt>(
  call: (attemptNumber: number) => Promise<T>,
  policy: RetryPolicy,
  signal?: AbortSignal,
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const wait = policy.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    const outcome = { ...(await call(attempt)), attemptNumber: attempt };

    if (outcome.status !== 'failed' || policy.classify(outcome.reason) === 'terminal') {
      return outcome;
    }
    if (attempt >= maxAttempts) {
      return outcome;
    }

    await wait(computeBackoff(policy, attempt), signal);
    if (signal?.aborted) {
      return outcome;
    }
  }
}
