import type { LoopControl } from '../config.js';
import { FatalProviderError, TransientProviderError, TurnInterruptedError } from '../errors.js';
import { sleep } from '../utils.js';

import { classifyProviderError } from './provider.js';

export type RetryPolicy = {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0..1, fraction of the delay randomized either way. */
  jitter: number;
  random?: () => number;
};

export type RetryInfo = {
  /** Attempt that just failed, 1-based. */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: TransientProviderError;
};

export function retryPolicyFrom(lc: LoopControl): RetryPolicy {
  return {
    maxAttempts: lc.max_retries_per_step,
    baseDelayMs: lc.retry_base_delay_ms,
    maxDelayMs: lc.retry_max_delay_ms,
    jitter: lc.retry_jitter,
  };
}

/** Exponential backoff capped at maxDelayMs; a server Retry-After wins when longer. */
export function backoffDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const exp = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
  const r = (policy.random ?? Math.random)();
  const jittered = exp * (1 + policy.jitter * (2 * r - 1));
  const delay = Math.max(0, Math.round(Math.min(jittered, policy.maxDelayMs)));
  if (retryAfterMs !== undefined) return Math.max(delay, Math.min(retryAfterMs, policy.maxDelayMs));
  return delay;
}

/**
 * Run `fn` until it succeeds, a fatal error shows up, or attempts run out.
 * The final failure is rethrown as TransientProviderError (exhausted) or
 * FatalProviderError. Only an abort of `opts.signal` surfaces as
 * TurnInterruptedError; a provider's own aborted request (a client-side
 * timeout) is a transient failure like any other.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: { signal?: AbortSignal; onRetry?: (info: RetryInfo) => void } = {}
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) throw new TurnInterruptedError();
    try {
      return await fn(attempt);
    } catch (e) {
      if (opts.signal?.aborted) throw new TurnInterruptedError();
      const err = classifyProviderError(e);
      if (err instanceof FatalProviderError) throw err;
      if (attempt >= maxAttempts) throw err;

      const delayMs = backoffDelay(policy, attempt, err.retryAfterMs);
      opts.onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await sleep(delayMs, opts.signal);
    }
  }
}
