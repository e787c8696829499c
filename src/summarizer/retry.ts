// pattern: functional-core
import { setTimeout as defaultSleep } from "node:timers/promises";
import type { RetryPolicy } from "../config";

export type RetryOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | { readonly ok: false; readonly error: unknown; readonly attempts: number };

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly isTransient: (err: unknown) => boolean;
  readonly signal?: AbortSignal;
  readonly onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Delay before the attempt following failed attempt number `attempt`
 * (1-based): base × factor^(attempt − 1), capped at maxDelayMs.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(policy.maxDelayMs, raw);
}

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await defaultSleep(ms, undefined, { signal });
}

/**
 * Runs `operation` until it succeeds, fails with a non-transient error, the
 * signal aborts, or `policy.maxAttempts` attempts have been made.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep ?? abortableSleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      const exhausted = attempt >= options.policy.maxAttempts;
      if (exhausted || options.signal?.aborted || !options.isTransient(err)) {
        return { ok: false, error: err, attempts: attempt };
      }

      const delayMs = backoffDelay(options.policy, attempt);
      options.onRetry?.({ attempt, delayMs, error: err });

      try {
        await sleep(delayMs, options.signal);
      } catch (sleepErr) {
        return { ok: false, error: sleepErr, attempts: attempt };
      }
    }
  }
}
