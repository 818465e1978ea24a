/**
 * Exponential backoff shared by the bus reconnect loop and the gateway
 * forwarder.
 *
 * Delay before retry `n` (n starting at 0) is
 * `min(baseDelayMs * multiplier^n, maxDelayMs)`, optionally shortened by up
 * to `jitter * delay`. `maxAttempts` bounds the total number of attempts;
 * leave it unset to retry until the signal aborts.
 */
export interface BackoffOptions {
  baseDelayMs: number;
  multiplier?: number;
  maxDelayMs?: number;
  maxAttempts?: number;
  /** 0..1 fraction of each delay that may be randomly removed. */
  jitter?: number;
}

export class BackoffPolicy {
  readonly baseDelayMs: number;
  readonly multiplier: number;
  readonly maxDelayMs: number;
  readonly maxAttempts: number;
  readonly jitter: number;

  constructor(options: BackoffOptions) {
    if (!(options.baseDelayMs >= 0)) {
      throw new RangeError('baseDelayMs must be a non-negative number');
    }
    this.baseDelayMs = options.baseDelayMs;
    this.multiplier = options.multiplier ?? 2;
    this.maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
    this.maxAttempts = options.maxAttempts ?? Number.POSITIVE_INFINITY;
    this.jitter = Math.min(Math.max(options.jitter ?? 0, 0), 1);
  }

  /** Delay to wait after failed attempt `attempt` (0-based). */
  delayFor(attempt: number): number {
    const raw = this.baseDelayMs * this.multiplier ** attempt;
    const capped = Math.min(raw, this.maxDelayMs);
    if (this.jitter === 0) return capped;
    return Math.round(capped * (1 - this.jitter * Math.random()));
  }

  /** True when another attempt is allowed after `attemptsMade` attempts. */
  canRetry(attemptsMade: number): boolean {
    return attemptsMade < this.maxAttempts;
  }
}

/** Resolves `true` after `ms`, or `false` as soon as `signal` aborts. */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/** What a single attempt reports back to the retry loop. */
export type AttemptOutcome<T, E> =
  | { readonly done: true; readonly value: T }
  | { readonly done: false; readonly retryable: boolean; readonly error: E };

export type RetryResult<T, E> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | {
      readonly ok: false;
      /** `fatal`: non-retryable error, `exhausted`: out of attempts, `aborted`: signal fired. */
      readonly reason: 'fatal' | 'exhausted' | 'aborted';
      readonly error: E | undefined;
      readonly attempts: number;
    };

export interface RetryOptions<E> {
  signal?: AbortSignal | undefined;
  sleep?: SleepFn | undefined;
  onRetry?: ((info: { attempt: number; delayMs: number; error: E }) => void) | undefined;
}

/**
 * Runs `attempt` until it succeeds, reports a non-retryable error, runs out
 * of attempts, or the signal aborts. The signal is checked before and after
 * every attempt and interrupts the sleep between attempts.
 */
export async function retryWithBackoff<T, E>(
  policy: BackoffPolicy,
  attempt: (attemptIndex: number) => Promise<AttemptOutcome<T, E>>,
  options: RetryOptions<E> = {},
): Promise<RetryResult<T, E>> {
  const wait = options.sleep ?? sleep;
  let lastError: E | undefined;

  for (let index = 0; ; index++) {
    if (options.signal?.aborted) {
      return { ok: false, reason: 'aborted', error: lastError, attempts: index };
    }

    const outcome = await attempt(index);
    const attempts = index + 1;

    if (outcome.done) {
      return { ok: true, value: outcome.value, attempts };
    }

    lastError = outcome.error;

    // An attempt cut short by the signal is a cancellation, whatever it reported.
    if (options.signal?.aborted) {
      return { ok: false, reason: 'aborted', error: lastError, attempts };
    }
    if (!outcome.retryable) {
      return { ok: false, reason: 'fatal', error: lastError, attempts };
    }
    if (!policy.canRetry(attempts)) {
      return { ok: false, reason: 'exhausted', error: lastError, attempts };
    }

    const delayMs = policy.delayFor(index);
    options.onRetry?.({ attempt: index, delayMs, error: outcome.error });

    const completed = await wait(delayMs, options.signal);
    if (!completed) {
      return { ok: false, reason: 'aborted', error: lastError, attempts };
    }
  }
}
