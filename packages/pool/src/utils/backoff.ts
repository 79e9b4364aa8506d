/**
 * Timing helpers for reconnect backoff and bounded waits.
 */

/**
 * Parameters of an exponential backoff schedule.
 */
export interface BackoffOptions {
  /** Delay before the first retry in milliseconds */
  baseDelayMs: number;
  /** Cap on any single delay in milliseconds */
  maxDelayMs: number;
  /** Fraction of the delay removed at random, 0 to 1 */
  jitter: number;
}

/**
 * Delay before retry number `attempt` (0-based):
 * `min(base * 2^attempt, max)`, reduced by up to `jitter` of itself.
 *
 * @example
 * ```typescript
 * computeBackoffDelay(3, { baseDelayMs: 500, maxDelayMs: 30000, jitter: 0 }); // 4000
 * ```
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const exponential = Math.min(options.baseDelayMs * Math.pow(2, attempt), options.maxDelayMs);
  return Math.round(exponential * (1 - options.jitter * random()));
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects; callers
 * check `signal.aborted` afterwards.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
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
 * Waits for `promise` for at most `ms`.
 *
 * @returns true if the promise settled in time; rejections propagate
 */
export async function settleWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
