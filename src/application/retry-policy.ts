/**
 * Bounded retry with a fixed delay between attempts.
 *
 * Two call shapes are supported:
 *
 * - `retryAction` re-invokes a synchronous action on every attempt.
 * - `retryOperation` runs an asynchronous operation. A `repeatable`
 *   operation is started afresh for each attempt; a `singleShot` one wraps a
 *   promise that is already running, so it is awaited once and never retried.
 *
 * Cancellation is reported as an outcome, not as an error. When the attempt
 * budget is exhausted the last failure is rethrown unchanged.
 */

export interface RetryOptions {
  /** Fixed wait between attempts, in milliseconds. */
  delayMs: number;
  /** Total attempts, including the first one. */
  maxAttempts: number;
  signal?: AbortSignal | undefined;
  /** Called after a failed attempt that will be followed by another one. */
  onRetry?: ((err: unknown, attempt: number) => void) | undefined;
}

export type RetryOutcome<T> =
  | { readonly status: 'completed'; readonly value: T; readonly attempts: number }
  | { readonly status: 'cancelled'; readonly attempts: number };

export interface RepeatableOperation<T> {
  readonly repeatable: true;
  start(signal: AbortSignal): Promise<T>;
}

export interface SingleShotOperation<T> {
  readonly repeatable: false;
  readonly promise: Promise<T>;
}

export type AsyncOperation<T> = RepeatableOperation<T> | SingleShotOperation<T>;

export function repeatable<T>(start: (signal: AbortSignal) => Promise<T>): RepeatableOperation<T> {
  return { repeatable: true, start };
}

export function singleShot<T>(promise: Promise<T>): SingleShotOperation<T> {
  return { repeatable: false, promise };
}

/** Retries a synchronous action, invoking it fresh on each attempt. */
export async function retryAction<T>(
  action: () => T,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  return runAttempts<T>(async () => ({ cancelled: false, value: action() }), options, options.maxAttempts);
}

/** Retries an asynchronous operation when its shape allows another attempt. */
export async function retryOperation<T>(
  operation: AsyncOperation<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  if (!operation.repeatable) {
    return runAttempts<T>((signal) => untilAborted(operation.promise, signal), options, 1);
  }
  return runAttempts<T>((signal) => untilAborted(operation.start(signal), signal), options, options.maxAttempts);
}

type AttemptResult<T> = { readonly cancelled: true } | { readonly cancelled: false; readonly value: T };

async function runAttempts<T>(
  attempt: (signal: AbortSignal) => Promise<AttemptResult<T>>,
  options: RetryOptions,
  maxAttempts: number,
): Promise<RetryOutcome<T>> {
  const signal = options.signal ?? new AbortController().signal;
  let lastError: unknown;
  let attempts = 0;

  while (attempts < Math.max(1, maxAttempts)) {
    if (signal.aborted) return { status: 'cancelled', attempts };

    attempts++;
    try {
      const result = await attempt(signal);
      if (result.cancelled) return { status: 'cancelled', attempts };
      return { status: 'completed', value: result.value, attempts };
    } catch (err: unknown) {
      // An operation that fails because shutdown began is cancelled, not failed
      if (signal.aborted) return { status: 'cancelled', attempts };
      lastError = err;
    }

    if (attempts >= maxAttempts) break;

    options.onRetry?.(lastError, attempts);
    const waited = await sleep(options.delayMs, signal);
    if (!waited) return { status: 'cancelled', attempts };
  }

  throw lastError;
}

/** Settles with the operation's result, or as cancelled as soon as `signal` aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<AttemptResult<T>> {
  if (signal.aborted) {
    // The running promise may still reject later; nobody is waiting for it
    void promise.catch(() => undefined);
    return Promise.resolve({ cancelled: true });
  }

  return new Promise<AttemptResult<T>>((resolve, reject) => {
    const onAbort = (): void => {
      void promise.catch(() => undefined);
      resolve({ cancelled: true });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve({ cancelled: false, value });
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Waits `ms` milliseconds. Resolves `false` early if `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
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
}
