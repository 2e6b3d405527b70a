import { OperationAbortedError, handleUnknownError, isTransientProviderError } from '../errors/index';
import { warn } from '../output/logger';

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay in ms before retry number `attempt` (1-based). */
  backoff: (attempt: number) => number;
  retryable: (e: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoff: (attempt) => Math.min(2000 * Math.pow(2, attempt - 1), 16000),
  retryable: isTransientProviderError,
};

export interface RetryOptions {
  label?: string;
  signal?: AbortSignal;
  /** Injected for tests. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Resolves after `ms`, or early once the signal fires. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation`, retrying failures the policy marks retryable with
 * backoff between attempts. Non-retryable failures and the last attempt's
 * failure are rethrown as-is. An aborted signal stops further attempts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  options: RetryOptions = {}
): Promise<T> {
  const { maxAttempts, backoff, retryable } = { ...DEFAULT_RETRY_POLICY, ...policy };
  const label = options.label ?? 'operation';
  const sleep = options.sleep ?? abortableSleep;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) throw new OperationAbortedError(label);
    try {
      return await operation(attempt);
    } catch (e: unknown) {
      if (options.signal?.aborted) throw new OperationAbortedError(label);
      if (attempt >= maxAttempts || !retryable(e)) throw e;

      const delay = backoff(attempt);
      const err = handleUnknownError(e, label);
      warn(`[memoforge] ${label} attempt ${attempt} failed (${err.message}), retrying in ${delay}ms...`);
      await sleep(delay, options.signal);
    }
  }
}
