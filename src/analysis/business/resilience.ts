import { TimeoutError, isTransientError } from "../domain/errors";

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs`.
 * The returned promise rejects with TimeoutError at the deadline even if
 * `fn` ignores the signal.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs)
      );
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  retries: number;
  backoffMs: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Retries transient failures with exponential backoff (backoffMs, 2x, 4x...).
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  {
    retries,
    backoffMs,
    shouldRetry = isTransientError,
    onRetry,
  }: RetryOptions
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= retries || !shouldRetry(err)) throw err;
      const delayMs = backoffMs * 2 ** attempt;
      onRetry?.(err, attempt + 1, delayMs);
      if (delayMs > 0) await sleep(delayMs);
    }
  }
}

/**
 * Maps `items` through `worker` in batches of `limit`, settling every call.
 * Results keep input order regardless of completion order.
 */
export async function settleInBatches<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const size = Math.max(1, Math.floor(limit));
  const results: PromiseSettledResult<R>[] = [];
  for (let i = 0; i < items.length; i += size) {
    const batch = items.slice(i, i + size);
    const settled = await Promise.allSettled(
      batch.map((item, offset) => worker(item, i + offset))
    );
    results.push(...settled);
  }
  return results;
}
