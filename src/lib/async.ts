export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  /** Errors for which this returns false are rethrown without another attempt. */
  retryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: Sleep;
}

/**
 * Runs `task` until it resolves, waiting `baseDelayMs * 2^(attempt - 1)`
 * between attempts. The last error is rethrown once attempts run out.
 */
export async function withRetry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelay = options.baseDelayMs ?? 1000;
  const wait = options.sleep ?? sleep;
  let attempt = 0;
  while (true) {
    attempt++;
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= attempts || (options.retryable && !options.retryable(error))) {
        throw error;
      }
      const delay = baseDelay * Math.pow(2, attempt - 1);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label = "Request"): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  const size = items.length;
  if (size === 0) return;
  let cursor = 0;
  const runners: Promise<void>[] = [];
  const limit = Math.max(1, concurrency);
  for (let i = 0; i < Math.min(limit, size); i++) {
    runners.push(
      (async function pump() {
        while (true) {
          const current = cursor++;
          if (current >= size) break;
          await worker(items[current], current);
        }
      })()
    );
  }
  await Promise.all(runners);
}

export function readConcurrency(name: string, fallback: number, max: number): number {
  const value = Number(process.env[name]);
  if (Number.isFinite(value) && value >= 1) return Math.min(Math.floor(value), max);
  return fallback;
}
