/**
 * Retry with exponential backoff.
 *
 * Attempt n (1-based) that fails waits baseDelayMs * 2^(n-1) before the next
 * one. A result rejected by `validate` counts as a failure.
 */

export type RetryOptions<T> = {
  maxAttempts: number;
  baseDelayMs: number;
  validate?: (value: T) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: string }) => void;
};

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: string; attempts: number };

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>,
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError = "no attempts made";

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const value = await operation(attempt);
      if (!options.validate || options.validate(value)) {
        return { ok: true, value, attempts: attempt };
      }
      lastError = "result rejected by validation";
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
    }

    if (attempt < maxAttempts) {
      const delayMs = backoffDelay(attempt, options.baseDelayMs);
      options.onRetry?.({ attempt, delayMs, error: lastError });
      await sleep(delayMs);
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
