import { ProviderError, describeError } from "../shared/errors";
import { sleep as defaultSleep } from "../shared/sleep";
import { RetryOptions } from "./types";

export const BACKOFF_CAP_MS = 30_000;

export function computeBackoffMs(attempt: number, baseDelayMs: number): number {
  const normalizedAttempt = Number.isFinite(attempt) ? Math.max(1, Math.floor(attempt)) : 1;
  return Math.min(BACKOFF_CAP_MS, baseDelayMs * 2 ** (normalizedAttempt - 1));
}

function isRetryable(error: unknown): boolean {
  if (error instanceof ProviderError) return error.retryable;
  // network failures from fetch surface as plain errors
  return true;
}

/**
 * Runs `operation` and retries retryable failures up to `maxRetries` extra times.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  label: string,
  operation: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation();
    } catch (error) {
      if (attempt > options.maxRetries || !isRetryable(error)) {
        throw error;
      }
      const delay = computeBackoffMs(attempt, options.baseDelayMs);
      console.warn(
        `${label} failed (attempt ${attempt}/${options.maxRetries + 1}), retrying in ${delay}ms: ${describeError(error)}`
      );
      await sleep(delay);
    }
  }
}
