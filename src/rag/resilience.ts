import { isTransientError, TimeoutError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs`. The returned promise
 * rejects with a TimeoutError even if `fn` ignores the signal.
 */
export async function callWithTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  label: string;
  maxRetries: number;
  baseDelayMs: number;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Retries transient failures with exponential backoff; anything else is rethrown at once. */
export async function withRetry<T>(
  fn: () => Promise<T>,
  { label, maxRetries, baseDelayMs, logger }: RetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxRetries || !isTransientError(err)) throw err;
      const delay = baseDelayMs * 2 ** attempt;
      logger?.warn(
        `[${label}] attempt ${attempt + 1}/${maxRetries + 1} failed, retrying in ${delay}ms`,
        { error: describeError(err) },
      );
      await sleep(delay);
    }
  }
}
