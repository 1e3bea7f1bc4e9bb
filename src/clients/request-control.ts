export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RequestTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Runs `operation` with an abort signal that fires after `timeoutMs`.
 * An abort caused by the timer surfaces as {@link RequestTimeoutError}.
 */
export async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await operation(controller.signal);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutHandle);
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  shouldRetry: (error: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (details: { attempt: number; delayMs: number; error: unknown }) => void;
}

export const backoffDelayMs = (baseDelayMs: number, attempt: number): number =>
  baseDelayMs * 2 ** Math.max(0, attempt - 1);

export async function withRetries<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? delay;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelayMs(options.baseDelayMs, attempt);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
}

export const readErrorStatus = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  return typeof error.status === "number" ? error.status : undefined;
};

const collectErrorText = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error ?? "");
  }
  const parts = [error.name, error.message];
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    parts.push(cause.name, cause.message);
  } else if (cause !== undefined) {
    parts.push(String(cause));
  }
  return parts.filter(Boolean).join(" | ");
};

/**
 * Transient provider failures: timeouts, connection errors, 408, 429 and 5xx.
 */
export const isTransientProviderError = (error: unknown): boolean => {
  if (error instanceof RequestTimeoutError) {
    return true;
  }
  const status = readErrorStatus(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500;
  }
  return /timeout|timed out|econnreset|econnrefused|etimedout|socket hang up|fetch failed|connection error|network/i.test(
    collectErrorText(error)
  );
};
