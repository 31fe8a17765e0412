import { ProviderError } from "../errors";

export type BackoffFn = (attempt: number) => number;

export interface RetryPolicy {
  readonly maxAttempts: number;
  /** Delay in ms after the given failed attempt (1-based). */
  readonly backoff: BackoffFn;
  readonly isRetryable: (error: unknown) => boolean;
}

export function exponentialBackoff(baseDelayMs: number): BackoffFn {
  return (attempt) => baseDelayMs * 2 ** (attempt - 1);
}

export function isTransientProviderError(error: unknown): boolean {
  return error instanceof ProviderError && error.kind === "Transient";
}

export function createRetryPolicy(options: Partial<RetryPolicy> & { baseDelayMs?: number } = {}): RetryPolicy {
  const maxAttempts = options.maxAttempts ?? 3;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  return {
    maxAttempts,
    backoff: options.backoff ?? exponentialBackoff(options.baseDelayMs ?? 2000),
    isRetryable: options.isRetryable ?? isTransientProviderError
  };
}
