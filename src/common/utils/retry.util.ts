import { TransientExternalError } from '../errors/grading.errors';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  maxDelay?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
}

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

const retryablePatterns = [
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'socket hang up',
  'fetch failed',
];

export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientExternalError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  return retryablePatterns.some((p) => error.message.includes(p));
}

export function backoffDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
): number {
  return Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelay = 1000,
    maxDelay = 10000,
    isRetryable = isTransientError,
    onRetry,
  } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, baseDelay, maxDelay);
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
