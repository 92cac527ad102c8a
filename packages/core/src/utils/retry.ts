import { TimeoutError } from '../errors';

export interface RetryOptions {
  maxRetries: number;
  retryDelay: number;
  backoffMultiplier?: number;
  maxRetryDelay?: number;
  shouldRetry?: (error: Error) => boolean;
}

const RETRYABLE_CODES = ['ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'ENETUNREACH', 'ECONNRESET'];

/**
 * Network failures worth another attempt. Checks the Node error code first,
 * then the message, since some drivers only format the code into the text.
 */
export function isTransientError(error: Error): boolean {
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && RETRYABLE_CODES.includes(code)) {
    return true;
  }
  return RETRYABLE_CODES.some((retryable) => error.message.includes(retryable));
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  retryDelay: 1000,
  backoffMultiplier: 2,
  maxRetryDelay: 30000,
  shouldRetry: isTransientError,
};

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const shouldRetry = opts.shouldRetry ?? isTransientError;
  const maxRetryDelay = opts.maxRetryDelay ?? Number.POSITIVE_INFINITY;
  let delay = opts.retryDelay;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);

      if (attempt >= opts.maxRetries || !shouldRetry(lastError)) {
        throw lastError;
      }

      await sleep(delay);

      if (opts.backoffMultiplier && opts.backoffMultiplier > 1) {
        delay = Math.min(delay * opts.backoffMultiplier, maxRetryDelay);
      }
    }
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  message?: string,
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(message || `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
