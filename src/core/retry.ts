/**
 * metaprompt-lab - Retry Logic
 * Fixed-delay retry driven by an explicit policy object
 */

import { MetaPromptError, TimeoutError } from './errors.js';

/**
 * How many times a call is attempted and how long to wait between attempts
 */
export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  delayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  delayMs: 1000
};

/**
 * Retryable error codes
 */
export const RETRYABLE_ERROR_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'AbortError',
  'TimeoutError'
];

/**
 * Retryable HTTP status codes
 */
export const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];

/**
 * Retry attempt info
 */
export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  error: Error;
  delay: number;
}

export interface RetryOptions {
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
  retryableErrors?: string[];
  retryableStatusCodes?: number[];
}

/**
 * Determines if an error is retryable
 */
export function isRetryableError(error: unknown, options: RetryOptions = {}): boolean {
  const retryableErrors = options.retryableErrors ?? RETRYABLE_ERROR_CODES;
  const retryableStatusCodes = options.retryableStatusCodes ?? RETRYABLE_STATUS_CODES;

  if (options.shouldRetry && error instanceof Error) {
    return options.shouldRetry(error);
  }

  if (!(error instanceof Error)) {
    return false;
  }

  if (error instanceof MetaPromptError) {
    return error.retryable;
  }

  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && retryableErrors.includes(code)) {
    return true;
  }

  if (error.name && retryableErrors.includes(error.name)) {
    return true;
  }

  if (error.message && error.message.toLowerCase().includes('timeout')) {
    return true;
  }

  const status = 'status' in error ? error.status : undefined;
  if (typeof status === 'number' && retryableStatusCodes.includes(status)) {
    return true;
  }

  if (error.message && (
    error.message.includes('rate limit') ||
    error.message.includes('too many requests') ||
    error.message.includes('429')
  )) {
    return true;
  }

  return false;
}

/**
 * Sleep for specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function, retrying retryable failures with a fixed delay.
 * The last error is rethrown once the policy is exhausted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts || !isRetryableError(error, options)) {
        throw lastError;
      }

      options.onRetry?.({
        attempt,
        maxAttempts,
        error: lastError,
        delay: policy.delayMs
      });

      await sleep(policy.delayMs);
    }
  }

  throw lastError ?? new Error('Retry failed');
}

/**
 * Execute with timeout
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  message = 'Operation timed out'
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      fn(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(message, timeoutMs)), timeoutMs);
      })
    ]);
  } finally {
    clearTimeout(timer);
  }
}
