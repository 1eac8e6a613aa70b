/**
 * Retry Service
 * Exponential backoff for connection failures and timeouts
 */

import { FetchError } from 'ofetch';
import { TransientNetworkError } from '../lib/errors.js';

export interface RetryConfig {
  /** Total attempts including the first one (default: 5) */
  maxAttempts: number;
  /** Unit of the exponential curve in milliseconds (default: 1000) */
  multiplierMs: number;
  /** Lower bound for every wait in milliseconds (default: 4000) */
  minDelayMs: number;
  /** Upper bound for every wait in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Decides whether a failure is retried (default: isTransientError) */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before waiting for the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Label used in the exhaustion message */
  operation?: string;
  /** Wait implementation */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_CONFIG: Pick<RetryConfig, 'maxAttempts' | 'multiplierMs' | 'minDelayMs' | 'maxDelayMs'> = {
  maxAttempts: 5,
  multiplierMs: 1000,
  minDelayMs: 4000,
  maxDelayMs: 10000,
};

/** Socket-level error codes treated as transient */
export const TRANSIENT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_ERROR_NAMES = new Set(['TimeoutError', 'AbortError', 'ConnectTimeoutError']);

/**
 * Calculate the wait after a failed attempt
 * @param attempt The attempt that just failed (1-based)
 * @returns clamp(multiplier * 2^(attempt-1), min, max)
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RetryConfig, 'multiplierMs' | 'minDelayMs' | 'maxDelayMs'> = DEFAULT_RETRY_CONFIG
): number {
  const normalizedAttempt = Math.max(1, attempt);
  const exponentialDelay = config.multiplierMs * Math.pow(2, normalizedAttempt - 1);
  return Math.min(Math.max(exponentialDelay, config.minDelayMs), config.maxDelayMs);
}

/**
 * Connection failures and timeouts are transient; anything that produced an
 * HTTP response is not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof FetchError && typeof error.status === 'number') {
    return false;
  }

  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (TIMEOUT_ERROR_NAMES.has(current.name)) {
      return true;
    }
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string' && TRANSIENT_ERROR_CODES.has(code)) {
      return true;
    }
    // undici wraps socket errors in TypeError('fetch failed')
    if (current instanceof TypeError && current.message === 'fetch failed') {
      return true;
    }
    current = current.cause;
  }

  return false;
}

type RetryableFunction<T> = (context: { attempt: number }) => Promise<T>;

/**
 * Execute a function with retry logic
 * @throws TransientNetworkError when every attempt failed with a retryable error
 * @throws the original error when it is not retryable
 */
export async function retry<T>(fn: RetryableFunction<T>, config: Partial<RetryConfig> = {}): Promise<T> {
  const maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts);
  const backoff = {
    multiplierMs: config.multiplierMs ?? DEFAULT_RETRY_CONFIG.multiplierMs,
    minDelayMs: config.minDelayMs ?? DEFAULT_RETRY_CONFIG.minDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
  };
  const shouldRetry = config.shouldRetry ?? isTransientError;
  const wait = config.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn({ attempt });
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        throw new TransientNetworkError(`${config.operation ?? 'Request'} failed`, error, attempt);
      }

      const delay = calculateBackoff(attempt, backoff);
      config.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}

/**
 * Sleep for the specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
