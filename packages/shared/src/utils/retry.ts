/**
 * Retry utility with exponential backoff
 * Used for calls to the tracking server and remote dataset downloads
 */

import axios from 'axios';
import { toError } from './errors';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: string[];
  /** HTTP statuses worth another attempt; a response with any other status is final */
  retryableStatuses?: number[];
  onRetry?: (error: Error, attempt: number) => void;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'onRetry' | 'retryableErrors' | 'retryableStatuses'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

// Common retryable error patterns
const DEFAULT_RETRYABLE_ERRORS = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'socket hang up',
  'timeout',
];

const DEFAULT_RETRYABLE_STATUSES = [408, 429, 500, 502, 503, 504];

function errorCode(error: Error): string {
  return 'code' in error && typeof error.code === 'string' ? error.code : '';
}

function statusOf(error: Error): number | undefined {
  if (axios.isAxiosError(error) && error.response) {
    return error.response.status;
  }
  const match = /status code (\d{3})/.exec(error.message);
  return match ? Number(match[1]) : undefined;
}

function isRetryableError(error: Error, retryablePatterns: string[], retryableStatuses: number[]): boolean {
  const status = statusOf(error);
  if (status !== undefined) {
    return retryableStatuses.includes(status);
  }
  const errorString = `${error.name} ${error.message} ${errorCode(error)}`.toLowerCase();
  return retryablePatterns.some(pattern => errorString.includes(pattern.toLowerCase()));
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const retryableErrors = options.retryableErrors ?? DEFAULT_RETRYABLE_ERRORS;
  const retryableStatuses = options.retryableStatuses ?? DEFAULT_RETRYABLE_STATUSES;

  let delay = opts.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);

      const isLastAttempt = attempt > opts.maxRetries;
      if (isLastAttempt || !isRetryableError(lastError, retryableErrors, retryableStatuses)) {
        throw lastError;
      }

      opts.onRetry?.(lastError, attempt);

      await sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}
