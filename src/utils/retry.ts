import axios from 'axios';
import logger from './logger';
import { sleep } from './async';
import { TransientDataError, errorMessage } from './errors';

export interface RetryConfig {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  jitterMax: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  jitterMax: 1000,
};

export interface RetryOptions extends Partial<RetryConfig> {
  label: string;
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Timeouts, connection resets, 429 and 5xx are worth another attempt.
 * Other 4xx responses and programming errors are not.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransientDataError) {
    return error.retryable;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return true;
    }
    return status === 429 || status >= 500;
  }

  const message = errorMessage(error).toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('rate limit') ||
    message.includes('503') ||
    message.includes('502')
  );
}

export function calculateRetryDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const exponential = config.baseDelay * Math.pow(config.backoffMultiplier, attempt - 1);
  const jitter = random() * config.jitterMax;
  return Math.min(exponential + jitter, config.maxDelay);
}

/**
 * Executes `fn`, retrying transient failures with exponential backoff and jitter.
 * Non-retryable errors are rethrown on the first attempt.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const config: RetryConfig = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelay: options.baseDelay ?? DEFAULT_RETRY_CONFIG.baseDelay,
    maxDelay: options.maxDelay ?? DEFAULT_RETRY_CONFIG.maxDelay,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_RETRY_CONFIG.backoffMultiplier,
    jitterMax: options.jitterMax ?? DEFAULT_RETRY_CONFIG.jitterMax,
  };
  const retryable = options.isRetryable ?? isRetryableError;

  let lastError: unknown = new Error(`${options.label} was not executed`);

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn();
      if (attempt > 1) {
        logger.info(`Retry successful on attempt ${attempt} for ${options.label}`);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (!retryable(error)) {
        logger.warn(`Non-retryable error for ${options.label}: ${errorMessage(error)}`);
        throw error;
      }

      if (attempt < config.maxAttempts && !options.signal?.aborted) {
        const delay = calculateRetryDelay(attempt, config);
        logger.warn(`Attempt ${attempt} failed for ${options.label}, retrying in ${Math.round(delay)}ms: ${errorMessage(error)}`);
        await sleep(delay, options.signal);
      }

      if (options.signal?.aborted) {
        break;
      }
    }
  }

  throw lastError;
}
