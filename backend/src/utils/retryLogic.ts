/**
 * Retry, timeout and cancellation helpers for classifier calls
 */

import { logger } from './logger';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  signal?: AbortSignal;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(message = 'Operation was aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number
): number {
  const exponentialDelay = baseDelayMs * Math.pow(backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  // ±25% jitter
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Transient failures worth another attempt: network errors, 408/429/5xx and
 * timeouts. Cancellation is never retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AbortedError) return false;
  if (error instanceof TimeoutError) return true;
  if (typeof error !== 'object' || error === null) return false;

  const code = 'code' in error ? error.code : undefined;
  const status = 'status' in error ? error.status : undefined;
  if (typeof code === 'string' && ['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNREFUSED', 'EAI_AGAIN'].includes(code)) {
    return true;
  }
  if (typeof status === 'number' && (status === 408 || status === 429 || status >= 500)) {
    return true;
  }

  const message = errorMessage(error).toLowerCase();
  return message.includes('rate limit') || message.includes('timeout') || message.includes('timed out');
}

/**
 * Sleep that wakes early with AbortedError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` with a child signal that fires on timeout or when `parent` aborts.
 * Rejects with TimeoutError / AbortedError without waiting for `fn` to settle.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new AbortedError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      action();
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new TimeoutError(timeoutMs)));
    }, timeoutMs);

    const onParentAbort = () => {
      controller.abort();
      finish(() => reject(new AbortedError()));
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (error) {
      finish(() => reject(error));
      return;
    }
    pending.then(
      value => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}

/**
 * Execute a function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_OPTIONS, ...options };
  const isRetryable = opts.isRetryable ?? isRetryableError;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    if (opts.signal?.aborted) {
      throw new AbortedError();
    }

    try {
      const result = await fn(attempt);
      if (attempt > 0) {
        logger.info(`Operation succeeded after ${attempt} retries`);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (attempt >= opts.maxRetries) {
        logger.warn(`Operation failed after ${opts.maxRetries} retries`, {
          error: errorMessage(error),
          attempts: attempt + 1,
        });
        break;
      }

      if (!isRetryable(error)) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.backoffMultiplier);
      logger.warn('Retrying operation', {
        attempt: attempt + 1,
        maxRetries: opts.maxRetries,
        delayMs,
        error: errorMessage(error),
      });
      opts.onRetry?.(attempt + 1, error, delayMs);

      await sleep(delayMs, opts.signal);
    }
  }

  throw lastError;
}
