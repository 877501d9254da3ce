/**
 * Agent-side retries for model, embedding and search calls.
 *
 * Only agent clients retry. A failure that outlives `withRetry` ends the
 * workflow run with the agent's error code. Every wait here gives way to
 * the run's AbortSignal, so a cancelled or timed-out run stops backing off
 * at once.
 */

import { APICallError, NoObjectGeneratedError } from 'ai';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { RETRY_CONFIG } from './config';

export { RETRY_CONFIG } from './config';

export interface RetryOptions {
  /** Retries after the first attempt (default: RETRY_CONFIG.MAX_RETRIES) */
  readonly maxRetries?: number;
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
  /** Names the call in logs and errors, e.g. "Editor review" */
  readonly context?: string;
  readonly shouldRetry?: (error: unknown) => boolean;
  /** The run's signal; aborting stops further attempts and any backoff wait */
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

/**
 * Thrown by `withRetry` when its signal aborts. `attempts` counts the calls
 * made before giving up.
 */
export class RetryAbortedError extends Error {
  readonly name = 'RetryAbortedError';

  constructor(
    readonly context: string,
    readonly attempts: number
  ) {
    super(`${context} was cancelled`);
  }
}

// ============================================================================
// Error Classification
// ============================================================================

/** Fallback for errors that carry no status: network resets, overloaded providers */
const TRANSIENT_MESSAGE = /rate.?limit|too.?many.?requests|\b429\b|overloaded|ETIMEDOUT|ECONNRESET|ECONNREFUSED|socket.?hang.?up|fetch.*fail|network|\b5\d\d\b|service.?unavailable|bad.?gateway|invalid json|did not match schema/i;

function readStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function isAbort(error: unknown): boolean {
  if (error instanceof RetryAbortedError) return true;
  return error instanceof DOMException && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Whether another attempt could succeed.
 *
 * Provider errors from the AI SDK answer for themselves (`isRetryable`).
 * A structured-output miss is retried since the next sample may parse.
 * Aborts and timeouts never are.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error || isAbort(error)) return false;
  if (APICallError.isInstance(error)) return error.isRetryable;
  if (NoObjectGeneratedError.isInstance(error)) return true;

  if (error instanceof Error) {
    const status = readStatus(error);
    if (status !== undefined) {
      return status === 408 || status === 429 || (status >= 500 && status < 600);
    }
  }

  return TRANSIENT_MESSAGE.test(error instanceof Error ? error.message : String(error));
}

// ============================================================================
// Waiting
// ============================================================================

/**
 * Backoff before retry `attempt` (0-based): exponential, capped, ±25% jitter.
 */
export function backoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(initialDelayMs * RETRY_CONFIG.BACKOFF_MULTIPLIER ** attempt, maxDelayMs);
  return Math.round(capped * (1 + 0.25 * (Math.random() * 2 - 1)));
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles with `promise`, or rejects with the signal's reason once it aborts.
 * The underlying work is left running for whoever else awaits it.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

// ============================================================================
// Retry
// ============================================================================

/**
 * Calls `fn` until it succeeds, a non-retryable error escapes, or
 * `maxRetries` extra attempts are spent.
 *
 * @throws RetryAbortedError when the signal aborts before or between attempts
 *
 * @example
 * const draft = await withRetry(
 *   () => llm.generateText({ system, prompt, signal }),
 *   { context: 'Writer draft', signal }
 * );
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = RETRY_CONFIG.MAX_RETRIES,
    initialDelayMs = RETRY_CONFIG.INITIAL_DELAY_MS,
    maxDelayMs = RETRY_CONFIG.MAX_DELAY_MS,
    context = 'operation',
    shouldRetry = isRetryableError,
    signal,
  } = options;
  const log = options.logger ?? createPrefixedLogger('[Retry]');

  let attempts = 0;
  for (;;) {
    if (signal?.aborted) {
      throw new RetryAbortedError(context, attempts);
    }

    try {
      attempts++;
      return await fn();
    } catch (error) {
      if (signal?.aborted) {
        throw new RetryAbortedError(context, attempts);
      }
      const message = error instanceof Error ? error.message : String(error);
      if (!shouldRetry(error)) {
        throw error;
      }
      if (attempts > maxRetries) {
        log.warn(`${context} gave up after ${attempts} attempts: ${message}`);
        throw error;
      }

      const delay = backoffDelay(attempts - 1, initialDelayMs, maxDelayMs);
      log.info(`${context} attempt ${attempts}/${maxRetries + 1} failed, retrying in ${delay}ms: ${message}`);
      await sleep(delay, signal);
    }
  }
}
