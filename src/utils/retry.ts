import { logger } from '../config/logger';
import { ExternalCallTimeoutError, PipelineCancelledError } from '../errors/pipeline.errors';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  /** Upper bound for a single backoff delay */
  maxDelayMs?: number;
  operation: string;
  signal?: AbortSignal;
  /** Defaults to retrying everything except cancellation */
  shouldRetry?: (error: unknown) => boolean;
  /** Injected in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PipelineCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new PipelineCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number =>
  Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);

/**
 * Run `fn` up to `attempts` times with exponential backoff between attempts.
 * The last error is rethrown once attempts are exhausted.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const shouldRetry =
    options.shouldRetry ?? ((error: unknown) => !(error instanceof PipelineCancelledError));

  let lastError: unknown;
  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    if (options.signal?.aborted) {
      throw new PipelineCancelledError(options.operation);
    }
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= options.attempts || !shouldRetry(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      logger.warn(`${options.operation} failed, retrying`, {
        attempt,
        attempts: options.attempts,
        delayMs: delay,
        error: error instanceof Error ? error.message : String(error),
      });
      await wait(delay, options.signal);
    }
  }
  throw lastError;
}

/**
 * Run `fn` with its own AbortSignal that fires on timeout or when the parent
 * signal aborts. Rejects with ExternalCallTimeoutError on timeout.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new PipelineCancelledError(operation);
  }
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const onParentAbort = () => controller.abort();
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new ExternalCallTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => {
        if (parent?.aborted) reject(new PipelineCancelledError(operation));
      },
      { once: true }
    );
  });

  try {
    return await Promise.race([fn(controller.signal), timeout, cancelled]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
