/**
 * RPC Utilities for Production Resilience
 *
 * Error types, retry classification, timeouts and backoff math shared by the
 * holder client and the progress sources. Tuned for public, free-tier RPC
 * limits where backing off hard is cheaper than being banned.
 */

// ============================================================================
// Error Types
// ============================================================================

export class RpcError extends Error {
  constructor(
    message: string,
    public readonly code?: number,
    public readonly isRateLimited: boolean = false,
    public readonly isTimeout: boolean = false,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

/**
 * A response that arrived but could not be read (HTML from a gateway, truncated JSON).
 * Transient: another attempt or endpoint may answer properly.
 */
export class MalformedResponseError extends RpcError {
  constructor(message: string, originalError?: Error) {
    super(message, undefined, false, false, originalError);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Every endpoint is circuit-open or the attempt budget of a logical request is spent
 */
export class TransientExhaustionError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly endpoints: number,
    public readonly lastError?: Error
  ) {
    super(message);
    this.name = 'TransientExhaustionError';
  }
}

/** JSON-RPC codes providers use for throttling */
const RATE_LIMIT_CODES = new Set([429, -32005, -32429]);

export function isRateLimitCode(code: number | undefined): boolean {
  return code !== undefined && RATE_LIMIT_CODES.has(code);
}

// ============================================================================
// Retry Classification
// ============================================================================

/**
 * Determine if an error is retryable (transient RPC/network error)
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof MalformedResponseError) return true;
  if (error instanceof RpcError) {
    if (error.isRateLimited || error.isTimeout) return true;
    if (error.code !== undefined && error.code >= 500 && error.code < 600) return true;
    if (isRateLimitCode(error.code)) return true;
  }

  const message = error.message.toLowerCase();

  // Rate limit errors (429)
  if (message.includes('429') || message.includes('rate limit') || message.includes('too many requests')) {
    return true;
  }

  // Network errors
  if (
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('etimedout') ||
    message.includes('socket hang up') ||
    message.includes('fetch failed') ||
    message.includes('network error') ||
    message.includes('timed out')
  ) {
    return true;
  }

  // Server errors (5xx)
  return message.includes('503') || message.includes('502') || message.includes('500');
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Timeout Logic
// ============================================================================

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Execute a function with a timeout. The function receives a signal that
 * aborts when the timeout fires or the parent signal aborts, so transports
 * that accept one cancel the request instead of leaving it in flight.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort();
  if (parentSignal?.aborted) {
    controller.abort();
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      controller.abort();
      reject(new RpcError(`Operation timed out after ${timeoutMs}ms`, undefined, false, true));
    }, timeoutMs);

    const settle = (): void => {
      clearTimeout(timeoutId);
      parentSignal?.removeEventListener('abort', onParentAbort);
    };

    fn(controller.signal)
      .then((result) => {
        settle();
        resolve(result);
      })
      .catch((error: unknown) => {
        settle();
        reject(toError(error));
      });
  });
}

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay to wait after the given consecutive failure: base × attempt^attempt,
 * capped at maxDelayMs.
 *
 * attempt 1 → base, 2 → 4×base, 3 → 27×base, 4 → 256×base
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const n = Math.max(1, Math.floor(attempt));
  const delay = baseDelayMs * Math.pow(n, n);
  return Math.min(delay, maxDelayMs);
}

// ============================================================================
// Utilities
// ============================================================================

/**
 * Sleep that wakes early when the signal aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface Clock {
  now(): number;
  sleep: SleepFn;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
