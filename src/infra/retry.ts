/**
 * Retry infrastructure - exponential backoff with jitter, abortable waits.
 *
 * Used around model calls; tool invocations are never retried here because
 * a side-effecting call may already have landed on the server.
 */

import { createLogger } from '../utils/logger';
import { CancelledError, isRelayError } from '../errors';

const logger = createLogger('retry');

// =============================================================================
// TYPES
// =============================================================================

export interface RetryOptions {
  /** Maximum number of attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Minimum delay in ms (default: 1000) */
  minDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Jitter factor 0-1 (default: 0.1 = +/-10%) */
  jitter?: number;
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;
  retryPredicate?: (error: Error, attempt: number) => boolean;
  onRetry?: (info: RetryInfo) => void;
  /** Aborting stops further attempts and interrupts the backoff wait */
  signal?: AbortSignal;
}

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  delay: number;
  error: Error;
  willRetry: boolean;
}

export type RetryPolicyName = 'default' | 'model';

// =============================================================================
// TRANSIENT ERROR DETECTION
// =============================================================================

const TRANSIENT_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'econnaborted',
  'epipe',
  'enetunreach',
  'ehostunreach',
  'socket hang up',
  'network error',
  'failed to fetch',
  'connection reset',
  'service unavailable',
  'bad gateway',
  'gateway timeout',
  'overloaded',
  'rate limit',
];

function readStatus(err: Error): number | undefined {
  const candidate: unknown = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof candidate === 'number' ? candidate : undefined;
}

/** Detect transient errors that are safe to retry */
export function isTransientError(err: Error): boolean {
  if (err instanceof CancelledError || err.name === 'AbortError') return false;
  if ('retryable' in err && typeof err.retryable === 'boolean') return err.retryable;
  if (isRelayError(err)) {
    return err.kind === 'Timeout' || err.kind === 'ServerUnavailable' || err.kind === 'TransportUnavailable';
  }

  const status = readStatus(err);
  if (status !== undefined) {
    return status === 408 || status === 429 || status === 529 || (status >= 500 && status <= 504);
  }

  const message = err.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => message.includes(p))) return true;

  return /\b(status\s*[:=]?\s*|http\s+)(429|50[0-4]|529)\b/i.test(err.message);
}

/** Retry-after hint in ms from an error's retryAfter field or its message */
export function extractRetryAfterFromError(error: Error): number | null {
  if ('retryAfter' in error && typeof error.retryAfter === 'number') {
    return error.retryAfter;
  }

  const retryMatch = error.message.match(/retry[_\s-]?after[:\s]+(\d+)/i);
  if (retryMatch) {
    const value = parseInt(retryMatch[1], 10);
    // Small values are seconds
    return value < 1000 ? value * 1000 : value;
  }

  return null;
}

// =============================================================================
// DELAY CALCULATION
// =============================================================================

export function calculateDelay(
  attempt: number,
  config: Required<Pick<RetryOptions, 'minDelay' | 'maxDelay' | 'jitter' | 'backoffMultiplier'>>,
): number {
  const exponentialDelay = config.minDelay * Math.pow(config.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelay);
  const jitterRange = cappedDelay * config.jitter;
  const jitterValue = (Math.random() * 2 - 1) * jitterRange;
  return Math.round(Math.max(0, cappedDelay + jitterValue));
}

/** Sleep that rejects with CancelledError as soon as the signal aborts */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Retry wait cancelled'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('Retry wait cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// =============================================================================
// withRetry
// =============================================================================

/**
 * Execute a function with retry on transient errors.
 *
 * @example
 * ```ts
 * const response = await withRetry(() => client.messages.create(params), {
 *   ...RETRY_POLICIES.model,
 *   signal,
 * });
 * ```
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    minDelay = 1000,
    maxDelay = 30000,
    jitter = 0.1,
    backoffMultiplier = 2,
    retryPredicate = isTransientError,
    onRetry,
    signal,
  } = options;

  let lastError: Error = new Error('withRetry: no attempts made');

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError('Operation cancelled before attempt');
    }
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const willRetry = attempt < maxAttempts && !signal?.aborted && retryPredicate(lastError, attempt);

      const serverRetryAfter = extractRetryAfterFromError(lastError);
      const delay = serverRetryAfter !== null
        ? Math.min(serverRetryAfter, maxDelay)
        : calculateDelay(attempt, { minDelay, maxDelay, jitter, backoffMultiplier });

      onRetry?.({ attempt, maxAttempts, delay, error: lastError, willRetry });
      logger.debug({ attempt, maxAttempts, delay, willRetry, error: lastError.message }, 'Retry attempt');

      if (!willRetry) break;
      await sleep(delay, signal);
    }
  }

  throw lastError;
}

// =============================================================================
// POLICIES
// =============================================================================

export const RETRY_POLICIES: Record<RetryPolicyName, RetryOptions> = {
  default: {
    maxAttempts: 3,
    minDelay: 1000,
    maxDelay: 30000,
    jitter: 0.1,
    backoffMultiplier: 2,
  },

  /** Model API: overloaded and rate-limit responses back off longer */
  model: {
    maxAttempts: Number(process.env.TOOLRELAY_MODEL_MAX_ATTEMPTS || 3),
    minDelay: 1000,
    maxDelay: 60000,
    jitter: 0.1,
    backoffMultiplier: 2,
  },
};
