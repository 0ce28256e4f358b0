import { ScanAbortedError, type RpcError } from './errors.js';
import type { RpcCallResult, RpcErrorKind } from './types.js';

export type BackoffOptions = {
  transientBaseMs: number;
  rateLimitedBaseMs: number;
  maxDelayMs: number;
  jitterFraction: number;
  maxRetries: number;
  /** Uniform source in [0, 1). */
  random: () => number;
};

export const DEFAULT_BACKOFF: BackoffOptions = {
  transientBaseMs: 3_000,
  rateLimitedBaseMs: 5_000,
  maxDelayMs: 60_000,
  jitterFraction: 0.25,
  maxRetries: 5,
  random: Math.random,
};

const RETRYABLE_KINDS: ReadonlySet<RpcErrorKind> = new Set(['RateLimited', 'Transient']);

/**
 * Exponential backoff with capped delay and proportional jitter.
 *
 * `attempt` is zero-based: it counts the calls that already failed before the
 * wait being computed. Holds no state between calls, so every slot's retry
 * sequence starts from scratch.
 */
export class BackoffController {
  readonly options: BackoffOptions;

  constructor(options: Partial<BackoffOptions> = {}) {
    this.options = { ...DEFAULT_BACKOFF, ...options };
    if (this.options.maxRetries < 0 || !Number.isInteger(this.options.maxRetries)) {
      throw new Error('maxRetries must be a non-negative integer');
    }
    if (this.options.jitterFraction < 0) {
      throw new Error('jitterFraction must not be negative');
    }
  }

  get maxRetries(): number {
    return this.options.maxRetries;
  }

  shouldRetry(attempt: number, kind: RpcErrorKind): boolean {
    return RETRYABLE_KINDS.has(kind) && attempt < this.options.maxRetries;
  }

  nextDelay(attempt: number, kind: RpcErrorKind): number {
    const { maxDelayMs, jitterFraction } = this.options;
    const base = kind === 'RateLimited' ? this.options.rateLimitedBaseMs : this.options.transientBaseMs;
    const exponent = Math.max(0, attempt);
    const delay = Math.min(base * 2 ** exponent, maxDelayMs);
    const draw = clampUnit(this.options.random());
    const jitter = draw * delay * jitterFraction;
    return Math.max(0, Math.min(Math.round(delay + jitter), maxDelayMs));
  }
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RetryCallOptions = {
  backoff: BackoffController;
  sleep: Sleep;
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: RpcError) => void;
};

/**
 * Runs `call` until it succeeds or the backoff policy gives up. Used for
 * one-off lookups (current slot, schedules); per-slot block fetches run their
 * own state machine instead.
 */
export async function retryCall<T>(
  call: () => Promise<RpcCallResult<T>>,
  options: RetryCallOptions,
): Promise<RpcCallResult<T>> {
  for (let attempt = 0; ; attempt += 1) {
    const result = await call();
    if (result.ok || !options.backoff.shouldRetry(attempt, result.error.kind)) {
      return result;
    }
    const delayMs = options.backoff.nextDelay(attempt, result.error.kind);
    options.onRetry?.(attempt + 1, delayMs, result.error);
    await options.sleep(delayMs, options.signal);
  }
}

export const delay: Sleep = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ScanAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ScanAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

function clampUnit(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value >= 1 ? 1 : value;
}
