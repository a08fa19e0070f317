/**
 * Rate Limiter
 *
 * Guards calls against a platform's advertised quota and retries throttled
 * or transient failures with capped exponential backoff.
 *
 * Quota comes from response headers (fed in through `update`). When the
 * remaining quota would drop below the reserved buffer, `acquire` sleeps
 * until the advertised reset. Retry progress is kept per call as an explicit
 * `{ attempt, nextEligibleAt }` state so a simulated clock can drive it and
 * concurrent calls never share an attempt count.
 */

import { RateLimitError, TransferCancelledError, isRetryable } from './errors.js';

// ─── Clock ───────────────────────────────────────────────────

export interface Clock {
  now(): number;
  /** Rejects with TransferCancelledError when the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new TransferCancelledError());
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new TransferCancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

// ─── Types ───────────────────────────────────────────────────

export interface RateLimitConfig {
  /** Requests kept in reserve before waiting for reset */
  buffer?: number;
  /** Total attempts per call, first one included */
  maxAttempts?: number;
  /** First backoff delay */
  baseDelayMs?: number;
  /** Upper bound for computed backoff delays */
  maxDelayMs?: number;
  /** Extra wait after the advertised reset time */
  resetPaddingMs?: number;
}

export interface QuotaUpdate {
  limit?: number;
  remaining: number;
  /** Epoch milliseconds */
  resetAt: number;
}

export interface QuotaState {
  limit?: number;
  remaining: number;
  resetAt: number;
}

export interface RetryState {
  attempt: number;
  nextEligibleAt: number;
}

export interface RateLimitWait {
  reason: 'quota' | 'backoff';
  waitMs: number;
  /** Remaining quota when waiting for reset */
  remaining?: number;
  /** Attempt that failed when backing off */
  attempt?: number;
  error?: Error;
}

export type RateLimitWaitListener = (wait: RateLimitWait) => void;

export const DEFAULT_RATE_LIMIT: Required<RateLimitConfig> = {
  buffer: 10,
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 60_000,
  resetPaddingMs: 10_000,
};

// ─── Rate Limiter ────────────────────────────────────────────

export class RateLimiter {
  private readonly config: Required<RateLimitConfig>;
  private readonly clock: Clock;
  private readonly listeners = new Set<RateLimitWaitListener>();
  private quota: QuotaState | null = null;
  private lastRetry: RetryState = { attempt: 0, nextEligibleAt: 0 };

  constructor(config: RateLimitConfig = {}, clock: Clock = systemClock) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
    this.clock = clock;
  }

  /**
   * Record the quota advertised by the platform.
   */
  update(update: QuotaUpdate): void {
    if (!Number.isFinite(update.remaining) || !Number.isFinite(update.resetAt) || update.remaining < 0) {
      return;
    }
    this.quota = { limit: update.limit, remaining: update.remaining, resetAt: update.resetAt };
  }

  getQuota(): QuotaState | null {
    return this.quota ? { ...this.quota } : null;
  }

  /**
   * Retry state of the most recently finished `execute` call.
   */
  getRetryState(): RetryState {
    return { ...this.lastRetry };
  }

  /**
   * Subscribe to wait notifications. Returns an unsubscribe function.
   */
  onWait(listener: RateLimitWaitListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Block until `cost` units of quota can be spent without dipping into the buffer.
   */
  async acquire(cost = 1, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new TransferCancelledError();
    }

    const now = this.clock.now();
    if (this.quota && this.quota.resetAt <= now) {
      // Window rolled over; wait for the next advertisement
      this.quota = null;
    }

    if (this.quota && this.quota.remaining - cost < this.config.buffer) {
      const waitMs = this.quota.resetAt - now + this.config.resetPaddingMs;
      this.notify({ reason: 'quota', waitMs, remaining: this.quota.remaining });
      await this.clock.sleep(waitMs, signal);
      this.quota = null;
    }

    if (this.quota) {
      this.quota.remaining -= cost;
    }
  }

  /**
   * Run `fn` under the quota guard, retrying rate-limit and transient failures.
   *
   * `fn` runs exactly once per attempt. After `maxAttempts` the last error is
   * rethrown; an exhausted RateLimitError is reported as such.
   */
  async execute<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const retry: RetryState = { attempt: 0, nextEligibleAt: this.clock.now() };
    try {
      return await this.attempt(fn, retry, signal);
    } finally {
      this.lastRetry = { ...retry };
    }
  }

  private async attempt<T>(fn: () => Promise<T>, retry: RetryState, signal?: AbortSignal): Promise<T> {
    for (;;) {
      const waitMs = retry.nextEligibleAt - this.clock.now();
      if (waitMs > 0) {
        await this.clock.sleep(waitMs, signal);
      }

      await this.acquire(1, signal);
      retry.attempt += 1;

      try {
        return await fn();
      } catch (error) {
        if (!isRetryable(error)) {
          throw error;
        }

        const attempt = retry.attempt;
        if (attempt >= this.config.maxAttempts) {
          if (error instanceof RateLimitError) {
            throw new RateLimitError(
              `Rate limit still exceeded after ${attempt} attempts: ${error.message}`,
              { status: error.status, cause: error },
            );
          }
          throw error;
        }

        const delay = this.backoffDelay(attempt, error.retryAfterMs);
        retry.nextEligibleAt = this.clock.now() + delay;
        this.notify({ reason: 'backoff', waitMs: delay, attempt, error });
      }
    }
  }

  /**
   * Delay after the given (1-based) failed attempt.
   */
  backoffDelay(attempt: number, retryAfterMs?: number): number {
    if (retryAfterMs !== undefined && retryAfterMs >= 0) {
      return retryAfterMs;
    }
    return Math.min(this.config.baseDelayMs * 2 ** (attempt - 1), this.config.maxDelayMs);
  }

  private notify(wait: RateLimitWait): void {
    for (const listener of this.listeners) {
      try {
        listener(wait);
      } catch {
        // Listener errors must not affect the call being guarded
      }
    }
  }
}
