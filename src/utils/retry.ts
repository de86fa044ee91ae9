import { sleep as defaultSleep } from './time';

export interface RetryPolicyOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor?: number;
  /** Upper bound of the random jitter added to each delay. */
  jitterMs?: number;
}

export interface ExecuteHooks {
  isRetryable: (error: unknown) => boolean;
  /** Called for every failed attempt, including the last one. */
  onFailure?: (error: unknown, attempt: number) => void;
  /** Lets an error ask for a longer wait (e.g. a `Retry-After` header). */
  minDelayFor?: (error: unknown) => number | null;
}

/**
 * 🔁 Bounded retry with exponential backoff.
 *
 * Shared by the paginated fetch loop and the webhook dispatcher so both
 * follow `delay(n) = min(maxDelay, base * factor^(n-1)) + jitter`.
 */
export class RetryPolicy {
  public readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly factor: number;
  private readonly jitterMs: number;

  constructor(
    options: RetryPolicyOptions,
    private readonly sleeper: (ms: number) => Promise<void> = defaultSleep,
    private readonly random: () => number = Math.random,
  ) {
    if (options.maxAttempts < 1) throw new RangeError('maxAttempts must be at least 1');
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs);
    this.factor = options.factor ?? 2;
    this.jitterMs = options.jitterMs ?? 0;
  }

  /** Delay to wait after failed attempt number `attempt` (1-based). */
  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * this.factor ** Math.max(0, attempt - 1);
    const jitter = this.jitterMs > 0 ? Math.floor(this.random() * this.jitterMs) : 0;
    return Math.min(this.maxDelayMs, exponential) + jitter;
  }

  hasAttemptsLeft(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }

  wait(ms: number): Promise<void> {
    return ms > 0 ? this.sleeper(ms) : Promise.resolve();
  }

  /**
   * Runs `operation` until it succeeds, fails with a non-retryable error or
   * runs out of attempts. The last error is rethrown.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, hooks: ExecuteHooks): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        hooks.onFailure?.(error, attempt);
        if (!hooks.isRetryable(error) || !this.hasAttemptsLeft(attempt)) throw error;

        const requested = hooks.minDelayFor?.(error) ?? 0;
        await this.wait(Math.min(this.maxDelayMs, Math.max(this.delayFor(attempt), requested)));
      }
    }
  }
}
