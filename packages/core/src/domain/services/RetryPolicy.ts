import type { SendFailure } from '../model/SendResult.js';

export interface RetryConfig {
  /** Transient failures a job may have before it is marked failed. Default: `3`. */
  readonly maxRetries: number;
  /** Default: `2000`. */
  readonly baseDelayMs: number;
  /** Default: `2`. */
  readonly backoffFactor: number;
  /** Upper bound of a single backoff. `null` leaves it unbounded. Default: `60000`. */
  readonly maxBackoffMs: number | null;
}

/** Exponential backoff for transient send failures. */
export class RetryPolicy {
  constructor(private readonly config: RetryConfig) {}

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  /** `attempt` is the number of failed attempts of the current job so far. */
  shouldRetry(attempt: number, failure: Pick<SendFailure, 'kind'>): boolean {
    return failure.kind === 'transient' && attempt < this.config.maxRetries;
  }

  /** `baseDelayMs * backoffFactor ^ attempt`, clamped to `maxBackoffMs`. */
  backoffDelay(attempt: number): number {
    const raw = Math.round(this.config.baseDelayMs * this.config.backoffFactor ** attempt);
    return this.config.maxBackoffMs === null ? raw : Math.min(raw, this.config.maxBackoffMs);
  }
}
