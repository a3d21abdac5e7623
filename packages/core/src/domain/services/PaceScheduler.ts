import type { PaceState } from '../model/PaceState.js';
import type { RandomSource } from '../ports/RandomSource.js';
import { drawInclusive, mathRandom } from '../ports/RandomSource.js';
import { PersistenceError } from '../errors/CampaignErrors.js';

/** Delay ranges are inclusive and in milliseconds; batch sizes are message counts. */
export interface PaceConfig {
  /** When `false`, every delay is `0` and no batch rest is ever due. Counters still run. Default: `true`. */
  readonly enabled: boolean;
  /** Default: `20000`. */
  readonly minMessageDelayMs: number;
  /** Default: `90000`. */
  readonly maxMessageDelayMs: number;
  /** Default: `10`. */
  readonly minBatchSize: number;
  /** Default: `20`. */
  readonly maxBatchSize: number;
  /** Default: `300000`. */
  readonly minBatchDelayMs: number;
  /** Default: `900000`. */
  readonly maxBatchDelayMs: number;
}

export interface PaceSchedulerOptions {
  readonly config: PaceConfig;
  readonly random?: RandomSource;
  readonly initialState?: PaceState | null;
  readonly persist?: (state: PaceState) => Promise<void>;
  readonly onPersistenceError?: (error: PersistenceError) => void;
}

/**
 * Decides how long to wait between messages and when to take a longer rest
 * after a randomly sized batch of messages.
 */
export class PaceScheduler {
  private state: PaceState;
  private dirty = false;
  private readonly random: RandomSource;

  constructor(private readonly options: PaceSchedulerOptions) {
    this.random = options.random ?? mathRandom;
    const restored = options.initialState;
    const { minBatchSize, maxBatchSize } = options.config;
    if (restored && restored.nextBatchThreshold >= minBatchSize && restored.nextBatchThreshold <= maxBatchSize) {
      this.state = restored;
    } else {
      // A missing record, or one drawn under different batch bounds, gets a fresh threshold.
      this.state = { messagesSinceBatch: restored?.messagesSinceBatch ?? 0, nextBatchThreshold: this.drawThreshold() };
      this.dirty = true;
    }
  }

  get enabled(): boolean {
    return this.options.config.enabled;
  }

  nextMessageDelay(): number {
    const { enabled, minMessageDelayMs, maxMessageDelayMs } = this.options.config;
    return enabled ? drawInclusive(this.random, minMessageDelayMs, maxMessageDelayMs) : 0;
  }

  shouldTakeBatchRest(): boolean {
    return this.options.config.enabled && this.state.messagesSinceBatch >= this.state.nextBatchThreshold;
  }

  /** Draw the rest duration, then start a new batch with a freshly drawn threshold. */
  batchRestDelay(): number {
    const { enabled, minBatchDelayMs, maxBatchDelayMs } = this.options.config;
    const delay = enabled ? drawInclusive(this.random, minBatchDelayMs, maxBatchDelayMs) : 0;
    this.state = { messagesSinceBatch: 0, nextBatchThreshold: this.drawThreshold() };
    this.dirty = true;
    return delay;
  }

  recordMessageForBatch(): void {
    this.state = { ...this.state, messagesSinceBatch: this.state.messagesSinceBatch + 1 };
    this.dirty = true;
  }

  messagesUntilBatchRest(): number {
    return Math.max(0, this.state.nextBatchThreshold - this.state.messagesSinceBatch);
  }

  snapshot(): PaceState {
    return this.state;
  }

  async flush(): Promise<void> {
    const persist = this.options.persist;
    if (!persist || !this.dirty) return;
    this.dirty = false;
    try {
      await persist(this.state);
    } catch (error) {
      this.dirty = true;
      this.options.onPersistenceError?.(error instanceof PersistenceError ? error : new PersistenceError('pace', error));
    }
  }

  private drawThreshold(): number {
    const { minBatchSize, maxBatchSize } = this.options.config;
    return drawInclusive(this.random, minBatchSize, maxBatchSize);
  }
}
