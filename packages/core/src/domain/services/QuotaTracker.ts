import type { Clock } from '../ports/Clock.js';
import type { QuotaLimitReason, QuotaState } from '../model/QuotaState.js';
import { systemClock } from '../ports/Clock.js';
import { EMPTY_QUOTA_STATE } from '../model/QuotaState.js';
import { toLocalDateKey } from '../model/calendar.js';
import { PersistenceError } from '../errors/CampaignErrors.js';

/** Daily and hourly caps. `null` disables a cap; bookkeeping still runs. */
export interface QuotaLimits {
  readonly dailyLimit: number | null;
  readonly hourlyLimit: number | null;
}

/**
 * What consumes quota.
 *
 * - `success`: only deliveries the Sender confirmed.
 * - `attempt`: every Sender invocation, failed ones included.
 */
export type QuotaCounting = 'success' | 'attempt';

export type QuotaDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: QuotaLimitReason; readonly limit: number };

export interface QuotaRemaining {
  readonly daily: number | null;
  readonly hourly: number | null;
}

export interface QuotaTrackerOptions {
  readonly limits: QuotaLimits;
  readonly clock?: Clock;
  /** State restored from the backing medium. Default: empty counters. */
  readonly initialState?: QuotaState | null;
  /** Writes the state durably. Called after every mutation. */
  readonly persist?: (state: QuotaState) => Promise<void>;
  /** Receives write failures. `recordSent()` itself never throws because of them. */
  readonly onPersistenceError?: (error: PersistenceError) => void;
}

/**
 * Enforces the daily and hourly sending caps.
 *
 * The daily bucket is the local calendar date and the hourly bucket the
 * `(date, hour)` pair, so both counters start over on the first evaluation
 * after the clock crosses their boundary.
 */
export class QuotaTracker {
  private state: QuotaState;
  private dirty = false;
  private readonly clock: Clock;

  constructor(private readonly options: QuotaTrackerOptions) {
    this.clock = options.clock ?? systemClock;
    this.state = options.initialState ?? EMPTY_QUOTA_STATE;
  }

  get limits(): QuotaLimits {
    return this.options.limits;
  }

  /** Start new buckets if the date or hour moved on. Returns whether anything changed. */
  recordRollover(): boolean {
    return this.rollover(this.clock.now());
  }

  check(): QuotaDecision {
    this.recordRollover();
    const { dailyLimit, hourlyLimit } = this.options.limits;
    if (dailyLimit !== null && this.state.sentToday >= dailyLimit) {
      return { allowed: false, reason: 'daily-limit', limit: dailyLimit };
    }
    if (hourlyLimit !== null && this.state.sentThisHour >= hourlyLimit) {
      return { allowed: false, reason: 'hourly-limit', limit: hourlyLimit };
    }
    return { allowed: true };
  }

  canSend(): boolean {
    return this.check().allowed;
  }

  /** Count one send, then write the new state before resolving. */
  async recordSent(): Promise<void> {
    const now = this.clock.now();
    this.rollover(now);
    this.state = {
      ...this.state,
      sentToday: this.state.sentToday + 1,
      sentThisHour: this.state.sentThisHour + 1,
      totalSent: this.state.totalSent + 1,
      lastSentAt: now.toISOString(),
    };
    this.dirty = true;
    await this.flush();
  }

  async resetDaily(): Promise<void> {
    this.rollover(this.clock.now());
    this.state = { ...this.state, sentToday: 0 };
    this.dirty = true;
    await this.flush();
  }

  async resetHourly(): Promise<void> {
    this.rollover(this.clock.now());
    this.state = { ...this.state, sentThisHour: 0 };
    this.dirty = true;
    await this.flush();
  }

  remaining(): QuotaRemaining {
    this.recordRollover();
    const { dailyLimit, hourlyLimit } = this.options.limits;
    return {
      daily: dailyLimit === null ? null : Math.max(0, dailyLimit - this.state.sentToday),
      hourly: hourlyLimit === null ? null : Math.max(0, hourlyLimit - this.state.sentThisHour),
    };
  }

  snapshot(): QuotaState {
    return this.state;
  }

  /** Write pending changes. Failures go to `onPersistenceError` and leave the state dirty. */
  async flush(): Promise<void> {
    const persist = this.options.persist;
    if (!persist || !this.dirty) return;
    this.dirty = false;
    try {
      await persist(this.state);
    } catch (error) {
      this.dirty = true;
      this.options.onPersistenceError?.(error instanceof PersistenceError ? error : new PersistenceError('quota', error));
    }
  }

  private rollover(now: Date): boolean {
    const today = toLocalDateKey(now);
    const hour = now.getHours();
    let next = this.state;

    const dateChanged = next.currentDate !== today;
    if (dateChanged) {
      next = { ...next, currentDate: today, sentToday: 0 };
    }
    if (dateChanged || next.currentHour !== hour) {
      next = { ...next, currentHour: hour, sentThisHour: 0 };
    }

    if (next === this.state) return false;
    this.state = next;
    this.dirty = true;
    return true;
  }
}
