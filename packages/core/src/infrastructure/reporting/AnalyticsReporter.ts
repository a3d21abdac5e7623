import type { CampaignEvent } from '../../domain/events/DomainEvents.js';
import type { Reporter } from '../../domain/ports/Reporter.js';
import { toLocalHourKey } from '../../domain/model/calendar.js';

export type ErrorCategory = 'network' | 'timeout' | 'rate_limit' | 'invalid_recipient' | 'other';

const CATEGORY_PATTERNS: ReadonlyArray<readonly [ErrorCategory, RegExp]> = [
  ['network', /network|connection|ECONNRESET|ECONNREFUSED|ENOTFOUND/i],
  ['timeout', /timed? ?out/i],
  ['rate_limit', /rate ?limit|too many requests|\b429\b/i],
  ['invalid_recipient', /recipient|phone|number|address/i],
];

export function categorizeError(message: string): ErrorCategory {
  for (const [category, pattern] of CATEGORY_PATTERNS) {
    if (pattern.test(message)) return category;
  }
  return 'other';
}

export interface HourlyStats {
  /** Local hour bucket, `YYYY-MM-DD HH:00`. */
  readonly hour: string;
  readonly sent: number;
  readonly failed: number;
}

export interface ErrorCount {
  readonly message: string;
  readonly count: number;
}

export interface LatencyStats {
  readonly count: number;
  readonly averageMs: number;
  readonly minMs: number;
  readonly maxMs: number;
}

export interface AnalyticsSnapshot {
  readonly campaignKey: string | null;
  readonly outcome: 'COMPLETED' | 'PAUSED' | 'ABORTED' | null;
  readonly sent: number;
  readonly failed: number;
  readonly skipped: number;
  readonly retries: number;
  readonly rateLimitHits: number;
  readonly batchRests: number;
  readonly persistenceFailures: number;
  /** Percentage of sent over sent plus failed, two decimals. `0` before any attempt. */
  readonly successRate: number;
  readonly startedAt: number | null;
  readonly endedAt: number | null;
  readonly errorCategories: Readonly<Record<ErrorCategory, number>>;
  readonly hourly: readonly HourlyStats[];
  readonly topErrors: readonly ErrorCount[];
  readonly latency: LatencyStats | null;
}

interface MutableHourly {
  sent: number;
  failed: number;
}

/** Reporter that aggregates delivery statistics for the lifetime of the runner it is attached to. */
export class AnalyticsReporter implements Reporter {
  private campaignKey: string | null = null;
  private outcome: AnalyticsSnapshot['outcome'] = null;
  private sent = 0;
  private failed = 0;
  private skipped = 0;
  private retries = 0;
  private rateLimitHits = 0;
  private batchRests = 0;
  private persistenceFailures = 0;
  private startedAt: number | null = null;
  private endedAt: number | null = null;
  private readonly categories: Record<ErrorCategory, number> = {
    network: 0,
    timeout: 0,
    rate_limit: 0,
    invalid_recipient: 0,
    other: 0,
  };
  private readonly hourly = new Map<string, MutableHourly>();
  private readonly errors = new Map<string, number>();
  private readonly latencies: number[] = [];

  constructor(private readonly topErrorLimit = 5) {}

  handle(event: CampaignEvent): void {
    switch (event.type) {
      case 'campaign:started':
        this.campaignKey = event.campaignKey;
        this.startedAt ??= event.timestamp;
        break;
      case 'job:sent':
        this.sent++;
        this.latencies.push(event.latencyMs);
        this.bucket(event.timestamp).sent++;
        break;
      case 'job:failed':
        this.failed++;
        this.bucket(event.timestamp).failed++;
        this.categories[categorizeError(event.error)]++;
        this.errors.set(event.error, (this.errors.get(event.error) ?? 0) + 1);
        break;
      case 'job:skipped':
        this.skipped++;
        break;
      case 'job:retried':
        this.retries++;
        break;
      case 'pace:batch-rest':
        this.batchRests++;
        break;
      case 'quota:exceeded':
        this.rateLimitHits++;
        break;
      case 'state:persist-failed':
        this.persistenceFailures++;
        break;
      case 'campaign:completed':
        this.finish('COMPLETED', event.timestamp);
        break;
      case 'campaign:paused':
        this.finish('PAUSED', event.timestamp);
        break;
      case 'campaign:aborted':
        this.finish('ABORTED', event.timestamp);
        break;
    }
  }

  snapshot(): AnalyticsSnapshot {
    const attempted = this.sent + this.failed;
    return {
      campaignKey: this.campaignKey,
      outcome: this.outcome,
      sent: this.sent,
      failed: this.failed,
      skipped: this.skipped,
      retries: this.retries,
      rateLimitHits: this.rateLimitHits,
      batchRests: this.batchRests,
      persistenceFailures: this.persistenceFailures,
      successRate: attempted > 0 ? Math.round((this.sent / attempted) * 10_000) / 100 : 0,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      errorCategories: { ...this.categories },
      hourly: [...this.hourly.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([hour, stats]) => ({ hour, sent: stats.sent, failed: stats.failed })),
      topErrors: [...this.errors.entries()]
        .map(([message, count]) => ({ message, count }))
        .sort((a, b) => b.count - a.count || a.message.localeCompare(b.message))
        .slice(0, this.topErrorLimit),
      latency: this.latencyStats(),
    };
  }

  private finish(outcome: NonNullable<AnalyticsSnapshot['outcome']>, timestamp: number): void {
    this.outcome = outcome;
    this.endedAt = timestamp;
  }

  private bucket(timestamp: number): MutableHourly {
    const key = toLocalHourKey(new Date(timestamp));
    let stats = this.hourly.get(key);
    if (!stats) {
      stats = { sent: 0, failed: 0 };
      this.hourly.set(key, stats);
    }
    return stats;
  }

  private latencyStats(): LatencyStats | null {
    if (this.latencies.length === 0) return null;
    const total = this.latencies.reduce((sum, value) => sum + value, 0);
    return {
      count: this.latencies.length,
      averageMs: Math.round(total / this.latencies.length),
      minMs: Math.min(...this.latencies),
      maxMs: Math.max(...this.latencies),
    };
  }
}
