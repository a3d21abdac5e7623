import type { CampaignJob } from '../domain/model/CampaignJob.js';
import type { CampaignLogger } from '../domain/ports/CampaignLogger.js';
import type { Clock } from '../domain/ports/Clock.js';
import type { JobSource } from '../domain/ports/JobSource.js';
import type { RandomSource } from '../domain/ports/RandomSource.js';
import type { Reporter } from '../domain/ports/Reporter.js';
import type { Sender } from '../domain/ports/Sender.js';
import type { Sleeper } from '../domain/ports/Sleeper.js';
import type { StateStore } from '../domain/ports/StateStore.js';
import type { PaceConfig } from '../domain/services/PaceScheduler.js';
import type { QuotaCounting } from '../domain/services/QuotaTracker.js';
import type { RetryConfig } from '../domain/services/RetryPolicy.js';
import { noopLogger } from '../domain/ports/CampaignLogger.js';
import { systemClock } from '../domain/ports/Clock.js';
import { mathRandom } from '../domain/ports/RandomSource.js';
import { CampaignConfigError } from '../domain/errors/CampaignErrors.js';
import { DryRunSender } from '../infrastructure/senders/DryRunSender.js';
import { InMemoryStateStore } from '../infrastructure/state/InMemoryStateStore.js';
import { timerSleeper } from '../infrastructure/time/TimerSleeper.js';

/** Returns a skip reason for a job that must not be sent, or `null` to send it. */
export type JobValidateFn = (job: CampaignJob) => string | null;

/** Configuration of a campaign run. */
export interface CampaignRunnerConfig {
  /** Namespace of the progress record, typically a fingerprint of the job source. */
  readonly campaignKey: string;
  readonly source: JobSource;
  /** Delivery mechanism. Required unless `dryRun` is `true`. */
  readonly sender?: Sender;
  /** Backing medium for progress, quota and pacing records. Default: `InMemoryStateStore`. */
  readonly stateStore?: StateStore;
  /**
   * Namespace of the quota and pacing records. Campaigns sharing a scope share
   * the same sending caps. Default: `'default'`.
   */
  readonly quotaScope?: string;
  /** Messages per local calendar day. `null` disables the cap. Default: `50`. */
  readonly dailyLimit?: number | null;
  /** Messages per local clock hour. `null` disables the cap. Default: `15`. */
  readonly hourlyLimit?: number | null;
  /** Default: `'success'`. */
  readonly quotaCounting?: QuotaCounting;
  readonly pacing?: Partial<PaceConfig>;
  readonly retry?: Partial<RetryConfig>;
  /** Persist progress after every N handled jobs. Default: `5`. */
  readonly progressSaveInterval?: number;
  /** Applied to each job before any quota or pacing decision. */
  readonly validate?: JobValidateFn;
  /** Replace the Sender with a no-op that reports success. Default: `false`. */
  readonly dryRun?: boolean;
  /** Subscribed to every event for the lifetime of the runner. */
  readonly reporters?: readonly Reporter[];
  /** Default: a logger that discards everything. */
  readonly logger?: CampaignLogger;
  readonly clock?: Clock;
  readonly random?: RandomSource;
  readonly sleeper?: Sleeper;
}

/** Configuration with every default applied and every range checked. */
export interface ResolvedRunnerConfig {
  readonly campaignKey: string;
  readonly source: JobSource;
  readonly sender: Sender;
  readonly stateStore: StateStore;
  readonly quotaScope: string;
  readonly dailyLimit: number | null;
  readonly hourlyLimit: number | null;
  readonly quotaCounting: QuotaCounting;
  readonly pacing: PaceConfig;
  readonly retry: RetryConfig;
  readonly progressSaveInterval: number;
  readonly validate: JobValidateFn | null;
  readonly dryRun: boolean;
  readonly reporters: readonly Reporter[];
  readonly logger: CampaignLogger;
  readonly clock: Clock;
  readonly random: RandomSource;
  readonly sleeper: Sleeper;
}

export const defaultPaceConfig: PaceConfig = {
  enabled: true,
  minMessageDelayMs: 20_000,
  maxMessageDelayMs: 90_000,
  minBatchSize: 10,
  maxBatchSize: 20,
  minBatchDelayMs: 300_000,
  maxBatchDelayMs: 900_000,
};

export const defaultRetryConfig: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 2_000,
  backoffFactor: 2,
  maxBackoffMs: 60_000,
};

export const DEFAULT_DAILY_LIMIT = 50;
export const DEFAULT_HOURLY_LIMIT = 15;
export const DEFAULT_PROGRESS_SAVE_INTERVAL = 5;
export const DEFAULT_QUOTA_SCOPE = 'default';

const assertIntegerInRange = (name: string, value: number, min: number, max: number): void => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new CampaignConfigError(`${name}=${String(value)} is out of allowed range [${String(min)}..${String(max)}]`);
  }
};

const assertOrderedRange = (minName: string, min: number, maxName: string, max: number): void => {
  assertIntegerInRange(minName, min, 0, Number.MAX_SAFE_INTEGER);
  assertIntegerInRange(maxName, max, 0, Number.MAX_SAFE_INTEGER);
  if (min > max) {
    throw new CampaignConfigError(`${minName}=${String(min)} must not exceed ${maxName}=${String(max)}`);
  }
};

const assertOptionalLimit = (name: string, value: number | null): void => {
  if (value !== null) assertIntegerInRange(name, value, 1, Number.MAX_SAFE_INTEGER);
};

export function validatePaceConfig(pacing: PaceConfig): PaceConfig {
  assertOrderedRange('minMessageDelayMs', pacing.minMessageDelayMs, 'maxMessageDelayMs', pacing.maxMessageDelayMs);
  assertOrderedRange('minBatchSize', pacing.minBatchSize, 'maxBatchSize', pacing.maxBatchSize);
  assertIntegerInRange('minBatchSize', pacing.minBatchSize, 1, Number.MAX_SAFE_INTEGER);
  assertOrderedRange('minBatchDelayMs', pacing.minBatchDelayMs, 'maxBatchDelayMs', pacing.maxBatchDelayMs);
  return pacing;
}

export function validateRetryConfig(retry: RetryConfig): RetryConfig {
  assertIntegerInRange('maxRetries', retry.maxRetries, 0, 100);
  assertIntegerInRange('baseDelayMs', retry.baseDelayMs, 0, Number.MAX_SAFE_INTEGER);
  if (!Number.isFinite(retry.backoffFactor) || retry.backoffFactor < 1) {
    throw new CampaignConfigError(`backoffFactor=${String(retry.backoffFactor)} must be a finite number >= 1`);
  }
  if (retry.maxBackoffMs !== null) {
    assertIntegerInRange('maxBackoffMs', retry.maxBackoffMs, 0, Number.MAX_SAFE_INTEGER);
  }
  return retry;
}

/** Apply defaults and validate. Throws `CampaignConfigError` on the first invalid setting. */
export function resolveRunnerConfig(config: CampaignRunnerConfig): ResolvedRunnerConfig {
  const campaignKey = config.campaignKey.trim();
  if (campaignKey === '') {
    throw new CampaignConfigError('campaignKey must not be empty');
  }

  const dryRun = config.dryRun ?? false;
  const sender = dryRun ? new DryRunSender() : config.sender;
  if (!sender) {
    throw new CampaignConfigError('A sender is required unless dryRun is enabled');
  }

  const dailyLimit = config.dailyLimit === undefined ? DEFAULT_DAILY_LIMIT : config.dailyLimit;
  const hourlyLimit = config.hourlyLimit === undefined ? DEFAULT_HOURLY_LIMIT : config.hourlyLimit;
  assertOptionalLimit('dailyLimit', dailyLimit);
  assertOptionalLimit('hourlyLimit', hourlyLimit);

  const progressSaveInterval = config.progressSaveInterval ?? DEFAULT_PROGRESS_SAVE_INTERVAL;
  assertIntegerInRange('progressSaveInterval', progressSaveInterval, 1, Number.MAX_SAFE_INTEGER);

  const quotaScope = (config.quotaScope ?? DEFAULT_QUOTA_SCOPE).trim();
  if (quotaScope === '') {
    throw new CampaignConfigError('quotaScope must not be empty');
  }

  return {
    campaignKey,
    source: config.source,
    sender,
    stateStore: config.stateStore ?? new InMemoryStateStore(),
    quotaScope,
    dailyLimit,
    hourlyLimit,
    quotaCounting: config.quotaCounting ?? 'success',
    pacing: validatePaceConfig({ ...defaultPaceConfig, ...config.pacing }),
    retry: validateRetryConfig({ ...defaultRetryConfig, ...config.retry }),
    progressSaveInterval,
    validate: config.validate ?? null,
    dryRun,
    reporters: config.reporters ?? [],
    logger: config.logger ?? noopLogger,
    clock: config.clock ?? systemClock,
    random: config.random ?? mathRandom,
    sleeper: config.sleeper ?? timerSleeper,
  };
}
