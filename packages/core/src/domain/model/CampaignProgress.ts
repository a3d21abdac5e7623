import { isNonNegativeInteger, isPlainObject } from './guards.js';

/** Outcome a job ends with once the runner is done with it. */
export type JobOutcome = 'sent' | 'failed' | 'skipped';

/** Durable resume point of one campaign. */
export interface CampaignProgress {
  /** Namespace the record belongs to, typically the fingerprint of the job source. */
  readonly campaignKey: string;
  /** Largest job index fully handled. `-1` before the first job. */
  readonly lastProcessedIndex: number;
  readonly sentCount: number;
  readonly failedCount: number;
  readonly skippedCount: number;
  /** Epoch milliseconds of the first run of this campaign. */
  readonly startedAt: number;
  /** Epoch milliseconds of the last change. */
  readonly updatedAt: number;
}

export function createFreshProgress(campaignKey: string, now: number): CampaignProgress {
  return {
    campaignKey,
    lastProcessedIndex: -1,
    sentCount: 0,
    failedCount: 0,
    skippedCount: 0,
    startedAt: now,
    updatedAt: now,
  };
}

/** Return a copy of `progress` advanced past the job at `index`. */
export function applyOutcome(
  progress: CampaignProgress,
  index: number,
  outcome: JobOutcome,
  now: number,
): CampaignProgress {
  return {
    ...progress,
    lastProcessedIndex: Math.max(progress.lastProcessedIndex, index),
    sentCount: progress.sentCount + (outcome === 'sent' ? 1 : 0),
    failedCount: progress.failedCount + (outcome === 'failed' ? 1 : 0),
    skippedCount: progress.skippedCount + (outcome === 'skipped' ? 1 : 0),
    updatedAt: now,
  };
}

export function processedCount(progress: CampaignProgress): number {
  return progress.sentCount + progress.failedCount + progress.skippedCount;
}

export function isCampaignProgress(value: unknown): value is CampaignProgress {
  if (!isPlainObject(value)) return false;
  return (
    typeof value['campaignKey'] === 'string' &&
    typeof value['lastProcessedIndex'] === 'number' &&
    Number.isInteger(value['lastProcessedIndex']) &&
    value['lastProcessedIndex'] >= -1 &&
    isNonNegativeInteger(value['sentCount']) &&
    isNonNegativeInteger(value['failedCount']) &&
    isNonNegativeInteger(value['skippedCount']) &&
    typeof value['startedAt'] === 'number' &&
    typeof value['updatedAt'] === 'number'
  );
}
