import type { CampaignProgress } from './CampaignProgress.js';
import { processedCount } from './CampaignProgress.js';

/** Totals reported when a run ends. Counts are cumulative across resumed runs. */
export interface CampaignSummary {
  readonly campaignKey: string;
  readonly sent: number;
  readonly failed: number;
  readonly skipped: number;
  readonly processed: number;
  readonly lastProcessedIndex: number;
  /** Jobs handled by this run only. */
  readonly processedThisRun: number;
  /** Duration of this run in milliseconds. */
  readonly elapsedMs: number;
}

export function summarize(progress: CampaignProgress, processedThisRun: number, elapsedMs: number): CampaignSummary {
  return {
    campaignKey: progress.campaignKey,
    sent: progress.sentCount,
    failed: progress.failedCount,
    skipped: progress.skippedCount,
    processed: processedCount(progress),
    lastProcessedIndex: progress.lastProcessedIndex,
    processedThisRun,
    elapsedMs,
  };
}
