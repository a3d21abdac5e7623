import type { CampaignProgress } from './CampaignProgress.js';
import type { PauseReason } from './CampaignStatus.js';
import type { CampaignSummary } from './CampaignSummary.js';

export interface CompletedOutcome {
  readonly status: 'COMPLETED';
  readonly progress: CampaignProgress;
  readonly summary: CampaignSummary;
}

export interface PausedOutcome {
  readonly status: 'PAUSED';
  readonly pauseReason: PauseReason;
  readonly progress: CampaignProgress;
  readonly summary: CampaignSummary;
}

export interface AbortedOutcome {
  readonly status: 'ABORTED';
  /** The fatal error that ended the campaign. */
  readonly error: Error;
  readonly progress: CampaignProgress;
  readonly summary: CampaignSummary;
}

/** How a call to `start()` ended. Progress has been persisted before it is returned. */
export type CampaignOutcome = CompletedOutcome | PausedOutcome | AbortedOutcome;
