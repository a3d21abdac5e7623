import type { PauseReason } from '../model/CampaignStatus.js';
import type { CampaignSummary } from '../model/CampaignSummary.js';
import type { QuotaLimitReason } from '../model/QuotaState.js';
import type { SendFailureKind } from '../model/SendResult.js';
import type { StateRecordKind } from '../model/StateRecord.js';

/** Emitted when a run begins, fresh or resumed. */
export interface CampaignStartedEvent {
  readonly type: 'campaign:started';
  readonly campaignKey: string;
  /** First index this run will look at. */
  readonly fromIndex: number;
  readonly resumed: boolean;
  readonly dryRun: boolean;
  readonly timestamp: number;
}

/** Emitted when the job source is exhausted. */
export interface CampaignCompletedEvent {
  readonly type: 'campaign:completed';
  readonly campaignKey: string;
  readonly summary: CampaignSummary;
  readonly timestamp: number;
}

/** Emitted when a run stops early, on quota exhaustion or on `stop()`. */
export interface CampaignPausedEvent {
  readonly type: 'campaign:paused';
  readonly campaignKey: string;
  readonly reason: PauseReason;
  readonly summary: CampaignSummary;
  readonly timestamp: number;
}

/** Emitted when a fatal error ends the campaign. */
export interface CampaignAbortedEvent {
  readonly type: 'campaign:aborted';
  readonly campaignKey: string;
  readonly error: string;
  readonly summary: CampaignSummary;
  readonly timestamp: number;
}

export interface JobSentEvent {
  readonly type: 'job:sent';
  readonly campaignKey: string;
  readonly jobId: string;
  readonly jobIndex: number;
  /** Attempts it took, including the successful one. */
  readonly attempts: number;
  readonly latencyMs: number;
  readonly timestamp: number;
}

/** Emitted when a job fails for good after its retries ran out. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly campaignKey: string;
  readonly jobId: string;
  readonly jobIndex: number;
  readonly attempts: number;
  readonly kind: SendFailureKind;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for jobs rejected by validation or by a permanent send failure. */
export interface JobSkippedEvent {
  readonly type: 'job:skipped';
  readonly campaignKey: string;
  readonly jobId: string;
  readonly jobIndex: number;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted before waiting out the backoff of a retry. */
export interface JobRetriedEvent {
  readonly type: 'job:retried';
  readonly campaignKey: string;
  readonly jobId: string;
  readonly jobIndex: number;
  /** Failed attempts so far. */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly delayMs: number;
  readonly error: string;
  readonly timestamp: number;
}

export interface BatchRestEvent {
  readonly type: 'pace:batch-rest';
  readonly campaignKey: string;
  readonly messagesSinceBatch: number;
  readonly delayMs: number;
  readonly timestamp: number;
}

export interface QuotaExceededEvent {
  readonly type: 'quota:exceeded';
  readonly campaignKey: string;
  readonly reason: QuotaLimitReason;
  readonly limit: number;
  readonly sentToday: number;
  readonly sentThisHour: number;
  readonly timestamp: number;
}

/** Emitted when a state record could not be written. The run continues. */
export interface StatePersistFailedEvent {
  readonly type: 'state:persist-failed';
  readonly campaignKey: string;
  readonly record: StateRecordKind;
  readonly error: string;
  readonly timestamp: number;
}

/** Union of every event the runner emits. */
export type CampaignEvent =
  | CampaignStartedEvent
  | CampaignCompletedEvent
  | CampaignPausedEvent
  | CampaignAbortedEvent
  | JobSentEvent
  | JobFailedEvent
  | JobSkippedEvent
  | JobRetriedEvent
  | BatchRestEvent
  | QuotaExceededEvent
  | StatePersistFailedEvent;

export type EventType = CampaignEvent['type'];

export type EventPayload<T extends EventType> = Extract<CampaignEvent, { type: T }>;
