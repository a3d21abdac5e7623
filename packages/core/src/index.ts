// Main entry point
export { CampaignRunner } from './CampaignRunner.js';
export type { CampaignRunnerConfig, ResolvedRunnerConfig, JobValidateFn } from './application/CampaignConfig.js';
export {
  resolveRunnerConfig,
  validatePaceConfig,
  validateRetryConfig,
  defaultPaceConfig,
  defaultRetryConfig,
  DEFAULT_DAILY_LIMIT,
  DEFAULT_HOURLY_LIMIT,
  DEFAULT_PROGRESS_SAVE_INTERVAL,
  DEFAULT_QUOTA_SCOPE,
} from './application/CampaignConfig.js';

// Domain model
export type { CampaignJob, JobPayload } from './domain/model/CampaignJob.js';
export { createJob } from './domain/model/CampaignJob.js';
export { CampaignStatus, PauseReason, canTransition } from './domain/model/CampaignStatus.js';
export type { CampaignProgress, JobOutcome } from './domain/model/CampaignProgress.js';
export { createFreshProgress, applyOutcome, processedCount, isCampaignProgress } from './domain/model/CampaignProgress.js';
export type { CampaignSummary } from './domain/model/CampaignSummary.js';
export type {
  CampaignOutcome,
  CompletedOutcome,
  PausedOutcome,
  AbortedOutcome,
} from './domain/model/CampaignOutcome.js';
export type { QuotaState, QuotaLimitReason } from './domain/model/QuotaState.js';
export { EMPTY_QUOTA_STATE, isQuotaState } from './domain/model/QuotaState.js';
export type { PaceState } from './domain/model/PaceState.js';
export { isPaceState } from './domain/model/PaceState.js';
export type { SendResult, SendSuccess, SendFailure } from './domain/model/SendResult.js';
export { SendFailureKind, sent, transientFailure, permanentFailure, sessionInvalid } from './domain/model/SendResult.js';
export type { StateRecord, StateRecordKind } from './domain/model/StateRecord.js';
export { STATE_RECORD_VERSION, isStateRecord, stateKey } from './domain/model/StateRecord.js';
export { toLocalDateKey, toLocalHourKey } from './domain/model/calendar.js';

// Errors
export type { CampaignErrorCode } from './domain/errors/CampaignErrors.js';
export {
  CampaignError,
  TransientSendError,
  PermanentValidationError,
  SessionInvalidError,
  PersistenceError,
  CorruptStateError,
  CampaignConfigError,
  InvalidTransitionError,
  classifySendError,
  toErrorMessage,
} from './domain/errors/CampaignErrors.js';

// Domain services
export { QuotaTracker } from './domain/services/QuotaTracker.js';
export type {
  QuotaLimits,
  QuotaCounting,
  QuotaDecision,
  QuotaRemaining,
  QuotaTrackerOptions,
} from './domain/services/QuotaTracker.js';
export { PaceScheduler } from './domain/services/PaceScheduler.js';
export type { PaceConfig, PaceSchedulerOptions } from './domain/services/PaceScheduler.js';
export { RetryPolicy } from './domain/services/RetryPolicy.js';
export type { RetryConfig } from './domain/services/RetryPolicy.js';

// Application
export { ProgressStore } from './application/ProgressStore.js';
export { StateSlot } from './application/StateSlot.js';
export type { StartOptions } from './application/usecases/RunCampaign.js';
export type { CampaignStatusResult, CampaignStatistics } from './application/usecases/GetCampaignStatus.js';

// Ports (for custom implementations)
export type { JobSource } from './domain/ports/JobSource.js';
export type { Sender, SendContext } from './domain/ports/Sender.js';
export type { StateStore } from './domain/ports/StateStore.js';
export type { Reporter } from './domain/ports/Reporter.js';
export type { Clock } from './domain/ports/Clock.js';
export { systemClock } from './domain/ports/Clock.js';
export type { Sleeper } from './domain/ports/Sleeper.js';
export type { RandomSource } from './domain/ports/RandomSource.js';
export { mathRandom, drawInclusive } from './domain/ports/RandomSource.js';
export type { CampaignLogger, LogFields, LogLevel } from './domain/ports/CampaignLogger.js';
export { noopLogger } from './domain/ports/CampaignLogger.js';

// Domain events
export type {
  CampaignEvent,
  EventType,
  EventPayload,
  CampaignStartedEvent,
  CampaignCompletedEvent,
  CampaignPausedEvent,
  CampaignAbortedEvent,
  JobSentEvent,
  JobFailedEvent,
  JobSkippedEvent,
  JobRetriedEvent,
  BatchRestEvent,
  QuotaExceededEvent,
  StatePersistFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { ArrayJobSource } from './infrastructure/sources/ArrayJobSource.js';
export type { ArrayJobSourceOptions } from './infrastructure/sources/ArrayJobSource.js';
export { DryRunSender } from './infrastructure/senders/DryRunSender.js';
export { InMemoryStateStore } from './infrastructure/state/InMemoryStateStore.js';
export { FileStateStore } from './infrastructure/state/FileStateStore.js';
export type { FileStateStoreOptions } from './infrastructure/state/FileStateStore.js';
export { timerSleeper } from './infrastructure/time/TimerSleeper.js';
export { createSeededRandom } from './infrastructure/time/SeededRandom.js';
export { ConsoleJsonLogger, isLogLevel } from './infrastructure/logging/ConsoleJsonLogger.js';
export type { ConsoleJsonLoggerOptions } from './infrastructure/logging/ConsoleJsonLogger.js';
export { AnalyticsReporter, categorizeError } from './infrastructure/reporting/AnalyticsReporter.js';
export type {
  AnalyticsSnapshot,
  ErrorCategory,
  ErrorCount,
  HourlyStats,
  LatencyStats,
} from './infrastructure/reporting/AnalyticsReporter.js';
