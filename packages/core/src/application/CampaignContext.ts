import type { CampaignEvent } from '../domain/events/DomainEvents.js';
import type { CampaignProgress, JobOutcome } from '../domain/model/CampaignProgress.js';
import type { CampaignStatus, PauseReason } from '../domain/model/CampaignStatus.js';
import type { CampaignSummary } from '../domain/model/CampaignSummary.js';
import type { PaceState } from '../domain/model/PaceState.js';
import type { QuotaState } from '../domain/model/QuotaState.js';
import type { ResolvedRunnerConfig } from './CampaignConfig.js';
import type { StateSlot } from './StateSlot.js';
import { canTransition } from '../domain/model/CampaignStatus.js';
import { applyOutcome, createFreshProgress } from '../domain/model/CampaignProgress.js';
import { summarize } from '../domain/model/CampaignSummary.js';
import { InvalidTransitionError, PersistenceError, toErrorMessage } from '../domain/errors/CampaignErrors.js';
import { PaceScheduler } from '../domain/services/PaceScheduler.js';
import { QuotaTracker } from '../domain/services/QuotaTracker.js';
import { RetryPolicy } from '../domain/services/RetryPolicy.js';
import { EventBus } from './EventBus.js';
import { ProgressStore } from './ProgressStore.js';

/** Rate-limiting state read from the backing medium before the runner is built. */
export interface HydratedRateState {
  readonly quotaSlot: StateSlot<QuotaState>;
  readonly paceSlot: StateSlot<PaceState>;
  readonly quota: QuotaState | null;
  readonly pace: PaceState | null;
}

/**
 * Mutable state holder shared across all use cases of one runner.
 *
 * Internal: not exported from the public API. Use cases receive a reference
 * to this context and mutate it as the campaign progresses.
 */
export class CampaignContext {
  readonly config: ResolvedRunnerConfig;
  readonly eventBus: EventBus;
  readonly quota: QuotaTracker;
  readonly pace: PaceScheduler;
  readonly retry: RetryPolicy;
  readonly progressStore: ProgressStore;

  status: CampaignStatus = 'IDLE';
  pauseReason: PauseReason | null = null;
  progress: CampaignProgress;
  processedThisRun = 0;
  runStartedAt = 0;
  abortController: AbortController | null = null;

  constructor(config: ResolvedRunnerConfig, rateState: HydratedRateState) {
    this.config = config;
    const reportError = (error: PersistenceError): void => {
      this.reportPersistenceError(error);
    };

    this.eventBus = new EventBus((error, event) => {
      config.logger.error('campaign.reporter_failed', { eventType: event.type, error: toErrorMessage(error) });
    });
    for (const reporter of config.reporters) {
      this.eventBus.onAny((event) => reporter.handle(event));
    }

    this.quota = new QuotaTracker({
      limits: { dailyLimit: config.dailyLimit, hourlyLimit: config.hourlyLimit },
      clock: config.clock,
      initialState: rateState.quota,
      persist: (state) => rateState.quotaSlot.save(state),
      onPersistenceError: reportError,
    });
    this.pace = new PaceScheduler({
      config: config.pacing,
      random: config.random,
      initialState: rateState.pace,
      persist: (state) => rateState.paceSlot.save(state),
      onPersistenceError: reportError,
    });
    this.retry = new RetryPolicy(config.retry);
    this.progressStore = new ProgressStore(config.stateStore, config.campaignKey, config.clock);
    this.progress = createFreshProgress(config.campaignKey, config.clock.now().getTime());
  }

  get campaignKey(): string {
    return this.config.campaignKey;
  }

  now(): number {
    return this.config.clock.now().getTime();
  }

  transitionTo(newStatus: CampaignStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new InvalidTransitionError(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  emit(event: CampaignEvent): void {
    this.eventBus.emit(event);
  }

  beginRun(): void {
    this.abortController = new AbortController();
    this.pauseReason = null;
    this.processedThisRun = 0;
    this.runStartedAt = this.now();
  }

  isStopRequested(): boolean {
    return this.abortController?.signal.aborted ?? false;
  }

  /**
   * Wait `ms` through the configured sleeper. Resolves `false` when a stop was
   * requested before or during the wait.
   */
  async wait(ms: number): Promise<boolean> {
    const controller = this.abortController;
    if (!controller || controller.signal.aborted) return false;
    if (ms <= 0) return true;
    const completed = await this.config.sleeper.sleep(ms, controller.signal);
    return completed && !controller.signal.aborted;
  }

  /** Advance the resume point past `index` and persist it on the configured cadence. */
  async recordOutcome(index: number, outcome: JobOutcome): Promise<void> {
    this.progress = applyOutcome(this.progress, index, outcome, this.now());
    this.processedThisRun += 1;
    if (this.processedThisRun % this.config.progressSaveInterval === 0) {
      await this.persistProgress();
    }
  }

  /** Write progress. A failure is reported and the run continues from memory. */
  async persistProgress(): Promise<void> {
    try {
      await this.progressStore.save(this.progress);
    } catch (error) {
      this.reportPersistenceError(new PersistenceError('progress', error));
    }
  }

  /** Write every piece of state the run holds. */
  async persistAll(): Promise<void> {
    await this.quota.flush();
    await this.pace.flush();
    await this.persistProgress();
  }

  reportPersistenceError(error: PersistenceError): void {
    const record = error.target;
    this.config.logger.error('state.persist_failed', {
      campaignKey: this.campaignKey,
      record,
      error: error.message,
    });
    this.emit({
      type: 'state:persist-failed',
      campaignKey: this.campaignKey,
      record,
      error: error.message,
      timestamp: this.now(),
    });
  }

  buildSummary(): CampaignSummary {
    const elapsed = this.runStartedAt > 0 ? this.now() - this.runStartedAt : 0;
    return summarize(this.progress, this.processedThisRun, Math.max(0, elapsed));
  }
}
