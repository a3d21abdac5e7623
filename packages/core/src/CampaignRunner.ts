import type { EventType, EventPayload, CampaignEvent } from './domain/events/DomainEvents.js';
import type { CampaignOutcome } from './domain/model/CampaignOutcome.js';
import type { CampaignProgress } from './domain/model/CampaignProgress.js';
import type { CampaignRunnerConfig } from './application/CampaignConfig.js';
import type { StartOptions } from './application/usecases/RunCampaign.js';
import type { CampaignStatistics, CampaignStatusResult } from './application/usecases/GetCampaignStatus.js';
import { isPaceState } from './domain/model/PaceState.js';
import { isQuotaState } from './domain/model/QuotaState.js';
import { InvalidTransitionError } from './domain/errors/CampaignErrors.js';
import { resolveRunnerConfig } from './application/CampaignConfig.js';
import { CampaignContext } from './application/CampaignContext.js';
import { StateSlot } from './application/StateSlot.js';
import { RunCampaign } from './application/usecases/RunCampaign.js';
import { StopCampaign } from './application/usecases/StopCampaign.js';
import { GetCampaignStatus } from './application/usecases/GetCampaignStatus.js';

/**
 * Facade that drives one campaign: reads jobs in order, honours the daily and
 * hourly caps, paces messages with randomized delays and batch rests, retries
 * transient failures, and persists a resume point so an interrupted or paused
 * campaign continues where it left off.
 *
 * Delegates each operation to a dedicated use case in `application/usecases/`.
 * Holds the shared `CampaignContext` that all use cases operate on.
 *
 * @example
 * ```typescript
 * const runner = await CampaignRunner.create({
 *   campaignKey: 'spring-announcement',
 *   source: new ArrayJobSource(recipients),
 *   sender: mySender,
 *   stateStore: new FileStateStore({ directory: './state' }),
 * });
 * const outcome = await runner.start({ resume: true });
 * ```
 */
export class CampaignRunner {
  private constructor(private readonly ctx: CampaignContext) {}

  /**
   * Build a runner. Quota and pacing state are loaded from the configured
   * `StateStore` here, so statistics are accurate before `start()`.
   *
   * @throws CampaignConfigError when a setting is invalid.
   */
  static async create(config: CampaignRunnerConfig): Promise<CampaignRunner> {
    const resolved = resolveRunnerConfig(config);
    const quotaSlot = new StateSlot(resolved.stateStore, resolved.quotaScope, 'quota', isQuotaState, resolved.clock);
    const paceSlot = new StateSlot(resolved.stateStore, resolved.quotaScope, 'pace', isPaceState, resolved.clock);
    const [quota, pace] = await Promise.all([quotaSlot.load(), paceSlot.load()]);
    return new CampaignRunner(new CampaignContext(resolved, { quotaSlot, paceSlot, quota, pace }));
  }

  get campaignKey(): string {
    return this.ctx.campaignKey;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void | Promise<void>): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: CampaignEvent) => void | Promise<void>): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void | Promise<void>): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: CampaignEvent) => void | Promise<void>): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Run until the source is exhausted, a cap is hit, `stop()` is called or a
   * fatal error occurs. Never rejects for send failures; a fatal error comes
   * back as an `ABORTED` outcome.
   *
   * After a `PAUSED` outcome the same runner may be started again; it
   * continues from its in-memory resume point.
   *
   * @throws InvalidTransitionError if the campaign is running or already finished.
   */
  async start(options?: StartOptions): Promise<CampaignOutcome> {
    return new RunCampaign(this.ctx).execute(options);
  }

  /**
   * Request a graceful stop. `start()` resolves with a `PAUSED` outcome whose
   * `pauseReason` is `INTERRUPTED` once the current step finishes.
   *
   * @throws InvalidTransitionError if the campaign is not running.
   */
  stop(): void {
    new StopCampaign(this.ctx).execute();
  }

  getStatus(): CampaignStatusResult {
    return new GetCampaignStatus(this.ctx).execute();
  }

  getStatistics(): CampaignStatistics {
    return new GetCampaignStatus(this.ctx).statistics();
  }

  /** The resume point in the backing medium, or `null` when none is stored. */
  async loadStoredProgress(): Promise<CampaignProgress | null> {
    return this.ctx.progressStore.load();
  }

  /** Forget the stored resume point so the next run starts from the first job. */
  async clearProgress(): Promise<void> {
    this.assertNotRunning('clear progress');
    await this.ctx.progressStore.clear();
  }

  async resetDailyQuota(): Promise<void> {
    this.assertNotRunning('reset the daily quota');
    await this.ctx.quota.resetDaily();
  }

  async resetHourlyQuota(): Promise<void> {
    this.assertNotRunning('reset the hourly quota');
    await this.ctx.quota.resetHourly();
  }

  private assertNotRunning(action: string): void {
    if (this.ctx.status === 'RUNNING') {
      throw new InvalidTransitionError(`Cannot ${action} while the campaign is running`);
    }
  }
}
