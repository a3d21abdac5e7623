import type { CampaignJob } from '../../domain/model/CampaignJob.js';
import type { CampaignOutcome } from '../../domain/model/CampaignOutcome.js';
import type { JobOutcome } from '../../domain/model/CampaignProgress.js';
import type { PauseReason } from '../../domain/model/CampaignStatus.js';
import type { QuotaDecision } from '../../domain/services/QuotaTracker.js';
import type { SendResult } from '../../domain/model/SendResult.js';
import type { CampaignContext } from '../CampaignContext.js';
import { createFreshProgress } from '../../domain/model/CampaignProgress.js';
import { InvalidTransitionError, SessionInvalidError, classifySendError, toErrorMessage } from '../../domain/errors/CampaignErrors.js';

export interface StartOptions {
  /** Continue from the stored resume point instead of starting over. Default: `false`. */
  readonly resume?: boolean;
}

/** What became of one job: a terminal outcome, or the run had to stop first. */
type JobStep =
  | { readonly kind: 'handled'; readonly outcome: JobOutcome }
  | { readonly kind: 'halted'; readonly outcome: CampaignOutcome };

type QuotaRefusal = Extract<QuotaDecision, { allowed: false }>;

/**
 * Runs the campaign loop: for every job past the resume point, check quota,
 * validate, rest between batches, send, retry transient failures, advance
 * the resume point and wait before the next job.
 */
export class RunCampaign {
  constructor(private readonly ctx: CampaignContext) {}

  async execute(options: StartOptions = {}): Promise<CampaignOutcome> {
    if (this.ctx.status !== 'IDLE' && this.ctx.status !== 'PAUSED') {
      throw new InvalidTransitionError(`Cannot start a campaign in status ${this.ctx.status}`);
    }

    const resumed = await this.prepareProgress(options.resume ?? false);
    this.ctx.transitionTo('RUNNING');
    this.ctx.beginRun();

    const fromIndex = this.ctx.progress.lastProcessedIndex + 1;
    this.ctx.config.logger.info('campaign.started', {
      campaignKey: this.ctx.campaignKey,
      fromIndex,
      resumed,
      dryRun: this.ctx.config.dryRun,
    });
    this.ctx.emit({
      type: 'campaign:started',
      campaignKey: this.ctx.campaignKey,
      fromIndex,
      resumed,
      dryRun: this.ctx.config.dryRun,
      timestamp: this.ctx.now(),
    });

    let outcome: CampaignOutcome;
    try {
      outcome = await this.processJobs(fromIndex);
    } catch (error) {
      outcome = await this.abort(error instanceof Error ? error : new Error(toErrorMessage(error)));
    }

    await this.ctx.eventBus.drain();
    return outcome;
  }

  /** Returns whether the run continues an earlier one. */
  private async prepareProgress(resume: boolean): Promise<boolean> {
    if (this.ctx.status === 'PAUSED') return true;
    if (!resume) {
      this.ctx.progress = createFreshProgress(this.ctx.campaignKey, this.ctx.now());
      return false;
    }
    const stored = await this.ctx.progressStore.load();
    if (!stored) {
      this.ctx.config.logger.info('campaign.no_stored_progress', { campaignKey: this.ctx.campaignKey });
      this.ctx.progress = createFreshProgress(this.ctx.campaignKey, this.ctx.now());
      return false;
    }
    this.ctx.progress = stored;
    return true;
  }

  private async processJobs(fromIndex: number): Promise<CampaignOutcome> {
    const iterator = this.ctx.config.source.read(fromIndex)[Symbol.asyncIterator]();
    try {
      let next = await iterator.next();
      while (!next.done) {
        const job = next.value;
        if (job.index <= this.ctx.progress.lastProcessedIndex) {
          next = await iterator.next();
          continue;
        }
        if (this.ctx.isStopRequested()) {
          return await this.pause('INTERRUPTED');
        }

        const step = await this.processJob(job);
        if (step.kind === 'halted') return step.outcome;
        await this.ctx.recordOutcome(job.index, step.outcome);

        const following = await iterator.next();
        if (step.outcome === 'sent' && !following.done) {
          const delayMs = this.ctx.pace.nextMessageDelay();
          this.ctx.config.logger.debug('campaign.message_delay', { campaignKey: this.ctx.campaignKey, delayMs });
          if (!(await this.ctx.wait(delayMs))) {
            return await this.pause('INTERRUPTED');
          }
        }
        next = following;
      }
      return await this.complete();
    } finally {
      await iterator.return?.();
    }
  }

  private async processJob(job: CampaignJob): Promise<JobStep> {
    const refusal = await this.refuseOverQuota();
    if (refusal) return refusal;

    const skipReason = this.ctx.config.validate?.(job) ?? null;
    if (skipReason !== null) {
      this.skip(job, skipReason);
      return { kind: 'handled', outcome: 'skipped' };
    }

    let failedAttempts = 0;
    for (;;) {
      if (failedAttempts > 0) {
        const retryRefusal = await this.refuseOverQuota();
        if (retryRefusal) return retryRefusal;
      }

      if (this.ctx.pace.shouldTakeBatchRest()) {
        const rested = await this.takeBatchRest();
        if (!rested) return { kind: 'halted', outcome: await this.pause('INTERRUPTED') };
      }

      const result = await this.send(job, failedAttempts + 1);
      if (this.ctx.config.quotaCounting === 'attempt') {
        await this.ctx.quota.recordSent();
      }

      if (result.status === 'sent') {
        if (this.ctx.config.quotaCounting === 'success') {
          await this.ctx.quota.recordSent();
        }
        this.ctx.pace.recordMessageForBatch();
        await this.ctx.pace.flush();
        this.ctx.config.logger.info('campaign.job_sent', {
          campaignKey: this.ctx.campaignKey,
          jobId: job.id,
          jobIndex: job.index,
          attempts: failedAttempts + 1,
        });
        this.ctx.emit({
          type: 'job:sent',
          campaignKey: this.ctx.campaignKey,
          jobId: job.id,
          jobIndex: job.index,
          attempts: failedAttempts + 1,
          latencyMs: result.latencyMs,
          timestamp: this.ctx.now(),
        });
        return { kind: 'handled', outcome: 'sent' };
      }

      failedAttempts += 1;

      if (result.kind === 'session-invalid') {
        return { kind: 'halted', outcome: await this.abort(new SessionInvalidError(result.message)) };
      }

      if (result.kind === 'permanent') {
        this.skip(job, result.message);
        return { kind: 'handled', outcome: 'skipped' };
      }

      if (!this.ctx.retry.shouldRetry(failedAttempts, result)) {
        this.ctx.config.logger.warn('campaign.job_failed', {
          campaignKey: this.ctx.campaignKey,
          jobId: job.id,
          jobIndex: job.index,
          attempts: failedAttempts,
          error: result.message,
        });
        this.ctx.emit({
          type: 'job:failed',
          campaignKey: this.ctx.campaignKey,
          jobId: job.id,
          jobIndex: job.index,
          attempts: failedAttempts,
          kind: result.kind,
          error: result.message,
          timestamp: this.ctx.now(),
        });
        return { kind: 'handled', outcome: 'failed' };
      }

      const delayMs = this.ctx.retry.backoffDelay(failedAttempts);
      this.ctx.config.logger.warn('campaign.job_retry', {
        campaignKey: this.ctx.campaignKey,
        jobId: job.id,
        attempt: failedAttempts,
        maxRetries: this.ctx.retry.maxRetries,
        delayMs,
        error: result.message,
      });
      this.ctx.emit({
        type: 'job:retried',
        campaignKey: this.ctx.campaignKey,
        jobId: job.id,
        jobIndex: job.index,
        attempt: failedAttempts,
        maxRetries: this.ctx.retry.maxRetries,
        delayMs,
        error: result.message,
        timestamp: this.ctx.now(),
      });
      if (!(await this.ctx.wait(delayMs))) {
        return { kind: 'halted', outcome: await this.pause('INTERRUPTED') };
      }
    }
  }

  private async refuseOverQuota(): Promise<JobStep | null> {
    const decision = this.ctx.quota.check();
    if (decision.allowed) return null;
    return { kind: 'halted', outcome: await this.pauseForQuota(decision) };
  }

  private async send(job: CampaignJob, attempt: number): Promise<SendResult> {
    try {
      return await this.ctx.config.sender.send(job, {
        campaignKey: this.ctx.campaignKey,
        attempt,
        dryRun: this.ctx.config.dryRun,
      });
    } catch (error) {
      return classifySendError(error);
    }
  }

  /** Returns `false` when a stop request cut the rest short. */
  private async takeBatchRest(): Promise<boolean> {
    const messagesSinceBatch = this.ctx.pace.snapshot().messagesSinceBatch;
    const delayMs = this.ctx.pace.batchRestDelay();
    await this.ctx.pace.flush();
    this.ctx.config.logger.info('campaign.batch_rest', {
      campaignKey: this.ctx.campaignKey,
      messagesSinceBatch,
      delayMs,
      nextBatchThreshold: this.ctx.pace.snapshot().nextBatchThreshold,
    });
    this.ctx.emit({
      type: 'pace:batch-rest',
      campaignKey: this.ctx.campaignKey,
      messagesSinceBatch,
      delayMs,
      timestamp: this.ctx.now(),
    });
    return this.ctx.wait(delayMs);
  }

  private skip(job: CampaignJob, reason: string): void {
    this.ctx.config.logger.warn('campaign.job_skipped', {
      campaignKey: this.ctx.campaignKey,
      jobId: job.id,
      jobIndex: job.index,
      reason,
    });
    this.ctx.emit({
      type: 'job:skipped',
      campaignKey: this.ctx.campaignKey,
      jobId: job.id,
      jobIndex: job.index,
      reason,
      timestamp: this.ctx.now(),
    });
  }

  private async pauseForQuota(decision: QuotaRefusal): Promise<CampaignOutcome> {
    const quota = this.ctx.quota.snapshot();
    this.ctx.config.logger.warn('campaign.quota_exceeded', {
      campaignKey: this.ctx.campaignKey,
      reason: decision.reason,
      limit: decision.limit,
      sentToday: quota.sentToday,
      sentThisHour: quota.sentThisHour,
    });
    this.ctx.emit({
      type: 'quota:exceeded',
      campaignKey: this.ctx.campaignKey,
      reason: decision.reason,
      limit: decision.limit,
      sentToday: quota.sentToday,
      sentThisHour: quota.sentThisHour,
      timestamp: this.ctx.now(),
    });
    return this.pause('QUOTA_EXCEEDED');
  }

  private async pause(reason: PauseReason): Promise<CampaignOutcome> {
    this.ctx.transitionTo('PAUSED');
    this.ctx.pauseReason = reason;
    await this.ctx.persistAll();
    const summary = this.ctx.buildSummary();
    this.ctx.config.logger.info('campaign.paused', {
      campaignKey: this.ctx.campaignKey,
      reason,
      lastProcessedIndex: summary.lastProcessedIndex,
      processedThisRun: summary.processedThisRun,
    });
    this.ctx.emit({
      type: 'campaign:paused',
      campaignKey: this.ctx.campaignKey,
      reason,
      summary,
      timestamp: this.ctx.now(),
    });
    return { status: 'PAUSED', pauseReason: reason, progress: this.ctx.progress, summary };
  }

  private async complete(): Promise<CampaignOutcome> {
    this.ctx.transitionTo('COMPLETED');
    await this.ctx.persistAll();
    const summary = this.ctx.buildSummary();
    this.ctx.config.logger.info('campaign.completed', {
      campaignKey: this.ctx.campaignKey,
      sent: summary.sent,
      failed: summary.failed,
      skipped: summary.skipped,
      elapsedMs: summary.elapsedMs,
    });
    this.ctx.emit({
      type: 'campaign:completed',
      campaignKey: this.ctx.campaignKey,
      summary,
      timestamp: this.ctx.now(),
    });
    return { status: 'COMPLETED', progress: this.ctx.progress, summary };
  }

  private async abort(error: Error): Promise<CampaignOutcome> {
    if (this.ctx.status === 'RUNNING') {
      this.ctx.transitionTo('ABORTED');
    }
    await this.ctx.persistAll();
    const summary = this.ctx.buildSummary();
    this.ctx.config.logger.error('campaign.aborted', {
      campaignKey: this.ctx.campaignKey,
      error: error.message,
      errorName: error.name,
      lastProcessedIndex: summary.lastProcessedIndex,
    });
    this.ctx.emit({
      type: 'campaign:aborted',
      campaignKey: this.ctx.campaignKey,
      error: error.message,
      summary,
      timestamp: this.ctx.now(),
    });
    return { status: 'ABORTED', error, progress: this.ctx.progress, summary };
  }
}
