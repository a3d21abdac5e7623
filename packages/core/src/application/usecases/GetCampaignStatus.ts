import type { CampaignProgress } from '../../domain/model/CampaignProgress.js';
import type { CampaignStatus, PauseReason } from '../../domain/model/CampaignStatus.js';
import type { QuotaLimitReason, QuotaState } from '../../domain/model/QuotaState.js';
import type { PaceState } from '../../domain/model/PaceState.js';
import type { CampaignContext } from '../CampaignContext.js';

export interface CampaignStatusResult {
  readonly campaignKey: string;
  readonly status: CampaignStatus;
  readonly pauseReason: PauseReason | null;
  readonly progress: CampaignProgress;
  readonly quota: QuotaState;
  readonly pace: PaceState;
}

/** Sending statistics in the shape operators read them. */
export interface CampaignStatistics {
  readonly totalSent: number;
  readonly sentToday: number;
  readonly sentThisHour: number;
  readonly dailyLimit: number | null;
  readonly hourlyLimit: number | null;
  readonly remainingToday: number | null;
  readonly remainingThisHour: number | null;
  readonly messagesUntilBatchRest: number;
  readonly lastSentAt: string | null;
  readonly canSendMore: boolean;
  readonly limitReason: QuotaLimitReason | null;
}

export class GetCampaignStatus {
  constructor(private readonly ctx: CampaignContext) {}

  execute(): CampaignStatusResult {
    return {
      campaignKey: this.ctx.campaignKey,
      status: this.ctx.status,
      pauseReason: this.ctx.pauseReason,
      progress: this.ctx.progress,
      quota: this.ctx.quota.snapshot(),
      pace: this.ctx.pace.snapshot(),
    };
  }

  statistics(): CampaignStatistics {
    const decision = this.ctx.quota.check();
    const remaining = this.ctx.quota.remaining();
    const quota = this.ctx.quota.snapshot();
    const { dailyLimit, hourlyLimit } = this.ctx.quota.limits;
    return {
      totalSent: quota.totalSent,
      sentToday: quota.sentToday,
      sentThisHour: quota.sentThisHour,
      dailyLimit,
      hourlyLimit,
      remainingToday: remaining.daily,
      remainingThisHour: remaining.hourly,
      messagesUntilBatchRest: this.ctx.pace.messagesUntilBatchRest(),
      lastSentAt: quota.lastSentAt,
      canSendMore: decision.allowed,
      limitReason: decision.allowed ? null : decision.reason,
    };
  }
}
