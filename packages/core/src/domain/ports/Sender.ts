import type { CampaignJob } from '../model/CampaignJob.js';
import type { SendResult } from '../model/SendResult.js';

/** Per-attempt information passed alongside the job. */
export interface SendContext {
  readonly campaignKey: string;
  /** 1 on the first attempt, incremented on every retry. */
  readonly attempt: number;
  readonly dryRun: boolean;
}

/**
 * Port for the actual delivery mechanism.
 *
 * Report failures through the returned result. A thrown error is classified
 * with `classifySendError()` and treated the same way.
 */
export interface Sender {
  send(job: CampaignJob, context: SendContext): Promise<SendResult>;
}
