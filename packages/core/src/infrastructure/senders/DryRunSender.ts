import type { CampaignJob } from '../../domain/model/CampaignJob.js';
import type { SendResult } from '../../domain/model/SendResult.js';
import type { Sender } from '../../domain/ports/Sender.js';
import { sent } from '../../domain/model/SendResult.js';

/** Sender that delivers nothing and reports every job as sent. */
export class DryRunSender implements Sender {
  private readonly delivered: CampaignJob[] = [];

  send(job: CampaignJob): Promise<SendResult> {
    this.delivered.push(job);
    return Promise.resolve(sent(0));
  }

  /** Jobs that would have been delivered, in order. */
  get deliveredJobs(): readonly CampaignJob[] {
    return this.delivered;
  }
}
