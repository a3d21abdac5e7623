import type { CampaignContext } from '../CampaignContext.js';
import { InvalidTransitionError } from '../../domain/errors/CampaignErrors.js';

/**
 * Requests cooperative cancellation. The loop notices at its next checkpoint,
 * persists state and resolves `start()` with a `PAUSED`/`INTERRUPTED` outcome.
 * A send already in flight is allowed to finish.
 */
export class StopCampaign {
  constructor(private readonly ctx: CampaignContext) {}

  execute(): void {
    if (this.ctx.status !== 'RUNNING' || !this.ctx.abortController) {
      throw new InvalidTransitionError(`Cannot stop a campaign in status ${this.ctx.status}`);
    }
    if (this.ctx.abortController.signal.aborted) return;
    this.ctx.config.logger.info('campaign.stop_requested', { campaignKey: this.ctx.campaignKey });
    this.ctx.abortController.abort();
  }
}
