import type { Clock } from '../domain/ports/Clock.js';
import type { StateStore } from '../domain/ports/StateStore.js';
import type { CampaignProgress } from '../domain/model/CampaignProgress.js';
import { isCampaignProgress } from '../domain/model/CampaignProgress.js';
import { StateSlot } from './StateSlot.js';

/** Durable resume point of a single campaign, keyed by its campaign key. */
export class ProgressStore {
  private readonly slot: StateSlot<CampaignProgress>;

  constructor(
    store: StateStore,
    readonly campaignKey: string,
    clock: Clock,
  ) {
    this.slot = new StateSlot(store, campaignKey, 'progress', isCampaignProgress, clock);
  }

  /** The stored progress, or `null` when there is none or it belongs to another campaign. */
  async load(): Promise<CampaignProgress | null> {
    const progress = await this.slot.load();
    return progress && progress.campaignKey === this.campaignKey ? progress : null;
  }

  async save(progress: CampaignProgress): Promise<void> {
    await this.slot.save(progress);
  }

  async clear(): Promise<void> {
    await this.slot.clear();
  }
}
