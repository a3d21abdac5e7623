import type { CampaignEvent } from '../events/DomainEvents.js';

/**
 * Observer of campaign events. A failing reporter is logged and ignored; it
 * never alters the outcome of a run.
 */
export interface Reporter {
  handle(event: CampaignEvent): void | Promise<void>;
}
