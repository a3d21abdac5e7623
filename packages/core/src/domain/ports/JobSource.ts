import type { CampaignJob } from '../model/CampaignJob.js';

/**
 * Port for the ordered list of jobs a campaign delivers.
 *
 * Indices must be stable across runs, unique and gap-free, and jobs must be
 * yielded in ascending index order.
 */
export interface JobSource {
  /** Yield every job whose index is `>= fromIndex`. */
  read(fromIndex: number): AsyncIterable<CampaignJob>;
  /** Total number of jobs, when the source can tell without side effects. */
  count?(): Promise<number>;
}
