import type { CampaignJob, JobPayload } from '../../domain/model/CampaignJob.js';
import type { JobSource } from '../../domain/ports/JobSource.js';
import { createJob } from '../../domain/model/CampaignJob.js';

export interface ArrayJobSourceOptions {
  /** Payload field whose value becomes the job id. */
  readonly idField?: string;
}

/** Job source over an in-memory list. The array position is the job index. */
export class ArrayJobSource implements JobSource {
  private readonly jobs: readonly CampaignJob[];

  constructor(payloads: readonly JobPayload[], options?: ArrayJobSourceOptions) {
    this.jobs = payloads.map((payload, index) => createJob(index, payload, options?.idField));
  }

  async *read(fromIndex: number): AsyncIterable<CampaignJob> {
    for (const job of this.jobs.slice(Math.max(0, fromIndex))) {
      yield job;
    }
  }

  count(): Promise<number> {
    return Promise.resolve(this.jobs.length);
  }
}
