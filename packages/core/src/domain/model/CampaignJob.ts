/** Opaque per-target data handed to the Sender untouched. */
export type JobPayload = Readonly<Record<string, unknown>>;

/** One unit of outbound work. Immutable once produced by a `JobSource`. */
export interface CampaignJob {
  /** Stable identifier of the target, such as a row key or recipient address. */
  readonly id: string;
  /** Zero-based position in the source sequence. Never changes between runs. */
  readonly index: number;
  readonly payload: JobPayload;
}

/**
 * Build a job from a payload. When `idField` names a string or numeric field
 * of the payload, its value becomes the job id; otherwise the id is derived
 * from the index.
 */
export function createJob(index: number, payload: JobPayload, idField?: string): CampaignJob {
  const candidate = idField !== undefined ? payload[idField] : undefined;
  const id =
    typeof candidate === 'string' && candidate.trim() !== ''
      ? candidate.trim()
      : typeof candidate === 'number'
        ? String(candidate)
        : `job-${String(index)}`;
  return { id, index, payload };
}
