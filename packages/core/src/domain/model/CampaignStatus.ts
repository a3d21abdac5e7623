/**
 * Finite state machine for the campaign lifecycle.
 *
 * Valid transitions:
 * - `IDLE` → `RUNNING`
 * - `RUNNING` → `PAUSED` | `COMPLETED` | `ABORTED`
 * - `PAUSED` → `RUNNING`
 * - `COMPLETED`, `ABORTED` → (terminal)
 */
export const CampaignStatus = {
  IDLE: 'IDLE',
  RUNNING: 'RUNNING',
  PAUSED: 'PAUSED',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
} as const;

export type CampaignStatus = (typeof CampaignStatus)[keyof typeof CampaignStatus];

/** Why a run stopped short of the end of the job source. */
export const PauseReason = {
  QUOTA_EXCEEDED: 'QUOTA_EXCEEDED',
  INTERRUPTED: 'INTERRUPTED',
} as const;

export type PauseReason = (typeof PauseReason)[keyof typeof PauseReason];

const VALID_TRANSITIONS: Record<CampaignStatus, readonly CampaignStatus[]> = {
  [CampaignStatus.IDLE]: [CampaignStatus.RUNNING],
  [CampaignStatus.RUNNING]: [CampaignStatus.PAUSED, CampaignStatus.COMPLETED, CampaignStatus.ABORTED],
  [CampaignStatus.PAUSED]: [CampaignStatus.RUNNING],
  [CampaignStatus.COMPLETED]: [],
  [CampaignStatus.ABORTED]: [],
};

/** Check whether a state transition is valid according to the campaign lifecycle FSM. */
export function canTransition(from: CampaignStatus, to: CampaignStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
