import type { CampaignOutcome } from '@cadencekit/core';

export const ExitCode = {
  COMPLETED: 0,
  ERROR: 1,
  ABORTED: 2,
  /** EX_TEMPFAIL: run again once the quota window has passed. */
  QUOTA_PAUSED: 75,
  /** 128 + SIGINT. */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(outcome: CampaignOutcome): ExitCode {
  switch (outcome.status) {
    case 'COMPLETED':
      return ExitCode.COMPLETED;
    case 'ABORTED':
      return ExitCode.ABORTED;
    case 'PAUSED':
      return outcome.pauseReason === 'QUOTA_EXCEEDED' ? ExitCode.QUOTA_PAUSED : ExitCode.INTERRUPTED;
  }
}
