/**
 * Failure categories a Sender reports.
 *
 * - `transient`: network trouble, timeouts, temporary throttling. Retried.
 * - `permanent`: the target itself is unusable. The job is skipped.
 * - `session-invalid`: the sending session is gone. The campaign aborts.
 */
export const SendFailureKind = {
  TRANSIENT: 'transient',
  PERMANENT: 'permanent',
  SESSION_INVALID: 'session-invalid',
} as const;

export type SendFailureKind = (typeof SendFailureKind)[keyof typeof SendFailureKind];

export interface SendSuccess {
  readonly status: 'sent';
  /** Time the Sender spent delivering, in milliseconds. */
  readonly latencyMs: number;
}

export interface SendFailure {
  readonly status: 'failed';
  readonly kind: SendFailureKind;
  readonly message: string;
}

export type SendResult = SendSuccess | SendFailure;

export function sent(latencyMs = 0): SendSuccess {
  return { status: 'sent', latencyMs };
}

export function transientFailure(message: string): SendFailure {
  return { status: 'failed', kind: SendFailureKind.TRANSIENT, message };
}

export function permanentFailure(message: string): SendFailure {
  return { status: 'failed', kind: SendFailureKind.PERMANENT, message };
}

export function sessionInvalid(message: string): SendFailure {
  return { status: 'failed', kind: SendFailureKind.SESSION_INVALID, message };
}
