import { SendFailureKind } from '../model/SendResult.js';
import type { SendFailure } from '../model/SendResult.js';
import type { StateRecordKind } from '../model/StateRecord.js';

export type CampaignErrorCode =
  | 'TRANSIENT_SEND'
  | 'PERMANENT_VALIDATION'
  | 'SESSION_INVALID'
  | 'PERSISTENCE_FAILED'
  | 'CORRUPT_STATE'
  | 'INVALID_CONFIG'
  | 'INVALID_TRANSITION';

/** Base class of every error the orchestrator raises or reports. */
export class CampaignError extends Error {
  readonly code: CampaignErrorCode;

  constructor(code: CampaignErrorCode, message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'CampaignError';
    this.code = code;
  }
}

/** A delivery attempt failed in a way that may succeed later. */
export class TransientSendError extends CampaignError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super('TRANSIENT_SEND', message, options);
    this.name = 'TransientSendError';
  }
}

/** The job's target can never be delivered to. */
export class PermanentValidationError extends CampaignError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super('PERMANENT_VALIDATION', message, options);
    this.name = 'PermanentValidationError';
  }
}

/** The sending session is no longer usable. Aborts the campaign. */
export class SessionInvalidError extends CampaignError {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super('SESSION_INVALID', message, options);
    this.name = 'SessionInvalidError';
  }
}

/** Writing a state record to the backing medium failed. */
export class PersistenceError extends CampaignError {
  /** Which record could not be written. */
  readonly target: StateRecordKind;

  constructor(target: StateRecordKind, cause: unknown) {
    super('PERSISTENCE_FAILED', `Failed to persist ${target} state: ${toErrorMessage(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.target = target;
  }
}

/** A stored state record exists but cannot be decoded. */
export class CorruptStateError extends CampaignError {
  /** File or row the record was read from. */
  readonly location: string;

  constructor(location: string, cause: unknown) {
    super('CORRUPT_STATE', `State record ${location} is not valid JSON: ${toErrorMessage(cause)}`, { cause });
    this.name = 'CorruptStateError';
    this.location = location;
  }
}

export class CampaignConfigError extends CampaignError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'CampaignConfigError';
  }
}

export class InvalidTransitionError extends CampaignError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message);
    this.name = 'InvalidTransitionError';
  }
}

export function toErrorMessage(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (typeof reason === 'string') return reason;
  return String(reason);
}

/**
 * Map anything a Sender threw to a failure result. Unknown errors count as
 * transient so that they are retried before the job is given up on.
 */
export function classifySendError(error: unknown): SendFailure {
  const message = toErrorMessage(error);
  if (error instanceof SessionInvalidError) {
    return { status: 'failed', kind: SendFailureKind.SESSION_INVALID, message };
  }
  if (error instanceof PermanentValidationError) {
    return { status: 'failed', kind: SendFailureKind.PERMANENT, message };
  }
  return { status: 'failed', kind: SendFailureKind.TRANSIENT, message };
}
