import { isPlainObject } from './guards.js';

export const STATE_RECORD_VERSION = 1;

export type StateRecordKind = 'progress' | 'quota' | 'pace';

/** Envelope every persisted state record is wrapped in. */
export interface StateRecord {
  readonly version: number;
  readonly kind: StateRecordKind;
  /** Campaign key for progress, quota scope for quota and pace. */
  readonly namespace: string;
  readonly data: unknown;
  /** Epoch milliseconds of the write. */
  readonly savedAt: number;
}

const KINDS: readonly string[] = ['progress', 'quota', 'pace'];

function isStateRecordKind(value: unknown): value is StateRecordKind {
  return typeof value === 'string' && KINDS.includes(value);
}

export function isStateRecord(value: unknown): value is StateRecord {
  if (!isPlainObject(value)) return false;
  return (
    typeof value['version'] === 'number' &&
    isStateRecordKind(value['kind']) &&
    typeof value['namespace'] === 'string' &&
    'data' in value &&
    typeof value['savedAt'] === 'number'
  );
}

/** Storage key of the record of `kind` under `namespace`. */
export function stateKey(namespace: string, kind: StateRecordKind): string {
  return `${namespace}.${kind}`;
}
