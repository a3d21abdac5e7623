import { isNonNegativeInteger, isPlainObject } from './guards.js';

export interface PaceState {
  /** Messages counted since the last batch rest. */
  readonly messagesSinceBatch: number;
  /** Count at which the next batch rest is due. */
  readonly nextBatchThreshold: number;
}

export function isPaceState(value: unknown): value is PaceState {
  if (!isPlainObject(value)) return false;
  return (
    isNonNegativeInteger(value['messagesSinceBatch']) &&
    isNonNegativeInteger(value['nextBatchThreshold']) &&
    value['nextBatchThreshold'] >= 1
  );
}
