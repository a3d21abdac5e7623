import type { StateRecord } from '../model/StateRecord.js';

/**
 * Port for the durable backing medium of campaign state.
 *
 * Implement this interface to keep progress, quota and pacing records in a
 * database, a file system or any other storage backend. A `write` must replace
 * the whole record atomically: a reader sees either the previous record or the
 * new one, never a partial write.
 */
export interface StateStore {
  /** Retrieve the record stored under `key`, or `null` when there is none. */
  read(key: string): Promise<StateRecord | null>;
  /** Atomically replace the record stored under `key`. */
  write(key: string, record: StateRecord): Promise<void>;
  /** Remove the record stored under `key`. Removing a missing key is not an error. */
  delete(key: string): Promise<void>;
}
