import type { StateStore } from '../../domain/ports/StateStore.js';
import type { StateRecord } from '../../domain/model/StateRecord.js';

/** Non-persistent in-memory state store. Used as the default when no custom StateStore is provided. */
export class InMemoryStateStore implements StateStore {
  private readonly records = new Map<string, StateRecord>();

  read(key: string): Promise<StateRecord | null> {
    return Promise.resolve(this.records.get(key) ?? null);
  }

  write(key: string, record: StateRecord): Promise<void> {
    this.records.set(key, record);
    return Promise.resolve();
  }

  delete(key: string): Promise<void> {
    this.records.delete(key);
    return Promise.resolve();
  }

  /** Keys currently stored, in insertion order. */
  keys(): string[] {
    return [...this.records.keys()];
  }
}
