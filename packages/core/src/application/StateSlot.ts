import type { Clock } from '../domain/ports/Clock.js';
import type { StateStore } from '../domain/ports/StateStore.js';
import type { StateRecordKind } from '../domain/model/StateRecord.js';
import { STATE_RECORD_VERSION, stateKey } from '../domain/model/StateRecord.js';

/**
 * One typed record in a `StateStore`, wrapped in the versioned envelope.
 *
 * A stored record whose version, kind or namespace does not match, or whose
 * data fails the guard, loads as `null`.
 */
export class StateSlot<T> {
  readonly key: string;

  constructor(
    private readonly store: StateStore,
    private readonly namespace: string,
    private readonly kind: StateRecordKind,
    private readonly guard: (value: unknown) => value is T,
    private readonly clock: Clock,
  ) {
    this.key = stateKey(namespace, kind);
  }

  async load(): Promise<T | null> {
    const record = await this.store.read(this.key);
    if (!record) return null;
    if (record.version !== STATE_RECORD_VERSION || record.kind !== this.kind || record.namespace !== this.namespace) {
      return null;
    }
    const data = record.data;
    return this.guard(data) ? data : null;
  }

  async save(value: T): Promise<void> {
    await this.store.write(this.key, {
      version: STATE_RECORD_VERSION,
      kind: this.kind,
      namespace: this.namespace,
      data: value,
      savedAt: this.clock.now().getTime(),
    });
  }

  async clear(): Promise<void> {
    await this.store.delete(this.key);
  }
}
