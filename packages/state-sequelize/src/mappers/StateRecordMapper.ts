import { isStateRecord } from '@cadencekit/core';
import type { StateRecord } from '@cadencekit/core';
import type { StateRecordRow } from '../models/StateRecordModel.js';

/** MySQL and MariaDB drivers may hand JSON columns back as strings. */
function parseJsonColumn(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const parsed: unknown = JSON.parse(value);
  return parsed;
}

export function toRow(key: string, record: StateRecord): StateRecordRow {
  return {
    key,
    version: record.version,
    kind: record.kind,
    namespace: record.namespace,
    data: record.data,
    savedAt: record.savedAt,
  };
}

/** Rebuild the stored envelope, or `null` when the row does not hold a valid one. */
export function toDomain(row: StateRecordRow): StateRecord | null {
  const candidate: unknown = {
    version: row.version,
    kind: row.kind,
    namespace: row.namespace,
    data: parseJsonColumn(row.data),
    savedAt: Number(row.savedAt),
  };
  return isStateRecord(candidate) ? candidate : null;
}
