import Database from 'better-sqlite3';

type Callback = (this: unknown, ...args: unknown[]) => void;
type BindValue = string | number | bigint | Buffer | null;
type BindRecord = Record<string, BindValue>;

interface RunContext {
  lastID: number;
  changes: number;
}

function isCallback(value: unknown): value is Callback {
  return typeof value === 'function';
}

function isRecordParam(value: unknown): value is Readonly<Record<string, unknown>> {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !Buffer.isBuffer(value) &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array)
  );
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function toBindValue(value: unknown): BindValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  return JSON.stringify(value);
}

/** Strips a `$`, `:` or `@` prefix; better-sqlite3 expects bare names. */
function toBindRecord(source: Readonly<Record<string, unknown>>): BindRecord {
  const normalized: BindRecord = {};
  for (const [key, value] of Object.entries(source)) {
    const name = key.startsWith('$') || key.startsWith(':') || key.startsWith('@') ? key.slice(1) : key;
    normalized[name] = toBindValue(value);
  }
  return normalized;
}

function splitArgs(params: readonly unknown[]): { args: unknown[]; callback: Callback | undefined } {
  const last = params[params.length - 1];
  const callback = isCallback(last) ? last : undefined;
  const raw = callback ? params.slice(0, -1) : [...params];
  const [first] = raw;

  if (raw.length === 1 && isRecordParam(first)) return { args: [toBindRecord(first)], callback };
  if (raw.length === 1 && Array.isArray(first)) return { args: first.map(toBindValue), callback };
  return { args: raw.map(toBindValue), callback };
}

/**
 * The subset of the `sqlite3` Database API that Sequelize's SQLite dialect
 * calls, implemented on better-sqlite3. Pass `{ Database: BetterSqliteDatabase }`
 * as `dialectModule`.
 */
export class BetterSqliteDatabase {
  private readonly db: Database.Database | null = null;

  constructor(filename: string, mode?: number | Callback, callback?: Callback) {
    const done = isCallback(mode) ? mode : callback;
    try {
      this.db = new Database(filename);
    } catch (err) {
      if (!done) throw err;
      setTimeout(() => {
        done(toError(err));
      }, 0);
      return;
    }
    if (done) {
      setTimeout(() => {
        done(null);
      }, 0);
    }
  }

  run(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);
    try {
      const info = this.open().prepare(sql).run(...args);
      const context: RunContext = { lastID: Number(info.lastInsertRowid), changes: info.changes };
      callback?.call(context, null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  all(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);
    try {
      const statement = this.open().prepare(sql);
      // DDL reaches all() too; it returns no rows.
      if (statement.reader) {
        const rows = statement.all(...args);
        callback?.(null, rows);
      } else {
        statement.run(...args);
        callback?.(null, []);
      }
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  exec(sql: string, callback?: Callback): this {
    try {
      this.open().exec(sql);
      callback?.(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  /** better-sqlite3 is synchronous, so statements already run in order. */
  serialize(callback?: Callback): void {
    callback?.();
  }

  close(callback?: Callback): void {
    try {
      if (this.db?.open) this.db.close();
      callback?.(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
  }

  private open(): Database.Database {
    if (!this.db) throw new Error('SQLite database failed to open');
    return this.db;
  }
}
