import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { StateStore } from '../../domain/ports/StateStore.js';
import type { StateRecord } from '../../domain/model/StateRecord.js';
import { isStateRecord } from '../../domain/model/StateRecord.js';
import { CorruptStateError } from '../../domain/errors/CampaignErrors.js';

export interface FileStateStoreOptions {
  /** Directory where state files are stored. Default: `'.cadencekit'`. */
  readonly directory?: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseStateFile(file: string, content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new CorruptStateError(file, error);
  }
}

/**
 * File-based state store that keeps one JSON file per key.
 *
 * A write goes to a temporary file in the same directory which is then
 * renamed over the target, so a crash leaves either the old or the new
 * record on disk. Writes to the same key are serialized in call order.
 *
 * Node.js only. Not suitable for browsers.
 */
export class FileStateStore implements StateStore {
  private readonly directory: string;
  private readonly queues = new Map<string, Promise<void>>();
  private tempCounter = 0;

  constructor(options?: FileStateStoreOptions) {
    this.directory = options?.directory ?? '.cadencekit';
  }

  async read(key: string): Promise<StateRecord | null> {
    const file = this.filePath(key);
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    const parsed = parseStateFile(file, content);
    return isStateRecord(parsed) ? parsed : null;
  }

  write(key: string, record: StateRecord): Promise<void> {
    return this.enqueue(key, () => this.writeAtomically(key, record));
  }

  delete(key: string): Promise<void> {
    return this.enqueue(key, () => rm(this.filePath(key), { force: true }));
  }

  private enqueue(key: string, operation: () => Promise<void>): Promise<void> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    // The previous operation's failure belongs to its own caller.
    const current = previous.then(operation, operation);
    this.queues.set(key, current);
    return current.finally(() => {
      if (this.queues.get(key) === current) this.queues.delete(key);
    });
  }

  private async writeAtomically(key: string, record: StateRecord): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.filePath(key);
    this.tempCounter += 1;
    const temp = `${target}.${String(process.pid)}.${String(this.tempCounter)}.tmp`;
    try {
      await writeFile(temp, JSON.stringify(record, null, 2), 'utf-8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  private filePath(key: string): string {
    return join(this.directory, `${key.replace(/[^A-Za-z0-9._-]/g, '_')}.json`);
  }
}
