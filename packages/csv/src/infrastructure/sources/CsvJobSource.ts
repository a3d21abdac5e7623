import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { createJob } from '@cadencekit/core';
import type { CampaignJob, JobSource } from '@cadencekit/core';
import { parseCsv } from '../parsers/CsvParser.js';

export interface CsvJobSourceOptions {
  /** Column whose value becomes the job id. Default: ids derived from the row index. */
  readonly idField?: string;
  /** Field delimiter. Default: detected. */
  readonly delimiter?: string;
}

interface LoadedFile {
  readonly fingerprint: string;
  readonly jobs: readonly CampaignJob[];
}

/**
 * Job source over a CSV file with a header line. Each data row is one job;
 * its index is its position among the non-blank rows.
 *
 * The file is read once and cached, so every call sees the same jobs.
 *
 * Node.js only. Not suitable for browsers.
 */
export class CsvJobSource implements JobSource {
  private loading: Promise<LoadedFile> | null = null;

  constructor(
    readonly path: string,
    private readonly options: CsvJobSourceOptions = {},
  ) {}

  async *read(fromIndex: number): AsyncIterable<CampaignJob> {
    const { jobs } = await this.load();
    for (const job of jobs.slice(Math.max(0, fromIndex))) {
      yield job;
    }
  }

  async count(): Promise<number> {
    return (await this.load()).jobs.length;
  }

  /** SHA-256 of the raw file content. A changed file yields a different campaign key. */
  async fingerprint(): Promise<string> {
    return (await this.load()).fingerprint;
  }

  private load(): Promise<LoadedFile> {
    this.loading ??= this.readFile();
    return this.loading;
  }

  private async readFile(): Promise<LoadedFile> {
    const content = await readFile(this.path);
    const text = content.toString('utf-8').replace(/^\uFEFF/, '');
    const payloads = parseCsv(text, { delimiter: this.options.delimiter });
    return {
      fingerprint: createHash('sha256').update(content).digest('hex'),
      jobs: payloads.map((payload, index) => createJob(index, payload, this.options.idField)),
    };
  }
}
