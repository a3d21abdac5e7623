import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import Papa from 'papaparse';
import type { CampaignEvent, CampaignSummary, Reporter } from '@cadencekit/core';

export type ResultStatus = 'sent' | 'failed' | 'skipped';

export interface ResultRow {
  readonly index: number;
  readonly jobId: string;
  readonly status: ResultStatus;
  readonly attempts: number;
  readonly detail: string;
  /** ISO-8601 time the outcome was recorded. */
  readonly at: string;
}

export interface CsvReportWriterOptions {
  /** Directory the reports are written to. Created when missing. */
  readonly directory: string;
  /** Suffix of the file names. Default: local time of the final event as `YYYYMMDD-HHmmss`. */
  readonly stamp?: string;
}

/** Paths of the files written for a finished run. */
export interface WrittenReports {
  readonly results: string;
  readonly summary: string;
}

const RESULT_FIELDS = ['index', 'job_id', 'status', 'attempts', 'detail', 'at'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatStamp(date: Date): string {
  return (
    `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Reporter that records the outcome of every job and, when a run ends,
 * writes `results-<stamp>.csv` (one row per job) and `summary-<stamp>.csv`
 * (one metric per row).
 */
export class CsvReportWriter implements Reporter {
  private readonly rows: ResultRow[] = [];
  private written: WrittenReports | null = null;

  constructor(private readonly options: CsvReportWriterOptions) {}

  async handle(event: CampaignEvent): Promise<void> {
    switch (event.type) {
      case 'job:sent':
        this.record(event.jobIndex, event.jobId, 'sent', event.attempts, '', event.timestamp);
        return;
      case 'job:failed':
        this.record(event.jobIndex, event.jobId, 'failed', event.attempts, event.error, event.timestamp);
        return;
      case 'job:skipped':
        this.record(event.jobIndex, event.jobId, 'skipped', 0, event.reason, event.timestamp);
        return;
      case 'campaign:completed':
        await this.write('COMPLETED', event.summary, event.timestamp);
        return;
      case 'campaign:paused':
        await this.write(`PAUSED (${event.reason})`, event.summary, event.timestamp);
        return;
      case 'campaign:aborted':
        await this.write('ABORTED', event.summary, event.timestamp, event.error);
        return;
      default:
        return;
    }
  }

  results(): readonly ResultRow[] {
    return this.rows;
  }

  /** Files written by the last finished run, or `null` before one ended. */
  get lastWritten(): WrittenReports | null {
    return this.written;
  }

  private record(
    index: number,
    jobId: string,
    status: ResultStatus,
    attempts: number,
    detail: string,
    timestamp: number,
  ): void {
    this.rows.push({ index, jobId, status, attempts, detail, at: new Date(timestamp).toISOString() });
  }

  private async write(outcome: string, summary: CampaignSummary, timestamp: number, error?: string): Promise<void> {
    const stamp = this.options.stamp ?? formatStamp(new Date(timestamp));
    await mkdir(this.options.directory, { recursive: true });

    const results = join(this.options.directory, `results-${stamp}.csv`);
    await writeFile(
      results,
      Papa.unparse({
        fields: RESULT_FIELDS,
        data: this.rows.map((row) => [row.index, row.jobId, row.status, row.attempts, row.detail, row.at]),
      }),
      'utf-8',
    );

    const metrics: Array<[string, string | number]> = [
      ['campaign_key', summary.campaignKey],
      ['outcome', outcome],
      ['sent', summary.sent],
      ['failed', summary.failed],
      ['skipped', summary.skipped],
      ['processed', summary.processed],
      ['last_processed_index', summary.lastProcessedIndex],
      ['processed_this_run', summary.processedThisRun],
      ['elapsed_ms', summary.elapsedMs],
    ];
    if (error !== undefined) metrics.push(['error', error]);

    const summaryPath = join(this.options.directory, `summary-${stamp}.csv`);
    await writeFile(summaryPath, Papa.unparse({ fields: ['metric', 'value'], data: metrics }), 'utf-8');

    this.written = { results, summary: summaryPath };
  }
}
