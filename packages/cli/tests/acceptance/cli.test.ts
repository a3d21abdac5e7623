import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { FakeSignals, createWorkspace } from '../support/harness.js';
import type { CliWorkspace } from '../support/harness.js';

const STAMP = '20260610-090000';

describe('cadence CLI', () => {
  let ws: CliWorkspace;

  beforeEach(async () => {
    ws = await createWorkspace();
  });

  afterEach(async () => {
    await ws.dispose();
  });

  describe('run', () => {
    it('should pause on the daily quota with exit code 75 and resume to completion', async () => {
      const first = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring'], {
        env: ws.env({ DAILY_LIMIT: '2' }),
      });

      expect(first.code).toBe(75);
      expect(first.io.lastOut()).toMatchObject({
        event: 'cli.run_finished',
        campaignKey: 'spring',
        dryRun: true,
        status: 'PAUSED',
        pauseReason: 'QUOTA_EXCEEDED',
        summary: { sent: 2, failed: 0, skipped: 0, lastProcessedIndex: 1 },
        reports: {
          results: join(ws.reportsDir, `results-${STAMP}.csv`),
          summary: join(ws.reportsDir, `summary-${STAMP}.csv`),
          analytics: join(ws.reportsDir, `analytics-${STAMP}.json`),
        },
      });

      const second = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring', '--resume'], {
        env: ws.env({ DAILY_LIMIT: '5' }),
      });

      expect(second.code).toBe(0);
      expect(second.io.lastOut()).toMatchObject({
        status: 'COMPLETED',
        summary: { sent: 3, skipped: 1, lastProcessedIndex: 3, processedThisRun: 2 },
      });
    });

    it('should write results, summary and analytics reports', async () => {
      await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring']);

      expect((await readdir(ws.reportsDir)).sort()).toEqual([
        `analytics-${STAMP}.json`,
        `results-${STAMP}.csv`,
        `summary-${STAMP}.csv`,
      ]);
      const results = await readFile(join(ws.reportsDir, `results-${STAMP}.csv`), 'utf-8');
      expect(results.split('\r\n').map((line) => line.split(',').slice(0, 5).join(','))).toEqual([
        'index,job_id,status,attempts,detail',
        '0,100,sent,1,',
        '1,200,sent,1,',
        '2,job-2,skipped,0,missing required field: phone',
        '3,400,sent,1,',
      ]);
      const analytics: unknown = JSON.parse(await readFile(join(ws.reportsDir, `analytics-${STAMP}.json`), 'utf-8'));
      expect(analytics).toMatchObject({ campaignKey: 'spring', outcome: 'COMPLETED', sent: 3, skipped: 1, successRate: 100 });
    });

    it('should key the campaign by the job list fingerprint by default', async () => {
      const { io } = await ws.run(['run', `--jobs=${ws.jobsPath}`]);

      expect(io.lastOut()).toMatchObject({ campaignKey: expect.stringMatching(/^[0-9a-f]{64}$/) });
    });

    it('should start over with --reset', async () => {
      await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring']);
      const { code, io } = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring', '--resume', '--reset']);

      expect(code).toBe(0);
      expect(io.lastOut()).toMatchObject({ summary: { sent: 3, processedThisRun: 4 } });
    });

    it('should keep state in SQLite when asked to', async () => {
      const env = ws.env({ STATE_BACKEND: 'sqlite', DAILY_LIMIT: '1' });

      expect((await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring'], { env })).code).toBe(75);
      const { io } = await ws.run(['status', `--jobs=${ws.jobsPath}`, '--campaign=spring'], { env });

      expect(await readdir(ws.stateDir)).toEqual(['state.sqlite']);
      expect(io.lastOut()).toMatchObject({ progress: { lastProcessedIndex: 0 }, statistics: { sentToday: 1 } });
    });

    it('should abort with exit code 2 when the gateway rejects the session', async () => {
      const { code, io } = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring'], {
        env: ws.env({ DRY_RUN: 'false', GATEWAY_URL: 'https://gateway.test/send', GATEWAY_TOKEN: 'test-secret' }),
        fetch: () => Promise.resolve(new Response('token expired', { status: 401 })),
      });

      expect(code).toBe(2);
      expect(io.lastOut()).toMatchObject({
        dryRun: false,
        status: 'ABORTED',
        error: 'Gateway responded 401: token expired',
        summary: { sent: 0, lastProcessedIndex: -1 },
      });
    });

    it('should stop gracefully on SIGINT with exit code 130', async () => {
      const signals = new FakeSignals();
      const { code, io } = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring'], {
        env: ws.env({ DRY_RUN: 'false', GATEWAY_URL: 'https://gateway.test/send' }),
        signals,
        fetch: () => {
          signals.emit('SIGINT');
          return Promise.resolve(new Response(null, { status: 200 }));
        },
      });

      expect(code).toBe(130);
      expect(io.lastOut()).toMatchObject({ status: 'PAUSED', pauseReason: 'INTERRUPTED', summary: { sent: 1, lastProcessedIndex: 0 } });
      expect(signals.handlers.size).toBe(0);
    });
  });

  describe('status', () => {
    it('should report stored progress and quota statistics', async () => {
      const env = ws.env({ DAILY_LIMIT: '2' });
      await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring'], { env });

      const { code, io } = await ws.run(['status', `--jobs=${ws.jobsPath}`, '--campaign=spring'], { env });

      expect(code).toBe(0);
      expect(io.lastOut()).toMatchObject({
        event: 'cli.status',
        campaignKey: 'spring',
        totalJobs: 4,
        remainingJobs: 2,
        progress: { lastProcessedIndex: 1, sentCount: 2, skippedCount: 0 },
        statistics: { sentToday: 2, dailyLimit: 2, remainingToday: 0, canSendMore: false, limitReason: 'daily-limit' },
      });
    });
  });

  describe('reset', () => {
    it('should clear progress and, with --quota, the quota counters', async () => {
      await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring']);

      const reset = await ws.run(['reset', `--jobs=${ws.jobsPath}`, '--campaign=spring', '--quota']);
      const { io } = await ws.run(['status', `--jobs=${ws.jobsPath}`, '--campaign=spring']);

      expect(reset.code).toBe(0);
      expect(reset.io.lastOut()).toEqual({ event: 'cli.reset', campaignKey: 'spring', quota: true });
      expect(io.lastOut()).toMatchObject({ remainingJobs: 4, progress: null, statistics: { sentToday: 0 } });
    });
  });

  describe('errors', () => {
    it('should print an error envelope and exit 1 without a gateway outside dry-run', async () => {
      const { code, io } = await ws.run(['run', `--jobs=${ws.jobsPath}`], { env: ws.env({ DRY_RUN: 'false' }) });

      expect(code).toBe(1);
      expect(io.outLines).toEqual([]);
      expect(io.lastErr()).toEqual({
        event: 'cli.failed',
        name: 'CampaignConfigError',
        message: 'GATEWAY_URL is required unless running with --dry-run or DRY_RUN=true',
        code: 'INVALID_CONFIG',
      });
    });

    it('should exit 1 when the job list is missing', async () => {
      const { code, io } = await ws.run(['run', `--jobs=${join(ws.directory, 'missing.csv')}`]);

      expect(code).toBe(1);
      expect(io.lastErr()).toMatchObject({ event: 'cli.failed', code: 'ENOENT', location: join(ws.directory, 'missing.csv') });
    });

    it('should exit 1 naming the state file when stored progress is corrupt', async () => {
      const file = join(ws.stateDir, 'spring.progress.json');
      await mkdir(ws.stateDir, { recursive: true });
      await writeFile(file, '{"version": 1,', 'utf-8');

      const { code, io } = await ws.run(['run', `--jobs=${ws.jobsPath}`, '--campaign=spring', '--resume']);

      expect(code).toBe(1);
      expect(io.outLines).toEqual([]);
      expect(io.lastErr()).toMatchObject({ event: 'cli.failed', name: 'CorruptStateError', code: 'CORRUPT_STATE', location: file });
    });
  });
});
