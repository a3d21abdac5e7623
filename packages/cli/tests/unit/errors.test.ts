import { describe, it, expect } from 'vitest';
import { CampaignConfigError, CorruptStateError, PersistenceError } from '@cadencekit/core';
import type { CampaignOutcome, CampaignProgress, CampaignSummary } from '@cadencekit/core';
import { describeCliFailure, isDebugMode } from '../../src/errors.js';
import { exitCodeFor } from '../../src/exitCodes.js';

describe('describeCliFailure', () => {
  it('should carry the name, message and code', () => {
    expect(describeCliFailure(new CampaignConfigError('DAILY_LIMIT=0 is out of allowed range'), false)).toEqual({
      event: 'cli.failed',
      name: 'CampaignConfigError',
      message: 'DAILY_LIMIT=0 is out of allowed range',
      code: 'INVALID_CONFIG',
    });
  });

  it('should include the persistence target', () => {
    expect(describeCliFailure(new PersistenceError('progress', new Error('disk full')), false)).toEqual({
      event: 'cli.failed',
      name: 'PersistenceError',
      message: 'Failed to persist progress state: disk full',
      code: 'PERSISTENCE_FAILED',
      target: 'progress',
    });
  });

  it('should name the corrupt state record', () => {
    const failure = describeCliFailure(new CorruptStateError('/state/spring.progress.json', new Error('Unexpected end')), false);

    expect(failure).toEqual({
      event: 'cli.failed',
      name: 'CorruptStateError',
      message: 'State record /state/spring.progress.json is not valid JSON: Unexpected end',
      code: 'CORRUPT_STATE',
      location: '/state/spring.progress.json',
    });
  });

  it('should keep the errno and path of a file-system error', () => {
    const error = Object.assign(new Error("ENOENT: no such file or directory, open 'jobs.csv'"), {
      code: 'ENOENT',
      path: 'jobs.csv',
    });

    expect(describeCliFailure(error, false)).toEqual({
      event: 'cli.failed',
      name: 'Error',
      message: "ENOENT: no such file or directory, open 'jobs.csv'",
      code: 'ENOENT',
      location: 'jobs.csv',
    });
  });

  it('should mark anything else as unexpected', () => {
    expect(describeCliFailure('boom', false)).toEqual({ event: 'cli.failed', name: 'Error', message: 'boom', code: 'UNEXPECTED' });
  });

  it('should include the stack only in debug mode', () => {
    const error = new Error('boom');

    expect(describeCliFailure(error, true).stack).toBe(error.stack);
    expect(describeCliFailure(error, false).stack).toBeUndefined();
  });
});

describe('isDebugMode', () => {
  it('should accept 1 and true', () => {
    expect(isDebugMode({ DEBUG: '1' })).toBe(true);
    expect(isDebugMode({ DEBUG: 'TRUE' })).toBe(true);
    expect(isDebugMode({ DEBUG: 'cadence:*' })).toBe(false);
    expect(isDebugMode({})).toBe(false);
  });
});

describe('exitCodeFor', () => {
  const progress: CampaignProgress = {
    campaignKey: 'spring',
    lastProcessedIndex: 0,
    sentCount: 1,
    failedCount: 0,
    skippedCount: 0,
    startedAt: 1781074800000,
    updatedAt: 1781074800000,
  };
  const summary: CampaignSummary = {
    campaignKey: 'spring',
    sent: 1,
    failed: 0,
    skipped: 0,
    processed: 1,
    lastProcessedIndex: 0,
    processedThisRun: 1,
    elapsedMs: 10,
  };

  it.each<[CampaignOutcome, number]>([
    [{ status: 'COMPLETED', progress, summary }, 0],
    [{ status: 'ABORTED', error: new Error('logged out'), progress, summary }, 2],
    [{ status: 'PAUSED', pauseReason: 'QUOTA_EXCEEDED', progress, summary }, 75],
    [{ status: 'PAUSED', pauseReason: 'INTERRUPTED', progress, summary }, 130],
  ])('should map %o', (outcome, code) => {
    expect(exitCodeFor(outcome)).toBe(code);
  });
});
