import { describe, it, expect } from 'vitest';
import { permanentFailure, sent, transientFailure } from '../../src/domain/model/SendResult.js';
import { PermanentValidationError } from '../../src/domain/errors/CampaignErrors.js';
import { ScriptedSender } from '../support/fakes.js';
import { createHarness, eventTypes } from '../support/runner.js';

describe('Retry mechanism', () => {
  it('should retry a transient failure and succeed', async () => {
    const sender = new ScriptedSender().script('user-1', transientFailure('socket hang up'), transientFailure('socket hang up'));
    const { runner, sleeper, events } = await createHarness({ scriptedSender: sender });

    const outcome = await runner.start();

    expect(outcome.status).toBe('COMPLETED');
    expect(sender.sentIds()).toEqual(['user-0', 'user-1', 'user-1', 'user-1', 'user-2', 'user-3', 'user-4']);
    expect(sender.calls.filter((call) => call.jobId === 'user-1').map((call) => call.context.attempt)).toEqual([1, 2, 3]);
    expect(sleeper.waits).toEqual([200, 400]);
    expect(events.filter((event) => event.type === 'job:retried')).toMatchObject([
      { jobId: 'user-1', attempt: 1, maxRetries: 3, delayMs: 200, error: 'socket hang up' },
      { jobId: 'user-1', attempt: 2, maxRetries: 3, delayMs: 400, error: 'socket hang up' },
    ]);
    expect(events.find((event) => event.type === 'job:sent' && event.jobId === 'user-1')).toMatchObject({ attempts: 3 });
    expect(outcome.summary).toMatchObject({ sent: 5, failed: 0 });
  });

  it('should fail the job after exhausting all retries and move on', async () => {
    const sender = new ScriptedSender().script(
      'user-0',
      transientFailure('gateway timeout'),
      transientFailure('gateway timeout'),
      transientFailure('gateway timeout'),
      sent(),
    );
    const { runner, events } = await createHarness({ scriptedSender: sender });

    const outcome = await runner.start();

    expect(sender.calls.filter((call) => call.jobId === 'user-0')).toHaveLength(3);
    expect(events.find((event) => event.type === 'job:failed')).toMatchObject({
      jobId: 'user-0',
      attempts: 3,
      kind: 'transient',
      error: 'gateway timeout',
    });
    expect(outcome.status).toBe('COMPLETED');
    expect(outcome.summary).toMatchObject({ sent: 4, failed: 1, lastProcessedIndex: 4 });
  });

  it('should not retry when maxRetries is 0', async () => {
    const sender = new ScriptedSender().script('user-0', transientFailure('busy'));
    const { runner } = await createHarness({
      scriptedSender: sender,
      retry: { maxRetries: 0 },
      payloads: [{ recipient: 'user-0' }],
    });

    const outcome = await runner.start();

    expect(sender.calls).toHaveLength(1);
    expect(outcome.summary.failed).toBe(1);
  });

  it('should treat a thrown error as transient', async () => {
    const sender = new ScriptedSender().script('user-0', new TypeError('fetch failed'));
    const { runner, events } = await createHarness({ scriptedSender: sender, payloads: [{ recipient: 'user-0' }] });

    await runner.start();

    expect(eventTypes(events)).toEqual(['campaign:started', 'job:retried', 'job:sent', 'campaign:completed']);
  });

  it('should skip a permanent failure without retrying', async () => {
    const sender = new ScriptedSender()
      .script('user-1', permanentFailure('recipient does not exist'))
      .script('user-2', new PermanentValidationError('malformed address'));
    const { runner, events } = await createHarness({ scriptedSender: sender });

    const outcome = await runner.start();

    expect(sender.sentIds()).toEqual(['user-0', 'user-1', 'user-2', 'user-3', 'user-4']);
    expect(events.filter((event) => event.type === 'job:skipped')).toMatchObject([
      { jobId: 'user-1', reason: 'recipient does not exist' },
      { jobId: 'user-2', reason: 'malformed address' },
    ]);
    expect(outcome.summary).toMatchObject({ sent: 3, skipped: 2, failed: 0 });
  });

  it('should check the quota again before each retry', async () => {
    const sender = new ScriptedSender().script('user-0', transientFailure('busy'), transientFailure('busy'));
    const { runner } = await createHarness({ scriptedSender: sender, hourlyLimit: 2, quotaCounting: 'attempt' });

    const outcome = await runner.start();

    expect(outcome.status === 'PAUSED' ? outcome.pauseReason : null).toBe('QUOTA_EXCEEDED');
    expect(sender.calls).toHaveLength(2);
    expect(outcome.progress.lastProcessedIndex).toBe(-1);
  });

  it('should not charge failed attempts to the quota by default', async () => {
    const sender = new ScriptedSender().script('user-0', transientFailure('busy'), transientFailure('busy'));
    const { runner } = await createHarness({ scriptedSender: sender, hourlyLimit: 2 });

    const outcome = await runner.start();

    expect(sender.sentIds()).toEqual(['user-0', 'user-0', 'user-0', 'user-1']);
    expect(outcome.progress.lastProcessedIndex).toBe(1);
  });
});
