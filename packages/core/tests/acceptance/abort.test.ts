import { describe, it, expect } from 'vitest';
import { InMemoryStateStore } from '../../src/infrastructure/state/InMemoryStateStore.js';
import { ProgressStore } from '../../src/application/ProgressStore.js';
import { SessionInvalidError } from '../../src/domain/errors/CampaignErrors.js';
import { sessionInvalid } from '../../src/domain/model/SendResult.js';
import type { CampaignJob } from '../../src/domain/model/CampaignJob.js';
import type { JobSource } from '../../src/domain/ports/JobSource.js';
import { ManualClock, ScriptedSender } from '../support/fakes.js';
import { createHarness, eventTypes } from '../support/runner.js';

describe('Aborting a campaign', () => {
  it('should abort on an invalid session and keep the job for the next run', async () => {
    const stateStore = new InMemoryStateStore();
    const clock = new ManualClock();
    const sender = new ScriptedSender().script('user-2', sessionInvalid('logged out'));
    const { runner, events } = await createHarness({ stateStore, scriptedSender: sender, manualClock: clock });

    const outcome = await runner.start();

    expect(outcome.status).toBe('ABORTED');
    if (outcome.status !== 'ABORTED') return;
    expect(outcome.error).toBeInstanceOf(SessionInvalidError);
    expect(outcome.error.message).toBe('logged out');
    expect(outcome.progress.lastProcessedIndex).toBe(1);
    expect(sender.sentIds()).toEqual(['user-0', 'user-1', 'user-2']);
    expect(eventTypes(events).slice(-1)).toEqual(['campaign:aborted']);
    expect((await new ProgressStore(stateStore, 'spring', clock).load())?.lastProcessedIndex).toBe(1);
  });

  it('should abort on a thrown session error', async () => {
    const sender = new ScriptedSender().script('user-0', new SessionInvalidError('token revoked'));
    const { runner } = await createHarness({ scriptedSender: sender });

    const outcome = await runner.start();

    expect(outcome.status).toBe('ABORTED');
    expect(runner.getStatus().status).toBe('ABORTED');
  });

  it('should abort when the job source fails', async () => {
    const source: JobSource = {
      async *read(): AsyncIterable<CampaignJob> {
        yield { id: 'a', index: 0, payload: {} };
        throw new Error('file vanished');
      },
    };
    const { runner } = await createHarness({ source });

    const outcome = await runner.start();

    expect(outcome.status).toBe('ABORTED');
    expect(outcome.status === 'ABORTED' ? outcome.error.message : null).toBe('file vanished');
    expect(outcome.progress.lastProcessedIndex).toBe(0);
  });
});
