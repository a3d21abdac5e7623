import { describe, it, expect } from 'vitest';
import { ProgressStore } from '../../../src/application/ProgressStore.js';
import { StateSlot } from '../../../src/application/StateSlot.js';
import { createFreshProgress, applyOutcome } from '../../../src/domain/model/CampaignProgress.js';
import { isQuotaState } from '../../../src/domain/model/QuotaState.js';
import { InMemoryStateStore } from '../../../src/infrastructure/state/InMemoryStateStore.js';
import { ManualClock } from '../../support/fakes.js';

describe('ProgressStore', () => {
  it('should return null when nothing was saved', async () => {
    const store = new ProgressStore(new InMemoryStateStore(), 'spring', new ManualClock());

    expect(await store.load()).toBeNull();
  });

  it('should load what was saved', async () => {
    const clock = new ManualClock();
    const store = new ProgressStore(new InMemoryStateStore(), 'spring', clock);
    const progress = applyOutcome(createFreshProgress('spring', 1_000), 0, 'sent', 2_000);

    await store.save(progress);

    expect(await store.load()).toEqual(progress);
  });

  it('should wrap the record in a versioned envelope', async () => {
    const clock = new ManualClock(new Date(2026, 5, 10, 9, 0));
    const backing = new InMemoryStateStore();
    const store = new ProgressStore(backing, 'spring', clock);

    await store.save(createFreshProgress('spring', 1_000));

    expect(await backing.read('spring.progress')).toMatchObject({
      version: 1,
      kind: 'progress',
      namespace: 'spring',
      savedAt: new Date(2026, 5, 10, 9, 0).getTime(),
    });
  });

  it('should isolate campaigns by key', async () => {
    const backing = new InMemoryStateStore();
    const clock = new ManualClock();
    await new ProgressStore(backing, 'spring', clock).save(createFreshProgress('spring', 1));

    expect(await new ProgressStore(backing, 'autumn', clock).load()).toBeNull();
  });

  it('should treat a record from another version as absent', async () => {
    const backing = new InMemoryStateStore();
    await backing.write('spring.progress', {
      version: 2,
      kind: 'progress',
      namespace: 'spring',
      data: createFreshProgress('spring', 1),
      savedAt: 1,
    });

    expect(await new ProgressStore(backing, 'spring', new ManualClock()).load()).toBeNull();
  });

  it('should treat malformed data as absent', async () => {
    const backing = new InMemoryStateStore();
    await backing.write('spring.progress', {
      version: 1,
      kind: 'progress',
      namespace: 'spring',
      data: { lastProcessedIndex: 'three' },
      savedAt: 1,
    });

    expect(await new ProgressStore(backing, 'spring', new ManualClock()).load()).toBeNull();
  });

  it('should forget the record on clear', async () => {
    const backing = new InMemoryStateStore();
    const store = new ProgressStore(backing, 'spring', new ManualClock());
    await store.save(createFreshProgress('spring', 1));

    await store.clear();

    expect(await store.load()).toBeNull();
    expect(backing.keys()).toEqual([]);
  });
});

describe('StateSlot', () => {
  it('should reject a record stored under the same key with another kind', async () => {
    const backing = new InMemoryStateStore();
    await backing.write('default.quota', { version: 1, kind: 'pace', namespace: 'default', data: {}, savedAt: 1 });
    const slot = new StateSlot(backing, 'default', 'quota', isQuotaState, new ManualClock());

    expect(await slot.load()).toBeNull();
  });
});
