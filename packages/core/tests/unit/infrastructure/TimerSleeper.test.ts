import { describe, it, expect } from 'vitest';
import { timerSleeper } from '../../../src/infrastructure/time/TimerSleeper.js';

describe('timerSleeper', () => {
  it('should resolve true once the delay elapses', async () => {
    await expect(timerSleeper.sleep(5, new AbortController().signal)).resolves.toBe(true);
  });

  it('should resolve false when aborted during the wait', async () => {
    const controller = new AbortController();
    const waiting = timerSleeper.sleep(60_000, controller.signal);

    controller.abort();

    await expect(waiting).resolves.toBe(false);
  });

  it('should not wait at all on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(timerSleeper.sleep(60_000, controller.signal)).resolves.toBe(false);
  });
});
