import { setTimeout as delay } from 'node:timers/promises';
import type { Sleeper } from '../../domain/ports/Sleeper.js';

/** Sleeper backed by Node timers. An abort resolves the wait early with `false`. */
export const timerSleeper: Sleeper = {
  async sleep(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    if (ms <= 0) return true;
    try {
      await delay(ms, undefined, { signal });
      return true;
    } catch (error) {
      if (signal.aborted) return false;
      throw error;
    }
  },
};
