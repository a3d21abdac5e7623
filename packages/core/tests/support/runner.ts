import { CampaignRunner } from '../../src/CampaignRunner.js';
import type { CampaignRunnerConfig } from '../../src/application/CampaignConfig.js';
import type { CampaignEvent } from '../../src/domain/events/DomainEvents.js';
import type { JobPayload } from '../../src/domain/model/CampaignJob.js';
import { ArrayJobSource } from '../../src/infrastructure/sources/ArrayJobSource.js';
import { InMemoryStateStore } from '../../src/infrastructure/state/InMemoryStateStore.js';
import { ManualClock, NO_PACING, RecordingSleeper, ScriptedSender, recipients } from './fakes.js';

export interface Harness {
  readonly runner: CampaignRunner;
  readonly sender: ScriptedSender;
  readonly sleeper: RecordingSleeper;
  readonly clock: ManualClock;
  readonly events: CampaignEvent[];
}

export interface HarnessOptions extends Partial<CampaignRunnerConfig> {
  readonly payloads?: JobPayload[];
  readonly scriptedSender?: ScriptedSender;
  readonly manualClock?: ManualClock;
}

/** Runner over `recipients(5)` with ids from the `recipient` field, no pacing, no limits and an in-memory store. */
export async function createHarness(options: HarnessOptions = {}): Promise<Harness> {
  const { payloads, scriptedSender, manualClock, ...config } = options;
  const clock = manualClock ?? new ManualClock();
  const sender = scriptedSender ?? new ScriptedSender();
  const sleeper = new RecordingSleeper(clock);
  const events: CampaignEvent[] = [];
  const runner = await CampaignRunner.create({
    campaignKey: 'spring',
    source: new ArrayJobSource(payloads ?? recipients(5), { idField: 'recipient' }),
    sender,
    stateStore: new InMemoryStateStore(),
    dailyLimit: null,
    hourlyLimit: null,
    pacing: NO_PACING,
    retry: { maxRetries: 3, baseDelayMs: 100, backoffFactor: 2, maxBackoffMs: null },
    clock,
    sleeper,
    ...config,
  });
  runner.onAny((event) => {
    events.push(event);
  });
  return { runner, sender, sleeper, clock, events };
}

export function eventTypes(events: readonly CampaignEvent[]): string[] {
  return events.map((event) => event.type);
}
