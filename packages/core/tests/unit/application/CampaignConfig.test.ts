import { describe, it, expect } from 'vitest';
import { resolveRunnerConfig, defaultPaceConfig } from '../../../src/application/CampaignConfig.js';
import { CampaignConfigError } from '../../../src/domain/errors/CampaignErrors.js';
import { DryRunSender } from '../../../src/infrastructure/senders/DryRunSender.js';
import { ArrayJobSource } from '../../../src/infrastructure/sources/ArrayJobSource.js';
import { ScriptedSender } from '../../support/fakes.js';

const source = new ArrayJobSource([]);

describe('resolveRunnerConfig', () => {
  it('should apply the documented defaults', () => {
    const config = resolveRunnerConfig({ campaignKey: 'spring', source, sender: new ScriptedSender() });

    expect(config).toMatchObject({
      dailyLimit: 50,
      hourlyLimit: 15,
      quotaCounting: 'success',
      quotaScope: 'default',
      progressSaveInterval: 5,
      dryRun: false,
      retry: { maxRetries: 3, baseDelayMs: 2_000, backoffFactor: 2, maxBackoffMs: 60_000 },
    });
    expect(config.pacing).toEqual(defaultPaceConfig);
  });

  it('should replace the sender in dry-run mode', () => {
    const config = resolveRunnerConfig({ campaignKey: 'spring', source, dryRun: true, sender: new ScriptedSender() });

    expect(config.sender).toBeInstanceOf(DryRunSender);
  });

  it('should require a sender outside dry-run mode', () => {
    expect(() => resolveRunnerConfig({ campaignKey: 'spring', source })).toThrow(CampaignConfigError);
  });

  it('should accept null to disable a limit', () => {
    const config = resolveRunnerConfig({ campaignKey: 'spring', source, dryRun: true, dailyLimit: null, hourlyLimit: null });

    expect(config.dailyLimit).toBeNull();
    expect(config.hourlyLimit).toBeNull();
  });

  it('should reject a zero limit', () => {
    expect(() => resolveRunnerConfig({ campaignKey: 'spring', source, dryRun: true, hourlyLimit: 0 })).toThrow(
      'hourlyLimit=0 is out of allowed range',
    );
  });

  it('should reject an inverted delay range', () => {
    expect(() =>
      resolveRunnerConfig({
        campaignKey: 'spring',
        source,
        dryRun: true,
        pacing: { minMessageDelayMs: 5_000, maxMessageDelayMs: 1_000 },
      }),
    ).toThrow('minMessageDelayMs=5000 must not exceed maxMessageDelayMs=1000');
  });

  it('should reject a batch size of zero', () => {
    expect(() =>
      resolveRunnerConfig({ campaignKey: 'spring', source, dryRun: true, pacing: { minBatchSize: 0 } }),
    ).toThrow(CampaignConfigError);
  });

  it('should reject a backoff factor below 1', () => {
    expect(() =>
      resolveRunnerConfig({ campaignKey: 'spring', source, dryRun: true, retry: { backoffFactor: 0.5 } }),
    ).toThrow('backoffFactor=0.5 must be a finite number >= 1');
  });

  it('should reject an empty campaign key', () => {
    expect(() => resolveRunnerConfig({ campaignKey: '  ', source, dryRun: true })).toThrow('campaignKey must not be empty');
  });
});
