import type { CampaignLogger } from '@cadencekit/core';
import type { CliArgs } from '../args.js';
import type { CliEnv } from '../config/env.js';
import type { CliDeps, CliIo } from '../composition.js';
import { openCampaign } from '../composition.js';
import { ExitCode } from '../exitCodes.js';

/** `cadence reset`: forget the resume point, and with `--quota` the quota counters too. */
export async function resetCommand(args: CliArgs, env: CliEnv, deps: CliDeps, io: CliIo, logger: CampaignLogger): Promise<ExitCode> {
  const campaign = await openCampaign(args, env, deps, { dryRun: true, reporters: [], logger });
  try {
    const { runner } = campaign;
    await runner.clearProgress();
    if (args.quota) {
      await runner.resetDailyQuota();
      await runner.resetHourlyQuota();
    }
    io.out(JSON.stringify({ event: 'cli.reset', campaignKey: runner.campaignKey, quota: args.quota }));
  } finally {
    await campaign.close();
  }
  return ExitCode.COMPLETED;
}
