import type { CampaignLogger } from '@cadencekit/core';
import type { CliArgs } from '../args.js';
import type { CliEnv } from '../config/env.js';
import type { CliDeps, CliIo } from '../composition.js';
import { openCampaign } from '../composition.js';
import { ExitCode } from '../exitCodes.js';

/** `cadence status`: stored progress and quota statistics, as one JSON line. */
export async function statusCommand(args: CliArgs, env: CliEnv, deps: CliDeps, io: CliIo, logger: CampaignLogger): Promise<ExitCode> {
  const campaign = await openCampaign(args, env, deps, { dryRun: true, reporters: [], logger });
  try {
    const { runner, source } = campaign;
    const total = await source.count();
    const progress = await runner.loadStoredProgress();
    io.out(
      JSON.stringify({
        event: 'cli.status',
        campaignKey: runner.campaignKey,
        totalJobs: total,
        remainingJobs: total - ((progress?.lastProcessedIndex ?? -1) + 1),
        progress,
        statistics: runner.getStatistics(),
      }),
    );
  } finally {
    await campaign.close();
  }
  return ExitCode.COMPLETED;
}
