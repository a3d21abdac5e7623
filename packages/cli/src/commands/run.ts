import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { AnalyticsReporter, systemClock } from '@cadencekit/core';
import type { CampaignLogger, CampaignOutcome, CampaignRunner } from '@cadencekit/core';
import { CsvReportWriter, formatStamp } from '@cadencekit/csv';
import type { CliArgs } from '../args.js';
import type { CliEnv } from '../config/env.js';
import type { CliDeps, CliIo, SignalSource } from '../composition.js';
import { openCampaign } from '../composition.js';
import { exitCodeFor } from '../exitCodes.js';
import type { ExitCode } from '../exitCodes.js';

const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

function describeOutcome(outcome: CampaignOutcome): Record<string, unknown> {
  switch (outcome.status) {
    case 'COMPLETED':
      return { status: outcome.status };
    case 'PAUSED':
      return { status: outcome.status, pauseReason: outcome.pauseReason };
    case 'ABORTED':
      return { status: outcome.status, error: outcome.error.message };
  }
}

/** Start the runner, turning SIGINT and SIGTERM into a graceful stop while it runs. */
async function startWithSignals(
  runner: CampaignRunner,
  signals: SignalSource | undefined,
  resume: boolean,
  logger: CampaignLogger,
): Promise<CampaignOutcome> {
  const onSignal = (): void => {
    if (runner.getStatus().status !== 'RUNNING') return;
    logger.warn('cli.stop_signal');
    runner.stop();
  };

  for (const signal of STOP_SIGNALS) signals?.once(signal, onSignal);
  try {
    return await runner.start({ resume });
  } finally {
    for (const signal of STOP_SIGNALS) signals?.off(signal, onSignal);
  }
}

/**
 * `cadence run`: deliver the job list, honouring the quota, then write the
 * results, summary and analytics reports.
 */
export async function runCommand(args: CliArgs, env: CliEnv, deps: CliDeps, io: CliIo, logger: CampaignLogger): Promise<ExitCode> {
  const dryRun = args.dryRun ?? env.dryRun;
  const stamp = formatStamp((deps.clock ?? systemClock).now());
  const analytics = new AnalyticsReporter();
  const csvReport = new CsvReportWriter({ directory: env.reportsDir, stamp });

  const campaign = await openCampaign(args, env, deps, { dryRun, reporters: [analytics, csvReport], logger });
  const { runner } = campaign;

  let outcome: CampaignOutcome;
  try {
    if (args.reset) {
      await runner.clearProgress();
      logger.info('cli.progress_cleared', { campaignKey: runner.campaignKey });
    }
    outcome = await startWithSignals(runner, deps.signals, args.resume, logger);
  } finally {
    await campaign.close();
  }

  await mkdir(env.reportsDir, { recursive: true });
  const analyticsPath = join(env.reportsDir, `analytics-${stamp}.json`);
  await writeFile(analyticsPath, `${JSON.stringify(analytics.snapshot(), null, 2)}\n`, 'utf-8');

  io.out(
    JSON.stringify({
      event: 'cli.run_finished',
      campaignKey: runner.campaignKey,
      dryRun,
      ...describeOutcome(outcome),
      summary: outcome.summary,
      reports: {
        results: csvReport.lastWritten?.results ?? null,
        summary: csvReport.lastWritten?.summary ?? null,
        analytics: analyticsPath,
      },
    }),
  );

  return exitCodeFor(outcome);
}
