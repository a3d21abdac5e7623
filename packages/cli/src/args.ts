import { parseArgs } from 'node:util';
import { CampaignConfigError, toErrorMessage } from '@cadencekit/core';

export type CliCommand = 'run' | 'status' | 'reset';

export interface CliArgs {
  readonly command: CliCommand;
  /** Path of the CSV job list. */
  readonly jobs: string;
  /** Campaign key. Default: fingerprint of the job list. */
  readonly campaign: string | undefined;
  readonly resume: boolean;
  /** `undefined` leaves the choice to `DRY_RUN`. */
  readonly dryRun: boolean | undefined;
  /** `run`: clear stored progress first. `reset`: also reset the quota counters. */
  readonly reset: boolean;
  readonly quota: boolean;
}

export const USAGE = [
  'Usage:',
  '  cadence run --jobs=<file.csv> [--campaign=<key>] [--resume] [--dry-run] [--reset]',
  '  cadence status --jobs=<file.csv> [--campaign=<key>]',
  '  cadence reset --jobs=<file.csv> [--campaign=<key>] [--quota]',
].join('\n');

const COMMANDS: readonly string[] = ['run', 'status', 'reset'];

function isCommand(value: string | undefined): value is CliCommand {
  return value !== undefined && COMMANDS.includes(value);
}

const OPTIONS = {
  jobs: { type: 'string' },
  campaign: { type: 'string' },
  resume: { type: 'boolean' },
  'dry-run': { type: 'boolean' },
  reset: { type: 'boolean' },
  quota: { type: 'boolean' },
} as const;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], allowPositionals: true, strict: true, options: OPTIONS });
  } catch (err) {
    throw new CampaignConfigError(`${toErrorMessage(err)}\n${USAGE}`);
  }
}

/** @throws CampaignConfigError on an unknown command, an unknown flag or a missing `--jobs`. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readArgs(argv);

  const [command, ...extra] = positionals;
  if (!isCommand(command) || extra.length > 0) {
    throw new CampaignConfigError(`Unknown command: ${positionals.join(' ') || '(none)'}\n${USAGE}`);
  }

  const jobs = values.jobs?.trim();
  if (!jobs) {
    throw new CampaignConfigError(`--jobs is required\n${USAGE}`);
  }

  return {
    command,
    jobs,
    campaign: values.campaign?.trim() || undefined,
    resume: values.resume === true,
    dryRun: values['dry-run'],
    reset: values.reset === true,
    quota: values.quota === true,
  };
}
