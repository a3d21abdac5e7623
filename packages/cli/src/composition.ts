import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { CampaignConfigError, CampaignRunner, FileStateStore, toErrorMessage } from '@cadencekit/core';
import type { CampaignLogger, Clock, Reporter, Sender, Sleeper, StateStore } from '@cadencekit/core';
import { CsvJobSource, requiredFields } from '@cadencekit/csv';
import { SequelizeStateStore } from '@cadencekit/state-sequelize';
import type { CliArgs } from './args.js';
import type { CliEnv } from './config/env.js';
import { HttpGatewaySender } from './senders/HttpGatewaySender.js';
import type { FetchFn } from './senders/HttpGatewaySender.js';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

/** The part of `process` used to react to Ctrl+C and termination. */
export interface SignalSource {
  once(signal: NodeJS.Signals, handler: () => void): unknown;
  off(signal: NodeJS.Signals, handler: () => void): unknown;
}

/** Everything the CLI takes from its surroundings. */
export interface CliDeps {
  readonly env: NodeJS.ProcessEnv;
  readonly io?: CliIo;
  readonly signals?: SignalSource;
  readonly logger?: CampaignLogger;
  readonly fetch?: FetchFn;
  readonly clock?: Clock;
  readonly sleeper?: Sleeper;
}

export interface OpenedCampaign {
  readonly runner: CampaignRunner;
  readonly source: CsvJobSource;
  /** Release the state backend. */
  close(): Promise<void>;
}

interface StateBackend {
  readonly store: StateStore;
  close(): Promise<void>;
}

type SqliteSupport = typeof import('@cadencekit/state-sequelize/sqlite');

/** better-sqlite3 is an optional dependency; only the sqlite backend loads it. */
async function loadSqliteSupport(): Promise<SqliteSupport> {
  try {
    return await import('@cadencekit/state-sequelize/sqlite');
  } catch (error) {
    throw new CampaignConfigError(
      `STATE_BACKEND=sqlite needs the optional better-sqlite3 package (${toErrorMessage(error)})`,
    );
  }
}

async function openStateBackend(env: CliEnv): Promise<StateBackend> {
  if (env.stateBackend === 'sqlite') {
    const { createSqliteSequelize } = await loadSqliteSupport();
    await mkdir(dirname(env.stateDb), { recursive: true });
    const sequelize = createSqliteSequelize(env.stateDb);
    const store = new SequelizeStateStore(sequelize);
    await store.initialize();
    return { store, close: () => sequelize.close() };
  }
  return { store: new FileStateStore({ directory: env.stateDir }), close: () => Promise.resolve() };
}

function createSender(env: CliEnv, dryRun: boolean, fetchFn: FetchFn | undefined): Sender | undefined {
  if (dryRun) return undefined;
  if (!env.gateway) {
    throw new CampaignConfigError('GATEWAY_URL is required unless running with --dry-run or DRY_RUN=true');
  }
  return new HttpGatewaySender({
    url: env.gateway.url,
    token: env.gateway.token,
    timeoutMs: env.gateway.timeoutMs,
    fetch: fetchFn,
  });
}

/** Wire the CSV source, state backend, sender and runner for one command. */
export async function openCampaign(
  args: CliArgs,
  env: CliEnv,
  deps: CliDeps,
  options: { readonly dryRun: boolean; readonly reporters: readonly Reporter[]; readonly logger: CampaignLogger },
): Promise<OpenedCampaign> {
  const source = new CsvJobSource(args.jobs, { idField: env.idField });
  const campaignKey = args.campaign ?? (await source.fingerprint());
  const sender = createSender(env, options.dryRun, deps.fetch);
  const backend = await openStateBackend(env);

  try {
    const runner = await CampaignRunner.create({
      campaignKey,
      source,
      sender,
      stateStore: backend.store,
      dailyLimit: env.dailyLimit,
      hourlyLimit: env.hourlyLimit,
      pacing: env.pacing,
      retry: env.retry,
      validate: env.requiredFields.length > 0 ? requiredFields(...env.requiredFields) : undefined,
      dryRun: options.dryRun,
      reporters: options.reporters,
      logger: options.logger,
      clock: deps.clock,
      sleeper: deps.sleeper,
    });
    return { runner, source, close: () => backend.close() };
  } catch (err) {
    await backend.close();
    throw err;
  }
}
