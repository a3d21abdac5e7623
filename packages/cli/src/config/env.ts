import {
  CampaignConfigError,
  DEFAULT_DAILY_LIMIT,
  DEFAULT_HOURLY_LIMIT,
  defaultPaceConfig,
  defaultRetryConfig,
  isLogLevel,
} from '@cadencekit/core';
import type { LogLevel, PaceConfig, RetryConfig } from '@cadencekit/core';

export type StateBackend = 'file' | 'sqlite';

export interface GatewayEnv {
  readonly url: string;
  readonly token: string | undefined;
  readonly timeoutMs: number;
}

/** Settings the CLI reads from the environment. Delays are given in seconds there. */
export interface CliEnv {
  readonly dailyLimit: number | null;
  readonly hourlyLimit: number | null;
  readonly pacing: PaceConfig;
  readonly retry: RetryConfig;
  readonly dryRun: boolean;
  readonly stateBackend: StateBackend;
  readonly stateDir: string;
  /** SQLite file used when `stateBackend` is `'sqlite'`. */
  readonly stateDb: string;
  readonly reportsDir: string;
  readonly idField: string;
  readonly requiredFields: readonly string[];
  readonly gateway: GatewayEnv | null;
  readonly logLevel: LogLevel;
}

export const DEFAULT_GATEWAY_TIMEOUT_MS = 15_000;

const SECOND = 1000;

const readRaw = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  return raw.trim();
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number },
): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new CampaignConfigError(`${name}=${raw} is out of allowed range [${String(range.min)}..${String(range.max)}]`);
  }
  return value;
};

const parseOptionalSeconds = (env: NodeJS.ProcessEnv, name: string): number | undefined => {
  const raw = readRaw(env, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new CampaignConfigError(`${name}=${raw} must be a non-negative number of seconds`);
  }
  return Math.round(value * SECOND);
};

/** `none` or `off` disables the limit. */
const parseLimit = (env: NodeJS.ProcessEnv, name: string, fallback: number): number | null => {
  const raw = readRaw(env, name);
  if (raw !== undefined && ['none', 'off'].includes(raw.toLowerCase())) return null;
  return parseOptionalIntInRange(env, name, { min: 1, max: Number.MAX_SAFE_INTEGER }) ?? fallback;
};

const parseBoolean = (env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean => {
  const raw = readRaw(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new CampaignConfigError(`${name}=${raw} must be true or false`);
};

const parseBackoffFactor = (env: NodeJS.ProcessEnv): number => {
  const raw = readRaw(env, 'RETRY_BACKOFF_FACTOR');
  if (raw === undefined) return defaultRetryConfig.backoffFactor;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 1) {
    throw new CampaignConfigError(`RETRY_BACKOFF_FACTOR=${raw} must be a number >= 1`);
  }
  return value;
};

const parseStateBackend = (env: NodeJS.ProcessEnv): StateBackend => {
  const raw = readRaw(env, 'STATE_BACKEND')?.toLowerCase() ?? 'file';
  if (raw === 'file' || raw === 'sqlite') return raw;
  throw new CampaignConfigError(`STATE_BACKEND=${raw} must be file or sqlite`);
};

const parseLogLevel = (env: NodeJS.ProcessEnv): LogLevel => {
  const raw = readRaw(env, 'LOG_LEVEL')?.toLowerCase() ?? 'info';
  if (isLogLevel(raw)) return raw;
  throw new CampaignConfigError(`LOG_LEVEL=${raw} must be one of debug, info, warn, error`);
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new CampaignConfigError(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new CampaignConfigError(`${name} must use http or https scheme. Received: ${value}`);
  }
  return value;
};

const parseGateway = (env: NodeJS.ProcessEnv): GatewayEnv | null => {
  const url = readRaw(env, 'GATEWAY_URL');
  if (url === undefined) return null;
  return {
    url: validateHttpUrl('GATEWAY_URL', url),
    token: readRaw(env, 'GATEWAY_TOKEN'),
    timeoutMs:
      parseOptionalIntInRange(env, 'GATEWAY_TIMEOUT_MS', { min: 1000, max: 120_000 }) ?? DEFAULT_GATEWAY_TIMEOUT_MS,
  };
};

const parseFieldList = (env: NodeJS.ProcessEnv, name: string, fallback: readonly string[]): readonly string[] => {
  const raw = readRaw(env, name);
  if (raw === undefined) return fallback;
  return raw
    .split(',')
    .map((field) => field.trim())
    .filter((field) => field !== '');
};

/**
 * Read the CLI settings from `env`. Unset variables fall back to the library
 * defaults; range checks across settings happen when the runner is built.
 */
export const loadCliEnv = (env: NodeJS.ProcessEnv = process.env): CliEnv => {
  const stateDir = readRaw(env, 'STATE_DIR') ?? '.cadencekit';
  const idField = readRaw(env, 'ID_FIELD') ?? 'phone';

  return {
    dailyLimit: parseLimit(env, 'DAILY_LIMIT', DEFAULT_DAILY_LIMIT),
    hourlyLimit: parseLimit(env, 'HOURLY_LIMIT', DEFAULT_HOURLY_LIMIT),
    pacing: {
      enabled: parseBoolean(env, 'ENABLE_DELAYS', defaultPaceConfig.enabled),
      minMessageDelayMs: parseOptionalSeconds(env, 'MIN_MESSAGE_DELAY') ?? defaultPaceConfig.minMessageDelayMs,
      maxMessageDelayMs: parseOptionalSeconds(env, 'MAX_MESSAGE_DELAY') ?? defaultPaceConfig.maxMessageDelayMs,
      minBatchSize:
        parseOptionalIntInRange(env, 'MIN_BATCH_SIZE', { min: 1, max: 10_000 }) ?? defaultPaceConfig.minBatchSize,
      maxBatchSize:
        parseOptionalIntInRange(env, 'MAX_BATCH_SIZE', { min: 1, max: 10_000 }) ?? defaultPaceConfig.maxBatchSize,
      minBatchDelayMs: parseOptionalSeconds(env, 'MIN_BATCH_DELAY') ?? defaultPaceConfig.minBatchDelayMs,
      maxBatchDelayMs: parseOptionalSeconds(env, 'MAX_BATCH_DELAY') ?? defaultPaceConfig.maxBatchDelayMs,
    },
    retry: {
      maxRetries: parseOptionalIntInRange(env, 'MAX_RETRIES', { min: 0, max: 100 }) ?? defaultRetryConfig.maxRetries,
      baseDelayMs: parseOptionalSeconds(env, 'RETRY_BASE_DELAY') ?? defaultRetryConfig.baseDelayMs,
      backoffFactor: parseBackoffFactor(env),
      maxBackoffMs: parseOptionalSeconds(env, 'RETRY_MAX_BACKOFF') ?? defaultRetryConfig.maxBackoffMs,
    },
    dryRun: parseBoolean(env, 'DRY_RUN', false),
    stateBackend: parseStateBackend(env),
    stateDir,
    stateDb: readRaw(env, 'STATE_DB') ?? `${stateDir}/state.sqlite`,
    reportsDir: readRaw(env, 'REPORTS_DIR') ?? 'reports',
    idField,
    requiredFields: parseFieldList(env, 'REQUIRED_FIELDS', [idField]),
    gateway: parseGateway(env),
    logLevel: parseLogLevel(env),
  };
};
