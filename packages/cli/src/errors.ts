import { CampaignError, CorruptStateError, PersistenceError } from '@cadencekit/core';
import type { StateRecordKind } from '@cadencekit/core';

/** The single JSON line the CLI prints on stderr when a command fails. */
export interface CliFailure {
  readonly event: 'cli.failed';
  readonly name: string;
  /** A `CampaignErrorCode`, the errno of a file-system failure, or `UNEXPECTED`. */
  readonly code: string;
  readonly message: string;
  /** Record that could not be persisted. */
  readonly target?: StateRecordKind;
  /** Corrupt state record, or the path a file-system call failed on. */
  readonly location?: string;
  readonly stack?: string;
}

interface FailureDetails {
  readonly code: string;
  readonly target?: StateRecordKind;
  readonly location?: string;
}

function detailsOf(error: Error): FailureDetails {
  if (error instanceof PersistenceError) return { code: error.code, target: error.target };
  if (error instanceof CorruptStateError) return { code: error.code, location: error.location };
  if (error instanceof CampaignError) return { code: error.code };
  if ('code' in error && typeof error.code === 'string') {
    const path = 'path' in error && typeof error.path === 'string' ? error.path : undefined;
    return path === undefined ? { code: error.code } : { code: error.code, location: path };
  }
  return { code: 'UNEXPECTED' };
}

export function isDebugMode(env: NodeJS.ProcessEnv = process.env): boolean {
  const debug = env['DEBUG']?.toLowerCase();
  return debug === '1' || debug === 'true';
}

export function describeCliFailure(reason: unknown, includeStack: boolean): CliFailure {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  const failure: CliFailure = {
    event: 'cli.failed',
    name: error.name || 'Error',
    message: error.message,
    ...detailsOf(error),
  };
  return includeStack && error.stack !== undefined ? { ...failure, stack: error.stack } : failure;
}
