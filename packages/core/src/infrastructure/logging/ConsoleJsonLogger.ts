import type { CampaignLogger, LogFields, LogLevel } from '../../domain/ports/CampaignLogger.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface ConsoleJsonLoggerOptions {
  /** Lowest level written. Default: `'info'`. */
  readonly level?: LogLevel;
  /** Receives each formatted line. Default: the console method matching the level. */
  readonly write?: (line: string, level: LogLevel) => void;
  readonly now?: () => Date;
}

function writeToConsole(line: string, level: LogLevel): void {
  if (level === 'error') {
    // eslint-disable-next-line no-console
    console.error(line);
  } else if (level === 'warn') {
    // eslint-disable-next-line no-console
    console.warn(line);
  } else {
    // eslint-disable-next-line no-console
    console.log(line);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** Logger that writes one JSON object per line: `{"level","event",...fields,"ts"}`. */
export class ConsoleJsonLogger implements CampaignLogger {
  private readonly level: LogLevel;
  private readonly write: (line: string, level: LogLevel) => void;
  private readonly now: () => Date;

  constructor(options: ConsoleJsonLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.write = options.write ?? writeToConsole;
    this.now = options.now ?? (() => new Date());
  }

  debug(event: string, fields?: LogFields): void {
    this.log('debug', event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log('info', event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log('warn', event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log('error', event, fields);
  }

  private log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    this.write(JSON.stringify({ level, event, ...fields, ts: this.now().toISOString() }), level);
  }
}
