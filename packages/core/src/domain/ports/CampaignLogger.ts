export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Readonly<Record<string, string | number | boolean | null | undefined>>;

/** Structured logger port. `event` is a dotted name such as `campaign.paused`. */
export interface CampaignLogger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

const noop = (): void => undefined;

export const noopLogger: CampaignLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
