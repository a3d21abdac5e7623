import { isNonNegativeInteger, isNullableString, isPlainObject } from './guards.js';

/** Sliding counters enforced by the QuotaTracker. */
export interface QuotaState {
  readonly sentToday: number;
  readonly sentThisHour: number;
  /** Local calendar date (`YYYY-MM-DD`) the daily counter belongs to. */
  readonly currentDate: string | null;
  /** Local hour (0-23) the hourly counter belongs to. */
  readonly currentHour: number | null;
  /** Lifetime count across every day. */
  readonly totalSent: number;
  /** ISO-8601 timestamp of the last recorded send. */
  readonly lastSentAt: string | null;
}

export const EMPTY_QUOTA_STATE: QuotaState = {
  sentToday: 0,
  sentThisHour: 0,
  currentDate: null,
  currentHour: null,
  totalSent: 0,
  lastSentAt: null,
};

export function isQuotaState(value: unknown): value is QuotaState {
  if (!isPlainObject(value)) return false;
  const hour = value['currentHour'];
  return (
    isNonNegativeInteger(value['sentToday']) &&
    isNonNegativeInteger(value['sentThisHour']) &&
    isNullableString(value['currentDate']) &&
    (hour === null || (isNonNegativeInteger(hour) && hour <= 23)) &&
    isNonNegativeInteger(value['totalSent']) &&
    isNullableString(value['lastSentAt'])
  );
}

/** Which limit refused a send. */
export type QuotaLimitReason = 'daily-limit' | 'hourly-limit';
