/** Source of wall-clock time. Quota buckets follow the local time of the returned dates. */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
