/**
 * Source of wall-clock time for timestamps and cache expiry
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};
