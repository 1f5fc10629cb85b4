/**
 * src/shared/time/clock.ts
 *
 * WHY:
 * - Activation windows, expiry deadlines and dashboard windows all depend on "now".
 *   One injectable source keeps every comparison on the same timeline and lets
 *   tests move time forward without sleeping.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const MINUTE_MS = 60_000;

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}
