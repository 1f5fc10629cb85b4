/**
 * backend/src/modules/passes/helpers/duration-calculator.ts
 *
 * Whole minutes between two instants, rounded to the nearest minute.
 * Never negative: a clock step backwards yields 0, not a negative absence.
 */

import { MINUTE_MS } from '../../../shared/time/clock';

export function computeDurationMinutes(start: Date, end: Date): number {
  return Math.max(0, Math.round((end.getTime() - start.getTime()) / MINUTE_MS));
}
