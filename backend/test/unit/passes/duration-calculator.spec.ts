import { describe, it, expect } from 'vitest';
import { computeDurationMinutes } from '../../../src/modules/passes';
import { T0 } from '../../helpers/manual-clock';

const at = (ms: number) => new Date(T0.getTime() + ms);

describe('computeDurationMinutes', () => {
  it('returns whole minutes between start and end', () => {
    expect(computeDurationMinutes(T0, at(15 * 60_000))).toBe(15);
  });

  it('rounds to the nearest minute', () => {
    expect(computeDurationMinutes(T0, at(89_000))).toBe(1);
    expect(computeDurationMinutes(T0, at(90_000))).toBe(2);
  });

  it('is 0 for a zero-length or backwards interval', () => {
    expect(computeDurationMinutes(T0, T0)).toBe(0);
    expect(computeDurationMinutes(T0, at(-5 * 60_000))).toBe(0);
  });
});
