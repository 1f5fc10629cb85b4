import { describe, it, expect } from 'vitest';
import { AdmissionController } from '../../../src/modules/passes/admission/admission-controller';
import { logger } from '../../../src/shared/logger/logger';
import { makeSchool } from '../../helpers/pass-factory';

function ledger(activeCount: number, committedLimit?: number) {
  return {
    countActive: () => Promise.resolve(activeCount),
    concurrentPassLimit: () => Promise.resolve(committedLimit),
  };
}

describe('AdmissionController', () => {
  const admission = new AdmissionController({ logger });
  const school = makeSchool({ concurrentPassLimit: 2 });

  it('admits below the limit and counts the new slot', async () => {
    expect(await admission.tryAdmit(ledger(1), school)).toEqual({
      admitted: true,
      occupancy: { activeCount: 2, limit: 2 },
    });
  });

  it('refuses at the limit', async () => {
    expect(await admission.tryAdmit(ledger(2), school)).toEqual({
      admitted: false,
      reason: 'AT_CAPACITY',
      occupancy: { activeCount: 2, limit: 2 },
    });
  });

  it('uses the committed cap over the snapshot the caller passed', async () => {
    expect(await admission.tryAdmit(ledger(1, 1), school)).toEqual({
      admitted: false,
      reason: 'AT_CAPACITY',
      occupancy: { activeCount: 1, limit: 1 },
    });
  });

  it('release reports the occupancy after the pass left active', async () => {
    expect(await admission.release(ledger(0), school)).toEqual({ activeCount: 0, limit: 2 });
  });
});
