import type { Pass } from '../../src/modules/passes';
import type { School } from '../../src/modules/schools';
import { SCHOOL_DEFAULTS } from '../../src/modules/schools';
import { T0 } from './manual-clock';

/** An approved 10-minute pass starting at T0, ready to activate. */
export function makePass(overrides: Partial<Pass> = {}): Pass {
  return {
    id: 'pass-1',
    schoolId: 'school-a',
    studentId: 'stu-1',
    locationId: 'loc-1',
    issuedById: 'stu-1',
    approverId: null,
    status: 'approved',
    requestedStartTime: T0,
    requestedEndTime: new Date(T0.getTime() + 10 * 60_000),
    allottedMinutes: 10,
    actualStartTime: null,
    actualEndTime: null,
    durationMinutes: null,
    verificationCode: null,
    isSummons: false,
    isEarlyRelease: false,
    studentReason: null,
    approvalNotes: null,
    adminNotes: null,
    decidedAt: T0,
    expiredAt: null,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeSchool(overrides: Partial<School> = {}): School {
  return {
    id: 'school-a',
    key: 'edison',
    name: 'Edison Elementary School',
    ...SCHOOL_DEFAULTS,
    preApprovedRules: {},
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}
