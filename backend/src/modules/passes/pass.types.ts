/**
 * backend/src/modules/passes/pass.types.ts
 *
 * WHY:
 * - A Pass is one student's permission to be somewhere else for a bounded time.
 *
 * LIFECYCLE:
 *   pending ──approve──▶ approved ──activate──▶ active ──complete──▶ completed
 *      │                    │                     │
 *      └─deny─▶ denied      └──────expire─────────┴──▶ expired
 *      └──────expire────────▶ expired
 *
 * RULES:
 * - completed, denied and expired are terminal.
 * - verificationCode is non-null exactly while status is active.
 * - At most one pending/approved/active pass per student.
 */

export const PASS_STATUSES = [
  'pending',
  'approved',
  'active',
  'completed',
  'denied',
  'expired',
] as const;
export type PassStatus = (typeof PASS_STATUSES)[number];

export const OPEN_PASS_STATUSES = ['pending', 'approved', 'active'] as const satisfies readonly PassStatus[];
export type OpenPassStatus = (typeof OPEN_PASS_STATUSES)[number];

/** self_request: student asked. staff_issue: teacher/admin issued it directly. */
export type PassOrigin = 'self_request' | 'staff_issue';

export type Pass = Readonly<{
  id: string;
  schoolId: string;
  studentId: string;
  locationId: string;
  issuedById: string;
  approverId: string | null;
  status: PassStatus;

  requestedStartTime: Date;
  requestedEndTime: Date;
  allottedMinutes: number;

  actualStartTime: Date | null;
  actualEndTime: Date | null;
  durationMinutes: number | null;

  verificationCode: string | null;
  isSummons: boolean;
  isEarlyRelease: boolean;

  studentReason: string | null;
  approvalNotes: string | null;
  adminNotes: string | null;

  decidedAt: Date | null;
  expiredAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}>;

export type NewPass = Omit<Pass, 'id'>;

/** Fields a transition may change. */
export type PassPatch = Readonly<
  Partial<
    Pick<
      Pass,
      | 'status'
      | 'approverId'
      | 'actualStartTime'
      | 'actualEndTime'
      | 'durationMinutes'
      | 'verificationCode'
      | 'approvalNotes'
      | 'adminNotes'
      | 'decidedAt'
      | 'expiredAt'
    >
  > & { updatedAt: Date }
>;

/** What a staff member sees after scanning or typing a verification code. */
export type VerifiedPassSummary = Readonly<{
  passId: string;
  status: 'active';
  studentId: string;
  studentName: string | null;
  locationId: string;
  locationName: string | null;
  actualStartTime: Date;
  returnBy: Date;
  isSummons: boolean;
  isEarlyRelease: boolean;
}>;

export type PassListFilter = Readonly<{
  schoolId: string;
  studentId?: string;
  approverId?: string;
  statuses?: readonly PassStatus[];
  createdSince?: Date;
  limit?: number;
}>;

export function isOpenStatus(status: PassStatus): status is OpenPassStatus {
  return OPEN_PASS_STATUSES.some((s) => s === status);
}

export function isPassStatus(value: string): value is PassStatus {
  return PASS_STATUSES.some((s) => s === value);
}
