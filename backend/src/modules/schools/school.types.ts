/**
 * backend/src/modules/schools/school.types.ts
 *
 * WHY:
 * - Every pass belongs to one school. Its settings drive admission (concurrent limit), default
 *   durations, activation windows and expiry grace.
 * - Pass flows read a SchoolSnapshot once per operation and treat it as immutable.
 */

export type SchoolKey = string;

/** Per-location override, keyed by lower-cased location name. */
export type PreApprovedRule = Readonly<{
  duration: number;
  requiresApproval?: boolean;
  summonsOnly?: boolean;
  earlyReleaseOnly?: boolean;
}>;

export type PreApprovedRules = Readonly<Record<string, PreApprovedRule>>;

export type School = Readonly<{
  id: string;
  key: SchoolKey;
  name: string;
  timezone: string;
  concurrentPassLimit: number;
  defaultPassDuration: number;
  activationWindowMinutes: number;
  overdueGraceMinutes: number;
  preApprovedRules: PreApprovedRules;
  createdAt: Date;
  updatedAt: Date;
}>;

/**
 * How a student may (or may not) reach a location.
 * Precedence when several flags are set: summons_only > early_release_only
 * > approval_required > pre_approved.
 */
export type LocationKind = 'pre_approved' | 'approval_required' | 'summons_only' | 'early_release_only';

export type Location = Readonly<{
  id: string;
  schoolId: string;
  name: string;
  description: string | null;
  roomNumber: string | null;
  defaultDuration: number | null;
  requiresApproval: boolean;
  summonsOnly: boolean;
  earlyReleaseOnly: boolean;
  isActive: boolean;
  createdAt: Date;
}>;

export type SchoolSnapshot = Readonly<{
  school: School;
  locations: readonly Location[];
}>;

export type SchoolSettingsPatch = Partial<
  Pick<
    School,
    | 'name'
    | 'timezone'
    | 'concurrentPassLimit'
    | 'defaultPassDuration'
    | 'activationWindowMinutes'
    | 'overdueGraceMinutes'
    | 'preApprovedRules'
  >
>;

export type NewLocation = Readonly<{
  name: string;
  description?: string | null;
  roomNumber?: string | null;
  defaultDuration?: number | null;
  requiresApproval?: boolean;
  summonsOnly?: boolean;
  earlyReleaseOnly?: boolean;
  isActive?: boolean;
}>;

export const SCHOOL_DEFAULTS = {
  timezone: 'UTC',
  concurrentPassLimit: 5,
  defaultPassDuration: 10,
  activationWindowMinutes: 15,
  overdueGraceMinutes: 5,
} as const;
