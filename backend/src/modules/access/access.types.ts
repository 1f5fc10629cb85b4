/**
 * backend/src/modules/access/access.types.ts
 *
 * WHY:
 * - One vocabulary for "who is calling" and "what they may do".
 * - Roles are a closed set; everything a role may do is a Capability.
 *   New rules extend the capability table, not if-chains in handlers.
 */

import type { LocationKind } from '../schools';

export const ROLES = ['student', 'teacher', 'administrator'] as const;
export type Role = (typeof ROLES)[number];

export const CAPABILITIES = [
  'pass.request',
  'pass.activate',
  'pass.complete.own',
  'pass.view.own',
  'pass.issue',
  'pass.decide',
  'pass.verify',
  'pass.complete.school',
  'pass.view.school',
  'pass.override',
  'analytics.student',
  'analytics.teacher',
  'analytics.school',
  'school.view',
  'school.configure',
] as const;
export type Capability = (typeof CAPABILITIES)[number];

/** Authenticated caller, as resolved from the session. */
export type Actor = Readonly<{
  userId: string;
  schoolId: string;
  role: Role;
}>;

export type GuardedAction =
  | 'pass.request'
  | 'pass.issue'
  | 'pass.view'
  | 'pass.decide'
  | 'pass.activate'
  | 'pass.complete'
  | 'pass.revoke'
  | 'pass.verify'
  | 'analytics.student'
  | 'analytics.teacher'
  | 'analytics.school'
  | 'school.view'
  | 'school.configure';

export type PassTarget = Readonly<{ kind: 'pass'; schoolId: string; studentId: string }>;
export type LocationTarget = Readonly<{
  kind: 'location';
  schoolId: string;
  locationKind: LocationKind;
}>;
export type StudentTarget = Readonly<{
  kind: 'student';
  schoolId: string;
  studentRole: Role;
  location: LocationTarget;
}>;
export type SchoolTarget = Readonly<{ kind: 'school'; schoolId: string }>;

export type GuardTarget = PassTarget | LocationTarget | StudentTarget | SchoolTarget;

/** Where the client should send a user who hit a wall. */
export type SuggestedSurface = 'student.passes' | 'staff.passes' | 'staff.dashboard' | 'school.settings';

export type DenialCode =
  | 'MISSING_CAPABILITY'
  | 'OUTSIDE_SCHOOL'
  | 'NOT_OWNER'
  | 'LOCATION_RESTRICTED'
  | 'TARGET_NOT_STUDENT';

export type Denial = Readonly<{
  code: DenialCode;
  message: string;
  role: Role;
  requiredCapability: Capability | null;
  suggestedSurface: SuggestedSurface;
}>;

export type AccessDecision = Readonly<{ allowed: true }> | Readonly<{ allowed: false; denial: Denial }>;

export function isRole(value: string): value is Role {
  return ROLES.some((r) => r === value);
}
