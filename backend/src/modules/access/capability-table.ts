/**
 * backend/src/modules/access/capability-table.ts
 *
 * WHY:
 * - The single source of truth for what each role may do.
 * - Administrators hold every teacher capability plus school-level ones.
 */

import type { Capability, Role, SuggestedSurface } from './access.types';

const STUDENT: readonly Capability[] = [
  'pass.request',
  'pass.activate',
  'pass.complete.own',
  'pass.view.own',
  'analytics.student',
  'school.view',
];

const TEACHER: readonly Capability[] = [
  'pass.issue',
  'pass.decide',
  'pass.verify',
  'pass.complete.school',
  'pass.view.school',
  'analytics.teacher',
  'school.view',
];

const ADMINISTRATOR: readonly Capability[] = [
  ...TEACHER,
  'pass.override',
  'analytics.school',
  'school.configure',
];

export const ROLE_CAPABILITIES: Readonly<Record<Role, ReadonlySet<Capability>>> = {
  student: new Set(STUDENT),
  teacher: new Set(TEACHER),
  administrator: new Set(ADMINISTRATOR),
};

export const ROLE_HOME_SURFACE: Readonly<Record<Role, SuggestedSurface>> = {
  student: 'student.passes',
  teacher: 'staff.passes',
  administrator: 'staff.dashboard',
};

/** Teachers denied a settings change can still read the settings. */
export function suggestedSurfaceFor(role: Role, capability: Capability): SuggestedSurface {
  if (capability === 'school.configure' && hasCapability(role, 'school.view')) return 'school.settings';
  return ROLE_HOME_SURFACE[role];
}

export function hasCapability(role: Role, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].has(capability);
}
