/**
 * backend/src/modules/schools/policies/school-snapshot.policy.ts
 *
 * RULES:
 * - Pure functions only. Throws SchoolErrors.
 */

import type { Location, SchoolSnapshot } from '../school.types';
import { SchoolErrors } from '../school.errors';

export function assertSchoolExists(
  snapshot: SchoolSnapshot | undefined,
  schoolId: string,
): asserts snapshot is SchoolSnapshot {
  if (!snapshot) {
    throw SchoolErrors.schoolNotFound({ schoolId });
  }
}

export function assertLocationNameAvailable(locations: readonly Location[], name: string): void {
  const wanted = name.trim().toLowerCase();
  if (locations.some((l) => l.name.trim().toLowerCase() === wanted)) {
    throw SchoolErrors.locationNameTaken(name);
  }
}
