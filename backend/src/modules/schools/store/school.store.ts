/**
 * backend/src/modules/schools/store/school.store.ts
 *
 * WHY:
 * - Pass flows and dashboards read school configuration through this seam so
 *   they run against Postgres in prod and an in-memory store in tests.
 */

import type { Location, NewLocation, School, SchoolSettingsPatch, SchoolSnapshot } from '../school.types';

export interface SchoolStore {
  getSnapshot(schoolId: string): Promise<SchoolSnapshot | undefined>;
  updateSettings(schoolId: string, patch: SchoolSettingsPatch, now: Date): Promise<School | undefined>;
  createLocation(schoolId: string, input: NewLocation): Promise<Location>;
}

/** What a cap change sees while activations for the school are held off. */
export type CapacityScope = Readonly<{
  activeCount: number;
  schools: Pick<SchoolStore, 'updateSettings'>;
}>;

/**
 * Serializes a change to concurrentPassLimit with pass activations, so the cap
 * never drops below the passes already out.
 */
export interface SchoolCapacityLock {
  withCapacityLock<T>(schoolId: string, work: (scope: CapacityScope) => Promise<T>): Promise<T>;
}
