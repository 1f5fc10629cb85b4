/**
 * backend/src/modules/schools/index.ts
 *
 * Public surface of the schools module. Other modules import from here, never from /dal.
 */

export type {
  Location,
  LocationKind,
  NewLocation,
  PreApprovedRule,
  PreApprovedRules,
  School,
  SchoolSettingsPatch,
  SchoolSnapshot,
} from './school.types';
export { SCHOOL_DEFAULTS } from './school.types';
export type { CapacityScope, SchoolCapacityLock, SchoolStore } from './store/school.store';
export { KyselySchoolStore } from './store/kysely-school.store';
export { InMemSchoolStore, type NewSchool } from './store/inmem-school.store';
export { SchoolService } from './school.service';
export { createSchoolModule, type SchoolModule } from './school.module';
export {
  resolveLocationKind,
  resolveLocationRules,
  type LocationRules,
} from './policies/location-rules.policy';
export { MAX_PASS_MINUTES } from './school.schemas';
export { assertSchoolExists } from './policies/school-snapshot.policy';
export { SchoolErrors } from './school.errors';
