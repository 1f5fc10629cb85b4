/**
 * backend/src/modules/access/index.ts
 *
 * Public surface of the access module.
 */

export { AuthorizationGuard, requiredCapability } from './authorization.guard';
export { ROLE_CAPABILITIES, hasCapability } from './capability-table';
export { ROLES, CAPABILITIES, isRole } from './access.types';
export type {
  AccessDecision,
  Actor,
  Capability,
  Denial,
  DenialCode,
  GuardTarget,
  GuardedAction,
  LocationTarget,
  PassTarget,
  Role,
  SchoolTarget,
  StudentTarget,
  SuggestedSurface,
} from './access.types';
