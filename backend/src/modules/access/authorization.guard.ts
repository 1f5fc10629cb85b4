/**
 * backend/src/modules/access/authorization.guard.ts
 *
 * WHY:
 * - Every pass operation asks the same three questions: does the role carry the
 *   capability, is the target in the caller's school, and does any
 *   ownership/target rule apply. Answering them in one place keeps handlers free
 *   of role branching.
 *
 * RULES:
 * - No I/O. Callers load the target first and hand over its scope.
 * - check() never throws; assert() throws the structured denial.
 * - School scope is checked before ownership so a foreign pass never reveals who owns it.
 */

import { AccessErrors } from './access.errors';
import { hasCapability, suggestedSurfaceFor } from './capability-table';
import type {
  AccessDecision,
  Actor,
  Capability,
  DenialCode,
  GuardTarget,
  GuardedAction,
} from './access.types';

const CAPABILITY_MESSAGES: Readonly<Record<Capability, string>> = {
  'pass.request': 'Only students can request passes.',
  'pass.activate': 'Only the student holding a pass can activate it.',
  'pass.complete.own': 'Only students can check in from their own pass.',
  'pass.view.own': 'Only students have personal passes.',
  'pass.issue': 'Only staff can issue passes.',
  'pass.decide': 'Only staff can approve or deny passes.',
  'pass.verify': 'Only staff can verify pass codes.',
  'pass.complete.school': 'Students can only check in from their own pass.',
  'pass.view.school': 'Students can only view their own passes.',
  'pass.override': 'Only administrators can revoke passes.',
  'analytics.student': 'The pass history dashboard is for students.',
  'analytics.teacher': 'Teacher dashboards are available to staff only.',
  'analytics.school': 'School-wide analytics are available to administrators only.',
  'school.view': 'School settings are available to members of the school only.',
  'school.configure': 'Only administrators can change school settings.',
};

function isOwnPass(actor: Actor, target: GuardTarget): boolean {
  return target.kind === 'pass' && target.studentId === actor.userId;
}

export function requiredCapability(
  actor: Actor,
  action: GuardedAction,
  target: GuardTarget,
): Capability {
  switch (action) {
    case 'pass.view':
      return isOwnPass(actor, target) && actor.role === 'student' ? 'pass.view.own' : 'pass.view.school';
    case 'pass.complete':
      return isOwnPass(actor, target) && actor.role === 'student'
        ? 'pass.complete.own'
        : 'pass.complete.school';
    case 'pass.revoke':
      return 'pass.override';
    default:
      return action;
  }
}

export class AuthorizationGuard {
  check(actor: Actor, action: GuardedAction, target: GuardTarget): AccessDecision {
    const capability = requiredCapability(actor, action, target);

    const deny = (code: DenialCode, message: string): AccessDecision => ({
      allowed: false,
      denial: {
        code,
        message,
        role: actor.role,
        requiredCapability: capability,
        suggestedSurface: suggestedSurfaceFor(actor.role, capability),
      },
    });

    if (!hasCapability(actor.role, capability)) {
      return deny('MISSING_CAPABILITY', CAPABILITY_MESSAGES[capability]);
    }

    if (target.schoolId !== actor.schoolId) {
      return deny('OUTSIDE_SCHOOL', 'That resource belongs to another school.');
    }

    if (action === 'pass.activate' && target.kind === 'pass' && target.studentId !== actor.userId) {
      return deny('NOT_OWNER', CAPABILITY_MESSAGES['pass.activate']);
    }

    if (action === 'pass.request' && target.kind === 'location') {
      if (target.locationKind === 'summons_only') {
        return deny('LOCATION_RESTRICTED', 'This location is only reachable by staff summons.');
      }
      if (target.locationKind === 'early_release_only') {
        return deny('LOCATION_RESTRICTED', 'Early release passes are issued by the front office.');
      }
    }

    if (action === 'pass.issue' && target.kind === 'student') {
      if (target.location.schoolId !== actor.schoolId) {
        return deny('OUTSIDE_SCHOOL', 'That location belongs to another school.');
      }
      if (target.studentRole !== 'student') {
        return deny('TARGET_NOT_STUDENT', 'Passes can only be issued to students.');
      }
    }

    return { allowed: true };
  }

  /** Throws a 403 carrying the structured denial. */
  assert(actor: Actor, action: GuardedAction, target: GuardTarget): void {
    const decision = this.check(actor, action, target);
    if (!decision.allowed) {
      throw AccessErrors.denied(actor, decision.denial);
    }
  }
}
