/**
 * backend/src/modules/passes/flows/create/execute-create-pass-flow.ts
 *
 * WHY:
 * - One flow for both ways a pass is born: a student asks, or staff issues one.
 *
 * STEPS:
 * 1) Resolve the location and its effective rules (kind, allotted minutes).
 * 2) Authorize (student: request; staff: issue to a student of the same school).
 * 3) Validate flags and the requested window.
 * 4) Under the school lock: enforce one open pass per student, spend the
 *    student's request quota, then insert + audit.
 * 5) After commit: notify for summons / early release.
 *
 * RULES:
 * - A stale open pass is expired first, then the duplicate check runs again on the result.
 * - The conflict and the rate limit are thrown after the lock returns, so that expiry write still commits.
 */

import type { Location } from '../../../schools';
import { resolveLocationRules } from '../../../schools';
import type { LocationTarget } from '../../../access';
import { RateLimitError } from '../../../../shared/security/rate-limit';
import { isOpenStatus, type Pass, type PassOrigin } from '../../pass.types';
import { PassErrors } from '../../pass.errors';
import { buildNewPass } from '../../lifecycle/pass-state-machine';
import { resolveRequestedWindow } from '../../policies/pass-window.policy';
import { assertFlagsMatchLocation, assertNoStaffFlags } from '../../policies/pass-issue.policy';
import { auditPassCreated, passAuditWriter } from '../../pass.audit';
import { notifyPassIssued } from '../../pass.notifications';
import { expireIfDue } from '../expire/expire-if-due';
import type { PassFlowContext, PassFlowDeps } from '../pass-flow.types';

export type CreatePassParams = Readonly<{
  origin: PassOrigin;
  locationId: string;
  /** Required when origin is staff_issue. */
  studentId?: string;
  startTime?: Date;
  endTime?: Date;
  /** Staff override of the allotted minutes. */
  durationMinutes?: number;
  isSummons?: boolean;
  isEarlyRelease?: boolean;
  studentReason?: string | null;
  staffNotes?: string | null;
}>;

function findActiveLocation(locations: readonly Location[], locationId: string): Location {
  const location = locations.find((l) => l.id === locationId && l.isActive);
  if (!location) throw PassErrors.unknownLocation(locationId);
  return location;
}

export async function executeCreatePassFlow(
  deps: PassFlowDeps,
  ctx: PassFlowContext,
  params: CreatePassParams,
): Promise<Pass> {
  const { actor, snapshot, meta } = ctx;
  const { school } = snapshot;
  const now = deps.clock.now();

  const location = findActiveLocation(snapshot.locations, params.locationId);
  const rules = resolveLocationRules(school, location);
  const locationTarget: LocationTarget = {
    kind: 'location',
    schoolId: location.schoolId,
    locationKind: rules.kind,
  };

  const flags = {
    isSummons: params.isSummons ?? false,
    isEarlyRelease: params.isEarlyRelease ?? false,
  };

  let studentId: string;
  if (params.origin === 'self_request') {
    deps.guard.assert(actor, 'pass.request', locationTarget);
    assertNoStaffFlags(flags);
    studentId = actor.userId;
  } else {
    // capability first, so a student probing this route learns nothing about other students
    deps.guard.assert(actor, 'pass.issue', { kind: 'school', schoolId: actor.schoolId });

    const student = params.studentId ? await deps.userDirectory.getUser(params.studentId) : undefined;
    if (!student || student.schoolId !== actor.schoolId) {
      throw PassErrors.studentNotFound({ studentId: params.studentId });
    }

    deps.guard.assert(actor, 'pass.issue', {
      kind: 'student',
      schoolId: student.schoolId,
      studentRole: student.role,
      location: locationTarget,
    });
    assertFlagsMatchLocation(rules.kind, flags);
    studentId = student.id;
  }

  const window = resolveRequestedWindow({
    now,
    allottedMinutes: params.durationMinutes ?? rules.allottedMinutes,
    startTime: params.startTime,
    endTime: params.endTime,
  });

  const result = await deps.passStore.withSchoolLock(school.id, async (uow) => {
    const audit = passAuditWriter(uow, { schoolId: school.id, actor, meta });

    const open = await uow.findOpenForStudent(school.id, studentId);
    if (open) {
      const current = await expireIfDue(
        { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
        open,
      );
      if (isOpenStatus(current.status)) return { kind: 'open_pass_exists', existing: current } as const;
    }

    // only a request that would be stored spends quota
    if (params.origin === 'self_request') {
      try {
        await deps.rateLimiter.hitOrThrow({
          key: `pass-request:student:${studentId}`,
          limit: deps.requestLimit.limit,
          windowSeconds: deps.requestLimit.windowSeconds,
        });
      } catch (err) {
        if (err instanceof RateLimitError) return { kind: 'rate_limited', error: err } as const;
        throw err;
      }
    }

    const created = await uow.insert(
      buildNewPass({
        schoolId: school.id,
        studentId,
        locationId: location.id,
        issuedById: actor.userId,
        origin: params.origin,
        locationKind: rules.kind,
        window,
        isSummons: flags.isSummons,
        isEarlyRelease: flags.isEarlyRelease,
        studentReason: params.studentReason ?? null,
        staffNotes: params.staffNotes ?? null,
        now,
      }),
    );
    await auditPassCreated(audit, created, params.origin);

    return { kind: 'created', pass: created } as const;
  });

  if (result.kind === 'open_pass_exists') {
    throw PassErrors.openPassExists(result.existing);
  }
  if (result.kind === 'rate_limited') throw result.error;

  await notifyPassIssued(deps.queue, result.pass);

  deps.logger.info('pass.created', {
    flow: 'passes.create',
    schoolId: school.id,
    passId: result.pass.id,
    studentId,
    locationId: location.id,
    origin: params.origin,
    status: result.pass.status,
  });

  return result.pass;
}
