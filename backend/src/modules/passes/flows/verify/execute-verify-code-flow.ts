/**
 * backend/src/modules/passes/flows/verify/execute-verify-code-flow.ts
 *
 * WHY:
 * - A staff member in the hallway types or scans a code and needs to know,
 *   right now, whether the student in front of them is allowed to be there.
 *
 * RULES:
 * - Only codes of active passes in the caller's own school resolve.
 * - An active pass past its overdue grace expires here and reads as not found.
 * - The code itself is never logged.
 */

import type { Pass, VerifiedPassSummary } from '../../pass.types';
import { PassErrors } from '../../pass.errors';
import { returnBy } from '../../policies/pass-window.policy';
import { passAuditWriter } from '../../pass.audit';
import { expireIfDue } from '../expire/expire-if-due';
import type { PassFlowContext, PassFlowDeps } from '../pass-flow.types';

export async function executeVerifyCodeFlow(
  deps: PassFlowDeps,
  ctx: PassFlowContext,
  params: Readonly<{ code: string }>,
): Promise<VerifiedPassSummary> {
  const { actor, snapshot, meta } = ctx;
  const { school } = snapshot;
  const now = deps.clock.now();

  deps.guard.assert(actor, 'pass.verify', { kind: 'school', schoolId: school.id });

  const pass = await deps.passStore.withSchoolLock(school.id, async (uow): Promise<Pass | undefined> => {
    const found = await deps.issuer.resolve(uow, school.id, params.code);
    if (!found) return undefined;

    const audit = passAuditWriter(uow, { schoolId: school.id, actor, meta });
    const current = await expireIfDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      found,
    );
    return current.status === 'active' ? current : undefined;
  });

  if (!pass || !pass.actualStartTime) {
    deps.logger.info('pass.verify.miss', { flow: 'passes.verify', schoolId: school.id });
    throw PassErrors.codeNotFound({ schoolId: school.id });
  }

  const student = await deps.userDirectory.getUser(pass.studentId);
  const location = snapshot.locations.find((l) => l.id === pass.locationId);

  deps.logger.info('pass.verify.hit', {
    flow: 'passes.verify',
    schoolId: school.id,
    passId: pass.id,
    verifiedBy: actor.userId,
  });

  return {
    passId: pass.id,
    status: 'active',
    studentId: pass.studentId,
    studentName: student?.displayName ?? null,
    locationId: pass.locationId,
    locationName: location?.name ?? null,
    actualStartTime: pass.actualStartTime,
    returnBy: returnBy(pass) ?? pass.actualStartTime,
    isSummons: pass.isSummons,
    isEarlyRelease: pass.isEarlyRelease,
  };
}
