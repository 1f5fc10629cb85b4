/**
 * backend/src/modules/passes/flows/complete/execute-complete-pass-flow.ts
 *
 * WHY:
 * - The student is back: record the actual absence and free the admission slot.
 *
 * RULES:
 * - Only active passes complete. The student themself or any staff member may do it.
 * - A pass already past its overdue grace expires instead (PASS_EXPIRED after commit).
 * - The verification code is cleared in the same write.
 */

import type { Pass } from '../../pass.types';
import { PassErrors } from '../../pass.errors';
import { complete } from '../../lifecycle/pass-state-machine';
import { auditPassTransition, passAuditWriter } from '../../pass.audit';
import { expireIfDue } from '../expire/expire-if-due';
import { passTarget } from '../pass-target';
import type { PassFlowContext, PassFlowDeps } from '../pass-flow.types';

export async function executeCompletePassFlow(
  deps: PassFlowDeps,
  ctx: PassFlowContext,
  params: Readonly<{ passId: string }>,
): Promise<Pass> {
  const { actor, snapshot, meta } = ctx;
  const { school } = snapshot;
  const now = deps.clock.now();

  const result = await deps.passStore.withSchoolLock(school.id, async (uow) => {
    const pass = await uow.findById(school.id, params.passId);
    if (!pass) return { kind: 'not_found' } as const;

    deps.guard.assert(actor, 'pass.complete', passTarget(pass));

    const audit = passAuditWriter(uow, { schoolId: school.id, actor, meta });
    const current = await expireIfDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      pass,
    );
    if (current !== pass) return { kind: 'expired', pass: current } as const;

    const transition = complete(pass, { now });
    const updated = await uow.update(pass.id, transition.from, transition.patch);
    if (!updated) throw PassErrors.concurrentUpdate({ passId: pass.id });

    const occupancy = await deps.admission.release(uow, school);

    await auditPassTransition(audit, transition, {
      durationMinutes: updated.durationMinutes,
      completedBy: actor.role,
    });
    return { kind: 'completed', pass: updated, occupancy } as const;
  });

  if (result.kind === 'not_found') throw PassErrors.passNotFound({ passId: params.passId });
  if (result.kind === 'expired') {
    throw PassErrors.passExpired({ passId: result.pass.id, expiredAt: result.pass.expiredAt });
  }

  deps.logger.info('pass.completed', {
    flow: 'passes.complete',
    schoolId: school.id,
    passId: result.pass.id,
    durationMinutes: result.pass.durationMinutes,
    activeCount: result.occupancy.activeCount,
  });

  return result.pass;
}
