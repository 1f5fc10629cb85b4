/**
 * backend/src/modules/passes/flows/revoke/execute-revoke-pass-flow.ts
 *
 * WHY:
 * - Administrator override: end any open pass now (lost student, fire drill).
 *
 * RULES:
 * - Revoked passes end as `expired` with adminNotes set; the audit action is pass.revoked.
 * - Terminal passes cannot be revoked.
 */

import type { Pass } from '../../pass.types';
import { PassErrors } from '../../pass.errors';
import { revoke } from '../../lifecycle/pass-state-machine';
import { auditPassTransition, passAuditWriter } from '../../pass.audit';
import { passTarget } from '../pass-target';
import type { PassFlowContext, PassFlowDeps } from '../pass-flow.types';

export async function executeRevokePassFlow(
  deps: PassFlowDeps,
  ctx: PassFlowContext,
  params: Readonly<{ passId: string; notes: string }>,
): Promise<Pass> {
  const { actor, snapshot, meta } = ctx;
  const { school } = snapshot;
  const now = deps.clock.now();

  const revoked = await deps.passStore.withSchoolLock(school.id, async (uow) => {
    const pass = await uow.findById(school.id, params.passId);
    if (!pass) throw PassErrors.passNotFound({ passId: params.passId });

    deps.guard.assert(actor, 'pass.revoke', passTarget(pass));

    const transition = revoke(pass, { notes: params.notes, now });
    const updated = await uow.update(pass.id, transition.from, transition.patch);
    if (!updated) throw PassErrors.concurrentUpdate({ passId: pass.id });

    if (transition.from === 'active') await deps.admission.release(uow, school);

    const audit = passAuditWriter(uow, { schoolId: school.id, actor, meta });
    await auditPassTransition(audit, transition, {}, 'pass.revoked');
    return updated;
  });

  deps.logger.warn('pass.revoked', {
    flow: 'passes.revoke',
    schoolId: school.id,
    passId: revoked.id,
    revokedBy: actor.userId,
  });

  return revoked;
}
