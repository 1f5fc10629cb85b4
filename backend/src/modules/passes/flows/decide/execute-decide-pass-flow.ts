/**
 * backend/src/modules/passes/flows/decide/execute-decide-pass-flow.ts
 *
 * WHY:
 * - Staff approve or deny a pending request.
 *
 * RULES:
 * - Only pending passes can be decided (anything else is an INVALID_STATE error).
 * - A request whose activation window already elapsed expires instead; the
 *   expiry commits and the caller gets PASS_EXPIRED.
 */

import type { Pass } from '../../pass.types';
import { PassErrors } from '../../pass.errors';
import { approve, deny } from '../../lifecycle/pass-state-machine';
import { auditPassTransition, passAuditWriter } from '../../pass.audit';
import { expireIfDue } from '../expire/expire-if-due';
import { passTarget } from '../pass-target';
import type { PassFlowContext, PassFlowDeps } from '../pass-flow.types';

export type PassDecision = 'approve' | 'deny';

export type DecidePassParams = Readonly<{
  passId: string;
  decision: PassDecision;
  notes?: string | null;
}>;

export async function executeDecidePassFlow(
  deps: PassFlowDeps,
  ctx: PassFlowContext,
  params: DecidePassParams,
): Promise<Pass> {
  const { actor, snapshot, meta } = ctx;
  const { school } = snapshot;
  const now = deps.clock.now();

  const result = await deps.passStore.withSchoolLock(school.id, async (uow) => {
    const pass = await uow.findById(school.id, params.passId);
    if (!pass) return { kind: 'not_found' } as const;

    deps.guard.assert(actor, 'pass.decide', passTarget(pass));

    const audit = passAuditWriter(uow, { schoolId: school.id, actor, meta });
    const current = await expireIfDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      pass,
    );
    if (current !== pass) return { kind: 'expired', pass: current } as const;

    const input = { approverId: actor.userId, notes: params.notes ?? null, now };
    const transition = params.decision === 'approve' ? approve(pass, input) : deny(pass, input);

    const updated = await uow.update(pass.id, transition.from, transition.patch);
    if (!updated) throw PassErrors.concurrentUpdate({ passId: pass.id });

    await auditPassTransition(audit, transition, { decision: params.decision });
    return { kind: 'decided', pass: updated } as const;
  });

  if (result.kind === 'not_found') throw PassErrors.passNotFound({ passId: params.passId });
  if (result.kind === 'expired') {
    throw PassErrors.passExpired({ passId: result.pass.id, expiredAt: result.pass.expiredAt });
  }

  deps.logger.info(`pass.${params.decision === 'approve' ? 'approved' : 'denied'}`, {
    flow: 'passes.decide',
    schoolId: school.id,
    passId: result.pass.id,
    approverId: actor.userId,
  });

  return result.pass;
}
