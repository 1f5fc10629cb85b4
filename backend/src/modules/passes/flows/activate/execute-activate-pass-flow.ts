/**
 * backend/src/modules/passes/flows/activate/execute-activate-pass-flow.ts
 *
 * WHY:
 * - The student leaves the room: the pass becomes active, takes an admission
 *   slot and gets its verification code.
 *
 * OUTCOMES:
 * - already active             → returned as-is (retry-safe), unless its overdue grace has run out
 * - before requestedStartTime  → INVALID_STATE (ACTIVATION_PREMATURE), nothing written
 * - after the activation window → the pass expires and is returned as expired
 * - school at capacity         → CONFLICT (AT_CAPACITY), nothing written; retry later
 * - pending / denied / completed → INVALID_STATE (INVALID_TRANSITION)
 *
 * RULES:
 * - Capacity count, code issuance and the status change share one school lock.
 */

import type { Pass } from '../../pass.types';
import { PassErrors } from '../../pass.errors';
import { activate } from '../../lifecycle/pass-state-machine';
import { activationWindowState } from '../../policies/pass-window.policy';
import { assertTransition } from '../../policies/pass-transition.policy';
import { auditPassTransition, passAuditWriter } from '../../pass.audit';
import type { Occupancy } from '../../admission/admission-controller';
import { expireIfDue } from '../expire/expire-if-due';
import { passTarget } from '../pass-target';
import type { PassFlowContext, PassFlowDeps } from '../pass-flow.types';

export async function executeActivatePassFlow(
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

    deps.guard.assert(actor, 'pass.activate', passTarget(pass));

    if (pass.status === 'expired') return { kind: 'unchanged', pass } as const;

    const audit = passAuditWriter(uow, { schoolId: school.id, actor, meta });
    const current = await expireIfDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      pass,
    );
    if (current !== pass) return { kind: 'expired', pass: current } as const;
    if (pass.status === 'active') return { kind: 'unchanged', pass } as const;

    assertTransition(pass, 'active');

    if (activationWindowState(pass, school, now) === 'premature') {
      return { kind: 'premature', pass } as const;
    }

    const admission = await deps.admission.tryAdmit(uow, school);
    if (!admission.admitted) return { kind: 'at_capacity', occupancy: admission.occupancy } as const;

    const verificationCode = await deps.issuer.issue(uow, school.id);
    const transition = activate(pass, { verificationCode, now });

    const updated = await uow.update(pass.id, transition.from, transition.patch);
    if (!updated) throw PassErrors.concurrentUpdate({ passId: pass.id });

    await auditPassTransition(audit, transition, { occupancy: admission.occupancy });
    return { kind: 'activated', pass: updated, occupancy: admission.occupancy } as const;
  });

  switch (result.kind) {
    case 'not_found':
      throw PassErrors.passNotFound({ passId: params.passId });
    case 'premature':
      throw PassErrors.activationPremature({
        passId: result.pass.id,
        opensAt: result.pass.requestedStartTime,
      });
    case 'at_capacity':
      throw PassErrors.atCapacity(result.occupancy);
    case 'activated':
      logActivated(deps, result.pass, result.occupancy);
      return result.pass;
    default:
      return result.pass;
  }
}

function logActivated(deps: PassFlowDeps, pass: Pass, occupancy: Occupancy): void {
  deps.logger.info('pass.activated', {
    flow: 'passes.activate',
    schoolId: pass.schoolId,
    passId: pass.id,
    studentId: pass.studentId,
    activeCount: occupancy.activeCount,
    limit: occupancy.limit,
  });
}
