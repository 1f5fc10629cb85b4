/**
 * backend/src/modules/passes/flows/read/execute-read-passes-flow.ts
 *
 * WHY:
 * - Reads go through the school lock too: any pass whose deadline has passed
 *   is expired before it is returned, so nobody sees a stale "active".
 *
 * RULES:
 * - Students read only their own passes; staff read the whole school.
 */

import type { Pass, PassListFilter, PassStatus } from '../../pass.types';
import { PassErrors } from '../../pass.errors';
import { passAuditWriter } from '../../pass.audit';
import { expireAllDue, expireIfDue } from '../expire/expire-if-due';
import { passTarget } from '../pass-target';
import type { PassFlowContext, PassFlowDeps } from '../pass-flow.types';

export const DEFAULT_LIST_LIMIT = 100;

export async function executeGetPassFlow(
  deps: PassFlowDeps,
  ctx: PassFlowContext,
  params: Readonly<{ passId: string }>,
): Promise<Pass> {
  const { actor, snapshot, meta } = ctx;
  const { school } = snapshot;
  const now = deps.clock.now();

  const pass = await deps.passStore.withSchoolLock(school.id, async (uow) => {
    const found = await uow.findById(school.id, params.passId);
    if (!found) throw PassErrors.passNotFound({ passId: params.passId });

    deps.guard.assert(actor, 'pass.view', passTarget(found));

    const audit = passAuditWriter(uow, { schoolId: school.id, actor, meta });
    return expireIfDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      found,
    );
  });

  return pass;
}

export type ListPassesScope =
  | Readonly<{ kind: 'mine' }>
  | Readonly<{ kind: 'school'; statuses?: readonly PassStatus[] }>
  | Readonly<{ kind: 'pending' }>;

export async function executeListPassesFlow(
  deps: PassFlowDeps,
  ctx: PassFlowContext,
  scope: ListPassesScope,
): Promise<Pass[]> {
  const { actor, snapshot, meta } = ctx;
  const { school } = snapshot;
  const now = deps.clock.now();

  let filter: PassListFilter;
  if (scope.kind === 'mine') {
    deps.guard.assert(actor, 'pass.view', {
      kind: 'pass',
      schoolId: school.id,
      studentId: actor.userId,
    });
    filter = { schoolId: school.id, studentId: actor.userId, limit: DEFAULT_LIST_LIMIT };
  } else {
    deps.guard.assert(actor, 'pass.view', { kind: 'school', schoolId: school.id });
    filter = {
      schoolId: school.id,
      statuses: scope.kind === 'pending' ? ['pending'] : scope.statuses,
      limit: DEFAULT_LIST_LIMIT,
    };
  }

  const passes = await deps.passStore.withSchoolLock(school.id, async (uow) => {
    const listed = await uow.list(filter);
    const audit = passAuditWriter(uow, { schoolId: school.id, actor: null, meta });
    return expireAllDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      listed,
    );
  });

  // a status filter must not return passes that just expired out of it
  return filter.statuses ? passes.filter((p) => filter.statuses?.includes(p.status)) : passes;
}
