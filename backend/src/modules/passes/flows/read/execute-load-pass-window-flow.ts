/**
 * backend/src/modules/passes/flows/read/execute-load-pass-window-flow.ts
 *
 * WHY:
 * - Dashboards read every pass of a school created since a point in time, plus
 *   the live occupancy. Stale open passes are expired first so neither figure
 *   counts a student who should already be back.
 *
 * RULES:
 * - No guard here; the caller (analytics) authorizes before loading.
 */

import type { School } from '../../../schools';
import { OPEN_PASS_STATUSES, type Pass } from '../../pass.types';
import { passAuditWriter } from '../../pass.audit';
import { expireAllDue } from '../expire/expire-if-due';
import type { PassFlowDeps } from '../pass-flow.types';

export type PassWindow = Readonly<{
  passes: Pass[];
  activeCount: number;
}>;

export async function executeLoadPassWindowFlow(
  deps: Pick<PassFlowDeps, 'passStore' | 'admission' | 'clock' | 'logger'>,
  params: Readonly<{ school: School; since: Date }>,
): Promise<PassWindow> {
  const { school, since } = params;
  const now = deps.clock.now();

  return deps.passStore.withSchoolLock(school.id, async (uow) => {
    const open = await uow.list({ schoolId: school.id, statuses: OPEN_PASS_STATUSES });
    const audit = passAuditWriter(uow, { schoolId: school.id, actor: null, meta: null });
    await expireAllDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      open,
    );

    const passes = await uow.list({ schoolId: school.id, createdSince: since });
    const activeCount = await uow.countActive(school.id);
    return { passes, activeCount };
  });
}
