/**
 * backend/src/modules/passes/flows/expire/execute-expiry-sweep-flow.ts
 *
 * WHY:
 * - Lazy expiry covers every pass someone looks at. The sweep covers the rest,
 *   so dashboards and admission counts don't carry passes nobody has read.
 *
 * RULES:
 * - One school lock per school; a failing school does not stop the others.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { Clock } from '../../../../shared/time/clock';
import type { SchoolStore } from '../../../schools';
import { OPEN_PASS_STATUSES } from '../../pass.types';
import type { AdmissionController } from '../../admission/admission-controller';
import type { PassStore } from '../../store/pass.store';
import { passAuditWriter } from '../../pass.audit';
import { expireAllDue } from './expire-if-due';

export type ExpirySweepDeps = Readonly<{
  passStore: PassStore;
  schoolStore: SchoolStore;
  admission: AdmissionController;
  clock: Clock;
  logger: Logger;
}>;

export type ExpirySweepResult = Readonly<{
  schoolsScanned: number;
  expired: number;
  failedSchools: number;
}>;

export async function executeExpirySweepFlow(deps: ExpirySweepDeps): Promise<ExpirySweepResult> {
  const schoolIds = await deps.passStore.listSchoolIdsWithOpenPasses();
  let expired = 0;
  let failedSchools = 0;

  for (const schoolId of schoolIds) {
    try {
      expired += await sweepSchool(deps, schoolId);
    } catch (err) {
      failedSchools += 1;
      deps.logger.error('pass.expiry_sweep.school_failed', {
        flow: 'passes.expiry_sweep',
        schoolId,
        err,
      });
    }
  }

  return { schoolsScanned: schoolIds.length, expired, failedSchools };
}

async function sweepSchool(deps: ExpirySweepDeps, schoolId: string): Promise<number> {
  const snapshot = await deps.schoolStore.getSnapshot(schoolId);
  if (!snapshot) return 0;

  const { school } = snapshot;
  const now = deps.clock.now();

  return deps.passStore.withSchoolLock(school.id, async (uow) => {
    const open = await uow.list({ schoolId: school.id, statuses: OPEN_PASS_STATUSES });
    const audit = passAuditWriter(uow, { schoolId: school.id, actor: null, meta: null });

    const after = await expireAllDue(
      { uow, school, admission: deps.admission, audit, logger: deps.logger, now },
      open,
    );
    return after.filter((p, i) => p !== open[i]).length;
  });
}
