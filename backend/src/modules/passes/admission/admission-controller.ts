/**
 * backend/src/modules/passes/admission/admission-controller.ts
 *
 * WHY:
 * - A school caps how many students may be out of class at once.
 *
 * RULES:
 * - Must be called inside PassStore.withSchoolLock(): the count and the
 *   activation that follows it are one atomic step.
 * - The cap is re-read under the lock; a settings change may have landed after
 *   the caller's snapshot was taken.
 * - Occupancy is derived from active passes, never stored separately, so it
 *   cannot drift from the passes themselves.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { School } from '../../schools';
import type { PassUnitOfWork } from '../store/pass.store';

type OccupancyLedger = Pick<PassUnitOfWork, 'countActive' | 'concurrentPassLimit'>;

export type Occupancy = Readonly<{ activeCount: number; limit: number }>;

export type AdmissionDecision =
  | Readonly<{ admitted: true; occupancy: Occupancy }>
  | Readonly<{ admitted: false; reason: 'AT_CAPACITY'; occupancy: Occupancy }>;

async function currentLimit(uow: OccupancyLedger, school: School): Promise<number> {
  return (await uow.concurrentPassLimit(school.id)) ?? school.concurrentPassLimit;
}

export class AdmissionController {
  constructor(private readonly deps: { logger: Logger }) {}

  /** On success, occupancy.activeCount already includes the slot being granted. */
  async tryAdmit(uow: OccupancyLedger, school: School): Promise<AdmissionDecision> {
    const activeCount = await uow.countActive(school.id);
    const limit = await currentLimit(uow, school);

    if (activeCount >= limit) {
      this.deps.logger.info('pass.admission.denied', {
        flow: 'passes.admission',
        schoolId: school.id,
        activeCount,
        limit,
      });
      return { admitted: false, reason: 'AT_CAPACITY', occupancy: { activeCount, limit } };
    }

    return { admitted: true, occupancy: { activeCount: activeCount + 1, limit } };
  }

  /** Call after the pass has left `active` in the same unit of work. */
  async release(uow: OccupancyLedger, school: School): Promise<Occupancy> {
    const occupancy = {
      activeCount: await uow.countActive(school.id),
      limit: await currentLimit(uow, school),
    };

    this.deps.logger.debug('pass.admission.released', {
      flow: 'passes.admission',
      schoolId: school.id,
      ...occupancy,
    });

    return occupancy;
  }
}
