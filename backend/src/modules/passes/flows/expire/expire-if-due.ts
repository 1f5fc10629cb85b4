/**
 * backend/src/modules/passes/flows/expire/expire-if-due.ts
 *
 * WHY:
 * - Expiry is evaluated lazily on every read or transition (and by the sweeper),
 *   so a pass is never observed in a state it should already have left.
 *
 * RULES:
 * - Runs inside withSchoolLock(). Writes the expiry + audit in that unit of work.
 * - An expired active pass frees its admission slot.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { School } from '../../../schools';
import type { AdmissionController } from '../../admission/admission-controller';
import type { Pass } from '../../pass.types';
import type { PassUnitOfWork } from '../../store/pass.store';
import { PassErrors } from '../../pass.errors';
import { expire } from '../../lifecycle/pass-state-machine';
import { expiryDeadline, isExpiryDue } from '../../policies/pass-window.policy';
import { auditPassTransition } from '../../pass.audit';

export type ExpiryEnv = Readonly<{
  uow: PassUnitOfWork;
  school: School;
  admission: AdmissionController;
  audit: AuditWriter;
  logger: Logger;
  now: Date;
}>;

export async function expireIfDue(env: ExpiryEnv, pass: Pass): Promise<Pass> {
  if (!isExpiryDue(pass, env.school, env.now)) return pass;

  const deadline = expiryDeadline(pass, env.school);
  const transition = expire(pass, { now: env.now });

  const updated = await env.uow.update(pass.id, transition.from, transition.patch);
  if (!updated) throw PassErrors.concurrentUpdate({ passId: pass.id });

  if (transition.from === 'active') {
    await env.admission.release(env.uow, env.school);
  }

  await auditPassTransition(env.audit, transition, {
    deadline: deadline ? deadline.toISOString() : null,
  });

  env.logger.info('pass.expired', {
    flow: 'passes.expire',
    schoolId: pass.schoolId,
    passId: pass.id,
    from: transition.from,
  });

  return updated;
}

export async function expireAllDue(env: ExpiryEnv, passes: readonly Pass[]): Promise<Pass[]> {
  const out: Pass[] = [];
  for (const pass of passes) out.push(await expireIfDue(env, pass));
  return out;
}
