/**
 * backend/src/modules/passes/pass.audit.ts
 *
 * WHY:
 * - One audit row per status change, written in the same unit of work as the change.
 *
 * RULES:
 * - Never include the verification code.
 */

import { AuditWriter } from '../../shared/audit/audit.writer';
import type { AuditAction } from '../../shared/audit/audit.types';
import type { RequestMeta } from '../../shared/http/require-auth-context';
import type { Actor } from '../access';
import type { Pass, PassOrigin, PassStatus } from './pass.types';
import type { PassTransition } from './lifecycle/pass-state-machine';
import type { PassUnitOfWork } from './store/pass.store';

const TRANSITION_ACTIONS: Readonly<Partial<Record<PassStatus, AuditAction>>> = {
  approved: 'pass.approved',
  denied: 'pass.denied',
  active: 'pass.activated',
  completed: 'pass.completed',
  expired: 'pass.expired',
};

export function passAuditWriter(
  uow: Pick<PassUnitOfWork, 'audit'>,
  input: { schoolId: string; actor: Actor | null; meta: RequestMeta | null },
): AuditWriter {
  return new AuditWriter(uow.audit, {
    schoolId: input.schoolId,
    userId: input.actor?.userId ?? null,
    requestId: input.meta?.requestId ?? null,
    ip: input.meta?.ip ?? null,
    userAgent: input.meta?.userAgent ?? null,
  });
}

export async function auditPassCreated(
  audit: AuditWriter,
  pass: Pass,
  origin: PassOrigin,
): Promise<void> {
  await audit.append('pass.created', {
    passId: pass.id,
    studentId: pass.studentId,
    locationId: pass.locationId,
    status: pass.status,
    origin,
    isSummons: pass.isSummons,
    isEarlyRelease: pass.isEarlyRelease,
  });
}

export async function auditPassTransition(
  audit: AuditWriter,
  transition: PassTransition,
  extra: Record<string, unknown> = {},
  action: AuditAction | undefined = TRANSITION_ACTIONS[transition.to],
): Promise<void> {
  if (!action) return;
  await audit.append(action, {
    passId: transition.passId,
    from: transition.from,
    to: transition.to,
    ...extra,
  });
}
