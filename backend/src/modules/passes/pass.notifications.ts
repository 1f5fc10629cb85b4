/**
 * backend/src/modules/passes/pass.notifications.ts
 *
 * WHY:
 * - Summons and early-release passes are issued to a student who isn't at the
 *   staff member's desk, so someone has to be told.
 *
 * RULES:
 * - Enqueue only after the pass has committed.
 */

import type { Queue, QueueMessage } from '../../shared/messaging/queue';
import type { Pass } from './pass.types';

export function issuedPassMessage(pass: Pass): QueueMessage | null {
  const base = {
    schoolId: pass.schoolId,
    passId: pass.id,
    studentId: pass.studentId,
    locationId: pass.locationId,
    issuedById: pass.issuedById,
    requestedStartTime: pass.requestedStartTime.toISOString(),
  };

  if (pass.isSummons) return { type: 'pass.summons.issued', ...base };
  if (pass.isEarlyRelease) return { type: 'pass.early_release.issued', ...base };
  return null;
}

export async function notifyPassIssued(queue: Queue, pass: Pass): Promise<void> {
  const message = issuedPassMessage(pass);
  if (message) await queue.enqueue(message);
}
