/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "someone must be told about this pass" from how they are told
 *   (push notification, classroom display, front-office pager).
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable (ISO strings, not Dates).
 * - Never put verification codes or session ids in messages.
 */

// ── Message types ─────────────────────────────────────────────

type IssuedPassMessageBase = {
  schoolId: string;
  passId: string;
  studentId: string;
  locationId: string;
  issuedById: string;
  requestedStartTime: string;
};

/** Staff summoned a student to a location (principal, counselor). */
export type PassSummonsIssuedMessage = IssuedPassMessageBase & {
  type: 'pass.summons.issued';
};

/** Front office issued an early-release pass. */
export type PassEarlyReleaseIssuedMessage = IssuedPassMessageBase & {
  type: 'pass.early_release.issued';
};

export type QueueMessage = PassSummonsIssuedMessage | PassEarlyReleaseIssuedMessage;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
