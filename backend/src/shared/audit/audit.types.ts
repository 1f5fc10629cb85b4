/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (compliance trail: who moved which pass, when).
 * - AuditContext groups the request-level fields that repeat on every event.
 *
 * RULES:
 * - Metadata is a plain object (the sink serializes it).
 * - Never import module types here (shared must stay module-agnostic).
 */

export type KnownAuditAction =
  | 'pass.created'
  | 'pass.approved'
  | 'pass.denied'
  | 'pass.activated'
  | 'pass.completed'
  | 'pass.expired'
  | 'pass.revoked'
  | 'school.settings.updated'
  | 'school.location.created';

export type AuditAction = KnownAuditAction;

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context shared by every audit event in one request.
 * Background work (expiry sweep) has no request, so those fields stay null.
 */
export type AuditContext = {
  schoolId: string | null;
  userId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};

/** Where audit events land. AuditRepo in prod, InMemAuditLog in tests. */
export interface AuditSink {
  append(event: AuditEventInsert): Promise<void>;
}
