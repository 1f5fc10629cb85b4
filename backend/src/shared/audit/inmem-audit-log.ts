/**
 * src/shared/audit/inmem-audit-log.ts
 *
 * WHY:
 * - Tests assert on the audit trail without a database.
 */

import type { AuditAction, AuditEventInsert, AuditSink } from './audit.types';

export class InMemAuditLog implements AuditSink {
  private readonly events: AuditEventInsert[] = [];

  append(event: AuditEventInsert): Promise<void> {
    this.events.push({ ...event, metadata: { ...event.metadata } });
    return Promise.resolve();
  }

  list(action?: AuditAction): AuditEventInsert[] {
    return action ? this.events.filter((e) => e.action === action) : [...this.events];
  }
}
