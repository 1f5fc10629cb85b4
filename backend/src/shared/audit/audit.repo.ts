/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit persistence.
 *
 * RULES:
 * - DAL-style component: DB concerns only. No business rules, no AppError.
 * - Must work with both DB and transactions (DbExecutor). Pass units of work
 *   construct one on their trx so the audit row commits with the change it describes.
 */

import type { DbExecutor } from '../db/db';
import type { AuditEventInsert, AuditSink } from './audit.types';

export class AuditRepo implements AuditSink {
  constructor(private readonly db: DbExecutor) {}

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        action: event.action,
        school_id: event.schoolId,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        // JSON.stringify drops undefined and functions; jsonb parses the text
        metadata: JSON.stringify(event.metadata ?? {}),
      })
      .execute();
  }
}
