/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so services don't repeat it on every audit call.
 *
 * RULES:
 * - No module types imported here. No business rules. No AppError.
 */

import type { AuditAction, AuditContext, AuditMetadata, AuditSink } from './audit.types';

const EMPTY_CONTEXT: AuditContext = {
  schoolId: null,
  userId: null,
  requestId: null,
  ip: null,
  userAgent: null,
};

export class AuditWriter {
  private readonly sink: AuditSink;
  private readonly context: Readonly<AuditContext>;

  constructor(sink: AuditSink, context?: Partial<AuditContext>) {
    this.sink = sink;
    this.context = Object.freeze({ ...EMPTY_CONTEXT, ...context });
  }

  async append(action: AuditAction, metadata?: AuditMetadata): Promise<void> {
    await this.sink.append({
      ...this.context,
      action,
      metadata,
    });
  }
}
