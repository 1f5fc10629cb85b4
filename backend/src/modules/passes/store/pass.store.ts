/**
 * backend/src/modules/passes/store/pass.store.ts
 *
 * WHY:
 * - Admission ("is there room?") and the one-open-pass rule are
 *   read-then-write decisions. They are only correct if no other writer for
 *   the same school runs in between, so every pass write happens inside
 *   withSchoolLock().
 *
 * RULES:
 * - Postgres: one transaction + SELECT ... FOR UPDATE on the school row.
 * - In-memory: a per-school mutex; staged writes commit only when `work` resolves.
 * - Settings changes to the cap take the same lock (withCapacityLock), and
 *   admission reads the cap under it.
 * - update() is compare-and-set on the expected status and returns undefined on a miss.
 * - Audit events appended through uow.audit commit or roll back with the pass write.
 */

import type { AuditSink } from '../../../shared/audit/audit.types';
import type { SchoolCapacityLock } from '../../schools';
import type { NewPass, Pass, PassListFilter, PassPatch, PassStatus } from '../pass.types';

export interface PassReader {
  findById(schoolId: string, passId: string): Promise<Pass | undefined>;
  /** Newest first. */
  list(filter: PassListFilter): Promise<Pass[]>;
}

export interface PassUnitOfWork extends PassReader {
  readonly audit: AuditSink;

  countActive(schoolId: string): Promise<number>;
  /** The school's cap as committed, read under the lock. */
  concurrentPassLimit(schoolId: string): Promise<number | undefined>;
  findOpenForStudent(schoolId: string, studentId: string): Promise<Pass | undefined>;
  findActiveByCode(schoolId: string, code: string): Promise<Pass | undefined>;

  insert(pass: NewPass): Promise<Pass>;
  update(passId: string, expected: PassStatus, patch: PassPatch): Promise<Pass | undefined>;
}

export interface PassStore extends PassReader, SchoolCapacityLock {
  withSchoolLock<T>(schoolId: string, work: (uow: PassUnitOfWork) => Promise<T>): Promise<T>;
  listSchoolIdsWithOpenPasses(): Promise<string[]>;
}
