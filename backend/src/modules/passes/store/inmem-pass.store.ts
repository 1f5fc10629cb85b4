/**
 * backend/src/modules/passes/store/inmem-pass.store.ts
 *
 * WHY:
 * - Same locking and commit semantics as the Postgres store, in process, so
 *   flow specs exercise real contention without a database.
 *
 * HOW IT WORKS:
 * - Units of work for one school run one after another (promise chain per school).
 * - Cap changes queue on the same chain as pass units of work.
 * - Writes and audit events are staged; they reach shared state only if `work` resolves.
 */

import { randomUUID } from 'node:crypto';
import type { AuditEventInsert, AuditSink } from '../../../shared/audit/audit.types';
import type { CapacityScope, SchoolStore } from '../../schools';
import {
  isOpenStatus,
  type NewPass,
  type Pass,
  type PassListFilter,
  type PassPatch,
  type PassStatus,
} from '../pass.types';
import type { PassStore, PassUnitOfWork } from './pass.store';

function matches(pass: Pass, filter: PassListFilter): boolean {
  if (pass.schoolId !== filter.schoolId) return false;
  if (filter.studentId && pass.studentId !== filter.studentId) return false;
  if (filter.approverId && pass.approverId !== filter.approverId) return false;
  if (filter.statuses && !filter.statuses.includes(pass.status)) return false;
  if (filter.createdSince && pass.createdAt < filter.createdSince) return false;
  return true;
}

function countActiveIn(passes: Iterable<Pass>, schoolId: string): number {
  let count = 0;
  for (const p of passes) if (p.schoolId === schoolId && p.status === 'active') count++;
  return count;
}

function listFrom(passes: Iterable<Pass>, filter: PassListFilter): Pass[] {
  const out = [...passes]
    .filter((p) => matches(p, filter))
    .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  return filter.limit ? out.slice(0, filter.limit) : out;
}

class InMemPassUnitOfWork implements PassUnitOfWork {
  readonly staged = new Map<string, Pass>();
  readonly stagedAudit: AuditEventInsert[] = [];

  readonly audit: AuditSink = {
    append: (event) => {
      this.stagedAudit.push(event);
      return Promise.resolve();
    },
  };

  constructor(
    private readonly committed: ReadonlyMap<string, Pass>,
    private readonly schools: Pick<SchoolStore, 'getSnapshot'>,
  ) {}

  private view(): Map<string, Pass> {
    return new Map([...this.committed, ...this.staged]);
  }

  findById(schoolId: string, passId: string): Promise<Pass | undefined> {
    const pass = this.view().get(passId);
    return Promise.resolve(pass && pass.schoolId === schoolId ? pass : undefined);
  }

  list(filter: PassListFilter): Promise<Pass[]> {
    return Promise.resolve(listFrom(this.view().values(), filter));
  }

  countActive(schoolId: string): Promise<number> {
    return Promise.resolve(countActiveIn(this.view().values(), schoolId));
  }

  async concurrentPassLimit(schoolId: string): Promise<number | undefined> {
    const snapshot = await this.schools.getSnapshot(schoolId);
    return snapshot?.school.concurrentPassLimit;
  }

  findOpenForStudent(schoolId: string, studentId: string): Promise<Pass | undefined> {
    return Promise.resolve(
      [...this.view().values()].find(
        (p) => p.schoolId === schoolId && p.studentId === studentId && isOpenStatus(p.status),
      ),
    );
  }

  findActiveByCode(schoolId: string, code: string): Promise<Pass | undefined> {
    return Promise.resolve(
      [...this.view().values()].find(
        (p) => p.schoolId === schoolId && p.status === 'active' && p.verificationCode === code,
      ),
    );
  }

  insert(pass: NewPass): Promise<Pass> {
    const created: Pass = { ...pass, id: randomUUID() };
    this.staged.set(created.id, created);
    return Promise.resolve(created);
  }

  update(passId: string, expected: PassStatus, patch: PassPatch): Promise<Pass | undefined> {
    const current = this.view().get(passId);
    if (!current || current.status !== expected) return Promise.resolve(undefined);

    const updated: Pass = { ...current, ...patch };
    this.staged.set(passId, updated);
    return Promise.resolve(updated);
  }
}

export class InMemPassStore implements PassStore {
  private readonly passes = new Map<string, Pass>();
  private readonly tails = new Map<string, Promise<void>>();

  constructor(
    private readonly auditSink: AuditSink,
    private readonly schoolStore: SchoolStore,
  ) {}

  findById(schoolId: string, passId: string): Promise<Pass | undefined> {
    const pass = this.passes.get(passId);
    return Promise.resolve(pass && pass.schoolId === schoolId ? pass : undefined);
  }

  list(filter: PassListFilter): Promise<Pass[]> {
    return Promise.resolve(listFrom(this.passes.values(), filter));
  }

  listSchoolIdsWithOpenPasses(): Promise<string[]> {
    const ids = new Set<string>();
    for (const pass of this.passes.values()) {
      if (isOpenStatus(pass.status)) ids.add(pass.schoolId);
    }
    return Promise.resolve([...ids]);
  }

  withSchoolLock<T>(schoolId: string, work: (uow: PassUnitOfWork) => Promise<T>): Promise<T> {
    return this.serialize(schoolId, () => this.runUnitOfWork(work));
  }

  withCapacityLock<T>(schoolId: string, work: (scope: CapacityScope) => Promise<T>): Promise<T> {
    return this.serialize(schoolId, () =>
      work({
        activeCount: countActiveIn(this.passes.values(), schoolId),
        schools: this.schoolStore,
      }),
    );
  }

  private serialize<T>(schoolId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(schoolId) ?? Promise.resolve();
    const run = previous.then(task);

    // The next unit of work waits for this one to settle either way; the caller sees the rejection through `run`.
    this.tails.set(
      schoolId,
      run.then(
        () => undefined,
        () => undefined,
      ),
    );

    return run;
  }

  private async runUnitOfWork<T>(work: (uow: PassUnitOfWork) => Promise<T>): Promise<T> {
    const uow = new InMemPassUnitOfWork(this.passes, this.schoolStore);
    const result = await work(uow);

    for (const [id, pass] of uow.staged) this.passes.set(id, pass);
    for (const event of uow.stagedAudit) await this.auditSink.append(event);

    return result;
  }
}
