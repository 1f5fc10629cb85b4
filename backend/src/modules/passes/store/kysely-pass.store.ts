/**
 * backend/src/modules/passes/store/kysely-pass.store.ts
 *
 * WHY:
 * - Postgres implementation of PassStore.
 *
 * RULES:
 * - withSchoolLock() is the only place pass transactions start.
 * - The school row lock is taken first, before any pass is read.
 */

import type { Db, DbExecutor } from '../../../shared/db/db';
import type { AuditSink } from '../../../shared/audit/audit.types';
import { AuditRepo } from '../../../shared/audit/audit.repo';
import { KyselySchoolStore, type CapacityScope } from '../../schools';
import type { NewPass, Pass, PassListFilter, PassPatch, PassStatus } from '../pass.types';
import type { PassStore, PassUnitOfWork } from './pass.store';
import { PassRepo } from '../dal/pass.repo';
import {
  countActivePassesSql,
  lockSchoolRowSql,
  selectConcurrentPassLimitSql,
  selectSchoolIdsWithOpenPassesSql,
} from '../dal/pass.query-sql';
import {
  getActivePassByCode,
  getOpenPassForStudent,
  getPassById,
  listPasses,
  toPass,
} from '../queries/pass.queries';

class KyselyPassUnitOfWork implements PassUnitOfWork {
  readonly audit: AuditSink;
  private readonly repo: PassRepo;

  constructor(private readonly trx: DbExecutor) {
    this.audit = new AuditRepo(trx);
    this.repo = new PassRepo(trx);
  }

  findById(schoolId: string, passId: string): Promise<Pass | undefined> {
    return getPassById(this.trx, schoolId, passId);
  }

  list(filter: PassListFilter): Promise<Pass[]> {
    return listPasses(this.trx, filter);
  }

  countActive(schoolId: string): Promise<number> {
    return countActivePassesSql(this.trx, schoolId);
  }

  concurrentPassLimit(schoolId: string): Promise<number | undefined> {
    return selectConcurrentPassLimitSql(this.trx, schoolId);
  }

  findOpenForStudent(schoolId: string, studentId: string): Promise<Pass | undefined> {
    return getOpenPassForStudent(this.trx, schoolId, studentId);
  }

  findActiveByCode(schoolId: string, code: string): Promise<Pass | undefined> {
    return getActivePassByCode(this.trx, schoolId, code);
  }

  async insert(pass: NewPass): Promise<Pass> {
    return toPass(await this.repo.insertPass(pass));
  }

  async update(passId: string, expected: PassStatus, patch: PassPatch): Promise<Pass | undefined> {
    const row = await this.repo.updatePassIfStatus(passId, expected, patch);
    return row ? toPass(row) : undefined;
  }
}

export class KyselyPassStore implements PassStore {
  constructor(private readonly db: Db) {}

  findById(schoolId: string, passId: string): Promise<Pass | undefined> {
    return getPassById(this.db, schoolId, passId);
  }

  list(filter: PassListFilter): Promise<Pass[]> {
    return listPasses(this.db, filter);
  }

  listSchoolIdsWithOpenPasses(): Promise<string[]> {
    return selectSchoolIdsWithOpenPassesSql(this.db);
  }

  withSchoolLock<T>(schoolId: string, work: (uow: PassUnitOfWork) => Promise<T>): Promise<T> {
    return this.db.transaction().execute(async (trx) => {
      await lockSchoolRowSql(trx, schoolId);
      return work(new KyselyPassUnitOfWork(trx));
    });
  }

  withCapacityLock<T>(schoolId: string, work: (scope: CapacityScope) => Promise<T>): Promise<T> {
    return this.db.transaction().execute(async (trx) => {
      await lockSchoolRowSql(trx, schoolId);
      const activeCount = await countActivePassesSql(trx, schoolId);
      return work({ activeCount, schools: new KyselySchoolStore(trx) });
    });
  }
}
