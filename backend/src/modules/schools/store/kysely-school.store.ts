/**
 * backend/src/modules/schools/store/kysely-school.store.ts
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Location, NewLocation, School, SchoolSettingsPatch, SchoolSnapshot } from '../school.types';
import type { SchoolStore } from './school.store';
import { SchoolRepo } from '../dal/school.repo';
import { getSchoolSnapshot, toLocation, toSchool } from '../queries/school.queries';

export class KyselySchoolStore implements SchoolStore {
  private readonly repo: SchoolRepo;

  constructor(private readonly db: DbExecutor) {
    this.repo = new SchoolRepo(db);
  }

  getSnapshot(schoolId: string): Promise<SchoolSnapshot | undefined> {
    return getSchoolSnapshot(this.db, schoolId);
  }

  async updateSettings(
    schoolId: string,
    patch: SchoolSettingsPatch,
    now: Date,
  ): Promise<School | undefined> {
    const row = await this.repo.updateSettings(schoolId, patch, now);
    return row ? toSchool(row) : undefined;
  }

  async createLocation(schoolId: string, input: NewLocation): Promise<Location> {
    return toLocation(await this.repo.insertLocation(schoolId, input));
  }
}
