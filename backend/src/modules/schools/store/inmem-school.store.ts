/**
 * backend/src/modules/schools/store/inmem-school.store.ts
 *
 * WHY:
 * - Lets tests and flow specs run without Postgres.
 * - insertSchool() is a fixture helper; production code never calls it.
 *
 * RULES:
 * - Returns copies so callers can't mutate stored state.
 */

import { randomUUID } from 'node:crypto';
import {
  SCHOOL_DEFAULTS,
  type Location,
  type NewLocation,
  type PreApprovedRules,
  type School,
  type SchoolSettingsPatch,
  type SchoolSnapshot,
} from '../school.types';
import type { SchoolStore } from './school.store';

export type NewSchool = Readonly<{
  key: string;
  name: string;
  timezone?: string;
  concurrentPassLimit?: number;
  defaultPassDuration?: number;
  activationWindowMinutes?: number;
  overdueGraceMinutes?: number;
  preApprovedRules?: PreApprovedRules;
}>;

export class InMemSchoolStore implements SchoolStore {
  private readonly schools = new Map<string, School>();
  private readonly locations = new Map<string, Location>();

  insertSchool(input: NewSchool): School {
    const now = new Date();
    const school: School = {
      id: randomUUID(),
      key: input.key,
      name: input.name,
      timezone: input.timezone ?? SCHOOL_DEFAULTS.timezone,
      concurrentPassLimit: input.concurrentPassLimit ?? SCHOOL_DEFAULTS.concurrentPassLimit,
      defaultPassDuration: input.defaultPassDuration ?? SCHOOL_DEFAULTS.defaultPassDuration,
      activationWindowMinutes:
        input.activationWindowMinutes ?? SCHOOL_DEFAULTS.activationWindowMinutes,
      overdueGraceMinutes: input.overdueGraceMinutes ?? SCHOOL_DEFAULTS.overdueGraceMinutes,
      preApprovedRules: input.preApprovedRules ?? {},
      createdAt: now,
      updatedAt: now,
    };
    this.schools.set(school.id, school);
    return structuredClone(school);
  }

  getSnapshot(schoolId: string): Promise<SchoolSnapshot | undefined> {
    const school = this.schools.get(schoolId);
    if (!school) return Promise.resolve(undefined);

    const locations = [...this.locations.values()]
      .filter((l) => l.schoolId === schoolId)
      .sort((a, b) => a.name.localeCompare(b.name));

    return Promise.resolve(structuredClone({ school, locations }));
  }

  updateSettings(
    schoolId: string,
    patch: SchoolSettingsPatch,
    now: Date,
  ): Promise<School | undefined> {
    const existing = this.schools.get(schoolId);
    if (!existing) return Promise.resolve(undefined);

    const updated: School = { ...existing, ...patch, updatedAt: now };
    this.schools.set(schoolId, updated);
    return Promise.resolve(structuredClone(updated));
  }

  createLocation(schoolId: string, input: NewLocation): Promise<Location> {
    const location: Location = {
      id: randomUUID(),
      schoolId,
      name: input.name,
      description: input.description ?? null,
      roomNumber: input.roomNumber ?? null,
      defaultDuration: input.defaultDuration ?? null,
      requiresApproval: input.requiresApproval ?? true,
      summonsOnly: input.summonsOnly ?? false,
      earlyReleaseOnly: input.earlyReleaseOnly ?? false,
      isActive: input.isActive ?? true,
      createdAt: new Date(),
    };
    this.locations.set(location.id, location);
    return Promise.resolve(structuredClone(location));
  }
}
