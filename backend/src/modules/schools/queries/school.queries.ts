/**
 * backend/src/modules/schools/queries/school.queries.ts
 *
 * WHY:
 * - Shape DB rows into School / Location domain types.
 *
 * RULES:
 * - Read-only. No AppError.
 * - Malformed pre-approved rules are dropped rather than failing the whole school.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { Location, PreApprovedRule, School, SchoolSnapshot } from '../school.types';
import { preApprovedRuleSchema } from '../school.schemas';
import {
  selectLocationsBySchoolSql,
  selectSchoolByIdSql,
  type LocationRow,
  type SchoolRow,
} from '../dal/school.query-sql';

export function parsePreApprovedRules(value: unknown): Record<string, PreApprovedRule> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return {};

  const out: Record<string, PreApprovedRule> = {};
  for (const [name, raw] of Object.entries(value)) {
    const parsed = preApprovedRuleSchema.safeParse(raw);
    if (parsed.success) out[name.trim().toLowerCase()] = parsed.data;
  }
  return out;
}

export function toSchool(row: SchoolRow): School {
  return {
    id: row.id,
    key: row.key,
    name: row.name,
    timezone: row.timezone,
    concurrentPassLimit: row.concurrent_pass_limit,
    defaultPassDuration: row.default_pass_duration,
    activationWindowMinutes: row.activation_window_minutes,
    overdueGraceMinutes: row.overdue_grace_minutes,
    preApprovedRules: parsePreApprovedRules(row.pre_approved_rules),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toLocation(row: LocationRow): Location {
  return {
    id: row.id,
    schoolId: row.school_id,
    name: row.name,
    description: row.description,
    roomNumber: row.room_number,
    defaultDuration: row.default_duration,
    requiresApproval: row.requires_approval,
    summonsOnly: row.summons_only,
    earlyReleaseOnly: row.early_release_only,
    isActive: row.is_active,
    createdAt: row.created_at,
  };
}

export async function getSchoolSnapshot(
  db: DbExecutor,
  schoolId: string,
): Promise<SchoolSnapshot | undefined> {
  const row = await selectSchoolByIdSql(db, schoolId);
  if (!row) return undefined;

  const locations = await selectLocationsBySchoolSql(db, schoolId);
  return { school: toSchool(row), locations: locations.map(toLocation) };
}
