/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely table types for the Postgres schema created by ./migrations.
 * - Kept by hand next to the migrations: when a migration changes a table,
 *   this file changes in the same commit.
 *
 * RULES:
 * - Column names are snake_case, exactly as in SQL.
 * - jsonb columns are written as JSON text and read back as `unknown`;
 *   callers parse them (see schools/queries).
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;
type CreatedAt = ColumnType<Date, Date | string | undefined, never>;
type UpdatedAt = ColumnType<Date, Date | string | undefined, Date | string>;
type JsonText = ColumnType<unknown, string, string>;
type JsonTextWithDefault = ColumnType<unknown, string | undefined, string>;

export interface SchoolsTable {
  id: Generated<string>;
  key: string;
  name: string;
  timezone: Generated<string>;
  concurrent_pass_limit: Generated<number>;
  default_pass_duration: Generated<number>;
  activation_window_minutes: Generated<number>;
  overdue_grace_minutes: Generated<number>;
  pre_approved_rules: JsonTextWithDefault;
  created_at: CreatedAt;
  updated_at: UpdatedAt;
}

export interface UsersTable {
  id: Generated<string>;
  school_id: string;
  role: string;
  display_name: string;
  email: string | null;
  created_at: CreatedAt;
}

export interface LocationsTable {
  id: Generated<string>;
  school_id: string;
  name: string;
  description: string | null;
  room_number: string | null;
  default_duration: number | null;
  requires_approval: Generated<boolean>;
  summons_only: Generated<boolean>;
  early_release_only: Generated<boolean>;
  is_active: Generated<boolean>;
  created_at: CreatedAt;
}

export interface PassesTable {
  id: Generated<string>;
  school_id: string;
  student_id: string;
  location_id: string;
  issued_by_id: string;
  approver_id: string | null;
  status: string;
  requested_start_time: Timestamp;
  requested_end_time: Timestamp;
  allotted_minutes: number;
  actual_start_time: Timestamp | null;
  actual_end_time: Timestamp | null;
  duration_minutes: number | null;
  verification_code: string | null;
  is_summons: boolean;
  is_early_release: boolean;
  student_reason: string | null;
  approval_notes: string | null;
  admin_notes: string | null;
  decided_at: Timestamp | null;
  expired_at: Timestamp | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface AuditEventsTable {
  id: Generated<string>;
  school_id: string | null;
  user_id: string | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: JsonText;
  created_at: CreatedAt;
}

export interface DB {
  schools: SchoolsTable;
  users: UsersTable;
  locations: LocationsTable;
  passes: PassesTable;
  audit_events: AuditEventsTable;
}
