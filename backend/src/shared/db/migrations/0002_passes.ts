/**
 * src/shared/db/migrations/0002_passes.ts
 *
 * WHY:
 * - The pass table plus the indexes that back the lifecycle invariants.
 *
 * RULES:
 * - The partial unique indexes are a backstop. The service enforces both rules
 *   under the school row lock; these only catch a write that skipped the lock.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('passes')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('school_id', 'uuid', (col) =>
      col.notNull().references('schools.id').onDelete('cascade'),
    )
    .addColumn('student_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('location_id', 'uuid', (col) => col.notNull().references('locations.id'))
    .addColumn('issued_by_id', 'uuid', (col) => col.notNull().references('users.id'))
    .addColumn('approver_id', 'uuid', (col) => col.references('users.id'))
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('requested_start_time', 'timestamptz', (col) => col.notNull())
    .addColumn('requested_end_time', 'timestamptz', (col) => col.notNull())
    .addColumn('allotted_minutes', 'integer', (col) => col.notNull())
    .addColumn('actual_start_time', 'timestamptz')
    .addColumn('actual_end_time', 'timestamptz')
    .addColumn('duration_minutes', 'integer')
    .addColumn('verification_code', 'text')
    .addColumn('is_summons', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_early_release', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('student_reason', 'text')
    .addColumn('approval_notes', 'text')
    .addColumn('admin_notes', 'text')
    .addColumn('decided_at', 'timestamptz')
    .addColumn('expired_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull())
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull())
    .execute();

  await sql`
    ALTER TABLE passes
      ADD CONSTRAINT passes_status_check
      CHECK (status IN ('pending','approved','active','completed','denied','expired')),
      ADD CONSTRAINT passes_single_flag_check
      CHECK (NOT (is_summons AND is_early_release)),
      ADD CONSTRAINT passes_duration_check
      CHECK (duration_minutes IS NULL OR duration_minutes >= 0);
  `.execute(db);

  await sql`
    CREATE UNIQUE INDEX passes_one_open_per_student
      ON passes (school_id, student_id)
      WHERE status IN ('pending','approved','active');
  `.execute(db);

  await sql`
    CREATE UNIQUE INDEX passes_active_code_unique
      ON passes (school_id, verification_code)
      WHERE status = 'active';
  `.execute(db);

  await db.schema
    .createIndex('passes_school_status_idx')
    .on('passes')
    .columns(['school_id', 'status'])
    .execute();

  await db.schema
    .createIndex('passes_school_created_at_idx')
    .on('passes')
    .columns(['school_id', 'created_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('passes').ifExists().execute();
}
