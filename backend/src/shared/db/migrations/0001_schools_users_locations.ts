/**
 * src/shared/db/migrations/0001_schools_users_locations.ts
 *
 * WHY:
 * - Schools are the isolation boundary: every user, location and pass belongs to one.
 * - School rows double as the admission lock (SELECT ... FOR UPDATE) for pass writes.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  await db.schema
    .createTable('schools')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    // subdomain key (e.g. edison). Used for routing only.
    .addColumn('key', 'text', (col) => col.notNull().unique())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('timezone', 'text', (col) => col.notNull().defaultTo('UTC'))
    .addColumn('concurrent_pass_limit', 'integer', (col) => col.notNull().defaultTo(5))
    .addColumn('default_pass_duration', 'integer', (col) => col.notNull().defaultTo(10))
    .addColumn('activation_window_minutes', 'integer', (col) => col.notNull().defaultTo(15))
    .addColumn('overdue_grace_minutes', 'integer', (col) => col.notNull().defaultTo(5))
    .addColumn('pre_approved_rules', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE schools
      ADD CONSTRAINT schools_concurrent_pass_limit_check CHECK (concurrent_pass_limit >= 1),
      ADD CONSTRAINT schools_default_pass_duration_check CHECK (default_pass_duration >= 1);
  `.execute(db);

  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('school_id', 'uuid', (col) =>
      col.notNull().references('schools.id').onDelete('cascade'),
    )
    .addColumn('role', 'text', (col) => col.notNull())
    .addColumn('display_name', 'text', (col) => col.notNull())
    .addColumn('email', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE users
      ADD CONSTRAINT users_role_check
      CHECK (role IN ('student','teacher','administrator'));
  `.execute(db);

  await db.schema.createIndex('users_school_id_idx').on('users').column('school_id').execute();

  await db.schema
    .createTable('locations')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('school_id', 'uuid', (col) =>
      col.notNull().references('schools.id').onDelete('cascade'),
    )
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('description', 'text')
    .addColumn('room_number', 'text')
    .addColumn('default_duration', 'integer')
    .addColumn('requires_approval', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('summons_only', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('early_release_only', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE locations
      ADD CONSTRAINT locations_single_restriction_check
      CHECK (NOT (summons_only AND early_release_only));
  `.execute(db);

  await sql`
    CREATE UNIQUE INDEX locations_school_name_unique
      ON locations (school_id, lower(name));
  `.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('locations').ifExists().execute();
  await db.schema.dropTable('users').ifExists().execute();
  await db.schema.dropTable('schools').ifExists().execute();
}
