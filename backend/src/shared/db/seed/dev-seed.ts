/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates (each only if missing):
 * - a school
 * - its default locations
 * - one administrator, two teachers, four students
 *
 * Then opens one session per seeded user and logs the session ids, so a
 * developer can call the API with `Cookie: hp_sid=<id>` without the sign-in service.
 *
 * Idempotent: safe to run on every start.
 */

import type { DbExecutor } from '../db';
import type { Role } from '../../../modules/access';
import type { SessionStore } from '../../session/session.store';
import { logger } from '../../logger/logger';

type DevSeedOptions = {
  schoolKey: string;
  schoolName: string;
};

type SeedLocation = {
  name: string;
  description: string;
  defaultDuration: number;
  requiresApproval: boolean;
  summonsOnly?: boolean;
  earlyReleaseOnly?: boolean;
};

const DEFAULT_LOCATIONS: readonly SeedLocation[] = [
  { name: 'Bathroom', description: 'Student restroom', defaultDuration: 10, requiresApproval: true },
  { name: 'Nurse', description: 'School health office', defaultDuration: 20, requiresApproval: false },
  { name: 'Water Fountain', description: 'Get a drink of water', defaultDuration: 5, requiresApproval: true },
  {
    name: 'Principal Office',
    description: 'Administrative office',
    defaultDuration: 15,
    requiresApproval: false,
    summonsOnly: true,
  },
  {
    name: 'Counselor',
    description: 'Student counseling services',
    defaultDuration: 30,
    requiresApproval: false,
    summonsOnly: true,
  },
  {
    name: 'Front Office',
    description: 'Main school office',
    defaultDuration: 15,
    requiresApproval: false,
    earlyReleaseOnly: true,
  },
  { name: 'Library', description: 'School library and media center', defaultDuration: 25, requiresApproval: true },
  { name: 'Other Classroom', description: 'Visit another classroom', defaultDuration: 20, requiresApproval: true },
];

const DEFAULT_USERS: readonly { role: Role; displayName: string; email: string }[] = [
  { role: 'administrator', displayName: 'Admin User', email: 'admin@example.com' },
  { role: 'teacher', displayName: 'Jane Smith', email: 'teacher1@example.com' },
  { role: 'teacher', displayName: 'John Doe', email: 'teacher2@example.com' },
  { role: 'student', displayName: 'Alice Johnson', email: 'student1@example.com' },
  { role: 'student', displayName: 'Bob Wilson', email: 'student2@example.com' },
  { role: 'student', displayName: 'Carol Brown', email: 'student3@example.com' },
  { role: 'student', displayName: 'David Lee', email: 'student4@example.com' },
];

async function ensureSchool(db: DbExecutor, options: DevSeedOptions, flow: string): Promise<string> {
  const existing = await db
    .selectFrom('schools')
    .select(['id'])
    .where('key', '=', options.schoolKey)
    .executeTakeFirst();
  if (existing) return existing.id;

  const inserted = await db
    .insertInto('schools')
    .values({ key: options.schoolKey, name: options.schoolName })
    .returning(['id'])
    .executeTakeFirstOrThrow();

  logger.info('seed.school.created', { flow, schoolKey: options.schoolKey, schoolId: inserted.id });
  return inserted.id;
}

async function ensureLocations(db: DbExecutor, schoolId: string, flow: string): Promise<void> {
  const existing = await db
    .selectFrom('locations')
    .select(['name'])
    .where('school_id', '=', schoolId)
    .execute();
  const taken = new Set(existing.map((l) => l.name.toLowerCase()));

  const missing = DEFAULT_LOCATIONS.filter((l) => !taken.has(l.name.toLowerCase()));
  if (missing.length === 0) return;

  await db
    .insertInto('locations')
    .values(
      missing.map((l) => ({
        school_id: schoolId,
        name: l.name,
        description: l.description,
        default_duration: l.defaultDuration,
        requires_approval: l.requiresApproval,
        summons_only: l.summonsOnly ?? false,
        early_release_only: l.earlyReleaseOnly ?? false,
      })),
    )
    .execute();

  logger.info('seed.locations.created', { flow, schoolId, count: missing.length });
}

async function ensureUsers(
  db: DbExecutor,
  schoolId: string,
): Promise<{ id: string; role: Role; email: string }[]> {
  const out: { id: string; role: Role; email: string }[] = [];

  for (const user of DEFAULT_USERS) {
    const existing = await db
      .selectFrom('users')
      .select(['id'])
      .where('school_id', '=', schoolId)
      .where('email', '=', user.email)
      .executeTakeFirst();

    const id =
      existing?.id ??
      (
        await db
          .insertInto('users')
          .values({
            school_id: schoolId,
            role: user.role,
            display_name: user.displayName,
            email: user.email,
          })
          .returning(['id'])
          .executeTakeFirstOrThrow()
      ).id;

    out.push({ id, role: user.role, email: user.email });
  }

  return out;
}

export async function runDevSeed(opts: {
  db: DbExecutor;
  sessionStore: SessionStore;
  options: DevSeedOptions;
}): Promise<void> {
  const { db, sessionStore, options } = opts;
  const flow = 'seed.dev';

  const schoolId = await ensureSchool(db, options, flow);
  await ensureLocations(db, schoolId, flow);
  const users = await ensureUsers(db, schoolId);

  const createdAt = new Date().toISOString();
  for (const user of users) {
    const sessionId = await sessionStore.create({
      userId: user.id,
      schoolId,
      schoolKey: options.schoolKey,
      role: user.role,
      createdAt,
    });

    // DEV convenience only. Never do this in prod.
    logger.info('seed.session.created', {
      flow,
      email: user.email,
      role: user.role,
      devSessionId: sessionId,
    });
  }
}
