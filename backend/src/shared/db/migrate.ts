/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and deploys.
 * - TS migrations live next to this file in ./migrations and are loaded with `tsx`.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import 'dotenv/config';

import path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { readdir } from 'node:fs/promises';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const migrationsDir = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations');

function isMigration(mod: unknown): mod is Migration {
  return typeof mod === 'object' && mod !== null && 'up' in mod && typeof mod.up === 'function';
}

const provider: MigrationProvider = {
  async getMigrations() {
    const files = (await readdir(migrationsDir)).filter((f) => f.endsWith('.ts')).sort();

    logger.info('db.migrations.found', { flow: 'db.migrate', count: files.length, files });

    const migrations: Record<string, Migration> = {};
    for (const file of files) {
      const mod: unknown = await import(pathToFileURL(path.join(migrationsDir, file)).href);
      if (!isMigration(mod)) {
        throw new Error(`Migration ${file} does not export up()`);
      }
      migrations[file.replace(/\.ts$/, '')] = mod;
    }

    return migrations;
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migration.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrate.failed', { flow: 'db.migrate', err: error });
    process.exitCode = 1;
    return;
  }

  logger.info('db.migrate.up_to_date', { flow: 'db.migrate' });
}

runMigrations().catch((err: unknown) => {
  logger.error('db.migrate.crashed', { flow: 'db.migrate', err });
  process.exitCode = 1;
});
