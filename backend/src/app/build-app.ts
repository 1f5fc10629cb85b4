/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes -> background work
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - The expiry sweeper never runs under test; specs call sweep() themselves.
 */

import type { AppConfig } from './config';
import { buildDeps, type AppInfra } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, infra?: AppInfra) {
  const deps = await buildDeps(config, infra);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seed.enabled) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else if (!deps.infra.db) {
      logger.warn('seed.skipped_without_db', { flow });
    } else {
      logger.info('seed.start', { flow, schoolKey: config.seed.schoolKey });

      await runDevSeed({
        db: deps.infra.db,
        sessionStore: deps.sessionStore,
        options: { schoolKey: config.seed.schoolKey, schoolName: config.seed.schoolName },
      });

      logger.info('seed.done', { flow, schoolKey: config.seed.schoolKey });
    }
  }

  if (config.nodeEnv !== 'test') {
    deps.passes.expirySweeper.start();
  }

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
