/**
 * backend/src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them.
 * - Tests pass in-memory infra instead (see test/helpers/build-test-app.ts).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';
import { RateLimiter } from '../shared/security/rate-limit';

import { logger, type Logger } from '../shared/logger/logger';
import { systemClock, type Clock } from '../shared/time/clock';

import { AuditRepo } from '../shared/audit/audit.repo';
import type { AuditSink } from '../shared/audit/audit.types';
import { SessionStore } from '../shared/session/session.store';

import { LogQueue } from '../shared/messaging/log-queue';
import type { Queue } from '../shared/messaging/queue';

import { AuthorizationGuard } from '../modules/access';
import {
  createSchoolModule,
  KyselySchoolStore,
  type SchoolModule,
  type SchoolStore,
} from '../modules/schools';
import { KyselyUserDirectory, type UserDirectory } from '../modules/users';
import {
  createPassModule,
  KyselyPassStore,
  type PassModule,
  type PassStore,
} from '../modules/passes';
import { createAnalyticsModule, type AnalyticsModule } from '../modules/analytics';

/** Everything that talks to the outside world. */
export type AppInfra = {
  cache: Cache;
  schoolStore: SchoolStore;
  userDirectory: UserDirectory;
  passStore: PassStore;
  auditSink: AuditSink;
  queue: Queue;
  clock: Clock;
  /** Set only when the infra owns a Postgres pool (dev seed, shutdown). */
  db?: Db;
  close?: () => Promise<void>;
};

export type AppDeps = {
  infra: AppInfra;
  logger: Logger;

  rateLimiter: RateLimiter;
  sessionStore: SessionStore;
  guard: AuthorizationGuard;

  // modules
  schools: SchoolModule;
  passes: PassModule;
  analytics: AnalyticsModule;

  // lifecycle
  close: () => Promise<void>;
};

async function connectInfra(config: AppConfig): Promise<AppInfra> {
  const db = createDb(config.databaseUrl);
  const redis = await RedisCache.connect(config.redisUrl);

  return {
    db,
    cache: redis,
    schoolStore: new KyselySchoolStore(db),
    userDirectory: new KyselyUserDirectory(db),
    passStore: new KyselyPassStore(db),
    auditSink: new AuditRepo(db),
    queue: new LogQueue(logger),
    clock: systemClock,
    close: async () => {
      await redis.close();
      await db.destroy();
    },
  };
}

export async function buildDeps(config: AppConfig, given?: AppInfra): Promise<AppDeps> {
  const infra = given ?? (await connectInfra(config));

  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(infra.cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const sessionStore = new SessionStore(infra.cache, config.sessionTtlSeconds);
  const guard = new AuthorizationGuard();

  const schools = createSchoolModule({
    schoolStore: infra.schoolStore,
    capacityLock: infra.passStore,
    guard,
    auditSink: infra.auditSink,
    clock: infra.clock,
    logger,
  });

  const passes = createPassModule({
    passStore: infra.passStore,
    schoolStore: infra.schoolStore,
    userDirectory: infra.userDirectory,
    guard,
    rateLimiter,
    queue: infra.queue,
    clock: infra.clock,
    logger,
    requestLimit: config.passes.requestLimit,
    expirySweepIntervalMs: config.passes.expirySweepIntervalMs,
  });

  const analytics = createAnalyticsModule({
    passService: passes.passService,
    schoolStore: infra.schoolStore,
    guard,
    clock: infra.clock,
    logger,
    minSample: config.analytics.minSample,
  });

  return {
    infra,
    logger,
    rateLimiter,
    sessionStore,
    guard,
    schools,
    passes,
    analytics,
    close: async () => {
      await passes.expirySweeper.stop();
      await infra.close?.();
    },
  };
}
