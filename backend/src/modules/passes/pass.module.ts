/**
 * backend/src/modules/passes/pass.module.ts
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - The sweeper is created here but started by the app, never on import.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Clock } from '../../shared/time/clock';
import type { Queue } from '../../shared/messaging/queue';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuthorizationGuard } from '../access';
import type { SchoolStore } from '../schools';
import type { UserDirectory } from '../users';

import type { PassStore } from './store/pass.store';
import { AdmissionController } from './admission/admission-controller';
import { VerificationIssuer } from './verification/verification-issuer';
import { ExpirySweeper } from './expiry/expiry-sweeper';
import { PassController } from './pass.controller';
import { PassService } from './pass.service';
import { registerPassRoutes } from './pass.routes';

export type PassModule = ReturnType<typeof createPassModule>;

export function createPassModule(deps: {
  passStore: PassStore;
  schoolStore: SchoolStore;
  userDirectory: UserDirectory;
  guard: AuthorizationGuard;
  rateLimiter: RateLimiter;
  queue: Queue;
  clock: Clock;
  logger: Logger;
  requestLimit: { limit: number; windowSeconds: number };
  expirySweepIntervalMs: number;
  generateCode?: () => string;
}) {
  const admission = new AdmissionController({ logger: deps.logger });
  const issuer = deps.generateCode
    ? new VerificationIssuer({ generateCode: deps.generateCode })
    : new VerificationIssuer();

  const passService = new PassService({ ...deps, admission, issuer });
  const controller = new PassController(passService);

  const expirySweeper = new ExpirySweeper({
    sweep: () => passService.expireDuePasses(),
    intervalMs: deps.expirySweepIntervalMs,
    logger: deps.logger,
  });

  return {
    passService,
    expirySweeper,
    registerRoutes(app: FastifyInstance) {
      registerPassRoutes(app, controller);
    },
  };
}
