/**
 * backend/src/modules/passes/flows/pass-flow.types.ts
 *
 * Shared dependency and context shapes for pass flows.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { Clock } from '../../../shared/time/clock';
import type { Queue } from '../../../shared/messaging/queue';
import type { RateLimiter } from '../../../shared/security/rate-limit';
import type { RequestMeta } from '../../../shared/http/require-auth-context';
import type { Actor, AuthorizationGuard } from '../../access';
import type { SchoolSnapshot } from '../../schools';
import type { UserDirectory } from '../../users';
import type { AdmissionController } from '../admission/admission-controller';
import type { VerificationIssuer } from '../verification/verification-issuer';
import type { PassStore } from '../store/pass.store';

export type PassFlowDeps = Readonly<{
  passStore: PassStore;
  userDirectory: UserDirectory;
  guard: AuthorizationGuard;
  admission: AdmissionController;
  issuer: VerificationIssuer;
  rateLimiter: RateLimiter;
  queue: Queue;
  clock: Clock;
  logger: Logger;
  requestLimit: Readonly<{ limit: number; windowSeconds: number }>;
}>;

/** Resolved once per call, before any lock is taken. */
export type PassFlowContext = Readonly<{
  actor: Actor;
  snapshot: SchoolSnapshot;
  meta: RequestMeta;
}>;
