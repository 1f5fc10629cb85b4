/**
 * backend/src/modules/passes/index.ts
 *
 * Public surface of the passes module.
 */

export type {
  NewPass,
  Pass,
  PassListFilter,
  PassOrigin,
  PassPatch,
  PassStatus,
  VerifiedPassSummary,
} from './pass.types';
export { OPEN_PASS_STATUSES, PASS_STATUSES, isOpenStatus } from './pass.types';
export type { PassReader, PassStore, PassUnitOfWork } from './store/pass.store';
export { InMemPassStore } from './store/inmem-pass.store';
export { KyselyPassStore } from './store/kysely-pass.store';
export { PassService } from './pass.service';
export { createPassModule, type PassModule } from './pass.module';
export { computeDurationMinutes } from './helpers/duration-calculator';
export type { Occupancy } from './admission/admission-controller';
export type { PassWindow } from './flows/read/execute-load-pass-window-flow';
