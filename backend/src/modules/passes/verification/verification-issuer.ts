/**
 * backend/src/modules/passes/verification/verification-issuer.ts
 *
 * WHY:
 * - Staff in the hallway check a pass by its code. A code must point at
 *   exactly one pass, and only while that pass is active.
 *
 * RULES:
 * - Called inside PassStore.withSchoolLock(), so the uniqueness check and the
 *   activation that stores the code can't interleave with another activation.
 * - Uniqueness is per school among active passes (a partial unique index backs it in Postgres).
 */

import { generateVerificationCode, normalizeVerificationCode } from '../../../shared/security/token';
import type { Pass } from '../pass.types';
import type { PassUnitOfWork } from '../store/pass.store';
import { PassErrors } from '../pass.errors';

type CodeLedger = Pick<PassUnitOfWork, 'findActiveByCode'>;

export const MAX_CODE_ATTEMPTS = 5;

export class VerificationIssuer {
  constructor(
    private readonly deps: { generateCode: () => string } = { generateCode: generateVerificationCode },
  ) {}

  async issue(uow: CodeLedger, schoolId: string): Promise<string> {
    for (let attempt = 1; attempt <= MAX_CODE_ATTEMPTS; attempt++) {
      const code = this.deps.generateCode();
      const clash = await uow.findActiveByCode(schoolId, code);
      if (!clash) return code;
    }
    throw PassErrors.codeGenerationExhausted({ schoolId, attempts: MAX_CODE_ATTEMPTS });
  }

  /** The active pass holding `rawCode`, or undefined. Codes of finished passes never match. */
  async resolve(uow: CodeLedger, schoolId: string, rawCode: string): Promise<Pass | undefined> {
    const code = normalizeVerificationCode(rawCode);
    if (!code) return undefined;
    return uow.findActiveByCode(schoolId, code);
  }
}
