import { describe, it, expect, vi } from 'vitest';
import {
  MAX_CODE_ATTEMPTS,
  VerificationIssuer,
} from '../../../src/modules/passes/verification/verification-issuer';
import type { Pass } from '../../../src/modules/passes';
import { expectAppError } from '../../helpers/build-test-app';
import { makePass } from '../../helpers/pass-factory';

function ledgerHolding(codes: Record<string, Pass>) {
  return {
    findActiveByCode: vi.fn((_schoolId: string, code: string) => Promise.resolve(codes[code])),
  };
}

describe('VerificationIssuer', () => {
  it('returns the first code not held by an active pass in the school', async () => {
    const generateCode = vi
      .fn<() => string>()
      .mockReturnValueOnce('QR-AAAAAAAA')
      .mockReturnValueOnce('QR-BBBBBBBB');
    const issuer = new VerificationIssuer({ generateCode });
    const uow = ledgerHolding({ 'QR-AAAAAAAA': makePass({ status: 'active' }) });

    expect(await issuer.issue(uow, 'school-a')).toBe('QR-BBBBBBBB');
    expect(uow.findActiveByCode).toHaveBeenCalledTimes(2);
  });

  it('gives up after the maximum number of attempts', async () => {
    const issuer = new VerificationIssuer({ generateCode: () => 'QR-AAAAAAAA' });
    const uow = ledgerHolding({ 'QR-AAAAAAAA': makePass({ status: 'active' }) });

    const err = await expectAppError(issuer.issue(uow, 'school-a'));
    expect(err.code).toBe('INTERNAL');
    expect(uow.findActiveByCode).toHaveBeenCalledTimes(MAX_CODE_ATTEMPTS);
  });

  it('resolves typed codes regardless of case and whitespace', async () => {
    const pass = makePass({ status: 'active', verificationCode: 'QR-ABCD2345' });
    const issuer = new VerificationIssuer();
    const uow = ledgerHolding({ 'QR-ABCD2345': pass });

    expect(await issuer.resolve(uow, 'school-a', '  qr-abcd2345 ')).toBe(pass);
    expect(uow.findActiveByCode).toHaveBeenCalledWith('school-a', 'QR-ABCD2345');
  });

  it('does not look up an empty code', async () => {
    const issuer = new VerificationIssuer();
    const uow = ledgerHolding({});

    expect(await issuer.resolve(uow, 'school-a', '   ')).toBeUndefined();
    expect(uow.findActiveByCode).not.toHaveBeenCalled();
  });
});
