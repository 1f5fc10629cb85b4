import { describe, it, expect } from 'vitest';
import {
  VERIFICATION_CODE_ALPHABET,
  generateVerificationCode,
  normalizeVerificationCode,
} from '../../../../src/shared/security/token';

describe('verification codes', () => {
  it('are QR- followed by eight unambiguous characters', () => {
    for (let i = 0; i < 50; i++) {
      const code = generateVerificationCode();
      expect(code).toMatch(/^QR-[A-Z2-9]{8}$/);
      for (const ch of code.slice(3)) expect(VERIFICATION_CODE_ALPHABET).toContain(ch);
    }
  });

  it('leave out look-alike characters', () => {
    for (const ch of ['0', 'O', '1', 'I', 'L']) expect(VERIFICATION_CODE_ALPHABET).not.toContain(ch);
  });

  it('normalize typed input', () => {
    expect(normalizeVerificationCode('  qr-ab23cd45\n')).toBe('QR-AB23CD45');
  });
});
