/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Verification codes are read aloud and typed by staff, so the alphabet
 *   leaves out look-alikes (0/O, 1/I/L).
 * - Generated with a CSPRNG so codes can't be predicted from earlier ones.
 */

import { randomInt } from 'node:crypto';

export const VERIFICATION_CODE_PREFIX = 'QR-';
export const VERIFICATION_CODE_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';
export const VERIFICATION_CODE_LENGTH = 8;

export function generateVerificationCode(): string {
  let body = '';
  for (let i = 0; i < VERIFICATION_CODE_LENGTH; i++) {
    body += VERIFICATION_CODE_ALPHABET[randomInt(VERIFICATION_CODE_ALPHABET.length)];
  }
  return `${VERIFICATION_CODE_PREFIX}${body}`;
}

/** Staff type codes by hand: tolerate case and surrounding whitespace. */
export function normalizeVerificationCode(raw: string): string {
  return raw.trim().toUpperCase();
}
