// ============================================================================
// Domain 2: Doctor–Patient Links: Code Generation
// ============================================================================

import { randomInt } from 'node:crypto';
import {
  CODE_ALPHABET,
  INVITE_CODE_LENGTH,
  SHARE_CODE_LENGTH,
} from '../constants/link.constants.js';

/**
 * Uniformly random code over A–Z0–9. Uniqueness is left to the store's
 * unique index; callers retry on collision.
 */
export function generateCode(length: number): string {
  let code = '';
  for (let i = 0; i < length; i++) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return code;
}

export function generateInviteCode(): string {
  return generateCode(INVITE_CODE_LENGTH);
}

export function generateShareCode(): string {
  return generateCode(SHARE_CODE_LENGTH);
}

/** Codes are compared case-insensitively; the canonical form is upper case. */
export function normaliseCode(code: string): string {
  return code.trim().toUpperCase();
}
