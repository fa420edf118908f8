import { describe, it, expect } from 'vitest';
import {
  generateCode,
  generateInviteCode,
  generateShareCode,
  normaliseCode,
  INVITE_CODE_LENGTH,
  SHARE_CODE_LENGTH,
} from '@carelink/shared';

describe('generateCode', () => {
  it('produces upper-case alphanumeric codes of the requested length', () => {
    for (let i = 0; i < 50; i++) {
      expect(generateCode(12)).toMatch(/^[A-Z0-9]{12}$/);
    }
  });

  it('sizes invite and share codes from their constants', () => {
    expect(generateInviteCode()).toHaveLength(INVITE_CODE_LENGTH);
    expect(generateShareCode()).toHaveLength(SHARE_CODE_LENGTH);
  });
});

describe('normaliseCode', () => {
  it('trims and upper-cases', () => {
    expect(normaliseCode('  ab12cd ')).toBe('AB12CD');
  });
});
