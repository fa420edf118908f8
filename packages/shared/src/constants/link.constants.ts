// ============================================================================
// Domain 2: Doctor–Patient Links: Constants
// ============================================================================

// --- Codes ---
// invite_code: doctor-level, persistent, creates a new link.
// share_code: link-level, one-time, migrates a shadow patient to a real account.

export const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export const INVITE_CODE_LENGTH = 6;

export const SHARE_CODE_LENGTH = 8;

export const CODE_GENERATION_MAX_ATTEMPTS = 5;

// --- Claim Outcomes ---

export const ClaimStatus = {
  MIGRATED: 'migrated',
  ALREADY_LINKED: 'already_linked',
} as const;

export type ClaimStatus = (typeof ClaimStatus)[keyof typeof ClaimStatus];

// --- Patient Registration Outcomes ---

export const PatientRegistrationKind = {
  EXISTING: 'existing',
  STANDARD: 'standard',
  SHADOW: 'shadow',
} as const;

export type PatientRegistrationKind =
  (typeof PatientRegistrationKind)[keyof typeof PatientRegistrationKind];

export const TEMP_PASSWORD_BYTES = 12;
