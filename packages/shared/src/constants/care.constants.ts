// ============================================================================
// Domain 4: Care (Pregnancy Profiles & Emergency Requests): Constants
// ============================================================================

import { RecordCategory } from './records.constants.js';

// --- Gating ---
// Care data has no permission key of its own. Each kind rides on the record
// category a patient already controls for the closest clinical data.

export const PREGNANCY_PROFILE_CATEGORY = RecordCategory.MEDICAL_HISTORY;
export const EMERGENCY_CATEGORY = RecordCategory.CONSULTATIONS;

// --- Pregnancy Profiles ---

export const PregnancyType = {
  CONTINUE: 'continue',
  ABORT: 'abort',
} as const;

export type PregnancyType = (typeof PregnancyType)[keyof typeof PregnancyType];

/** Naegele's rule: due date is 280 days after the last menstrual period. */
export const GESTATION_DAYS = 280;

/** Last completed gestational week of the first and second trimesters. */
export const FIRST_TRIMESTER_LAST_WEEK = 12;
export const SECOND_TRIMESTER_LAST_WEEK = 27;

export const BloodGroup = {
  A_POS: 'A+',
  A_NEG: 'A-',
  B_POS: 'B+',
  B_NEG: 'B-',
  AB_POS: 'AB+',
  AB_NEG: 'AB-',
  O_POS: 'O+',
  O_NEG: 'O-',
} as const;

export type BloodGroup = (typeof BloodGroup)[keyof typeof BloodGroup];

// --- Emergency Requests ---

export const EmergencyStatus = {
  PENDING: 'pending',
  ACCEPTED: 'accepted',
  RESOLVED: 'resolved',
} as const;

export type EmergencyStatus = (typeof EmergencyStatus)[keyof typeof EmergencyStatus];

export const ConsultationType = {
  ONLINE: 'online',
  VISIT: 'visit',
} as const;

export type ConsultationType = (typeof ConsultationType)[keyof typeof ConsultationType];

export const MAX_EMERGENCY_MESSAGE_LENGTH = 2000;
