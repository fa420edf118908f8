// ============================================================================
// Domain 3: Clinical Records: Constants
// ============================================================================

// --- Resource Categories ---
// Each category is gated independently by a link's permission record.

export const RecordCategory = {
  HEALTH_LOGS: 'health_logs',
  MEDICATIONS: 'medications',
  REPORTS: 'reports',
  DIET_PLANS: 'diet_plans',
  MEDICAL_HISTORY: 'medical_history',
  CONSULTATIONS: 'consultations',
} as const;

export type RecordCategory =
  (typeof RecordCategory)[keyof typeof RecordCategory];

export const RECORD_CATEGORIES = Object.values(RecordCategory);

// Opt-out policy: a category absent from a link's permissions is visible to
// the linked doctor. Only an explicit `false` revokes.
// NOTE: reports stays allow-by-default; whether it should default to deny is
// an open product question, see DESIGN.md.
export const DEFAULT_CATEGORY_ACCESS = {
  [RecordCategory.HEALTH_LOGS]: true,
  [RecordCategory.MEDICATIONS]: true,
  [RecordCategory.REPORTS]: true,
  [RecordCategory.DIET_PLANS]: true,
  [RecordCategory.MEDICAL_HISTORY]: true,
  [RecordCategory.CONSULTATIONS]: true,
} as const satisfies Record<RecordCategory, boolean>;

// --- Health Logs ---

export const DEFAULT_HEALTH_LOG_TYPE = 'health_check';

export const MAX_PAIN_LEVEL = 10;

// --- Reports ---

export const ReportType = {
  BLOOD_TEST: 'blood_test',
  ULTRASOUND: 'ultrasound',
  PRESCRIPTION: 'prescription',
  OTHER: 'other',
} as const;

export type ReportType = (typeof ReportType)[keyof typeof ReportType];

/** Upper bound on the base64-encoded report payload. */
export const MAX_REPORT_FILE_DATA_LENGTH = 5 * 1024 * 1024;

// --- Diet Plans ---

export const MealType = {
  BREAKFAST: 'breakfast',
  LUNCH: 'lunch',
  SNACK: 'snack',
  DINNER: 'dinner',
} as const;

export type MealType = (typeof MealType)[keyof typeof MealType];

export const DayOfWeek = {
  MONDAY: 'monday',
  TUESDAY: 'tuesday',
  WEDNESDAY: 'wednesday',
  THURSDAY: 'thursday',
  FRIDAY: 'friday',
  SATURDAY: 'saturday',
  SUNDAY: 'sunday',
} as const;

export type DayOfWeek = (typeof DayOfWeek)[keyof typeof DayOfWeek];

// --- Consultations ---

export const PaymentStatus = {
  PENDING: 'pending',
  PAID: 'paid',
} as const;

export type PaymentStatus = (typeof PaymentStatus)[keyof typeof PaymentStatus];
