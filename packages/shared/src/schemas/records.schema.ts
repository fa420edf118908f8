// ============================================================================
// Domain 3: Clinical Records: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  MAX_PAIN_LEVEL,
  MAX_REPORT_FILE_DATA_LENGTH,
  ReportType,
  MealType,
  DayOfWeek,
} from '../constants/records.constants.js';

// --- Enum Value Arrays ---

const REPORT_TYPES = [
  ReportType.BLOOD_TEST,
  ReportType.ULTRASOUND,
  ReportType.PRESCRIPTION,
  ReportType.OTHER,
] as const;

const MEAL_TYPES = [
  MealType.BREAKFAST,
  MealType.LUNCH,
  MealType.SNACK,
  MealType.DINNER,
] as const;

const DAYS_OF_WEEK = [
  DayOfWeek.MONDAY,
  DayOfWeek.TUESDAY,
  DayOfWeek.WEDNESDAY,
  DayOfWeek.THURSDAY,
  DayOfWeek.FRIDAY,
  DayOfWeek.SATURDAY,
  DayOfWeek.SUNDAY,
] as const;

// ============================================================================
// Params & Queries
// ============================================================================

export const patientIdParamSchema = z.object({
  patientId: z.string().uuid(),
});

export type PatientIdParam = z.infer<typeof patientIdParamSchema>;

export const recordIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type RecordIdParam = z.infer<typeof recordIdParamSchema>;

export const medicationListQuerySchema = z.object({
  include_inactive: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type MedicationListQuery = z.infer<typeof medicationListQuerySchema>;

// ============================================================================
// Health Logs
// ============================================================================

export const createHealthLogSchema = z.object({
  log_type: z.string().trim().min(1).max(50).optional(),
  description: z.string().max(5000).optional(),
  log_date: z.string().date().optional(),
  pain_level: z.number().int().min(0).max(MAX_PAIN_LEVEL).optional(),
  bleeding_level: z.string().max(50).optional(),
  mood: z.string().max(50).optional(),
  notes: z.string().max(5000).optional(),
});

export type CreateHealthLog = z.infer<typeof createHealthLogSchema>;

export const updateHealthLogSchema = createHealthLogSchema.partial();

export type UpdateHealthLog = z.infer<typeof updateHealthLogSchema>;

// ============================================================================
// Medications
// ============================================================================

export const createMedicationSchema = z.object({
  name: z.string().trim().min(1).max(200),
  dosage: z.string().max(100).optional(),
  frequency: z.string().max(100).optional(),
  times: z.array(z.string().regex(/^\d{2}:\d{2}$/)).max(24).optional(),
  start_date: z.string().date().optional(),
  end_date: z.string().date().optional(),
  notes: z.string().max(5000).optional(),
});

export type CreateMedication = z.infer<typeof createMedicationSchema>;

export const updateMedicationSchema = createMedicationSchema.partial().extend({
  active: z.boolean().optional(),
});

export type UpdateMedication = z.infer<typeof updateMedicationSchema>;

// ============================================================================
// Reports
// ============================================================================

export const createReportSchema = z.object({
  title: z.string().trim().min(1).max(200),
  report_type: z.enum(REPORT_TYPES).default('other'),
  notes: z.string().max(5000).optional(),
  file_name: z.string().max(255).optional(),
  file_data: z.string().max(MAX_REPORT_FILE_DATA_LENGTH).base64().optional(),
});

export type CreateReport = z.infer<typeof createReportSchema>;

export const updateReportSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  report_type: z.enum(REPORT_TYPES).optional(),
  notes: z.string().max(5000).optional(),
});

export type UpdateReport = z.infer<typeof updateReportSchema>;

// ============================================================================
// Diet Plans
// ============================================================================

export const createDietPlanSchema = z.object({
  meal_type: z.enum(MEAL_TYPES),
  food_items: z.string().trim().min(1).max(2000),
  calories: z.number().int().min(0).max(10000).optional(),
  notes: z.string().max(5000).optional(),
  day_of_week: z.enum(DAYS_OF_WEEK).optional(),
});

export type CreateDietPlan = z.infer<typeof createDietPlanSchema>;

export const updateDietPlanSchema = createDietPlanSchema.partial();

export type UpdateDietPlan = z.infer<typeof updateDietPlanSchema>;

// ============================================================================
// Medical History
// ============================================================================

export const upsertMedicalHistorySchema = z.object({
  allergies: z.string().max(5000).nullable().optional(),
  chronic_conditions: z.string().max(5000).nullable().optional(),
  surgeries: z.string().max(5000).nullable().optional(),
  current_medications: z.string().max(5000).nullable().optional(),
  consulting_summary: z.string().max(10000).nullable().optional(),
});

export type UpsertMedicalHistory = z.infer<typeof upsertMedicalHistorySchema>;

// ============================================================================
// Consultations
// ============================================================================

const prescriptionItemSchema = z.object({
  name: z.string().trim().min(1).max(200),
  dosage: z.string().max(100).optional(),
  frequency: z.string().max(100).optional(),
  duration: z.string().max(100).optional(),
});

const billingItemSchema = z.object({
  description: z.string().trim().min(1).max(200),
  amount: z.number().min(0).max(1_000_000),
});

export const createConsultationSchema = z.object({
  visit_date: z.string().date().optional(),
  symptoms: z.string().max(5000).optional(),
  diagnosis: z.string().max(5000).optional(),
  treatment_plan: z.string().max(5000).optional(),
  prescriptions: z.array(prescriptionItemSchema).max(50).default([]),
  billing_items: z.array(billingItemSchema).max(50).default([]),
  prescription_text: z.string().max(10000).optional(),
  notes: z.string().max(5000).optional(),
});

export type CreateConsultation = z.infer<typeof createConsultationSchema>;

export const updateConsultationSchema = z.object({
  visit_date: z.string().date().optional(),
  symptoms: z.string().max(5000).optional(),
  diagnosis: z.string().max(5000).optional(),
  treatment_plan: z.string().max(5000).optional(),
  prescriptions: z.array(prescriptionItemSchema).max(50).optional(),
  billing_items: z.array(billingItemSchema).max(50).optional(),
  prescription_text: z.string().max(10000).optional(),
  notes: z.string().max(5000).optional(),
});

export type UpdateConsultation = z.infer<typeof updateConsultationSchema>;
