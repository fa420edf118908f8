// ============================================================================
// Domain 3: Clinical Records: Drizzle DB Schema
// ============================================================================
// Every table carries patient_id as its owner reference. The shadow-identity
// migration reassigns that column in bulk across all of them.

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  text,
  integer,
  smallint,
  date,
  decimal,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { users } from './iam.schema.js';

// --- Health Logs Table ---

export const healthLogs = pgTable(
  'health_logs',
  {
    healthLogId: uuid('health_log_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    recordedBy: uuid('recorded_by'),
    logType: varchar('log_type', { length: 50 })
      .notNull()
      .default('health_check'),
    title: varchar('title', { length: 200 }).notNull(),
    description: text('description'),
    logDate: date('log_date', { mode: 'string' }).notNull().defaultNow(),
    painLevel: smallint('pain_level'),
    bleedingLevel: varchar('bleeding_level', { length: 50 }),
    mood: varchar('mood', { length: 50 }),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('health_logs_patient_id_log_date_idx').on(
      table.patientId,
      table.logDate,
    ),
  ],
);

// --- Medications Table ---

export const medications = pgTable(
  'medications',
  {
    medicationId: uuid('medication_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    prescribedBy: uuid('prescribed_by'),
    name: varchar('name', { length: 200 }).notNull(),
    dosage: varchar('dosage', { length: 100 }),
    frequency: varchar('frequency', { length: 100 }),
    times: jsonb('times').notNull().$type<string[]>().default([]),
    startDate: date('start_date', { mode: 'string' }).notNull().defaultNow(),
    endDate: date('end_date', { mode: 'string' }),
    notes: text('notes'),
    active: boolean('active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('medications_patient_id_active_idx').on(table.patientId, table.active),
  ],
);

// --- Medical Reports Table ---

export const medicalReports = pgTable(
  'medical_reports',
  {
    reportId: uuid('report_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    uploadedBy: uuid('uploaded_by'),
    title: varchar('title', { length: 200 }).notNull(),
    reportType: varchar('report_type', { length: 30 })
      .notNull()
      .default('other'),
    notes: text('notes'),
    fileName: varchar('file_name', { length: 255 }),
    fileData: text('file_data'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('medical_reports_patient_id_created_at_idx').on(
      table.patientId,
      table.createdAt,
    ),
  ],
);

// --- Diet Plans Table ---

export const dietPlans = pgTable(
  'diet_plans',
  {
    dietPlanId: uuid('diet_plan_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    createdBy: uuid('created_by'),
    mealType: varchar('meal_type', { length: 20 }).notNull(),
    foodItems: text('food_items').notNull(),
    calories: integer('calories'),
    notes: text('notes'),
    dayOfWeek: varchar('day_of_week', { length: 10 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('diet_plans_patient_id_idx').on(table.patientId)],
);

// --- Medical Histories Table ---
// One row per patient.

export const medicalHistories = pgTable(
  'medical_histories',
  {
    medicalHistoryId: uuid('medical_history_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    updatedBy: uuid('updated_by'),
    allergies: text('allergies'),
    chronicConditions: text('chronic_conditions'),
    surgeries: text('surgeries'),
    currentMedications: text('current_medications'),
    consultingSummary: text('consulting_summary'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('medical_histories_patient_id_idx').on(table.patientId),
  ],
);

// --- Consultations Table ---

export interface PrescriptionItem {
  name: string;
  dosage?: string;
  frequency?: string;
  duration?: string;
}

export interface BillingItem {
  description: string;
  amount: number;
}

export const consultations = pgTable(
  'consultations',
  {
    consultationId: uuid('consultation_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    doctorId: uuid('doctor_id').references(() => users.userId, {
      onDelete: 'set null',
    }),
    visitDate: date('visit_date', { mode: 'string' }).notNull().defaultNow(),
    symptoms: text('symptoms'),
    diagnosis: text('diagnosis'),
    treatmentPlan: text('treatment_plan'),
    prescriptions: jsonb('prescriptions')
      .notNull()
      .$type<PrescriptionItem[]>()
      .default([]),
    billingItems: jsonb('billing_items')
      .notNull()
      .$type<BillingItem[]>()
      .default([]),
    totalAmount: decimal('total_amount', { precision: 10, scale: 2 })
      .notNull()
      .default('0.00'),
    paymentStatus: varchar('payment_status', { length: 20 })
      .notNull()
      .default('paid'),
    prescriptionText: text('prescription_text'),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('consultations_patient_id_visit_date_idx').on(
      table.patientId,
      table.visitDate,
    ),
    index('consultations_doctor_id_idx').on(table.doctorId),
  ],
);

// --- Inferred Types ---

export type InsertHealthLog = typeof healthLogs.$inferInsert;
export type SelectHealthLog = typeof healthLogs.$inferSelect;

export type InsertMedication = typeof medications.$inferInsert;
export type SelectMedication = typeof medications.$inferSelect;

export type InsertMedicalReport = typeof medicalReports.$inferInsert;
export type SelectMedicalReport = typeof medicalReports.$inferSelect;

export type InsertDietPlan = typeof dietPlans.$inferInsert;
export type SelectDietPlan = typeof dietPlans.$inferSelect;

export type InsertMedicalHistory = typeof medicalHistories.$inferInsert;
export type SelectMedicalHistory = typeof medicalHistories.$inferSelect;

export type InsertConsultation = typeof consultations.$inferInsert;
export type SelectConsultation = typeof consultations.$inferSelect;
