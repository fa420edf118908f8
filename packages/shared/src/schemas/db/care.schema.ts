// ============================================================================
// Domain 4: Care: Drizzle DB Schema
// ============================================================================
// Both tables are owned through patient_id, like the clinical records, and
// move with them when a shadow identity is claimed.

import {
  pgTable,
  uuid,
  varchar,
  text,
  date,
  real,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { users } from './iam.schema.js';

// --- Pregnancy Profiles Table ---

export const pregnancyProfiles = pgTable(
  'pregnancy_profiles',
  {
    pregnancyProfileId: uuid('pregnancy_profile_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    updatedBy: uuid('updated_by'),
    lmpDate: date('lmp_date', { mode: 'string' }).notNull(),
    dueDate: date('due_date', { mode: 'string' }).notNull(),
    pregnancyType: varchar('pregnancy_type', { length: 20 })
      .notNull()
      .default('continue'),
    bloodGroup: varchar('blood_group', { length: 5 }),
    weightKg: real('weight_kg'),
    heightCm: real('height_cm'),
    existingConditions: text('existing_conditions'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('pregnancy_profiles_patient_id_idx').on(table.patientId),
  ],
);

// --- Emergency Requests Table ---

export const emergencyRequests = pgTable(
  'emergency_requests',
  {
    emergencyId: uuid('emergency_id').primaryKey().defaultRandom(),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    message: text('message').notNull(),
    status: varchar('status', { length: 20 }).notNull().default('pending'),
    acceptedBy: uuid('accepted_by').references(() => users.userId, {
      onDelete: 'set null',
    }),
    consultationType: varchar('consultation_type', { length: 20 }),
    acceptedAt: timestamp('accepted_at', { withTimezone: true }),
    resolvedAt: timestamp('resolved_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('emergency_requests_patient_id_created_at_idx').on(
      table.patientId,
      table.createdAt,
    ),
    index('emergency_requests_status_idx').on(table.status),
  ],
);

// --- Inferred Types ---

export type InsertPregnancyProfile = typeof pregnancyProfiles.$inferInsert;
export type SelectPregnancyProfile = typeof pregnancyProfiles.$inferSelect;

export type InsertEmergencyRequest = typeof emergencyRequests.$inferInsert;
export type SelectEmergencyRequest = typeof emergencyRequests.$inferSelect;
