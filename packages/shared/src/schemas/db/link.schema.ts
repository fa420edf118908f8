// ============================================================================
// Domain 2: Doctor–Patient Links: Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { users } from './iam.schema.js';
import type { RecordCategory } from '../../constants/records.constants.js';

/** Closed per-category grant record; a missing key falls back to the category default. */
export type CategoryPermissions = Partial<Record<RecordCategory, boolean>>;

// --- Doctor–Patient Links Table ---
// Uniqueness of (doctor_id, patient_id) and of share_code is enforced here,
// not in application code.

export const doctorPatientLinks = pgTable(
  'doctor_patient_links',
  {
    linkId: uuid('link_id').primaryKey().defaultRandom(),
    doctorId: uuid('doctor_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    patientId: uuid('patient_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    permissions: jsonb('permissions')
      .notNull()
      .$type<CategoryPermissions>()
      .default({}),
    shareCode: varchar('share_code', { length: 16 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('doctor_patient_links_doctor_patient_idx').on(
      table.doctorId,
      table.patientId,
    ),
    uniqueIndex('doctor_patient_links_share_code_idx').on(table.shareCode),
    index('doctor_patient_links_patient_id_idx').on(table.patientId),
  ],
);

// --- Inferred Types ---

export type InsertDoctorPatientLink = typeof doctorPatientLinks.$inferInsert;
export type SelectDoctorPatientLink = typeof doctorPatientLinks.$inferSelect;
