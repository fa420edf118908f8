// ============================================================================
// Domain 1: Identity & Access Management: Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  text,
  integer,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// --- Users Table ---
// A row with neither email nor password_hash is a shadow identity created by
// a doctor; it exists only until its share code is claimed.

export const users = pgTable(
  'users',
  {
    userId: uuid('user_id').primaryKey().defaultRandom(),
    name: varchar('name', { length: 200 }).notNull(),
    email: varchar('email', { length: 255 }),
    passwordHash: varchar('password_hash', { length: 255 }),
    role: varchar('role', { length: 20 }).notNull().default('patient'),
    phone: varchar('phone', { length: 20 }),
    age: integer('age'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('users_email_idx').on(table.email),
    index('users_role_is_active_idx').on(table.role, table.isActive),
  ],
);

// --- Doctor Profiles Table ---

export const doctorProfiles = pgTable(
  'doctor_profiles',
  {
    profileId: uuid('profile_id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    specialization: varchar('specialization', { length: 100 }),
    hospital: varchar('hospital', { length: 200 }),
    experienceYears: integer('experience_years'),
    available: boolean('available').notNull().default(true),
    inviteCode: varchar('invite_code', { length: 10 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('doctor_profiles_user_id_idx').on(table.userId),
    uniqueIndex('doctor_profiles_invite_code_idx').on(table.inviteCode),
  ],
);

// --- Sessions Table ---

export const sessions = pgTable(
  'sessions',
  {
    sessionId: uuid('session_id').primaryKey().defaultRandom(),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.userId, { onDelete: 'cascade' }),
    tokenHash: varchar('token_hash', { length: 255 }).notNull(),
    ipAddress: varchar('ip_address', { length: 45 }).notNull(),
    userAgent: text('user_agent').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    lastActiveAt: timestamp('last_active_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    revoked: boolean('revoked').notNull().default(false),
    revokedReason: varchar('revoked_reason', { length: 30 }),
  },
  (table) => [
    uniqueIndex('sessions_token_hash_idx').on(table.tokenHash),
    index('sessions_user_id_revoked_idx').on(table.userId, table.revoked),
  ],
);

// --- Audit Log Table ---
// Append-only. The actor column is not a foreign key: shadow identities are
// deleted on migration and their trail must survive.

export const auditLog = pgTable(
  'audit_log',
  {
    logId: uuid('log_id').primaryKey().defaultRandom(),
    userId: uuid('user_id'),
    action: varchar('action', { length: 50 }).notNull(),
    category: varchar('category', { length: 20 }).notNull(),
    resourceType: varchar('resource_type', { length: 50 }),
    resourceId: uuid('resource_id'),
    status: varchar('status', { length: 10 }).notNull().default('success'),
    detail: jsonb('detail').$type<Record<string, unknown>>(),
    ipAddress: varchar('ip_address', { length: 45 }),
    userAgent: text('user_agent'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('audit_log_user_id_created_at_idx').on(table.userId, table.createdAt),
    index('audit_log_action_created_at_idx').on(table.action, table.createdAt),
    index('audit_log_resource_type_resource_id_created_at_idx').on(
      table.resourceType,
      table.resourceId,
      table.createdAt,
    ),
  ],
);

// --- Inferred Types ---

export type InsertUser = typeof users.$inferInsert;
export type SelectUser = typeof users.$inferSelect;

export type InsertDoctorProfile = typeof doctorProfiles.$inferInsert;
export type SelectDoctorProfile = typeof doctorProfiles.$inferSelect;

export type InsertSession = typeof sessions.$inferInsert;
export type SelectSession = typeof sessions.$inferSelect;

export type InsertAuditLog = typeof auditLog.$inferInsert;
export type SelectAuditLog = typeof auditLog.$inferSelect;
