// ============================================================================
// Domain 2: Doctor–Patient Links: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { RecordCategory } from '../constants/records.constants.js';

// --- Codes ---

const codeSchema = z
  .string()
  .trim()
  .min(4)
  .max(16)
  .regex(/^[A-Za-z0-9]+$/, 'Code must be alphanumeric')
  .transform((code) => code.toUpperCase());

// --- Register Patient (doctor-initiated) ---
// No email → shadow patient with a share code.

export const registerPatientSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email().max(255).optional(),
  phone: z.string().max(20).optional(),
  age: z.number().int().min(0).max(150).optional(),
});

export type RegisterPatient = z.infer<typeof registerPatientSchema>;

// --- Redeem Invite Code ---

export const redeemInviteSchema = z.object({
  invite_code: codeSchema,
});

export type RedeemInvite = z.infer<typeof redeemInviteSchema>;

// --- Claim Share Code ---

export const claimShareCodeSchema = z.object({
  share_code: codeSchema,
});

export type ClaimShareCode = z.infer<typeof claimShareCodeSchema>;

// --- Set Permissions ---
// Closed record: unknown categories are rejected.

export const setPermissionsSchema = z
  .object({
    [RecordCategory.HEALTH_LOGS]: z.boolean().optional(),
    [RecordCategory.MEDICATIONS]: z.boolean().optional(),
    [RecordCategory.REPORTS]: z.boolean().optional(),
    [RecordCategory.DIET_PLANS]: z.boolean().optional(),
    [RecordCategory.MEDICAL_HISTORY]: z.boolean().optional(),
    [RecordCategory.CONSULTATIONS]: z.boolean().optional(),
  })
  .strict();

export type SetPermissions = z.infer<typeof setPermissionsSchema>;

// --- Params ---

export const doctorIdParamSchema = z.object({
  doctorId: z.string().uuid(),
});

export type DoctorIdParam = z.infer<typeof doctorIdParamSchema>;
