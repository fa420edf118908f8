// ============================================================================
// Domain 4: Care: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  BloodGroup,
  ConsultationType,
  MAX_EMERGENCY_MESSAGE_LENGTH,
  PregnancyType,
} from '../constants/care.constants.js';

// --- Enum Value Arrays ---

const PREGNANCY_TYPES = [PregnancyType.CONTINUE, PregnancyType.ABORT] as const;

const BLOOD_GROUPS = [
  BloodGroup.A_POS,
  BloodGroup.A_NEG,
  BloodGroup.B_POS,
  BloodGroup.B_NEG,
  BloodGroup.AB_POS,
  BloodGroup.AB_NEG,
  BloodGroup.O_POS,
  BloodGroup.O_NEG,
] as const;

const CONSULTATION_TYPES = [ConsultationType.ONLINE, ConsultationType.VISIT] as const;

// ============================================================================
// Pregnancy Profiles
// ============================================================================

const pregnancyDetailsSchema = z.object({
  pregnancy_type: z.enum(PREGNANCY_TYPES),
  blood_group: z.enum(BLOOD_GROUPS).nullable(),
  weight_kg: z.number().positive().max(500).nullable(),
  height_cm: z.number().positive().max(300).nullable(),
  existing_conditions: z.string().max(5000).nullable(),
});

export const createPregnancyProfileSchema = pregnancyDetailsSchema.partial().extend({
  lmp_date: z
    .string()
    .date()
    .refine((value) => value <= new Date().toISOString().slice(0, 10), {
      message: 'LMP date cannot be in the future',
    }),
});

export type CreatePregnancyProfile = z.infer<typeof createPregnancyProfileSchema>;

export const updatePregnancyProfileSchema = pregnancyDetailsSchema.partial();

export type UpdatePregnancyProfile = z.infer<typeof updatePregnancyProfileSchema>;

// ============================================================================
// Emergency Requests
// ============================================================================

export const emergencyIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type EmergencyIdParam = z.infer<typeof emergencyIdParamSchema>;

export const raiseEmergencySchema = z.object({
  message: z.string().trim().min(1).max(MAX_EMERGENCY_MESSAGE_LENGTH),
});

export type RaiseEmergency = z.infer<typeof raiseEmergencySchema>;

export const acceptEmergencySchema = z.object({
  consultation_type: z.enum(CONSULTATION_TYPES).default('online'),
});

export type AcceptEmergency = z.infer<typeof acceptEmergencySchema>;
