// ============================================================================
// Domain 1: Identity & Access Management: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { SELF_REGISTER_ROLES } from '../constants/iam.constants.js';

// --- Password validation (reusable) ---

const passwordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(128);

// --- Registration ---

export const registerSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email().max(255),
  password: passwordSchema,
  role: z.enum(SELF_REGISTER_ROLES).default('patient'),
  phone: z.string().max(20).optional(),
  age: z.number().int().min(0).max(150).optional(),
  specialization: z.string().max(100).optional(),
  hospital: z.string().max(200).optional(),
  experience_years: z.number().int().min(0).max(80).optional(),
});

export type Register = z.infer<typeof registerSchema>;

// --- Login ---

export const loginSchema = z.object({
  email: z.string().email().max(255),
  password: z.string().min(1),
});

export type Login = z.infer<typeof loginSchema>;

// --- Doctor Profile ---

export const updateDoctorProfileSchema = z
  .object({
    specialization: z.string().max(100).nullable().optional(),
    hospital: z.string().max(200).nullable().optional(),
    experience_years: z.number().int().min(0).max(80).nullable().optional(),
    available: z.boolean().optional(),
  })
  .refine((data) => Object.keys(data).length > 0, {
    message: 'At least one field must be provided',
  });

export type UpdateDoctorProfile = z.infer<typeof updateDoctorProfileSchema>;

// --- Audit Log Query ---

export const auditLogQuerySchema = z.object({
  user_id: z.string().uuid().optional(),
  action: z.string().max(50).optional(),
  category: z.string().max(20).optional(),
  start_date: z.string().date().optional(),
  end_date: z.string().date().optional(),
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce.number().int().min(1).max(200).default(50),
});

export type AuditLogQuery = z.infer<typeof auditLogQuerySchema>;
