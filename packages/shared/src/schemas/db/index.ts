// Barrel export for Drizzle DB schemas
export {
  users,
  doctorProfiles,
  sessions,
  auditLog,
} from './iam.schema.js';
export type {
  InsertUser,
  SelectUser,
  InsertDoctorProfile,
  SelectDoctorProfile,
  InsertSession,
  SelectSession,
  InsertAuditLog,
  SelectAuditLog,
} from './iam.schema.js';

export { doctorPatientLinks } from './link.schema.js';
export type {
  CategoryPermissions,
  InsertDoctorPatientLink,
  SelectDoctorPatientLink,
} from './link.schema.js';

export {
  healthLogs,
  medications,
  medicalReports,
  dietPlans,
  medicalHistories,
  consultations,
} from './records.schema.js';
export type {
  PrescriptionItem,
  BillingItem,
  InsertHealthLog,
  SelectHealthLog,
  InsertMedication,
  SelectMedication,
  InsertMedicalReport,
  SelectMedicalReport,
  InsertDietPlan,
  SelectDietPlan,
  InsertMedicalHistory,
  SelectMedicalHistory,
  InsertConsultation,
  SelectConsultation,
} from './records.schema.js';

export { pregnancyProfiles, emergencyRequests } from './care.schema.js';
export type {
  InsertPregnancyProfile,
  SelectPregnancyProfile,
  InsertEmergencyRequest,
  SelectEmergencyRequest,
} from './care.schema.js';
