import {
  AuditAction,
  AuditCategory,
  Role,
} from '@carelink/shared/constants/iam.constants.js';
import {
  DEFAULT_HEALTH_LOG_TYPE,
  PaymentStatus,
  RecordCategory,
} from '@carelink/shared/constants/records.constants.js';
import {
  type BillingItem,
  type InsertConsultation,
  type InsertDietPlan,
  type InsertHealthLog,
  type InsertMedicalReport,
  type InsertMedication,
  type SelectConsultation,
  type SelectDietPlan,
  type SelectHealthLog,
  type SelectMedicalHistory,
  type SelectMedicalReport,
  type SelectMedication,
} from '@carelink/shared/schemas/db/records.schema.js';
import {
  type CreateConsultation,
  type CreateDietPlan,
  type CreateHealthLog,
  type CreateMedication,
  type CreateReport,
  type UpdateConsultation,
  type UpdateDietPlan,
  type UpdateHealthLog,
  type UpdateMedication,
  type UpdateReport,
  type UpsertMedicalHistory,
} from '@carelink/shared/schemas/records.schema.js';
import { NotAuthorizedError, NotFoundError } from '../../lib/errors.js';
import {
  assertRecordAccess,
  type RecordAccessDeps,
  type Requester,
} from './record-access.js';
import {
  type ConsultationChanges,
  type ConsultationWithDoctor,
  type DietPlanChanges,
  type HealthLogChanges,
  type MedicalHistoryChanges,
  type MedicationChanges,
  type ReportChanges,
  type ReportSummary,
} from './records.repository.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

interface OwnedRecordRepo<TRow extends { patientId: string }, TInsert, TChanges, TListed = TRow, TUpdated = TRow> {
  create(data: TInsert): Promise<TRow>;
  listForOwner(patientId: string): Promise<TListed[]>;
  findById(id: string): Promise<TRow | undefined>;
  update(id: string, data: TChanges): Promise<TUpdated | undefined>;
  delete(id: string): Promise<boolean>;
}

export type HealthLogRepo = OwnedRecordRepo<SelectHealthLog, InsertHealthLog, HealthLogChanges>;

export interface MedicationRepo
  extends OwnedRecordRepo<SelectMedication, InsertMedication, MedicationChanges> {
  listForOwner(
    patientId: string,
    options?: { includeInactive?: boolean },
  ): Promise<SelectMedication[]>;
}

export type ReportRepo = OwnedRecordRepo<
  SelectMedicalReport,
  InsertMedicalReport,
  ReportChanges,
  ReportSummary,
  ReportSummary
>;

export type DietPlanRepo = OwnedRecordRepo<SelectDietPlan, InsertDietPlan, DietPlanChanges>;

export interface MedicalHistoryRepo {
  findByPatient(patientId: string): Promise<SelectMedicalHistory | undefined>;
  upsert(patientId: string, data: MedicalHistoryChanges): Promise<SelectMedicalHistory>;
}

export interface ConsultationRepo
  extends OwnedRecordRepo<
    SelectConsultation,
    InsertConsultation,
    ConsultationChanges,
    ConsultationWithDoctor
  > {
  markPaid(consultationId: string): Promise<SelectConsultation | undefined>;
}

export interface RecordsServiceDeps extends RecordAccessDeps {
  healthLogRepo: HealthLogRepo;
  medicationRepo: MedicationRepo;
  reportRepo: ReportRepo;
  dietPlanRepo: DietPlanRepo;
  medicalHistoryRepo: MedicalHistoryRepo;
  consultationRepo: ConsultationRepo;
}

// ---------------------------------------------------------------------------
// Shared gated operations
// ---------------------------------------------------------------------------

async function auditRecordChange(
  deps: RecordsServiceDeps,
  requester: Requester,
  action: string,
  category: RecordCategory,
  resourceId: string,
  ownerId: string,
): Promise<void> {
  await deps.auditRepo.appendAuditLog({
    userId: requester.userId,
    action,
    category: AuditCategory.RECORD,
    resourceType: category,
    resourceId,
    detail: { ownerId },
  });
}

/** Loads a record by id, then applies the owner/link gate to its owner. */
async function loadGated<TRow extends { patientId: string }>(
  deps: RecordsServiceDeps,
  requester: Requester,
  category: RecordCategory,
  resource: string,
  find: () => Promise<TRow | undefined>,
): Promise<TRow> {
  const record = await find();
  if (!record) {
    throw new NotFoundError(resource);
  }
  await assertRecordAccess(deps, requester, record.patientId, category);
  return record;
}

async function updateGated<TRow extends { patientId: string }, TChanges, TUpdated>(
  deps: RecordsServiceDeps,
  requester: Requester,
  category: RecordCategory,
  resource: string,
  repo: Pick<OwnedRecordRepo<TRow, unknown, TChanges, unknown, TUpdated>, 'findById' | 'update'>,
  id: string,
  changes: TChanges,
): Promise<TUpdated> {
  const record = await loadGated(deps, requester, category, resource, () => repo.findById(id));
  const updated = await repo.update(id, changes);
  if (!updated) {
    throw new NotFoundError(resource);
  }
  await auditRecordChange(deps, requester, AuditAction.RECORD_UPDATED, category, id, record.patientId);
  return updated;
}

async function deleteGated<TRow extends { patientId: string }>(
  deps: RecordsServiceDeps,
  requester: Requester,
  category: RecordCategory,
  resource: string,
  repo: Pick<OwnedRecordRepo<TRow, unknown, unknown, unknown, unknown>, 'findById' | 'delete'>,
  id: string,
): Promise<void> {
  const record = await loadGated(deps, requester, category, resource, () => repo.findById(id));
  const deleted = await repo.delete(id);
  if (!deleted) {
    throw new NotFoundError(resource);
  }
  await auditRecordChange(deps, requester, AuditAction.RECORD_DELETED, category, id, record.patientId);
}

// ---------------------------------------------------------------------------
// Health Logs
// ---------------------------------------------------------------------------

export async function createHealthLog(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
  input: CreateHealthLog,
): Promise<SelectHealthLog> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.HEALTH_LOGS);

  const logType = input.log_type ?? DEFAULT_HEALTH_LOG_TYPE;
  const log = await deps.healthLogRepo.create({
    patientId: ownerId,
    recordedBy: requester.userId,
    logType,
    title: logType,
    description: input.description,
    logDate: input.log_date,
    painLevel: input.pain_level,
    bleedingLevel: input.bleeding_level,
    mood: input.mood,
    notes: input.notes,
  });

  await auditRecordChange(
    deps, requester, AuditAction.RECORD_CREATED, RecordCategory.HEALTH_LOGS, log.healthLogId, ownerId,
  );
  return log;
}

export async function listHealthLogs(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
): Promise<SelectHealthLog[]> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.HEALTH_LOGS);
  return deps.healthLogRepo.listForOwner(ownerId);
}

export async function updateHealthLog(
  deps: RecordsServiceDeps,
  requester: Requester,
  healthLogId: string,
  input: UpdateHealthLog,
): Promise<SelectHealthLog> {
  return updateGated(
    deps,
    requester,
    RecordCategory.HEALTH_LOGS,
    'Health log',
    deps.healthLogRepo,
    healthLogId,
    {
      // The title mirrors the log type.
      logType: input.log_type,
      title: input.log_type,
      description: input.description,
      logDate: input.log_date,
      painLevel: input.pain_level,
      bleedingLevel: input.bleeding_level,
      mood: input.mood,
      notes: input.notes,
    },
  );
}

export async function deleteHealthLog(
  deps: RecordsServiceDeps,
  requester: Requester,
  healthLogId: string,
): Promise<void> {
  await deleteGated(deps, requester, RecordCategory.HEALTH_LOGS, 'Health log', deps.healthLogRepo, healthLogId);
}

// ---------------------------------------------------------------------------
// Medications
// ---------------------------------------------------------------------------

export async function createMedication(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
  input: CreateMedication,
): Promise<SelectMedication> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.MEDICATIONS);

  const medication = await deps.medicationRepo.create({
    patientId: ownerId,
    prescribedBy: requester.userId,
    name: input.name,
    dosage: input.dosage,
    frequency: input.frequency,
    times: input.times,
    startDate: input.start_date,
    endDate: input.end_date,
    notes: input.notes,
  });

  await auditRecordChange(
    deps, requester, AuditAction.RECORD_CREATED, RecordCategory.MEDICATIONS, medication.medicationId, ownerId,
  );
  return medication;
}

export async function listMedications(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
  includeInactive = false,
): Promise<SelectMedication[]> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.MEDICATIONS);
  return deps.medicationRepo.listForOwner(ownerId, { includeInactive });
}

export async function updateMedication(
  deps: RecordsServiceDeps,
  requester: Requester,
  medicationId: string,
  input: UpdateMedication,
): Promise<SelectMedication> {
  return updateGated(
    deps,
    requester,
    RecordCategory.MEDICATIONS,
    'Medication',
    deps.medicationRepo,
    medicationId,
    {
      name: input.name,
      dosage: input.dosage,
      frequency: input.frequency,
      times: input.times,
      startDate: input.start_date,
      endDate: input.end_date,
      notes: input.notes,
      active: input.active,
    },
  );
}

/** Soft delete: the medication stays on record but drops out of the default list. */
export async function deactivateMedication(
  deps: RecordsServiceDeps,
  requester: Requester,
  medicationId: string,
): Promise<SelectMedication> {
  return updateGated(
    deps,
    requester,
    RecordCategory.MEDICATIONS,
    'Medication',
    deps.medicationRepo,
    medicationId,
    { active: false },
  );
}

export async function deleteMedication(
  deps: RecordsServiceDeps,
  requester: Requester,
  medicationId: string,
): Promise<void> {
  await deleteGated(deps, requester, RecordCategory.MEDICATIONS, 'Medication', deps.medicationRepo, medicationId);
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

export async function createReport(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
  input: CreateReport,
): Promise<ReportSummary> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.REPORTS);

  const report = await deps.reportRepo.create({
    patientId: ownerId,
    uploadedBy: requester.userId,
    title: input.title,
    reportType: input.report_type,
    notes: input.notes,
    fileName: input.file_name,
    fileData: input.file_data,
  });

  await auditRecordChange(
    deps, requester, AuditAction.RECORD_CREATED, RecordCategory.REPORTS, report.reportId, ownerId,
  );
  return toReportSummary(report);
}

export async function listReports(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
): Promise<ReportSummary[]> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.REPORTS);
  return deps.reportRepo.listForOwner(ownerId);
}

/** Single report including its file payload. */
export async function getReport(
  deps: RecordsServiceDeps,
  requester: Requester,
  reportId: string,
): Promise<SelectMedicalReport> {
  return loadGated(deps, requester, RecordCategory.REPORTS, 'Report', () =>
    deps.reportRepo.findById(reportId),
  );
}

export async function updateReport(
  deps: RecordsServiceDeps,
  requester: Requester,
  reportId: string,
  input: UpdateReport,
): Promise<ReportSummary> {
  return updateGated(
    deps,
    requester,
    RecordCategory.REPORTS,
    'Report',
    deps.reportRepo,
    reportId,
    {
      title: input.title,
      reportType: input.report_type,
      notes: input.notes,
    },
  );
}

export async function deleteReport(
  deps: RecordsServiceDeps,
  requester: Requester,
  reportId: string,
): Promise<void> {
  await deleteGated(deps, requester, RecordCategory.REPORTS, 'Report', deps.reportRepo, reportId);
}

function toReportSummary(report: SelectMedicalReport): ReportSummary {
  return {
    reportId: report.reportId,
    patientId: report.patientId,
    uploadedBy: report.uploadedBy,
    title: report.title,
    reportType: report.reportType,
    notes: report.notes,
    fileName: report.fileName,
    createdAt: report.createdAt,
    updatedAt: report.updatedAt,
  };
}

// ---------------------------------------------------------------------------
// Diet Plans
// ---------------------------------------------------------------------------

export async function createDietPlan(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
  input: CreateDietPlan,
): Promise<SelectDietPlan> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.DIET_PLANS);

  const plan = await deps.dietPlanRepo.create({
    patientId: ownerId,
    createdBy: requester.userId,
    mealType: input.meal_type,
    foodItems: input.food_items,
    calories: input.calories,
    notes: input.notes,
    dayOfWeek: input.day_of_week,
  });

  await auditRecordChange(
    deps, requester, AuditAction.RECORD_CREATED, RecordCategory.DIET_PLANS, plan.dietPlanId, ownerId,
  );
  return plan;
}

export async function listDietPlans(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
): Promise<SelectDietPlan[]> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.DIET_PLANS);
  return deps.dietPlanRepo.listForOwner(ownerId);
}

export async function updateDietPlan(
  deps: RecordsServiceDeps,
  requester: Requester,
  dietPlanId: string,
  input: UpdateDietPlan,
): Promise<SelectDietPlan> {
  return updateGated(
    deps,
    requester,
    RecordCategory.DIET_PLANS,
    'Diet plan',
    deps.dietPlanRepo,
    dietPlanId,
    {
      mealType: input.meal_type,
      foodItems: input.food_items,
      calories: input.calories,
      notes: input.notes,
      dayOfWeek: input.day_of_week,
    },
  );
}

export async function deleteDietPlan(
  deps: RecordsServiceDeps,
  requester: Requester,
  dietPlanId: string,
): Promise<void> {
  await deleteGated(deps, requester, RecordCategory.DIET_PLANS, 'Diet plan', deps.dietPlanRepo, dietPlanId);
}

// ---------------------------------------------------------------------------
// Medical History
// ---------------------------------------------------------------------------

export async function getMedicalHistory(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
): Promise<SelectMedicalHistory | null> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.MEDICAL_HISTORY);
  const history = await deps.medicalHistoryRepo.findByPatient(ownerId);
  return history ?? null;
}

export async function upsertMedicalHistory(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
  input: UpsertMedicalHistory,
): Promise<SelectMedicalHistory> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.MEDICAL_HISTORY);

  const existing = await deps.medicalHistoryRepo.findByPatient(ownerId);
  const history = await deps.medicalHistoryRepo.upsert(ownerId, {
    updatedBy: requester.userId,
    allergies: input.allergies,
    chronicConditions: input.chronic_conditions,
    surgeries: input.surgeries,
    currentMedications: input.current_medications,
    consultingSummary: input.consulting_summary,
  });

  await auditRecordChange(
    deps,
    requester,
    existing ? AuditAction.RECORD_UPDATED : AuditAction.RECORD_CREATED,
    RecordCategory.MEDICAL_HISTORY,
    history.medicalHistoryId,
    ownerId,
  );
  return history;
}

// ---------------------------------------------------------------------------
// Consultations
// ---------------------------------------------------------------------------

/** Sum of billing amounts as a decimal string with two places. */
export function computeTotalAmount(items: BillingItem[]): string {
  const cents = items.reduce((sum, item) => sum + Math.round(item.amount * 100), 0);
  return (cents / 100).toFixed(2);
}

export function paymentStatusFor(totalAmount: string): PaymentStatus {
  return Number(totalAmount) > 0 ? PaymentStatus.PENDING : PaymentStatus.PAID;
}

/**
 * Consultations are written by the treating doctor only: a doctor recording
 * one against their own account is refused even though the owner gate would
 * let it through.
 */
function assertConsultationAuthor(requester: Requester, ownerId: string): void {
  if (requester.role !== Role.DOCTOR || requester.userId === ownerId) {
    throw new NotAuthorizedError();
  }
}

export async function createConsultation(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
  input: CreateConsultation,
): Promise<SelectConsultation> {
  assertConsultationAuthor(requester, ownerId);
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.CONSULTATIONS);

  const totalAmount = computeTotalAmount(input.billing_items);
  const consultation = await deps.consultationRepo.create({
    patientId: ownerId,
    doctorId: requester.userId,
    visitDate: input.visit_date,
    symptoms: input.symptoms,
    diagnosis: input.diagnosis,
    treatmentPlan: input.treatment_plan,
    prescriptions: input.prescriptions,
    billingItems: input.billing_items,
    totalAmount,
    paymentStatus: paymentStatusFor(totalAmount),
    prescriptionText: input.prescription_text,
    notes: input.notes,
  });

  await auditRecordChange(
    deps, requester, AuditAction.RECORD_CREATED, RecordCategory.CONSULTATIONS, consultation.consultationId, ownerId,
  );
  return consultation;
}

export async function listConsultations(
  deps: RecordsServiceDeps,
  requester: Requester,
  ownerId: string,
): Promise<ConsultationWithDoctor[]> {
  await assertRecordAccess(deps, requester, ownerId, RecordCategory.CONSULTATIONS);
  return deps.consultationRepo.listForOwner(ownerId);
}

export async function updateConsultation(
  deps: RecordsServiceDeps,
  requester: Requester,
  consultationId: string,
  input: UpdateConsultation,
): Promise<SelectConsultation> {
  const consultation = await deps.consultationRepo.findById(consultationId);
  if (!consultation) {
    throw new NotFoundError('Consultation');
  }
  assertConsultationAuthor(requester, consultation.patientId);

  const changes: ConsultationChanges = {
    visitDate: input.visit_date,
    symptoms: input.symptoms,
    diagnosis: input.diagnosis,
    treatmentPlan: input.treatment_plan,
    prescriptions: input.prescriptions,
    prescriptionText: input.prescription_text,
    notes: input.notes,
  };
  if (input.billing_items) {
    const totalAmount = computeTotalAmount(input.billing_items);
    changes.billingItems = input.billing_items;
    changes.totalAmount = totalAmount;
    changes.paymentStatus = paymentStatusFor(totalAmount);
  }

  return updateGated(
    deps,
    requester,
    RecordCategory.CONSULTATIONS,
    'Consultation',
    deps.consultationRepo,
    consultationId,
    changes,
  );
}

export async function deleteConsultation(
  deps: RecordsServiceDeps,
  requester: Requester,
  consultationId: string,
): Promise<void> {
  const consultation = await deps.consultationRepo.findById(consultationId);
  if (!consultation) {
    throw new NotFoundError('Consultation');
  }
  assertConsultationAuthor(requester, consultation.patientId);

  await deleteGated(
    deps, requester, RecordCategory.CONSULTATIONS, 'Consultation', deps.consultationRepo, consultationId,
  );
}

/** Marks a consultation paid. Only its patient or its authoring doctor may. */
export async function payConsultation(
  deps: RecordsServiceDeps,
  requester: Requester,
  consultationId: string,
): Promise<SelectConsultation> {
  const consultation = await deps.consultationRepo.findById(consultationId);
  if (!consultation) {
    throw new NotFoundError('Consultation');
  }
  if (
    requester.userId !== consultation.patientId &&
    requester.userId !== consultation.doctorId
  ) {
    throw new NotAuthorizedError();
  }
  if (consultation.paymentStatus === PaymentStatus.PAID) {
    return consultation;
  }

  const updated = await deps.consultationRepo.markPaid(consultationId);
  if (!updated) {
    throw new NotFoundError('Consultation');
  }

  await deps.auditRepo.appendAuditLog({
    userId: requester.userId,
    action: AuditAction.CONSULTATION_PAID,
    category: AuditCategory.RECORD,
    resourceType: RecordCategory.CONSULTATIONS,
    resourceId: consultationId,
    detail: { ownerId: consultation.patientId, totalAmount: consultation.totalAmount },
  });
  return updated;
}
