import { eq, and, desc } from 'drizzle-orm';
import { users } from '@carelink/shared/schemas/db/iam.schema.js';
import {
  healthLogs,
  medications,
  medicalReports,
  dietPlans,
  medicalHistories,
  consultations,
  type InsertHealthLog,
  type SelectHealthLog,
  type InsertMedication,
  type SelectMedication,
  type InsertMedicalReport,
  type SelectMedicalReport,
  type InsertDietPlan,
  type SelectDietPlan,
  type InsertMedicalHistory,
  type SelectMedicalHistory,
  type InsertConsultation,
  type SelectConsultation,
} from '@carelink/shared/schemas/db/records.schema.js';
import { PaymentStatus } from '@carelink/shared/constants/records.constants.js';
import { type Database } from '../../lib/db.js';

export type HealthLogChanges = Partial<
  Omit<InsertHealthLog, 'healthLogId' | 'patientId' | 'createdAt' | 'updatedAt'>
>;
export type MedicationChanges = Partial<
  Omit<InsertMedication, 'medicationId' | 'patientId' | 'createdAt' | 'updatedAt'>
>;
export type ReportChanges = Partial<
  Omit<InsertMedicalReport, 'reportId' | 'patientId' | 'createdAt' | 'updatedAt'>
>;
export type DietPlanChanges = Partial<
  Omit<InsertDietPlan, 'dietPlanId' | 'patientId' | 'createdAt' | 'updatedAt'>
>;
export type MedicalHistoryChanges = Partial<
  Omit<InsertMedicalHistory, 'medicalHistoryId' | 'patientId' | 'createdAt' | 'updatedAt'>
>;
export type ConsultationChanges = Partial<
  Omit<InsertConsultation, 'consultationId' | 'patientId' | 'createdAt' | 'updatedAt'>
>;

/** Report row as listed: everything but the file payload. */
export type ReportSummary = Omit<SelectMedicalReport, 'fileData'>;

export type ConsultationWithDoctor = SelectConsultation & {
  doctorName: string | null;
};

// ---------------------------------------------------------------------------
// Health Logs
// ---------------------------------------------------------------------------

export function createHealthLogRepository(db: Database) {
  return {
    async create(data: InsertHealthLog): Promise<SelectHealthLog> {
      const rows = await db.insert(healthLogs).values(data).returning();
      return rows[0];
    },

    async listForOwner(patientId: string): Promise<SelectHealthLog[]> {
      return db
        .select()
        .from(healthLogs)
        .where(eq(healthLogs.patientId, patientId))
        .orderBy(desc(healthLogs.logDate), desc(healthLogs.createdAt));
    },

    async findById(healthLogId: string): Promise<SelectHealthLog | undefined> {
      const rows = await db
        .select()
        .from(healthLogs)
        .where(eq(healthLogs.healthLogId, healthLogId))
        .limit(1);
      return rows[0];
    },

    async update(
      healthLogId: string,
      data: HealthLogChanges,
    ): Promise<SelectHealthLog | undefined> {
      const rows = await db
        .update(healthLogs)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(healthLogs.healthLogId, healthLogId))
        .returning();
      return rows[0];
    },

    async delete(healthLogId: string): Promise<boolean> {
      const rows = await db
        .delete(healthLogs)
        .where(eq(healthLogs.healthLogId, healthLogId))
        .returning({ id: healthLogs.healthLogId });
      return rows.length > 0;
    },
  };
}

export type HealthLogRepository = ReturnType<typeof createHealthLogRepository>;

// ---------------------------------------------------------------------------
// Medications
// ---------------------------------------------------------------------------

export function createMedicationRepository(db: Database) {
  return {
    async create(data: InsertMedication): Promise<SelectMedication> {
      const rows = await db.insert(medications).values(data).returning();
      return rows[0];
    },

    /** Active medications only, unless `includeInactive` is set. */
    async listForOwner(
      patientId: string,
      options: { includeInactive?: boolean } = {},
    ): Promise<SelectMedication[]> {
      const condition = options.includeInactive
        ? eq(medications.patientId, patientId)
        : and(eq(medications.patientId, patientId), eq(medications.active, true));
      return db
        .select()
        .from(medications)
        .where(condition)
        .orderBy(desc(medications.createdAt));
    },

    async findById(medicationId: string): Promise<SelectMedication | undefined> {
      const rows = await db
        .select()
        .from(medications)
        .where(eq(medications.medicationId, medicationId))
        .limit(1);
      return rows[0];
    },

    async update(
      medicationId: string,
      data: MedicationChanges,
    ): Promise<SelectMedication | undefined> {
      const rows = await db
        .update(medications)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(medications.medicationId, medicationId))
        .returning();
      return rows[0];
    },

    async delete(medicationId: string): Promise<boolean> {
      const rows = await db
        .delete(medications)
        .where(eq(medications.medicationId, medicationId))
        .returning({ id: medications.medicationId });
      return rows.length > 0;
    },
  };
}

export type MedicationRepository = ReturnType<typeof createMedicationRepository>;

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

const reportSummaryColumns = {
  reportId: medicalReports.reportId,
  patientId: medicalReports.patientId,
  uploadedBy: medicalReports.uploadedBy,
  title: medicalReports.title,
  reportType: medicalReports.reportType,
  notes: medicalReports.notes,
  fileName: medicalReports.fileName,
  createdAt: medicalReports.createdAt,
  updatedAt: medicalReports.updatedAt,
};

export function createReportRepository(db: Database) {
  return {
    async create(data: InsertMedicalReport): Promise<SelectMedicalReport> {
      const rows = await db.insert(medicalReports).values(data).returning();
      return rows[0];
    },

    async listForOwner(patientId: string): Promise<ReportSummary[]> {
      return db
        .select(reportSummaryColumns)
        .from(medicalReports)
        .where(eq(medicalReports.patientId, patientId))
        .orderBy(desc(medicalReports.createdAt));
    },

    async findById(reportId: string): Promise<SelectMedicalReport | undefined> {
      const rows = await db
        .select()
        .from(medicalReports)
        .where(eq(medicalReports.reportId, reportId))
        .limit(1);
      return rows[0];
    },

    async update(
      reportId: string,
      data: ReportChanges,
    ): Promise<ReportSummary | undefined> {
      const rows = await db
        .update(medicalReports)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(medicalReports.reportId, reportId))
        .returning(reportSummaryColumns);
      return rows[0];
    },

    async delete(reportId: string): Promise<boolean> {
      const rows = await db
        .delete(medicalReports)
        .where(eq(medicalReports.reportId, reportId))
        .returning({ id: medicalReports.reportId });
      return rows.length > 0;
    },
  };
}

export type ReportRepository = ReturnType<typeof createReportRepository>;

// ---------------------------------------------------------------------------
// Diet Plans
// ---------------------------------------------------------------------------

export function createDietPlanRepository(db: Database) {
  return {
    async create(data: InsertDietPlan): Promise<SelectDietPlan> {
      const rows = await db.insert(dietPlans).values(data).returning();
      return rows[0];
    },

    async listForOwner(patientId: string): Promise<SelectDietPlan[]> {
      return db
        .select()
        .from(dietPlans)
        .where(eq(dietPlans.patientId, patientId))
        .orderBy(desc(dietPlans.createdAt));
    },

    async findById(dietPlanId: string): Promise<SelectDietPlan | undefined> {
      const rows = await db
        .select()
        .from(dietPlans)
        .where(eq(dietPlans.dietPlanId, dietPlanId))
        .limit(1);
      return rows[0];
    },

    async update(
      dietPlanId: string,
      data: DietPlanChanges,
    ): Promise<SelectDietPlan | undefined> {
      const rows = await db
        .update(dietPlans)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(dietPlans.dietPlanId, dietPlanId))
        .returning();
      return rows[0];
    },

    async delete(dietPlanId: string): Promise<boolean> {
      const rows = await db
        .delete(dietPlans)
        .where(eq(dietPlans.dietPlanId, dietPlanId))
        .returning({ id: dietPlans.dietPlanId });
      return rows.length > 0;
    },
  };
}

export type DietPlanRepository = ReturnType<typeof createDietPlanRepository>;

// ---------------------------------------------------------------------------
// Medical History (one row per patient)
// ---------------------------------------------------------------------------

export function createMedicalHistoryRepository(db: Database) {
  return {
    async findByPatient(
      patientId: string,
    ): Promise<SelectMedicalHistory | undefined> {
      const rows = await db
        .select()
        .from(medicalHistories)
        .where(eq(medicalHistories.patientId, patientId))
        .limit(1);
      return rows[0];
    },

    /** Fields left undefined keep their stored value; null clears them. */
    async upsert(
      patientId: string,
      data: MedicalHistoryChanges,
    ): Promise<SelectMedicalHistory> {
      const rows = await db
        .insert(medicalHistories)
        .values({ ...data, patientId })
        .onConflictDoUpdate({
          target: medicalHistories.patientId,
          set: { ...data, updatedAt: new Date() },
        })
        .returning();
      return rows[0];
    },
  };
}

export type MedicalHistoryRepository = ReturnType<
  typeof createMedicalHistoryRepository
>;

// ---------------------------------------------------------------------------
// Consultations
// ---------------------------------------------------------------------------

export function createConsultationRepository(db: Database) {
  return {
    async create(data: InsertConsultation): Promise<SelectConsultation> {
      const rows = await db.insert(consultations).values(data).returning();
      return rows[0];
    },

    async listForOwner(patientId: string): Promise<ConsultationWithDoctor[]> {
      const rows = await db
        .select({ consultation: consultations, doctorName: users.name })
        .from(consultations)
        .leftJoin(users, eq(consultations.doctorId, users.userId))
        .where(eq(consultations.patientId, patientId))
        .orderBy(desc(consultations.visitDate), desc(consultations.createdAt));
      return rows.map((row) => ({ ...row.consultation, doctorName: row.doctorName }));
    },

    async findById(
      consultationId: string,
    ): Promise<SelectConsultation | undefined> {
      const rows = await db
        .select()
        .from(consultations)
        .where(eq(consultations.consultationId, consultationId))
        .limit(1);
      return rows[0];
    },

    async update(
      consultationId: string,
      data: ConsultationChanges,
    ): Promise<SelectConsultation | undefined> {
      const rows = await db
        .update(consultations)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(consultations.consultationId, consultationId))
        .returning();
      return rows[0];
    },

    async markPaid(consultationId: string): Promise<SelectConsultation | undefined> {
      const rows = await db
        .update(consultations)
        .set({ paymentStatus: PaymentStatus.PAID, updatedAt: new Date() })
        .where(eq(consultations.consultationId, consultationId))
        .returning();
      return rows[0];
    },

    async delete(consultationId: string): Promise<boolean> {
      const rows = await db
        .delete(consultations)
        .where(eq(consultations.consultationId, consultationId))
        .returning({ id: consultations.consultationId });
      return rows.length > 0;
    },
  };
}

export type ConsultationRepository = ReturnType<
  typeof createConsultationRepository
>;
