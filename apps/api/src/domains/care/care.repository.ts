import { eq, and, ne, desc } from 'drizzle-orm';
import { users } from '@carelink/shared/schemas/db/iam.schema.js';
import {
  doctorPatientLinks,
  type CategoryPermissions,
} from '@carelink/shared/schemas/db/link.schema.js';
import {
  pregnancyProfiles,
  emergencyRequests,
  type InsertPregnancyProfile,
  type SelectPregnancyProfile,
  type InsertEmergencyRequest,
  type SelectEmergencyRequest,
} from '@carelink/shared/schemas/db/care.schema.js';
import {
  EmergencyStatus,
  type ConsultationType,
} from '@carelink/shared/constants/care.constants.js';
import { type Database } from '../../lib/db.js';

export type PregnancyProfileChanges = Partial<
  Omit<
    InsertPregnancyProfile,
    'pregnancyProfileId' | 'patientId' | 'lmpDate' | 'dueDate' | 'createdAt' | 'updatedAt'
  >
>;

export type EmergencyWithPatient = SelectEmergencyRequest & {
  patientName: string;
};

/** A pending request as seen through one doctor's link to its patient. */
export type LinkedEmergency = EmergencyWithPatient & {
  permissions: CategoryPermissions;
};

// ---------------------------------------------------------------------------
// Pregnancy Profiles
// ---------------------------------------------------------------------------

export function createPregnancyProfileRepository(db: Database) {
  return {
    async findByPatient(
      patientId: string,
    ): Promise<SelectPregnancyProfile | undefined> {
      const rows = await db
        .select()
        .from(pregnancyProfiles)
        .where(eq(pregnancyProfiles.patientId, patientId))
        .limit(1);
      return rows[0];
    },

    /** Throws a unique violation when the patient already has a profile. */
    async create(data: InsertPregnancyProfile): Promise<SelectPregnancyProfile> {
      const rows = await db.insert(pregnancyProfiles).values(data).returning();
      return rows[0];
    },

    async update(
      patientId: string,
      data: PregnancyProfileChanges,
    ): Promise<SelectPregnancyProfile | undefined> {
      const rows = await db
        .update(pregnancyProfiles)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(pregnancyProfiles.patientId, patientId))
        .returning();
      return rows[0];
    },
  };
}

export type PregnancyProfileRepository = ReturnType<
  typeof createPregnancyProfileRepository
>;

// ---------------------------------------------------------------------------
// Emergency Requests
// ---------------------------------------------------------------------------

export function createEmergencyRepository(db: Database) {
  return {
    async create(data: InsertEmergencyRequest): Promise<SelectEmergencyRequest> {
      const rows = await db.insert(emergencyRequests).values(data).returning();
      return rows[0];
    },

    async findById(
      emergencyId: string,
    ): Promise<SelectEmergencyRequest | undefined> {
      const rows = await db
        .select()
        .from(emergencyRequests)
        .where(eq(emergencyRequests.emergencyId, emergencyId))
        .limit(1);
      return rows[0];
    },

    async listForOwner(patientId: string): Promise<SelectEmergencyRequest[]> {
      return db
        .select()
        .from(emergencyRequests)
        .where(eq(emergencyRequests.patientId, patientId))
        .orderBy(desc(emergencyRequests.createdAt));
    },

    /**
     * Pending requests of every patient linked to `doctorId`, newest first,
     * with the link's stored permission map for the caller to check.
     */
    async listPendingForDoctor(doctorId: string): Promise<LinkedEmergency[]> {
      const rows = await db
        .select({
          emergency: emergencyRequests,
          patientName: users.name,
          permissions: doctorPatientLinks.permissions,
        })
        .from(emergencyRequests)
        .innerJoin(
          doctorPatientLinks,
          eq(doctorPatientLinks.patientId, emergencyRequests.patientId),
        )
        .innerJoin(users, eq(users.userId, emergencyRequests.patientId))
        .where(
          and(
            eq(doctorPatientLinks.doctorId, doctorId),
            eq(emergencyRequests.status, EmergencyStatus.PENDING),
          ),
        )
        .orderBy(desc(emergencyRequests.createdAt));
      return rows.map((row) => ({
        ...row.emergency,
        patientName: row.patientName,
        permissions: row.permissions,
      }));
    },

    /**
     * Moves a pending request to accepted. Returns undefined when the request
     * was no longer pending at write time.
     */
    async accept(
      emergencyId: string,
      doctorId: string,
      consultationType: ConsultationType,
    ): Promise<SelectEmergencyRequest | undefined> {
      const now = new Date();
      const rows = await db
        .update(emergencyRequests)
        .set({
          status: EmergencyStatus.ACCEPTED,
          acceptedBy: doctorId,
          consultationType,
          acceptedAt: now,
          updatedAt: now,
        })
        .where(
          and(
            eq(emergencyRequests.emergencyId, emergencyId),
            eq(emergencyRequests.status, EmergencyStatus.PENDING),
          ),
        )
        .returning();
      return rows[0];
    },

    /** Returns undefined when the request was already resolved. */
    async resolve(
      emergencyId: string,
    ): Promise<SelectEmergencyRequest | undefined> {
      const now = new Date();
      const rows = await db
        .update(emergencyRequests)
        .set({ status: EmergencyStatus.RESOLVED, resolvedAt: now, updatedAt: now })
        .where(
          and(
            eq(emergencyRequests.emergencyId, emergencyId),
            ne(emergencyRequests.status, EmergencyStatus.RESOLVED),
          ),
        )
        .returning();
      return rows[0];
    },
  };
}

export type EmergencyRepository = ReturnType<typeof createEmergencyRepository>;
