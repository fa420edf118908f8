import { eq, and, desc, sql } from 'drizzle-orm';
import {
  users,
  doctorProfiles,
  type InsertUser,
  type SelectUser,
} from '@carelink/shared/schemas/db/iam.schema.js';
import {
  doctorPatientLinks,
  type CategoryPermissions,
  type SelectDoctorPatientLink,
} from '@carelink/shared/schemas/db/link.schema.js';
import { type Database } from '../../lib/db.js';

export interface CreateLinkData {
  doctorId: string;
  patientId: string;
  shareCode?: string | null;
  permissions?: CategoryPermissions;
}

export interface PatientLinkRow {
  link: SelectDoctorPatientLink;
  patient: Pick<SelectUser, 'userId' | 'name' | 'email' | 'passwordHash' | 'age' | 'phone'>;
}

export interface DoctorLinkRow {
  link: SelectDoctorPatientLink;
  doctor: Pick<SelectUser, 'userId' | 'name' | 'email' | 'phone'>;
  profile: {
    specialization: string | null;
    hospital: string | null;
    experienceYears: number | null;
    available: boolean;
  } | null;
}

export function createLinkRepository(db: Database) {
  return {
    async createLink(data: CreateLinkData): Promise<SelectDoctorPatientLink> {
      const rows = await db
        .insert(doctorPatientLinks)
        .values({
          doctorId: data.doctorId,
          patientId: data.patientId,
          shareCode: data.shareCode ?? null,
          permissions: data.permissions ?? {},
        })
        .returning();
      return rows[0];
    },

    /**
     * Creates a patient and their link to the registering doctor in one
     * transaction. A unique violation on email or share code rolls back both.
     */
    async createPatientWithLink(
      patient: InsertUser,
      link: Omit<CreateLinkData, 'patientId'>,
    ): Promise<{ patient: SelectUser; link: SelectDoctorPatientLink }> {
      return db.transaction(async (tx) => {
        const userRows = await tx
          .insert(users)
          .values({
            ...patient,
            email: patient.email ? patient.email.toLowerCase() : null,
          })
          .returning();
        const linkRows = await tx
          .insert(doctorPatientLinks)
          .values({
            doctorId: link.doctorId,
            patientId: userRows[0].userId,
            shareCode: link.shareCode ?? null,
            permissions: link.permissions ?? {},
          })
          .returning();
        return { patient: userRows[0], link: linkRows[0] };
      });
    },

    async findLink(
      doctorId: string,
      patientId: string,
    ): Promise<SelectDoctorPatientLink | undefined> {
      const rows = await db
        .select()
        .from(doctorPatientLinks)
        .where(
          and(
            eq(doctorPatientLinks.doctorId, doctorId),
            eq(doctorPatientLinks.patientId, patientId),
          ),
        )
        .limit(1);
      return rows[0];
    },

    async findLinkById(
      linkId: string,
    ): Promise<SelectDoctorPatientLink | undefined> {
      const rows = await db
        .select()
        .from(doctorPatientLinks)
        .where(eq(doctorPatientLinks.linkId, linkId))
        .limit(1);
      return rows[0];
    },

    /**
     * Unlocked read. Claiming a share code does not go through here: the
     * claim re-reads the row FOR UPDATE inside its own transaction.
     */
    async findByShareCode(
      shareCode: string,
    ): Promise<SelectDoctorPatientLink | undefined> {
      const rows = await db
        .select()
        .from(doctorPatientLinks)
        .where(eq(doctorPatientLinks.shareCode, shareCode))
        .limit(1);
      return rows[0];
    },

    /**
     * Merges `changes` into the stored map in a single statement. Keys not
     * in `changes` keep whatever the row holds at write time.
     */
    async updatePermissions(
      linkId: string,
      changes: CategoryPermissions,
    ): Promise<SelectDoctorPatientLink | undefined> {
      const rows = await db
        .update(doctorPatientLinks)
        .set({
          permissions: sql`${doctorPatientLinks.permissions} || ${JSON.stringify(changes)}::jsonb`,
          updatedAt: new Date(),
        })
        .where(eq(doctorPatientLinks.linkId, linkId))
        .returning();
      return rows[0];
    },

    async listLinksForDoctor(doctorId: string): Promise<PatientLinkRow[]> {
      return db
        .select({
          link: doctorPatientLinks,
          patient: {
            userId: users.userId,
            name: users.name,
            email: users.email,
            passwordHash: users.passwordHash,
            age: users.age,
            phone: users.phone,
          },
        })
        .from(doctorPatientLinks)
        .innerJoin(users, eq(doctorPatientLinks.patientId, users.userId))
        .where(eq(doctorPatientLinks.doctorId, doctorId))
        .orderBy(desc(doctorPatientLinks.createdAt));
    },

    async listLinksForPatient(patientId: string): Promise<DoctorLinkRow[]> {
      return db
        .select({
          link: doctorPatientLinks,
          doctor: {
            userId: users.userId,
            name: users.name,
            email: users.email,
            phone: users.phone,
          },
          profile: {
            specialization: doctorProfiles.specialization,
            hospital: doctorProfiles.hospital,
            experienceYears: doctorProfiles.experienceYears,
            available: doctorProfiles.available,
          },
        })
        .from(doctorPatientLinks)
        .innerJoin(users, eq(doctorPatientLinks.doctorId, users.userId))
        .leftJoin(doctorProfiles, eq(doctorProfiles.userId, users.userId))
        .where(eq(doctorPatientLinks.patientId, patientId))
        .orderBy(desc(doctorPatientLinks.createdAt));
    },
  };
}

export type LinkRepository = ReturnType<typeof createLinkRepository>;
