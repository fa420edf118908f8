import { eq, and, inArray } from 'drizzle-orm';
import { users } from '@carelink/shared/schemas/db/iam.schema.js';
import {
  doctorPatientLinks,
  type SelectDoctorPatientLink,
} from '@carelink/shared/schemas/db/link.schema.js';
import {
  healthLogs,
  medications,
  medicalReports,
  dietPlans,
  medicalHistories,
  consultations,
} from '@carelink/shared/schemas/db/records.schema.js';
import {
  pregnancyProfiles,
  emergencyRequests,
} from '@carelink/shared/schemas/db/care.schema.js';
import { type RecordCategory } from '@carelink/shared/constants/records.constants.js';
import { type Database } from '../../lib/db.js';

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

export type MovedCounts = Record<RecordCategory, number> & {
  pregnancy_profile: number;
  emergency_requests: number;
};

export type ClaimOutcome =
  | { outcome: 'invalid_code' }
  | { outcome: 'self_claim'; link: SelectDoctorPatientLink }
  | { outcome: 'already_migrated' }
  | { outcome: 'doctor_already_linked'; doctorId: string }
  | {
      outcome: 'migrated';
      link: SelectDoctorPatientLink;
      shadowUserId: string;
      moved: MovedCounts;
    };

// ---------------------------------------------------------------------------
// Bulk ownership transfer
// ---------------------------------------------------------------------------

/** The target's value unless it is null or blank, else the source's. */
export function keepFilled(target: string | null, source: string | null): string | null {
  return target !== null && target.trim() !== '' ? target : source;
}

/**
 * Reassigns every owned record of `fromId` to `toId`, one UPDATE per
 * category table. Medical history is one row per patient: when both sides
 * have one, the target keeps its values and only takes the source's values
 * for fields it leaves null or blank. A pregnancy profile is never merged:
 * the shadow's moves only when the target has none, else it is dropped.
 */
async function reassignOwnedRecords(
  tx: Transaction,
  fromId: string,
  toId: string,
): Promise<MovedCounts> {
  const now = new Date();

  const movedHealthLogs = await tx
    .update(healthLogs)
    .set({ patientId: toId, updatedAt: now })
    .where(eq(healthLogs.patientId, fromId))
    .returning({ id: healthLogs.healthLogId });

  const movedMedications = await tx
    .update(medications)
    .set({ patientId: toId, updatedAt: now })
    .where(eq(medications.patientId, fromId))
    .returning({ id: medications.medicationId });

  const movedReports = await tx
    .update(medicalReports)
    .set({ patientId: toId, updatedAt: now })
    .where(eq(medicalReports.patientId, fromId))
    .returning({ id: medicalReports.reportId });

  const movedDietPlans = await tx
    .update(dietPlans)
    .set({ patientId: toId, updatedAt: now })
    .where(eq(dietPlans.patientId, fromId))
    .returning({ id: dietPlans.dietPlanId });

  const movedConsultations = await tx
    .update(consultations)
    .set({ patientId: toId, updatedAt: now })
    .where(eq(consultations.patientId, fromId))
    .returning({ id: consultations.consultationId });

  const histories = await tx
    .select()
    .from(medicalHistories)
    .where(inArray(medicalHistories.patientId, [fromId, toId]));
  const source = histories.find((h) => h.patientId === fromId);
  const target = histories.find((h) => h.patientId === toId);

  let movedHistories = 0;
  if (source && target) {
    await tx
      .update(medicalHistories)
      .set({
        allergies: keepFilled(target.allergies, source.allergies),
        chronicConditions: keepFilled(target.chronicConditions, source.chronicConditions),
        surgeries: keepFilled(target.surgeries, source.surgeries),
        currentMedications: keepFilled(target.currentMedications, source.currentMedications),
        consultingSummary: keepFilled(target.consultingSummary, source.consultingSummary),
        updatedAt: now,
      })
      .where(eq(medicalHistories.medicalHistoryId, target.medicalHistoryId));
    await tx
      .delete(medicalHistories)
      .where(eq(medicalHistories.medicalHistoryId, source.medicalHistoryId));
    movedHistories = 1;
  } else if (source) {
    await tx
      .update(medicalHistories)
      .set({ patientId: toId, updatedAt: now })
      .where(eq(medicalHistories.medicalHistoryId, source.medicalHistoryId));
    movedHistories = 1;
  }

  const movedEmergencies = await tx
    .update(emergencyRequests)
    .set({ patientId: toId, updatedAt: now })
    .where(eq(emergencyRequests.patientId, fromId))
    .returning({ id: emergencyRequests.emergencyId });

  const profiles = await tx
    .select({
      pregnancyProfileId: pregnancyProfiles.pregnancyProfileId,
      patientId: pregnancyProfiles.patientId,
    })
    .from(pregnancyProfiles)
    .where(inArray(pregnancyProfiles.patientId, [fromId, toId]));
  const sourceProfile = profiles.find((p) => p.patientId === fromId);
  const targetHasProfile = profiles.some((p) => p.patientId === toId);

  let movedProfiles = 0;
  if (sourceProfile && targetHasProfile) {
    await tx
      .delete(pregnancyProfiles)
      .where(eq(pregnancyProfiles.pregnancyProfileId, sourceProfile.pregnancyProfileId));
  } else if (sourceProfile) {
    await tx
      .update(pregnancyProfiles)
      .set({ patientId: toId, updatedAt: now })
      .where(eq(pregnancyProfiles.pregnancyProfileId, sourceProfile.pregnancyProfileId));
    movedProfiles = 1;
  }

  return {
    health_logs: movedHealthLogs.length,
    medications: movedMedications.length,
    reports: movedReports.length,
    diet_plans: movedDietPlans.length,
    medical_history: movedHistories,
    consultations: movedConsultations.length,
    pregnancy_profile: movedProfiles,
    emergency_requests: movedEmergencies.length,
  };
}

// ---------------------------------------------------------------------------
// Shadow Identity Repository
// ---------------------------------------------------------------------------

export function createShadowRepository(db: Database) {
  return {
    /**
     * Redeems a share code for `realUserId` as a single transaction.
     *
     * The link row is locked FOR UPDATE, so a concurrent claim of the same
     * code waits, then re-evaluates the share_code predicate against the
     * committed row (now null) and finds nothing.
     */
    async claimShareCode(
      shareCode: string,
      realUserId: string,
    ): Promise<ClaimOutcome> {
      return db.transaction(async (tx): Promise<ClaimOutcome> => {
        const linkRows = await tx
          .select()
          .from(doctorPatientLinks)
          .where(eq(doctorPatientLinks.shareCode, shareCode))
          .limit(1)
          .for('update');
        const link = linkRows[0];
        if (!link) {
          return { outcome: 'invalid_code' };
        }

        if (link.patientId === realUserId) {
          return { outcome: 'self_claim', link };
        }

        const shadowRows = await tx
          .select({
            userId: users.userId,
            email: users.email,
            passwordHash: users.passwordHash,
          })
          .from(users)
          .where(eq(users.userId, link.patientId))
          .limit(1);
        const shadow = shadowRows[0];
        if (!shadow || shadow.email !== null || shadow.passwordHash !== null) {
          return { outcome: 'already_migrated' };
        }

        const conflicting = await tx
          .select({ linkId: doctorPatientLinks.linkId })
          .from(doctorPatientLinks)
          .where(
            and(
              eq(doctorPatientLinks.doctorId, link.doctorId),
              eq(doctorPatientLinks.patientId, realUserId),
            ),
          )
          .limit(1);
        if (conflicting.length > 0) {
          return { outcome: 'doctor_already_linked', doctorId: link.doctorId };
        }

        const moved = await reassignOwnedRecords(tx, shadow.userId, realUserId);

        const updatedLinks = await tx
          .update(doctorPatientLinks)
          .set({ patientId: realUserId, shareCode: null, updatedAt: new Date() })
          .where(eq(doctorPatientLinks.linkId, link.linkId))
          .returning();

        await tx.delete(users).where(eq(users.userId, shadow.userId));

        return {
          outcome: 'migrated',
          link: updatedLinks[0],
          shadowUserId: shadow.userId,
          moved,
        };
      });
    },
  };
}

export type ShadowRepository = ReturnType<typeof createShadowRepository>;
