import {
  AuditAction,
  AuditCategory,
  Role,
} from '@carelink/shared/constants/iam.constants.js';
import {
  EMERGENCY_CATEGORY,
  EmergencyStatus,
  PREGNANCY_PROFILE_CATEGORY,
  PregnancyType,
  type ConsultationType,
} from '@carelink/shared/constants/care.constants.js';
import {
  type InsertEmergencyRequest,
  type InsertPregnancyProfile,
  type SelectEmergencyRequest,
  type SelectPregnancyProfile,
} from '@carelink/shared/schemas/db/care.schema.js';
import {
  type AcceptEmergency,
  type CreatePregnancyProfile,
  type RaiseEmergency,
  type UpdatePregnancyProfile,
} from '@carelink/shared/schemas/care.schema.js';
import { isCategoryPermitted } from '@carelink/shared/utils/access.utils.js';
import {
  computeDueDate,
  describeGestation,
  type Gestation,
} from '@carelink/shared/utils/pregnancy.utils.js';
import {
  ConflictError,
  NotAuthorizedError,
  NotFoundError,
  isUniqueViolation,
} from '../../lib/errors.js';
import {
  assertRecordAccess,
  type RecordAccessDeps,
  type Requester,
} from '../records/record-access.js';
import {
  type EmergencyWithPatient,
  type LinkedEmergency,
  type PregnancyProfileChanges,
} from './care.repository.js';

const PROFILE_INDEX = 'pregnancy_profiles_patient_id_idx';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface PregnancyProfileRepo {
  findByPatient(patientId: string): Promise<SelectPregnancyProfile | undefined>;
  create(data: InsertPregnancyProfile): Promise<SelectPregnancyProfile>;
  update(
    patientId: string,
    data: PregnancyProfileChanges,
  ): Promise<SelectPregnancyProfile | undefined>;
}

export interface EmergencyRepo {
  create(data: InsertEmergencyRequest): Promise<SelectEmergencyRequest>;
  findById(emergencyId: string): Promise<SelectEmergencyRequest | undefined>;
  listForOwner(patientId: string): Promise<SelectEmergencyRequest[]>;
  listPendingForDoctor(doctorId: string): Promise<LinkedEmergency[]>;
  accept(
    emergencyId: string,
    doctorId: string,
    consultationType: ConsultationType,
  ): Promise<SelectEmergencyRequest | undefined>;
  resolve(emergencyId: string): Promise<SelectEmergencyRequest | undefined>;
}

export interface CareServiceDeps extends RecordAccessDeps {
  pregnancyProfileRepo: PregnancyProfileRepo;
  emergencyRepo: EmergencyRepo;
}

// ---------------------------------------------------------------------------
// Pregnancy Profiles
// ---------------------------------------------------------------------------

export type PregnancyProfileView = SelectPregnancyProfile & Gestation;

function withGestation(profile: SelectPregnancyProfile, now: Date): PregnancyProfileView {
  return { ...profile, ...describeGestation(profile.lmpDate, now) };
}

class ProfileExistsError extends ConflictError {
  constructor() {
    super('Pregnancy profile already exists', 'PROFILE_EXISTS');
  }
}

/** One profile per patient; the due date is derived from the LMP date. */
export async function createPregnancyProfile(
  deps: CareServiceDeps,
  requester: Requester,
  ownerId: string,
  input: CreatePregnancyProfile,
  now: Date = new Date(),
): Promise<PregnancyProfileView> {
  await assertRecordAccess(deps, requester, ownerId, PREGNANCY_PROFILE_CATEGORY);

  if (await deps.pregnancyProfileRepo.findByPatient(ownerId)) {
    throw new ProfileExistsError();
  }

  let profile: SelectPregnancyProfile;
  try {
    profile = await deps.pregnancyProfileRepo.create({
      patientId: ownerId,
      updatedBy: requester.userId,
      lmpDate: input.lmp_date,
      dueDate: computeDueDate(input.lmp_date),
      pregnancyType: input.pregnancy_type ?? PregnancyType.CONTINUE,
      bloodGroup: input.blood_group ?? null,
      weightKg: input.weight_kg ?? null,
      heightCm: input.height_cm ?? null,
      existingConditions: input.existing_conditions ?? null,
    });
  } catch (err) {
    if (isUniqueViolation(err, PROFILE_INDEX)) {
      throw new ProfileExistsError();
    }
    throw err;
  }

  await deps.auditRepo.appendAuditLog({
    userId: requester.userId,
    action: AuditAction.RECORD_CREATED,
    category: AuditCategory.RECORD,
    resourceType: 'pregnancy_profile',
    resourceId: profile.pregnancyProfileId,
    detail: { ownerId },
  });
  return withGestation(profile, now);
}

export async function getPregnancyProfile(
  deps: CareServiceDeps,
  requester: Requester,
  ownerId: string,
  now: Date = new Date(),
): Promise<PregnancyProfileView> {
  await assertRecordAccess(deps, requester, ownerId, PREGNANCY_PROFILE_CATEGORY);

  const profile = await deps.pregnancyProfileRepo.findByPatient(ownerId);
  if (!profile) {
    throw new NotFoundError('Pregnancy profile');
  }
  return withGestation(profile, now);
}

export async function updatePregnancyProfile(
  deps: CareServiceDeps,
  requester: Requester,
  ownerId: string,
  input: UpdatePregnancyProfile,
  now: Date = new Date(),
): Promise<PregnancyProfileView> {
  await assertRecordAccess(deps, requester, ownerId, PREGNANCY_PROFILE_CATEGORY);

  const profile = await deps.pregnancyProfileRepo.update(ownerId, {
    updatedBy: requester.userId,
    pregnancyType: input.pregnancy_type,
    bloodGroup: input.blood_group,
    weightKg: input.weight_kg,
    heightCm: input.height_cm,
    existingConditions: input.existing_conditions,
  });
  if (!profile) {
    throw new NotFoundError('Pregnancy profile');
  }

  await deps.auditRepo.appendAuditLog({
    userId: requester.userId,
    action: AuditAction.RECORD_UPDATED,
    category: AuditCategory.RECORD,
    resourceType: 'pregnancy_profile',
    resourceId: profile.pregnancyProfileId,
    detail: { ownerId },
  });
  return withGestation(profile, now);
}

// ---------------------------------------------------------------------------
// Emergency Requests
// ---------------------------------------------------------------------------

async function auditEmergency(
  deps: CareServiceDeps,
  requester: Requester,
  action: string,
  emergency: SelectEmergencyRequest,
  extra: Record<string, unknown> = {},
): Promise<void> {
  await deps.auditRepo.appendAuditLog({
    userId: requester.userId,
    action,
    category: AuditCategory.CARE,
    resourceType: 'emergency_request',
    resourceId: emergency.emergencyId,
    detail: { ownerId: emergency.patientId, ...extra },
  });
}

async function findEmergency(
  deps: CareServiceDeps,
  emergencyId: string,
): Promise<SelectEmergencyRequest> {
  const emergency = await deps.emergencyRepo.findById(emergencyId);
  if (!emergency) {
    throw new NotFoundError('Emergency request');
  }
  return emergency;
}

/** Only the patient raises their own emergency. */
export async function raiseEmergency(
  deps: CareServiceDeps,
  requester: Requester,
  ownerId: string,
  input: RaiseEmergency,
): Promise<SelectEmergencyRequest> {
  if (requester.userId !== ownerId) {
    throw new NotAuthorizedError();
  }

  const emergency = await deps.emergencyRepo.create({
    patientId: ownerId,
    message: input.message,
    status: EmergencyStatus.PENDING,
  });
  await auditEmergency(deps, requester, AuditAction.EMERGENCY_RAISED, emergency);
  return emergency;
}

export async function listEmergencies(
  deps: CareServiceDeps,
  requester: Requester,
  ownerId: string,
): Promise<SelectEmergencyRequest[]> {
  await assertRecordAccess(deps, requester, ownerId, EMERGENCY_CATEGORY);
  return deps.emergencyRepo.listForOwner(ownerId);
}

/**
 * Pending requests a doctor may act on: those of linked patients who have not
 * revoked the doctor's consultations access.
 */
export async function listPendingEmergencies(
  deps: CareServiceDeps,
  requester: Requester,
): Promise<EmergencyWithPatient[]> {
  if (requester.role !== Role.DOCTOR) {
    throw new NotAuthorizedError();
  }

  const rows = await deps.emergencyRepo.listPendingForDoctor(requester.userId);
  return rows
    .filter((row) => isCategoryPermitted(row.permissions, EMERGENCY_CATEGORY))
    .map(({ permissions: _permissions, ...emergency }) => emergency);
}

export async function acceptEmergency(
  deps: CareServiceDeps,
  requester: Requester,
  emergencyId: string,
  input: AcceptEmergency,
): Promise<SelectEmergencyRequest> {
  if (requester.role !== Role.DOCTOR) {
    throw new NotAuthorizedError();
  }

  const emergency = await findEmergency(deps, emergencyId);
  await assertRecordAccess(deps, requester, emergency.patientId, EMERGENCY_CATEGORY);

  const accepted =
    emergency.status === EmergencyStatus.PENDING
      ? await deps.emergencyRepo.accept(emergencyId, requester.userId, input.consultation_type)
      : undefined;
  if (!accepted) {
    throw new ConflictError('Emergency request is no longer pending', 'EMERGENCY_NOT_PENDING');
  }

  await auditEmergency(deps, requester, AuditAction.EMERGENCY_ACCEPTED, accepted, {
    consultationType: input.consultation_type,
  });
  return accepted;
}

/**
 * The patient or the doctor who accepted may resolve. Resolving twice returns
 * the resolved request unchanged.
 */
export async function resolveEmergency(
  deps: CareServiceDeps,
  requester: Requester,
  emergencyId: string,
): Promise<SelectEmergencyRequest> {
  const emergency = await findEmergency(deps, emergencyId);
  if (requester.userId !== emergency.patientId) {
    if (requester.userId !== emergency.acceptedBy) {
      throw new NotAuthorizedError();
    }
    await assertRecordAccess(deps, requester, emergency.patientId, EMERGENCY_CATEGORY);
  }
  if (emergency.status === EmergencyStatus.RESOLVED) {
    return emergency;
  }

  const resolved = await deps.emergencyRepo.resolve(emergencyId);
  if (!resolved) {
    return findEmergency(deps, emergencyId);
  }

  await auditEmergency(deps, requester, AuditAction.EMERGENCY_RESOLVED, resolved);
  return resolved;
}
