import { randomBytes } from 'node:crypto';
import {
  AuditAction,
  AuditCategory,
  Role,
} from '@carelink/shared/constants/iam.constants.js';
import {
  CODE_GENERATION_MAX_ATTEMPTS,
  PatientRegistrationKind,
  TEMP_PASSWORD_BYTES,
} from '@carelink/shared/constants/link.constants.js';
import { type RecordCategory } from '@carelink/shared/constants/records.constants.js';
import {
  type CategoryPermissions,
  type SelectDoctorPatientLink,
} from '@carelink/shared/schemas/db/link.schema.js';
import {
  type InsertUser,
  type SelectUser,
  type SelectDoctorProfile,
} from '@carelink/shared/schemas/db/iam.schema.js';
import { type RegisterPatient } from '@carelink/shared/schemas/link.schema.js';
import {
  pickPermissionChanges,
  resolvePermissions,
} from '@carelink/shared/utils/access.utils.js';
import {
  generateShareCode,
  normaliseCode,
} from '@carelink/shared/utils/code.utils.js';
import {
  AlreadyLinkedError,
  DuplicateIdentityError,
  InvalidCodeError,
  NotAuthorizedError,
  NotFoundError,
  isUniqueViolation,
} from '../../lib/errors.js';
import { type AuditRepo } from '../../lib/audit.js';
import { hashPassword, isShadowUser } from '../iam/iam.service.js';
import {
  type CreateLinkData,
  type DoctorLinkRow,
  type PatientLinkRow,
} from './link.repository.js';

const PAIR_INDEX = 'doctor_patient_links_doctor_patient_idx';
const SHARE_CODE_INDEX = 'doctor_patient_links_share_code_idx';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface LinkRepo {
  createLink(data: CreateLinkData): Promise<SelectDoctorPatientLink>;
  createPatientWithLink(
    patient: InsertUser,
    link: Omit<CreateLinkData, 'patientId'>,
  ): Promise<{ patient: SelectUser; link: SelectDoctorPatientLink }>;
  findLink(
    doctorId: string,
    patientId: string,
  ): Promise<SelectDoctorPatientLink | undefined>;
  findLinkById(linkId: string): Promise<SelectDoctorPatientLink | undefined>;
  findByShareCode(shareCode: string): Promise<SelectDoctorPatientLink | undefined>;
  updatePermissions(
    linkId: string,
    changes: CategoryPermissions,
  ): Promise<SelectDoctorPatientLink | undefined>;
  listLinksForDoctor(doctorId: string): Promise<PatientLinkRow[]>;
  listLinksForPatient(patientId: string): Promise<DoctorLinkRow[]>;
}

export interface LinkUserRepo {
  findUserById(userId: string): Promise<SelectUser | undefined>;
  findUserByEmail(email: string): Promise<SelectUser | undefined>;
}

export interface LinkDoctorProfileRepo {
  findProfileByInviteCode(
    inviteCode: string,
  ): Promise<SelectDoctorProfile | undefined>;
}

export interface LinkServiceDeps {
  linkRepo: LinkRepo;
  userRepo: LinkUserRepo;
  doctorProfileRepo: LinkDoctorProfileRepo;
  auditRepo: AuditRepo;
  generateShareCode?: () => string;
}

// ---------------------------------------------------------------------------
// Service: Create Link
// ---------------------------------------------------------------------------

/**
 * Link a doctor to a patient.
 *
 * The pre-check gives the common case a clean error; the unique index on
 * (doctor_id, patient_id) decides when two requests race.
 */
export async function createLink(
  deps: LinkServiceDeps,
  doctorId: string,
  patientId: string,
  shareCode?: string | null,
): Promise<SelectDoctorPatientLink> {
  const [doctor, patient] = await Promise.all([
    deps.userRepo.findUserById(doctorId),
    deps.userRepo.findUserById(patientId),
  ]);
  if (!doctor || doctor.role !== Role.DOCTOR) {
    throw new NotFoundError('Doctor');
  }
  if (!patient || patient.role !== Role.PATIENT) {
    throw new NotFoundError('Patient');
  }

  const existing = await deps.linkRepo.findLink(doctorId, patientId);
  if (existing) {
    throw new AlreadyLinkedError();
  }

  try {
    return await deps.linkRepo.createLink({ doctorId, patientId, shareCode });
  } catch (err: unknown) {
    if (isUniqueViolation(err, PAIR_INDEX)) {
      throw new AlreadyLinkedError();
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Service: Create Link via Invite Code
// ---------------------------------------------------------------------------

/**
 * A patient links themself to the doctor who owns `inviteCode`.
 */
export async function createLinkViaInvite(
  deps: LinkServiceDeps,
  patientId: string,
  inviteCode: string,
): Promise<SelectDoctorPatientLink> {
  const profile = await deps.doctorProfileRepo.findProfileByInviteCode(
    normaliseCode(inviteCode),
  );
  if (!profile) {
    throw new InvalidCodeError('Invalid invite code');
  }

  const link = await createLink(deps, profile.userId, patientId);

  await deps.auditRepo.appendAuditLog({
    userId: patientId,
    action: AuditAction.LINK_CREATED_VIA_INVITE,
    category: AuditCategory.LINK,
    resourceType: 'doctor_patient_link',
    resourceId: link.linkId,
    detail: { doctorId: profile.userId },
  });

  return link;
}

// ---------------------------------------------------------------------------
// Service: Lookups
// ---------------------------------------------------------------------------

export async function findLink(
  deps: Pick<LinkServiceDeps, 'linkRepo'>,
  doctorId: string,
  patientId: string,
): Promise<SelectDoctorPatientLink | null> {
  return (await deps.linkRepo.findLink(doctorId, patientId)) ?? null;
}

/** Plain lookup; the claim path takes its own row lock. */
export async function findByShareCode(
  deps: Pick<LinkServiceDeps, 'linkRepo'>,
  shareCode: string,
): Promise<SelectDoctorPatientLink | null> {
  return (await deps.linkRepo.findByShareCode(normaliseCode(shareCode))) ?? null;
}

// ---------------------------------------------------------------------------
// Service: Set Permissions
// ---------------------------------------------------------------------------

/**
 * Only the link's own patient may change its permissions. Only the provided
 * categories are written; the merge happens in the store, so two concurrent
 * updates touching different categories both land.
 */
export async function setPermissions(
  deps: LinkServiceDeps,
  linkId: string,
  requestingPatientId: string,
  permissions: CategoryPermissions,
): Promise<SelectDoctorPatientLink> {
  const link = await deps.linkRepo.findLinkById(linkId);
  if (!link) {
    throw new NotFoundError('Link');
  }
  if (link.patientId !== requestingPatientId) {
    throw new NotAuthorizedError();
  }

  const changes = pickPermissionChanges(permissions);
  const updated = await deps.linkRepo.updatePermissions(link.linkId, changes);
  if (!updated) {
    throw new NotFoundError('Link');
  }

  await deps.auditRepo.appendAuditLog({
    userId: requestingPatientId,
    action: AuditAction.LINK_PERMISSIONS_UPDATED,
    category: AuditCategory.LINK,
    resourceType: 'doctor_patient_link',
    resourceId: link.linkId,
    detail: { doctorId: link.doctorId, changes },
  });

  return updated;
}

/**
 * Route-facing variant: the patient names the doctor, not the link.
 */
export async function setPermissionsForDoctor(
  deps: LinkServiceDeps,
  requester: { userId: string; role: Role },
  doctorId: string,
  permissions: CategoryPermissions,
): Promise<{ linkId: string; doctorId: string; permissions: Record<RecordCategory, boolean> }> {
  if (requester.role !== Role.PATIENT) {
    throw new NotAuthorizedError();
  }

  const link = await deps.linkRepo.findLink(doctorId, requester.userId);
  if (!link) {
    throw new NotFoundError('Link');
  }

  const updated = await setPermissions(deps, link.linkId, requester.userId, permissions);

  return {
    linkId: updated.linkId,
    doctorId: updated.doctorId,
    permissions: resolvePermissions(updated.permissions),
  };
}

// ---------------------------------------------------------------------------
// Service: Doctor Registers Patient
// ---------------------------------------------------------------------------

export interface RegisterPatientResult {
  kind: PatientRegistrationKind;
  patientId: string;
  linkId: string;
  shareCode: string | null;
  tempPassword: string | null;
}

/**
 * A doctor registers a patient and is linked to them.
 *
 * - Email of an existing patient: link to that patient.
 * - New email: create a standard account with a one-time temporary password.
 * - No email: create a shadow identity; its link carries a share code the
 *   real person later redeems to take over the records.
 */
export async function registerPatientForDoctor(
  deps: LinkServiceDeps,
  doctorId: string,
  data: RegisterPatient,
): Promise<RegisterPatientResult> {
  if (data.email) {
    const existing = await deps.userRepo.findUserByEmail(data.email);
    if (existing) {
      if (existing.role !== Role.PATIENT) {
        throw new DuplicateIdentityError();
      }
      const link = await createLink(deps, doctorId, existing.userId);
      await auditLinkCreated(deps, doctorId, link, PatientRegistrationKind.EXISTING);
      return {
        kind: PatientRegistrationKind.EXISTING,
        patientId: existing.userId,
        linkId: link.linkId,
        shareCode: null,
        tempPassword: null,
      };
    }

    const tempPassword = randomBytes(TEMP_PASSWORD_BYTES).toString('base64url');
    const created = await createPatientAndLink(deps, doctorId, {
      name: data.name,
      role: Role.PATIENT,
      email: data.email.toLowerCase(),
      passwordHash: await hashPassword(tempPassword),
      phone: data.phone ?? null,
      age: data.age ?? null,
    }, false);

    await auditLinkCreated(deps, doctorId, created.link, PatientRegistrationKind.STANDARD);
    return {
      kind: PatientRegistrationKind.STANDARD,
      patientId: created.patient.userId,
      linkId: created.link.linkId,
      shareCode: null,
      tempPassword,
    };
  }

  const created = await createPatientAndLink(deps, doctorId, {
    name: data.name,
    role: Role.PATIENT,
    email: null,
    passwordHash: null,
    phone: data.phone ?? null,
    age: data.age ?? null,
  }, true);

  await auditLinkCreated(deps, doctorId, created.link, PatientRegistrationKind.SHADOW);
  return {
    kind: PatientRegistrationKind.SHADOW,
    patientId: created.patient.userId,
    linkId: created.link.linkId,
    shareCode: created.link.shareCode,
    tempPassword: null,
  };
}

async function createPatientAndLink(
  deps: LinkServiceDeps,
  doctorId: string,
  patient: InsertUser,
  withShareCode: boolean,
): Promise<{ patient: SelectUser; link: SelectDoctorPatientLink }> {
  const nextShareCode = deps.generateShareCode ?? generateShareCode;

  for (let attempt = 1; ; attempt++) {
    try {
      return await deps.linkRepo.createPatientWithLink(patient, {
        doctorId,
        shareCode: withShareCode ? nextShareCode() : null,
      });
    } catch (err: unknown) {
      if (isUniqueViolation(err, 'users_email_idx')) {
        throw new DuplicateIdentityError();
      }
      if (
        isUniqueViolation(err, SHARE_CODE_INDEX) &&
        attempt < CODE_GENERATION_MAX_ATTEMPTS
      ) {
        continue;
      }
      throw err;
    }
  }
}

async function auditLinkCreated(
  deps: LinkServiceDeps,
  doctorId: string,
  link: SelectDoctorPatientLink,
  kind: PatientRegistrationKind,
): Promise<void> {
  if (kind !== PatientRegistrationKind.EXISTING) {
    await deps.auditRepo.appendAuditLog({
      userId: doctorId,
      action:
        kind === PatientRegistrationKind.SHADOW
          ? AuditAction.ACCOUNT_SHADOW_CREATED
          : AuditAction.ACCOUNT_CREATED_BY_DOCTOR,
      category: AuditCategory.ACCOUNT,
      resourceType: 'user',
      resourceId: link.patientId,
    });
  }

  await deps.auditRepo.appendAuditLog({
    userId: doctorId,
    action: AuditAction.LINK_CREATED,
    category: AuditCategory.LINK,
    resourceType: 'doctor_patient_link',
    resourceId: link.linkId,
    detail: { patientId: link.patientId, kind },
  });
}

// ---------------------------------------------------------------------------
// Service: Listings
// ---------------------------------------------------------------------------

export interface LinkedDoctor {
  linkId: string;
  doctorId: string;
  name: string;
  email: string | null;
  phone: string | null;
  specialization: string | null;
  hospital: string | null;
  experienceYears: number | null;
  available: boolean;
  permissions: Record<RecordCategory, boolean>;
  linkedAt: Date;
}

export async function listDoctorsForPatient(
  deps: Pick<LinkServiceDeps, 'linkRepo'>,
  patientId: string,
): Promise<LinkedDoctor[]> {
  const rows = await deps.linkRepo.listLinksForPatient(patientId);
  return rows.map(({ link, doctor, profile }) => ({
    linkId: link.linkId,
    doctorId: doctor.userId,
    name: doctor.name,
    email: doctor.email,
    phone: doctor.phone,
    specialization: profile?.specialization ?? null,
    hospital: profile?.hospital ?? null,
    experienceYears: profile?.experienceYears ?? null,
    available: profile?.available ?? false,
    permissions: resolvePermissions(link.permissions),
    linkedAt: link.createdAt,
  }));
}

export interface LinkedPatient {
  linkId: string;
  patientId: string;
  name: string;
  email: string | null;
  phone: string | null;
  age: number | null;
  isShadow: boolean;
  shareCode: string | null;
  permissions: Record<RecordCategory, boolean>;
  linkedAt: Date;
}

export async function listPatientsForDoctor(
  deps: Pick<LinkServiceDeps, 'linkRepo'>,
  doctorId: string,
): Promise<LinkedPatient[]> {
  const rows = await deps.linkRepo.listLinksForDoctor(doctorId);
  return rows.map(({ link, patient }) => ({
    linkId: link.linkId,
    patientId: patient.userId,
    name: patient.name,
    email: patient.email,
    phone: patient.phone,
    age: patient.age,
    isShadow: isShadowUser(patient),
    shareCode: link.shareCode,
    permissions: resolvePermissions(link.permissions),
    linkedAt: link.createdAt,
  }));
}
