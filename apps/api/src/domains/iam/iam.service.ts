import { createHash, randomBytes } from 'node:crypto';
import { hash as argon2Hash, verify as argon2Verify } from '@node-rs/argon2';
import {
  type Register,
  type UpdateDoctorProfile,
  type AuditLogQuery,
} from '@carelink/shared/schemas/iam.schema.js';
import {
  AuditAction,
  AuditCategory,
  AuditStatus,
  Role,
  SessionRevokeReason,
} from '@carelink/shared/constants/iam.constants.js';
import { CODE_GENERATION_MAX_ATTEMPTS } from '@carelink/shared/constants/link.constants.js';
import { generateInviteCode } from '@carelink/shared/utils/code.utils.js';
import {
  type InsertUser,
  type InsertDoctorProfile,
  type SelectUser,
  type SelectDoctorProfile,
  type SelectSession,
  type SelectAuditLog,
} from '@carelink/shared/schemas/db/iam.schema.js';
import {
  DuplicateIdentityError,
  NotFoundError,
  UnauthorizedError,
  isUniqueViolation,
} from '../../lib/errors.js';
import { type AuditRepo } from '../../lib/audit.js';

// ---------------------------------------------------------------------------
// Argon2id parameters
// ---------------------------------------------------------------------------

const ARGON2_OPTIONS = {
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

const SESSION_TOKEN_BYTES = 32;

/** SHA-256 hash a plaintext token. Stored in DB instead of the raw value. */
export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export function hashPassword(password: string): Promise<string> {
  return argon2Hash(password, ARGON2_OPTIONS);
}

const ROLES: readonly Role[] = Object.values(Role);

export function toRole(value: string): Role | null {
  return ROLES.find((role) => role === value) ?? null;
}

/** A user with neither email nor credential exists only until claimed. */
export function isShadowUser(user: Pick<SelectUser, 'email' | 'passwordHash'>): boolean {
  return user.email === null && user.passwordHash === null;
}

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface UserRepo {
  createUser(data: InsertUser): Promise<SelectUser>;
  createDoctorWithProfile(
    user: InsertUser,
    profile: Omit<InsertDoctorProfile, 'userId'>,
  ): Promise<{ user: SelectUser; profile: SelectDoctorProfile }>;
  findUserByEmail(email: string): Promise<SelectUser | undefined>;
  findUserById(userId: string): Promise<SelectUser | undefined>;
}

export interface DoctorProfileRepo {
  findProfileByUserId(userId: string): Promise<SelectDoctorProfile | undefined>;
  updateProfile(
    userId: string,
    data: Partial<
      Pick<
        InsertDoctorProfile,
        'specialization' | 'hospital' | 'experienceYears' | 'available'
      >
    >,
  ): Promise<SelectDoctorProfile | undefined>;
  updateInviteCode(
    userId: string,
    inviteCode: string,
  ): Promise<SelectDoctorProfile | undefined>;
}

export interface IdentityServiceDeps {
  userRepo: UserRepo;
  auditRepo: AuditRepo;
  generateInviteCode?: () => string;
}

// ---------------------------------------------------------------------------
// Service: Create Identity
// ---------------------------------------------------------------------------

export interface CreateIdentityInput {
  name: string;
  role: Role;
  email?: string | null;
  password?: string | null;
  phone?: string | null;
  age?: number | null;
}

/**
 * Create a user. Omitting both email and password yields a shadow identity.
 *
 * The unique index on email decides duplicates; a collision surfaces as
 * DuplicateIdentity.
 */
export async function createIdentity(
  deps: Pick<IdentityServiceDeps, 'userRepo'>,
  input: CreateIdentityInput,
): Promise<SelectUser> {
  const email = input.email ? input.email.toLowerCase() : null;
  const passwordHash = input.password ? await hashPassword(input.password) : null;

  try {
    return await deps.userRepo.createUser({
      name: input.name,
      role: input.role,
      email,
      passwordHash,
      phone: input.phone ?? null,
      age: input.age ?? null,
    });
  } catch (err: unknown) {
    if (isUniqueViolation(err, 'users_email_idx')) {
      throw new DuplicateIdentityError();
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Service: Registration
// ---------------------------------------------------------------------------

export interface RegisterResult {
  userId: string;
  role: Role;
  inviteCode: string | null;
}

/**
 * Self-service registration. Doctors get a profile with a fresh invite code;
 * an invite-code collision is retried with a new code.
 */
export async function registerUser(
  deps: IdentityServiceDeps,
  data: Register,
): Promise<RegisterResult> {
  if (data.role !== Role.DOCTOR) {
    const user = await createIdentity(deps, {
      name: data.name,
      role: data.role,
      email: data.email,
      password: data.password,
      phone: data.phone,
      age: data.age,
    });

    await deps.auditRepo.appendAuditLog({
      userId: user.userId,
      action: AuditAction.AUTH_REGISTERED,
      category: AuditCategory.AUTH,
      resourceType: 'user',
      resourceId: user.userId,
      detail: { role: data.role },
    });

    return { userId: user.userId, role: data.role, inviteCode: null };
  }

  const passwordHash = await hashPassword(data.password);
  const nextInviteCode = deps.generateInviteCode ?? generateInviteCode;

  for (let attempt = 1; ; attempt++) {
    try {
      const { user, profile } = await deps.userRepo.createDoctorWithProfile(
        {
          name: data.name,
          role: Role.DOCTOR,
          email: data.email.toLowerCase(),
          passwordHash,
          phone: data.phone ?? null,
          age: data.age ?? null,
        },
        {
          specialization: data.specialization ?? null,
          hospital: data.hospital ?? null,
          experienceYears: data.experience_years ?? null,
          inviteCode: nextInviteCode(),
        },
      );

      await deps.auditRepo.appendAuditLog({
        userId: user.userId,
        action: AuditAction.AUTH_REGISTERED,
        category: AuditCategory.AUTH,
        resourceType: 'user',
        resourceId: user.userId,
        detail: { role: Role.DOCTOR },
      });

      return { userId: user.userId, role: Role.DOCTOR, inviteCode: profile.inviteCode };
    } catch (err: unknown) {
      if (isUniqueViolation(err, 'users_email_idx')) {
        throw new DuplicateIdentityError();
      }
      if (
        isUniqueViolation(err, 'doctor_profiles_invite_code_idx') &&
        attempt < CODE_GENERATION_MAX_ATTEMPTS
      ) {
        continue;
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// Login Service Dependencies
// ---------------------------------------------------------------------------

export interface LoginSessionRepo {
  createSession(data: {
    userId: string;
    tokenHash: string;
    ipAddress: string;
    userAgent: string;
  }): Promise<{ sessionId: string }>;
}

export interface LoginServiceDeps {
  userRepo: Pick<UserRepo, 'findUserByEmail'>;
  sessionRepo: LoginSessionRepo;
  auditRepo: AuditRepo;
}

export interface LoginResult {
  sessionToken: string;
  userId: string;
  role: string;
}

/**
 * Authenticate with email and password and open a session.
 *
 * Anti-enumeration: returns the same generic error for an unknown email, a
 * wrong password, a shadow identity and a deactivated account. Performs a
 * dummy Argon2id hash when there is no credential to verify so timing stays
 * consistent.
 */
export async function login(
  deps: LoginServiceDeps,
  email: string,
  password: string,
  ipAddress: string,
  userAgent: string,
): Promise<LoginResult> {
  const user = await deps.userRepo.findUserByEmail(email.toLowerCase());

  if (!user || !user.passwordHash) {
    await argon2Hash('dummy-password-for-timing', ARGON2_OPTIONS);
    throw new UnauthorizedError('Invalid credentials');
  }

  const passwordValid = await argon2Verify(user.passwordHash, password);

  if (!passwordValid || !user.isActive) {
    await deps.auditRepo.appendAuditLog({
      userId: user.userId,
      action: AuditAction.AUTH_LOGIN_FAILED,
      category: AuditCategory.AUTH,
      resourceType: 'user',
      resourceId: user.userId,
      status: AuditStatus.FAILED,
      detail: { reason: passwordValid ? 'account_inactive' : 'invalid_password' },
      ipAddress,
      userAgent,
    });
    throw new UnauthorizedError('Invalid credentials');
  }

  const sessionToken = randomBytes(SESSION_TOKEN_BYTES).toString('hex');
  const session = await deps.sessionRepo.createSession({
    userId: user.userId,
    tokenHash: hashToken(sessionToken),
    ipAddress,
    userAgent,
  });

  await deps.auditRepo.appendAuditLog({
    userId: user.userId,
    action: AuditAction.AUTH_LOGIN_SUCCESS,
    category: AuditCategory.AUTH,
    resourceType: 'session',
    resourceId: session.sessionId,
    ipAddress,
    userAgent,
  });

  return { sessionToken, userId: user.userId, role: user.role };
}

// ---------------------------------------------------------------------------
// Session Management Dependencies
// ---------------------------------------------------------------------------

export interface SessionManagementSessionRepo {
  findSessionByTokenHash(tokenHash: string): Promise<{
    session: Pick<SelectSession, 'sessionId' | 'userId'>;
    user: {
      userId: string;
      role: string;
      isActive: boolean;
    };
  } | undefined>;
  refreshSession(sessionId: string): Promise<void>;
  revokeSession(sessionId: string, reason: SessionRevokeReason): Promise<void>;
}

export interface SessionManagementDeps {
  sessionRepo: SessionManagementSessionRepo;
  auditRepo: AuditRepo;
}

// ---------------------------------------------------------------------------
// Service: Validate Session
// ---------------------------------------------------------------------------

/** The resolved principal every authenticated request carries. */
export interface AuthContext {
  userId: string;
  role: Role;
  sessionId: string;
}

/**
 * Validate a session by its token hash.
 *
 * The repository filters revoked and expired sessions. A deactivated user or
 * an unrecognised role yields null. On success the idle timer is refreshed.
 */
export async function validateSession(
  deps: Pick<SessionManagementDeps, 'sessionRepo'>,
  tokenHash: string,
): Promise<AuthContext | null> {
  const result = await deps.sessionRepo.findSessionByTokenHash(tokenHash);
  if (!result || !result.user.isActive) return null;

  const role = toRole(result.user.role);
  if (!role) return null;

  await deps.sessionRepo.refreshSession(result.session.sessionId);

  return {
    userId: result.user.userId,
    role,
    sessionId: result.session.sessionId,
  };
}

// ---------------------------------------------------------------------------
// Service: Logout
// ---------------------------------------------------------------------------

export async function logout(
  deps: SessionManagementDeps,
  sessionId: string,
  userId: string,
): Promise<void> {
  await deps.sessionRepo.revokeSession(sessionId, SessionRevokeReason.LOGOUT);

  await deps.auditRepo.appendAuditLog({
    userId,
    action: AuditAction.AUTH_LOGOUT,
    category: AuditCategory.AUTH,
    resourceType: 'session',
    resourceId: sessionId,
  });
}

// ---------------------------------------------------------------------------
// Service: Profile
// ---------------------------------------------------------------------------

export interface ProfileServiceDeps {
  userRepo: Pick<UserRepo, 'findUserById'>;
  doctorProfileRepo: DoctorProfileRepo;
  auditRepo: AuditRepo;
  generateInviteCode?: () => string;
}

export interface DoctorProfileView {
  specialization: string | null;
  hospital: string | null;
  experienceYears: number | null;
  available: boolean;
  inviteCode: string;
}

export interface ProfileView {
  userId: string;
  name: string;
  email: string | null;
  role: string;
  phone: string | null;
  age: number | null;
  doctorProfile: DoctorProfileView | null;
}

function toDoctorProfileView(profile: SelectDoctorProfile): DoctorProfileView {
  return {
    specialization: profile.specialization,
    hospital: profile.hospital,
    experienceYears: profile.experienceYears,
    available: profile.available,
    inviteCode: profile.inviteCode,
  };
}

export async function getProfile(
  deps: ProfileServiceDeps,
  userId: string,
): Promise<ProfileView> {
  const user = await deps.userRepo.findUserById(userId);
  if (!user) {
    throw new NotFoundError('User');
  }

  const profile =
    user.role === Role.DOCTOR
      ? await deps.doctorProfileRepo.findProfileByUserId(userId)
      : undefined;

  return {
    userId: user.userId,
    name: user.name,
    email: user.email,
    role: user.role,
    phone: user.phone,
    age: user.age,
    doctorProfile: profile ? toDoctorProfileView(profile) : null,
  };
}

export async function getDoctorProfile(
  deps: ProfileServiceDeps,
  doctorId: string,
): Promise<DoctorProfileView> {
  const profile = await deps.doctorProfileRepo.findProfileByUserId(doctorId);
  if (!profile) {
    throw new NotFoundError('Doctor profile');
  }
  return toDoctorProfileView(profile);
}

export async function updateDoctorProfile(
  deps: ProfileServiceDeps,
  doctorId: string,
  data: UpdateDoctorProfile,
): Promise<DoctorProfileView> {
  const updated = await deps.doctorProfileRepo.updateProfile(doctorId, {
    specialization: data.specialization,
    hospital: data.hospital,
    experienceYears: data.experience_years,
    available: data.available,
  });
  if (!updated) {
    throw new NotFoundError('Doctor profile');
  }

  await deps.auditRepo.appendAuditLog({
    userId: doctorId,
    action: AuditAction.DOCTOR_PROFILE_UPDATED,
    category: AuditCategory.ACCOUNT,
    resourceType: 'doctor_profile',
    resourceId: updated.profileId,
    detail: { fields: Object.keys(data) },
  });

  return toDoctorProfileView(updated);
}

/**
 * Issue a new invite code. Links already created with the old code are
 * unaffected; the old code simply stops resolving.
 */
export async function regenerateInviteCode(
  deps: ProfileServiceDeps,
  doctorId: string,
): Promise<{ inviteCode: string }> {
  const nextInviteCode = deps.generateInviteCode ?? generateInviteCode;

  for (let attempt = 1; ; attempt++) {
    try {
      const updated = await deps.doctorProfileRepo.updateInviteCode(
        doctorId,
        nextInviteCode(),
      );
      if (!updated) {
        throw new NotFoundError('Doctor profile');
      }

      await deps.auditRepo.appendAuditLog({
        userId: doctorId,
        action: AuditAction.INVITE_CODE_REGENERATED,
        category: AuditCategory.ACCOUNT,
        resourceType: 'doctor_profile',
        resourceId: updated.profileId,
      });

      return { inviteCode: updated.inviteCode };
    } catch (err: unknown) {
      if (
        isUniqueViolation(err, 'doctor_profiles_invite_code_idx') &&
        attempt < CODE_GENERATION_MAX_ATTEMPTS
      ) {
        continue;
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// Service: Audit Log Query (admin)
// ---------------------------------------------------------------------------

export interface AuditQueryDeps {
  auditLogRepo: {
    querySystemAuditLog(filters: {
      userId?: string;
      action?: string;
      category?: string;
      startDate?: string;
      endDate?: string;
      page?: number;
      pageSize?: number;
    }): Promise<{ data: SelectAuditLog[]; total: number }>;
  };
  auditRepo: AuditRepo;
}

export interface AuditLogPage {
  data: SelectAuditLog[];
  pagination: { total: number; page: number; pageSize: number; hasMore: boolean };
}

export async function queryAuditLog(
  deps: AuditQueryDeps,
  adminUserId: string,
  query: AuditLogQuery,
): Promise<AuditLogPage> {
  const result = await deps.auditLogRepo.querySystemAuditLog({
    userId: query.user_id,
    action: query.action,
    category: query.category,
    startDate: query.start_date,
    endDate: query.end_date,
    page: query.page,
    pageSize: query.page_size,
  });

  await deps.auditRepo.appendAuditLog({
    userId: adminUserId,
    action: AuditAction.AUDIT_QUERIED,
    category: AuditCategory.AUDIT,
    detail: { filters: { ...query } },
  });

  return {
    data: result.data,
    pagination: {
      total: result.total,
      page: query.page,
      pageSize: query.page_size,
      hasMore: query.page * query.page_size < result.total,
    },
  };
}
