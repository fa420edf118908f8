import { eq, and, gte, lte, desc, inArray, count, type SQL } from 'drizzle-orm';
import {
  users,
  doctorProfiles,
  sessions,
  auditLog,
  type InsertUser,
  type InsertDoctorProfile,
  type SelectUser,
  type SelectDoctorProfile,
  type SelectSession,
  type SelectAuditLog,
} from '@carelink/shared/schemas/db/iam.schema.js';
import {
  AuditStatus,
  type SessionRevokeReason,
} from '@carelink/shared/constants/iam.constants.js';
import { type Database } from '../../lib/db.js';

type UpdateUserData = Partial<Pick<InsertUser, 'name' | 'phone' | 'age'>>;

export function createUserRepository(db: Database) {
  return {
    async createUser(data: InsertUser): Promise<SelectUser> {
      const rows = await db
        .insert(users)
        .values({ ...data, email: data.email ? data.email.toLowerCase() : null })
        .returning();
      return rows[0];
    },

    /**
     * Creates a doctor and their profile together. A collision on either the
     * email or the invite code rolls back both rows.
     */
    async createDoctorWithProfile(
      user: InsertUser,
      profile: Omit<InsertDoctorProfile, 'userId'>,
    ): Promise<{ user: SelectUser; profile: SelectDoctorProfile }> {
      return db.transaction(async (tx) => {
        const userRows = await tx
          .insert(users)
          .values({ ...user, email: user.email ? user.email.toLowerCase() : null })
          .returning();
        const profileRows = await tx
          .insert(doctorProfiles)
          .values({ ...profile, userId: userRows[0].userId })
          .returning();
        return { user: userRows[0], profile: profileRows[0] };
      });
    },

    async findUserByEmail(email: string): Promise<SelectUser | undefined> {
      const rows = await db
        .select()
        .from(users)
        .where(eq(users.email, email.toLowerCase()))
        .limit(1);
      return rows[0];
    },

    async findUserById(userId: string): Promise<SelectUser | undefined> {
      const rows = await db
        .select()
        .from(users)
        .where(eq(users.userId, userId))
        .limit(1);
      return rows[0];
    },

    async findUsersByIds(userIds: string[]): Promise<SelectUser[]> {
      if (userIds.length === 0) return [];
      return db.select().from(users).where(inArray(users.userId, userIds));
    },

    async updateUser(
      userId: string,
      data: UpdateUserData,
    ): Promise<SelectUser | undefined> {
      const rows = await db
        .update(users)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(users.userId, userId))
        .returning();
      return rows[0];
    },
  };
}

export type UserRepository = ReturnType<typeof createUserRepository>;

// ---------------------------------------------------------------------------
// Doctor Profile Repository
// ---------------------------------------------------------------------------

type UpdateDoctorProfileData = Partial<
  Pick<
    InsertDoctorProfile,
    'specialization' | 'hospital' | 'experienceYears' | 'available'
  >
>;

export function createDoctorProfileRepository(db: Database) {
  return {
    async findProfileByUserId(
      userId: string,
    ): Promise<SelectDoctorProfile | undefined> {
      const rows = await db
        .select()
        .from(doctorProfiles)
        .where(eq(doctorProfiles.userId, userId))
        .limit(1);
      return rows[0];
    },

    async findProfileByInviteCode(
      inviteCode: string,
    ): Promise<SelectDoctorProfile | undefined> {
      const rows = await db
        .select()
        .from(doctorProfiles)
        .where(eq(doctorProfiles.inviteCode, inviteCode))
        .limit(1);
      return rows[0];
    },

    async findProfilesByUserIds(
      userIds: string[],
    ): Promise<SelectDoctorProfile[]> {
      if (userIds.length === 0) return [];
      return db
        .select()
        .from(doctorProfiles)
        .where(inArray(doctorProfiles.userId, userIds));
    },

    async updateProfile(
      userId: string,
      data: UpdateDoctorProfileData,
    ): Promise<SelectDoctorProfile | undefined> {
      const rows = await db
        .update(doctorProfiles)
        .set({ ...data, updatedAt: new Date() })
        .where(eq(doctorProfiles.userId, userId))
        .returning();
      return rows[0];
    },

    async updateInviteCode(
      userId: string,
      inviteCode: string,
    ): Promise<SelectDoctorProfile | undefined> {
      const rows = await db
        .update(doctorProfiles)
        .set({ inviteCode, updatedAt: new Date() })
        .where(eq(doctorProfiles.userId, userId))
        .returning();
      return rows[0];
    },
  };
}

export type DoctorProfileRepository = ReturnType<
  typeof createDoctorProfileRepository
>;

// ---------------------------------------------------------------------------
// Session expiry constants
// ---------------------------------------------------------------------------

/** Absolute session lifetime: 24 hours from creation. */
const ABSOLUTE_EXPIRY_MS = 24 * 60 * 60 * 1000;
/** Idle session timeout: 60 minutes from last activity. */
const IDLE_EXPIRY_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Session Repository
// ---------------------------------------------------------------------------

interface CreateSessionData {
  userId: string;
  tokenHash: string;
  ipAddress: string;
  userAgent: string;
}

export interface SessionWithUser {
  session: SelectSession;
  user: Pick<SelectUser, 'userId' | 'role' | 'isActive'>;
}

export function isSessionExpired(session: SelectSession, now = Date.now()): boolean {
  const createdAt = new Date(session.createdAt).getTime();
  const lastActiveAt = new Date(session.lastActiveAt).getTime();

  if (now - createdAt > ABSOLUTE_EXPIRY_MS) return true;
  if (now - lastActiveAt > IDLE_EXPIRY_MS) return true;
  return false;
}

export function createSessionRepository(db: Database) {
  return {
    async createSession(data: CreateSessionData): Promise<SelectSession> {
      const rows = await db
        .insert(sessions)
        .values(data)
        .returning();
      return rows[0];
    },

    async findSessionByTokenHash(
      tokenHash: string,
    ): Promise<SessionWithUser | undefined> {
      const rows = await db
        .select({
          session: sessions,
          user: {
            userId: users.userId,
            role: users.role,
            isActive: users.isActive,
          },
        })
        .from(sessions)
        .innerJoin(users, eq(sessions.userId, users.userId))
        .where(
          and(
            eq(sessions.tokenHash, tokenHash),
            eq(sessions.revoked, false),
          ),
        )
        .limit(1);

      if (rows.length === 0) return undefined;

      const row = rows[0];
      if (isSessionExpired(row.session)) return undefined;

      return row;
    },

    async refreshSession(sessionId: string): Promise<void> {
      await db
        .update(sessions)
        .set({ lastActiveAt: new Date() })
        .where(eq(sessions.sessionId, sessionId));
    },

    async revokeSession(
      sessionId: string,
      reason: SessionRevokeReason,
    ): Promise<void> {
      await db
        .update(sessions)
        .set({ revoked: true, revokedReason: reason })
        .where(eq(sessions.sessionId, sessionId));
    },
  };
}

export type SessionRepository = ReturnType<typeof createSessionRepository>;

// ---------------------------------------------------------------------------
// Audit Log Repository (APPEND-ONLY: no update, no delete)
// ---------------------------------------------------------------------------

/** Sensitive keys that must never appear in the audit log detail field. */
const SANITISED_DETAIL_KEYS = new Set([
  'password',
  'passwordHash',
  'password_hash',
  'tempPassword',
  'temp_password',
  'token',
  'tokenHash',
  'token_hash',
  'sessionToken',
  'session_token',
  'fileData',
  'file_data',
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Recursively strip sensitive keys from a JSONB detail object. */
export function sanitiseDetail(
  detail: Record<string, unknown> | null | undefined,
): Record<string, unknown> | null {
  if (!detail) return null;

  const sanitised: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(detail)) {
    if (SANITISED_DETAIL_KEYS.has(key)) {
      sanitised[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitised[key] = sanitiseDetail(value);
    } else {
      sanitised[key] = value;
    }
  }
  return sanitised;
}

export interface AppendAuditLogEntry {
  userId?: string | null;
  action: string;
  category: string;
  resourceType?: string | null;
  resourceId?: string | null;
  status?: AuditStatus;
  detail?: Record<string, unknown> | null;
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AuditLogFilters {
  userId?: string;
  action?: string;
  category?: string;
  startDate?: string; // ISO 8601 date string
  endDate?: string;   // ISO 8601 date string
  page?: number;
  pageSize?: number;
}

export function createAuditLogRepository(db: Database) {
  return {
    /**
     * Append a single audit log entry. This is the ONLY write operation
     * on the audit_log table. No update, no delete.
     */
    async appendAuditLog(entry: AppendAuditLogEntry): Promise<SelectAuditLog> {
      const rows = await db
        .insert(auditLog)
        .values({
          userId: entry.userId ?? undefined,
          action: entry.action,
          category: entry.category,
          resourceType: entry.resourceType ?? undefined,
          resourceId: entry.resourceId ?? undefined,
          status: entry.status ?? AuditStatus.SUCCESS,
          detail: sanitiseDetail(entry.detail),
          ipAddress: entry.ipAddress ?? undefined,
          userAgent: entry.userAgent ?? undefined,
        })
        .returning();
      return rows[0];
    },

    /**
     * Admin-only: query audit log across all users. The route guard enforces
     * the capability; the repository does not check it.
     */
    async querySystemAuditLog(
      filters: AuditLogFilters = {},
    ): Promise<{ data: SelectAuditLog[]; total: number }> {
      const page = filters.page ?? 1;
      const pageSize = Math.min(filters.pageSize ?? 50, 200);
      const offset = (page - 1) * pageSize;

      const conditions: SQL[] = [];
      if (filters.userId) {
        conditions.push(eq(auditLog.userId, filters.userId));
      }
      if (filters.action) {
        conditions.push(eq(auditLog.action, filters.action));
      }
      if (filters.category) {
        conditions.push(eq(auditLog.category, filters.category));
      }
      if (filters.startDate) {
        conditions.push(gte(auditLog.createdAt, new Date(filters.startDate)));
      }
      if (filters.endDate) {
        // endDate is inclusive: include the entire end day
        const endOfDay = new Date(filters.endDate);
        endOfDay.setUTCHours(23, 59, 59, 999);
        conditions.push(lte(auditLog.createdAt, endOfDay));
      }

      const where = conditions.length > 0 ? and(...conditions) : undefined;

      const data = await db
        .select()
        .from(auditLog)
        .where(where)
        .orderBy(desc(auditLog.createdAt))
        .limit(pageSize)
        .offset(offset);

      const totals = await db
        .select({ total: count() })
        .from(auditLog)
        .where(where);

      return { data, total: totals[0]?.total ?? 0 };
    },
  };
}

export type AuditLogRepository = ReturnType<typeof createAuditLogRepository>;
