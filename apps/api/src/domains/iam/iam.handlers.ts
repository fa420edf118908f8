import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type Register,
  type Login,
  type UpdateDoctorProfile,
  type AuditLogQuery,
} from '@carelink/shared/schemas/iam.schema.js';
import {
  registerUser,
  login,
  logout,
  getProfile,
  getDoctorProfile,
  updateDoctorProfile,
  regenerateInviteCode,
  queryAuditLog,
  type IdentityServiceDeps,
  type LoginServiceDeps,
  type SessionManagementDeps,
  type ProfileServiceDeps,
  type AuditQueryDeps,
} from './iam.service.js';

// ---------------------------------------------------------------------------
// Session cookie constants
// ---------------------------------------------------------------------------

const SESSION_COOKIE_NAME = 'session';
const SESSION_COOKIE_MAX_AGE = 86400; // 24 hours in seconds

function setSessionCookie(reply: FastifyReply, token: string): void {
  reply.header(
    'Set-Cookie',
    `${SESSION_COOKIE_NAME}=${token}; HttpOnly; Secure; SameSite=Lax; Path=/; Max-Age=${SESSION_COOKIE_MAX_AGE}`,
  );
}

function clearSessionCookie(reply: FastifyReply): void {
  reply.header(
    'Set-Cookie',
    `${SESSION_COOKIE_NAME}=; HttpOnly; Secure; SameSite=Lax; Path=/; Max-Age=0`,
  );
}

// ---------------------------------------------------------------------------
// Handler factory: creates all auth handlers with injected dependencies
// ---------------------------------------------------------------------------

export interface AuthHandlerDeps {
  identityDeps: IdentityServiceDeps;
  loginDeps: LoginServiceDeps;
  sessionDeps: SessionManagementDeps;
  profileDeps: ProfileServiceDeps;
  auditQueryDeps: AuditQueryDeps;
}

export function createAuthHandlers(deps: AuthHandlerDeps) {
  // -------------------------------------------------------------------------
  // POST /api/v1/auth/register
  // -------------------------------------------------------------------------

  async function registerHandler(
    request: FastifyRequest<{ Body: Register }>,
    reply: FastifyReply,
  ) {
    const result = await registerUser(deps.identityDeps, request.body);
    return reply.code(201).send({ data: result });
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/auth/login
  // -------------------------------------------------------------------------

  async function loginHandler(
    request: FastifyRequest<{ Body: Login }>,
    reply: FastifyReply,
  ) {
    const result = await login(
      deps.loginDeps,
      request.body.email,
      request.body.password,
      request.ip,
      request.headers['user-agent'] ?? 'unknown',
    );
    setSessionCookie(reply, result.sessionToken);
    return reply.code(200).send({
      data: { token: result.sessionToken, userId: result.userId, role: result.role },
    });
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/auth/logout
  // -------------------------------------------------------------------------

  async function logoutHandler(request: FastifyRequest, reply: FastifyReply) {
    const { sessionId, userId } = request.authContext;
    await logout(deps.sessionDeps, sessionId, userId);
    clearSessionCookie(reply);
    return reply.code(200).send({ data: { success: true } });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/auth/me
  // -------------------------------------------------------------------------

  async function getMeHandler(request: FastifyRequest, reply: FastifyReply) {
    const result = await getProfile(deps.profileDeps, request.authContext.userId);
    return reply.code(200).send({ data: result });
  }

  // -------------------------------------------------------------------------
  // Doctor profile
  // -------------------------------------------------------------------------

  async function getDoctorProfileHandler(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const result = await getDoctorProfile(
      deps.profileDeps,
      request.authContext.userId,
    );
    return reply.code(200).send({ data: result });
  }

  async function updateDoctorProfileHandler(
    request: FastifyRequest<{ Body: UpdateDoctorProfile }>,
    reply: FastifyReply,
  ) {
    const result = await updateDoctorProfile(
      deps.profileDeps,
      request.authContext.userId,
      request.body,
    );
    return reply.code(200).send({ data: result });
  }

  async function regenerateInviteCodeHandler(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const result = await regenerateInviteCode(
      deps.profileDeps,
      request.authContext.userId,
    );
    return reply.code(200).send({ data: result });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/admin/audit-log
  // -------------------------------------------------------------------------

  async function auditLogHandler(
    request: FastifyRequest<{ Querystring: AuditLogQuery }>,
    reply: FastifyReply,
  ) {
    const result = await queryAuditLog(
      deps.auditQueryDeps,
      request.authContext.userId,
      request.query,
    );
    return reply.code(200).send(result);
  }

  return {
    registerHandler,
    loginHandler,
    logoutHandler,
    getMeHandler,
    getDoctorProfileHandler,
    updateDoctorProfileHandler,
    regenerateInviteCodeHandler,
    auditLogHandler,
  };
}
