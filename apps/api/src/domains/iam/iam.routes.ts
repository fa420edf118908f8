import { type FastifyInstance } from 'fastify';
import {
  registerSchema,
  loginSchema,
  updateDoctorProfileSchema,
  auditLogQuerySchema,
} from '@carelink/shared/schemas/iam.schema.js';
import { Capability } from '@carelink/shared/constants/iam.constants.js';
import { authRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createAuthHandlers, type AuthHandlerDeps } from './iam.handlers.js';

// ---------------------------------------------------------------------------
// IAM Auth Routes
// ---------------------------------------------------------------------------

export async function iamAuthRoutes(app: FastifyInstance, opts: { deps: AuthHandlerDeps }) {
  const handlers = createAuthHandlers(opts.deps);

  // ===== Public auth routes (no auth required, auth rate-limited) =====

  app.post('/api/v1/auth/register', {
    schema: { body: registerSchema },
    config: { rateLimit: authRateLimit() },
    handler: handlers.registerHandler,
  });

  app.post('/api/v1/auth/login', {
    schema: { body: loginSchema },
    config: { rateLimit: authRateLimit() },
    handler: handlers.loginHandler,
  });

  // ===== Authenticated routes =====

  app.post('/api/v1/auth/logout', {
    preHandler: [app.authenticate],
    handler: handlers.logoutHandler,
  });

  app.get('/api/v1/auth/me', {
    preHandler: [app.authenticate, app.authorize(Capability.PROFILE_VIEW)],
    handler: handlers.getMeHandler,
  });

  // ===== Doctor profile =====

  app.get('/api/v1/doctors/me/profile', {
    preHandler: [app.authenticate, app.authorize(Capability.DOCTOR_PROFILE_MANAGE)],
    handler: handlers.getDoctorProfileHandler,
  });

  app.put('/api/v1/doctors/me/profile', {
    schema: { body: updateDoctorProfileSchema },
    preHandler: [app.authenticate, app.authorize(Capability.DOCTOR_PROFILE_MANAGE)],
    handler: handlers.updateDoctorProfileHandler,
  });

  app.post('/api/v1/doctors/me/invite-code', {
    preHandler: [app.authenticate, app.authorize(Capability.DOCTOR_PROFILE_MANAGE)],
    handler: handlers.regenerateInviteCodeHandler,
  });

  // ===== Admin =====

  app.get('/api/v1/admin/audit-log', {
    schema: { querystring: auditLogQuerySchema },
    preHandler: [app.authenticate, app.authorize(Capability.AUDIT_VIEW)],
    handler: handlers.auditLogHandler,
  });
}
