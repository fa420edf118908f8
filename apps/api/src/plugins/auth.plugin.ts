import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import {
  AuditCategory,
  AuditAction,
  AuditStatus,
  DefaultCapabilities,
  type Capability,
  type Role,
} from '@carelink/shared/constants/iam.constants.js';
import {
  hashToken,
  validateSession,
  type AuthContext,
  type SessionManagementDeps,
} from '../domains/iam/iam.service.js';
import { type AuditRepo } from '../lib/audit.js';

// ---------------------------------------------------------------------------
// Type augmentation: add authContext to Fastify request
// ---------------------------------------------------------------------------

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
    authorize: (...capabilities: Capability[]) => (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
  interface FastifyContextConfig {
    /** Force the audit-log plugin on (true) or off (false) for a route. */
    auditLog?: boolean;
  }
}

// ---------------------------------------------------------------------------
// Session cookie name
// ---------------------------------------------------------------------------

const SESSION_COOKIE_NAME = 'session';

// ---------------------------------------------------------------------------
// Sensitive body fields to strip from audit log
// ---------------------------------------------------------------------------

const SENSITIVE_BODY_FIELDS = new Set([
  'password',
  'token',
  'share_code',
  'invite_code',
  'file_data',
]);

// ---------------------------------------------------------------------------
// Helper: sanitize request body for audit logging
// ---------------------------------------------------------------------------

function sanitizeBody(body: unknown): Record<string, unknown> | undefined {
  if (!body || typeof body !== 'object') return undefined;
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    if (SENSITIVE_BODY_FIELDS.has(key)) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

// ---------------------------------------------------------------------------
// Helper: capability lookup
// ---------------------------------------------------------------------------

function hasCapability(role: Role, capability: Capability): boolean {
  const granted: readonly Capability[] = DefaultCapabilities[role];
  return granted.includes(capability);
}

// ---------------------------------------------------------------------------
// Plugin: authenticate / authorize
// ---------------------------------------------------------------------------

export interface AuthPluginOptions {
  sessionDeps: Pick<SessionManagementDeps, 'sessionRepo'>;
}

async function authPlugin(app: FastifyInstance, opts: AuthPluginOptions) {
  const { sessionDeps } = opts;

  /**
   * authenticate: preHandler that extracts the session token from a bearer
   * header or the session cookie, validates it, and populates
   * request.authContext.
   */
  app.decorate('authenticate', async function authenticate(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const token = extractToken(request);
    if (!token) {
      reply.code(401).send({
        error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
      });
      return;
    }

    const authContext = await validateSession(sessionDeps, hashToken(token));

    if (!authContext) {
      reply.code(401).send({
        error: { code: 'UNAUTHORIZED', message: 'Invalid or expired session' },
      });
      return;
    }

    request.authContext = authContext;
  });

  /**
   * authorize: returns a preHandler that checks the principal's role grants
   * every capability the route declares.
   */
  app.decorate('authorize', function authorize(
    ...requiredCapabilities: Capability[]
  ) {
    return async function authorizeHandler(
      request: FastifyRequest,
      reply: FastifyReply,
    ) {
      const ctx = request.authContext;
      if (!ctx) {
        reply.code(401).send({
          error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
        });
        return;
      }

      const missing = requiredCapabilities.filter(
        (capability) => !hasCapability(ctx.role, capability),
      );

      if (missing.length > 0) {
        reply.code(403).send({
          error: { code: 'FORBIDDEN', message: 'Insufficient permissions' },
        });
      }
    };
  });
}

// ---------------------------------------------------------------------------
// Plugin: auditLog (onResponse hook)
// ---------------------------------------------------------------------------

export interface AuditLogPluginOptions {
  auditRepo: AuditRepo;
}

async function auditLogPlugin(app: FastifyInstance, opts: AuditLogPluginOptions) {
  const { auditRepo } = opts;

  const STATE_CHANGING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

  app.addHook('onResponse', async (request, reply) => {
    // Only log state-changing requests by default
    const shouldLog =
      request.routeOptions.config.auditLog ?? STATE_CHANGING_METHODS.has(request.method);

    if (!shouldLog) return;

    try {
      await auditRepo.appendAuditLog({
        userId: request.authContext?.userId ?? null,
        action: AuditAction.API_REQUEST,
        category: AuditCategory.API,
        status: reply.statusCode < 400 ? AuditStatus.SUCCESS : AuditStatus.FAILED,
        detail: {
          method: request.method,
          route: request.routeOptions.url ?? request.url,
          statusCode: reply.statusCode,
          body: sanitizeBody(request.body),
        },
        ipAddress: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
      });
    } catch (err) {
      // Audit logging failure should not break the request
      request.log.error({ err }, 'Failed to write audit log');
    }
  });
}

// ---------------------------------------------------------------------------
// Token extraction
// ---------------------------------------------------------------------------

function parseCookie(cookieHeader: string, name: string): string | null {
  const pairs = cookieHeader.split(';');
  for (const pair of pairs) {
    const [key, ...rest] = pair.trim().split('=');
    if (key === name) {
      return rest.join('=') || null;
    }
  }
  return null;
}

function extractToken(request: FastifyRequest): string | null {
  const authorization = request.headers.authorization;
  if (authorization) {
    const [scheme, value] = authorization.split(' ');
    return scheme?.toLowerCase() === 'bearer' && value ? value : null;
  }

  const cookieHeader = request.headers.cookie;
  return cookieHeader ? parseCookie(cookieHeader, SESSION_COOKIE_NAME) : null;
}

// ---------------------------------------------------------------------------
// Exports
// ---------------------------------------------------------------------------

export const authPluginFp = fp(authPlugin, {
  name: 'auth-plugin',
});

export const auditLogPluginFp = fp(auditLogPlugin, {
  name: 'audit-log-plugin',
});

// Named exports for direct use in tests
export { authPlugin, auditLogPlugin, parseCookie, sanitizeBody, extractToken };
