import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { getEnv } from './lib/env.js';
import { createDatabase, type Database } from './lib/db.js';
import { createAuditSink, type AuditRepo } from './lib/audit.js';
import { errorHandlerPluginFp } from './plugins/error-handler.plugin.js';
import { rateLimitPluginFp } from './plugins/rate-limit.plugin.js';
import {
  authPluginFp,
  auditLogPluginFp,
  type AuthPluginOptions,
} from './plugins/auth.plugin.js';
import {
  createUserRepository,
  createDoctorProfileRepository,
  createSessionRepository,
  createAuditLogRepository,
} from './domains/iam/iam.repository.js';
import { iamAuthRoutes } from './domains/iam/iam.routes.js';
import { type AuthHandlerDeps } from './domains/iam/iam.handlers.js';
import { createLinkRepository } from './domains/link/link.repository.js';
import { linkRoutes } from './domains/link/link.routes.js';
import { type LinkHandlerDeps } from './domains/link/link.handlers.js';
import { createShadowRepository } from './domains/shadow/shadow.repository.js';
import { shadowRoutes } from './domains/shadow/shadow.routes.js';
import { type ShadowHandlerDeps } from './domains/shadow/shadow.handlers.js';
import {
  createHealthLogRepository,
  createMedicationRepository,
  createReportRepository,
  createDietPlanRepository,
  createMedicalHistoryRepository,
  createConsultationRepository,
} from './domains/records/records.repository.js';
import { recordsRoutes } from './domains/records/records.routes.js';
import { type RecordsHandlerDeps } from './domains/records/records.handlers.js';
import {
  createPregnancyProfileRepository,
  createEmergencyRepository,
} from './domains/care/care.repository.js';
import { careRoutes } from './domains/care/care.routes.js';
import { type CareHandlerDeps } from './domains/care/care.handlers.js';

// ---------------------------------------------------------------------------
// Application dependencies
// ---------------------------------------------------------------------------

export interface AppDeps {
  sessionDeps: AuthPluginOptions['sessionDeps'];
  /** Receives one entry per state-changing request. */
  requestAuditRepo: AuditRepo;
  auth: AuthHandlerDeps;
  link: LinkHandlerDeps;
  shadow: ShadowHandlerDeps;
  records: RecordsHandlerDeps;
  care: CareHandlerDeps;
}

/** Wires every repository against one database handle. */
export function createAppDeps(db: Database, logger: FastifyBaseLogger): AppDeps {
  const userRepo = createUserRepository(db);
  const doctorProfileRepo = createDoctorProfileRepository(db);
  const sessionRepo = createSessionRepository(db);
  const auditLogRepo = createAuditLogRepository(db);
  const linkRepo = createLinkRepository(db);
  const auditRepo = createAuditSink(auditLogRepo, logger);

  return {
    sessionDeps: { sessionRepo },
    requestAuditRepo: auditLogRepo,
    auth: {
      identityDeps: { userRepo, auditRepo },
      loginDeps: { userRepo, sessionRepo, auditRepo },
      sessionDeps: { sessionRepo, auditRepo },
      profileDeps: { userRepo, doctorProfileRepo, auditRepo },
      auditQueryDeps: { auditLogRepo, auditRepo },
    },
    link: {
      serviceDeps: { linkRepo, userRepo, doctorProfileRepo, auditRepo },
    },
    shadow: {
      serviceDeps: { shadowRepo: createShadowRepository(db), auditRepo },
    },
    records: {
      serviceDeps: {
        linkRepo,
        auditRepo,
        healthLogRepo: createHealthLogRepository(db),
        medicationRepo: createMedicationRepository(db),
        reportRepo: createReportRepository(db),
        dietPlanRepo: createDietPlanRepository(db),
        medicalHistoryRepo: createMedicalHistoryRepository(db),
        consultationRepo: createConsultationRepository(db),
      },
    },
    care: {
      serviceDeps: {
        linkRepo,
        auditRepo,
        pregnancyProfileRepo: createPregnancyProfileRepository(db),
        emergencyRepo: createEmergencyRepository(db),
      },
    },
  };
}

// ---------------------------------------------------------------------------
// App factory
// ---------------------------------------------------------------------------

export interface BuildAppOptions {
  /** Built once the app's logger exists, so audit failures log through it. */
  deps: (logger: FastifyBaseLogger) => AppDeps;
  logger?: FastifyServerOptions['logger'];
  corsOrigin?: string;
  rateLimitMax?: number;
}

export function buildApp(opts: BuildAppOptions): FastifyInstance {
  const app = Fastify({
    logger: opts.logger ?? { level: 'info' },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const deps = opts.deps(app.log);

  // Register plugins
  app.register(helmet);
  app.register(cors, {
    origin: opts.corsOrigin ?? 'http://localhost:3000',
    credentials: true,
  });
  app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax });
  app.register(errorHandlerPluginFp);
  app.register(authPluginFp, { sessionDeps: deps.sessionDeps });
  app.register(auditLogPluginFp, { auditRepo: deps.requestAuditRepo });

  // Domain routes
  app.register(iamAuthRoutes, { deps: deps.auth });
  app.register(linkRoutes, { deps: deps.link });
  app.register(shadowRoutes, { deps: deps.shadow });
  app.register(recordsRoutes, { deps: deps.records });
  app.register(careRoutes, { deps: deps.care });

  // Health check
  app.get('/health', { config: { auditLog: false } }, async () => ({ status: 'ok' }));

  return app;
}

// ---------------------------------------------------------------------------
// Start server when run directly
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const env = getEnv();
  const database = createDatabase(env.DATABASE_URL);

  const app = buildApp({
    deps: (logger) => createAppDeps(database.db, logger),
    logger: { level: env.LOG_LEVEL },
    corsOrigin: env.CORS_ORIGIN,
    rateLimitMax: env.RATE_LIMIT_MAX,
  });
  app.addHook('onClose', async () => {
    await database.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await app.listen({ port: env.API_PORT, host: env.API_HOST });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
