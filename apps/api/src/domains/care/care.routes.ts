import { type FastifyInstance } from 'fastify';
import { patientIdParamSchema } from '@carelink/shared/schemas/records.schema.js';
import {
  acceptEmergencySchema,
  createPregnancyProfileSchema,
  emergencyIdParamSchema,
  raiseEmergencySchema,
  updatePregnancyProfileSchema,
} from '@carelink/shared/schemas/care.schema.js';
import { Capability } from '@carelink/shared/constants/iam.constants.js';
import { createCareHandlers, type CareHandlerDeps } from './care.handlers.js';

// ---------------------------------------------------------------------------
// Care Routes
// ---------------------------------------------------------------------------

export async function careRoutes(
  app: FastifyInstance,
  opts: { deps: CareHandlerDeps },
) {
  const handlers = createCareHandlers(opts.deps);

  const canRead = [app.authenticate, app.authorize(Capability.RECORD_READ)];
  const canWrite = [app.authenticate, app.authorize(Capability.RECORD_WRITE)];
  const canRespond = [app.authenticate, app.authorize(Capability.EMERGENCY_RESPOND)];

  // =========================================================================
  // Pregnancy Profiles
  // =========================================================================

  app.get('/api/v1/patients/:patientId/pregnancy-profile', {
    schema: { params: patientIdParamSchema },
    preHandler: canRead,
    handler: handlers.getPregnancyProfileHandler,
  });

  app.post('/api/v1/patients/:patientId/pregnancy-profile', {
    schema: { params: patientIdParamSchema, body: createPregnancyProfileSchema },
    preHandler: canWrite,
    handler: handlers.createPregnancyProfileHandler,
  });

  app.put('/api/v1/patients/:patientId/pregnancy-profile', {
    schema: { params: patientIdParamSchema, body: updatePregnancyProfileSchema },
    preHandler: canWrite,
    handler: handlers.updatePregnancyProfileHandler,
  });

  // =========================================================================
  // Emergency Requests
  // =========================================================================

  app.get('/api/v1/patients/:patientId/emergencies', {
    schema: { params: patientIdParamSchema },
    preHandler: canRead,
    handler: handlers.listEmergenciesHandler,
  });

  app.post('/api/v1/patients/:patientId/emergencies', {
    schema: { params: patientIdParamSchema, body: raiseEmergencySchema },
    preHandler: [app.authenticate, app.authorize(Capability.EMERGENCY_RAISE)],
    handler: handlers.raiseEmergencyHandler,
  });

  app.get('/api/v1/emergencies/pending', {
    preHandler: canRespond,
    handler: handlers.listPendingEmergenciesHandler,
  });

  app.post('/api/v1/emergencies/:id/accept', {
    schema: { params: emergencyIdParamSchema, body: acceptEmergencySchema },
    preHandler: canRespond,
    handler: handlers.acceptEmergencyHandler,
  });

  app.post('/api/v1/emergencies/:id/resolve', {
    schema: { params: emergencyIdParamSchema },
    preHandler: canWrite,
    handler: handlers.resolveEmergencyHandler,
  });
}
