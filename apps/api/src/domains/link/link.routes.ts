import { type FastifyInstance } from 'fastify';
import {
  registerPatientSchema,
  redeemInviteSchema,
  setPermissionsSchema,
  doctorIdParamSchema,
} from '@carelink/shared/schemas/link.schema.js';
import { Capability } from '@carelink/shared/constants/iam.constants.js';
import { createLinkHandlers, type LinkHandlerDeps } from './link.handlers.js';

// ---------------------------------------------------------------------------
// Link Routes
// ---------------------------------------------------------------------------

export async function linkRoutes(
  app: FastifyInstance,
  opts: { deps: LinkHandlerDeps },
) {
  const handlers = createLinkHandlers(opts.deps);

  // =========================================================================
  // Doctor side
  // =========================================================================

  app.post('/api/v1/links/patients', {
    schema: { body: registerPatientSchema },
    preHandler: [app.authenticate, app.authorize(Capability.PATIENT_REGISTER)],
    handler: handlers.registerPatientHandler,
  });

  app.get('/api/v1/links/patients', {
    preHandler: [app.authenticate, app.authorize(Capability.PATIENT_LIST)],
    handler: handlers.listPatientsHandler,
  });

  // =========================================================================
  // Patient side
  // =========================================================================

  app.post('/api/v1/links/invite', {
    schema: { body: redeemInviteSchema },
    preHandler: [app.authenticate, app.authorize(Capability.LINK_REDEEM_INVITE)],
    handler: handlers.redeemInviteHandler,
  });

  app.get('/api/v1/links/doctors', {
    preHandler: [app.authenticate, app.authorize(Capability.DOCTOR_LIST)],
    handler: handlers.listDoctorsHandler,
  });

  app.put('/api/v1/links/:doctorId/permissions', {
    schema: { params: doctorIdParamSchema, body: setPermissionsSchema },
    preHandler: [app.authenticate, app.authorize(Capability.LINK_MANAGE_PERMISSIONS)],
    handler: handlers.setPermissionsHandler,
  });
}
