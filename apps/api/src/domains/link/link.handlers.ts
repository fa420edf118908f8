import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type RegisterPatient,
  type RedeemInvite,
  type SetPermissions,
  type DoctorIdParam,
} from '@carelink/shared/schemas/link.schema.js';
import {
  registerPatientForDoctor,
  createLinkViaInvite,
  setPermissionsForDoctor,
  listDoctorsForPatient,
  listPatientsForDoctor,
  type LinkServiceDeps,
} from './link.service.js';

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export interface LinkHandlerDeps {
  serviceDeps: LinkServiceDeps;
}

export function createLinkHandlers(deps: LinkHandlerDeps) {
  const { serviceDeps } = deps;

  // -------------------------------------------------------------------------
  // POST /api/v1/links/patients: doctor registers a standard or shadow patient
  // -------------------------------------------------------------------------

  async function registerPatientHandler(
    request: FastifyRequest<{ Body: RegisterPatient }>,
    reply: FastifyReply,
  ) {
    const result = await registerPatientForDoctor(
      serviceDeps,
      request.authContext.userId,
      request.body,
    );
    return reply.code(201).send({ data: result });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/links/patients
  // -------------------------------------------------------------------------

  async function listPatientsHandler(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const result = await listPatientsForDoctor(
      serviceDeps,
      request.authContext.userId,
    );
    return reply.code(200).send({ data: result });
  }

  // -------------------------------------------------------------------------
  // POST /api/v1/links/invite: patient redeems a doctor's invite code
  // -------------------------------------------------------------------------

  async function redeemInviteHandler(
    request: FastifyRequest<{ Body: RedeemInvite }>,
    reply: FastifyReply,
  ) {
    const link = await createLinkViaInvite(
      serviceDeps,
      request.authContext.userId,
      request.body.invite_code,
    );
    return reply.code(201).send({
      data: { linkId: link.linkId, doctorId: link.doctorId },
    });
  }

  // -------------------------------------------------------------------------
  // GET /api/v1/links/doctors
  // -------------------------------------------------------------------------

  async function listDoctorsHandler(
    request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const result = await listDoctorsForPatient(
      serviceDeps,
      request.authContext.userId,
    );
    return reply.code(200).send({ data: result });
  }

  // -------------------------------------------------------------------------
  // PUT /api/v1/links/:doctorId/permissions
  // -------------------------------------------------------------------------

  async function setPermissionsHandler(
    request: FastifyRequest<{ Params: DoctorIdParam; Body: SetPermissions }>,
    reply: FastifyReply,
  ) {
    const result = await setPermissionsForDoctor(
      serviceDeps,
      request.authContext,
      request.params.doctorId,
      request.body,
    );
    return reply.code(200).send({ data: result });
  }

  return {
    registerPatientHandler,
    listPatientsHandler,
    redeemInviteHandler,
    listDoctorsHandler,
    setPermissionsHandler,
  };
}
