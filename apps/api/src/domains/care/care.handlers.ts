import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type PatientIdParam } from '@carelink/shared/schemas/records.schema.js';
import {
  type AcceptEmergency,
  type CreatePregnancyProfile,
  type EmergencyIdParam,
  type RaiseEmergency,
  type UpdatePregnancyProfile,
} from '@carelink/shared/schemas/care.schema.js';
import {
  createPregnancyProfile,
  getPregnancyProfile,
  updatePregnancyProfile,
  raiseEmergency,
  listEmergencies,
  listPendingEmergencies,
  acceptEmergency,
  resolveEmergency,
  type CareServiceDeps,
} from './care.service.js';

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export interface CareHandlerDeps {
  serviceDeps: CareServiceDeps;
}

type OwnerRequest<Body = unknown> = FastifyRequest<{ Params: PatientIdParam; Body: Body }>;
type EmergencyRequest<Body = unknown> = FastifyRequest<{ Params: EmergencyIdParam; Body: Body }>;

export function createCareHandlers(deps: CareHandlerDeps) {
  const { serviceDeps } = deps;

  // =========================================================================
  // Pregnancy Profiles
  // =========================================================================

  async function createPregnancyProfileHandler(
    request: OwnerRequest<CreatePregnancyProfile>,
    reply: FastifyReply,
  ) {
    const profile = await createPregnancyProfile(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(201).send({ data: profile });
  }

  async function getPregnancyProfileHandler(request: OwnerRequest, reply: FastifyReply) {
    const profile = await getPregnancyProfile(
      serviceDeps,
      request.authContext,
      request.params.patientId,
    );
    return reply.code(200).send({ data: profile });
  }

  async function updatePregnancyProfileHandler(
    request: OwnerRequest<UpdatePregnancyProfile>,
    reply: FastifyReply,
  ) {
    const profile = await updatePregnancyProfile(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(200).send({ data: profile });
  }

  // =========================================================================
  // Emergency Requests
  // =========================================================================

  async function raiseEmergencyHandler(
    request: OwnerRequest<RaiseEmergency>,
    reply: FastifyReply,
  ) {
    const emergency = await raiseEmergency(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(201).send({ data: emergency });
  }

  async function listEmergenciesHandler(request: OwnerRequest, reply: FastifyReply) {
    const emergencies = await listEmergencies(
      serviceDeps,
      request.authContext,
      request.params.patientId,
    );
    return reply.code(200).send({ data: emergencies });
  }

  async function listPendingEmergenciesHandler(request: FastifyRequest, reply: FastifyReply) {
    const emergencies = await listPendingEmergencies(serviceDeps, request.authContext);
    return reply.code(200).send({ data: emergencies });
  }

  async function acceptEmergencyHandler(
    request: EmergencyRequest<AcceptEmergency>,
    reply: FastifyReply,
  ) {
    const emergency = await acceptEmergency(
      serviceDeps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: emergency });
  }

  async function resolveEmergencyHandler(request: EmergencyRequest, reply: FastifyReply) {
    const emergency = await resolveEmergency(serviceDeps, request.authContext, request.params.id);
    return reply.code(200).send({ data: emergency });
  }

  return {
    createPregnancyProfileHandler,
    getPregnancyProfileHandler,
    updatePregnancyProfileHandler,
    raiseEmergencyHandler,
    listEmergenciesHandler,
    listPendingEmergenciesHandler,
    acceptEmergencyHandler,
    resolveEmergencyHandler,
  };
}
