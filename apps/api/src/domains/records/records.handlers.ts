import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type PatientIdParam,
  type RecordIdParam,
  type MedicationListQuery,
  type CreateHealthLog,
  type UpdateHealthLog,
  type CreateMedication,
  type UpdateMedication,
  type CreateReport,
  type UpdateReport,
  type CreateDietPlan,
  type UpdateDietPlan,
  type UpsertMedicalHistory,
  type CreateConsultation,
  type UpdateConsultation,
} from '@carelink/shared/schemas/records.schema.js';
import {
  createHealthLog,
  listHealthLogs,
  updateHealthLog,
  deleteHealthLog,
  createMedication,
  listMedications,
  updateMedication,
  deactivateMedication,
  deleteMedication,
  createReport,
  listReports,
  getReport,
  updateReport,
  deleteReport,
  createDietPlan,
  listDietPlans,
  updateDietPlan,
  deleteDietPlan,
  getMedicalHistory,
  upsertMedicalHistory,
  createConsultation,
  listConsultations,
  updateConsultation,
  deleteConsultation,
  payConsultation,
  type RecordsServiceDeps,
} from './records.service.js';

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export interface RecordsHandlerDeps {
  serviceDeps: RecordsServiceDeps;
}

type OwnerRequest<Body = unknown> = FastifyRequest<{ Params: PatientIdParam; Body: Body }>;
type RecordRequest<Body = unknown> = FastifyRequest<{ Params: RecordIdParam; Body: Body }>;

export function createRecordsHandlers(deps: RecordsHandlerDeps) {
  const { serviceDeps } = deps;

  // =========================================================================
  // Health Logs
  // =========================================================================

  async function createHealthLogHandler(
    request: OwnerRequest<CreateHealthLog>,
    reply: FastifyReply,
  ) {
    const log = await createHealthLog(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(201).send({ data: log });
  }

  async function listHealthLogsHandler(request: OwnerRequest, reply: FastifyReply) {
    const logs = await listHealthLogs(serviceDeps, request.authContext, request.params.patientId);
    return reply.code(200).send({ data: logs });
  }

  async function updateHealthLogHandler(
    request: RecordRequest<UpdateHealthLog>,
    reply: FastifyReply,
  ) {
    const log = await updateHealthLog(
      serviceDeps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: log });
  }

  async function deleteHealthLogHandler(request: RecordRequest, reply: FastifyReply) {
    await deleteHealthLog(serviceDeps, request.authContext, request.params.id);
    return reply.code(204).send();
  }

  // =========================================================================
  // Medications
  // =========================================================================

  async function createMedicationHandler(
    request: OwnerRequest<CreateMedication>,
    reply: FastifyReply,
  ) {
    const medication = await createMedication(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(201).send({ data: medication });
  }

  async function listMedicationsHandler(
    request: FastifyRequest<{ Params: PatientIdParam; Querystring: MedicationListQuery }>,
    reply: FastifyReply,
  ) {
    const medications = await listMedications(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.query.include_inactive,
    );
    return reply.code(200).send({ data: medications });
  }

  async function updateMedicationHandler(
    request: RecordRequest<UpdateMedication>,
    reply: FastifyReply,
  ) {
    const medication = await updateMedication(
      serviceDeps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: medication });
  }

  async function deactivateMedicationHandler(request: RecordRequest, reply: FastifyReply) {
    const medication = await deactivateMedication(
      serviceDeps,
      request.authContext,
      request.params.id,
    );
    return reply.code(200).send({ data: medication });
  }

  async function deleteMedicationHandler(request: RecordRequest, reply: FastifyReply) {
    await deleteMedication(serviceDeps, request.authContext, request.params.id);
    return reply.code(204).send();
  }

  // =========================================================================
  // Reports
  // =========================================================================

  async function createReportHandler(
    request: OwnerRequest<CreateReport>,
    reply: FastifyReply,
  ) {
    const report = await createReport(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(201).send({ data: report });
  }

  async function listReportsHandler(request: OwnerRequest, reply: FastifyReply) {
    const reports = await listReports(serviceDeps, request.authContext, request.params.patientId);
    return reply.code(200).send({ data: reports });
  }

  async function getReportHandler(request: RecordRequest, reply: FastifyReply) {
    const report = await getReport(serviceDeps, request.authContext, request.params.id);
    return reply.code(200).send({ data: report });
  }

  async function updateReportHandler(
    request: RecordRequest<UpdateReport>,
    reply: FastifyReply,
  ) {
    const report = await updateReport(
      serviceDeps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: report });
  }

  async function deleteReportHandler(request: RecordRequest, reply: FastifyReply) {
    await deleteReport(serviceDeps, request.authContext, request.params.id);
    return reply.code(204).send();
  }

  // =========================================================================
  // Diet Plans
  // =========================================================================

  async function createDietPlanHandler(
    request: OwnerRequest<CreateDietPlan>,
    reply: FastifyReply,
  ) {
    const plan = await createDietPlan(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(201).send({ data: plan });
  }

  async function listDietPlansHandler(request: OwnerRequest, reply: FastifyReply) {
    const plans = await listDietPlans(serviceDeps, request.authContext, request.params.patientId);
    return reply.code(200).send({ data: plans });
  }

  async function updateDietPlanHandler(
    request: RecordRequest<UpdateDietPlan>,
    reply: FastifyReply,
  ) {
    const plan = await updateDietPlan(
      serviceDeps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: plan });
  }

  async function deleteDietPlanHandler(request: RecordRequest, reply: FastifyReply) {
    await deleteDietPlan(serviceDeps, request.authContext, request.params.id);
    return reply.code(204).send();
  }

  // =========================================================================
  // Medical History
  // =========================================================================

  async function getMedicalHistoryHandler(request: OwnerRequest, reply: FastifyReply) {
    const history = await getMedicalHistory(
      serviceDeps,
      request.authContext,
      request.params.patientId,
    );
    return reply.code(200).send({ data: history });
  }

  async function upsertMedicalHistoryHandler(
    request: OwnerRequest<UpsertMedicalHistory>,
    reply: FastifyReply,
  ) {
    const history = await upsertMedicalHistory(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(200).send({ data: history });
  }

  // =========================================================================
  // Consultations
  // =========================================================================

  async function createConsultationHandler(
    request: OwnerRequest<CreateConsultation>,
    reply: FastifyReply,
  ) {
    const consultation = await createConsultation(
      serviceDeps,
      request.authContext,
      request.params.patientId,
      request.body,
    );
    return reply.code(201).send({ data: consultation });
  }

  async function listConsultationsHandler(request: OwnerRequest, reply: FastifyReply) {
    const consultations = await listConsultations(
      serviceDeps,
      request.authContext,
      request.params.patientId,
    );
    return reply.code(200).send({ data: consultations });
  }

  async function updateConsultationHandler(
    request: RecordRequest<UpdateConsultation>,
    reply: FastifyReply,
  ) {
    const consultation = await updateConsultation(
      serviceDeps,
      request.authContext,
      request.params.id,
      request.body,
    );
    return reply.code(200).send({ data: consultation });
  }

  async function deleteConsultationHandler(request: RecordRequest, reply: FastifyReply) {
    await deleteConsultation(serviceDeps, request.authContext, request.params.id);
    return reply.code(204).send();
  }

  async function payConsultationHandler(request: RecordRequest, reply: FastifyReply) {
    const consultation = await payConsultation(
      serviceDeps,
      request.authContext,
      request.params.id,
    );
    return reply.code(200).send({ data: consultation });
  }

  return {
    createHealthLogHandler,
    listHealthLogsHandler,
    updateHealthLogHandler,
    deleteHealthLogHandler,
    createMedicationHandler,
    listMedicationsHandler,
    updateMedicationHandler,
    deactivateMedicationHandler,
    deleteMedicationHandler,
    createReportHandler,
    listReportsHandler,
    getReportHandler,
    updateReportHandler,
    deleteReportHandler,
    createDietPlanHandler,
    listDietPlansHandler,
    updateDietPlanHandler,
    deleteDietPlanHandler,
    getMedicalHistoryHandler,
    upsertMedicalHistoryHandler,
    createConsultationHandler,
    listConsultationsHandler,
    updateConsultationHandler,
    deleteConsultationHandler,
    payConsultationHandler,
  };
}
