import { type FastifyInstance } from 'fastify';
import {
  patientIdParamSchema,
  recordIdParamSchema,
  medicationListQuerySchema,
  createHealthLogSchema,
  updateHealthLogSchema,
  createMedicationSchema,
  updateMedicationSchema,
  createReportSchema,
  updateReportSchema,
  createDietPlanSchema,
  updateDietPlanSchema,
  upsertMedicalHistorySchema,
  createConsultationSchema,
  updateConsultationSchema,
} from '@carelink/shared/schemas/records.schema.js';
import { Capability } from '@carelink/shared/constants/iam.constants.js';
import { MAX_REPORT_FILE_DATA_LENGTH } from '@carelink/shared/constants/records.constants.js';
import { createRecordsHandlers, type RecordsHandlerDeps } from './records.handlers.js';

// Base64 payload plus the rest of the JSON body.
const REPORT_BODY_LIMIT = MAX_REPORT_FILE_DATA_LENGTH + 64 * 1024;

// ---------------------------------------------------------------------------
// Clinical Records Routes
// ---------------------------------------------------------------------------

export async function recordsRoutes(
  app: FastifyInstance,
  opts: { deps: RecordsHandlerDeps },
) {
  const handlers = createRecordsHandlers(opts.deps);

  const canRead = [app.authenticate, app.authorize(Capability.RECORD_READ)];
  const canWrite = [app.authenticate, app.authorize(Capability.RECORD_WRITE)];

  // =========================================================================
  // Health Logs
  // =========================================================================

  app.get('/api/v1/patients/:patientId/health-logs', {
    schema: { params: patientIdParamSchema },
    preHandler: canRead,
    handler: handlers.listHealthLogsHandler,
  });

  app.post('/api/v1/patients/:patientId/health-logs', {
    schema: { params: patientIdParamSchema, body: createHealthLogSchema },
    preHandler: canWrite,
    handler: handlers.createHealthLogHandler,
  });

  app.put('/api/v1/health-logs/:id', {
    schema: { params: recordIdParamSchema, body: updateHealthLogSchema },
    preHandler: canWrite,
    handler: handlers.updateHealthLogHandler,
  });

  app.delete('/api/v1/health-logs/:id', {
    schema: { params: recordIdParamSchema },
    preHandler: canWrite,
    handler: handlers.deleteHealthLogHandler,
  });

  // =========================================================================
  // Medications
  // =========================================================================

  app.get('/api/v1/patients/:patientId/medications', {
    schema: { params: patientIdParamSchema, querystring: medicationListQuerySchema },
    preHandler: canRead,
    handler: handlers.listMedicationsHandler,
  });

  app.post('/api/v1/patients/:patientId/medications', {
    schema: { params: patientIdParamSchema, body: createMedicationSchema },
    preHandler: canWrite,
    handler: handlers.createMedicationHandler,
  });

  app.put('/api/v1/medications/:id', {
    schema: { params: recordIdParamSchema, body: updateMedicationSchema },
    preHandler: canWrite,
    handler: handlers.updateMedicationHandler,
  });

  app.post('/api/v1/medications/:id/deactivate', {
    schema: { params: recordIdParamSchema },
    preHandler: canWrite,
    handler: handlers.deactivateMedicationHandler,
  });

  app.delete('/api/v1/medications/:id', {
    schema: { params: recordIdParamSchema },
    preHandler: canWrite,
    handler: handlers.deleteMedicationHandler,
  });

  // =========================================================================
  // Reports
  // =========================================================================

  app.get('/api/v1/patients/:patientId/reports', {
    schema: { params: patientIdParamSchema },
    preHandler: canRead,
    handler: handlers.listReportsHandler,
  });

  app.post('/api/v1/patients/:patientId/reports', {
    schema: { params: patientIdParamSchema, body: createReportSchema },
    bodyLimit: REPORT_BODY_LIMIT,
    preHandler: canWrite,
    handler: handlers.createReportHandler,
  });

  app.get('/api/v1/reports/:id', {
    schema: { params: recordIdParamSchema },
    preHandler: canRead,
    handler: handlers.getReportHandler,
  });

  app.put('/api/v1/reports/:id', {
    schema: { params: recordIdParamSchema, body: updateReportSchema },
    preHandler: canWrite,
    handler: handlers.updateReportHandler,
  });

  app.delete('/api/v1/reports/:id', {
    schema: { params: recordIdParamSchema },
    preHandler: canWrite,
    handler: handlers.deleteReportHandler,
  });

  // =========================================================================
  // Diet Plans
  // =========================================================================

  app.get('/api/v1/patients/:patientId/diet-plans', {
    schema: { params: patientIdParamSchema },
    preHandler: canRead,
    handler: handlers.listDietPlansHandler,
  });

  app.post('/api/v1/patients/:patientId/diet-plans', {
    schema: { params: patientIdParamSchema, body: createDietPlanSchema },
    preHandler: canWrite,
    handler: handlers.createDietPlanHandler,
  });

  app.put('/api/v1/diet-plans/:id', {
    schema: { params: recordIdParamSchema, body: updateDietPlanSchema },
    preHandler: canWrite,
    handler: handlers.updateDietPlanHandler,
  });

  app.delete('/api/v1/diet-plans/:id', {
    schema: { params: recordIdParamSchema },
    preHandler: canWrite,
    handler: handlers.deleteDietPlanHandler,
  });

  // =========================================================================
  // Medical History
  // =========================================================================

  app.get('/api/v1/patients/:patientId/medical-history', {
    schema: { params: patientIdParamSchema },
    preHandler: canRead,
    handler: handlers.getMedicalHistoryHandler,
  });

  app.put('/api/v1/patients/:patientId/medical-history', {
    schema: { params: patientIdParamSchema, body: upsertMedicalHistorySchema },
    preHandler: canWrite,
    handler: handlers.upsertMedicalHistoryHandler,
  });

  // =========================================================================
  // Consultations
  // =========================================================================

  app.get('/api/v1/patients/:patientId/consultations', {
    schema: { params: patientIdParamSchema },
    preHandler: canRead,
    handler: handlers.listConsultationsHandler,
  });

  app.post('/api/v1/patients/:patientId/consultations', {
    schema: { params: patientIdParamSchema, body: createConsultationSchema },
    preHandler: [
      app.authenticate,
      app.authorize(Capability.RECORD_WRITE, Capability.CONSULTATION_WRITE),
    ],
    handler: handlers.createConsultationHandler,
  });

  app.put('/api/v1/consultations/:id', {
    schema: { params: recordIdParamSchema, body: updateConsultationSchema },
    preHandler: [
      app.authenticate,
      app.authorize(Capability.RECORD_WRITE, Capability.CONSULTATION_WRITE),
    ],
    handler: handlers.updateConsultationHandler,
  });

  app.delete('/api/v1/consultations/:id', {
    schema: { params: recordIdParamSchema },
    preHandler: [
      app.authenticate,
      app.authorize(Capability.RECORD_WRITE, Capability.CONSULTATION_WRITE),
    ],
    handler: handlers.deleteConsultationHandler,
  });

  app.post('/api/v1/consultations/:id/pay', {
    schema: { params: recordIdParamSchema },
    preHandler: canWrite,
    handler: handlers.payConsultationHandler,
  });
}
