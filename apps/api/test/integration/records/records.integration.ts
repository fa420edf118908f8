import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { type FastifyInstance } from 'fastify';
import { Role } from '@carelink/shared/constants/iam.constants.js';
import {
  createStore,
  seedUser,
  seedLink,
  type InMemoryStore,
  type SeededUser,
} from '../../fixtures/in-memory-store.js';
import { buildTestApp, bearer } from '../../fixtures/test-app.js';

let store: InMemoryStore;
let app: FastifyInstance;
let doctor: SeededUser;
let patient: SeededUser;

beforeEach(async () => {
  store = createStore();
  doctor = seedUser(store, { name: 'Dr Smith', role: Role.DOCTOR });
  patient = seedUser(store, { name: 'Jane', role: Role.PATIENT });
  seedLink(store, doctor.userId, patient.userId);
  app = await buildTestApp(store);
});

afterEach(async () => {
  await app.close();
});

describe('Health logs over HTTP', () => {
  it('creates, updates, lists and deletes', async () => {
    const created = await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/health-logs`,
      headers: bearer(patient.token),
      payload: { pain_level: 4, mood: 'tired' },
    });
    expect(created.statusCode).toBe(201);
    const log = created.json().data;
    expect(log).toMatchObject({ title: 'health_check', painLevel: 4, recordedBy: patient.userId });

    const updated = await app.inject({
      method: 'PUT',
      url: `/api/v1/health-logs/${log.healthLogId}`,
      headers: bearer(doctor.token),
      payload: { pain_level: 2 },
    });
    expect(updated.statusCode).toBe(200);
    expect(updated.json().data.painLevel).toBe(2);

    const listed = await app.inject({
      method: 'GET',
      url: `/api/v1/patients/${patient.userId}/health-logs`,
      headers: bearer(doctor.token),
    });
    expect(listed.json().data.map((l: { healthLogId: string }) => l.healthLogId)).toEqual([log.healthLogId]);

    const deleted = await app.inject({
      method: 'DELETE',
      url: `/api/v1/health-logs/${log.healthLogId}`,
      headers: bearer(patient.token),
    });
    expect(deleted.statusCode).toBe(204);
    expect(deleted.body).toBe('');
    expect(store.healthLogs).toHaveLength(0);
  });
});

describe('Medications over HTTP', () => {
  it('filters deactivated medications unless include_inactive=true', async () => {
    const iron = await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/medications`,
      headers: bearer(doctor.token),
      payload: { name: 'Iron', times: ['08:00', '20:00'] },
    });
    await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/medications`,
      headers: bearer(doctor.token),
      payload: { name: 'Folic acid' },
    });

    const deactivated = await app.inject({
      method: 'POST',
      url: `/api/v1/medications/${iron.json().data.medicationId}/deactivate`,
      headers: bearer(patient.token),
    });
    expect(deactivated.statusCode).toBe(200);
    expect(deactivated.json().data.active).toBe(false);

    const active = await app.inject({
      method: 'GET',
      url: `/api/v1/patients/${patient.userId}/medications`,
      headers: bearer(doctor.token),
    });
    expect(active.json().data.map((m: { name: string }) => m.name)).toEqual(['Folic acid']);

    const all = await app.inject({
      method: 'GET',
      url: `/api/v1/patients/${patient.userId}/medications?include_inactive=true`,
      headers: bearer(doctor.token),
    });
    expect(all.json().data).toHaveLength(2);
  });
});

describe('Reports over HTTP', () => {
  it('lists summaries and serves the file on the single-report route', async () => {
    const created = await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/reports`,
      headers: bearer(patient.token),
      payload: { title: 'Blood panel', report_type: 'blood_test', file_name: 'panel.pdf', file_data: 'aGVsbG8=' },
    });
    expect(created.statusCode).toBe(201);
    const reportId = created.json().data.reportId;
    expect(created.json().data).not.toHaveProperty('fileData');

    const listed = await app.inject({
      method: 'GET',
      url: `/api/v1/patients/${patient.userId}/reports`,
      headers: bearer(doctor.token),
    });
    expect(listed.json().data[0]).not.toHaveProperty('fileData');

    const single = await app.inject({
      method: 'GET',
      url: `/api/v1/reports/${reportId}`,
      headers: bearer(doctor.token),
    });
    expect(single.statusCode).toBe(200);
    expect(single.json().data.fileData).toBe('aGVsbG8=');
  });

  it('rejects a payload that is not base64', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/reports`,
      headers: bearer(patient.token),
      payload: { title: 'Scan', file_data: 'not base64!' },
    });

    expect(res.statusCode).toBe(400);
    expect(store.reports).toHaveLength(0);
  });
});

describe('Diet plans and medical history over HTTP', () => {
  it('creates a diet plan', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/diet-plans`,
      headers: bearer(doctor.token),
      payload: { meal_type: 'lunch', food_items: 'Lentil soup', calories: 450 },
    });

    expect(res.statusCode).toBe(201);
    expect(res.json().data).toMatchObject({ mealType: 'lunch', createdBy: doctor.userId });
  });

  it('returns null history until it is written', async () => {
    const empty = await app.inject({
      method: 'GET',
      url: `/api/v1/patients/${patient.userId}/medical-history`,
      headers: bearer(doctor.token),
    });
    expect(empty.json()).toEqual({ data: null });

    const written = await app.inject({
      method: 'PUT',
      url: `/api/v1/patients/${patient.userId}/medical-history`,
      headers: bearer(patient.token),
      payload: { allergies: 'Penicillin' },
    });
    expect(written.statusCode).toBe(200);
    expect(written.json().data.allergies).toBe('Penicillin');
  });
});

describe('Consultations over HTTP', () => {
  async function createBilled() {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/consultations`,
      headers: bearer(doctor.token),
      payload: {
        diagnosis: 'Anaemia',
        billing_items: [{ description: 'Visit', amount: 40 }, { description: 'Lab', amount: 12.25 }],
      },
    });
    expect(res.statusCode).toBe(201);
    return res.json().data;
  }

  it('bills, then lets the patient pay', async () => {
    const consultation = await createBilled();
    expect(consultation).toMatchObject({ totalAmount: '52.25', paymentStatus: 'pending' });

    const paid = await app.inject({
      method: 'POST',
      url: `/api/v1/consultations/${consultation.consultationId}/pay`,
      headers: bearer(patient.token),
    });

    expect(paid.statusCode).toBe(200);
    expect(paid.json().data.paymentStatus).toBe('paid');
  });

  it('keeps patients out of the consultation write routes', async () => {
    const res = await app.inject({
      method: 'POST',
      url: `/api/v1/patients/${patient.userId}/consultations`,
      headers: bearer(patient.token),
      payload: { diagnosis: 'Self-diagnosed' },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json().error.code).toBe('FORBIDDEN');
  });

  it('lets the authoring doctor delete', async () => {
    const consultation = await createBilled();

    const res = await app.inject({
      method: 'DELETE',
      url: `/api/v1/consultations/${consultation.consultationId}`,
      headers: bearer(doctor.token),
    });

    expect(res.statusCode).toBe(204);
    expect(store.consultations).toHaveLength(0);
  });
});
