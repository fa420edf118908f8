import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AuditAction, AuditStatus, Role } from '@carelink/shared/constants/iam.constants.js';
import { ClaimStatus } from '@carelink/shared/constants/link.constants.js';
import { createShadowRepository } from './shadow.repository.js';
import { claimShareCode, type ShadowServiceDeps } from './shadow.service.js';
import {
  createStore,
  createFakeShadowRepo,
  createFakeAuditLogRepo,
  createFakeConsultationRepo,
  createFakeHealthLogRepo,
  createFakeMedicalHistoryRepo,
  createFakePregnancyProfileRepo,
  createFakeEmergencyRepo,
  seedUser,
  seedLink,
  type InMemoryStore,
} from '../../../test/fixtures/in-memory-store.js';

// ---------------------------------------------------------------------------
// Mock Drizzle DB: tables are plain arrays keyed by table name
// ---------------------------------------------------------------------------

let tables: Record<string, Record<string, any>[]>;
let lockRequests: Array<{ table: string; mode: string }>;
let failDeleteOn: string | null;

function projectRow(projection: Record<string, any> | undefined, row: Record<string, any>) {
  if (!projection) return { ...row };
  const out: Record<string, any> = {};
  for (const [key, column] of Object.entries(projection)) {
    out[key] = row[column.name];
  }
  return out;
}

function makeMockDb() {
  function chainable(ctx: {
    op: 'select' | 'update' | 'delete';
    table?: any;
    projection?: Record<string, any>;
    setClauses?: Record<string, any>;
    whereClauses: Array<(row: any) => boolean>;
    limitN?: number;
    returning?: boolean;
    returningProjection?: Record<string, any>;
  }) {
    const chain: any = {
      from(table: any) { ctx.table = table; return chain; },
      set(s: any) { ctx.setClauses = s; return chain; },
      where(clause: any) {
        if (clause?.__predicate) ctx.whereClauses.push(clause.__predicate);
        return chain;
      },
      limit(n: number) { ctx.limitN = n; return chain; },
      for(mode: string) {
        lockRequests.push({ table: ctx.table.__table, mode });
        return chain;
      },
      returning(projection?: Record<string, any>) {
        ctx.returning = true;
        ctx.returningProjection = projection;
        return chain;
      },
      then(resolve: any, reject?: any) {
        try {
          resolve(executeOp(ctx));
        } catch (e) {
          if (reject) reject(e); else throw e;
        }
      },
    };
    return chain;
  }

  function executeOp(ctx: any): any[] {
    const name: string = ctx.table.__table;
    const rows = tables[name];
    const matches = rows.filter((row) => ctx.whereClauses.every((pred: any) => pred(row)));

    switch (ctx.op) {
      case 'select': {
        const limited = ctx.limitN ? matches.slice(0, ctx.limitN) : matches;
        return limited.map((row) => projectRow(ctx.projection, row));
      }
      case 'update': {
        for (const row of matches) Object.assign(row, ctx.setClauses);
        return ctx.returning
          ? matches.map((row) => projectRow(ctx.returningProjection, row))
          : [];
      }
      case 'delete': {
        if (failDeleteOn === name) {
          throw new Error('simulated fault');
        }
        tables[name] = rows.filter((row) => !matches.includes(row));
        return [];
      }
      default:
        return [];
    }
  }

  const mockDb: any = {
    select(projection?: Record<string, any>) {
      return chainable({ op: 'select', projection, whereClauses: [] });
    },
    update(table: any) {
      return chainable({ op: 'update', table, whereClauses: [] });
    },
    delete(table: any) {
      return chainable({ op: 'delete', table, whereClauses: [] });
    },
    async transaction(fn: any) {
      const before = Object.fromEntries(
        Object.entries(tables).map(([name, rows]) => [name, rows.map((row) => ({ ...row }))]),
      );
      try {
        return await fn(mockDb);
      } catch (err) {
        tables = before;
        throw err;
      }
    },
  };

  return mockDb;
}

// ---------------------------------------------------------------------------
// Mock drizzle-orm operators and schema tables
// ---------------------------------------------------------------------------

vi.mock('drizzle-orm', () => {
  return {
    eq: (column: any, value: any) => ({
      __predicate: (row: any) => row[column?.name] === value,
    }),
    and: (...conditions: any[]) => ({
      __predicate: (row: any) =>
        conditions.every((c: any) => !c?.__predicate || c.__predicate(row)),
    }),
    inArray: (column: any, values: any[]) => ({
      __predicate: (row: any) => values.includes(row[column?.name]),
    }),
  };
});

const { makeTable } = vi.hoisted(() => ({
  makeTable(table: string, columns: string[]) {
    const result: Record<string, any> = { __table: table };
    for (const column of columns) result[column] = { name: column };
    return result;
  },
}));

vi.mock('@carelink/shared/schemas/db/iam.schema.js', () => ({
  users: makeTable('users', ['userId', 'email', 'passwordHash']),
}));

vi.mock('@carelink/shared/schemas/db/link.schema.js', () => ({
  doctorPatientLinks: makeTable('doctor_patient_links', [
    'linkId',
    'doctorId',
    'patientId',
    'shareCode',
  ]),
}));

vi.mock('@carelink/shared/schemas/db/records.schema.js', () => ({
  healthLogs: makeTable('health_logs', ['healthLogId', 'patientId']),
  medications: makeTable('medications', ['medicationId', 'patientId']),
  medicalReports: makeTable('medical_reports', ['reportId', 'patientId']),
  dietPlans: makeTable('diet_plans', ['dietPlanId', 'patientId']),
  medicalHistories: makeTable('medical_histories', ['medicalHistoryId', 'patientId']),
  consultations: makeTable('consultations', ['consultationId', 'patientId']),
}));

vi.mock('@carelink/shared/schemas/db/care.schema.js', () => ({
  pregnancyProfiles: makeTable('pregnancy_profiles', ['pregnancyProfileId', 'patientId']),
  emergencyRequests: makeTable('emergency_requests', ['emergencyId', 'patientId']),
}));

// ---------------------------------------------------------------------------
// Shadow Repository: claimShareCode
// ---------------------------------------------------------------------------

const DOCTOR = 'doctor-1';
const SHADOW = 'shadow-1';
const REAL = 'real-1';

function seedTables() {
  tables = {
    users: [
      { userId: DOCTOR, email: 'smith@example.test', passwordHash: 'argon2id$placeholder' },
      { userId: SHADOW, email: null, passwordHash: null },
      { userId: REAL, email: 'jane@example.test', passwordHash: 'argon2id$placeholder' },
    ],
    doctor_patient_links: [
      { linkId: 'link-1', doctorId: DOCTOR, patientId: SHADOW, shareCode: 'SHC001' },
    ],
    health_logs: [
      { healthLogId: 'hl-1', patientId: SHADOW },
      { healthLogId: 'hl-2', patientId: SHADOW },
      { healthLogId: 'hl-3', patientId: REAL },
    ],
    medications: [{ medicationId: 'med-1', patientId: SHADOW }],
    medical_reports: [],
    diet_plans: [],
    medical_histories: [
      {
        medicalHistoryId: 'mh-shadow',
        patientId: SHADOW,
        allergies: 'Penicillin',
        chronicConditions: null,
        surgeries: null,
        currentMedications: null,
        consultingSummary: 'Flu',
      },
      {
        medicalHistoryId: 'mh-real',
        patientId: REAL,
        allergies: null,
        chronicConditions: 'Asthma',
        surgeries: null,
        currentMedications: null,
        consultingSummary: null,
      },
    ],
    consultations: [{ consultationId: 'c-1', patientId: SHADOW }],
    pregnancy_profiles: [{ pregnancyProfileId: 'pp-shadow', patientId: SHADOW }],
    emergency_requests: [{ emergencyId: 'em-1', patientId: SHADOW }],
  };
}

describe('Shadow Repository — claimShareCode', () => {
  let repo: ReturnType<typeof createShadowRepository>;

  beforeEach(() => {
    seedTables();
    lockRequests = [];
    failDeleteOn = null;
    repo = createShadowRepository(makeMockDb());
  });

  it('moves every owned record, repoints the link and deletes the shadow', async () => {
    const result = await repo.claimShareCode('SHC001', REAL);

    expect(result).toMatchObject({
      outcome: 'migrated',
      shadowUserId: SHADOW,
      moved: {
        health_logs: 2,
        medications: 1,
        reports: 0,
        diet_plans: 0,
        medical_history: 1,
        consultations: 1,
        pregnancy_profile: 1,
        emergency_requests: 1,
      },
    });
    expect(tables.health_logs.every((r) => r.patientId === REAL)).toBe(true);
    expect(tables.medications[0].patientId).toBe(REAL);
    expect(tables.consultations[0].patientId).toBe(REAL);
    expect(tables.emergency_requests[0].patientId).toBe(REAL);
    expect(tables.pregnancy_profiles[0].patientId).toBe(REAL);
    expect(tables.doctor_patient_links[0]).toMatchObject({ patientId: REAL, shareCode: null });
    expect(tables.users.map((u) => u.userId)).toEqual([DOCTOR, REAL]);
  });

  it('locks the link row for update', async () => {
    await repo.claimShareCode('SHC001', REAL);
    expect(lockRequests).toEqual([{ table: 'doctor_patient_links', mode: 'update' }]);
  });

  it('fills empty medical history fields of the target from the shadow', async () => {
    await repo.claimShareCode('SHC001', REAL);

    expect(tables.medical_histories).toHaveLength(1);
    expect(tables.medical_histories[0]).toMatchObject({
      medicalHistoryId: 'mh-real',
      allergies: 'Penicillin',
      chronicConditions: 'Asthma',
      consultingSummary: 'Flu',
    });
  });

  it('treats a blank target field as empty', async () => {
    tables.medical_histories[1].allergies = '  ';
    tables.medical_histories[1].consultingSummary = '';

    await repo.claimShareCode('SHC001', REAL);

    expect(tables.medical_histories[0]).toMatchObject({
      medicalHistoryId: 'mh-real',
      allergies: 'Penicillin',
      consultingSummary: 'Flu',
    });
  });

  it('keeps the claimer pregnancy profile and drops the shadow one', async () => {
    tables.pregnancy_profiles.push({ pregnancyProfileId: 'pp-real', patientId: REAL });

    const result = await repo.claimShareCode('SHC001', REAL);

    expect(result).toMatchObject({ moved: { pregnancy_profile: 0 } });
    expect(tables.pregnancy_profiles).toEqual([{ pregnancyProfileId: 'pp-real', patientId: REAL }]);
  });

  it('moves the shadow medical history when the target has none', async () => {
    tables.medical_histories = tables.medical_histories.filter((h) => h.patientId === SHADOW);

    await repo.claimShareCode('SHC001', REAL);

    expect(tables.medical_histories).toHaveLength(1);
    expect(tables.medical_histories[0]).toMatchObject({
      medicalHistoryId: 'mh-shadow',
      patientId: REAL,
    });
  });

  it('is single-use: the spent code no longer resolves', async () => {
    await repo.claimShareCode('SHC001', REAL);
    expect(await repo.claimShareCode('SHC001', REAL)).toEqual({ outcome: 'invalid_code' });
  });

  it('reports an unknown code', async () => {
    expect(await repo.claimShareCode('NOPE01', REAL)).toEqual({ outcome: 'invalid_code' });
  });

  it('reports a self-claim without changing anything', async () => {
    tables.doctor_patient_links[0].patientId = REAL;

    const result = await repo.claimShareCode('SHC001', REAL);

    expect(result.outcome).toBe('self_claim');
    expect(tables.doctor_patient_links[0].shareCode).toBe('SHC001');
    expect(tables.users).toHaveLength(3);
  });

  it('refuses a code whose link no longer points at a shadow', async () => {
    tables.users[1].email = 'shadow@example.test';

    expect(await repo.claimShareCode('SHC001', REAL)).toEqual({ outcome: 'already_migrated' });
    expect(tables.health_logs.filter((r) => r.patientId === SHADOW)).toHaveLength(2);
  });

  it('refuses when the doctor already has a link to the claimer', async () => {
    tables.doctor_patient_links.push({
      linkId: 'link-2',
      doctorId: DOCTOR,
      patientId: REAL,
      shareCode: null,
    });

    expect(await repo.claimShareCode('SHC001', REAL)).toEqual({
      outcome: 'doctor_already_linked',
      doctorId: DOCTOR,
    });
    expect(tables.doctor_patient_links[0].patientId).toBe(SHADOW);
  });

  it('rolls back every change when a step fails', async () => {
    failDeleteOn = 'users';

    await expect(repo.claimShareCode('SHC001', REAL)).rejects.toThrow('simulated fault');

    expect(tables.health_logs.filter((r) => r.patientId === SHADOW)).toHaveLength(2);
    expect(tables.medications[0].patientId).toBe(SHADOW);
    expect(tables.consultations[0].patientId).toBe(SHADOW);
    expect(tables.medical_histories).toHaveLength(2);
    expect(tables.doctor_patient_links[0]).toMatchObject({
      patientId: SHADOW,
      shareCode: 'SHC001',
    });
    expect(tables.users).toHaveLength(3);
  });
});

// ---------------------------------------------------------------------------
// Shadow Service: claimShareCode
// ---------------------------------------------------------------------------

describe('Shadow Service — claimShareCode', () => {
  let store: InMemoryStore;
  let deps: ShadowServiceDeps;
  let doctorId: string;
  let shadowId: string;
  let realId: string;

  beforeEach(async () => {
    store = createStore();
    deps = { shadowRepo: createFakeShadowRepo(store), auditRepo: createFakeAuditLogRepo(store) };
    doctorId = seedUser(store, { name: 'Dr Smith', role: Role.DOCTOR }).userId;
    shadowId = seedUser(store, {
      name: 'Jane',
      role: Role.PATIENT,
      email: null,
      passwordHash: null,
    }).userId;
    realId = seedUser(store, { name: 'Jane', role: Role.PATIENT, email: 'jane@example.test' }).userId;
    seedLink(store, doctorId, shadowId, 'SHC001');
    await createFakeConsultationRepo(store).create({
      patientId: shadowId,
      doctorId,
      diagnosis: 'Flu',
    });
  });

  it('migrates the shadow records to the claimer', async () => {
    const result = await claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'shc001');

    expect(result).toEqual({
      status: ClaimStatus.MIGRATED,
      linkId: store.links[0].linkId,
      doctorId,
      moved: {
        health_logs: 0,
        medications: 0,
        reports: 0,
        diet_plans: 0,
        medical_history: 0,
        consultations: 1,
        pregnancy_profile: 0,
        emergency_requests: 0,
      },
    });
    expect(store.consultations[0]).toMatchObject({ patientId: realId, diagnosis: 'Flu' });
    expect(store.links[0]).toMatchObject({ patientId: realId, shareCode: null });
    expect(store.users.some((u) => u.userId === shadowId)).toBe(false);

    const audit = store.auditLog.at(-1);
    expect(audit?.action).toBe(AuditAction.SHARE_CODE_CLAIMED);
    expect(audit?.detail).toMatchObject({ shadowUserId: shadowId, doctorId });
  });

  it('moves every category in one claim', async () => {
    await createFakeHealthLogRepo(store).create({ patientId: shadowId, title: 'health_check' });
    await createFakeMedicalHistoryRepo(store).upsert(shadowId, { allergies: 'Penicillin' });

    const result = await claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001');

    expect(result).toMatchObject({
      moved: { health_logs: 1, medical_history: 1, consultations: 1 },
    });
    expect(store.healthLogs[0].patientId).toBe(realId);
    expect(store.medicalHistories[0]).toMatchObject({ patientId: realId, allergies: 'Penicillin' });
  });

  it('moves the pregnancy profile and emergency requests with the records', async () => {
    await createFakePregnancyProfileRepo(store).create({
      patientId: shadowId,
      lmpDate: '2026-01-10',
      dueDate: '2026-10-17',
    });
    await createFakeEmergencyRepo(store).create({ patientId: shadowId, message: 'Severe pain' });

    const result = await claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001');

    expect(result).toMatchObject({ moved: { pregnancy_profile: 1, emergency_requests: 1 } });
    expect(store.pregnancyProfiles[0]).toMatchObject({ patientId: realId, dueDate: '2026-10-17' });
    expect(store.emergencyRequests[0]).toMatchObject({ patientId: realId, message: 'Severe pain' });
  });

  it('fills blank fields of the claimer history from the shadow history', async () => {
    const histories = createFakeMedicalHistoryRepo(store);
    await histories.upsert(shadowId, { allergies: 'Penicillin', surgeries: 'Appendectomy' });
    await histories.upsert(realId, { allergies: '', surgeries: 'Tonsillectomy' });

    await claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001');

    expect(store.medicalHistories).toHaveLength(1);
    expect(store.medicalHistories[0]).toMatchObject({
      patientId: realId,
      allergies: 'Penicillin',
      surgeries: 'Tonsillectomy',
    });
  });

  it('rejects a second claim of the same code with InvalidCode', async () => {
    await claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001');

    await expect(
      claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001'),
    ).rejects.toMatchObject({ statusCode: 404, code: 'INVALID_CODE', message: 'Invalid share code' });

    const audit = store.auditLog.at(-1);
    expect(audit?.action).toBe(AuditAction.SHARE_CODE_CLAIM_FAILED);
    expect(audit?.status).toBe(AuditStatus.FAILED);
    expect(audit?.detail).toEqual({ reason: 'invalid_code' });
  });

  it('treats claiming a code already pointing at the claimer as a no-op', async () => {
    const own = seedLink(store, doctorId, realId, 'OWN00001');
    const before = store.auditLog.length;

    const result = await claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'OWN00001');

    expect(result).toEqual({ status: ClaimStatus.ALREADY_LINKED, linkId: own.linkId, doctorId });
    expect(store.auditLog).toHaveLength(before);
    expect(store.consultations[0].patientId).toBe(shadowId);
  });

  it('rejects when the doctor is already linked to the claimer', async () => {
    seedLink(store, doctorId, realId);

    await expect(
      claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001'),
    ).rejects.toMatchObject({ statusCode: 409, code: 'ALREADY_LINKED' });
    expect(store.consultations[0].patientId).toBe(shadowId);
  });

  it('rejects a code whose patient is no longer a shadow', async () => {
    const shadow = store.users.find((u) => u.userId === shadowId);
    if (shadow) shadow.email = 'jane.shadow@example.test';

    await expect(
      claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001'),
    ).rejects.toMatchObject({ statusCode: 409, code: 'ALREADY_MIGRATED' });
  });

  it('only patients may claim', async () => {
    await expect(
      claimShareCode(deps, { userId: doctorId, role: Role.DOCTOR }, 'SHC001'),
    ).rejects.toMatchObject({ statusCode: 403, code: 'NOT_AUTHORIZED' });
    expect(store.links[0].shareCode).toBe('SHC001');
  });

  it('leaves everything in place when the claim fails before commit', async () => {
    store.beforeClaimCommit = () => {
      throw new Error('simulated fault');
    };

    await expect(
      claimShareCode(deps, { userId: realId, role: Role.PATIENT }, 'SHC001'),
    ).rejects.toThrow('simulated fault');

    expect(store.consultations[0].patientId).toBe(shadowId);
    expect(store.links[0]).toMatchObject({ patientId: shadowId, shareCode: 'SHC001' });
    expect(store.users.some((u) => u.userId === shadowId)).toBe(true);
  });
});
