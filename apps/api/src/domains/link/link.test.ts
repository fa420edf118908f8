import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AuditAction, Role } from '@carelink/shared/constants/iam.constants.js';
import { PatientRegistrationKind } from '@carelink/shared/constants/link.constants.js';
import {
  createLink,
  createLinkViaInvite,
  findLink,
  findByShareCode,
  setPermissions,
  setPermissionsForDoctor,
  registerPatientForDoctor,
  listDoctorsForPatient,
  listPatientsForDoctor,
  type LinkServiceDeps,
} from './link.service.js';
import {
  createStore,
  createFakeUserRepo,
  createFakeDoctorProfileRepo,
  createFakeAuditLogRepo,
  createFakeLinkRepo,
  seedUser,
  seedDoctorProfile,
  seedLink,
  type InMemoryStore,
} from '../../../test/fixtures/in-memory-store.js';

vi.mock('@node-rs/argon2', () => {
  return {
    hash: vi.fn(async (password: string) => `argon2id$${password}`),
    verify: vi.fn(async (hash: string, password: string) => hash === `argon2id$${password}`),
  };
});

let store: InMemoryStore;
let doctorId: string;
let patientId: string;

function makeDeps(overrides: Partial<LinkServiceDeps> = {}): LinkServiceDeps {
  return {
    linkRepo: createFakeLinkRepo(store),
    userRepo: createFakeUserRepo(store),
    doctorProfileRepo: createFakeDoctorProfileRepo(store),
    auditRepo: createFakeAuditLogRepo(store),
    ...overrides,
  };
}

beforeEach(() => {
  store = createStore();
  doctorId = seedUser(store, { name: 'Dr Smith', role: Role.DOCTOR }).userId;
  seedDoctorProfile(store, doctorId, 'AB12CD');
  patientId = seedUser(store, { name: 'Jane', role: Role.PATIENT, email: 'jane@example.test' }).userId;
});

// ---------------------------------------------------------------------------
// createLink
// ---------------------------------------------------------------------------

describe('Link Service — createLink', () => {
  it('creates a link with an empty permission map', async () => {
    const link = await createLink(makeDeps(), doctorId, patientId);

    expect(link.doctorId).toBe(doctorId);
    expect(link.patientId).toBe(patientId);
    expect(link.permissions).toEqual({});
    expect(link.shareCode).toBeNull();
  });

  it('rejects a second link for the same pair with AlreadyLinked', async () => {
    const deps = makeDeps();
    await createLink(deps, doctorId, patientId);

    await expect(createLink(deps, doctorId, patientId)).rejects.toMatchObject({
      statusCode: 409,
      code: 'ALREADY_LINKED',
    });
    expect(store.links).toHaveLength(1);
  });

  it('maps a unique-index race to AlreadyLinked', async () => {
    const linkRepo = createFakeLinkRepo(store);
    // Pre-check sees nothing; the insert then hits the index.
    linkRepo.findLink = vi.fn(async () => undefined);
    seedLink(store, doctorId, patientId);

    await expect(createLink(makeDeps({ linkRepo }), doctorId, patientId)).rejects.toMatchObject({
      code: 'ALREADY_LINKED',
    });
  });

  it('requires the doctor side to be a doctor', async () => {
    const otherPatient = seedUser(store, { name: 'Sam', role: Role.PATIENT }).userId;

    await expect(createLink(makeDeps(), otherPatient, patientId)).rejects.toMatchObject({
      statusCode: 404,
      message: 'Doctor not found',
    });
  });

  it('requires the patient side to be a patient', async () => {
    const otherDoctor = seedUser(store, { name: 'Dr Who', role: Role.DOCTOR }).userId;

    await expect(createLink(makeDeps(), doctorId, otherDoctor)).rejects.toMatchObject({
      statusCode: 404,
      message: 'Patient not found',
    });
  });
});

// ---------------------------------------------------------------------------
// createLinkViaInvite
// ---------------------------------------------------------------------------

describe('Link Service — createLinkViaInvite', () => {
  it('links the patient to the doctor owning the code, case-insensitively', async () => {
    const link = await createLinkViaInvite(makeDeps(), patientId, ' ab12cd ');

    expect(link.doctorId).toBe(doctorId);
    expect(link.patientId).toBe(patientId);
    const audit = store.auditLog.at(-1);
    expect(audit?.action).toBe(AuditAction.LINK_CREATED_VIA_INVITE);
    expect(audit?.detail).toEqual({ doctorId });
  });

  it('rejects an unknown code with InvalidCode', async () => {
    await expect(createLinkViaInvite(makeDeps(), patientId, 'ZZZZZZ')).rejects.toMatchObject({
      statusCode: 404,
      code: 'INVALID_CODE',
      message: 'Invalid invite code',
    });
    expect(store.links).toHaveLength(0);
  });

  it('rejects redeeming the same invite twice with AlreadyLinked', async () => {
    const deps = makeDeps();
    await createLinkViaInvite(deps, patientId, 'AB12CD');

    await expect(createLinkViaInvite(deps, patientId, 'AB12CD')).rejects.toMatchObject({
      code: 'ALREADY_LINKED',
    });
  });
});

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

describe('Link Service — lookups', () => {
  it('findLink returns null when the pair is not linked', async () => {
    expect(await findLink(makeDeps(), doctorId, patientId)).toBeNull();
  });

  it('findLink is directional', async () => {
    seedLink(store, doctorId, patientId);

    expect((await findLink(makeDeps(), doctorId, patientId))?.patientId).toBe(patientId);
    expect(await findLink(makeDeps(), patientId, doctorId)).toBeNull();
  });

  it('findByShareCode normalises the code', async () => {
    const link = seedLink(store, doctorId, patientId, 'SHC001');

    expect((await findByShareCode(makeDeps(), 'shc001'))?.linkId).toBe(link.linkId);
    expect(await findByShareCode(makeDeps(), 'NOPE01')).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Permissions
// ---------------------------------------------------------------------------

describe('Link Service — setPermissions', () => {
  it('merges the update over the stored map', async () => {
    const link = seedLink(store, doctorId, patientId);
    const deps = makeDeps();

    await setPermissions(deps, link.linkId, patientId, { health_logs: false });
    const updated = await setPermissions(deps, link.linkId, patientId, { reports: false });

    expect(updated.permissions).toEqual({ health_logs: false, reports: false });
    expect(store.auditLog.at(-1)?.detail).toEqual({ doctorId, changes: { reports: false } });
  });

  it('writes only the provided categories, not the merged map', async () => {
    const link = seedLink(store, doctorId, patientId);
    store.links[0].permissions = { health_logs: false };
    const linkRepo = createFakeLinkRepo(store);
    const updateSpy = vi.spyOn(linkRepo, 'updatePermissions');

    await setPermissions(makeDeps({ linkRepo }), link.linkId, patientId, { reports: false });

    expect(updateSpy).toHaveBeenCalledWith(link.linkId, { reports: false });
    expect(store.links[0].permissions).toEqual({ health_logs: false, reports: false });
  });

  it('re-enables a revoked category', async () => {
    const link = seedLink(store, doctorId, patientId);
    const deps = makeDeps();

    await setPermissions(deps, link.linkId, patientId, { medications: false });
    const updated = await setPermissions(deps, link.linkId, patientId, { medications: true });

    expect(updated.permissions).toEqual({ medications: true });
  });

  it('only the link patient may change permissions', async () => {
    const link = seedLink(store, doctorId, patientId);

    await expect(
      setPermissions(makeDeps(), link.linkId, doctorId, { health_logs: false }),
    ).rejects.toMatchObject({ statusCode: 403, code: 'NOT_AUTHORIZED' });
    expect(store.links[0].permissions).toEqual({});
  });

  it('throws NotFound for an unknown link', async () => {
    await expect(
      setPermissions(makeDeps(), '99999999-0000-0000-0000-000000000000', patientId, {}),
    ).rejects.toMatchObject({ statusCode: 404, message: 'Link not found' });
  });
});

describe('Link Service — setPermissionsForDoctor', () => {
  it('returns the full resolved permission record', async () => {
    const link = seedLink(store, doctorId, patientId);

    const result = await setPermissionsForDoctor(
      makeDeps(),
      { userId: patientId, role: Role.PATIENT },
      doctorId,
      { health_logs: false },
    );

    expect(result).toEqual({
      linkId: link.linkId,
      doctorId,
      permissions: {
        health_logs: false,
        medications: true,
        reports: true,
        diet_plans: true,
        medical_history: true,
        consultations: true,
      },
    });
  });

  it('keeps both revokes when two updates run concurrently', async () => {
    seedLink(store, doctorId, patientId);
    const deps = makeDeps();
    const requester = { userId: patientId, role: Role.PATIENT };

    await Promise.all([
      setPermissionsForDoctor(deps, requester, doctorId, { health_logs: false }),
      setPermissionsForDoctor(deps, requester, doctorId, { reports: false }),
    ]);

    expect(store.links[0].permissions).toEqual({ health_logs: false, reports: false });
    const refreshed = await setPermissionsForDoctor(deps, requester, doctorId, {});
    expect(refreshed.permissions.health_logs).toBe(false);
    expect(refreshed.permissions.reports).toBe(false);
  });

  it('rejects a doctor requester', async () => {
    seedLink(store, doctorId, patientId);

    await expect(
      setPermissionsForDoctor(makeDeps(), { userId: doctorId, role: Role.DOCTOR }, doctorId, {}),
    ).rejects.toMatchObject({ code: 'NOT_AUTHORIZED' });
  });

  it('throws NotFound when the patient is not linked to that doctor', async () => {
    await expect(
      setPermissionsForDoctor(makeDeps(), { userId: patientId, role: Role.PATIENT }, doctorId, {}),
    ).rejects.toMatchObject({ statusCode: 404 });
  });
});

// ---------------------------------------------------------------------------
// Doctor registers patient
// ---------------------------------------------------------------------------

describe('Link Service — registerPatientForDoctor', () => {
  it('creates a shadow patient with a share code when no email is given', async () => {
    const result = await registerPatientForDoctor(
      makeDeps({ generateShareCode: () => 'SHC001' }),
      doctorId,
      { name: 'Jane Shadow' },
    );

    expect(result.kind).toBe(PatientRegistrationKind.SHADOW);
    expect(result.shareCode).toBe('SHC001');
    expect(result.tempPassword).toBeNull();
    const shadow = store.users.find((u) => u.userId === result.patientId);
    expect(shadow?.email).toBeNull();
    expect(shadow?.passwordHash).toBeNull();
    expect(store.auditLog.slice(-2).map((e) => e.action)).toEqual([
      AuditAction.ACCOUNT_SHADOW_CREATED,
      AuditAction.LINK_CREATED,
    ]);
  });

  it('retries on a share-code collision', async () => {
    const other = seedUser(store, { name: 'Other', role: Role.PATIENT }).userId;
    seedLink(store, doctorId, other, 'TAKEN001');
    const codes = ['TAKEN001', 'FRESH001'];

    const result = await registerPatientForDoctor(
      makeDeps({ generateShareCode: () => codes.shift() ?? 'SPARE001' }),
      doctorId,
      { name: 'Jane Shadow' },
    );

    expect(result.shareCode).toBe('FRESH001');
    expect(store.users.filter((u) => u.name === 'Jane Shadow')).toHaveLength(1);
  });

  it('creates a standard account with a temporary password for a new email', async () => {
    const result = await registerPatientForDoctor(makeDeps(), doctorId, {
      name: 'Sam',
      email: 'Sam@Example.Test',
    });

    expect(result.kind).toBe(PatientRegistrationKind.STANDARD);
    expect(result.shareCode).toBeNull();
    expect(result.tempPassword).toMatch(/^[A-Za-z0-9_-]{16}$/);
    const created = store.users.find((u) => u.userId === result.patientId);
    expect(created?.email).toBe('sam@example.test');
    expect(created?.passwordHash).toBe(`argon2id$${result.tempPassword}`);
  });

  it('links an existing patient found by email', async () => {
    const result = await registerPatientForDoctor(makeDeps(), doctorId, {
      name: 'Jane',
      email: 'jane@example.test',
    });

    expect(result).toMatchObject({
      kind: PatientRegistrationKind.EXISTING,
      patientId,
      shareCode: null,
      tempPassword: null,
    });
    expect(store.auditLog.at(-1)?.detail).toEqual({ patientId, kind: 'existing' });
  });

  it('refuses an email that belongs to a non-patient', async () => {
    const other = seedUser(store, { name: 'Dr Who', role: Role.DOCTOR, email: 'who@example.test' });

    await expect(
      registerPatientForDoctor(makeDeps(), doctorId, { name: 'Who', email: 'who@example.test' }),
    ).rejects.toMatchObject({ code: 'DUPLICATE_IDENTITY' });
    expect(store.links.some((l) => l.patientId === other.userId)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Listings
// ---------------------------------------------------------------------------

describe('Link Service — listings', () => {
  it('lists linked doctors with profile fields and effective permissions', async () => {
    const link = seedLink(store, doctorId, patientId);
    link.permissions = { reports: false };

    const doctors = await listDoctorsForPatient(makeDeps(), patientId);

    expect(doctors).toHaveLength(1);
    expect(doctors[0]).toMatchObject({
      linkId: link.linkId,
      doctorId,
      name: 'Dr Smith',
      available: true,
      permissions: { reports: false, health_logs: true },
    });
  });

  it('lists linked patients and flags shadows', async () => {
    const shadow = seedUser(store, { name: 'Jane Shadow', role: Role.PATIENT, email: null, passwordHash: null });
    seedLink(store, doctorId, patientId);
    seedLink(store, doctorId, shadow.userId, 'SHC001');

    const patients = await listPatientsForDoctor(makeDeps(), doctorId);

    expect(patients.map((p) => [p.name, p.isShadow, p.shareCode])).toEqual([
      ['Jane Shadow', true, 'SHC001'],
      ['Jane', false, null],
    ]);
  });
});
