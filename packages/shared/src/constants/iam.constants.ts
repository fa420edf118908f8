// ============================================================================
// Domain 1: Identity & Access Management: Constants
// ============================================================================

// --- Roles ---

export const Role = {
  PATIENT: 'patient',
  DOCTOR: 'doctor',
  HOSPITAL_ADMIN: 'hospital_admin',
  SUPER_ADMIN: 'super_admin',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export const SELF_REGISTER_ROLES = [Role.PATIENT, Role.DOCTOR] as const;

// --- Capabilities (declared per route, checked before the handler runs) ---

export const Capability = {
  PROFILE_VIEW: 'profile:view',

  RECORD_READ: 'record:read',
  RECORD_WRITE: 'record:write',
  CONSULTATION_WRITE: 'consultation:write',

  EMERGENCY_RAISE: 'emergency:raise',
  EMERGENCY_RESPOND: 'emergency:respond',

  PATIENT_REGISTER: 'patient:register',
  PATIENT_LIST: 'patient:list',
  DOCTOR_PROFILE_MANAGE: 'doctor_profile:manage',

  DOCTOR_LIST: 'doctor:list',
  LINK_REDEEM_INVITE: 'link:redeem_invite',
  LINK_MANAGE_PERMISSIONS: 'link:manage_permissions',
  SHARE_CODE_CLAIM: 'share_code:claim',

  AUDIT_VIEW: 'audit:view',
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

// --- Capability Sets per Role ---

export const DefaultCapabilities = {
  [Role.PATIENT]: [
    Capability.PROFILE_VIEW,
    Capability.RECORD_READ,
    Capability.RECORD_WRITE,
    Capability.EMERGENCY_RAISE,
    Capability.DOCTOR_LIST,
    Capability.LINK_REDEEM_INVITE,
    Capability.LINK_MANAGE_PERMISSIONS,
    Capability.SHARE_CODE_CLAIM,
  ],

  [Role.DOCTOR]: [
    Capability.PROFILE_VIEW,
    Capability.RECORD_READ,
    Capability.RECORD_WRITE,
    Capability.CONSULTATION_WRITE,
    Capability.EMERGENCY_RESPOND,
    Capability.PATIENT_REGISTER,
    Capability.PATIENT_LIST,
    Capability.DOCTOR_PROFILE_MANAGE,
  ],

  [Role.HOSPITAL_ADMIN]: [Capability.PROFILE_VIEW, Capability.AUDIT_VIEW],

  [Role.SUPER_ADMIN]: [Capability.PROFILE_VIEW, Capability.AUDIT_VIEW],
} as const satisfies Record<Role, readonly Capability[]>;

// --- Audit Action Identifiers ---

export const AuditAction = {
  // Auth events
  AUTH_REGISTERED: 'auth.registered',
  AUTH_LOGIN_SUCCESS: 'auth.login_success',
  AUTH_LOGIN_FAILED: 'auth.login_failed',
  AUTH_LOGOUT: 'auth.logout',

  // Account events
  ACCOUNT_SHADOW_CREATED: 'account.shadow_created',
  ACCOUNT_CREATED_BY_DOCTOR: 'account.created_by_doctor',
  DOCTOR_PROFILE_UPDATED: 'account.doctor_profile_updated',
  INVITE_CODE_REGENERATED: 'account.invite_code_regenerated',

  // Link events
  LINK_CREATED: 'link.created',
  LINK_CREATED_VIA_INVITE: 'link.created_via_invite',
  LINK_PERMISSIONS_UPDATED: 'link.permissions_updated',
  SHARE_CODE_CLAIMED: 'link.share_code_claimed',
  SHARE_CODE_CLAIM_FAILED: 'link.share_code_claim_failed',

  // Record events
  RECORD_CREATED: 'record.created',
  RECORD_UPDATED: 'record.updated',
  RECORD_DELETED: 'record.deleted',
  RECORD_ACCESS_DENIED: 'record.access_denied',
  CONSULTATION_PAID: 'record.consultation_paid',

  // Care events
  EMERGENCY_RAISED: 'care.emergency_raised',
  EMERGENCY_ACCEPTED: 'care.emergency_accepted',
  EMERGENCY_RESOLVED: 'care.emergency_resolved',

  // Audit events
  AUDIT_QUERIED: 'audit.queried',

  // Request-level trail written by the audit-log plugin
  API_REQUEST: 'api.request',
} as const;

export type AuditAction = (typeof AuditAction)[keyof typeof AuditAction];

// --- Audit Action Categories ---

export const AuditCategory = {
  AUTH: 'auth',
  ACCOUNT: 'account',
  LINK: 'link',
  RECORD: 'record',
  CARE: 'care',
  AUDIT: 'audit',
  API: 'api',
} as const;

export type AuditCategory = (typeof AuditCategory)[keyof typeof AuditCategory];

export const AuditStatus = {
  SUCCESS: 'success',
  FAILED: 'failed',
} as const;

export type AuditStatus = (typeof AuditStatus)[keyof typeof AuditStatus];

// --- Session Revoke Reasons ---

export const SessionRevokeReason = {
  LOGOUT: 'logout',
  EXPIRED_IDLE: 'expired_idle',
  EXPIRED_ABSOLUTE: 'expired_absolute',
} as const;

export type SessionRevokeReason =
  (typeof SessionRevokeReason)[keyof typeof SessionRevokeReason];
