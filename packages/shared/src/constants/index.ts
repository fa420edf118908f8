export {
  Role,
  SELF_REGISTER_ROLES,
  Capability,
  DefaultCapabilities,
  AuditAction,
  AuditCategory,
  AuditStatus,
  SessionRevokeReason,
} from './iam.constants.js';

export {
  CODE_ALPHABET,
  INVITE_CODE_LENGTH,
  SHARE_CODE_LENGTH,
  CODE_GENERATION_MAX_ATTEMPTS,
  ClaimStatus,
  PatientRegistrationKind,
  TEMP_PASSWORD_BYTES,
} from './link.constants.js';

export {
  RecordCategory,
  RECORD_CATEGORIES,
  DEFAULT_CATEGORY_ACCESS,
  DEFAULT_HEALTH_LOG_TYPE,
  MAX_PAIN_LEVEL,
  ReportType,
  MAX_REPORT_FILE_DATA_LENGTH,
  MealType,
  DayOfWeek,
  PaymentStatus,
} from './records.constants.js';

export {
  PREGNANCY_PROFILE_CATEGORY,
  EMERGENCY_CATEGORY,
  PregnancyType,
  GESTATION_DAYS,
  FIRST_TRIMESTER_LAST_WEEK,
  SECOND_TRIMESTER_LAST_WEEK,
  BloodGroup,
  EmergencyStatus,
  ConsultationType,
  MAX_EMERGENCY_MESSAGE_LENGTH,
} from './care.constants.js';
