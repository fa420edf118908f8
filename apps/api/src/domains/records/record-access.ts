import {
  AuditAction,
  AuditCategory,
  AuditStatus,
  Role,
} from '@carelink/shared/constants/iam.constants.js';
import { type RecordCategory } from '@carelink/shared/constants/records.constants.js';
import {
  evaluateAccess,
  type AccessLink,
} from '@carelink/shared/utils/access.utils.js';
import { NotAuthorizedError, NotLinkedError } from '../../lib/errors.js';
import { type AuditRepo } from '../../lib/audit.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface RecordLinkRepo {
  findLink(doctorId: string, patientId: string): Promise<AccessLink | undefined>;
}

export interface RecordAccessDeps {
  linkRepo: RecordLinkRepo;
  auditRepo: AuditRepo;
}

export interface Requester {
  userId: string;
  role: Role;
}

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

/**
 * Throws unless `requester` may act on `ownerId`'s records in `category`.
 *
 * The owner always may. Delegated access is for doctors only and needs the
 * doctor-patient link, read from the store on every call so that a revoke
 * takes effect on the next request.
 */
export async function assertRecordAccess(
  deps: RecordAccessDeps,
  requester: Requester,
  ownerId: string,
  category: RecordCategory,
): Promise<void> {
  if (requester.userId === ownerId) return;

  if (requester.role !== Role.DOCTOR) {
    await auditDenied(deps, requester.userId, ownerId, category, 'not_doctor');
    throw new NotAuthorizedError();
  }

  const link = await deps.linkRepo.findLink(requester.userId, ownerId);
  const decision = evaluateAccess(
    { userId: requester.userId },
    { userId: ownerId },
    category,
    link ?? null,
  );
  if (decision.allowed) return;

  await auditDenied(deps, requester.userId, ownerId, category, decision.reason);
  if (decision.reason === 'not_linked') {
    throw new NotLinkedError();
  }
  throw new NotAuthorizedError();
}

async function auditDenied(
  deps: RecordAccessDeps,
  userId: string,
  ownerId: string,
  category: RecordCategory,
  reason: string,
): Promise<void> {
  await deps.auditRepo.appendAuditLog({
    userId,
    action: AuditAction.RECORD_ACCESS_DENIED,
    category: AuditCategory.RECORD,
    resourceType: category,
    status: AuditStatus.FAILED,
    detail: { ownerId, reason },
  });
}
