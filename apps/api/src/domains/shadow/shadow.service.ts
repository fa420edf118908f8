import {
  AuditAction,
  AuditCategory,
  AuditStatus,
  Role,
} from '@carelink/shared/constants/iam.constants.js';
import { ClaimStatus } from '@carelink/shared/constants/link.constants.js';
import { normaliseCode } from '@carelink/shared/utils/code.utils.js';
import {
  AlreadyLinkedError,
  AlreadyMigratedError,
  InvalidCodeError,
  NotAuthorizedError,
} from '../../lib/errors.js';
import { type AuditRepo } from '../../lib/audit.js';
import { type ClaimOutcome, type MovedCounts } from './shadow.repository.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface ShadowRepo {
  claimShareCode(shareCode: string, realUserId: string): Promise<ClaimOutcome>;
}

export interface ShadowServiceDeps {
  shadowRepo: ShadowRepo;
  auditRepo: AuditRepo;
}

// ---------------------------------------------------------------------------
// Service: Claim Share Code
// ---------------------------------------------------------------------------

export type ClaimResult =
  | { status: typeof ClaimStatus.ALREADY_LINKED; linkId: string; doctorId: string }
  | {
      status: typeof ClaimStatus.MIGRATED;
      linkId: string;
      doctorId: string;
      moved: MovedCounts;
    };

/**
 * Move every record of the shadow patient behind `shareCode` to the
 * requester's own account, repoint the link, spend the code and delete the
 * shadow identity. Either all of it commits or none of it does.
 *
 * A spent or unknown code fails with InvalidCode; claiming a link that already
 * points at the requester is a no-op.
 */
export async function claimShareCode(
  deps: ShadowServiceDeps,
  requester: { userId: string; role: Role },
  shareCode: string,
): Promise<ClaimResult> {
  if (requester.role !== Role.PATIENT) {
    throw new NotAuthorizedError();
  }

  const result = await deps.shadowRepo.claimShareCode(
    normaliseCode(shareCode),
    requester.userId,
  );

  switch (result.outcome) {
    case 'invalid_code':
      await auditFailedClaim(deps, requester.userId, 'invalid_code');
      throw new InvalidCodeError('Invalid share code');

    case 'already_migrated':
      await auditFailedClaim(deps, requester.userId, 'already_migrated');
      throw new AlreadyMigratedError();

    case 'doctor_already_linked':
      await auditFailedClaim(deps, requester.userId, 'doctor_already_linked');
      throw new AlreadyLinkedError();

    case 'self_claim':
      return {
        status: ClaimStatus.ALREADY_LINKED,
        linkId: result.link.linkId,
        doctorId: result.link.doctorId,
      };

    case 'migrated':
      await deps.auditRepo.appendAuditLog({
        userId: requester.userId,
        action: AuditAction.SHARE_CODE_CLAIMED,
        category: AuditCategory.LINK,
        resourceType: 'doctor_patient_link',
        resourceId: result.link.linkId,
        detail: {
          shadowUserId: result.shadowUserId,
          doctorId: result.link.doctorId,
          moved: { ...result.moved },
        },
      });
      return {
        status: ClaimStatus.MIGRATED,
        linkId: result.link.linkId,
        doctorId: result.link.doctorId,
        moved: result.moved,
      };
  }
}

async function auditFailedClaim(
  deps: ShadowServiceDeps,
  userId: string,
  reason: string,
): Promise<void> {
  await deps.auditRepo.appendAuditLog({
    userId,
    action: AuditAction.SHARE_CODE_CLAIM_FAILED,
    category: AuditCategory.LINK,
    resourceType: 'doctor_patient_link',
    status: AuditStatus.FAILED,
    detail: { reason },
  });
}
