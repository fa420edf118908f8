// ============================================================================
// Domain 2: Doctor–Patient Links: Permission Evaluator
// ============================================================================

import {
  DEFAULT_CATEGORY_ACCESS,
  RECORD_CATEGORIES,
  type RecordCategory,
} from '../constants/records.constants.js';
import type { CategoryPermissions } from '../schemas/db/link.schema.js';

export interface AccessPrincipal {
  userId: string;
}

export interface AccessLink {
  doctorId: string;
  patientId: string;
  permissions: CategoryPermissions;
}

export type AccessDecision =
  | { allowed: true; reason: 'owner' | 'granted' }
  | { allowed: false; reason: 'not_linked' | 'revoked' };

/**
 * Effective grant for one category on a link. An absent key falls back to the
 * category default, which is allow for every category.
 */
export function isCategoryPermitted(
  permissions: CategoryPermissions,
  category: RecordCategory,
): boolean {
  return permissions[category] ?? DEFAULT_CATEGORY_ACCESS[category];
}

/**
 * Expands a stored (possibly partial) permission map into the full record of
 * effective grants.
 */
export function resolvePermissions(
  permissions: CategoryPermissions,
): Record<RecordCategory, boolean> {
  return {
    health_logs: isCategoryPermitted(permissions, 'health_logs'),
    medications: isCategoryPermitted(permissions, 'medications'),
    reports: isCategoryPermitted(permissions, 'reports'),
    diet_plans: isCategoryPermitted(permissions, 'diet_plans'),
    medical_history: isCategoryPermitted(permissions, 'medical_history'),
    consultations: isCategoryPermitted(permissions, 'consultations'),
  };
}

/**
 * Decides whether `requester` may see `owner`'s records in `category`.
 *
 * The owner always may. Anyone else needs a link whose doctor side is the
 * requester and whose patient side is the owner; a link between other parties
 * counts as no link at all.
 */
export function evaluateAccess(
  requester: AccessPrincipal,
  owner: AccessPrincipal,
  category: RecordCategory,
  link: AccessLink | null,
): AccessDecision {
  if (requester.userId === owner.userId) {
    return { allowed: true, reason: 'owner' };
  }

  if (
    !link ||
    link.doctorId !== requester.userId ||
    link.patientId !== owner.userId
  ) {
    return { allowed: false, reason: 'not_linked' };
  }

  if (!isCategoryPermitted(link.permissions, category)) {
    return { allowed: false, reason: 'revoked' };
  }

  return { allowed: true, reason: 'granted' };
}

export function canAccess(
  requester: AccessPrincipal,
  owner: AccessPrincipal,
  category: RecordCategory,
  link: AccessLink | null,
): boolean {
  return evaluateAccess(requester, owner, category, link).allowed;
}

/**
 * Keeps only the record-category keys of a permission update that carry a
 * value. The result is what gets merged into the stored map.
 */
export function pickPermissionChanges(
  update: CategoryPermissions,
): CategoryPermissions {
  const changes: CategoryPermissions = {};
  for (const category of RECORD_CATEGORIES) {
    const value = update[category];
    if (value !== undefined) {
      changes[category] = value;
    }
  }
  return changes;
}
