import { type FastifyBaseLogger } from 'fastify';
import { type AuditStatus } from '@carelink/shared/constants/iam.constants.js';

export interface AuditEntry {
  userId?: string | null;
  action: string;
  category: string;
  resourceType?: string | null;
  resourceId?: string | null;
  status?: AuditStatus;
  detail?: Record<string, unknown> | null;
  ipAddress?: string | null;
  userAgent?: string | null;
}

/** What services write audit entries to. */
export interface AuditRepo {
  appendAuditLog(entry: AuditEntry): Promise<unknown>;
}

/**
 * Wraps the persistent audit repository as a fire-and-forget sink: the write
 * is not awaited by the caller and a failure is logged, never thrown.
 */
export function createAuditSink(
  repo: AuditRepo,
  logger: FastifyBaseLogger,
): AuditRepo {
  return {
    async appendAuditLog(entry: AuditEntry): Promise<void> {
      void repo.appendAuditLog(entry).catch((err: unknown) => {
        logger.error(
          { err, action: entry.action, resourceType: entry.resourceType },
          'Failed to write audit log',
        );
      });
    },
  };
}
