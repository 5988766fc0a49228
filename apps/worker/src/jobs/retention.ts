import { createLogger } from '@emerald/shared';
import { withTransaction, PgAuditLogRepository, PgRefreshTokenRepository } from '@emerald/db';
import {
  type AuditLogRepository,
  type RefreshTokenRepository,
  type TransactionRunner,
} from '@emerald/domain';

const logger = createLogger({ name: 'worker:retention' });

export interface RetentionPolicy {
  refreshTokenRetentionDays: number;
  auditLogRetentionDays: number;
}

export interface RetentionDeps {
  refreshTokenRepo: Pick<RefreshTokenRepository, 'deleteExpired'>;
  auditRepo: Pick<AuditLogRepository, 'deleteOlderThan'>;
  withTransaction: TransactionRunner;
}

const defaultDeps: RetentionDeps = {
  refreshTokenRepo: new PgRefreshTokenRepository(),
  auditRepo: new PgAuditLogRepository(),
  withTransaction,
};

/**
 * Removes refresh tokens that expired or were revoked before the retention
 * window, then audit events older than theirs. This is the only code path
 * that deletes audit rows.
 */
export async function runRetentionJob(
  policy: RetentionPolicy,
  deps: RetentionDeps = defaultDeps,
): Promise<{ deletedTokens: number; deletedAuditEvents: number }> {
  logger.info({}, 'Retention sweep started');

  const deletedTokens = await deps.withTransaction((tx) =>
    deps.refreshTokenRepo.deleteExpired(tx, policy.refreshTokenRetentionDays),
  );
  if (deletedTokens > 0) {
    logger.info({ count: deletedTokens }, 'Cleaned up expired refresh tokens');
  }

  const deletedAuditEvents = await deps.withTransaction((tx) =>
    deps.auditRepo.deleteOlderThan(tx, policy.auditLogRetentionDays),
  );
  if (deletedAuditEvents > 0) {
    logger.info(
      { count: deletedAuditEvents, retentionDays: policy.auditLogRetentionDays },
      'Purged audit events past retention',
    );
  }

  logger.info({}, 'Retention sweep completed');
  return { deletedTokens, deletedAuditEvents };
}
