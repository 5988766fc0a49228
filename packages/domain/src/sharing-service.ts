import { type PermissionGrant, type PermissionLevel } from './account';
import { type RequestContext } from './audit';
import {
  UniqueViolationError,
  type Logger,
  type PermissionGrantRepository,
  type TransactionRunner,
  type UserRepository,
} from './ports';
import { isGrantableLevel } from './permissions';
import { type PermissionResolver } from './permission-resolver';
import { type AuditService } from './audit-service';

export interface SharingServiceDeps {
  grantRepo: PermissionGrantRepository;
  userRepo: UserRepository;
  resolver: PermissionResolver;
  audit: AuditService;
  logger: Logger;
  generateId: () => string;
  withTransaction: TransactionRunner;
}

const ENTITY_TYPE = 'account_share';

/** Owner-gated management of explicit account grants. */
export class SharingService {
  constructor(private readonly deps: SharingServiceDeps) {}

  async share(
    ownerId: string,
    accountId: string,
    input: { userId: string; level: PermissionLevel },
    ctx: RequestContext = {},
  ): Promise<PermissionGrant> {
    const { grantRepo, userRepo, resolver, audit, generateId, logger } = this.deps;

    const grant = await this.deps.withTransaction(async (tx) => {
      await resolver.require(tx, ownerId, accountId, 'owner');

      if (input.userId === ownerId) {
        throw new SharingError('VALIDATION', 'Cannot share an account with yourself');
      }
      if (!isGrantableLevel(input.level)) {
        throw new SharingError('VALIDATION', 'Owner access cannot be granted');
      }

      const target = await userRepo.findById(tx, input.userId);
      if (!target) {
        throw new SharingError('NOT_FOUND', 'User not found');
      }
      const existing = await grantRepo.findActive(tx, accountId, input.userId);
      if (existing) {
        throw new SharingError('CONFLICT', 'Account is already shared with this user');
      }

      const created = await grantRepo
        .create(tx, {
          id: generateId(),
          accountId,
          userId: input.userId,
          level: input.level,
        })
        .catch((err: unknown) => {
          if (err instanceof UniqueViolationError) {
            throw new SharingError('CONFLICT', 'Account is already shared with this user');
          }
          throw err;
        });
      await audit.record(tx, {
        userId: ownerId,
        action: 'CREATE',
        entityType: ENTITY_TYPE,
        entityId: created.id,
        newValues: { accountId, userId: input.userId, level: input.level },
        description: `User ${ownerId} shared account ${accountId} with user ${input.userId} as ${input.level}`,
        context: ctx,
      });
      return created;
    });

    logger.info({ accountId, grantId: grant.id, level: grant.level }, 'Account shared');
    return grant;
  }

  async updateShare(
    ownerId: string,
    accountId: string,
    grantId: string,
    level: PermissionLevel,
    ctx: RequestContext = {},
  ): Promise<PermissionGrant> {
    const { grantRepo, resolver, audit, logger } = this.deps;

    const updated = await this.deps.withTransaction(async (tx) => {
      await resolver.require(tx, ownerId, accountId, 'owner');
      const grant = await this.findGrant(tx, accountId, grantId);

      if (!isGrantableLevel(level)) {
        throw new SharingError('VALIDATION', 'Owner access cannot be granted');
      }
      // Unreachable while owner rows are never stored; kept as a guard.
      if (grant.userId === ownerId && grant.level === 'owner') {
        throw new SharingError('VALIDATION', 'Cannot change your own owner access');
      }

      const result = await grantRepo.updateLevel(tx, grant.id, level);
      await audit.record(tx, {
        userId: ownerId,
        action: 'UPDATE',
        entityType: ENTITY_TYPE,
        entityId: grant.id,
        oldValues: { level: grant.level },
        newValues: { level },
        description: `User ${ownerId} changed access of user ${grant.userId} on account ${accountId} from ${grant.level} to ${level}`,
        context: ctx,
      });
      return result;
    });

    logger.info({ accountId, grantId, level }, 'Account share updated');
    return updated;
  }

  async revokeShare(ownerId: string, accountId: string, grantId: string, ctx: RequestContext = {}): Promise<void> {
    const { grantRepo, resolver, audit, logger } = this.deps;

    await this.deps.withTransaction(async (tx) => {
      await resolver.require(tx, ownerId, accountId, 'owner');
      const grant = await this.findGrant(tx, accountId, grantId);

      if (grant.userId === ownerId && grant.level === 'owner') {
        throw new SharingError('VALIDATION', 'Cannot revoke your own owner access');
      }

      await grantRepo.softDelete(tx, grant.id);
      await audit.record(tx, {
        userId: ownerId,
        action: 'DELETE',
        entityType: ENTITY_TYPE,
        entityId: grant.id,
        oldValues: { userId: grant.userId, level: grant.level },
        description: `User ${ownerId} revoked ${grant.level} access of user ${grant.userId} on account ${accountId}`,
        context: ctx,
      });
    });

    logger.info({ accountId, grantId }, 'Account share revoked');
  }

  /** Owners see every active grant; anyone else only sees their own. */
  async listShares(requesterId: string, accountId: string): Promise<PermissionGrant[]> {
    const { grantRepo, resolver } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const level = await resolver.require(tx, requesterId, accountId, 'viewer');
      if (level === 'owner') {
        return grantRepo.listActiveByAccount(tx, accountId);
      }
      const own = await grantRepo.findActive(tx, accountId, requesterId);
      return own ? [own] : [];
    });
  }

  private async findGrant(tx: unknown, accountId: string, grantId: string): Promise<PermissionGrant> {
    const grant = await this.deps.grantRepo.findById(tx, grantId);
    if (!grant || grant.accountId !== accountId) {
      throw new SharingError('NOT_FOUND', 'Share not found');
    }
    return grant;
  }
}

export class SharingError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'SharingError';
  }
}
