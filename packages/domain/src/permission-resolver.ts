import { type PermissionLevel } from './account';
import { type AccountRepository, type PermissionGrantRepository } from './ports';
import { canRead, canWrite, hasLevel } from './permissions';

export interface PermissionResolverDeps {
  accountRepo: AccountRepository;
  grantRepo: PermissionGrantRepository;
}

/**
 * Answers what a user may do with an account. Ownership is implicit in
 * `Account.ownerId`; everyone else needs an active grant. Runs on the
 * caller's transaction handle and never writes.
 */
export class PermissionResolver {
  constructor(private readonly deps: PermissionResolverDeps) {}

  async resolve(tx: unknown, userId: string, accountId: string): Promise<PermissionLevel | null> {
    const account = await this.deps.accountRepo.findById(tx, accountId);
    if (!account) return null;
    if (account.ownerId === userId) return 'owner';

    const grant = await this.deps.grantRepo.findActive(tx, accountId, userId);
    return grant ? grant.level : null;
  }

  /**
   * Resolves the caller's level and checks it against `minLevel`. No access at
   * all is reported exactly like a missing account.
   */
  async require(
    tx: unknown,
    userId: string,
    accountId: string,
    minLevel: PermissionLevel,
  ): Promise<PermissionLevel> {
    const level = await this.resolve(tx, userId, accountId);
    if (level === null) {
      throw new AccessError('NOT_FOUND', 'Account not found');
    }
    if (!hasLevel(level, minLevel)) {
      throw new AccessError(
        'INSUFFICIENT_LEVEL',
        `Requires ${minLevel} access, you have ${level}`,
        minLevel,
        level,
      );
    }
    return level;
  }

  async isOwner(tx: unknown, userId: string, accountId: string): Promise<boolean> {
    return (await this.resolve(tx, userId, accountId)) === 'owner';
  }

  async canRead(tx: unknown, userId: string, accountId: string): Promise<boolean> {
    return canRead(await this.resolve(tx, userId, accountId));
  }

  async canWrite(tx: unknown, userId: string, accountId: string): Promise<boolean> {
    return canWrite(await this.resolve(tx, userId, accountId));
  }
}

export class AccessError extends Error {
  constructor(
    public readonly reason: 'NOT_FOUND' | 'INSUFFICIENT_LEVEL',
    message: string,
    public readonly required: PermissionLevel | null = null,
    public readonly actual: PermissionLevel | null = null,
  ) {
    super(message);
    this.name = 'AccessError';
  }
}
