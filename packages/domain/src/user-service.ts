import { type PublicUser, type User, toPublicUser } from './user';
import { type AuditValues, type RequestContext } from './audit';
import { normalizeEmail } from './auth';
import {
  UniqueViolationError,
  type Logger,
  type TransactionRunner,
  type UserProfilePatch,
  type UserRepository,
} from './ports';
import { type TokenLedger } from './token-ledger';
import { type AuditService } from './audit-service';

export interface UserServiceDeps {
  userRepo: UserRepository;
  ledger: TokenLedger;
  audit: AuditService;
  logger: Logger;
  withTransaction: TransactionRunner;
}

const ENTITY_TYPE = 'user';

/**
 * Profile maintenance and account closure. A user may act on themselves;
 * administrators may act on anyone.
 */
export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  async getProfile(actorId: string, userId: string): Promise<PublicUser> {
    return this.deps.withTransaction(async (tx) => {
      const { target } = await this.authorize(tx, actorId, userId);
      return toPublicUser(target);
    });
  }

  /** Applies the fields that differ from the stored profile; the audit row carries only those. */
  async updateProfile(
    actorId: string,
    userId: string,
    patch: UserProfilePatch,
    ctx: RequestContext = {},
  ): Promise<PublicUser> {
    const { userRepo, audit, logger } = this.deps;

    const updated = await this.deps.withTransaction(async (tx) => {
      const { actor, target } = await this.authorize(tx, actorId, userId);

      const oldValues: AuditValues = {};
      const newValues: AuditValues = {};
      const changes: UserProfilePatch = {};

      if (patch.email !== undefined) {
        const email = normalizeEmail(patch.email);
        if (email !== target.email) {
          if (await userRepo.emailExists(tx, email)) {
            throw new UserError('CONFLICT', 'Email is already registered');
          }
          oldValues['email'] = target.email;
          newValues['email'] = email;
          changes.email = email;
        }
      }
      if (patch.username !== undefined && patch.username !== target.username) {
        // A change of case only still belongs to this user.
        const sameName = patch.username.toLowerCase() === target.username.toLowerCase();
        if (!sameName && (await userRepo.usernameExists(tx, patch.username))) {
          throw new UserError('CONFLICT', 'Username is already taken');
        }
        oldValues['username'] = target.username;
        newValues['username'] = patch.username;
        changes.username = patch.username;
      }
      if (patch.fullName !== undefined && patch.fullName !== target.fullName) {
        oldValues['fullName'] = target.fullName;
        newValues['fullName'] = patch.fullName;
        changes.fullName = patch.fullName;
      }
      if (Object.keys(changes).length === 0) return target;

      const user = await userRepo.updateProfile(tx, userId, changes).catch((err: unknown) => {
        if (err instanceof UniqueViolationError) {
          throw new UserError('CONFLICT', 'Email or username is already in use');
        }
        throw err;
      });
      await audit.record(tx, {
        userId: actor.id,
        action: 'UPDATE',
        entityType: ENTITY_TYPE,
        entityId: userId,
        oldValues,
        newValues,
        description:
          actor.id === userId
            ? `User ${user.username} updated their profile`
            : `Admin ${actor.username} updated user ${user.username}`,
        context: ctx,
      });
      return user;
    });

    logger.info({ actorId, userId }, 'User profile updated');
    return toPublicUser(updated);
  }

  /** Soft-deletes the user and revokes every refresh session they hold. */
  async deleteUser(actorId: string, userId: string, ctx: RequestContext = {}): Promise<{ revokedSessions: number }> {
    const { userRepo, ledger, audit, logger } = this.deps;

    const result = await this.deps.withTransaction(async (tx) => {
      const { actor, target } = await this.authorize(tx, actorId, userId);

      await userRepo.softDelete(tx, userId);
      const revokedSessions = await ledger.revokeAllForUser(tx, userId);
      await audit.record(tx, {
        userId: actor.id,
        action: 'DELETE',
        entityType: ENTITY_TYPE,
        entityId: userId,
        oldValues: { email: target.email, username: target.username },
        description:
          actor.id === userId
            ? `User ${target.username} deleted their account`
            : `Admin ${actor.username} deleted user ${target.username}`,
        extraMetadata: { revokedSessions },
        context: ctx,
      });
      return { revokedSessions };
    });

    logger.info({ actorId, userId, revokedSessions: result.revokedSessions }, 'User deleted');
    return result;
  }

  private async authorize(tx: unknown, actorId: string, userId: string): Promise<{ actor: User; target: User }> {
    const actor = await this.deps.userRepo.findById(tx, actorId);
    if (!actor) {
      throw new UserError('NOT_FOUND', 'User not found');
    }
    if (actorId !== userId && !actor.isAdmin) {
      this.deps.logger.warn({ actorId, userId }, 'User management denied');
      throw new UserError('FORBIDDEN', 'Administrator privileges required to manage other users');
    }
    if (actorId === userId) {
      return { actor, target: actor };
    }
    const target = await this.deps.userRepo.findById(tx, userId);
    if (!target) {
      throw new UserError('NOT_FOUND', 'User not found');
    }
    return { actor, target };
  }
}

export class UserError extends Error {
  constructor(
    public readonly kind: 'FORBIDDEN' | 'NOT_FOUND' | 'CONFLICT',
    message: string,
  ) {
    super(message);
    this.name = 'UserError';
  }
}
