import { type Account, type AccessibleAccount } from './account';
import { type AuditValues, type RequestContext } from './audit';
import { type AccountRepository, type PermissionGrantRepository, type TransactionRunner } from './ports';
import { AccessError, type PermissionResolver } from './permission-resolver';
import { type AuditService } from './audit-service';

export interface AccountServiceDeps {
  accountRepo: AccountRepository;
  grantRepo: PermissionGrantRepository;
  resolver: PermissionResolver;
  audit: AuditService;
  generateId: () => string;
  withTransaction: TransactionRunner;
}

export interface AccountPatch {
  name?: string;
  currency?: string;
  notes?: string | null;
}

const ENTITY_TYPE = 'account';

export class AccountService {
  constructor(private readonly deps: AccountServiceDeps) {}

  async createAccount(
    ownerId: string,
    input: { name: string; currency: string; notes?: string | null },
    ctx: RequestContext = {},
  ): Promise<Account> {
    const { accountRepo, audit, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const account = await accountRepo.create(tx, {
        id: generateId(),
        ownerId,
        name: input.name,
        currency: input.currency,
        notes: input.notes ?? null,
      });
      await audit.record(tx, {
        userId: ownerId,
        action: 'CREATE',
        entityType: ENTITY_TYPE,
        entityId: account.id,
        newValues: { name: account.name, currency: account.currency },
        description: `Account ${account.name} created`,
        context: ctx,
      });
      return account;
    });
  }

  async getAccount(userId: string, accountId: string): Promise<AccessibleAccount> {
    return this.deps.withTransaction(async (tx) => {
      const level = await this.deps.resolver.require(tx, userId, accountId, 'viewer');
      const account = await this.loadAccount(tx, accountId);
      return { account, level };
    });
  }

  async listAccounts(userId: string): Promise<AccessibleAccount[]> {
    return this.deps.withTransaction((tx) => this.deps.accountRepo.listAccessible(tx, userId));
  }

  /** Editors and owners may edit; the audit row carries only the fields that changed. */
  async updateAccount(
    userId: string,
    accountId: string,
    patch: AccountPatch,
    ctx: RequestContext = {},
  ): Promise<Account> {
    const { accountRepo, resolver, audit } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      await resolver.require(tx, userId, accountId, 'editor');
      const current = await this.loadAccount(tx, accountId);

      const oldValues: AuditValues = {};
      const newValues: AuditValues = {};
      const changes: AccountPatch = {};
      if (patch.name !== undefined && patch.name !== current.name) {
        oldValues['name'] = current.name;
        newValues['name'] = patch.name;
        changes.name = patch.name;
      }
      if (patch.currency !== undefined && patch.currency !== current.currency) {
        oldValues['currency'] = current.currency;
        newValues['currency'] = patch.currency;
        changes.currency = patch.currency;
      }
      if (patch.notes !== undefined && patch.notes !== current.notes) {
        oldValues['notes'] = current.notes;
        newValues['notes'] = patch.notes;
        changes.notes = patch.notes;
      }
      if (Object.keys(changes).length === 0) return current;

      const updated = await accountRepo.update(tx, accountId, changes);
      await audit.record(tx, {
        userId,
        action: 'UPDATE',
        entityType: ENTITY_TYPE,
        entityId: accountId,
        oldValues,
        newValues,
        description: `Account ${updated.name} updated`,
        context: ctx,
      });
      return updated;
    });
  }

  /** Soft-deletes the account together with every active share of it. */
  async deleteAccount(userId: string, accountId: string, ctx: RequestContext = {}): Promise<void> {
    const { accountRepo, grantRepo, resolver, audit } = this.deps;

    await this.deps.withTransaction(async (tx) => {
      await resolver.require(tx, userId, accountId, 'owner');
      const account = await this.loadAccount(tx, accountId);

      const revokedShares = await grantRepo.softDeleteByAccount(tx, accountId);
      await accountRepo.softDelete(tx, accountId);
      await audit.record(tx, {
        userId,
        action: 'DELETE',
        entityType: ENTITY_TYPE,
        entityId: accountId,
        oldValues: { name: account.name, currency: account.currency },
        description: `Account ${account.name} deleted`,
        extraMetadata: { revokedShares },
        context: ctx,
      });
    });
  }

  private async loadAccount(tx: unknown, accountId: string): Promise<Account> {
    const account = await this.deps.accountRepo.findById(tx, accountId);
    if (!account) {
      throw new AccessError('NOT_FOUND', 'Account not found');
    }
    return account;
  }
}
