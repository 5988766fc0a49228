import { type Account, type AccessibleAccount, type AccountRepository, type PermissionLevel } from '@emerald/domain';
import { sqlClient } from '../client';
import { firstRow } from './user-repository';

type AccountRow = {
  id: string;
  owner_id: string;
  name: string;
  currency: string;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

type AccessibleAccountRow = AccountRow & { level: PermissionLevel };

const ACCOUNT_COLUMNS = 'a.id, a.owner_id, a.name, a.currency, a.notes, a.created_at, a.updated_at, a.deleted_at';

export class PgAccountRepository implements AccountRepository {
  async create(
    tx: unknown,
    account: { id: string; ownerId: string; name: string; currency: string; notes: string | null },
  ): Promise<Account> {
    const result = await sqlClient(tx).query<AccountRow>(
      `INSERT INTO accounts AS a (id, owner_id, name, currency, notes)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${ACCOUNT_COLUMNS}`,
      [account.id, account.ownerId, account.name, account.currency, account.notes],
    );
    return mapAccountRow(firstRow(result.rows));
  }

  async findById(tx: unknown, id: string): Promise<Account | null> {
    const result = await sqlClient(tx).query<AccountRow>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts a WHERE a.id = $1 AND a.deleted_at IS NULL`,
      [id],
    );
    return result.rows[0] ? mapAccountRow(result.rows[0]) : null;
  }

  async listAccessible(tx: unknown, userId: string): Promise<AccessibleAccount[]> {
    const result = await sqlClient(tx).query<AccessibleAccountRow>(
      `SELECT ${ACCOUNT_COLUMNS}, 'owner' AS level
       FROM accounts a
       WHERE a.owner_id = $1 AND a.deleted_at IS NULL
       UNION ALL
       SELECT ${ACCOUNT_COLUMNS}, s.level
       FROM accounts a
       JOIN account_shares s ON s.account_id = a.id AND s.deleted_at IS NULL
       WHERE s.user_id = $1 AND a.deleted_at IS NULL
       ORDER BY created_at`,
      [userId],
    );
    return result.rows.map((row) => ({ account: mapAccountRow(row), level: row.level }));
  }

  async update(
    tx: unknown,
    id: string,
    patch: { name?: string; currency?: string; notes?: string | null },
  ): Promise<Account> {
    const sets: string[] = [];
    const values: unknown[] = [id];
    if (patch.name !== undefined) {
      values.push(patch.name);
      sets.push(`name = $${values.length}`);
    }
    if (patch.currency !== undefined) {
      values.push(patch.currency);
      sets.push(`currency = $${values.length}`);
    }
    if (patch.notes !== undefined) {
      values.push(patch.notes);
      sets.push(`notes = $${values.length}`);
    }
    sets.push('updated_at = NOW()');

    const result = await sqlClient(tx).query<AccountRow>(
      `UPDATE accounts a SET ${sets.join(', ')}
       WHERE a.id = $1 AND a.deleted_at IS NULL
       RETURNING ${ACCOUNT_COLUMNS}`,
      values,
    );
    return mapAccountRow(firstRow(result.rows));
  }

  async softDelete(tx: unknown, id: string): Promise<void> {
    await sqlClient(tx).query(
      `UPDATE accounts SET deleted_at = NOW(), updated_at = NOW() WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
  }
}

function mapAccountRow(row: AccountRow): Account {
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    currency: row.currency,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}
