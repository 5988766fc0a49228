import { type PermissionGrant, type PermissionGrantRepository, type PermissionLevel } from '@emerald/domain';
import { sqlClient } from '../client';
import { translateUniqueViolation } from '../errors';
import { firstRow } from './user-repository';

type GrantRow = {
  id: string;
  account_id: string;
  user_id: string;
  level: PermissionLevel;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

const GRANT_COLUMNS = 'id, account_id, user_id, level, created_at, updated_at, deleted_at';

export class PgPermissionGrantRepository implements PermissionGrantRepository {
  async create(
    tx: unknown,
    grant: { id: string; accountId: string; userId: string; level: PermissionLevel },
  ): Promise<PermissionGrant> {
    const result = await sqlClient(tx)
      .query<GrantRow>(
        `INSERT INTO account_shares (id, account_id, user_id, level)
         VALUES ($1, $2, $3, $4)
         RETURNING ${GRANT_COLUMNS}`,
        [grant.id, grant.accountId, grant.userId, grant.level],
      )
      .catch(translateUniqueViolation);
    return mapGrantRow(firstRow(result.rows));
  }

  async findById(tx: unknown, id: string): Promise<PermissionGrant | null> {
    const result = await sqlClient(tx).query<GrantRow>(
      `SELECT ${GRANT_COLUMNS} FROM account_shares WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
    return result.rows[0] ? mapGrantRow(result.rows[0]) : null;
  }

  async findActive(tx: unknown, accountId: string, userId: string): Promise<PermissionGrant | null> {
    const result = await sqlClient(tx).query<GrantRow>(
      `SELECT ${GRANT_COLUMNS} FROM account_shares
       WHERE account_id = $1 AND user_id = $2 AND deleted_at IS NULL`,
      [accountId, userId],
    );
    return result.rows[0] ? mapGrantRow(result.rows[0]) : null;
  }

  async listActiveByAccount(tx: unknown, accountId: string): Promise<PermissionGrant[]> {
    const result = await sqlClient(tx).query<GrantRow>(
      `SELECT ${GRANT_COLUMNS} FROM account_shares
       WHERE account_id = $1 AND deleted_at IS NULL
       ORDER BY created_at`,
      [accountId],
    );
    return result.rows.map(mapGrantRow);
  }

  async updateLevel(tx: unknown, id: string, level: PermissionLevel): Promise<PermissionGrant> {
    const result = await sqlClient(tx).query<GrantRow>(
      `UPDATE account_shares SET level = $2, updated_at = NOW()
       WHERE id = $1 AND deleted_at IS NULL
       RETURNING ${GRANT_COLUMNS}`,
      [id, level],
    );
    return mapGrantRow(firstRow(result.rows));
  }

  async softDelete(tx: unknown, id: string): Promise<void> {
    await sqlClient(tx).query(
      `UPDATE account_shares SET deleted_at = NOW(), updated_at = NOW() WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
  }

  async softDeleteByAccount(tx: unknown, accountId: string): Promise<number> {
    const result = await sqlClient(tx).query(
      `UPDATE account_shares SET deleted_at = NOW(), updated_at = NOW()
       WHERE account_id = $1 AND deleted_at IS NULL`,
      [accountId],
    );
    return result.rowCount ?? 0;
  }
}

function mapGrantRow(row: GrantRow): PermissionGrant {
  return {
    id: row.id,
    accountId: row.account_id,
    userId: row.user_id,
    level: row.level,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}
