import { type RefreshTokenRecord, type RefreshTokenRepository } from '@emerald/domain';
import { sqlClient } from '../client';
import { firstRow } from './user-repository';

type RefreshRow = {
  id: string;
  user_id: string;
  token_hash: string;
  family_id: string;
  expires_at: Date;
  revoked_at: Date | null;
  created_at: Date;
};

const REFRESH_COLUMNS = 'id, user_id, token_hash, family_id, expires_at, revoked_at, created_at';

export class PgRefreshTokenRepository implements RefreshTokenRepository {
  async create(
    tx: unknown,
    token: {
      id: string;
      userId: string;
      tokenHash: string;
      familyId: string;
      expiresAt: Date;
    },
  ): Promise<RefreshTokenRecord> {
    const result = await sqlClient(tx).query<RefreshRow>(
      `INSERT INTO refresh_tokens (id, user_id, token_hash, family_id, expires_at)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${REFRESH_COLUMNS}`,
      [token.id, token.userId, token.tokenHash, token.familyId, token.expiresAt],
    );
    return mapRefreshRow(firstRow(result.rows));
  }

  async findByTokenHash(tx: unknown, hash: string): Promise<RefreshTokenRecord | null> {
    const result = await sqlClient(tx).query<RefreshRow>(
      `SELECT ${REFRESH_COLUMNS} FROM refresh_tokens WHERE token_hash = $1`,
      [hash],
    );
    return result.rows[0] ? mapRefreshRow(result.rows[0]) : null;
  }

  /** Only one of two racing rotations can flip the row; the loser sees 0. */
  async revoke(tx: unknown, id: string): Promise<number> {
    const result = await sqlClient(tx).query(
      `UPDATE refresh_tokens SET revoked_at = NOW() WHERE id = $1 AND revoked_at IS NULL`,
      [id],
    );
    return result.rowCount ?? 0;
  }

  async revokeFamily(tx: unknown, familyId: string): Promise<number> {
    const result = await sqlClient(tx).query(
      `UPDATE refresh_tokens SET revoked_at = NOW() WHERE family_id = $1 AND revoked_at IS NULL`,
      [familyId],
    );
    return result.rowCount ?? 0;
  }

  async revokeAllForUser(tx: unknown, userId: string): Promise<number> {
    const result = await sqlClient(tx).query(
      `UPDATE refresh_tokens SET revoked_at = NOW() WHERE user_id = $1 AND revoked_at IS NULL`,
      [userId],
    );
    return result.rowCount ?? 0;
  }

  async listActiveForUser(tx: unknown, userId: string): Promise<RefreshTokenRecord[]> {
    const result = await sqlClient(tx).query<RefreshRow>(
      `SELECT ${REFRESH_COLUMNS} FROM refresh_tokens
       WHERE user_id = $1 AND revoked_at IS NULL AND expires_at > NOW()
       ORDER BY created_at DESC`,
      [userId],
    );
    return result.rows.map(mapRefreshRow);
  }

  async deleteExpired(tx: unknown, olderThanDays: number): Promise<number> {
    const result = await sqlClient(tx).query(
      `DELETE FROM refresh_tokens
       WHERE (expires_at < NOW() - make_interval(days => $1))
          OR (revoked_at IS NOT NULL AND revoked_at < NOW() - make_interval(days => $1))`,
      [olderThanDays],
    );
    return result.rowCount ?? 0;
  }
}

function mapRefreshRow(row: RefreshRow): RefreshTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    familyId: row.family_id,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
    createdAt: row.created_at,
  };
}
