import { type User, type UserProfilePatch, type UserRepository } from '@emerald/domain';
import { sqlClient } from '../client';
import { translateUniqueViolation } from '../errors';

type UserRow = {
  id: string;
  email: string;
  username: string;
  password_hash: string;
  full_name: string | null;
  is_admin: boolean;
  last_login_at: Date | null;
  created_at: Date;
  updated_at: Date;
  deleted_at: Date | null;
};

const USER_COLUMNS = `id, email, username, password_hash, full_name, is_admin, last_login_at,
  created_at, updated_at, deleted_at`;

export class PgUserRepository implements UserRepository {
  async create(
    tx: unknown,
    user: { id: string; email: string; username: string; passwordHash: string; fullName: string | null },
  ): Promise<User> {
    const result = await sqlClient(tx)
      .query<UserRow>(
        `INSERT INTO users (id, email, username, password_hash, full_name)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [user.id, user.email, user.username, user.passwordHash, user.fullName],
      )
      .catch(translateUniqueViolation);
    return mapUserRow(firstRow(result.rows));
  }

  async findById(tx: unknown, id: string): Promise<User | null> {
    const result = await sqlClient(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByEmail(tx: unknown, email: string): Promise<User | null> {
    const result = await sqlClient(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1 AND deleted_at IS NULL`,
      [email],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  // Uniqueness spans soft-deleted rows too, matching the table's unique indexes.
  async emailExists(tx: unknown, email: string): Promise<boolean> {
    const result = await sqlClient(tx).query('SELECT 1 FROM users WHERE email = $1', [email]);
    return result.rows.length > 0;
  }

  async usernameExists(tx: unknown, username: string): Promise<boolean> {
    const result = await sqlClient(tx).query('SELECT 1 FROM users WHERE LOWER(username) = LOWER($1)', [username]);
    return result.rows.length > 0;
  }

  async updatePassword(tx: unknown, id: string, passwordHash: string): Promise<void> {
    await sqlClient(tx).query(
      `UPDATE users SET password_hash = $2, updated_at = NOW() WHERE id = $1 AND deleted_at IS NULL`,
      [id, passwordHash],
    );
  }

  async updateLastLogin(tx: unknown, id: string, at: Date): Promise<void> {
    await sqlClient(tx).query(`UPDATE users SET last_login_at = $2 WHERE id = $1`, [id, at]);
  }

  async updateProfile(tx: unknown, id: string, patch: UserProfilePatch): Promise<User> {
    const sets: string[] = [];
    const values: unknown[] = [id];
    if (patch.email !== undefined) {
      values.push(patch.email);
      sets.push(`email = $${values.length}`);
    }
    if (patch.username !== undefined) {
      values.push(patch.username);
      sets.push(`username = $${values.length}`);
    }
    if (patch.fullName !== undefined) {
      values.push(patch.fullName);
      sets.push(`full_name = $${values.length}`);
    }
    sets.push('updated_at = NOW()');

    const result = await sqlClient(tx)
      .query<UserRow>(
        `UPDATE users SET ${sets.join(', ')}
         WHERE id = $1 AND deleted_at IS NULL
         RETURNING ${USER_COLUMNS}`,
        values,
      )
      .catch(translateUniqueViolation);
    return mapUserRow(firstRow(result.rows));
  }

  async softDelete(tx: unknown, id: string): Promise<void> {
    await sqlClient(tx).query(
      `UPDATE users SET deleted_at = NOW(), updated_at = NOW() WHERE id = $1 AND deleted_at IS NULL`,
      [id],
    );
  }
}

export function firstRow<T>(rows: T[]): T {
  const row = rows[0];
  if (!row) throw new Error('Expected the statement to return a row');
  return row;
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    isAdmin: row.is_admin,
    lastLoginAt: row.last_login_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}
