import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Pool } from 'pg';
import { createLogger } from '@emerald/shared';
import { sqlClient } from './client';

const logger = createLogger({ name: 'db:migrate' });

export const MIGRATIONS_DIR = join(__dirname, '..', 'migrations');

/** Applies every `.sql` file in `dir` not yet listed in `_migrations`, each in its own transaction. */
export async function applyMigrations(connection: unknown, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const client = sqlClient(connection);
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name VARCHAR(255) PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await client.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name');
  const appliedSet = new Set(applied.rows.map((r) => r.name));

  const files = (await readdir(dir)).filter((f) => f.endsWith('.sql')).sort();
  const newlyApplied: string[] = [];

  for (const file of files) {
    if (appliedSet.has(file)) continue;

    const sql = await readFile(join(dir, file), 'utf-8');

    await client.query('BEGIN');
    try {
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [file]);
      await client.query('COMMIT');
      logger.info({ migration: file }, 'Migration applied');
      newlyApplied.push(file);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
  }

  return newlyApplied;
}

/** Opens a dedicated connection, applies pending migrations and closes it again. */
export async function runMigrations(databaseUrl: string): Promise<string[]> {
  const pool = new Pool({ connectionString: databaseUrl });
  const client = await pool.connect();
  try {
    const applied = await applyMigrations(client);
    logger.info({ count: applied.length }, 'All migrations applied');
    return applied;
  } finally {
    client.release();
    await pool.end();
  }
}
