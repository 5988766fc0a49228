import { createLogger } from '@emerald/shared';
import { runMigrations } from './migrator';

const logger = createLogger({ name: 'db:migrate' });

const databaseUrl = process.env.DATABASE_URL;
if (!databaseUrl) {
  logger.fatal({}, 'DATABASE_URL environment variable is required');
  process.exit(1);
}

runMigrations(databaseUrl).catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Migration failed');
  process.exit(1);
});
