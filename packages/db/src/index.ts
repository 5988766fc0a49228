export { initPool, closePool, getPool, withTransaction, sqlClient, type SqlClient } from './client';
export { applyMigrations, runMigrations, MIGRATIONS_DIR } from './migrator';
export { PgUserRepository } from './repositories/user-repository';
export { PgAccountRepository } from './repositories/account-repository';
export { PgPermissionGrantRepository } from './repositories/permission-grant-repository';
export { PgRefreshTokenRepository } from './repositories/refresh-token-repository';
export { PgAuditLogRepository } from './repositories/audit-log-repository';
