import { randomUUID } from 'node:crypto';
import type Redis from 'ioredis';
import {
  createLogger,
  JoseTokenService,
  Argon2PasswordHasher,
  RedisRateLimiter,
  type ApiConfig,
} from '@emerald/shared';
import {
  AccountService,
  AuditService,
  AuthService,
  PermissionResolver,
  SharingService,
  TokenLedger,
  UserService,
} from '@emerald/domain';
import {
  withTransaction,
  PgUserRepository,
  PgAccountRepository,
  PgPermissionGrantRepository,
  PgRefreshTokenRepository,
  PgAuditLogRepository,
} from '@emerald/db';
import { type ServerDeps } from './server';

/** Builds the production object graph: Postgres repositories, Redis rate limiting, JWT and Argon2. */
export function createServices(config: ApiConfig, redis: Redis): ServerDeps {
  const generateId = () => randomUUID();

  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    accessTokenTtlMinutes: config.ACCESS_TOKEN_TTL_MINUTES,
    issuer: config.JWT_ISSUER,
  });
  const passwordHasher = new Argon2PasswordHasher({
    timeCost: config.ARGON2_TIME_COST,
    memoryCost: config.ARGON2_MEMORY_COST,
    parallelism: config.ARGON2_PARALLELISM,
  });
  const rateLimiter = new RedisRateLimiter(redis);

  const userRepo = new PgUserRepository();
  const accountRepo = new PgAccountRepository();
  const grantRepo = new PgPermissionGrantRepository();

  const resolver = new PermissionResolver({ accountRepo, grantRepo });
  const audit = new AuditService({
    auditRepo: new PgAuditLogRepository(),
    userRepo,
    logger: createLogger({ name: 'audit' }),
    generateId,
    withTransaction,
  });
  const ledger = new TokenLedger({
    refreshTokenRepo: new PgRefreshTokenRepository(),
    tokenService,
    logger: createLogger({ name: 'token-ledger' }),
    generateId,
    refreshTokenTtlDays: config.REFRESH_TOKEN_TTL_DAYS,
  });

  const authService = new AuthService({
    userRepo,
    ledger,
    audit,
    passwordHasher,
    tokenService,
    rateLimiter,
    rateLimits: {
      enabled: config.RATE_LIMIT_ENABLED,
      login: config.RATE_LIMIT_LOGIN,
      register: config.RATE_LIMIT_REGISTER,
      passwordChange: config.RATE_LIMIT_PASSWORD_CHANGE,
      tokenRefresh: config.RATE_LIMIT_TOKEN_REFRESH,
    },
    logger: createLogger({ name: 'auth' }),
    generateId,
    withTransaction,
  });

  const sharingService = new SharingService({
    grantRepo,
    userRepo,
    resolver,
    audit,
    logger: createLogger({ name: 'sharing' }),
    generateId,
    withTransaction,
  });

  const accountService = new AccountService({
    accountRepo,
    grantRepo,
    resolver,
    audit,
    generateId,
    withTransaction,
  });

  const userService = new UserService({
    userRepo,
    ledger,
    audit,
    logger: createLogger({ name: 'users' }),
    withTransaction,
  });

  return {
    authService,
    accountService,
    sharingService,
    userService,
    auditService: audit,
    tokenService,
    rateLimiter,
  };
}
