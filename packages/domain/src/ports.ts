import { type User, type RefreshTokenRecord } from './user';
import { type Account, type AccessibleAccount, type PermissionGrant, type PermissionLevel } from './account';
import { type AuditEvent, type AuditFilters, type NewAuditEvent, type Page, type Pagination } from './audit';

export type TransactionRunner = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export interface UserRepository {
  create(
    tx: unknown,
    user: { id: string; email: string; username: string; passwordHash: string; fullName: string | null },
  ): Promise<User>;
  findById(tx: unknown, id: string): Promise<User | null>;
  findByEmail(tx: unknown, email: string): Promise<User | null>;
  emailExists(tx: unknown, email: string): Promise<boolean>;
  usernameExists(tx: unknown, username: string): Promise<boolean>;
  updatePassword(tx: unknown, id: string, passwordHash: string): Promise<void>;
  updateLastLogin(tx: unknown, id: string, at: Date): Promise<void>;
  updateProfile(tx: unknown, id: string, patch: UserProfilePatch): Promise<User>;
  softDelete(tx: unknown, id: string): Promise<void>;
}

export interface UserProfilePatch {
  email?: string;
  username?: string;
  fullName?: string | null;
}

export interface AccountRepository {
  create(
    tx: unknown,
    account: { id: string; ownerId: string; name: string; currency: string; notes: string | null },
  ): Promise<Account>;
  findById(tx: unknown, id: string): Promise<Account | null>;
  listAccessible(tx: unknown, userId: string): Promise<AccessibleAccount[]>;
  update(
    tx: unknown,
    id: string,
    patch: { name?: string; currency?: string; notes?: string | null },
  ): Promise<Account>;
  softDelete(tx: unknown, id: string): Promise<void>;
}

export interface PermissionGrantRepository {
  create(
    tx: unknown,
    grant: { id: string; accountId: string; userId: string; level: PermissionLevel },
  ): Promise<PermissionGrant>;
  findById(tx: unknown, id: string): Promise<PermissionGrant | null>;
  findActive(tx: unknown, accountId: string, userId: string): Promise<PermissionGrant | null>;
  listActiveByAccount(tx: unknown, accountId: string): Promise<PermissionGrant[]>;
  updateLevel(tx: unknown, id: string, level: PermissionLevel): Promise<PermissionGrant>;
  softDelete(tx: unknown, id: string): Promise<void>;
  softDeleteByAccount(tx: unknown, accountId: string): Promise<number>;
}

export interface RefreshTokenRepository {
  create(
    tx: unknown,
    token: {
      id: string;
      userId: string;
      tokenHash: string;
      familyId: string;
      expiresAt: Date;
    },
  ): Promise<RefreshTokenRecord>;
  findByTokenHash(tx: unknown, hash: string): Promise<RefreshTokenRecord | null>;
  /** Flips a single record to revoked; resolves to 0 when it was already revoked. */
  revoke(tx: unknown, id: string): Promise<number>;
  revokeFamily(tx: unknown, familyId: string): Promise<number>;
  revokeAllForUser(tx: unknown, userId: string): Promise<number>;
  listActiveForUser(tx: unknown, userId: string): Promise<RefreshTokenRecord[]>;
  deleteExpired(tx: unknown, olderThanDays: number): Promise<number>;
}

export interface AuditLogRepository {
  insert(tx: unknown, event: NewAuditEvent): Promise<AuditEvent>;
  list(
    tx: unknown,
    query: { userId?: string; filters: AuditFilters; pagination: Pagination },
  ): Promise<Page<AuditEvent>>;
  deleteOlderThan(tx: unknown, days: number): Promise<number>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export type TokenType = 'access' | 'refresh';

export interface TokenClaims {
  subject: string;
  type: TokenType;
  familyId: string | null;
  expiresAt: Date;
}

export interface TokenService {
  signAccessToken(claims: {
    userId: string;
    email: string;
    isAdmin: boolean;
  }): Promise<{ token: string; expiresAt: Date }>;
  signRefreshToken(claims: { userId: string; familyId: string; expiresAt: Date }): Promise<string>;
  /** Verifies signature and expiry; rejects with `TokenDecodeError` on any failure. */
  decodeToken(token: string): Promise<TokenClaims>;
  hashToken(token: string): string;
}

export class TokenDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenDecodeError';
  }
}

/** Raised by repositories when a write collides with a unique index. */
export class UniqueViolationError extends Error {
  constructor(public readonly constraint: string) {
    super(`Unique constraint ${constraint} violated`);
    this.name = 'UniqueViolationError';
  }
}

export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterSeconds: number;
}

export interface RateLimiter {
  consume(key: string, rule: RateLimitRule): Promise<RateLimitDecision>;
}

/** Structured logger the services write security-relevant branches to. */
export interface Logger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
}
