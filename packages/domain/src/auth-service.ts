import { type PublicUser, toPublicUser } from './user';
import { type RequestContext } from './audit';
import { normalizeEmail } from './auth';
import {
  TokenDecodeError,
  UniqueViolationError,
  type Logger,
  type PasswordHasher,
  type RateLimiter,
  type RateLimitRule,
  type TokenClaims,
  type TokenService,
  type TransactionRunner,
  type UserRepository,
} from './ports';
import { TokenError, type TokenLedger } from './token-ledger';
import { type AuditService } from './audit-service';

export interface AuthRateLimits {
  enabled: boolean;
  login: RateLimitRule;
  register: RateLimitRule;
  passwordChange: RateLimitRule;
  tokenRefresh: RateLimitRule;
}

type ThrottledOperation = 'login' | 'register' | 'password_change' | 'token_refresh';

export interface AuthServiceDeps {
  userRepo: UserRepository;
  ledger: TokenLedger;
  audit: AuditService;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  rateLimiter: RateLimiter;
  rateLimits: AuthRateLimits;
  logger: Logger;
  generateId: () => string;
  withTransaction: TransactionRunner;
}

export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresAt: Date;
}

export interface AuthResult {
  user: PublicUser;
  tokens: AuthTokens;
}

export interface SessionInfo {
  id: string;
  familyId: string;
  createdAt: Date;
  expiresAt: Date;
}

/** Failures that must leave an audit row behind are returned, committed, then thrown. */
type Outcome<T> = { ok: true; value: T } | { ok: false; error: AuthError };

const INVALID_CREDENTIALS = 'Invalid credentials';

const PLACEHOLDER_PASSWORD = 'placeholder-password-never-issued';

export class AuthService {
  private placeholder: string | null = null;

  constructor(private readonly deps: AuthServiceDeps) {}

  async register(
    input: { email: string; username: string; password: string; fullName?: string | null },
    ctx: RequestContext = {},
  ): Promise<AuthResult> {
    const { userRepo, audit, passwordHasher, generateId, logger } = this.deps;
    await this.throttle('register', ctx);
    const email = normalizeEmail(input.email);

    const result = await this.deps.withTransaction(async (tx) => {
      if (await userRepo.emailExists(tx, email)) {
        throw new AuthError('CONFLICT', 'Email is already registered');
      }
      if (await userRepo.usernameExists(tx, input.username)) {
        throw new AuthError('CONFLICT', 'Username is already taken');
      }

      const passwordHash = await passwordHasher.hash(input.password);
      const user = await userRepo
        .create(tx, {
          id: generateId(),
          email,
          username: input.username,
          passwordHash,
          fullName: input.fullName ?? null,
        })
        .catch((err: unknown) => {
          // A concurrent registration can win the race past the checks above.
          if (err instanceof UniqueViolationError) {
            throw new AuthError('CONFLICT', 'Email or username is already registered');
          }
          throw err;
        });

      const tokens = await this.issueTokens(tx, user.id, user.email, user.isAdmin);
      await audit.record(tx, {
        userId: user.id,
        action: 'CREATE',
        entityType: 'user',
        entityId: user.id,
        newValues: { email: user.email, username: user.username },
        description: `User ${user.username} registered`,
        context: ctx,
      });
      return { user: toPublicUser(user), tokens };
    });

    logger.info({ userId: result.user.id }, 'User registered');
    return result;
  }

  async login(input: { email: string; password: string }, ctx: RequestContext = {}): Promise<AuthResult> {
    const { userRepo, audit, passwordHasher, logger } = this.deps;
    await this.throttle('login', ctx);
    const email = normalizeEmail(input.email);

    const outcome = await this.deps.withTransaction(async (tx): Promise<Outcome<AuthResult>> => {
      const user = await userRepo.findByEmail(tx, email);
      // Unknown emails still pay for a verify so timing does not reveal which accounts exist.
      const passwordHash = user ? user.passwordHash : await this.placeholderHash();
      const valid = await passwordHasher.verify(input.password, passwordHash);

      if (!user || !valid) {
        await audit.recordLogin(tx, {
          userId: null,
          success: false,
          description: `Login attempt failed for ${email}`,
          errorMessage: INVALID_CREDENTIALS,
          context: ctx,
        });
        return { ok: false, error: new AuthError('INVALID_CREDENTIALS', INVALID_CREDENTIALS) };
      }

      const now = new Date();
      await userRepo.updateLastLogin(tx, user.id, now);
      const tokens = await this.issueTokens(tx, user.id, user.email, user.isAdmin);
      await audit.recordLogin(tx, { userId: user.id, success: true, context: ctx });
      return { ok: true, value: { user: toPublicUser(user), tokens } };
    });

    if (!outcome.ok) {
      logger.warn({ correlationId: ctx.correlationId }, 'Login failed');
      throw outcome.error;
    }
    logger.info({ userId: outcome.value.user.id }, 'User logged in');
    return outcome.value;
  }

  async refresh(refreshToken: string, ctx: RequestContext = {}): Promise<AuthTokens> {
    const { userRepo, ledger, audit, logger } = this.deps;
    await this.throttle('token_refresh', ctx);

    const claims = await this.decodeRefreshToken(refreshToken);
    if (!claims.ok) {
      await this.deps.withTransaction((tx) =>
        audit.recordTokenRefresh(tx, {
          userId: null,
          success: false,
          errorMessage: claims.error.message,
          context: ctx,
        }),
      );
      throw claims.error;
    }
    const subject = claims.value.subject;

    const outcome = await this.deps.withTransaction(async (tx): Promise<Outcome<AuthTokens>> => {
      const fail = async (error: AuthError, reason: string): Promise<Outcome<AuthTokens>> => {
        await audit.recordTokenRefresh(tx, { userId: subject, success: false, errorMessage: reason, context: ctx });
        return { ok: false, error };
      };

      const rotated = await ledger.rotate(tx, refreshToken).catch((err: unknown) => {
        if (err instanceof TokenError) return err;
        throw err;
      });
      if (rotated instanceof TokenError) {
        const error =
          rotated.kind === 'COMPROMISED'
            ? new AuthError('TOKEN_COMPROMISED', rotated.message)
            : new AuthError('INVALID_TOKEN', rotated.message);
        return fail(error, rotated.message);
      }

      const user = await userRepo.findById(tx, rotated.userId);
      if (!user) {
        await ledger.revokeFamily(tx, rotated.record.familyId);
        return fail(new AuthError('INVALID_TOKEN', 'User is no longer active'), 'User is no longer active');
      }

      const access = await this.deps.tokenService.signAccessToken({
        userId: user.id,
        email: user.email,
        isAdmin: user.isAdmin,
      });
      await audit.recordTokenRefresh(tx, { userId: user.id, success: true, context: ctx });
      return {
        ok: true,
        value: {
          accessToken: access.token,
          refreshToken: rotated.secret,
          tokenType: 'bearer',
          expiresAt: access.expiresAt,
        },
      };
    });

    if (!outcome.ok) {
      logger.warn({ userId: subject, kind: outcome.error.kind }, 'Token refresh failed');
      throw outcome.error;
    }
    return outcome.value;
  }

  /** Revokes only the presented session; other devices stay signed in. */
  async logout(refreshToken: string, ctx: RequestContext = {}): Promise<void> {
    const { ledger, audit, logger } = this.deps;

    const claims = await this.decodeRefreshToken(refreshToken);
    if (!claims.ok) throw claims.error;

    await this.deps.withTransaction(async (tx) => {
      const record = await ledger.findBySecret(tx, refreshToken);
      if (!record || record.userId !== claims.value.subject) {
        throw new AuthError('INVALID_TOKEN', 'Refresh token not recognised');
      }
      await ledger.revokeOne(tx, record.id);
      await audit.recordLogout(tx, { userId: record.userId, context: ctx });
    });

    logger.info({ userId: claims.value.subject }, 'User logged out');
  }

  async changePassword(
    userId: string,
    input: { currentPassword: string; newPassword: string },
    ctx: RequestContext = {},
  ): Promise<{ revokedSessions: number }> {
    const { userRepo, ledger, audit, passwordHasher, logger } = this.deps;
    await this.throttle('password_change', ctx, userId);

    if (input.currentPassword === input.newPassword) {
      throw new AuthError('VALIDATION', 'New password must differ from the current password');
    }

    const outcome = await this.deps.withTransaction(async (tx): Promise<Outcome<{ revokedSessions: number }>> => {
      const user = await userRepo.findById(tx, userId);
      if (!user) {
        throw new AuthError('NOT_FOUND', 'User not found');
      }

      const valid = await passwordHasher.verify(input.currentPassword, user.passwordHash);
      if (!valid) {
        await audit.recordPasswordChange(tx, {
          userId,
          success: false,
          errorMessage: 'Current password is incorrect',
          context: ctx,
        });
        return { ok: false, error: new AuthError('INVALID_CREDENTIALS', INVALID_CREDENTIALS) };
      }

      const passwordHash = await passwordHasher.hash(input.newPassword);
      await userRepo.updatePassword(tx, userId, passwordHash);
      const revokedSessions = await ledger.revokeAllForUser(tx, userId);
      await audit.recordPasswordChange(tx, {
        userId,
        success: true,
        extraMetadata: { revokedSessions },
        context: ctx,
      });
      return { ok: true, value: { revokedSessions } };
    });

    if (!outcome.ok) {
      logger.warn({ userId }, 'Password change rejected');
      throw outcome.error;
    }
    logger.info({ userId, revokedSessions: outcome.value.revokedSessions }, 'Password changed');
    return outcome.value;
  }

  async getMe(userId: string): Promise<PublicUser> {
    return this.deps.withTransaction(async (tx) => {
      const user = await this.deps.userRepo.findById(tx, userId);
      if (!user) {
        throw new AuthError('NOT_FOUND', 'User not found');
      }
      return toPublicUser(user);
    });
  }

  async listSessions(userId: string): Promise<SessionInfo[]> {
    const records = await this.deps.withTransaction((tx) => this.deps.ledger.listActiveSessions(tx, userId));
    return records.map((record) => ({
      id: record.id,
      familyId: record.familyId,
      createdAt: record.createdAt,
      expiresAt: record.expiresAt,
    }));
  }

  private async issueTokens(tx: unknown, userId: string, email: string, isAdmin: boolean): Promise<AuthTokens> {
    const access = await this.deps.tokenService.signAccessToken({ userId, email, isAdmin });
    const refresh = await this.deps.ledger.issue(tx, userId);
    return {
      accessToken: access.token,
      refreshToken: refresh.secret,
      tokenType: 'bearer',
      expiresAt: access.expiresAt,
    };
  }

  private async placeholderHash(): Promise<string> {
    if (this.placeholder === null) {
      this.placeholder = await this.deps.passwordHasher.hash(PLACEHOLDER_PASSWORD);
    }
    return this.placeholder;
  }

  private async decodeRefreshToken(token: string): Promise<Outcome<TokenClaims>> {
    let claims: TokenClaims;
    try {
      claims = await this.deps.tokenService.decodeToken(token);
    } catch (err) {
      if (err instanceof TokenDecodeError) {
        return { ok: false, error: new AuthError('INVALID_TOKEN', err.message) };
      }
      throw err;
    }
    if (claims.type !== 'refresh') {
      return { ok: false, error: new AuthError('INVALID_TOKEN', 'Expected a refresh token') };
    }
    return { ok: true, value: claims };
  }

  private async throttle(operation: ThrottledOperation, ctx: RequestContext, userId: string | null = null): Promise<void> {
    const { rateLimits, rateLimiter, audit, logger } = this.deps;
    if (!rateLimits.enabled || !ctx.clientIp) return;

    const rule = RULE_FOR[operation](rateLimits);
    const decision = await rateLimiter.consume(`auth:${operation}:${ctx.clientIp}`, rule);
    if (decision.allowed) return;

    await this.deps.withTransaction((tx) =>
      audit.record(tx, {
        userId,
        action: 'RATE_LIMIT_EXCEEDED',
        entityType: 'user',
        entityId: userId,
        description: `Rate limit exceeded for ${operation}`,
        status: 'FAILURE',
        errorMessage: 'Rate limit exceeded',
        extraMetadata: { operation, retryAfterSeconds: decision.retryAfterSeconds },
        context: ctx,
      }),
    );
    logger.warn({ operation, userId, retryAfterSeconds: decision.retryAfterSeconds }, 'Auth rate limit exceeded');
    throw new AuthError('RATE_LIMITED', 'Too many attempts, please try again later', decision.retryAfterSeconds);
  }
}

const RULE_FOR: Record<ThrottledOperation, (limits: AuthRateLimits) => RateLimitRule> = {
  login: (limits) => limits.login,
  register: (limits) => limits.register,
  password_change: (limits) => limits.passwordChange,
  token_refresh: (limits) => limits.tokenRefresh,
};

export type AuthErrorKind =
  | 'INVALID_CREDENTIALS'
  | 'INVALID_TOKEN'
  | 'TOKEN_COMPROMISED'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'VALIDATION'
  | 'RATE_LIMITED';

export class AuthError extends Error {
  constructor(
    public readonly kind: AuthErrorKind,
    message: string,
    public readonly retryAfterSeconds: number | null = null,
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
