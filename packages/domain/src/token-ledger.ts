import { type RefreshTokenRecord } from './user';
import { type Logger, type RefreshTokenRepository, type TokenService } from './ports';
import { isTokenExpired } from './auth';

export interface TokenLedgerDeps {
  refreshTokenRepo: RefreshTokenRepository;
  tokenService: TokenService;
  logger: Logger;
  generateId: () => string;
  refreshTokenTtlDays: number;
}

export interface IssuedToken {
  secret: string;
  record: RefreshTokenRecord;
}

export interface RotatedToken extends IssuedToken {
  userId: string;
}

/**
 * Refresh-token records and their family state machine. Only the hash of a
 * secret is stored. Presenting a revoked secret revokes its whole family.
 *
 * Every method runs on the caller's transaction; a family revocation followed by
 * a thrown `TokenError` only persists if the caller commits before rethrowing.
 */
export class TokenLedger {
  constructor(private readonly deps: TokenLedgerDeps) {}

  async issue(tx: unknown, userId: string, familyId?: string): Promise<IssuedToken> {
    const { refreshTokenRepo, tokenService, generateId } = this.deps;
    const family = familyId ?? generateId();
    const expiresAt = this.expiry();

    const secret = await tokenService.signRefreshToken({ userId, familyId: family, expiresAt });
    const record = await refreshTokenRepo.create(tx, {
      id: generateId(),
      userId,
      tokenHash: tokenService.hashToken(secret),
      familyId: family,
      expiresAt,
    });
    return { secret, record };
  }

  async rotate(tx: unknown, secret: string): Promise<RotatedToken> {
    const { refreshTokenRepo, tokenService, logger } = this.deps;

    const stored = await refreshTokenRepo.findByTokenHash(tx, tokenService.hashToken(secret));
    if (!stored) {
      throw new TokenError('INVALID', 'Refresh token not recognised');
    }

    if (stored.revokedAt) {
      await this.compromise(tx, stored, 'revoked token presented');
    }

    if (isTokenExpired(stored.expiresAt)) {
      throw new TokenError('EXPIRED', 'Refresh token has expired');
    }

    // Guarded update: a concurrent rotation that already flipped the row leaves 0 here.
    const flipped = await refreshTokenRepo.revoke(tx, stored.id);
    if (flipped === 0) {
      await this.compromise(tx, stored, 'concurrent rotation lost the race');
    }

    const next = await this.issue(tx, stored.userId, stored.familyId);
    logger.debug({ userId: stored.userId, familyId: stored.familyId }, 'Refresh token rotated');
    return { userId: stored.userId, ...next };
  }

  async findBySecret(tx: unknown, secret: string): Promise<RefreshTokenRecord | null> {
    return this.deps.refreshTokenRepo.findByTokenHash(tx, this.deps.tokenService.hashToken(secret));
  }

  async revokeOne(tx: unknown, recordId: string): Promise<number> {
    return this.deps.refreshTokenRepo.revoke(tx, recordId);
  }

  async revokeAllForUser(tx: unknown, userId: string): Promise<number> {
    return this.deps.refreshTokenRepo.revokeAllForUser(tx, userId);
  }

  async revokeFamily(tx: unknown, familyId: string): Promise<number> {
    return this.deps.refreshTokenRepo.revokeFamily(tx, familyId);
  }

  async listActiveSessions(tx: unknown, userId: string): Promise<RefreshTokenRecord[]> {
    const records = await this.deps.refreshTokenRepo.listActiveForUser(tx, userId);
    const now = new Date();
    return records.filter((record) => record.revokedAt === null && !isTokenExpired(record.expiresAt, now));
  }

  private async compromise(tx: unknown, stored: RefreshTokenRecord, cause: string): Promise<never> {
    const revoked = await this.deps.refreshTokenRepo.revokeFamily(tx, stored.familyId);
    this.deps.logger.warn(
      { userId: stored.userId, familyId: stored.familyId, revoked, cause },
      'Refresh token reuse detected, family revoked',
    );
    throw new TokenError('COMPROMISED', 'Refresh token reuse detected');
  }

  private expiry(): Date {
    return new Date(Date.now() + this.deps.refreshTokenTtlDays * 24 * 60 * 60 * 1000);
  }
}

export class TokenError extends Error {
  constructor(
    public readonly kind: 'INVALID' | 'EXPIRED' | 'COMPROMISED',
    message: string,
  ) {
    super(message);
    this.name = 'TokenError';
  }
}
