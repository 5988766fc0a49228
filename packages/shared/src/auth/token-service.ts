import { SignJWT, jwtVerify, errors as joseErrors, type JWTPayload, type JWTHeaderParameters } from 'jose';
import { randomUUID, createHash } from 'node:crypto';
import { TokenDecodeError, type TokenClaims, type TokenService, type TokenType } from '@emerald/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtlMinutes: number;
  issuer?: string;
}

const TOKEN_TYPES: readonly TokenType[] = ['access', 'refresh'];

function isTokenType(value: unknown): value is TokenType {
  return TOKEN_TYPES.some((type) => type === value);
}

/**
 * HS256 JWTs for both token kinds. Refresh tokens carry the session family in `fam`
 * and a random `jti`, so every minted refresh secret (and its hash) is unique.
 */
export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtlMinutes: number;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtlMinutes = config.accessTokenTtlMinutes;
    this.issuer = config.issuer ?? 'emerald-finance';
  }

  async signAccessToken(claims: {
    userId: string;
    email: string;
    isAdmin: boolean;
  }): Promise<{ token: string; expiresAt: Date }> {
    const expiresAt = new Date(Date.now() + this.accessTokenTtlMinutes * 60_000);
    const token = await new SignJWT({ type: 'access', email: claims.email, is_admin: claims.isAdmin })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setSubject(claims.userId)
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setExpirationTime(Math.floor(expiresAt.getTime() / 1000))
      .sign(this.activeKey.secret);
    return { token, expiresAt };
  }

  async signRefreshToken(claims: { userId: string; familyId: string; expiresAt: Date }): Promise<string> {
    return new SignJWT({ type: 'refresh', fam: claims.familyId })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setSubject(claims.userId)
      .setJti(randomUUID())
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setExpirationTime(Math.floor(claims.expiresAt.getTime() / 1000))
      .sign(this.activeKey.secret);
  }

  async decodeToken(token: string): Promise<TokenClaims> {
    let payload: JWTPayload;
    try {
      const result = await jwtVerify(token, (header) => this.resolveKey(header), {
        issuer: this.issuer,
        algorithms: ['HS256'],
      });
      payload = result.payload;
    } catch (err) {
      if (err instanceof TokenDecodeError) throw err;
      if (err instanceof joseErrors.JWTExpired) {
        throw new TokenDecodeError('Token has expired');
      }
      throw new TokenDecodeError('Token could not be verified');
    }

    const { sub, exp } = payload;
    const type = payload['type'];
    const familyId = payload['fam'];
    if (!sub || exp === undefined) {
      throw new TokenDecodeError('Token is missing required claims');
    }
    if (!isTokenType(type)) {
      throw new TokenDecodeError('Token has an unknown type');
    }
    if (type === 'refresh' && typeof familyId !== 'string') {
      throw new TokenDecodeError('Refresh token is missing its family');
    }

    return {
      subject: sub,
      type,
      familyId: typeof familyId === 'string' ? familyId : null,
      expiresAt: new Date(exp * 1000),
    };
  }

  hashToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }

  private resolveKey(header: JWTHeaderParameters): Uint8Array {
    const key = header.kid ? this.keys.get(header.kid) : undefined;
    if (!key) {
      throw new TokenDecodeError('Token was signed with an unknown key');
    }
    return key.secret;
  }
}
