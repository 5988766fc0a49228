import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@emerald/shared';
import { TokenDecodeError, type TokenService } from '@emerald/domain';

declare module 'fastify' {
  interface FastifyRequest {
    userId?: string;
  }
}

export type RequestGuard = (request: FastifyRequest) => Promise<void>;

/** Only access tokens authenticate; a refresh token in the header is rejected like a forged one. */
export function createAuthMiddleware(tokenService: TokenService): RequestGuard {
  return async function authenticate(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing or invalid authorization header');
    }

    const token = header.slice(7);
    try {
      const claims = await tokenService.decodeToken(token);
      if (claims.type !== 'access') {
        throw new TokenDecodeError('Expected an access token');
      }
      request.userId = claims.subject;
    } catch (err) {
      if (err instanceof TokenDecodeError) {
        throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or expired access token');
      }
      throw err;
    }
  };
}

export function requireUserId(request: FastifyRequest): string {
  if (!request.userId) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Authentication required');
  }
  return request.userId;
}
