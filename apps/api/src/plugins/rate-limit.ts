import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@emerald/shared';
import { type RateLimiter, type RateLimitRule } from '@emerald/domain';

const logger = createLogger({ name: 'api:rate-limit' });

/**
 * General limit for authenticated routes, keyed by user when the auth
 * pre-handler has run and by client IP otherwise. Auth endpoints are
 * throttled inside the auth service instead.
 */
export function createApiRateLimit(opts: { rateLimiter: RateLimiter; rule: RateLimitRule; enabled: boolean }) {
  return async function apiRateLimit(request: FastifyRequest) {
    if (!opts.enabled) return;

    const subject = request.userId ? `user:${request.userId}` : `ip:${request.ip}`;
    const decision = await opts.rateLimiter.consume(`api:${subject}`, opts.rule);
    if (!decision.allowed) {
      logger.warn({ requestId: request.id, userId: request.userId }, 'Rate limit exceeded');
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later', {
        retryAfterSeconds: decision.retryAfterSeconds,
      });
    }
  };
}
