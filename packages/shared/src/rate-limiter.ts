import type Redis from 'ioredis';
import { type RateLimiter, type RateLimitDecision, type RateLimitRule } from '@emerald/domain';

const KEY_PREFIX = 'ratelimit:';

/**
 * Fixed-window counter shared by every API instance. The first hit in a window
 * creates the key with the window as its TTL.
 */
export class RedisRateLimiter implements RateLimiter {
  constructor(private readonly redis: Redis) {}

  async consume(key: string, rule: RateLimitRule): Promise<RateLimitDecision> {
    const redisKey = KEY_PREFIX + key;
    const results = await this.redis
      .multi()
      .incr(redisKey)
      .expire(redisKey, rule.windowSeconds, 'NX')
      .ttl(redisKey)
      .exec();
    if (!results) {
      throw new Error('Rate limit transaction was aborted');
    }

    const [countResult, , ttlResult] = results;
    const count = Number(countResult?.[1] ?? 0);
    const ttl = Number(ttlResult?.[1] ?? rule.windowSeconds);
    return decide(count, rule, ttl > 0 ? ttl : rule.windowSeconds);
  }
}

export class InMemoryRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, { count: number; resetAt: number }>();

  async consume(key: string, rule: RateLimitRule): Promise<RateLimitDecision> {
    const now = Date.now();
    let window = this.windows.get(key);
    if (!window || now >= window.resetAt) {
      window = { count: 0, resetAt: now + rule.windowSeconds * 1000 };
      this.windows.set(key, window);
    }
    window.count++;
    return decide(window.count, rule, Math.ceil((window.resetAt - now) / 1000));
  }

  reset(): void {
    this.windows.clear();
  }
}

function decide(count: number, rule: RateLimitRule, secondsLeft: number): RateLimitDecision {
  const allowed = count <= rule.limit;
  return {
    allowed,
    remaining: Math.max(rule.limit - count, 0),
    retryAfterSeconds: allowed ? 0 : secondsLeft,
  };
}
