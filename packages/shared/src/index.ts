export { createLogger, redact, isSensitiveKey, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  parseRateLimitRule,
  type BaseConfig,
  type ApiConfig,
  type WorkerConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  RedisConfigSchema,
  AuthConfigSchema,
  RateLimitConfigSchema,
  RateLimitRuleSchema,
  ApiConfigSchema,
  WorkerConfigSchema,
} from './config';
export { touchHealthFile, startHealthBeat } from './healthcheck';
export { Argon2PasswordHasher, DEFAULT_ARGON2_OPTIONS, type Argon2Options } from './auth/password-hasher';
export { JoseTokenService, type TokenServiceConfig } from './auth/token-service';
export { RedisRateLimiter, InMemoryRateLimiter } from './rate-limiter';
export { initRedis, closeRedis } from './redis';
