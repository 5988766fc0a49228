import { z } from 'zod';
import { type RateLimitRule } from '@emerald/domain';

const WINDOW_UNITS = {
  second: 1,
  minute: 60,
  hour: 3600,
  day: 86_400,
} as const;

/**
 * Parses rules written as `<count>/<unit>` or `<count>/<n><unit>`,
 * e.g. `100/minute` or `5/15minute`.
 */
export function parseRateLimitRule(value: string): RateLimitRule | null {
  const match = /^(\d+)\/(\d*)(second|minute|hour|day)s?$/.exec(value.trim());
  if (!match) return null;
  const limit = Number(match[1]);
  const multiplier = match[2] ? Number(match[2]) : 1;
  const unit = match[3];
  if (limit < 1 || multiplier < 1) return null;
  if (unit !== 'second' && unit !== 'minute' && unit !== 'hour' && unit !== 'day') return null;
  return { limit, windowSeconds: multiplier * WINDOW_UNITS[unit] };
}

export const RateLimitRuleSchema = z.string().transform((value, ctx): RateLimitRule => {
  const rule = parseRateLimitRule(value);
  if (!rule) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid rate limit rule '${value}' (expected e.g. 5/15minute)`,
    });
    return z.NEVER;
  }
  return rule;
});

const BooleanFlagSchema = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const JwtKeySchema = z.object({
  kid: z.string().min(1),
  secret: z.string().min(32, 'JWT secrets must be at least 32 characters'),
});

const JwtKeysSchema = z.string().transform((value, ctx) => {
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be a JSON array' });
    return z.NEVER;
  }
  const parsed = z.array(JwtKeySchema).min(1).safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
    }
    return z.NEVER;
  }
  return parsed.data;
});

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
});

export const RedisConfigSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
});

export const AuthConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: JwtKeysSchema,
  JWT_ISSUER: z.string().default('emerald-finance'),
  ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().min(1).max(1440).default(15),
  REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().min(1).max(30).default(7),
  ARGON2_TIME_COST: z.coerce.number().int().min(1).max(10).default(2),
  ARGON2_MEMORY_COST: z.coerce.number().int().min(8192).default(65536),
  ARGON2_PARALLELISM: z.coerce.number().int().min(1).max(16).default(4),
});

export const RateLimitConfigSchema = z.object({
  RATE_LIMIT_ENABLED: BooleanFlagSchema.default('true'),
  RATE_LIMIT_LOGIN: RateLimitRuleSchema.default('5/15minute'),
  RATE_LIMIT_REGISTER: RateLimitRuleSchema.default('3/hour'),
  RATE_LIMIT_PASSWORD_CHANGE: RateLimitRuleSchema.default('3/hour'),
  RATE_LIMIT_TOKEN_REFRESH: RateLimitRuleSchema.default('10/hour'),
  RATE_LIMIT_API: RateLimitRuleSchema.default('100/minute'),
});

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(RedisConfigSchema)
  .merge(AuthConfigSchema)
  .merge(RateLimitConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(8000),
    TRUST_PROXY: BooleanFlagSchema.default('false'),
  })
  .refine((config) => config.JWT_KEYS.some((key) => key.kid === config.JWT_ACTIVE_KID), {
    message: 'JWT_ACTIVE_KID must match one of JWT_KEYS',
    path: ['JWT_ACTIVE_KID'],
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const WorkerConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema).extend({
  AUDIT_LOG_RETENTION_DAYS: z.coerce.number().int().min(1).default(2555),
  REFRESH_TOKEN_RETENTION_DAYS: z.coerce.number().int().min(1).default(30),
  RETENTION_INTERVAL_MS: z.coerce.number().int().min(1000).default(3_600_000),
  WORKER_HEALTHCHECK_PATH: z.string().default('/tmp/.worker-healthy'),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
