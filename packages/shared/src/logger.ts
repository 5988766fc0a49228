import pino from 'pino';

const SENSITIVE_KEYS = new Set([
  'password',
  'passwordhash',
  'currentpassword',
  'newpassword',
  'token',
  'accesstoken',
  'refreshtoken',
  'secret',
  'email',
  'ip',
  'clientip',
  'ipaddress',
  'remoteaddress',
  'useragent',
  'authorization',
  'cookie',
  'body',
]);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function redact(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = redact(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isPlainObject(item) ? redact(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(redact(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(redact(meta), msg);
    },
    error(meta, msg) {
      logger.error(redact(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(redact(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(redact(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(redact(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}
