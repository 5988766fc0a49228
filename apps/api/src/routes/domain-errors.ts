import { AppError, ErrorCode } from '@emerald/shared';
import {
  AccessError,
  AuditError,
  AuthError,
  SharingError,
  TokenError,
  UserError,
  type AuthErrorKind,
} from '@emerald/domain';

const SESSION_REVOKED_MESSAGE = 'Session is no longer valid. Please log in again.';

const AUTH_CODES: Record<AuthErrorKind, ErrorCode> = {
  INVALID_CREDENTIALS: ErrorCode.UNAUTHORIZED,
  INVALID_TOKEN: ErrorCode.UNAUTHORIZED,
  TOKEN_COMPROMISED: ErrorCode.SESSION_REVOKED,
  CONFLICT: ErrorCode.CONFLICT,
  NOT_FOUND: ErrorCode.NOT_FOUND,
  VALIDATION: ErrorCode.VALIDATION,
  RATE_LIMITED: ErrorCode.RATE_LIMITED,
};

/** Translates domain failures into boundary errors; anything unrecognised is rethrown as is. */
export function mapDomainError(err: unknown): never {
  if (err instanceof AuthError) {
    if (err.kind === 'INVALID_CREDENTIALS') {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid credentials');
    }
    if (err.kind === 'TOKEN_COMPROMISED') {
      throw new AppError(ErrorCode.SESSION_REVOKED, SESSION_REVOKED_MESSAGE);
    }
    if (err.kind === 'RATE_LIMITED') {
      throw new AppError(ErrorCode.RATE_LIMITED, err.message, {
        retryAfterSeconds: err.retryAfterSeconds ?? 60,
      });
    }
    throw new AppError(AUTH_CODES[err.kind], err.message);
  }

  if (err instanceof TokenError) {
    if (err.kind === 'COMPROMISED') {
      throw new AppError(ErrorCode.SESSION_REVOKED, SESSION_REVOKED_MESSAGE);
    }
    throw new AppError(ErrorCode.UNAUTHORIZED, err.message);
  }

  if (err instanceof AccessError) {
    if (err.reason === 'NOT_FOUND') {
      throw new AppError(ErrorCode.NOT_FOUND, err.message);
    }
    throw new AppError(ErrorCode.FORBIDDEN, err.message, { requiredLevel: err.required });
  }

  if (err instanceof SharingError) {
    const codeMap = {
      VALIDATION: ErrorCode.VALIDATION,
      NOT_FOUND: ErrorCode.NOT_FOUND,
      CONFLICT: ErrorCode.CONFLICT,
    } as const;
    throw new AppError(codeMap[err.kind], err.message);
  }

  if (err instanceof UserError) {
    const codeMap = {
      FORBIDDEN: ErrorCode.FORBIDDEN,
      NOT_FOUND: ErrorCode.NOT_FOUND,
      CONFLICT: ErrorCode.CONFLICT,
    } as const;
    throw new AppError(codeMap[err.kind], err.message);
  }

  if (err instanceof AuditError) {
    throw new AppError(err.kind === 'FORBIDDEN' ? ErrorCode.FORBIDDEN : ErrorCode.VALIDATION, err.message);
  }

  throw err;
}
