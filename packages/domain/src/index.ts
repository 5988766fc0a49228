export { type User, type RefreshTokenRecord, type PublicUser, toPublicUser } from './user';
export {
  type PermissionLevel,
  type Account,
  type PermissionGrant,
  type AccessibleAccount,
  PERMISSION_LEVELS,
} from './account';
export {
  AUDIT_ACTIONS,
  AUDIT_STATUSES,
  type AuditAction,
  type AuditStatus,
  type AuditValues,
  type AuditEvent,
  type NewAuditEvent,
  type AuditFilters,
  type Pagination,
  type Page,
  type RequestContext,
} from './audit';
export { isAccountDeleted, isTokenExpired, normalizeEmail } from './auth';
export {
  TokenDecodeError,
  UniqueViolationError,
  type TransactionRunner,
  type UserRepository,
  type UserProfilePatch,
  type AccountRepository,
  type PermissionGrantRepository,
  type RefreshTokenRepository,
  type AuditLogRepository,
  type PasswordHasher,
  type TokenType,
  type TokenClaims,
  type TokenService,
  type RateLimitRule,
  type RateLimitDecision,
  type RateLimiter,
  type Logger,
} from './ports';
export { permissionRank, hasLevel, canRead, canWrite, isGrantableLevel } from './permissions';
export { PermissionResolver, AccessError, type PermissionResolverDeps } from './permission-resolver';
export { TokenLedger, TokenError, type TokenLedgerDeps, type IssuedToken, type RotatedToken } from './token-ledger';
export {
  AuditService,
  AuditError,
  MAX_AUDIT_PAGE_SIZE,
  type AuditServiceDeps,
  type AuditRecordInput,
  type AuditOutcome,
} from './audit-service';
export {
  AuthService,
  AuthError,
  type AuthErrorKind,
  type AuthServiceDeps,
  type AuthRateLimits,
  type AuthResult,
  type AuthTokens,
  type SessionInfo,
} from './auth-service';
export { SharingService, SharingError, type SharingServiceDeps } from './sharing-service';
export { AccountService, type AccountServiceDeps, type AccountPatch } from './account-service';
export { UserService, UserError, type UserServiceDeps } from './user-service';
