import {
  type Account,
  type AuditEvent,
  type AuthTokens,
  type PermissionGrant,
  type PermissionLevel,
  type PublicUser,
  type SessionInfo,
} from '@emerald/domain';
import {
  type AccountResponse,
  type AuditEventResponse,
  type SessionResponse,
  type ShareResponse,
  type TokenResponse,
  type UserResponse,
} from '@emerald/proto';

export function toUserResponse(user: PublicUser): UserResponse {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    fullName: user.fullName,
    isAdmin: user.isAdmin,
  };
}

export function toTokenResponse(tokens: AuthTokens, now: Date = new Date()): TokenResponse {
  return {
    accessToken: tokens.accessToken,
    refreshToken: tokens.refreshToken,
    tokenType: tokens.tokenType,
    expiresAt: tokens.expiresAt.toISOString(),
    expiresIn: Math.max(0, Math.round((tokens.expiresAt.getTime() - now.getTime()) / 1000)),
  };
}

export function toSessionResponse(session: SessionInfo): SessionResponse {
  return {
    id: session.id,
    familyId: session.familyId,
    createdAt: session.createdAt.toISOString(),
    expiresAt: session.expiresAt.toISOString(),
  };
}

export function toAccountResponse(account: Account, level: PermissionLevel): AccountResponse {
  return {
    id: account.id,
    ownerId: account.ownerId,
    name: account.name,
    currency: account.currency,
    notes: account.notes,
    permissionLevel: level,
    createdAt: account.createdAt.toISOString(),
    updatedAt: account.updatedAt.toISOString(),
  };
}

export function toShareResponse(grant: PermissionGrant): ShareResponse {
  return {
    id: grant.id,
    accountId: grant.accountId,
    userId: grant.userId,
    // Stored grants are never 'owner'; the column CHECK rejects it.
    level: grant.level === 'editor' ? 'editor' : 'viewer',
    createdAt: grant.createdAt.toISOString(),
    updatedAt: grant.updatedAt.toISOString(),
  };
}

export function toAuditEventResponse(event: AuditEvent): AuditEventResponse {
  return {
    id: event.id,
    userId: event.userId,
    action: event.action,
    entityType: event.entityType,
    entityId: event.entityId,
    oldValues: event.oldValues,
    newValues: event.newValues,
    description: event.description,
    clientIp: event.clientIp,
    userAgent: event.userAgent,
    correlationId: event.correlationId,
    status: event.status,
    errorMessage: event.errorMessage,
    extraMetadata: event.extraMetadata,
    createdAt: event.createdAt.toISOString(),
  };
}
