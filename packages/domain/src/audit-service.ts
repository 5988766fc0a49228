import {
  type AuditAction,
  type AuditEvent,
  type AuditFilters,
  type AuditStatus,
  type AuditValues,
  type Page,
  type Pagination,
  type RequestContext,
} from './audit';
import { type AuditLogRepository, type Logger, type TransactionRunner, type UserRepository } from './ports';

export const MAX_AUDIT_PAGE_SIZE = 100;

export interface AuditServiceDeps {
  auditRepo: AuditLogRepository;
  userRepo: UserRepository;
  logger: Logger;
  generateId: () => string;
  withTransaction: TransactionRunner;
}

export interface AuditRecordInput {
  userId: string | null;
  action: AuditAction;
  entityType: string;
  entityId?: string | null;
  oldValues?: AuditValues | null;
  newValues?: AuditValues | null;
  description?: string | null;
  status?: AuditStatus;
  errorMessage?: string | null;
  extraMetadata?: AuditValues | null;
  context?: RequestContext;
}

/** Outcome-driven wrappers share this shape; `errorMessage` is only read on failure. */
export interface AuditOutcome {
  userId: string | null;
  success: boolean;
  errorMessage?: string;
  extraMetadata?: AuditValues;
  context?: RequestContext;
}

/**
 * Append-only audit trail. `record` writes on the caller's transaction so the
 * event commits or rolls back with the change it describes; a failed insert
 * propagates. There is deliberately no update or delete here.
 */
export class AuditService {
  constructor(private readonly deps: AuditServiceDeps) {}

  async record(tx: unknown, input: AuditRecordInput): Promise<AuditEvent> {
    const status = input.status ?? 'SUCCESS';
    const errorMessage = input.errorMessage ?? null;
    if (status === 'FAILURE' && !errorMessage) {
      throw new AuditError('VALIDATION', 'Failed audit events require an error message');
    }
    if (status !== 'FAILURE' && errorMessage) {
      throw new AuditError('VALIDATION', 'Only failed audit events may carry an error message');
    }

    const event = await this.deps.auditRepo.insert(tx, {
      id: this.deps.generateId(),
      userId: input.userId,
      action: input.action,
      entityType: input.entityType,
      entityId: input.entityId ?? null,
      oldValues: input.oldValues ?? null,
      newValues: input.newValues ?? null,
      description: input.description ?? null,
      clientIp: input.context?.clientIp ?? null,
      userAgent: input.context?.userAgent ?? null,
      correlationId: input.context?.correlationId ?? null,
      status,
      errorMessage,
      extraMetadata: input.extraMetadata ?? null,
    });
    this.deps.logger.debug(
      { auditId: event.id, action: event.action, entityType: event.entityType, status },
      'Audit event recorded',
    );
    return event;
  }

  async recordLogin(tx: unknown, outcome: AuditOutcome & { description?: string }): Promise<AuditEvent> {
    return this.recordOutcome(tx, outcome.success ? 'LOGIN' : 'LOGIN_FAILED', outcome, {
      success: 'User logged in successfully',
      failure: outcome.description ?? 'Login attempt failed',
    });
  }

  async recordLogout(tx: unknown, input: { userId: string; context?: RequestContext }): Promise<AuditEvent> {
    return this.record(tx, {
      userId: input.userId,
      action: 'LOGOUT',
      entityType: 'user',
      entityId: input.userId,
      description: 'User logged out',
      context: input.context,
    });
  }

  async recordPasswordChange(tx: unknown, outcome: AuditOutcome): Promise<AuditEvent> {
    return this.recordOutcome(tx, 'PASSWORD_CHANGE', outcome, {
      success: 'User password changed successfully',
      failure: 'Password change attempt failed',
    });
  }

  async recordTokenRefresh(tx: unknown, outcome: AuditOutcome): Promise<AuditEvent> {
    return this.recordOutcome(tx, 'TOKEN_REFRESH', outcome, {
      success: 'Token refreshed successfully',
      failure: 'Token refresh attempt failed',
    });
  }

  async listForUser(userId: string, filters: AuditFilters, pagination: Pagination): Promise<Page<AuditEvent>> {
    validateQuery(filters, pagination);
    return this.deps.withTransaction((tx) => this.deps.auditRepo.list(tx, { userId, filters, pagination }));
  }

  async listAll(requesterId: string, filters: AuditFilters, pagination: Pagination): Promise<Page<AuditEvent>> {
    validateQuery(filters, pagination);
    return this.deps.withTransaction(async (tx) => {
      const requester = await this.deps.userRepo.findById(tx, requesterId);
      if (!requester || !requester.isAdmin) {
        this.deps.logger.warn({ userId: requesterId }, 'Non-admin attempted to read the full audit log');
        throw new AuditError('FORBIDDEN', 'Administrator access required');
      }
      return this.deps.auditRepo.list(tx, { filters, pagination });
    });
  }

  private async recordOutcome(
    tx: unknown,
    action: AuditAction,
    outcome: AuditOutcome,
    descriptions: { success: string; failure: string },
  ): Promise<AuditEvent> {
    return this.record(tx, {
      userId: outcome.userId,
      action,
      entityType: 'user',
      entityId: outcome.userId,
      description: outcome.success ? descriptions.success : descriptions.failure,
      status: outcome.success ? 'SUCCESS' : 'FAILURE',
      errorMessage: outcome.success ? null : (outcome.errorMessage ?? 'Operation failed'),
      extraMetadata: outcome.extraMetadata ?? null,
      context: outcome.context,
    });
  }
}

function validateQuery(filters: AuditFilters, pagination: Pagination): void {
  if (filters.dateFrom && filters.dateTo && filters.dateFrom.getTime() > filters.dateTo.getTime()) {
    throw new AuditError('VALIDATION', 'dateFrom must not be after dateTo');
  }
  if (!Number.isInteger(pagination.offset) || pagination.offset < 0) {
    throw new AuditError('VALIDATION', 'offset must be a non-negative integer');
  }
  if (!Number.isInteger(pagination.limit) || pagination.limit < 1 || pagination.limit > MAX_AUDIT_PAGE_SIZE) {
    throw new AuditError('VALIDATION', `limit must be between 1 and ${MAX_AUDIT_PAGE_SIZE}`);
  }
}

export class AuditError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'FORBIDDEN',
    message: string,
  ) {
    super(message);
    this.name = 'AuditError';
  }
}
