export const AUDIT_ACTIONS = [
  'LOGIN',
  'LOGOUT',
  'LOGIN_FAILED',
  'PASSWORD_CHANGE',
  'TOKEN_REFRESH',
  'CREATE',
  'READ',
  'UPDATE',
  'DELETE',
  'PERMISSION_GRANT',
  'PERMISSION_REVOKE',
  'RATE_LIMIT_EXCEEDED',
  'INVALID_TOKEN',
  'PERMISSION_DENIED',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export const AUDIT_STATUSES = ['SUCCESS', 'FAILURE', 'PARTIAL'] as const;

export type AuditStatus = (typeof AUDIT_STATUSES)[number];

export type AuditValues = Record<string, unknown>;

/** Where a request came from; copied onto every audit event it causes. */
export interface RequestContext {
  clientIp?: string;
  userAgent?: string;
  correlationId?: string;
}

export interface AuditEvent {
  id: string;
  userId: string | null;
  action: AuditAction;
  entityType: string;
  entityId: string | null;
  oldValues: AuditValues | null;
  newValues: AuditValues | null;
  description: string | null;
  clientIp: string | null;
  userAgent: string | null;
  correlationId: string | null;
  status: AuditStatus;
  errorMessage: string | null;
  extraMetadata: AuditValues | null;
  createdAt: Date;
}

export type NewAuditEvent = Omit<AuditEvent, 'createdAt'>;

export interface AuditFilters {
  action?: AuditAction;
  entityType?: string;
  status?: AuditStatus;
  dateFrom?: Date;
  dateTo?: Date;
}

export interface Pagination {
  offset: number;
  limit: number;
}

export interface Page<T> {
  items: T[];
  total: number;
}
