import { z } from 'zod';
import { AUDIT_ACTIONS, AUDIT_STATUSES } from '@emerald/domain';

export const AuditQuerySchema = z
  .object({
    action: z.enum(AUDIT_ACTIONS).optional(),
    entityType: z.string().trim().min(1).max(50).optional(),
    status: z.enum(AUDIT_STATUSES).optional(),
    dateFrom: z.coerce.date().optional(),
    dateTo: z.coerce.date().optional(),
    offset: z.coerce.number().int().min(0).default(0),
    limit: z.coerce.number().int().min(1).max(100).default(20),
  })
  .refine((q) => !q.dateFrom || !q.dateTo || q.dateFrom.getTime() <= q.dateTo.getTime(), {
    message: 'dateFrom must not be after dateTo',
    path: ['dateFrom'],
  });

export const AuditEventResponseSchema = z.object({
  id: z.string(),
  userId: z.string().nullable(),
  action: z.enum(AUDIT_ACTIONS),
  entityType: z.string(),
  entityId: z.string().nullable(),
  oldValues: z.record(z.unknown()).nullable(),
  newValues: z.record(z.unknown()).nullable(),
  description: z.string().nullable(),
  clientIp: z.string().nullable(),
  userAgent: z.string().nullable(),
  correlationId: z.string().nullable(),
  status: z.enum(AUDIT_STATUSES),
  errorMessage: z.string().nullable(),
  extraMetadata: z.record(z.unknown()).nullable(),
  createdAt: z.string().datetime(),
});

export const AuditPageResponseSchema = z.object({
  items: z.array(AuditEventResponseSchema),
  total: z.number().int(),
  offset: z.number().int(),
  limit: z.number().int(),
});

export type AuditQuery = z.infer<typeof AuditQuerySchema>;
export type AuditEventResponse = z.infer<typeof AuditEventResponseSchema>;
export type AuditPageResponse = z.infer<typeof AuditPageResponseSchema>;
