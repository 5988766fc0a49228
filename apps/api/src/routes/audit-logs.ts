import { type FastifyInstance } from 'fastify';
import { type AuditService, type AuditEvent, type Page } from '@emerald/domain';
import { AuditQuerySchema, type AuditQuery, type AuditPageResponse } from '@emerald/proto';
import { requireUserId, type RequestGuard } from '../plugins/auth';
import { mapDomainError } from './domain-errors';
import { parseOrThrow } from './validation';
import { toAuditEventResponse } from './serializers';

interface AuditRouteDeps {
  auditService: Pick<AuditService, 'listForUser' | 'listAll'>;
  preHandler: RequestGuard[];
}

function toPageResponse(page: Page<AuditEvent>, query: AuditQuery): AuditPageResponse {
  return {
    items: page.items.map(toAuditEventResponse),
    total: page.total,
    offset: query.offset,
    limit: query.limit,
  };
}

export function registerAuditLogRoutes(app: FastifyInstance, deps: AuditRouteDeps): void {
  const { auditService, preHandler } = deps;

  app.get('/audit-logs/me', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const query = parseOrThrow(AuditQuerySchema, request.query, 'Invalid audit log query');
    const { offset, limit, ...filters } = query;

    try {
      const page = await auditService.listForUser(userId, filters, { offset, limit });
      return reply.status(200).send(toPageResponse(page, query));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/audit-logs', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const query = parseOrThrow(AuditQuerySchema, request.query, 'Invalid audit log query');
    const { offset, limit, ...filters } = query;

    try {
      const page = await auditService.listAll(userId, filters, { offset, limit });
      return reply.status(200).send(toPageResponse(page, query));
    } catch (err) {
      return mapDomainError(err);
    }
  });
}
