import { randomUUID } from 'node:crypto';
import { type FastifyRequest } from 'fastify';
import { type RequestContext } from '@emerald/domain';

export const REQUEST_ID_HEADER = 'x-request-id';

// Fits the audit trail's correlation_id column.
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,64}$/;

/** Keeps a caller's request id only when it is short and plain; otherwise mints one. */
export function resolveRequestId(header: string | string[] | undefined): string {
  return typeof header === 'string' && REQUEST_ID_PATTERN.test(header) ? header : randomUUID();
}

export function requestContext(request: FastifyRequest): RequestContext {
  const userAgent = request.headers['user-agent'];
  return {
    clientIp: request.ip,
    userAgent: typeof userAgent === 'string' ? userAgent : undefined,
    correlationId: request.id,
  };
}
