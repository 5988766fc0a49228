import { type FastifyInstance } from 'fastify';
import { type SharingService } from '@emerald/domain';
import {
  AccountParamsSchema,
  CreateShareRequestSchema,
  ShareParamsSchema,
  UpdateShareRequestSchema,
} from '@emerald/proto';
import { requireUserId, type RequestGuard } from '../plugins/auth';
import { requestContext } from '../plugins/request-context';
import { mapDomainError } from './domain-errors';
import { parseOrThrow } from './validation';
import { toShareResponse } from './serializers';

interface ShareRouteDeps {
  sharingService: Pick<SharingService, keyof SharingService>;
  preHandler: RequestGuard[];
}

export function registerShareRoutes(app: FastifyInstance, deps: ShareRouteDeps): void {
  const { sharingService, preHandler } = deps;

  app.post('/accounts/:accountId/shares', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const { accountId } = parseOrThrow(AccountParamsSchema, request.params, 'Invalid account id');
    const body = parseOrThrow(CreateShareRequestSchema, request.body, 'Invalid share data');

    try {
      const grant = await sharingService.share(userId, accountId, body, requestContext(request));
      return reply.status(201).send(toShareResponse(grant));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/accounts/:accountId/shares', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const { accountId } = parseOrThrow(AccountParamsSchema, request.params, 'Invalid account id');

    try {
      const grants = await sharingService.listShares(userId, accountId);
      return reply.status(200).send(grants.map(toShareResponse));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.put('/accounts/:accountId/shares/:shareId', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const { accountId, shareId } = parseOrThrow(ShareParamsSchema, request.params, 'Invalid share id');
    const body = parseOrThrow(UpdateShareRequestSchema, request.body, 'Invalid share data');

    try {
      const grant = await sharingService.updateShare(userId, accountId, shareId, body.level, requestContext(request));
      return reply.status(200).send(toShareResponse(grant));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.delete('/accounts/:accountId/shares/:shareId', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const { accountId, shareId } = parseOrThrow(ShareParamsSchema, request.params, 'Invalid share id');

    try {
      await sharingService.revokeShare(userId, accountId, shareId, requestContext(request));
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });
}
