import { type FastifyInstance } from 'fastify';
import { type AccountService } from '@emerald/domain';
import {
  AccountParamsSchema,
  CreateAccountRequestSchema,
  UpdateAccountRequestSchema,
} from '@emerald/proto';
import { requireUserId, type RequestGuard } from '../plugins/auth';
import { requestContext } from '../plugins/request-context';
import { mapDomainError } from './domain-errors';
import { parseOrThrow } from './validation';
import { toAccountResponse } from './serializers';

interface AccountRouteDeps {
  accountService: Pick<AccountService, keyof AccountService>;
  preHandler: RequestGuard[];
}

export function registerAccountRoutes(app: FastifyInstance, deps: AccountRouteDeps): void {
  const { accountService, preHandler } = deps;

  app.post('/accounts', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const body = parseOrThrow(CreateAccountRequestSchema, request.body, 'Invalid account data');

    const account = await accountService.createAccount(userId, body, requestContext(request));
    return reply.status(201).send(toAccountResponse(account, 'owner'));
  });

  app.get('/accounts', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const accounts = await accountService.listAccounts(userId);
    return reply.status(200).send(accounts.map(({ account, level }) => toAccountResponse(account, level)));
  });

  app.get('/accounts/:accountId', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const { accountId } = parseOrThrow(AccountParamsSchema, request.params, 'Invalid account id');

    try {
      const { account, level } = await accountService.getAccount(userId, accountId);
      return reply.status(200).send(toAccountResponse(account, level));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.patch('/accounts/:accountId', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const { accountId } = parseOrThrow(AccountParamsSchema, request.params, 'Invalid account id');
    const body = parseOrThrow(UpdateAccountRequestSchema, request.body, 'Invalid account data');

    try {
      const account = await accountService.updateAccount(userId, accountId, body, requestContext(request));
      // Reaching here means the caller holds at least editor access.
      return reply.status(200).send(toAccountResponse(account, account.ownerId === userId ? 'owner' : 'editor'));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.delete('/accounts/:accountId', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const { accountId } = parseOrThrow(AccountParamsSchema, request.params, 'Invalid account id');

    try {
      await accountService.deleteAccount(userId, accountId, requestContext(request));
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });
}
