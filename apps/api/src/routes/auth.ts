import { type FastifyInstance } from 'fastify';
import { type AuthService } from '@emerald/domain';
import {
  RegisterRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  LogoutRequestSchema,
  ChangePasswordRequestSchema,
} from '@emerald/proto';
import { requireUserId, type RequestGuard } from '../plugins/auth';
import { requestContext } from '../plugins/request-context';
import { mapDomainError } from './domain-errors';
import { parseOrThrow } from './validation';
import { toSessionResponse, toTokenResponse, toUserResponse } from './serializers';

interface AuthRouteDeps {
  authService: Pick<AuthService, keyof AuthService>;
  authenticate: RequestGuard;
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { authService, authenticate } = deps;

  app.post('/auth/register', async (request, reply) => {
    const body = parseOrThrow(RegisterRequestSchema, request.body, 'Invalid registration data');

    try {
      const result = await authService.register(body, requestContext(request));
      return reply.status(201).send({
        user: toUserResponse(result.user),
        tokens: toTokenResponse(result.tokens),
      });
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/auth/login', async (request, reply) => {
    const body = parseOrThrow(LoginRequestSchema, request.body, 'Invalid login data');

    try {
      const result = await authService.login(body, requestContext(request));
      return reply.status(200).send({
        user: toUserResponse(result.user),
        tokens: toTokenResponse(result.tokens),
      });
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/auth/refresh', async (request, reply) => {
    const body = parseOrThrow(RefreshRequestSchema, request.body, 'Invalid refresh request');

    try {
      const tokens = await authService.refresh(body.refreshToken, requestContext(request));
      return reply.status(200).send(toTokenResponse(tokens));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/auth/logout', async (request, reply) => {
    const body = parseOrThrow(LogoutRequestSchema, request.body, 'Invalid logout request');

    try {
      await authService.logout(body.refreshToken, requestContext(request));
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.post('/auth/change-password', { preHandler: [authenticate] }, async (request, reply) => {
    const userId = requireUserId(request);
    const body = parseOrThrow(ChangePasswordRequestSchema, request.body, 'Invalid password change request');

    try {
      await authService.changePassword(userId, body, requestContext(request));
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/auth/me', { preHandler: [authenticate] }, async (request, reply) => {
    const userId = requireUserId(request);

    try {
      const user = await authService.getMe(userId);
      return reply.status(200).send(toUserResponse(user));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.get('/auth/sessions', { preHandler: [authenticate] }, async (request, reply) => {
    const userId = requireUserId(request);
    const sessions = await authService.listSessions(userId);
    return reply.status(200).send(sessions.map(toSessionResponse));
  });
}
