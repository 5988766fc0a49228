import { type FastifyInstance } from 'fastify';
import { type UserService } from '@emerald/domain';
import { UpdateProfileRequestSchema, UserParamsSchema } from '@emerald/proto';
import { requireUserId, type RequestGuard } from '../plugins/auth';
import { requestContext } from '../plugins/request-context';
import { mapDomainError } from './domain-errors';
import { parseOrThrow } from './validation';
import { toUserResponse } from './serializers';

interface UserRouteDeps {
  userService: Pick<UserService, keyof UserService>;
  preHandler: RequestGuard[];
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { userService, preHandler } = deps;

  app.get('/users/me', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);

    try {
      const user = await userService.getProfile(userId, userId);
      return reply.status(200).send(toUserResponse(user));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.patch('/users/me', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);
    const body = parseOrThrow(UpdateProfileRequestSchema, request.body, 'Invalid profile data');

    try {
      const user = await userService.updateProfile(userId, userId, body, requestContext(request));
      return reply.status(200).send(toUserResponse(user));
    } catch (err) {
      return mapDomainError(err);
    }
  });

  app.delete('/users/me', { preHandler }, async (request, reply) => {
    const userId = requireUserId(request);

    try {
      await userService.deleteUser(userId, userId, requestContext(request));
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });

  // Administrators only; the service enforces it.
  app.delete('/users/:userId', { preHandler }, async (request, reply) => {
    const actorId = requireUserId(request);
    const { userId } = parseOrThrow(UserParamsSchema, request.params, 'Invalid user id');

    try {
      await userService.deleteUser(actorId, userId, requestContext(request));
      return reply.status(204).send();
    } catch (err) {
      return mapDomainError(err);
    }
  });
}
