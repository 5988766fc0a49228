import Fastify from 'fastify';
import { createLogger } from '@emerald/shared';
import {
  type AccountService,
  type AuditService,
  type AuthService,
  type RateLimiter,
  type RateLimitRule,
  type SharingService,
  type TokenService,
  type UserService,
} from '@emerald/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createApiRateLimit } from './plugins/rate-limit';
import { REQUEST_ID_HEADER, resolveRequestId } from './plugins/request-context';
import { registerAuthRoutes } from './routes/auth';
import { registerAccountRoutes } from './routes/accounts';
import { registerShareRoutes } from './routes/shares';
import { registerAuditLogRoutes } from './routes/audit-logs';
import { registerUserRoutes } from './routes/users';

const logger = createLogger({ name: 'api' });

export interface ServerDeps {
  authService: Pick<AuthService, keyof AuthService>;
  accountService: Pick<AccountService, keyof AccountService>;
  sharingService: Pick<SharingService, keyof SharingService>;
  userService: Pick<UserService, keyof UserService>;
  auditService: Pick<AuditService, 'listForUser' | 'listAll'>;
  tokenService: TokenService;
  rateLimiter: RateLimiter;
}

export interface ServerConfig {
  trustProxy: boolean;
  rateLimitEnabled: boolean;
  apiRateLimit: RateLimitRule;
}

export async function buildServer(deps: ServerDeps, config: ServerConfig) {
  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
    trustProxy: config.trustProxy,
    // Incoming ids are vetted in genReqId.
    requestIdHeader: false,
    genReqId: (req) => resolveRequestId(req.headers[REQUEST_ID_HEADER]),
  });

  registerErrorHandler(app);

  app.addHook('onRequest', (request, reply, done) => {
    reply.header(REQUEST_ID_HEADER, request.id);
    logger.info(
      { method: request.method, url: request.url, requestId: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  const authenticate = createAuthMiddleware(deps.tokenService);
  const apiRateLimit = createApiRateLimit({
    rateLimiter: deps.rateLimiter,
    rule: config.apiRateLimit,
    enabled: config.rateLimitEnabled,
  });
  const guarded = [authenticate, apiRateLimit];

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerAuthRoutes(app, { authService: deps.authService, authenticate });
  registerAccountRoutes(app, { accountService: deps.accountService, preHandler: guarded });
  registerShareRoutes(app, { sharingService: deps.sharingService, preHandler: guarded });
  registerAuditLogRoutes(app, { auditService: deps.auditService, preHandler: guarded });
  registerUserRoutes(app, { userService: deps.userService, preHandler: guarded });

  return app;
}
