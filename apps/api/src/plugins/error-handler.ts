import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@emerald/shared';

const logger = createLogger({ name: 'api:error' });

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      const meta = { code: error.code, requestId: request.id, ...error.safeMeta };
      if (error.isClientError) {
        logger.warn(meta, error.message);
      } else {
        logger.error(meta, error.message);
      }
      if (error.retryAfterSeconds !== null) {
        reply.header('retry-after', String(error.retryAfterSeconds));
      }
      return reply.status(error.httpStatus).send(error.toJSON());
    }

    // Fastify's own request errors (malformed JSON, wrong content type) keep their 4xx status.
    if (error.statusCode !== undefined && error.statusCode < 500) {
      logger.warn({ requestId: request.id, statusCode: error.statusCode }, error.message);
      return reply.status(error.statusCode).send({
        code: ErrorCode.BAD_REQUEST,
        message: error.message,
      });
    }

    logger.error({ err: error.message, requestId: request.id }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
