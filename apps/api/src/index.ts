import { buildServer } from './server';
import { createServices } from './container';
import { loadConfig, ApiConfigSchema, createLogger, initRedis, closeRedis } from '@emerald/shared';
import { initPool, closePool } from '@emerald/db';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });
  const redis = initRedis(config.REDIS_URL);

  const app = await buildServer(createServices(config, redis), {
    trustProxy: config.TRUST_PROXY,
    rateLimitEnabled: config.RATE_LIMIT_ENABLED,
    apiRateLimit: config.RATE_LIMIT_API,
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closeRedis();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start API');
  process.exit(1);
});
