import { loadConfig, WorkerConfigSchema, createLogger, startHealthBeat } from '@emerald/shared';
import { initPool, closePool } from '@emerald/db';
import { runRetentionJob } from './jobs/retention';

const logger = createLogger({ name: 'worker' });

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  initPool({ connectionString: config.DATABASE_URL });

  const healthBeat = startHealthBeat(5000, config.WORKER_HEALTHCHECK_PATH);

  const policy = {
    refreshTokenRetentionDays: config.REFRESH_TOKEN_RETENTION_DAYS,
    auditLogRetentionDays: config.AUDIT_LOG_RETENTION_DAYS,
  };
  const sweep = () => {
    runRetentionJob(policy).catch(logJobError('retention'));
  };
  sweep();
  const retentionInterval = setInterval(sweep, config.RETENTION_INTERVAL_MS);

  logger.info({ intervalMs: config.RETENTION_INTERVAL_MS }, 'Worker started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    clearInterval(retentionInterval);
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

function logJobError(jobName: string) {
  return (err: unknown) => {
    logger.error(
      { err: err instanceof Error ? err.message : String(err), job: jobName },
      'Job failed',
    );
  };
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start worker');
  process.exit(1);
});
