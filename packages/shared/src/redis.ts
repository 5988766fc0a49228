import Redis from 'ioredis';
import { createLogger } from './logger';

const logger = createLogger({ name: 'redis' });

let client: Redis | null = null;

/** Rate-limit counters live under the `emerald:` key prefix. */
export function initRedis(url: string): Redis {
  if (client) return client;
  client = new Redis(url, { lazyConnect: false, maxRetriesPerRequest: 3, keyPrefix: 'emerald:' });
  client.on('error', (err: Error) => {
    logger.error({ err: err.message }, 'Redis connection error');
  });
  logger.info({}, 'Redis client initialized');
  return client;
}

export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
    logger.info({}, 'Redis client closed');
  }
}
