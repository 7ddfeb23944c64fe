import { Redis } from 'ioredis';
import type { Logger } from './logger.js';

export type RedisClient = Redis;

const MAX_RETRY_DELAY_MS = 5_000;

/** Opens the connection that holds the ledger snapshot. Rejects if the first connect fails. */
export async function connectRedis(url: string, logger: Logger): Promise<RedisClient> {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (attempt: number) => {
      const delay = Math.min(attempt * 200, MAX_RETRY_DELAY_MS);
      logger.warn({ attempt, delay }, 'Redis reconnecting');
      return delay;
    },
  });

  client.on('ready', () => logger.info({ host: client.options.host, db: client.options.db }, 'Redis ready'));
  client.on('error', (err: Error) => logger.error({ err }, 'Redis error'));
  client.on('end', () => logger.warn('Redis connection ended'));

  await client.connect();
  return client;
}
