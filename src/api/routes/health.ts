import type { FastifyInstance } from 'fastify';
import type { Container } from '../../infra/container.js';
import type { RedisClient } from '../../infra/redis.js';
import type { LedgerService } from '../../modules/ledger/ledger.service.js';

type RedisCheck = 'disabled' | 'ok' | 'degraded';

async function checkRedis(redis: RedisClient | null): Promise<RedisCheck> {
  if (!redis) return 'disabled';
  return (await redis.ping()) === 'PONG' ? 'ok' : 'degraded';
}

export async function healthRoutes(
  app: FastifyInstance,
  container: Container,
  ledger: LedgerService,
  redis: RedisClient | null,
): Promise<void> {
  app.get('/health', async (_request, reply) => {
    try {
      const snapshotStore = await checkRedis(redis);
      const { initialized, activePositions } = ledger.getStats();

      return reply.send({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        checks: {
          redis: snapshotStore,
          clock: { status: 'ok', now: container.clock.now() },
          ledger: { initialized, activePositions },
        },
      });
    } catch (err) {
      container.logger.error({ err }, 'Health check failed');
      return reply.status(503).send({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: err instanceof Error ? err.message : 'Unknown error',
      });
    }
  });
}
