import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type { Container } from '../infra/container.js';
import type { RedisClient } from '../infra/redis.js';
import type { LedgerService } from '../modules/ledger/ledger.service.js';
import type { OracleService } from '../modules/oracle/oracle.service.js';
import type { RiskParamsService } from '../modules/risk-params/risk-params.service.js';
import { isLedgerError } from '../common/errors.js';
import { healthRoutes } from './routes/health.js';
import { adminRoutes } from './routes/admin.js';
import { oracleRoutes } from './routes/oracle.js';
import { positionRoutes } from './routes/positions.js';

export interface ServerDeps {
  container: Container;
  ledger: LedgerService;
  oracle: OracleService;
  riskParams: RiskParamsService;
  redis: RedisClient | null;
  rateLimitMax?: number;
}

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { container, ledger, oracle, riskParams, redis } = deps;

  const app = Fastify({
    logger: false, // We use our own Pino instance
    requestTimeout: 30_000,
    bodyLimit: 65_536,
  });

  await app.register(rateLimit, {
    max: deps.rateLimitMax ?? 100,
    timeWindow: '1 minute',
  });

  app.addHook('onRequest', async (request) => {
    container.logger.debug(
      { method: request.method, url: request.url },
      'Incoming request',
    );
  });

  app.addHook('onResponse', async (request, reply) => {
    container.logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
  });

  app.setErrorHandler((error: Error & { statusCode?: number }, _request, reply) => {
    if (isLedgerError(error)) {
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        statusCode: error.statusCode,
      });
    }

    container.logger.error({ err: error }, 'Unhandled route error');
    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      error: error.message,
      statusCode,
    });
  });

  await healthRoutes(app, container, ledger, redis);
  await adminRoutes(app, riskParams);
  await oracleRoutes(app, oracle);
  await positionRoutes(app, ledger);

  return app;
}
