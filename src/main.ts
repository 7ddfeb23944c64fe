import { env } from './config/env.js';
import { connectRedis, createLogger, WallClock } from './infra/index.js';
import type { Container } from './infra/container.js';
import type { RedisClient } from './infra/redis.js';
import { EventBus } from './services/event-bus.js';
import { LedgerStore } from './modules/persistence/ledger-store.js';
import {
  MemorySnapshotStore,
  RedisSnapshotStore,
  type SnapshotStore,
} from './modules/persistence/snapshot-store.js';
import { OracleService } from './modules/oracle/oracle.service.js';
import { RiskParamsService } from './modules/risk-params/risk-params.service.js';
import { LedgerService } from './modules/ledger/ledger.service.js';
import { LiquidationSweeper } from './modules/liquidation-sweeper/liquidation-sweeper.service.js';
import { createServer } from './api/server.js';

async function main(): Promise<void> {
  const logger = createLogger({ LOG_LEVEL: env.LOG_LEVEL, NODE_ENV: env.NODE_ENV });
  logger.info('Collateral ledger starting');

  let redis: RedisClient | null = null;
  let snapshots: SnapshotStore;
  if (env.REDIS_URL) {
    redis = await connectRedis(env.REDIS_URL, logger);
    snapshots = new RedisSnapshotStore(redis, logger);
  } else {
    logger.warn('REDIS_URL not set, ledger state will not survive a restart');
    snapshots = new MemorySnapshotStore();
  }

  const container: Container = {
    logger,
    clock: new WallClock(new Date(env.CLOCK_GENESIS), env.TIME_UNIT_MS),
    ledgerConfig: {
      administrator: env.ADMIN_ID,
      assets: { collateral: env.COLLATERAL_ASSET, secondary: env.SECONDARY_ASSET },
      initialRiskParams: {
        minimumCollateralRatio: BigInt(env.MINIMUM_COLLATERAL_RATIO),
        liquidationThreshold: BigInt(env.LIQUIDATION_THRESHOLD),
        feeRate: BigInt(env.FEE_RATE),
      },
      defaultInterestRate: BigInt(env.DEFAULT_INTEREST_RATE),
      minLoanAmount: BigInt(env.MIN_LOAN_AMOUNT),
      maxPositionsPerUser: env.MAX_POSITIONS_PER_USER,
      liquidationIndexPurge: env.LIQUIDATION_INDEX_PURGE,
    },
  };

  // Core services
  const eventBus = new EventBus(logger);
  const store = new LedgerStore(container, snapshots, eventBus);
  await store.load();

  const oracle = new OracleService(container, store);
  const riskParams = new RiskParamsService(container, store);
  const ledger = new LedgerService(container, store);
  const sweeper = new LiquidationSweeper(
    container,
    eventBus,
    ledger,
    env.LIQUIDATION_SWEEP_INTERVAL_MS,
  );

  await sweeper.start();

  // API server
  const server = await createServer({ container, ledger, oracle, riskParams, redis });
  await server.listen({ host: env.API_HOST, port: env.API_PORT });
  logger.info({ host: env.API_HOST, port: env.API_PORT }, 'API server listening');

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown signal received');

    await server.close();
    await sweeper.stop();
    eventBus.removeAllListeners();

    if (redis) {
      await redis.quit();
    }

    logger.info('Collateral ledger shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });
  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });

  logger.info(
    { administrator: env.ADMIN_ID, collateralAsset: env.COLLATERAL_ASSET },
    'Collateral ledger fully operational',
  );
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal startup error:', err);
  process.exit(1);
});
