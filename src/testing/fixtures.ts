import { vi } from 'vitest';
import { ManualClock } from '../infra/clock.js';
import type { Container } from '../infra/container.js';
import type { Logger } from '../infra/logger.js';
import { EventBus } from '../services/event-bus.js';
import { LedgerStore } from '../modules/persistence/ledger-store.js';
import { MemorySnapshotStore, type SnapshotStore } from '../modules/persistence/snapshot-store.js';
import { OracleService } from '../modules/oracle/oracle.service.js';
import { RiskParamsService } from '../modules/risk-params/risk-params.service.js';
import { LedgerService } from '../modules/ledger/ledger.service.js';
import type { LedgerConfig } from '../types/ledger.js';

export const ADMIN = 'admin';

export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

export function createTestConfig(overrides: Partial<LedgerConfig> = {}): LedgerConfig {
  return {
    administrator: ADMIN,
    assets: { collateral: 'BTC', secondary: 'USDC' },
    initialRiskParams: {
      minimumCollateralRatio: 150n,
      liquidationThreshold: 120n,
      feeRate: 1n,
    },
    defaultInterestRate: 5n,
    minLoanAmount: 1n,
    maxPositionsPerUser: 10,
    liquidationIndexPurge: 'position',
    ...overrides,
  };
}

export interface TestHarness {
  container: Container;
  clock: ManualClock;
  eventBus: EventBus;
  snapshots: SnapshotStore;
  store: LedgerStore;
  oracle: OracleService;
  riskParams: RiskParamsService;
  ledger: LedgerService;
}

export function createHarness(
  overrides: Partial<LedgerConfig> = {},
  snapshots: SnapshotStore = new MemorySnapshotStore(),
): TestHarness {
  const clock = new ManualClock();
  const logger = createMockLogger();
  const container: Container = { logger, clock, ledgerConfig: createTestConfig(overrides) };
  const eventBus = new EventBus(logger);
  const store = new LedgerStore(container, snapshots, eventBus);

  return {
    container,
    clock,
    eventBus,
    snapshots,
    store,
    oracle: new OracleService(container, store),
    riskParams: new RiskParamsService(container, store),
    ledger: new LedgerService(container, store),
  };
}

/** Initializes the platform and publishes a collateral price. */
export async function bootstrap(harness: TestHarness, btcPrice = 50_000n): Promise<void> {
  await harness.riskParams.initialize(ADMIN);
  await harness.oracle.setPrice(ADMIN, 'BTC', btcPrice);
}
