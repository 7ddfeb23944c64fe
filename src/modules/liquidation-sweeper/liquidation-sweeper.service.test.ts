import { afterEach, describe, it, expect, vi } from 'vitest';
import { LiquidationSweeper } from './liquidation-sweeper.service.js';
import type { LedgerService } from '../ledger/ledger.service.js';
import { LedgerError } from '../../common/errors.js';
import { ADMIN, bootstrap, createHarness, type TestHarness } from '../../testing/fixtures.js';

function stubLedger(ids: number[], check: LedgerService['checkLiquidation']): LedgerService {
  return {
    getActivePositionIds: () => ids,
    checkLiquidation: check,
  } as unknown as LedgerService;
}

describe('LiquidationSweeper', () => {
  let harness: TestHarness;
  let sweeper: LiquidationSweeper | undefined;

  afterEach(async () => {
    await sweeper?.stop();
    sweeper = undefined;
  });

  it('counts failed checks and keeps sweeping', async () => {
    harness = createHarness();
    const check = vi.fn(async (id: number) => {
      if (id === 1) throw new LedgerError('NotInitialized', 'No price set for BTC');
      return {
        positionId: id,
        status: 'Liquidated' as const,
        liquidated: true,
        collateralRatio: 100n,
        liquidationThreshold: 120n,
      };
    });
    sweeper = new LiquidationSweeper(harness.container, harness.eventBus, stubLedger([1, 2], check), 0);

    const result = await sweeper.sweep();

    expect(result).toEqual({ checked: 1, liquidated: [2], failed: 1 });
    expect(check).toHaveBeenCalledTimes(2);
    expect(harness.container.logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ positionId: 1 }),
      'Liquidation check failed',
    );
  });

  it('runs one more pass when a sweep is requested while another is running', async () => {
    harness = createHarness();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const check = vi.fn(async (id: number) => {
      await gate;
      return {
        positionId: id,
        status: 'Active' as const,
        liquidated: false,
        collateralRatio: 1300n,
        liquidationThreshold: 120n,
      };
    });
    sweeper = new LiquidationSweeper(harness.container, harness.eventBus, stubLedger([1], check), 0);

    const first = sweeper.sweep();
    await expect(sweeper.sweep()).resolves.toBeNull();
    release();

    await expect(first).resolves.toEqual({ checked: 2, liquidated: [], failed: 0 });
    expect(check).toHaveBeenCalledTimes(2);
  });

  it('liquidates undercollateralized positions after a collateral price update', async () => {
    harness = createHarness();
    await bootstrap(harness);
    await harness.ledger.requestLoan('alice', 10n, 300_000n);
    await harness.ledger.requestLoan('bob', 100n, 300_000n);

    sweeper = new LiquidationSweeper(harness.container, harness.eventBus, harness.ledger, 0);
    await sweeper.start();
    await harness.oracle.setPrice(ADMIN, 'BTC', 40_000n);

    await vi.waitFor(() => {
      expect(harness.ledger.getPosition(1).status).toBe('Liquidated');
    });
    expect(harness.ledger.getPosition(2).status).toBe('Active');
    expect(harness.ledger.getUserPositions('alice')).toEqual([]);
    expect(harness.ledger.getUserPositions('bob')).toEqual([2]);
  });

  it('rechecks positions already swept when the price moves mid-sweep', async () => {
    harness = createHarness();
    await bootstrap(harness);
    await harness.ledger.requestLoan('alice', 20n, 300_000n);
    await harness.ledger.requestLoan('bob', 20n, 300_000n);

    sweeper = new LiquidationSweeper(harness.container, harness.eventBus, harness.ledger, 0);
    await sweeper.start();
    // The first sweep checks position 1 at 40000 (ratio 200) before the second price commits.
    await harness.oracle.setPrice(ADMIN, 'BTC', 40_000n);
    await harness.oracle.setPrice(ADMIN, 'BTC', 10_000n);

    await vi.waitFor(() => {
      expect(harness.ledger.getPosition(1).status).toBe('Liquidated');
      expect(harness.ledger.getPosition(2).status).toBe('Liquidated');
    });
    expect(harness.ledger.getActivePositionIds()).toEqual([]);
  });

  it('ignores price updates for the secondary asset', async () => {
    harness = createHarness();
    await bootstrap(harness);
    const ledger = harness.ledger;
    const spy = vi.spyOn(ledger, 'getActivePositionIds');

    sweeper = new LiquidationSweeper(harness.container, harness.eventBus, ledger, 0);
    await sweeper.start();
    await harness.oracle.setPrice(ADMIN, 'USDC', 1n);

    expect(spy).not.toHaveBeenCalled();
  });

  it('runs on its interval until stopped', async () => {
    vi.useFakeTimers();
    try {
      harness = createHarness();
      const check = vi.fn();
      const ledger = stubLedger([], check);
      const spy = vi.spyOn(ledger, 'getActivePositionIds');
      sweeper = new LiquidationSweeper(harness.container, harness.eventBus, ledger, 1_000);

      await sweeper.start();
      await vi.advanceTimersByTimeAsync(2_500);
      expect(spy).toHaveBeenCalledTimes(2);

      await sweeper.stop();
      await vi.advanceTimersByTimeAsync(5_000);
      expect(spy).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});
