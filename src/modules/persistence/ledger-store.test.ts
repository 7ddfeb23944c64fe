import { describe, it, expect, vi } from 'vitest';
import { ADMIN, bootstrap, createHarness } from '../../testing/fixtures.js';
import { MemorySnapshotStore, type SnapshotStore } from './snapshot-store.js';
import type { LedgerSnapshot } from './snapshot.js';

class FailingSnapshotStore implements SnapshotStore {
  private readonly inner = new MemorySnapshotStore();
  failNextSave = false;

  async load(): Promise<unknown> {
    return this.inner.load();
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false;
      throw new Error('snapshot write failed');
    }
    await this.inner.save(snapshot);
  }
}

describe('LedgerStore', () => {
  it('leaves committed state untouched when persistence fails', async () => {
    const snapshots = new FailingSnapshotStore();
    const harness = createHarness({}, snapshots);
    await bootstrap(harness);
    const opened = vi.fn();
    harness.eventBus.onType('LOAN_OPENED', opened);

    snapshots.failNextSave = true;
    await expect(harness.ledger.requestLoan('alice', 10n, 300_000n)).rejects.toThrow(
      'snapshot write failed',
    );

    expect(harness.ledger.getStats().totalPositionsIssued).toBe(0);
    expect(harness.ledger.getUserPositions('alice')).toEqual([]);
    expect(opened).not.toHaveBeenCalled();

    await expect(harness.ledger.requestLoan('alice', 10n, 300_000n)).resolves.toBe(1);
    expect(opened).toHaveBeenCalledTimes(1);
  });

  it('keeps serving operations after a rejected one', async () => {
    const harness = createHarness();
    await bootstrap(harness);

    const results = await Promise.allSettled([
      harness.ledger.requestLoan('alice', 1n, 300_000n),
      harness.ledger.requestLoan('alice', 10n, 300_000n),
    ]);

    expect(results[0]?.status).toBe('rejected');
    expect(results[1]).toEqual({ status: 'fulfilled', value: 1 });
  });

  it('logs rejected operations with their error code', async () => {
    const harness = createHarness();

    await expect(harness.riskParams.initialize('mallory')).rejects.toThrow();

    expect(harness.container.logger.warn).toHaveBeenCalledWith(
      { operation: 'initialize', code: 'Unauthorized', reason: 'mallory is not the administrator' },
      'Ledger operation rejected',
    );
  });

  it('skips the snapshot write when nothing changed', async () => {
    const snapshots = new MemorySnapshotStore();
    const save = vi.spyOn(snapshots, 'save');
    const harness = createHarness({}, snapshots);
    await bootstrap(harness);
    await harness.ledger.requestLoan('alice', 100n, 300_000n);
    save.mockClear();

    await harness.ledger.checkLiquidation(1);

    expect(save).not.toHaveBeenCalled();
  });

  it('restores the committed ledger from its snapshot', async () => {
    const snapshots = new MemorySnapshotStore();
    const first = createHarness({}, snapshots);
    await bootstrap(first);
    await first.ledger.requestLoan('alice', 10n, 300_000n);
    await first.ledger.requestLoan('bob', 100n, 300_000n);
    await first.ledger.repay('bob', 2, 300_000n);
    await first.riskParams.setLiquidationThreshold(ADMIN, 130n);

    const second = createHarness({}, snapshots);
    await second.store.load();

    expect(second.ledger.getStats()).toEqual(first.ledger.getStats());
    expect(second.ledger.getPosition(1)).toEqual(first.ledger.getPosition(1));
    expect(second.ledger.getUserPositions('alice')).toEqual([1]);
    expect(second.oracle.getPrice('BTC')).toBe(50_000n);
    expect(second.riskParams.getRiskParameters().liquidationThreshold).toBe(130n);
    await expect(second.ledger.requestLoan('carol', 10n, 300_000n)).resolves.toBe(3);
  });

  it('starts empty when no snapshot exists', async () => {
    const harness = createHarness();
    await harness.store.load();

    expect(harness.riskParams.isInitialized()).toBe(false);
    expect(harness.container.logger.info).toHaveBeenCalledWith(
      'No ledger snapshot found, starting from an empty ledger',
    );
  });
});
