import { describe, it, expect, vi } from 'vitest';
import { EventBus } from './event-bus.js';
import type { LoanOpenedEvent, PriceUpdatedEvent } from '../types/events.js';
import { createMockLogger } from '../testing/fixtures.js';

const loanOpened: LoanOpenedEvent = {
  type: 'LOAN_OPENED',
  at: 12,
  positionId: 1,
  borrower: 'alice',
  collateralAmount: 10n,
  debtAmount: 300_000n,
};

const priceUpdated: PriceUpdatedEvent = {
  type: 'PRICE_UPDATED',
  at: 12,
  asset: 'BTC',
  price: 30_000n,
};

describe('EventBus', () => {
  it('emits events to global handlers', () => {
    const bus = new EventBus(createMockLogger());
    const handler = vi.fn();

    bus.on(handler);
    bus.emit(loanOpened);

    expect(handler).toHaveBeenCalledWith(loanOpened);
  });

  it('emits events to type-specific handlers', () => {
    const bus = new EventBus(createMockLogger());
    const loanHandler = vi.fn();
    const priceHandler = vi.fn();

    bus.onType('LOAN_OPENED', loanHandler);
    bus.onType('PRICE_UPDATED', priceHandler);
    bus.emit(loanOpened);

    expect(loanHandler).toHaveBeenCalledWith(loanOpened);
    expect(priceHandler).not.toHaveBeenCalled();
  });

  it('removes handlers with off()', () => {
    const bus = new EventBus(createMockLogger());
    const handler = vi.fn();

    bus.on(handler);
    bus.onType('PRICE_UPDATED', handler);
    bus.off(handler);
    bus.emit(priceUpdated);

    expect(handler).not.toHaveBeenCalled();
  });

  it('removes all listeners', () => {
    const bus = new EventBus(createMockLogger());
    const h1 = vi.fn();
    const h2 = vi.fn();

    bus.on(h1);
    bus.onType('LOAN_OPENED', h2);
    bus.removeAllListeners();
    bus.emit(loanOpened);

    expect(h1).not.toHaveBeenCalled();
    expect(h2).not.toHaveBeenCalled();
  });

  it('logs a throwing handler without affecting the emitter or other handlers', () => {
    const logger = createMockLogger();
    const bus = new EventBus(logger);
    const after = vi.fn();
    const failure = new Error('boom');

    bus.on(() => {
      throw failure;
    });
    bus.on(after);

    expect(() => bus.emit(loanOpened)).not.toThrow();
    expect(after).toHaveBeenCalledWith(loanOpened);
    expect(logger.error).toHaveBeenCalledWith(
      { err: failure, eventType: 'LOAN_OPENED' },
      'Event handler failed',
    );
  });

  it('logs a rejecting async handler', async () => {
    const logger = createMockLogger();
    const bus = new EventBus(logger);
    const failure = new Error('async boom');

    bus.on(async () => {
      throw failure;
    });
    bus.emit(priceUpdated);

    await vi.waitFor(() => {
      expect(logger.error).toHaveBeenCalledWith(
        { err: failure, eventType: 'PRICE_UPDATED' },
        'Event handler failed',
      );
    });
  });
});
