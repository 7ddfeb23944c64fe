import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { LedgerService } from '../ledger/ledger.service.js';
import type { LedgerEvent } from '../../types/events.js';

export interface SweepResult {
  checked: number;
  liquidated: number[];
  failed: number;
}

/**
 * Runs the liquidation check over every active position, on a timer and after
 * each collateral price update. Sweeps never overlap.
 */
export class LiquidationSweeper {
  private readonly container: Container;
  private readonly eventBus: EventBus;
  private readonly ledger: LedgerService;
  private readonly intervalMs: number;
  private sweepInterval: ReturnType<typeof setInterval> | null = null;
  private sweeping = false;
  private rerunRequested = false;

  constructor(container: Container, eventBus: EventBus, ledger: LedgerService, intervalMs: number) {
    this.container = container;
    this.eventBus = eventBus;
    this.ledger = ledger;
    this.intervalMs = intervalMs;
  }

  async start(): Promise<void> {
    const { logger } = this.container;
    logger.info({ intervalMs: this.intervalMs }, 'Starting liquidation sweeper');

    this.eventBus.onType('PRICE_UPDATED', (event) => this.handlePriceUpdate(event));

    if (this.intervalMs > 0) {
      this.sweepInterval = setInterval(() => {
        this.sweep().catch((err) => {
          logger.error({ err }, 'Scheduled liquidation sweep failed');
        });
      }, this.intervalMs);
    }

    logger.info('Liquidation sweeper started');
  }

  private async handlePriceUpdate(event: LedgerEvent): Promise<void> {
    if (event.type !== 'PRICE_UPDATED') return;
    if (event.asset !== this.container.ledgerConfig.assets.collateral) return;
    await this.sweep();
  }

  /**
   * Checks every active position. A call made while a sweep is running returns
   * null and makes the running sweep take one more pass once its current one ends.
   */
  async sweep(): Promise<SweepResult | null> {
    const { logger } = this.container;
    if (this.sweeping) {
      logger.debug('Liquidation sweep already running, scheduling another pass');
      this.rerunRequested = true;
      return null;
    }

    this.sweeping = true;
    try {
      const result: SweepResult = { checked: 0, liquidated: [], failed: 0 };
      let passes = 0;
      do {
        this.rerunRequested = false;
        passes += 1;
        await this.runPass(result);
      } while (this.rerunRequested);

      logger.info(
        {
          passes,
          checked: result.checked,
          liquidated: result.liquidated.length,
          failed: result.failed,
        },
        'Liquidation sweep completed',
      );
      return result;
    } finally {
      this.sweeping = false;
    }
  }

  private async runPass(result: SweepResult): Promise<void> {
    const { logger } = this.container;
    for (const id of this.ledger.getActivePositionIds()) {
      try {
        const outcome = await this.ledger.checkLiquidation(id);
        result.checked += 1;
        if (outcome.liquidated) result.liquidated.push(id);
      } catch (err) {
        result.failed += 1;
        logger.error({ err, positionId: id }, 'Liquidation check failed');
      }
    }
  }

  async stop(): Promise<void> {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
    this.container.logger.info('Liquidation sweeper stopped');
  }
}
