import type { Container } from '../../infra/container.js';
import type { LedgerStore } from '../persistence/ledger-store.js';
import type { LedgerState } from '../../types/ledger.js';
import { LedgerError } from '../../common/errors.js';
import { requireAdministrator } from '../../common/guards.js';
import { PRICE_CEILING } from '../health-engine/health-engine.js';

/** Latest quote for `asset`, or NotInitialized when none was ever published. */
export function requirePrice(state: Readonly<LedgerState>, asset: string): bigint {
  const price = state.prices.get(asset);
  if (price === undefined) {
    throw new LedgerError('NotInitialized', `No price set for ${asset}`);
  }
  return price;
}

export class OracleService {
  private readonly container: Container;
  private readonly store: LedgerStore;

  constructor(container: Container, store: LedgerStore) {
    this.container = container;
    this.store = store;
  }

  isRecognizedAsset(asset: string): boolean {
    const { assets } = this.container.ledgerConfig;
    return asset === assets.collateral || asset === assets.secondary;
  }

  async setPrice(caller: string, asset: string, price: bigint): Promise<void> {
    const { ledgerConfig, logger } = this.container;

    await this.store.transact('setPrice', ({ draft, now, emit }) => {
      requireAdministrator(ledgerConfig, caller);
      if (!this.isRecognizedAsset(asset)) {
        throw new LedgerError('InvalidAsset', `Unrecognized asset ${asset}`);
      }
      if (price <= 0n || price > PRICE_CEILING) {
        throw new LedgerError('InvalidPrice', `Price ${price} outside (0, ${PRICE_CEILING}]`);
      }

      draft.prices.set(asset, price);
      emit({ type: 'PRICE_UPDATED', at: now, asset, price });
    });

    logger.info({ asset, price: price.toString() }, 'Oracle price updated');
  }

  getPrice(asset: string): bigint {
    return this.store.read((state) => requirePrice(state, asset));
  }
}
