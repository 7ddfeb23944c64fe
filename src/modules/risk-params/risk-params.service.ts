import type { Container } from '../../infra/container.js';
import type { LedgerStore } from '../persistence/ledger-store.js';
import type { LedgerState } from '../../types/ledger.js';
import type { RiskParameters } from '../../types/risk.js';
import type { RiskParameterUpdatedEvent } from '../../types/events.js';
import { LedgerError } from '../../common/errors.js';
import { requireAdministrator } from '../../common/guards.js';
import { MINIMUM_RATIO_FLOOR } from '../health-engine/health-engine.js';

type RiskParameterName = RiskParameterUpdatedEvent['parameter'];

export function requireInitialized(state: Readonly<LedgerState>): void {
  if (!state.initialized) {
    throw new LedgerError('NotInitialized', 'Platform has not been initialized');
  }
}

export class RiskParamsService {
  private readonly container: Container;
  private readonly store: LedgerStore;

  constructor(container: Container, store: LedgerStore) {
    this.container = container;
    this.store = store;
  }

  async initialize(caller: string): Promise<void> {
    const { ledgerConfig, logger } = this.container;

    await this.store.transact('initialize', ({ draft, now, emit }) => {
      requireAdministrator(ledgerConfig, caller);
      if (draft.initialized) {
        throw new LedgerError('AlreadyInitialized');
      }
      draft.initialized = true;
      emit({ type: 'PLATFORM_INITIALIZED', at: now, administrator: caller });
    });

    logger.info({ administrator: caller }, 'Platform initialized');
  }

  isInitialized(): boolean {
    return this.store.read((state) => state.initialized);
  }

  setMinimumRatio(caller: string, value: bigint): Promise<void> {
    return this.update(caller, 'minimumCollateralRatio', value, MINIMUM_RATIO_FLOOR, null);
  }

  setLiquidationThreshold(caller: string, value: bigint): Promise<void> {
    return this.update(caller, 'liquidationThreshold', value, MINIMUM_RATIO_FLOOR, null);
  }

  setFeeRate(caller: string, value: bigint): Promise<void> {
    return this.update(caller, 'feeRate', value, 0n, 100n);
  }

  getRiskParameters(): RiskParameters {
    return this.store.read((state) => ({ ...state.riskParams }));
  }

  private async update(
    caller: string,
    parameter: RiskParameterName,
    value: bigint,
    min: bigint,
    max: bigint | null,
  ): Promise<void> {
    const { ledgerConfig, logger } = this.container;

    await this.store.transact(`set:${parameter}`, ({ draft, now, emit }) => {
      requireAdministrator(ledgerConfig, caller);
      if (value < min || (max !== null && value > max)) {
        throw new LedgerError('InvalidAmount', `${parameter} ${value} out of range`);
      }
      draft.riskParams[parameter] = value;
      emit({ type: 'RISK_PARAMETER_UPDATED', at: now, parameter, value });
    });

    logger.info({ parameter, value: value.toString() }, 'Risk parameter updated');
  }
}
