import type { Container } from '../../infra/container.js';
import type { LedgerStore, TransactionContext } from '../persistence/ledger-store.js';
import type { LedgerState, LedgerStats } from '../../types/ledger.js';
import type { LiquidationOutcome, Position, PositionView } from '../../types/position.js';
import { LedgerError } from '../../common/errors.js';
import { requirePrice } from '../oracle/oracle.service.js';
import { requireInitialized } from '../risk-params/risk-params.service.js';
import {
  amountOwed,
  assertAmount,
  collateralRatio,
  meetsMinimumCollateral,
} from '../health-engine/health-engine.js';
import { appendToIndex, clearIndex, removeFromIndex } from './user-index.js';
import { recordDeposit, recordLiquidation, recordLoanOpened, recordRepayment } from './aggregates.js';

function validatePositionId(id: number): void {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new LedgerError('InvalidLoanId', `Invalid position id ${id}`);
  }
}

function requirePosition(state: Readonly<LedgerState>, id: number): Position {
  validatePositionId(id);
  const position = state.positions.get(id);
  if (!position) {
    throw new LedgerError('LoanNotFound', `Position ${id} not found`);
  }
  return position;
}

function requirePositiveAmount(value: bigint, what: string): bigint {
  if (value <= 0n) {
    throw new LedgerError('InvalidAmount', `${what} must be positive`);
  }
  return assertAmount(value, what);
}

export class LedgerService {
  private readonly container: Container;
  private readonly store: LedgerStore;

  constructor(container: Container, store: LedgerStore) {
    this.container = container;
    this.store = store;
  }

  /**
   * Records collateral that custody has already received. The transfer itself
   * happens outside the ledger and is not verified here.
   */
  async depositCollateral(caller: string, amount: bigint): Promise<void> {
    await this.store.transact('depositCollateral', ({ draft, now, emit }) => {
      requireInitialized(draft);
      requirePositiveAmount(amount, 'Deposit amount');

      recordDeposit(draft.aggregates, amount);
      emit({ type: 'COLLATERAL_DEPOSITED', at: now, depositor: caller, amount });
    });

    this.container.logger.info({ depositor: caller, amount: amount.toString() }, 'Collateral deposited');
  }

  async requestLoan(caller: string, collateral: bigint, debt: bigint): Promise<number> {
    const { ledgerConfig, logger } = this.container;

    const position = await this.store.transact('requestLoan', ({ draft, now, emit }) => {
      requireInitialized(draft);
      requirePositiveAmount(collateral, 'Collateral amount');
      requirePositiveAmount(debt, 'Debt amount');
      if (debt < ledgerConfig.minLoanAmount) {
        throw new LedgerError('BelowMinimum', `Debt ${debt} below minimum loan ${ledgerConfig.minLoanAmount}`);
      }

      const price = requirePrice(draft, ledgerConfig.assets.collateral);
      const { minimumCollateralRatio } = draft.riskParams;
      if (!meetsMinimumCollateral(collateral, price, debt, minimumCollateralRatio)) {
        throw new LedgerError(
          'InsufficientCollateral',
          `Collateral of ${collateral} at ${price} is under ${minimumCollateralRatio}% of debt ${debt}`,
        );
      }

      const created: Position = {
        id: draft.nextPositionId,
        borrower: caller,
        collateralAmount: collateral,
        debtAmount: debt,
        interestRate: ledgerConfig.defaultInterestRate,
        openedAt: now,
        lastAccrualAt: now,
        status: 'Active',
      };

      appendToIndex(draft.userIndex, caller, created.id, ledgerConfig.maxPositionsPerUser);
      draft.positions.set(created.id, created);
      draft.nextPositionId += 1;
      recordLoanOpened(draft.aggregates, created);

      emit({
        type: 'LOAN_OPENED',
        at: now,
        positionId: created.id,
        borrower: caller,
        collateralAmount: collateral,
        debtAmount: debt,
      });
      return created;
    });

    logger.info(
      {
        positionId: position.id,
        borrower: caller,
        collateral: collateral.toString(),
        debt: debt.toString(),
      },
      'Loan opened',
    );
    return position.id;
  }

  async repay(caller: string, id: number, amount: bigint): Promise<void> {
    const { logger } = this.container;

    const interestPaid = await this.store.transact('repay', ({ draft, now, emit }) => {
      requireInitialized(draft);
      const position = requirePosition(draft, id);
      if (position.status !== 'Active') {
        throw new LedgerError('LoanNotActive', `Position ${id} is ${position.status}`);
      }
      if (position.borrower !== caller) {
        throw new LedgerError('Unauthorized', `${caller} is not the borrower of position ${id}`);
      }

      assertAmount(amount, 'Repayment amount');
      const owed = amountOwed(position, now);
      if (amount < owed.total) {
        throw new LedgerError('InvalidAmount', `Repayment ${amount} below amount owed ${owed.total}`);
      }

      position.status = 'Repaid';
      position.lastAccrualAt = now;
      recordRepayment(draft.aggregates, position, amount);
      removeFromIndex(draft.userIndex, caller, id);

      emit({
        type: 'LOAN_REPAID',
        at: now,
        positionId: id,
        borrower: caller,
        amountPaid: amount,
        interestPaid: owed.interest,
      });
      return owed.interest;
    });

    logger.info(
      { positionId: id, borrower: caller, amount: amount.toString(), interest: interestPaid.toString() },
      'Loan repaid',
    );
  }

  /**
   * Liquidates the position when its collateral ratio is at or below the
   * liquidation threshold. Calling it on an already liquidated position is a no-op.
   */
  async checkLiquidation(id: number): Promise<LiquidationOutcome> {
    const { logger } = this.container;

    const outcome = await this.store.transact('checkLiquidation', (tx) =>
      this.evaluateLiquidation(tx, id),
    );

    if (outcome.liquidated) {
      logger.warn(
        {
          positionId: id,
          ratio: outcome.collateralRatio?.toString(),
          threshold: outcome.liquidationThreshold.toString(),
        },
        'Position liquidated',
      );
    }
    return outcome;
  }

  private evaluateLiquidation(
    { draft, now, emit }: TransactionContext,
    id: number,
  ): LiquidationOutcome {
    const { ledgerConfig } = this.container;
    requireInitialized(draft);

    const position = requirePosition(draft, id);
    const threshold = draft.riskParams.liquidationThreshold;

    if (position.status === 'Liquidated') {
      return {
        positionId: id,
        status: position.status,
        liquidated: false,
        collateralRatio: null,
        liquidationThreshold: threshold,
      };
    }
    if (position.status === 'Repaid') {
      throw new LedgerError('InvalidLiquidation', `Position ${id} is already repaid`);
    }

    const price = requirePrice(draft, ledgerConfig.assets.collateral);
    const ratio = collateralRatio(position.collateralAmount, position.debtAmount, price);
    if (ratio > threshold) {
      return {
        positionId: id,
        status: position.status,
        liquidated: false,
        collateralRatio: ratio,
        liquidationThreshold: threshold,
      };
    }

    position.status = 'Liquidated';
    recordLiquidation(draft.aggregates, position);
    if (ledgerConfig.liquidationIndexPurge === 'borrower') {
      clearIndex(draft.userIndex, position.borrower);
    } else {
      removeFromIndex(draft.userIndex, position.borrower, id);
    }

    emit({
      type: 'POSITION_LIQUIDATED',
      at: now,
      positionId: id,
      borrower: position.borrower,
      collateralRatio: ratio,
    });
    return {
      positionId: id,
      status: position.status,
      liquidated: true,
      collateralRatio: ratio,
      liquidationThreshold: threshold,
    };
  }

  getPosition(id: number): PositionView {
    const now = this.container.clock.now();
    return this.store.read((state) => {
      const position = requirePosition(state, id);
      if (position.status !== 'Active') {
        return { ...position, interestOwed: 0n, amountOwed: 0n };
      }
      const owed = amountOwed(position, now);
      return { ...position, interestOwed: owed.interest, amountOwed: owed.total };
    });
  }

  getAmountOwed(id: number): bigint {
    return this.getPosition(id).amountOwed;
  }

  getUserPositions(user: string): number[] {
    return this.store.read((state) => [...(state.userIndex.get(user) ?? [])]);
  }

  getActivePositionIds(): number[] {
    return this.store.read((state) =>
      Array.from(state.positions.values())
        .filter((p) => p.status === 'Active')
        .map((p) => p.id),
    );
  }

  getStats(): LedgerStats {
    return this.store.read((state) => ({
      ...state.aggregates,
      initialized: state.initialized,
      activePositions: Array.from(state.positions.values()).filter((p) => p.status === 'Active')
        .length,
    }));
  }
}
