import type { LedgerAggregates } from '../../types/ledger.js';
import type { Position } from '../../types/position.js';
import { checkedAdd, checkedSub } from '../health-engine/health-engine.js';

// Collateral is locked while a position is Active and released on either terminal
// transition, so totalCollateralLocked is the sum over Active positions.

export function recordDeposit(aggregates: LedgerAggregates, amount: bigint): void {
  aggregates.totalCollateralDeposited = checkedAdd(aggregates.totalCollateralDeposited, amount);
}

export function recordLoanOpened(aggregates: LedgerAggregates, position: Position): void {
  aggregates.totalCollateralLocked = checkedAdd(aggregates.totalCollateralLocked, position.collateralAmount);
  aggregates.totalDebtIssued = checkedAdd(aggregates.totalDebtIssued, position.debtAmount);
  aggregates.totalPositionsIssued += 1;
}

export function recordRepayment(aggregates: LedgerAggregates, position: Position, amountPaid: bigint): void {
  aggregates.totalCollateralLocked = checkedSub(aggregates.totalCollateralLocked, position.collateralAmount);
  aggregates.totalDebtRepaid = checkedAdd(aggregates.totalDebtRepaid, amountPaid);
  aggregates.totalPositionsRepaid += 1;
}

export function recordLiquidation(aggregates: LedgerAggregates, position: Position): void {
  aggregates.totalCollateralLocked = checkedSub(aggregates.totalCollateralLocked, position.collateralAmount);
  aggregates.totalPositionsLiquidated += 1;
}
