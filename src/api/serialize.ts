import type { LiquidationOutcome, PositionView } from '../types/position.js';
import type { LedgerStats } from '../types/ledger.js';
import type { RiskParameters } from '../types/risk.js';

// JSON has no bigint; amounts leave the API as decimal strings.

export function positionToJson(view: PositionView) {
  return {
    id: view.id,
    borrower: view.borrower,
    collateralAmount: view.collateralAmount.toString(),
    debtAmount: view.debtAmount.toString(),
    interestRate: view.interestRate.toString(),
    openedAt: view.openedAt,
    lastAccrualAt: view.lastAccrualAt,
    status: view.status,
    interestOwed: view.interestOwed.toString(),
    amountOwed: view.amountOwed.toString(),
  };
}

export function outcomeToJson(outcome: LiquidationOutcome) {
  return {
    positionId: outcome.positionId,
    status: outcome.status,
    liquidated: outcome.liquidated,
    collateralRatio: outcome.collateralRatio?.toString() ?? null,
    liquidationThreshold: outcome.liquidationThreshold.toString(),
  };
}

export function riskParamsToJson(params: RiskParameters) {
  return {
    minimumCollateralRatio: params.minimumCollateralRatio.toString(),
    liquidationThreshold: params.liquidationThreshold.toString(),
    feeRate: params.feeRate.toString(),
  };
}

export function statsToJson(stats: LedgerStats) {
  return {
    initialized: stats.initialized,
    activePositions: stats.activePositions,
    totalCollateralLocked: stats.totalCollateralLocked.toString(),
    totalCollateralDeposited: stats.totalCollateralDeposited.toString(),
    totalDebtIssued: stats.totalDebtIssued.toString(),
    totalDebtRepaid: stats.totalDebtRepaid.toString(),
    totalPositionsIssued: stats.totalPositionsIssued,
    totalPositionsRepaid: stats.totalPositionsRepaid,
    totalPositionsLiquidated: stats.totalPositionsLiquidated,
  };
}
