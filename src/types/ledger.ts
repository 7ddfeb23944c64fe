import type { Position } from './position.js';
import type { RiskParameters } from './risk.js';

export type IndexPurgeMode = 'position' | 'borrower';

export interface RecognizedAssets {
  collateral: string;
  secondary: string;
}

/** Static configuration injected into the ledger at construction. */
export interface LedgerConfig {
  administrator: string;
  assets: RecognizedAssets;
  initialRiskParams: RiskParameters;
  defaultInterestRate: bigint;
  minLoanAmount: bigint;
  maxPositionsPerUser: number;
  liquidationIndexPurge: IndexPurgeMode;
}

export interface LedgerAggregates {
  totalCollateralLocked: bigint;
  totalCollateralDeposited: bigint;
  totalDebtIssued: bigint;
  totalDebtRepaid: bigint;
  totalPositionsIssued: number;
  totalPositionsRepaid: number;
  totalPositionsLiquidated: number;
}

export interface LedgerState {
  initialized: boolean;
  nextPositionId: number;
  riskParams: RiskParameters;
  prices: Map<string, bigint>;
  positions: Map<number, Position>;
  userIndex: Map<string, number[]>;
  aggregates: LedgerAggregates;
}

export interface LedgerStats extends LedgerAggregates {
  initialized: boolean;
  activePositions: number;
}
