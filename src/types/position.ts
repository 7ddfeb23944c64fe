export type PositionStatus = 'Active' | 'Repaid' | 'Liquidated';

export interface Position {
  id: number;
  borrower: string;
  collateralAmount: bigint;
  debtAmount: bigint;
  interestRate: bigint;
  openedAt: number;
  lastAccrualAt: number;
  status: PositionStatus;
}

export interface PositionView extends Position {
  interestOwed: bigint;
  amountOwed: bigint;
}

export interface LiquidationOutcome {
  positionId: number;
  status: PositionStatus;
  liquidated: boolean;
  collateralRatio: bigint | null;
  liquidationThreshold: bigint;
}
