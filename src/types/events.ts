export type LedgerEventType =
  | 'PLATFORM_INITIALIZED'
  | 'RISK_PARAMETER_UPDATED'
  | 'PRICE_UPDATED'
  | 'COLLATERAL_DEPOSITED'
  | 'LOAN_OPENED'
  | 'LOAN_REPAID'
  | 'POSITION_LIQUIDATED';

export interface BaseEvent {
  type: LedgerEventType;
  at: number;
}

export interface PlatformInitializedEvent extends BaseEvent {
  type: 'PLATFORM_INITIALIZED';
  administrator: string;
}

export interface RiskParameterUpdatedEvent extends BaseEvent {
  type: 'RISK_PARAMETER_UPDATED';
  parameter: 'minimumCollateralRatio' | 'liquidationThreshold' | 'feeRate';
  value: bigint;
}

export interface PriceUpdatedEvent extends BaseEvent {
  type: 'PRICE_UPDATED';
  asset: string;
  price: bigint;
}

export interface CollateralDepositedEvent extends BaseEvent {
  type: 'COLLATERAL_DEPOSITED';
  depositor: string;
  amount: bigint;
}

export interface LoanOpenedEvent extends BaseEvent {
  type: 'LOAN_OPENED';
  positionId: number;
  borrower: string;
  collateralAmount: bigint;
  debtAmount: bigint;
}

export interface LoanRepaidEvent extends BaseEvent {
  type: 'LOAN_REPAID';
  positionId: number;
  borrower: string;
  amountPaid: bigint;
  interestPaid: bigint;
}

export interface PositionLiquidatedEvent extends BaseEvent {
  type: 'POSITION_LIQUIDATED';
  positionId: number;
  borrower: string;
  collateralRatio: bigint;
}

export type LedgerEvent =
  | PlatformInitializedEvent
  | RiskParameterUpdatedEvent
  | PriceUpdatedEvent
  | CollateralDepositedEvent
  | LoanOpenedEvent
  | LoanRepaidEvent
  | PositionLiquidatedEvent;
