import { z } from 'zod';
import type { LedgerState } from '../../types/ledger.js';
import type { RiskParameters } from '../../types/risk.js';

const uint = z
  .string()
  .regex(/^\d+$/, 'Expected an unsigned integer string')
  .transform((v) => BigInt(v));

const positionSchema = z.object({
  id: z.number().int().positive(),
  borrower: z.string().min(1),
  collateralAmount: uint,
  debtAmount: uint,
  interestRate: uint,
  openedAt: z.number().int().min(0),
  lastAccrualAt: z.number().int().min(0),
  status: z.enum(['Active', 'Repaid', 'Liquidated']),
});

export const snapshotSchema = z.object({
  version: z.literal(1),
  initialized: z.boolean(),
  nextPositionId: z.number().int().min(1),
  riskParams: z.object({
    minimumCollateralRatio: uint,
    liquidationThreshold: uint,
    feeRate: uint,
  }),
  prices: z.array(z.tuple([z.string(), uint])),
  positions: z.array(positionSchema),
  userIndex: z.array(z.tuple([z.string(), z.array(z.number().int().positive())])),
  aggregates: z.object({
    totalCollateralLocked: uint,
    totalCollateralDeposited: uint,
    totalDebtIssued: uint,
    totalDebtRepaid: uint,
    totalPositionsIssued: z.number().int().min(0),
    totalPositionsRepaid: z.number().int().min(0),
    totalPositionsLiquidated: z.number().int().min(0),
  }),
});

export type LedgerSnapshot = z.input<typeof snapshotSchema>;

export function createInitialState(riskParams: RiskParameters): LedgerState {
  return {
    initialized: false,
    nextPositionId: 1,
    riskParams: { ...riskParams },
    prices: new Map(),
    positions: new Map(),
    userIndex: new Map(),
    aggregates: {
      totalCollateralLocked: 0n,
      totalCollateralDeposited: 0n,
      totalDebtIssued: 0n,
      totalDebtRepaid: 0n,
      totalPositionsIssued: 0,
      totalPositionsRepaid: 0,
      totalPositionsLiquidated: 0,
    },
  };
}

export function cloneState(state: LedgerState): LedgerState {
  return structuredClone(state);
}

export function serializeState(state: LedgerState): LedgerSnapshot {
  const { riskParams, aggregates } = state;
  return {
    version: 1,
    initialized: state.initialized,
    nextPositionId: state.nextPositionId,
    riskParams: {
      minimumCollateralRatio: riskParams.minimumCollateralRatio.toString(),
      liquidationThreshold: riskParams.liquidationThreshold.toString(),
      feeRate: riskParams.feeRate.toString(),
    },
    prices: Array.from(state.prices.entries()).map(([asset, price]): [string, string] => [
      asset,
      price.toString(),
    ]),
    positions: Array.from(state.positions.values()).map((pos) => ({
      ...pos,
      collateralAmount: pos.collateralAmount.toString(),
      debtAmount: pos.debtAmount.toString(),
      interestRate: pos.interestRate.toString(),
    })),
    userIndex: Array.from(state.userIndex.entries()).map(([user, ids]): [string, number[]] => [
      user,
      [...ids],
    ]),
    aggregates: {
      ...aggregates,
      totalCollateralLocked: aggregates.totalCollateralLocked.toString(),
      totalCollateralDeposited: aggregates.totalCollateralDeposited.toString(),
      totalDebtIssued: aggregates.totalDebtIssued.toString(),
      totalDebtRepaid: aggregates.totalDebtRepaid.toString(),
    },
  };
}

export function deserializeState(raw: unknown): LedgerState {
  const parsed = snapshotSchema.parse(raw);
  return {
    initialized: parsed.initialized,
    nextPositionId: parsed.nextPositionId,
    riskParams: parsed.riskParams,
    prices: new Map(parsed.prices),
    positions: new Map(parsed.positions.map((pos) => [pos.id, pos])),
    userIndex: new Map(parsed.userIndex),
    aggregates: parsed.aggregates,
  };
}
