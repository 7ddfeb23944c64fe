import { LedgerError } from '../../common/errors.js';
import type { Position } from '../../types/position.js';

/** Time units in one accrual period (one day of ten-minute units). */
export const UNITS_PER_PERIOD = 144n;

/** Upper bound of every stored quantity and intermediate product. */
export const MAX_AMOUNT = 2n ** 128n - 1n;

export const PRICE_CEILING = 1_000_000_000_000n;

export const MINIMUM_RATIO_FLOOR = 110n;

function checked(value: bigint, what: string): bigint {
  if (value < 0n || value > MAX_AMOUNT) {
    throw new LedgerError('InvalidAmount', `${what} out of range`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return checked(a + b, 'Sum');
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError('InvalidAmount', 'Subtraction underflow');
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return checked(a * b, 'Product');
}

export function assertAmount(value: bigint, what = 'Amount'): bigint {
  return checked(value, what);
}

/**
 * Collateral value over debt as a whole-number percentage. The quotient is
 * truncated before scaling, so 1.99x reads as 100.
 */
export function collateralRatio(collateral: bigint, debt: bigint, price: bigint): bigint {
  if (debt <= 0n) {
    throw new LedgerError('InvalidAmount', 'Debt must be positive to compute a ratio');
  }
  return checkedMul(checkedMul(collateral, price) / debt, 100n);
}

/**
 * Simple interest for `elapsedUnits` time units. The per-unit amount is truncated
 * first, so rounding loss accrues to the protocol.
 */
export function interestOwed(principal: bigint, rate: bigint, elapsedUnits: number): bigint {
  if (!Number.isSafeInteger(elapsedUnits) || elapsedUnits < 0) {
    throw new LedgerError('InvalidAmount', `Invalid elapsed time: ${elapsedUnits}`);
  }
  const perUnit = checkedMul(principal, rate) / (100n * UNITS_PER_PERIOD);
  return checkedMul(perUnit, BigInt(elapsedUnits));
}

/**
 * Admission rule: collateral value, in percent of the debt, must reach the
 * minimum ratio. Exact equality passes.
 */
export function meetsMinimumCollateral(
  collateral: bigint,
  price: bigint,
  debt: bigint,
  minimumRatio: bigint,
): boolean {
  return checkedMul(checkedMul(collateral, price), 100n) >= checkedMul(debt, minimumRatio);
}

export function isHealthy(
  position: Pick<Position, 'collateralAmount' | 'debtAmount'>,
  price: bigint,
  threshold: bigint,
): boolean {
  return collateralRatio(position.collateralAmount, position.debtAmount, price) > threshold;
}

/** Principal plus interest accrued since the last accrual marker. */
export function amountOwed(
  position: Pick<Position, 'debtAmount' | 'interestRate' | 'lastAccrualAt'>,
  now: number,
): { interest: bigint; total: bigint } {
  const elapsed = Math.max(0, now - position.lastAccrualAt);
  const interest = interestOwed(position.debtAmount, position.interestRate, elapsed);
  return { interest, total: checkedAdd(position.debtAmount, interest) };
}
