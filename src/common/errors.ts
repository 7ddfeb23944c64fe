export type LedgerErrorCode =
  | 'Unauthorized'
  | 'InsufficientCollateral'
  | 'BelowMinimum'
  | 'InvalidAmount'
  | 'AlreadyInitialized'
  | 'NotInitialized'
  | 'InvalidLiquidation'
  | 'LoanNotFound'
  | 'LoanNotActive'
  | 'InvalidLoanId'
  | 'InvalidPrice'
  | 'InvalidAsset';

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  Unauthorized: 403,
  InsufficientCollateral: 422,
  BelowMinimum: 422,
  InvalidAmount: 400,
  AlreadyInitialized: 409,
  NotInitialized: 409,
  InvalidLiquidation: 409,
  LoanNotFound: 404,
  LoanNotActive: 409,
  InvalidLoanId: 400,
  InvalidPrice: 400,
  InvalidAsset: 400,
};

/** A rejected ledger operation. Nothing was written when one of these is thrown. */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly statusCode: number;

  constructor(code: LedgerErrorCode, message?: string) {
    super(message ?? code);
    this.name = 'LedgerError';
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}
