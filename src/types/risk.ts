export interface RiskParameters {
  minimumCollateralRatio: bigint;
  liquidationThreshold: bigint;
  feeRate: bigint;
}
