import { z } from 'zod';

const amount = z
  .union([
    z.string().regex(/^\d+$/, 'Expected an unsigned integer'),
    // Larger values lose precision as JSON numbers and must be sent as strings.
    z.number().int().nonnegative().safe(),
  ])
  .transform((v) => BigInt(v));

export const callerHeaderSchema = z.object({
  'x-caller-id': z.string().min(1).max(128),
});

export const assetParamsSchema = z.object({
  asset: z.string().min(1).max(12),
});

export const positionParamsSchema = z.object({
  id: z.coerce.number().int(),
});

export const userParamsSchema = z.object({
  user: z.string().min(1).max(128),
});

export const parameterValueSchema = z.object({
  value: amount,
});

export const setPriceSchema = z.object({
  price: amount,
});

export const depositCollateralSchema = z.object({
  amount,
});

export const requestLoanSchema = z.object({
  collateral: amount,
  debt: amount,
});

export const repaySchema = z.object({
  amount,
});

export type RequestLoanInput = z.infer<typeof requestLoanSchema>;
export type RepayInput = z.infer<typeof repaySchema>;
