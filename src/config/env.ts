import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const percent = z.coerce.number().int().min(0);

const envSchema = z.object({
  ADMIN_ID: z.string().min(1),
  REDIS_URL: z.string().optional(),

  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(3100),

  COLLATERAL_ASSET: z.string().min(1).max(12).default('BTC'),
  SECONDARY_ASSET: z.string().min(1).max(12).default('USDC'),

  MINIMUM_COLLATERAL_RATIO: percent.min(110).default(150),
  LIQUIDATION_THRESHOLD: percent.min(110).default(120),
  FEE_RATE: percent.max(100).default(1),
  DEFAULT_INTEREST_RATE: percent.default(5),
  MIN_LOAN_AMOUNT: z.coerce.number().int().min(1).default(1),
  MAX_POSITIONS_PER_USER: z.coerce.number().int().min(1).default(10),
  LIQUIDATION_INDEX_PURGE: z.enum(['position', 'borrower']).default('position'),

  // Logical clock: one time unit per TIME_UNIT_MS since CLOCK_GENESIS
  TIME_UNIT_MS: z.coerce.number().int().min(1).default(600_000),
  CLOCK_GENESIS: z.string().datetime().default('2024-01-01T00:00:00.000Z'),
  LIQUIDATION_SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(60_000),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

function validateEnv(): z.infer<typeof envSchema> {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  if (result.data.COLLATERAL_ASSET === result.data.SECONDARY_ASSET) {
    throw new Error('COLLATERAL_ASSET and SECONDARY_ASSET must differ');
  }

  return result.data;
}

export type EnvConfig = z.infer<typeof envSchema>;
export const env = validateEnv();
