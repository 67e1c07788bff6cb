import { z } from 'zod';

const fraction = z.coerce.number().gt(0).lt(1);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_URL: z.string().min(1).optional(),
  PORTFOLIO_ID: z.string().min(1).default('default'),
  STARTING_CAPITAL: z.coerce.number().positive().default(100_000),
  MAX_OPEN_POSITIONS: z.coerce.number().int().positive().default(6),
  MAX_RISK_FRACTION: fraction.default(0.02),
  MAX_POSITION_FRACTION: z.coerce.number().gt(0).max(1).default(0.2),
  DEFAULT_STOP_PERCENT: fraction.default(0.07),
  TARGET_PERCENT: z.coerce.number().positive().default(0.2),
  BREAKEVEN_TRIGGER_PERCENT: z.coerce.number().positive().default(0.05),
  TRAIL_TRIGGER_PERCENT: z.coerce.number().positive().default(0.1),
  TRAIL_PERCENT: fraction.default(0.1),
  PRICE_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60_000)
});

export type AppConfig = z.infer<typeof envSchema>;
