import { z } from 'zod';

import type { AppConfig } from './schema.js';

/**
 * Risk and exit parameters. Passed explicitly into the coordinator and the
 * sizing calculator rather than read from process-wide state, so tests can
 * vary them per case.
 */
export const tradingParamsSchema = z
  .object({
    maxOpenPositions: z.number().int().positive(),
    maxRiskFraction: z.number().gt(0).lt(1),
    maxPositionFraction: z.number().gt(0).max(1),
    defaultStopPercent: z.number().gt(0).lt(1),
    targetPercent: z.number().positive(),
    breakevenTriggerPercent: z.number().positive(),
    trailTriggerPercent: z.number().positive(),
    trailPercent: z.number().gt(0).lt(1)
  })
  .strict()
  .refine((value) => value.trailTriggerPercent >= value.breakevenTriggerPercent, {
    message: 'trailTriggerPercent must be >= breakevenTriggerPercent',
    path: ['trailTriggerPercent']
  });

export type TradingParams = z.infer<typeof tradingParamsSchema>;

export const DEFAULT_TRADING_PARAMS: TradingParams = {
  maxOpenPositions: 6,
  maxRiskFraction: 0.02,
  maxPositionFraction: 0.2,
  defaultStopPercent: 0.07,
  targetPercent: 0.2,
  breakevenTriggerPercent: 0.05,
  trailTriggerPercent: 0.1,
  trailPercent: 0.1
};

export function parseTradingParams(overrides: Partial<TradingParams> = {}): TradingParams {
  const parsed = tradingParamsSchema.safeParse({ ...DEFAULT_TRADING_PARAMS, ...overrides });

  if (!parsed.success) {
    throw new Error(`Invalid trading params: ${parsed.error.message}`);
  }

  return parsed.data;
}

export function tradingParamsFromConfig(config: AppConfig): TradingParams {
  return parseTradingParams({
    maxOpenPositions: config.MAX_OPEN_POSITIONS,
    maxRiskFraction: config.MAX_RISK_FRACTION,
    maxPositionFraction: config.MAX_POSITION_FRACTION,
    defaultStopPercent: config.DEFAULT_STOP_PERCENT,
    targetPercent: config.TARGET_PERCENT,
    breakevenTriggerPercent: config.BREAKEVEN_TRIGGER_PERCENT,
    trailTriggerPercent: config.TRAIL_TRIGGER_PERCENT,
    trailPercent: config.TRAIL_PERCENT
  });
}
