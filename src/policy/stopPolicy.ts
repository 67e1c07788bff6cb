import Decimal from 'decimal.js';

import { InputValidationError } from '../domain/errors.js';
import type { StopType } from '../domain/models.js';
import { roundPrice } from '../domain/money.js';

export type ExitDecision = 'NONE' | 'STOP_HIT' | 'TARGET_HIT';

export type TrailingRules = {
  breakevenTriggerPercent: number;
  trailTriggerPercent: number;
  trailPercent: number;
};

export type TrailingStopResult = {
  newStop: number;
  newHighest: number;
};

export const DEFAULT_TRAILING_RULES: TrailingRules = {
  breakevenTriggerPercent: 0.05,
  trailTriggerPercent: 0.1,
  trailPercent: 0.1
};

function assertPositivePrice(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InputValidationError('InvalidParameter', `${name} must be a positive finite number`, { [name]: value });
  }
}

export function initialStop(entryPrice: number, stopPercent: number): number {
  assertPositivePrice('entryPrice', entryPrice);

  if (!Number.isFinite(stopPercent) || stopPercent <= 0 || stopPercent >= 1) {
    throw new InputValidationError('InvalidParameter', 'stopPercent must be in (0, 1)', { stopPercent });
  }

  return roundPrice(new Decimal(entryPrice).times(new Decimal(1).minus(stopPercent)).toNumber());
}

export function targetFor(entryPrice: number, targetPercent: number): number {
  assertPositivePrice('entryPrice', entryPrice);

  if (!Number.isFinite(targetPercent) || targetPercent <= 0) {
    throw new InputValidationError('InvalidParameter', 'targetPercent must be positive', { targetPercent });
  }

  return roundPrice(new Decimal(entryPrice).times(new Decimal(1).plus(targetPercent)).toNumber());
}

/**
 * Ratchets the protective stop for one price observation.
 *
 * The trail level is always measured from the running high, and the result
 * is never below `currentStop`, so a pullback after a run-up keeps whatever
 * breakeven or trail level the peak earned. Trail levels are rounded to the
 * stored price scale, so a re-read stop compares equal to the next candidate.
 */
export function trailingStopUpdate(
  entryPrice: number,
  currentPrice: number,
  currentStop: number,
  currentHighest: number,
  rules: TrailingRules = DEFAULT_TRAILING_RULES
): TrailingStopResult {
  assertPositivePrice('entryPrice', entryPrice);
  assertPositivePrice('currentPrice', currentPrice);

  const newHighest = Math.max(currentHighest, currentPrice);
  const gainPct = new Decimal(currentPrice).minus(entryPrice).div(entryPrice);

  let candidate = currentStop;
  if (gainPct.gte(rules.trailTriggerPercent)) {
    candidate = roundPrice(new Decimal(newHighest).times(new Decimal(1).minus(rules.trailPercent)).toNumber());
  } else if (gainPct.gte(rules.breakevenTriggerPercent)) {
    candidate = entryPrice;
  }

  return {
    newStop: Math.max(candidate, currentStop),
    newHighest
  };
}

export function evaluateExit(currentPrice: number, stopPrice: number, targetPrice: number): ExitDecision {
  if (currentPrice <= stopPrice) {
    return 'STOP_HIT';
  }

  if (currentPrice >= targetPrice) {
    return 'TARGET_HIT';
  }

  return 'NONE';
}

export function classifyStop(stopPrice: number, entryPrice: number, initialStopPrice: number): StopType {
  if (stopPrice > entryPrice) {
    return 'TRAILING';
  }

  if (stopPrice === entryPrice && stopPrice > initialStopPrice) {
    return 'BREAKEVEN';
  }

  return 'FIXED';
}
