import Decimal from 'decimal.js';

import { CapacityError, InputValidationError } from '../domain/errors.js';

export type SizingBreakdown = {
  riskPerShare: number;
  riskBasedShares: number;
  capShares: number;
  shareCount: number;
};

function assertFraction(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new InputValidationError('InvalidParameter', `${name} must be in (0, 1]`, { [name]: value });
  }
}

/**
 * Whole-share size limited by both the per-trade risk budget and the
 * per-position capital cap.
 */
export function sizePosition(
  portfolioValue: number,
  entryPrice: number,
  stopPrice: number,
  maxRiskFraction: number,
  maxPositionFraction: number
): SizingBreakdown {
  if (!Number.isFinite(portfolioValue) || portfolioValue <= 0) {
    throw new InputValidationError('InvalidParameter', 'portfolioValue must be positive', { portfolioValue });
  }

  if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
    throw new InputValidationError('InvalidParameter', 'entryPrice must be positive', { entryPrice });
  }

  assertFraction('maxRiskFraction', maxRiskFraction);
  assertFraction('maxPositionFraction', maxPositionFraction);

  const riskPerShare = new Decimal(entryPrice).minus(stopPrice);
  if (!Number.isFinite(stopPrice) || riskPerShare.lte(0)) {
    throw new InputValidationError('InvalidStopAboveEntry', 'stop price must be below entry price', {
      entryPrice,
      stopPrice
    });
  }

  const value = new Decimal(portfolioValue);
  const riskBasedShares = value.times(maxRiskFraction).div(riskPerShare).floor().toNumber();
  const capShares = value.times(maxPositionFraction).div(entryPrice).floor().toNumber();
  const shareCount = Math.min(riskBasedShares, capShares);

  if (shareCount < 1) {
    throw new CapacityError('ZeroShareResult', 'position sizes to zero shares', {
      portfolioValue,
      entryPrice,
      stopPrice,
      riskBasedShares,
      capShares
    });
  }

  return {
    riskPerShare: riskPerShare.toNumber(),
    riskBasedShares,
    capShares,
    shareCount
  };
}

export function computeShareCount(
  portfolioValue: number,
  entryPrice: number,
  stopPrice: number,
  maxRiskFraction: number,
  maxPositionFraction: number
): number {
  return sizePosition(portfolioValue, entryPrice, stopPrice, maxRiskFraction, maxPositionFraction).shareCount;
}
