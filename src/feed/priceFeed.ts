import type { PriceBar } from '../domain/models.js';

/**
 * Source of prices for the monitor and the evening routine. Implementations
 * own their own timeouts; callers fetch before entering the coordinator.
 */
export interface PriceFeed {
  latestPrice(ticker: string): Promise<number>;
  /** Up to `lookback` most recent daily bars, oldest first. */
  history(ticker: string, lookback: number): Promise<PriceBar[]>;
}
