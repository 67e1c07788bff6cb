import { CompletenessError, InputValidationError } from '../domain/errors.js';
import { normalizeTicker, priceBarSchema, type PriceBar } from '../domain/models.js';

import type { PriceFeed } from './priceFeed.js';

export class PaperPriceFeed implements PriceFeed {
  private readonly bars = new Map<string, PriceBar[]>();
  private readonly quotes = new Map<string, number>();

  seedBars(ticker: string, bars: PriceBar[]): void {
    const parsed = bars.map((bar) => priceBarSchema.parse(bar));
    parsed.sort((left, right) => (left.date < right.date ? -1 : left.date > right.date ? 1 : 0));
    this.bars.set(normalizeTicker(ticker), parsed);
  }

  /** Intraday quote; wins over the last seeded close until cleared. */
  setLatestPrice(ticker: string, price: number): void {
    if (!Number.isFinite(price) || price <= 0) {
      throw new InputValidationError('InvalidParameter', 'price must be a positive finite number', { ticker, price });
    }

    this.quotes.set(normalizeTicker(ticker), price);
  }

  clearLatestPrice(ticker: string): void {
    this.quotes.delete(normalizeTicker(ticker));
  }

  async latestPrice(ticker: string): Promise<number> {
    const key = normalizeTicker(ticker);
    const quote = this.quotes.get(key);
    if (quote !== undefined) {
      return quote;
    }

    const series = this.bars.get(key) ?? [];
    const last = series[series.length - 1];
    if (!last) {
      throw new CompletenessError('MissingPrice', `No price for ${key}`, { tickers: [key] });
    }

    return last.close;
  }

  async history(ticker: string, lookback: number): Promise<PriceBar[]> {
    if (!Number.isInteger(lookback) || lookback <= 0) {
      throw new InputValidationError('InvalidParameter', 'lookback must be a positive integer', { lookback });
    }

    const series = this.bars.get(normalizeTicker(ticker)) ?? [];
    return series.slice(-lookback).map((bar) => ({ ...bar }));
  }
}
