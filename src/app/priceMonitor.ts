import pino, { type Logger } from 'pino';

import { isTradingDay, toIsoDate } from '../calendar/tradingCalendar.js';
import type { TickOutcome, TradeExecutionCoordinator } from '../execution/coordinator.js';
import type { PriceFeed } from '../feed/priceFeed.js';
import type { PositionLedger } from '../ledger/positionLedger.js';

export type PriceCheckResult = {
  prices: Record<string, number>;
  outcomes: TickOutcome[];
  failedTickers: string[];
};

export type PriceMonitorOptions = {
  coordinator: TradeExecutionCoordinator;
  ledger: PositionLedger;
  feed: PriceFeed;
  intervalMs: number;
  logger?: Logger;
  now?: () => number;
  tradingDaysOnly?: boolean;
};

/**
 * Periodic stop/target check. Prices are fetched before anything reaches the
 * coordinator; a ticker whose fetch fails or returns a non-positive quote is
 * skipped for this run.
 */
export class PriceMonitor {
  private readonly coordinator: TradeExecutionCoordinator;
  private readonly ledger: PositionLedger;
  private readonly feed: PriceFeed;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly tradingDaysOnly: boolean;
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<PriceCheckResult | null> | undefined;

  constructor(options: PriceMonitorOptions) {
    this.coordinator = options.coordinator;
    this.ledger = options.ledger;
    this.feed = options.feed;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? pino({ name: 'price-monitor' });
    this.now = options.now ?? Date.now;
    this.tradingDaysOnly = options.tradingDaysOnly ?? true;
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  async runOnce(): Promise<PriceCheckResult> {
    const open = await this.ledger.listOpen();
    const prices: Record<string, number> = {};
    const failedTickers: string[] = [];

    for (const position of open) {
      try {
        const price = await this.feed.latestPrice(position.ticker);
        if (!Number.isFinite(price) || price <= 0) {
          failedTickers.push(position.ticker);
          this.logger.warn({ ticker: position.ticker, price }, 'unusable quote');
          continue;
        }

        prices[position.ticker] = price;
      } catch (error: unknown) {
        failedTickers.push(position.ticker);
        this.logger.warn({ err: error, ticker: position.ticker }, 'price fetch failed');
      }
    }

    const outcomes = await this.coordinator.processPriceTicks(prices);
    const closed = outcomes.filter((outcome) => outcome.status === 'CLOSED').length;
    this.logger.info({ checked: Object.keys(prices).length, closed, failed: failedTickers.length }, 'price check complete');

    return { prices, outcomes, failedTickers };
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error({ err: error }, 'price check failed');
      });
    }, this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs }, 'price monitor started');
  }

  /** Stops the timer and waits for a check already in progress. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.logger.info('price monitor stopped');
    }

    if (this.inFlight) {
      // Failures of the in-flight run are logged by the timer handler.
      await this.inFlight.catch(() => null);
    }
  }

  private async tick(): Promise<PriceCheckResult | null> {
    // Overlapping runs would re-read the same open set.
    if (this.inFlight) {
      return null;
    }

    if (this.tradingDaysOnly && !isTradingDay(toIsoDate(this.now()))) {
      this.logger.debug('not a trading day, price check skipped');
      return null;
    }

    this.inFlight = this.runOnce();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = undefined;
    }
  }
}
