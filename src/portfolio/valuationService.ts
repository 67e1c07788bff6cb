import type Bottleneck from 'bottleneck';
import Decimal from 'decimal.js';
import pino, { type Logger } from 'pino';

import { parseTradingParams, type TradingParams } from '../config/params.js';
import { CompletenessError, InputValidationError } from '../domain/errors.js';
import type { OpenPosition, PortfolioSnapshot } from '../domain/models.js';
import { isoDateSchema, normalizeTicker } from '../domain/models.js';
import { addMoney, notional, percentOf, roundTo, subtractMoney, sumMoney } from '../domain/money.js';
import type { EventBus } from '../events/eventBus.js';
import { portfolioQueue } from '../execution/portfolioQueue.js';
import type { PositionLedger } from '../ledger/positionLedger.js';

import { computePerformance, type PerformanceMetrics } from './performance.js';

export type ValuedPosition = {
  positionId: string;
  ticker: string;
  shareCount: number;
  entryPrice: number;
  currentPrice: number;
  stopPrice: number;
  targetPrice: number;
  stopType: OpenPosition['stopType'];
  marketValue: number;
  unrealizedPnL: number;
  unrealizedPnLPct: number;
};

export type PortfolioStatus = {
  portfolioId: string;
  cash: number;
  positionsMarketValue: number;
  totalEquity: number;
  startingCapital: number;
  totalPnL: number;
  totalPnLPct: number;
  openPositions: ValuedPosition[];
  availableSlots: number;
};

export type ValuationServiceOptions = {
  ledger: PositionLedger;
  eventBus?: EventBus;
  params?: Partial<TradingParams>;
  logger?: Logger;
  queues?: Bottleneck.Group;
};

type PriceMap = Readonly<Record<string, number>>;

// Percent fields are kept to four places; money fields stay exact.
const PCT_PLACES = 4;

/**
 * Point-in-time valuation of one portfolio. Valuations are total or
 * rejected: a single open ticker without a price fails the whole call.
 */
export class PortfolioValuationService {
  private readonly ledger: PositionLedger;
  private readonly eventBus?: EventBus;
  private readonly params: TradingParams;
  private readonly logger: Logger;
  private readonly queue: Bottleneck;

  constructor(options: ValuationServiceOptions) {
    this.ledger = options.ledger;
    this.eventBus = options.eventBus;
    this.params = parseTradingParams(options.params);
    this.logger = options.logger ?? pino({ name: 'valuation' });
    this.queue = portfolioQueue(options.ledger.portfolioId, options.queues);
  }

  async snapshot(asOfDate: string, currentPricesByTicker: PriceMap): Promise<PortfolioSnapshot> {
    if (!isoDateSchema.safeParse(asOfDate).success || Number.isNaN(Date.parse(`${asOfDate}T00:00:00Z`))) {
      throw new InputValidationError('InvalidParameter', `asOfDate must be YYYY-MM-DD, got ${asOfDate}`, { asOfDate });
    }

    const snapshot = await this.queue.schedule(async () => {
      const open = await this.ledger.listOpen();
      const valued = this.valuePositions(open, currentPricesByTicker);
      const cash = await this.ledger.getCash();
      const startingCapital = await this.ledger.getStartingCapital();
      const previous = await this.ledger.latestSnapshot(asOfDate);

      const positionsMarketValue = sumMoney(valued.map((position) => position.marketValue));
      const totalEquity = addMoney(cash, positionsMarketValue);
      const dailyPnL = previous ? subtractMoney(totalEquity, previous.totalEquity) : 0;
      const peakEquity = Math.max(previous?.peakEquity ?? startingCapital, totalEquity);
      const drawdownPct = percentOf(subtractMoney(peakEquity, totalEquity), peakEquity);

      return this.ledger.appendSnapshot({
        date: asOfDate,
        cash,
        positionsMarketValue,
        totalEquity,
        dailyPnL,
        dailyPnLPct: previous ? roundTo(percentOf(dailyPnL, previous.totalEquity), PCT_PLACES) : 0,
        openPositionCount: open.length,
        totalReturnPct: roundTo(percentOf(subtractMoney(totalEquity, startingCapital), startingCapital), PCT_PLACES),
        peakEquity,
        maxDrawdownPct: roundTo(Math.max(previous?.maxDrawdownPct ?? 0, drawdownPct), PCT_PLACES)
      });
    });

    this.logger.info(
      { date: snapshot.date, totalEquity: snapshot.totalEquity, dailyPnL: snapshot.dailyPnL },
      'snapshot recorded'
    );
    this.eventBus?.emit('snapshot.recorded', snapshot);
    return snapshot;
  }

  async status(currentPricesByTicker: PriceMap): Promise<PortfolioStatus> {
    return this.queue.schedule(async () => {
      const open = await this.ledger.listOpen();
      const openPositions = this.valuePositions(open, currentPricesByTicker);
      const cash = await this.ledger.getCash();
      const startingCapital = await this.ledger.getStartingCapital();

      const positionsMarketValue = sumMoney(openPositions.map((position) => position.marketValue));
      const totalEquity = addMoney(cash, positionsMarketValue);
      const totalPnL = subtractMoney(totalEquity, startingCapital);

      return {
        portfolioId: this.ledger.portfolioId,
        cash,
        positionsMarketValue,
        totalEquity,
        startingCapital,
        totalPnL,
        totalPnLPct: roundTo(percentOf(totalPnL, startingCapital), PCT_PLACES),
        openPositions,
        availableSlots: Math.max(0, this.params.maxOpenPositions - open.length)
      };
    });
  }

  async performance(): Promise<PerformanceMetrics> {
    const [closed, snapshots, startingCapital] = await Promise.all([
      this.ledger.listClosed(),
      this.ledger.listSnapshots(),
      this.ledger.getStartingCapital()
    ]);

    return computePerformance(closed, snapshots, startingCapital);
  }

  private valuePositions(open: OpenPosition[], currentPricesByTicker: PriceMap): ValuedPosition[] {
    const prices = new Map<string, number>();
    for (const [ticker, price] of Object.entries(currentPricesByTicker)) {
      if (!Number.isFinite(price) || price <= 0) {
        throw new InputValidationError('InvalidParameter', `price for ${ticker} must be a positive finite number`, {
          ticker,
          price
        });
      }

      prices.set(normalizeTicker(ticker), price);
    }

    const missing: string[] = [];
    const priced: Array<{ position: OpenPosition; currentPrice: number }> = [];
    for (const position of open) {
      const currentPrice = prices.get(position.ticker);
      if (currentPrice === undefined) {
        missing.push(position.ticker);
      } else {
        priced.push({ position, currentPrice });
      }
    }

    if (missing.length > 0) {
      throw new CompletenessError('MissingPrice', `Missing prices for ${missing.join(', ')}`, { tickers: missing });
    }

    return priced.map(({ position, currentPrice }) => {
      const marketValue = notional(currentPrice, position.shareCount);
      const costBasis = notional(position.entryPrice, position.shareCount);
      const unrealizedPnL = subtractMoney(marketValue, costBasis);

      return {
        positionId: position.id,
        ticker: position.ticker,
        shareCount: position.shareCount,
        entryPrice: position.entryPrice,
        currentPrice,
        stopPrice: position.stopPrice,
        targetPrice: position.targetPrice,
        stopType: position.stopType,
        marketValue,
        unrealizedPnL,
        unrealizedPnLPct: roundTo(
          new Decimal(currentPrice).minus(position.entryPrice).div(position.entryPrice).times(100).toNumber(),
          PCT_PLACES
        )
      };
    });
  }
}
