import type { Pool } from 'pg';
import pino, { type Logger } from 'pino';

import { isTradingDay } from '../calendar/tradingCalendar.js';
import { loadConfig, type AppConfig } from '../config/index.js';
import { tradingParamsFromConfig, type TradingParams } from '../config/params.js';
import { closeDatabase, connectDatabase, migrate } from '../data/database.js';
import type { PortfolioSnapshot } from '../domain/models.js';
import { EventBus } from '../events/eventBus.js';
import { TradeExecutionCoordinator, type TickOutcome } from '../execution/coordinator.js';
import { PaperPriceFeed } from '../feed/paperPriceFeed.js';
import type { PriceFeed } from '../feed/priceFeed.js';
import { MemoryPositionLedger } from '../ledger/memoryLedger.js';
import { PgPositionLedger } from '../ledger/pgLedger.js';
import type { PositionLedger } from '../ledger/positionLedger.js';
import { LoggingNotificationSink, subscribeNotifications, type NotificationSink } from '../notifications/notificationSink.js';
import { PortfolioValuationService } from '../portfolio/valuationService.js';

import { PriceMonitor } from './priceMonitor.js';

export type RuntimeOptions = {
  config?: AppConfig;
  ledger?: PositionLedger;
  pool?: Pool;
  feed?: PriceFeed;
  sink?: NotificationSink;
  logger?: Logger;
  now?: () => number;
};

export type RuntimeContext = {
  config: AppConfig;
  params: TradingParams;
  ledger: PositionLedger;
  eventBus: EventBus;
  coordinator: TradeExecutionCoordinator;
  valuation: PortfolioValuationService;
  feed: PriceFeed;
  monitor: PriceMonitor;
  logger: Logger;
  shutdown: () => Promise<void>;
};

export type EveningRoutineResult =
  | { status: 'SKIPPED'; date: string; reason: 'NON_TRADING_DAY' }
  | { status: 'COMPLETED'; date: string; outcomes: TickOutcome[]; snapshot: PortfolioSnapshot };

async function createLedger(
  config: AppConfig,
  options: RuntimeOptions,
  logger: Logger
): Promise<{ ledger: PositionLedger; pool: Pool | undefined }> {
  if (options.ledger) {
    return { ledger: options.ledger, pool: undefined };
  }

  const connectionString = config.DATABASE_URL;
  const pool =
    options.pool ??
    (connectionString ? await connectDatabase(connectionString, logger.child({ component: 'database' })) : undefined);

  if (!pool) {
    logger.warn('DATABASE_URL not set, positions are kept in memory');
    return {
      ledger: new MemoryPositionLedger({
        portfolioId: config.PORTFOLIO_ID,
        startingCapital: config.STARTING_CAPITAL,
        now: options.now
      }),
      pool: undefined
    };
  }

  await migrate(pool);

  const ledger = new PgPositionLedger({
    pool,
    portfolioId: config.PORTFOLIO_ID,
    now: options.now,
    logger: logger.child({ component: 'ledger' })
  });
  await ledger.ensurePortfolio(config.STARTING_CAPITAL);

  return { ledger, pool };
}

export async function bootRuntime(options: RuntimeOptions = {}): Promise<RuntimeContext> {
  const logger = options.logger ?? pino({ name: 'runtime' });
  const boot = (step: string) => logger.info({ step }, `boot: ${step}`);

  try {
    boot('1.ConfigLoader');
    const config = options.config ?? loadConfig();
    const params = tradingParamsFromConfig(config);

    boot('2.PositionLedger');
    const { ledger, pool } = await createLedger(config, options, logger);

    boot('3.EventBus');
    const eventBus = new EventBus({ queueEmits: true });
    eventBus.on('handler.failed', (payload) => {
      logger.error(payload, 'event handler failed');
    });

    boot('4.Notifications');
    const unsubscribe = subscribeNotifications(
      eventBus,
      options.sink ?? new LoggingNotificationSink(logger.child({ component: 'notifications' }))
    );

    boot('5.Coordinator');
    const coordinator = new TradeExecutionCoordinator({
      ledger,
      eventBus,
      params,
      logger: logger.child({ component: 'coordinator' }),
      now: options.now
    });

    boot('6.ValuationService');
    const valuation = new PortfolioValuationService({
      ledger,
      eventBus,
      params,
      logger: logger.child({ component: 'valuation' })
    });

    boot('7.PriceMonitor');
    const feed = options.feed ?? new PaperPriceFeed();
    const monitor = new PriceMonitor({
      coordinator,
      ledger,
      feed,
      intervalMs: config.PRICE_CHECK_INTERVAL_MS,
      logger: logger.child({ component: 'price-monitor' }),
      now: options.now
    });

    const shutdown = async () => {
      await monitor.stop();
      unsubscribe();
      if (pool && !options.pool) {
        await closeDatabase();
      }
    };

    logger.level = config.LOG_LEVEL;

    return { config, params, ledger, eventBus, coordinator, valuation, feed, monitor, logger, shutdown };
  } catch (error) {
    logger.error({ err: error }, 'runtime boot failed');
    throw error;
  }
}

/**
 * End-of-day pass: one last stop/target sweep at the closing prices, then the
 * day's snapshot. Weekends and exchange holidays are skipped.
 */
export async function runEveningRoutine(runtime: RuntimeContext, date: string): Promise<EveningRoutineResult> {
  if (!isTradingDay(date)) {
    runtime.logger.info({ date }, 'not a trading day, evening routine skipped');
    return { status: 'SKIPPED', date, reason: 'NON_TRADING_DAY' };
  }

  const sweep = await runtime.monitor.runOnce();

  // Closed positions no longer need a price; the rest must be valued.
  const remaining = await runtime.ledger.listOpen();
  const prices: Record<string, number> = {};
  for (const position of remaining) {
    const price = sweep.prices[position.ticker];
    prices[position.ticker] = price ?? (await runtime.feed.latestPrice(position.ticker));
  }

  const snapshot = await runtime.valuation.snapshot(date, prices);
  const closed = sweep.outcomes.filter((outcome) => outcome.status === 'CLOSED').length;
  runtime.logger.info({ date, totalEquity: snapshot.totalEquity, closed }, 'evening routine complete');

  return { status: 'COMPLETED', date, outcomes: sweep.outcomes, snapshot };
}
