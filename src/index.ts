export * from './domain/index.js';
export * from './events/index.js';
export * from './execution/index.js';
export * from './feed/index.js';
export * from './ledger/index.js';
export * from './notifications/index.js';
export * from './policy/index.js';
export * from './portfolio/index.js';
export { computeShareCount, sizePosition, type SizingBreakdown } from './risk/positionSizing.js';
export { daysBetween, isTradingDay, previousTradingDay, toIsoDate } from './calendar/tradingCalendar.js';
export {
  createLogger,
  DEFAULT_TRADING_PARAMS,
  loadConfig,
  parseTradingParams,
  tradingParamsFromConfig,
  type AppConfig,
  type TradingParams
} from './config/index.js';
export { closeDatabase, connectDatabase, migrate, transaction } from './data/database.js';
export { PriceMonitor, type PriceCheckResult, type PriceMonitorOptions } from './app/priceMonitor.js';
export {
  bootRuntime,
  runEveningRoutine,
  type EveningRoutineResult,
  type RuntimeContext,
  type RuntimeOptions
} from './app/runtime.js';
