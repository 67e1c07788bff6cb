export {
  PortfolioValuationService,
  type PortfolioStatus,
  type ValuationServiceOptions,
  type ValuedPosition
} from './valuationService.js';
export {
  computePerformance,
  maxDrawdownFromSnapshots,
  type PerformanceMetrics,
  type TradeHighlight
} from './performance.js';
