export {
  TradeExecutionCoordinator,
  type CandidateBatchResult,
  type CoordinatorOptions,
  type EnterPositionInput,
  type TickOutcome
} from './coordinator.js';
export { portfolioQueue } from './portfolioQueue.js';
