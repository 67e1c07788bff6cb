export {
  closedPositionSchema,
  closedPositionSummarySchema,
  entryCandidateSchema,
  exitReasonSchema,
  isoDateSchema,
  isOpen,
  normalizeTicker,
  openPositionSchema,
  portfolioSnapshotSchema,
  positionSchema,
  positionStatusSchema,
  priceBarSchema,
  stopTypeSchema,
  toClosedSummary
} from './models.js';

export type {
  ClosedPosition,
  ClosedPositionSummary,
  EntryCandidate,
  ExitReason,
  OpenPosition,
  PortfolioSnapshot,
  Position,
  PositionStatus,
  PriceBar,
  StopType
} from './models.js';

export {
  CapacityError,
  CompletenessError,
  InputValidationError,
  StateError,
  TradingError,
  isTradingError,
  type ErrorCategory,
  type TradingErrorCode
} from './errors.js';
