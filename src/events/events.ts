import type { ClosedPositionSummary, OpenPosition, PortfolioSnapshot } from '../domain/models.js';

export type PositionOpenedPayload = {
  position: OpenPosition;
  ts: number;
};

export type PositionClosedPayload = {
  summary: ClosedPositionSummary;
  ts: number;
};

export type StopAdjustedPayload = {
  positionId: string;
  ticker: string;
  previousStop: number;
  newStop: number;
  highestPriceSeen: number;
  stopType: OpenPosition['stopType'];
  triggerPrice: number;
  ts: number;
};

export type EntryRejectedPayload = {
  ticker: string;
  entryPrice: number;
  code: string;
  reason: string;
  ts: number;
};

export type HandlerFailedPayload = {
  sourceEvent: string;
  errorName: string;
  message: string;
  ts: number;
};

export type TradingEventMap = {
  'position.opened': PositionOpenedPayload;
  'position.closed': PositionClosedPayload;
  'stop.adjusted': StopAdjustedPayload;
  'entry.rejected': EntryRejectedPayload;
  'snapshot.recorded': PortfolioSnapshot;
  'handler.failed': HandlerFailedPayload;
};

export type TradingEventName = keyof TradingEventMap;
export type EventHandler<TPayload> = (payload: TPayload) => void | Promise<void>;
