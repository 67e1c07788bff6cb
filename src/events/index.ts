export { EventBus, type EventBusOptions } from './eventBus.js';

export type {
  EntryRejectedPayload,
  EventHandler,
  HandlerFailedPayload,
  PositionClosedPayload,
  PositionOpenedPayload,
  StopAdjustedPayload,
  TradingEventMap,
  TradingEventName
} from './events.js';
