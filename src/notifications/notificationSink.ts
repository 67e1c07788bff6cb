import type { Logger } from 'pino';

import type { EventBus } from '../events/eventBus.js';

export type NotificationType = 'PositionOpened' | 'PositionClosed' | 'StopAdjusted';

export type NotificationRecord = {
  ticker: string;
  type: NotificationType;
  price: number;
  timestamp: number;
  reason: string;
};

/** Delivery and formatting belong to the sink. */
export interface NotificationSink {
  deliver(record: NotificationRecord): Promise<void>;
}

export class LoggingNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger) {}

  async deliver(record: NotificationRecord): Promise<void> {
    this.logger.info(record, `notification: ${record.type} ${record.ticker}`);
  }
}

/**
 * Forwards lifecycle events to the sink. A sink failure surfaces on the bus
 * as `handler.failed`. Returns a function that removes all three handlers.
 */
export function subscribeNotifications(eventBus: EventBus, sink: NotificationSink): () => void {
  const disposers = [
    eventBus.on('position.opened', ({ position, ts }) =>
      sink.deliver({
        ticker: position.ticker,
        type: 'PositionOpened',
        price: position.entryPrice,
        timestamp: ts,
        reason: position.signalSource
      })
    ),
    eventBus.on('position.closed', ({ summary, ts }) =>
      sink.deliver({
        ticker: summary.ticker,
        type: 'PositionClosed',
        price: summary.exitPrice,
        timestamp: ts,
        reason: summary.exitReason
      })
    ),
    eventBus.on('stop.adjusted', (payload) =>
      sink.deliver({
        ticker: payload.ticker,
        type: 'StopAdjusted',
        price: payload.newStop,
        timestamp: payload.ts,
        reason: payload.stopType
      })
    )
  ];

  return () => {
    for (const dispose of disposers) {
      dispose();
    }
  };
}
