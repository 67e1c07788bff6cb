import { EventEmitter } from 'node:events';

import type { EventHandler, TradingEventMap, TradingEventName } from './events.js';

export type EventBusOptions = {
  queueEmits?: boolean;
};

type QueuedEvent<TName extends TradingEventName = TradingEventName> = {
  event: TName;
  payload: TradingEventMap[TName];
};

const DEFAULT_QUEUE_OPTIONS: Required<EventBusOptions> = {
  queueEmits: false
};

export class EventBus {
  private readonly emitter = new EventEmitter();
  private readonly options: Required<EventBusOptions>;
  private readonly queue: QueuedEvent[] = [];
  private isFlushingQueue = false;

  constructor(options?: EventBusOptions) {
    this.options = {
      ...DEFAULT_QUEUE_OPTIONS,
      ...options
    };
  }

  on<TName extends TradingEventName>(event: TName, handler: EventHandler<TradingEventMap[TName]>): () => void {
    const wrapped = async (payload: TradingEventMap[TName]) => {
      try {
        await handler(payload);
      } catch (error: unknown) {
        this.reportHandlerFailure(event, error);
      }
    };

    this.emitter.on(event, wrapped);

    return () => {
      this.emitter.off(event, wrapped);
    };
  }

  emit<TName extends TradingEventName>(event: TName, payload: TradingEventMap[TName]): void {
    if (!this.options.queueEmits) {
      this.emitter.emit(event, payload);
      return;
    }

    this.queue.push({ event, payload });
    this.flushQueue();
  }

  getPendingCount(): number {
    return this.queue.length;
  }

  private flushQueue(): void {
    if (this.isFlushingQueue) {
      return;
    }

    this.isFlushingQueue = true;
    try {
      while (this.queue.length > 0) {
        const item = this.queue.shift();
        if (!item) {
          continue;
        }

        this.emitter.emit(item.event, item.payload);
      }
    } finally {
      this.isFlushingQueue = false;
    }
  }

  private reportHandlerFailure(sourceEvent: TradingEventName, error: unknown): void {
    // A failing failure handler must not recurse.
    if (sourceEvent === 'handler.failed') {
      return;
    }

    this.emit('handler.failed', {
      sourceEvent,
      errorName: error instanceof Error ? error.name : 'UnknownError',
      message: error instanceof Error ? error.message : 'Unknown handler error',
      ts: Date.now()
    });
  }
}
