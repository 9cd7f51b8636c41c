import { EventEmitter } from 'node:events';
import { getLogger } from '../../utils/logger.js';
import type { DisconnectReason, PriceUpdate } from '../../types/market-data.types.js';

type FeedEvents = {
  update: [update: PriceUpdate];
  connected: [];
  disconnected: [reason: DisconnectReason];
};

export type FeedEventName = keyof FeedEvents;

/**
 * In-process fan-out for feed events. A listener that throws is logged and
 * does not stop delivery to the others.
 */
export class MarketDataPubSub {
  private emitter: EventEmitter;
  private logger = getLogger();

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(200);
  }

  publish<K extends FeedEventName>(channel: K, ...args: FeedEvents[K]): void {
    this.emitter.emit(channel, ...args);
  }

  subscribe<K extends FeedEventName>(
    channel: K,
    listener: (...args: FeedEvents[K]) => void,
  ): () => void {
    const guarded = (...args: FeedEvents[K]): void => {
      try {
        listener(...args);
      } catch (error) {
        this.logger.error({ err: error, channel }, 'Market data listener failed');
      }
    };
    this.emitter.on(channel, guarded);
    return () => {
      this.emitter.off(channel, guarded);
    };
  }
}
