import type { Logger } from 'pino';
import type { BrokerAdapter } from '../../adapters/broker/broker.adapter.js';
import type { OrderInfo, OrderLifecycleEvent } from '../../types/order.types.js';
import { InvalidStateError, errorMessage } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';

/** Anything that consumes lifecycle events until it reaches a terminal state. */
export interface OrderEventSink {
  readonly isDone: boolean;
  processBatch(events: readonly OrderLifecycleEvent[]): Promise<void>;
}

export interface OrderEventPollerOptions {
  intervalMs: number;
  maxConsecutiveErrors: number;
}

const DEFAULT_OPTIONS: OrderEventPollerOptions = {
  intervalMs: 2000,
  maxConsecutiveErrors: 5,
};

/** One event per trade on the order, or a single order-level event when it has none. */
export function toLifecycleEvents(order: OrderInfo, timestamp: number): OrderLifecycleEvent[] {
  if (order.trades.length === 0) {
    return [{ orderId: order.orderId, orderStatus: order.status, timestamp }];
  }
  return order.trades.map((trade) => ({
    orderId: order.orderId,
    orderStatus: order.status,
    tradeId: trade.id,
    tradeStatus: trade.status,
    timestamp,
  }));
}

/**
 * Turns broker order polling into lifecycle events. Only events whose
 * order or trade status changed since the previous poll are forwarded, one
 * batch per poll.
 */
export class OrderEventPoller {
  private options: OrderEventPollerOptions;
  private logger: Logger;
  private lastSeen = new Map<string, string>();
  private running = false;
  private consecutiveErrors = 0;
  private wake: (() => void) | null = null;

  constructor(
    private broker: BrokerAdapter,
    private sink: OrderEventSink,
    private orderIds: readonly string[],
    options: Partial<OrderEventPollerOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.logger = getLogger().child({ component: 'order-poller' });
  }

  get isRunning(): boolean {
    return this.running;
  }

  async run(): Promise<void> {
    if (this.running) {
      throw new InvalidStateError('Order poller is already running');
    }
    this.running = true;
    this.logger.info({ orderIds: this.orderIds, intervalMs: this.options.intervalMs }, 'Polling orders');

    try {
      while (this.running && !this.sink.isDone) {
        try {
          const events = await this.pollOnce();
          this.consecutiveErrors = 0;
          if (events.length > 0) {
            await this.sink.processBatch(events);
          }
        } catch (error) {
          this.consecutiveErrors += 1;
          this.logger.warn(
            { error: errorMessage(error), consecutiveErrors: this.consecutiveErrors },
            'Order poll failed',
          );
          if (this.consecutiveErrors >= this.options.maxConsecutiveErrors) {
            this.logger.error('Too many consecutive poll failures, giving up');
            break;
          }
        }

        if (!this.running || this.sink.isDone) {
          break;
        }
        await this.sleep(this.options.intervalMs);
      }
    } finally {
      this.running = false;
      this.wake = null;
    }
  }

  stop(): void {
    this.running = false;
    this.wake?.();
  }

  /** Fetches every tracked order and returns the events not seen before. */
  async pollOnce(): Promise<OrderLifecycleEvent[]> {
    const orders = await Promise.all(this.orderIds.map((id) => this.broker.getOrder(id)));
    const now = Date.now();
    const fresh: OrderLifecycleEvent[] = [];

    orders.forEach((order, index) => {
      if (!order) {
        this.logger.debug({ orderId: this.orderIds[index] }, 'Order not found');
        return;
      }
      for (const event of toLifecycleEvents(order, now)) {
        const key = `${event.orderId}:${event.tradeId ?? '-'}`;
        const signature = `${event.orderStatus}:${event.tradeStatus ?? '-'}`;
        if (this.lastSeen.get(key) === signature) {
          continue;
        }
        this.lastSeen.set(key, signature);
        fresh.push(event);
      }
    });

    return fresh;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
