import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OrderEventPoller, toLifecycleEvents } from '../order-event-poller.service.js';
import { OcoCoordinator } from '../oco-coordinator.service.js';
import { PaperBrokerAdapter } from '../../../adapters/broker/paper-broker.adapter.js';
import type { OrderInfo, OrderLifecycleEvent } from '../../../types/order.types.js';

const MARKET = {
  slug: 'btc-updown-15m-1700000100',
  upTokenId: 'token-up',
  downTokenId: 'token-down',
};

function idleSink() {
  return {
    isDone: false,
    processBatch: vi.fn(async (_events: readonly OrderLifecycleEvent[]): Promise<void> => undefined),
  };
}

describe('toLifecycleEvents', () => {
  const order: OrderInfo = {
    orderId: 'order-1',
    tokenId: 'token-up',
    side: 'BUY',
    status: 'MATCHED',
    price: 0.8,
    originalSize: 10,
    sizeMatched: 10,
    trades: [
      { id: 'trade-a', status: 'MINED' },
      { id: 'trade-b', status: 'MATCHED' },
    ],
  };

  it('emits one event per trade', () => {
    expect(toLifecycleEvents(order, 42)).toEqual([
      { orderId: 'order-1', orderStatus: 'MATCHED', tradeId: 'trade-a', tradeStatus: 'MINED', timestamp: 42 },
      { orderId: 'order-1', orderStatus: 'MATCHED', tradeId: 'trade-b', tradeStatus: 'MATCHED', timestamp: 42 },
    ]);
  });

  it('emits an order-level event when there are no trades', () => {
    expect(toLifecycleEvents({ ...order, status: 'LIVE', trades: [] }, 7)).toEqual([
      { orderId: 'order-1', orderStatus: 'LIVE', timestamp: 7 },
    ]);
  });
});

describe('OrderEventPoller', () => {
  let broker: PaperBrokerAdapter;

  beforeEach(() => {
    broker = new PaperBrokerAdapter();
  });

  it('forwards only changed events', async () => {
    await broker.placeOrder({ tokenId: 'token-up', side: 'BUY', price: 0.8, size: 10 });
    await broker.placeOrder({ tokenId: 'token-down', side: 'BUY', price: 0.8, size: 10 });
    const poller = new OrderEventPoller(broker, idleSink(), ['paper-1', 'paper-2']);

    const first = await poller.pollOnce();
    const second = await poller.pollOnce();
    const tradeId = broker.fillOrder('paper-2');
    const third = await poller.pollOnce();
    broker.advanceTrade('paper-2', tradeId, 'MINED');
    const fourth = await poller.pollOnce();

    expect(first.map((e) => [e.orderId, e.orderStatus])).toEqual([
      ['paper-1', 'LIVE'],
      ['paper-2', 'LIVE'],
    ]);
    expect(second).toEqual([]);
    expect(third).toMatchObject([{ orderId: 'paper-2', tradeId, tradeStatus: 'MATCHED' }]);
    expect(fourth).toMatchObject([{ orderId: 'paper-2', tradeId, tradeStatus: 'MINED' }]);
  });

  it('drives the coordinator to DONE', async () => {
    const oco = new OcoCoordinator({ asset: 'btc', horizon: '15m', size: 10 }, broker);
    await oco.start(MARKET);
    broker.fillOrder('paper-2', 'MINED');

    const poller = new OrderEventPoller(broker, oco, ['paper-1', 'paper-2'], { intervalMs: 5 });
    await poller.run();

    expect(oco.result).toMatchObject({ winner: 'DOWN', losingOrderId: 'paper-1', cancelSuccess: true });
    expect(poller.isRunning).toBe(false);
  });

  it('gives up after consecutive poll failures', async () => {
    const sink = idleSink();
    const failing = {
      placeOrder: vi.fn(),
      cancelOrder: vi.fn(),
      getOrder: vi.fn(async (_orderId: string): Promise<OrderInfo | null> => {
        throw new Error('upstream unavailable');
      }),
    };
    const poller = new OrderEventPoller(failing, sink, ['order-1', 'order-2'], {
      intervalMs: 1,
      maxConsecutiveErrors: 3,
    });

    await poller.run();

    expect(failing.getOrder).toHaveBeenCalledTimes(6);
    expect(sink.processBatch).not.toHaveBeenCalled();
  });

  it('stops on request', async () => {
    const sink = idleSink();
    const poller = new OrderEventPoller(broker, sink, ['missing'], { intervalMs: 60_000 });

    const running = poller.run();
    poller.stop();
    await running;

    expect(poller.isRunning).toBe(false);
    expect(sink.processBatch).not.toHaveBeenCalled();
  });
});
