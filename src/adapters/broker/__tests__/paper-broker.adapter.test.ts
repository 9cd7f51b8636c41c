import { describe, it, expect } from 'vitest';
import { PaperBrokerAdapter } from '../paper-broker.adapter.js';
import { InvalidStateError, NotFoundError } from '../../../utils/errors.js';

describe('PaperBrokerAdapter', () => {
  it('places orders with sequential ids', async () => {
    const broker = new PaperBrokerAdapter();

    const first = await broker.placeOrder({ tokenId: 'token-up', side: 'BUY', price: 0.8, size: 10 });
    const second = await broker.placeOrder({ tokenId: 'token-down', side: 'BUY', price: 0.8, size: 10 });

    expect(first).toEqual({ success: true, orderId: 'paper-1' });
    expect(second).toEqual({ success: true, orderId: 'paper-2' });
    expect(broker.listOrders()).toHaveLength(2);
  });

  it('refuses an out of range price', async () => {
    const broker = new PaperBrokerAdapter();

    const result = await broker.placeOrder({ tokenId: 'token-up', side: 'BUY', price: 1, size: 10 });

    expect(result.success).toBe(false);
    expect(result.orderId).toBeUndefined();
  });

  it('cancels only live orders', async () => {
    const broker = new PaperBrokerAdapter();
    await broker.placeOrder({ tokenId: 'token-up', side: 'BUY', price: 0.8, size: 10 });
    await broker.placeOrder({ tokenId: 'token-down', side: 'BUY', price: 0.8, size: 10 });
    broker.fillOrder('paper-2');

    expect(await broker.cancelOrder('paper-1')).toBe(true);
    expect(await broker.cancelOrder('paper-1')).toBe(false);
    expect(await broker.cancelOrder('paper-2')).toBe(false);
    expect(await broker.cancelOrder('unknown')).toBe(false);
  });

  it('returns copies of stored orders', async () => {
    const broker = new PaperBrokerAdapter();
    await broker.placeOrder({ tokenId: 'token-up', side: 'BUY', price: 0.8, size: 10 });
    const tradeId = broker.fillOrder('paper-1');

    const copy = await broker.getOrder('paper-1');
    copy?.trades.push({ id: 'extra', status: 'FAILED' });
    broker.advanceTrade('paper-1', tradeId, 'CONFIRMED');

    expect(await broker.getOrder('paper-1')).toMatchObject({
      status: 'MATCHED',
      sizeMatched: 10,
      trades: [{ id: tradeId, status: 'CONFIRMED', price: 0.8, size: 10 }],
    });
    expect(await broker.getOrder('unknown')).toBeNull();
  });

  it('rejects fills of unknown or finished orders', async () => {
    const broker = new PaperBrokerAdapter();
    await broker.placeOrder({ tokenId: 'token-up', side: 'BUY', price: 0.8, size: 10 });
    await broker.cancelOrder('paper-1');

    expect(() => broker.fillOrder('paper-1')).toThrow(InvalidStateError);
    expect(() => broker.fillOrder('paper-9')).toThrow(NotFoundError);
  });
});
