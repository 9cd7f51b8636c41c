import { describe, it, expect, beforeEach } from 'vitest';
import { MarketStateStore } from '../market-state.store.js';
import type { MarketRoute } from '../../../types/market-data.types.js';

const YES: MarketRoute = { slug: 'btc-updown-15m-1700000100', side: 'yes' };
const NO: MarketRoute = { slug: 'btc-updown-15m-1700000100', side: 'no' };

describe('MarketStateStore', () => {
  let store: MarketStateStore;

  beforeEach(() => {
    store = new MarketStateStore();
    store.create(YES.slug, 'token-yes', 'token-no');
  });

  it('applies a book to the routed outcome only', () => {
    const update = store.apply(
      YES,
      { kind: 'book', assetId: 'token-yes', bids: [], asks: [], bestBid: 0.45, bestAsk: 0.55 },
      1000,
    );

    expect(update).toEqual({
      timestamp: 1000,
      slug: YES.slug,
      side: 'yes',
      kind: 'book',
      bestBid: 0.45,
      bestAsk: 0.55,
      lastPrice: undefined,
      lastSize: undefined,
      lastSide: undefined,
    });
    expect(store.get(YES.slug)).toMatchObject({
      yesBid: 0.45,
      yesAsk: 0.55,
      noBid: undefined,
      noAsk: undefined,
      lastUpdate: 1000,
      updateCount: 1,
    });
  });

  it('keeps the previous ask when a price change carries only a bid', () => {
    store.apply(NO, { kind: 'book', assetId: 'token-no', bids: [], asks: [], bestBid: 0.4, bestAsk: 0.6 }, 1000);

    const update = store.apply(NO, { kind: 'price_change', assetId: 'token-no', bestBid: 0.42 }, 2000);

    expect(update).toMatchObject({ bestBid: 0.42, bestAsk: 0.6 });
    expect(store.get(NO.slug)).toMatchObject({ noBid: 0.42, noAsk: 0.6, updateCount: 2 });
  });

  it('never clears a known price from a book with an empty side', () => {
    store.apply(YES, { kind: 'book', assetId: 'token-yes', bids: [], asks: [], bestBid: 0.3, bestAsk: 0.35 }, 1000);
    store.apply(YES, { kind: 'book', assetId: 'token-yes', bids: [], asks: [], bestAsk: 0.34 }, 1001);

    expect(store.get(YES.slug)).toMatchObject({ yesBid: 0.3, yesAsk: 0.34 });
  });

  it('records trades with the outcome they happened on', () => {
    const update = store.apply(NO, { kind: 'trade', assetId: 'token-no', price: 0.61, size: 12, side: 'SELL' }, 5000);

    expect(update).toMatchObject({ kind: 'trade', lastPrice: 0.61, lastSize: 12, lastSide: 'SELL' });
    expect(store.get(NO.slug)).toMatchObject({
      lastTradePrice: 0.61,
      lastTradeSize: 12,
      lastTradeSide: 'SELL',
      lastTradeOutcome: 'no',
    });
  });

  it('returns undefined for a market that is not tracked', () => {
    const update = store.apply(
      { slug: 'eth-updown-15m-1700000100', side: 'yes' },
      { kind: 'trade', assetId: 'token-x', price: 0.5 },
      1000,
    );

    expect(update).toBeUndefined();
  });

  it('hands out copies that later updates do not change', () => {
    store.apply(YES, { kind: 'price_change', assetId: 'token-yes', bestBid: 0.5 }, 1000);
    const snapshot = store.get(YES.slug);

    store.apply(YES, { kind: 'price_change', assetId: 'token-yes', bestBid: 0.51 }, 2000);

    expect(snapshot?.yesBid).toBe(0.5);
    expect(store.get(YES.slug)?.yesBid).toBe(0.51);
  });

  it('keeps existing state when a market is created twice', () => {
    store.apply(YES, { kind: 'price_change', assetId: 'token-yes', bestBid: 0.5 }, 1000);

    expect(store.create(YES.slug, 'token-yes', 'token-no')).toBe(false);
    expect(store.get(YES.slug)?.yesBid).toBe(0.5);
    expect(store.size).toBe(1);
  });

  it('deletes markets', () => {
    expect(store.delete(YES.slug)).toBe(true);
    expect(store.delete(YES.slug)).toBe(false);
    expect(store.has(YES.slug)).toBe(false);
    expect(store.all()).toEqual([]);
  });
});
