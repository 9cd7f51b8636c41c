import { describe, it, expect } from 'vitest';
import { impliedProbability, midPrice, spread, toMarketSnapshot } from '../pricing.js';
import type { MarketState } from '../../types/market-data.types.js';

const baseState: MarketState = {
  slug: 'btc-updown-15m-1700000100',
  yesTokenId: 'token-yes',
  noTokenId: 'token-no',
  lastUpdate: 0,
  updateCount: 0,
};

describe('pricing', () => {
  it('averages bid and ask', () => {
    expect(midPrice(0.45, 0.55)).toBeCloseTo(0.5);
  });

  it('uses whichever side is known', () => {
    expect(midPrice(0.45, undefined)).toBe(0.45);
    expect(midPrice(undefined, 0.55)).toBe(0.55);
    expect(midPrice()).toBeUndefined();
  });

  it('computes spread only with both sides', () => {
    expect(spread(0.45, 0.55)).toBeCloseTo(0.1);
    expect(spread(0.45)).toBeUndefined();
  });

  it('derives snapshot fields from the stored best prices', () => {
    const snapshot = toMarketSnapshot({ ...baseState, yesBid: 0.6, yesAsk: 0.64, noBid: 0.36 });

    expect(snapshot.yesMid).toBeCloseTo(0.62);
    expect(snapshot.noMid).toBe(0.36);
    expect(snapshot.yesSpread).toBeCloseTo(0.04);
    expect(snapshot.noSpread).toBeUndefined();
    expect(snapshot.impliedProbability).toBeCloseTo(0.62);
  });

  it('has no implied probability before any yes quote', () => {
    expect(impliedProbability({ ...baseState, noBid: 0.3 })).toBeUndefined();
  });
});
