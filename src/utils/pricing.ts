import type { MarketState } from '../types/market-data.types.js';

// Derived prices are always computed from the stored best bid/ask on read.

export function midPrice(bid?: number, ask?: number): number | undefined {
  if (bid !== undefined && ask !== undefined) {
    return (bid + ask) / 2;
  }
  return bid ?? ask;
}

export function spread(bid?: number, ask?: number): number | undefined {
  if (bid !== undefined && ask !== undefined) {
    return ask - bid;
  }
  return undefined;
}

/** Probability of the YES/UP outcome implied by its mid price. */
export function impliedProbability(state: MarketState): number | undefined {
  return midPrice(state.yesBid, state.yesAsk);
}

export interface MarketSnapshot extends MarketState {
  yesMid?: number;
  noMid?: number;
  yesSpread?: number;
  noSpread?: number;
  impliedProbability?: number;
}

export function toMarketSnapshot(state: MarketState): MarketSnapshot {
  return {
    ...state,
    yesMid: midPrice(state.yesBid, state.yesAsk),
    noMid: midPrice(state.noBid, state.noAsk),
    yesSpread: spread(state.yesBid, state.yesAsk),
    noSpread: spread(state.noBid, state.noAsk),
    impliedProbability: impliedProbability(state),
  };
}
