import type {
  MarketRoute,
  MarketState,
  PriceUpdate,
  RawUpdate,
} from '../../types/market-data.types.js';

/**
 * Best bid/ask per market, mutated only by the feed's dispatch path.
 * Readers always receive copies.
 */
export class MarketStateStore {
  private markets = new Map<string, MarketState>();

  /** Returns false when the market already exists; its state is kept. */
  create(slug: string, yesTokenId: string, noTokenId: string): boolean {
    const existing = this.markets.get(slug);
    if (existing) {
      existing.yesTokenId = yesTokenId;
      existing.noTokenId = noTokenId;
      return false;
    }
    this.markets.set(slug, {
      slug,
      yesTokenId,
      noTokenId,
      lastUpdate: 0,
      updateCount: 0,
    });
    return true;
  }

  delete(slug: string): boolean {
    return this.markets.delete(slug);
  }

  has(slug: string): boolean {
    return this.markets.has(slug);
  }

  get(slug: string): MarketState | undefined {
    const state = this.markets.get(slug);
    return state ? { ...state } : undefined;
  }

  all(): MarketState[] {
    return Array.from(this.markets.values(), (state) => ({ ...state }));
  }

  get size(): number {
    return this.markets.size;
  }

  /**
   * Applies one decoded update to the market it routes to. Fields the update
   * does not carry are left unchanged; nothing here resets a known price.
   */
  apply(route: MarketRoute, update: RawUpdate, now: number): PriceUpdate | undefined {
    const state = this.markets.get(route.slug);
    if (!state) {
      return undefined;
    }

    const bidKey = route.side === 'yes' ? 'yesBid' : 'noBid';
    const askKey = route.side === 'yes' ? 'yesAsk' : 'noAsk';

    let lastPrice: number | undefined;
    let lastSize: number | undefined;
    let lastSide: PriceUpdate['lastSide'];

    switch (update.kind) {
      case 'book':
        if (update.bestBid !== undefined) {
          state[bidKey] = update.bestBid;
        }
        if (update.bestAsk !== undefined) {
          state[askKey] = update.bestAsk;
        }
        lastPrice = update.lastTradePrice;
        break;
      case 'price_change':
        if (update.bestBid !== undefined) {
          state[bidKey] = update.bestBid;
        }
        if (update.bestAsk !== undefined) {
          state[askKey] = update.bestAsk;
        }
        lastPrice = update.price;
        lastSize = update.size;
        lastSide = update.side;
        break;
      case 'trade':
        state.lastTradePrice = update.price;
        state.lastTradeSize = update.size;
        state.lastTradeSide = update.side;
        state.lastTradeOutcome = route.side;
        lastPrice = update.price;
        lastSize = update.size;
        lastSide = update.side;
        break;
    }

    state.lastUpdate = now;
    state.updateCount += 1;

    return Object.freeze({
      timestamp: now,
      slug: route.slug,
      side: route.side,
      kind: update.kind,
      bestBid: state[bidKey],
      bestAsk: state[askKey],
      lastPrice,
      lastSize,
      lastSide,
    });
  }
}
