export type OutcomeSide = 'yes' | 'no';

export type RawUpdateKind = 'book' | 'price_change' | 'trade';

export type TradeSide = 'BUY' | 'SELL';

export interface BookLevel {
  price: number;
  size: number;
}

export interface BookUpdate {
  kind: 'book';
  assetId: string;
  bids: BookLevel[];
  asks: BookLevel[];
  bestBid?: number;
  bestAsk?: number;
  lastTradePrice?: number;
}

export interface PriceChangeUpdate {
  kind: 'price_change';
  assetId: string;
  bestBid?: number;
  bestAsk?: number;
  price?: number;
  size?: number;
  side?: TradeSide;
}

export interface TradeUpdate {
  kind: 'trade';
  assetId: string;
  price: number;
  size?: number;
  side?: TradeSide;
}

/**
 * One decoded record from the market stream. The kind is decided once by
 * the codec; nothing downstream inspects raw field presence again.
 */
export type RawUpdate = BookUpdate | PriceChangeUpdate | TradeUpdate;

export interface MarketRoute {
  slug: string;
  side: OutcomeSide;
}

export interface MarketState {
  slug: string;
  yesTokenId: string;
  noTokenId: string;
  yesBid?: number;
  yesAsk?: number;
  noBid?: number;
  noAsk?: number;
  lastTradePrice?: number;
  lastTradeSize?: number;
  lastTradeSide?: TradeSide;
  lastTradeOutcome?: OutcomeSide;
  /** Epoch ms of the last accepted update, 0 until the first one. */
  lastUpdate: number;
  updateCount: number;
}

export interface PriceUpdate {
  readonly timestamp: number;
  readonly slug: string;
  readonly side: OutcomeSide;
  readonly kind: RawUpdateKind;
  readonly bestBid?: number;
  readonly bestAsk?: number;
  readonly lastPrice?: number;
  readonly lastSize?: number;
  readonly lastSide?: TradeSide;
}

export type DisconnectReason =
  | 'closed'
  | 'timeout'
  | 'heartbeat'
  | 'error'
  | 'send_failed'
  | 'stopped';

export interface ConnectionStats {
  connectedAt?: number;
  messagesReceived: number;
  bytesReceived: number;
  lastMessageAt?: number;
  reconnectCount: number;
  totalMessagesReceived: number;
  totalBytesReceived: number;
  updatesProcessed: number;
  droppedUpdates: number;
}
