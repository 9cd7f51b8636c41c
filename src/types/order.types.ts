export type OrderSide = 'BUY' | 'SELL';

export const ORDER_STATUSES = ['LIVE', 'MATCHED', 'CANCELLED', 'DELAYED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

// MINED is the first status at which a trade can no longer fail.
export const TRADE_STATUSES = ['MATCHED', 'MINED', 'CONFIRMED', 'RETRYING', 'FAILED'] as const;
export type TradeStatus = (typeof TRADE_STATUSES)[number];

export interface PlaceOrderRequest {
  tokenId: string;
  side: OrderSide;
  price: number;
  size: number;
}

export interface PlaceOrderResult {
  success: boolean;
  orderId?: string;
  errorMessage?: string;
}

export interface TradeInfo {
  id: string;
  status: TradeStatus;
  price?: number;
  size?: number;
}

export interface OrderInfo {
  orderId: string;
  tokenId: string;
  side: OrderSide;
  status: OrderStatus;
  price: number;
  originalSize: number;
  sizeMatched: number;
  trades: TradeInfo[];
}

export interface OrderLifecycleEvent {
  orderId: string;
  orderStatus: OrderStatus;
  tradeId?: string;
  tradeStatus?: TradeStatus;
  timestamp: number;
}
