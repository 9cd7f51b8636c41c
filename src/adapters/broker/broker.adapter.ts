import type { OrderInfo, PlaceOrderRequest, PlaceOrderResult } from '../../types/order.types.js';

/**
 * Order entry capability consumed by the OCO coordinator. Signing and
 * submission live behind this interface.
 */
export interface BrokerAdapter {
  placeOrder(request: PlaceOrderRequest): Promise<PlaceOrderResult>;
  /** Resolves false when the venue refused the cancel (already filled, unknown id). */
  cancelOrder(orderId: string): Promise<boolean>;
  getOrder(orderId: string): Promise<OrderInfo | null>;
}
