import { getLogger } from '../../utils/logger.js';
import { InvalidStateError, NotFoundError } from '../../utils/errors.js';
import type {
  OrderInfo,
  PlaceOrderRequest,
  PlaceOrderResult,
  TradeStatus,
} from '../../types/order.types.js';
import type { BrokerAdapter } from './broker.adapter.js';

/**
 * In-memory broker for paper trading. Orders rest as LIVE until `fillOrder`
 * matches them; trade status is then advanced explicitly.
 */
export class PaperBrokerAdapter implements BrokerAdapter {
  private orders = new Map<string, OrderInfo>();
  private sequence = 0;
  private tradeSequence = 0;
  private logger = getLogger();

  async placeOrder(request: PlaceOrderRequest): Promise<PlaceOrderResult> {
    if (request.price <= 0 || request.price >= 1 || request.size <= 0) {
      return { success: false, errorMessage: 'invalid price or size' };
    }

    this.sequence += 1;
    const orderId = `paper-${this.sequence}`;
    this.orders.set(orderId, {
      orderId,
      tokenId: request.tokenId,
      side: request.side,
      status: 'LIVE',
      price: request.price,
      originalSize: request.size,
      sizeMatched: 0,
      trades: [],
    });
    this.logger.debug({ orderId, ...request }, 'Paper order placed');
    return { success: true, orderId };
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    const order = this.orders.get(orderId);
    if (!order || order.status !== 'LIVE') {
      return false;
    }
    order.status = 'CANCELLED';
    this.logger.debug({ orderId }, 'Paper order cancelled');
    return true;
  }

  async getOrder(orderId: string): Promise<OrderInfo | null> {
    const order = this.orders.get(orderId);
    return order ? this.copy(order) : null;
  }

  /** Fully matches a live order with a single trade. Returns the trade id. */
  fillOrder(orderId: string, tradeStatus: TradeStatus = 'MATCHED'): string {
    const order = this.requireOrder(orderId);
    if (order.status !== 'LIVE') {
      throw new InvalidStateError(`Order ${orderId} is ${order.status}`);
    }
    this.tradeSequence += 1;
    const tradeId = `paper-trade-${this.tradeSequence}`;
    order.status = 'MATCHED';
    order.sizeMatched = order.originalSize;
    order.trades.push({
      id: tradeId,
      status: tradeStatus,
      price: order.price,
      size: order.originalSize,
    });
    return tradeId;
  }

  advanceTrade(orderId: string, tradeId: string, status: TradeStatus): void {
    const order = this.requireOrder(orderId);
    const trade = order.trades.find((candidate) => candidate.id === tradeId);
    if (!trade) {
      throw new NotFoundError('Trade', tradeId);
    }
    trade.status = status;
  }

  listOrders(): OrderInfo[] {
    return Array.from(this.orders.values(), (order) => this.copy(order));
  }

  private requireOrder(orderId: string): OrderInfo {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new NotFoundError('Order', orderId);
    }
    return order;
  }

  private copy(order: OrderInfo): OrderInfo {
    return { ...order, trades: order.trades.map((trade) => ({ ...trade })) };
  }
}
