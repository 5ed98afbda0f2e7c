import type { ExchangeOrderStatus, OrderType, TradeSide } from '../../config/constants.js';

// ============================================
// Order Types
// ============================================

/**
 * Order request sent to the exchange gateway
 */
export interface SubmitOrderRequest {
  /** Outcome token the order trades */
  marketId: string;
  /** Buy or sell */
  side: TradeSide;
  /** Size in shares */
  size: number;
  /** Order type */
  orderType: OrderType;
  /** Price observed on the target's trade (0-1), used when the book has no price */
  referencePrice: number;
}

/**
 * Order state as confirmed by the exchange
 */
export interface OrderStatusReport {
  /** Current status */
  status: ExchangeOrderStatus;
  /** Total matched size in shares */
  filledSize: number;
  /** Average price of the matched size */
  avgPrice: number;
}

// ============================================
// Gateway
// ============================================

/**
 * Exchange capability the order executor depends on.
 * The exchange is the only source of truth for fills and held size.
 */
export interface ExchangeGateway {
  /** Identifier used in logs */
  readonly name: string;

  /** Place an order; resolves to the exchange-assigned order id */
  submitOrder(request: SubmitOrderRequest): Promise<string>;
  /** Read an order's fill state */
  getOrderStatus(orderId: string): Promise<OrderStatusReport>;
  /** Cancel the unfilled remainder of an order */
  cancelOrder(orderId: string): Promise<void>;
  /**
   * Size the account currently holds in a market.
   * Resolves null when the exchange cannot tell.
   */
  getPositionSize(marketId: string): Promise<number | null>;
}
