import { EXCHANGE_ORDER_STATUSES, FINANCIAL, TRADE_SIDES } from '../../config/constants.js';
import type { ExchangeGateway, OrderStatusReport, SubmitOrderRequest } from '../shared/interfaces.js';
import { computeLimitPrice } from '../shared/pricing.js';
import { OrderRejectedError } from '../../utils/errors.js';
import { abbreviate, logger, type Logger } from '../../utils/logger.js';

/**
 * Paper exchange configuration
 */
export interface PaperExchangeConfig {
  initialBalance: number;
  maxSlippage: number;
}

interface PaperOrder {
  id: string;
  request: SubmitOrderRequest;
  report: OrderStatusReport;
}

/**
 * Paper Exchange
 * Fills every order immediately at its limit price and tracks simulated holdings and cash
 */
export class PaperExchange implements ExchangeGateway {
  readonly name = 'paper';

  private log: Logger;
  private config: PaperExchangeConfig;
  private balance: number;
  private holdings = new Map<string, number>();
  private orders = new Map<string, PaperOrder>();
  private orderCounter = 0;

  constructor(config: Partial<PaperExchangeConfig> = {}) {
    this.log = logger('PaperExchange');
    this.config = {
      initialBalance: config.initialBalance ?? 10000,
      maxSlippage: config.maxSlippage ?? 0.02,
    };
    this.balance = this.config.initialBalance;

    this.log.info('Paper trading initialized', { initialBalance: this.config.initialBalance });
  }

  /**
   * Seed holdings, e.g. from positions persisted by an earlier paper run
   */
  seedHoldings(positions: Iterable<{ marketId: string; size: number }>): void {
    for (const position of positions) {
      this.holdings.set(position.marketId, position.size);
    }
  }

  async submitOrder(request: SubmitOrderRequest): Promise<string> {
    const price = computeLimitPrice(request.side, null, request.referencePrice, this.config.maxSlippage);
    const held = this.holdings.get(request.marketId) ?? 0;

    if (request.side === TRADE_SIDES.BUY) {
      const cost = price * request.size;
      if (cost > this.balance + FINANCIAL.SIZE_EPSILON) {
        throw new OrderRejectedError(`not enough balance: need ${cost.toFixed(2)}, have ${this.balance.toFixed(2)}`, {
          context: { marketId: request.marketId },
        });
      }
      this.balance -= cost;
      this.holdings.set(request.marketId, held + request.size);
    } else {
      if (request.size > held + FINANCIAL.SIZE_EPSILON) {
        throw new OrderRejectedError(`not enough shares: selling ${request.size}, holding ${held}`, {
          context: { marketId: request.marketId },
        });
      }
      this.balance += price * request.size;
      const remaining = held - request.size;
      if (remaining > FINANCIAL.SIZE_EPSILON) {
        this.holdings.set(request.marketId, remaining);
      } else {
        this.holdings.delete(request.marketId);
      }
    }

    const id = `paper-${++this.orderCounter}`;
    this.orders.set(id, {
      id,
      request,
      report: { status: EXCHANGE_ORDER_STATUSES.FILLED, filledSize: request.size, avgPrice: price },
    });

    this.log.info('Paper order filled', {
      orderId: id,
      marketId: abbreviate(request.marketId),
      side: request.side,
      size: request.size,
      price,
      balance: Number(this.balance.toFixed(2)),
    });
    return id;
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new OrderRejectedError(`Order not found: ${orderId}`);
    }
    return { ...order.report };
  }

  async cancelOrder(orderId: string): Promise<void> {
    // Paper orders fill on submission; nothing rests on the book
    if (!this.orders.has(orderId)) {
      throw new OrderRejectedError(`Order not found: ${orderId}`);
    }
  }

  async getPositionSize(marketId: string): Promise<number | null> {
    return this.holdings.get(marketId) ?? 0;
  }

  getBalance(): number {
    return this.balance;
  }
}
