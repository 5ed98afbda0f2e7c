import { ClobClient, Side, OrderType, AssetType, type ApiKeyCreds, type TickSize } from '@polymarket/clob-client';
import { Wallet } from 'ethers';
import type { PolymarketConfig } from '../../config/schema.js';
import { EXCHANGE_ORDER_STATUSES, ORDER_TYPES, TRADE_SIDES, type TradeSide } from '../../config/constants.js';
import type { ExchangeGateway, OrderStatusReport, SubmitOrderRequest } from '../shared/interfaces.js';
import { computeLimitPrice } from '../shared/pricing.js';
import {
  BalanceAllowanceSchema,
  OpenOrderSchema,
  PostOrderResponseSchema,
  PriceResponseSchema,
  type SignatureType,
} from './types.js';
import { abbreviate, logger, type Logger } from '../../utils/logger.js';
import { retry } from '../../utils/retry.js';
import { ConfigurationError, OrderRejectedError, errorMessage } from '../../utils/errors.js';

export interface PolymarketExchangeOptions {
  /** Price buffer added to buys and taken off sells */
  maxSlippage: number;
}

// Conditional tokens and USDC both use 6 decimals on Polygon
const BASE_UNITS = 1e6;

/**
 * Share balance from a getBalanceAllowance response, or null when the response carries none
 */
export function parseTokenBalance(raw: unknown): number | null {
  const parsed = BalanceAllowanceSchema.safeParse(raw);
  if (!parsed.success || parsed.data.error || parsed.data.balance === undefined) {
    return null;
  }
  const units = Number(parsed.data.balance);
  return Number.isFinite(units) && units >= 0 ? units / BASE_UNITS : null;
}

/**
 * Map a CLOB order status onto the gateway's status set
 */
export function mapOrderStatus(status: string, originalSize: number, sizeMatched: number): OrderStatusReport['status'] {
  switch (status.toLowerCase()) {
    case 'matched':
      return EXCHANGE_ORDER_STATUSES.FILLED;
    case 'canceled':
    case 'cancelled':
      return EXCHANGE_ORDER_STATUSES.CANCELLED;
    case 'live':
    case 'delayed':
    case 'unmatched':
      return EXCHANGE_ORDER_STATUSES.OPEN;
    default:
      return sizeMatched >= originalSize && originalSize > 0
        ? EXCHANGE_ORDER_STATUSES.FILLED
        : EXCHANGE_ORDER_STATUSES.OPEN;
  }
}

/**
 * Live exchange gateway
 * Wraps the official @polymarket/clob-client SDK for orders and held token balances
 */
export class PolymarketExchange implements ExchangeGateway {
  readonly name = 'polymarket';

  private config: PolymarketConfig;
  private options: PolymarketExchangeOptions;
  private log: Logger;
  private client: ClobClient | null = null;
  private signer: Wallet | null = null;
  private marketInfo = new Map<string, { tickSize: TickSize; negRisk: boolean }>();

  constructor(config: PolymarketConfig, options: PolymarketExchangeOptions) {
    this.config = config;
    this.options = options;
    this.log = logger('PolymarketExchange');
  }

  /**
   * Authenticate with the CLOB, deriving L2 credentials from the private key when none are configured
   */
  async connect(): Promise<void> {
    if (this.client) {
      this.log.warn('Already connected');
      return;
    }

    if (!this.config.privateKey) {
      throw new ConfigurationError('POLYMARKET_PRIVATE_KEY is required for live trading');
    }

    const signer = new Wallet(this.config.privateKey);
    const signatureType = this.mapSignatureType(this.config.signatureType);
    this.log.info('Wallet initialized', { address: abbreviate(signer.address) });

    let creds: ApiKeyCreds;
    if (this.config.apiKey && this.config.apiSecret && this.config.apiPassphrase) {
      this.log.info('Using provided L2 API credentials', { apiKey: abbreviate(this.config.apiKey, 8, 0) });
      creds = { key: this.config.apiKey, secret: this.config.apiSecret, passphrase: this.config.apiPassphrase };
    } else {
      this.log.info('No L2 API credentials provided, deriving from wallet');
      const tempClient = new ClobClient(this.config.host, this.config.chainId, signer);
      try {
        creds = await retry(
          async () => {
            const derived = await tempClient.createOrDeriveApiKey();
            // SDK may return an empty object instead of throwing
            if (!derived || !derived.key || !derived.secret || !derived.passphrase) {
              throw new Error('createOrDeriveApiKey returned incomplete credentials');
            }
            return derived;
          },
          {
            maxAttempts: 3,
            initialDelayMs: 1000,
            onRetry: (attempt, error) => {
              this.log.warn(`API key derivation attempt ${attempt} failed`, { error: errorMessage(error) });
            },
          }
        );
      } catch (error) {
        throw new ConfigurationError(`Unable to derive Polymarket API credentials: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    const client = new ClobClient(
      this.config.host,
      this.config.chainId,
      signer,
      creds,
      signatureType,
      this.config.funderAddress
    );

    // The SDK sometimes returns error objects instead of throwing, so check both
    const balance = BalanceAllowanceSchema.safeParse(
      await client.getBalanceAllowance({ asset_type: AssetType.COLLATERAL })
    );
    if (!balance.success || balance.data.error || balance.data.status === 401) {
      const reason = balance.success ? (balance.data.error ?? 'unauthorized') : 'unexpected response';
      throw new ConfigurationError(`Polymarket credentials failed verification: ${reason}`);
    }

    this.client = client;
    this.signer = signer;
    this.log.info('Connected to Polymarket CLOB', {
      address: abbreviate(signer.address),
      funder: this.config.funderAddress ? abbreviate(this.config.funderAddress) : undefined,
      chainId: this.config.chainId,
      balance: balance.data.balance,
    });
  }

  async submitOrder(request: SubmitOrderRequest): Promise<string> {
    const client = this.ensureClient();
    const { tickSize, negRisk } = await this.getMarketInfo(request.marketId);
    const bookPrice = await this.getBookPrice(request.marketId, request.side);
    const price = computeLimitPrice(request.side, bookPrice, request.referencePrice, this.options.maxSlippage, tickSize);

    const signed = await client.createOrder(
      {
        tokenID: request.marketId,
        price,
        side: request.side === TRADE_SIDES.BUY ? Side.BUY : Side.SELL,
        size: request.size,
      },
      { tickSize, negRisk }
    );
    const raw: unknown = await client.postOrder(signed, request.orderType === ORDER_TYPES.FOK ? OrderType.FOK : OrderType.GTC);

    const parsed = PostOrderResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('Unexpected order response from Polymarket');
    }

    const { orderID, success, errorMsg, error, status } = parsed.data;
    if (error || success === false || !orderID) {
      const message = error || errorMsg || 'order not accepted';
      if (typeof status === 'number' && (status === 429 || status >= 500)) {
        throw new Error(`Polymarket order failed with status ${status}: ${message}`);
      }
      throw new OrderRejectedError(message, {
        context: { marketId: request.marketId, side: request.side, size: request.size, price },
      });
    }

    this.log.info('Order placed', {
      orderId: abbreviate(orderID),
      marketId: abbreviate(request.marketId),
      side: request.side,
      price,
      size: request.size,
    });
    return orderID;
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
    const client = this.ensureClient();
    const order = OpenOrderSchema.parse(await client.getOrder(orderId));

    return {
      status: mapOrderStatus(order.status, order.original_size, order.size_matched),
      filledSize: order.size_matched,
      avgPrice: order.price,
    };
  }

  async cancelOrder(orderId: string): Promise<void> {
    const client = this.ensureClient();
    await client.cancelOrder({ orderID: orderId });
    this.log.info('Order cancelled', { orderId: abbreviate(orderId) });
  }

  /**
   * Outcome-token balance as the CLOB settles it. Unknown (null) when not connected or unreadable.
   */
  async getPositionSize(marketId: string): Promise<number | null> {
    if (!this.client) return null;

    try {
      const size = parseTokenBalance(
        await this.client.getBalanceAllowance({ asset_type: AssetType.CONDITIONAL, token_id: marketId })
      );
      if (size === null) {
        this.log.warn('Balance response carried no balance', { marketId: abbreviate(marketId) });
      }
      return size;
    } catch (error) {
      this.log.warn('Could not read held position', { marketId: abbreviate(marketId), error: errorMessage(error) });
      return null;
    }
  }

  // ============================================
  // Private Helper Methods
  // ============================================

  private ensureClient(): ClobClient {
    if (!this.client) {
      throw new Error('Client not connected. Call connect() first.');
    }
    return this.client;
  }

  private mapSignatureType(type: 'EOA' | 'PROXY' | 'GNOSIS'): SignatureType {
    switch (type) {
      case 'EOA':
        return 0;
      case 'PROXY':
        return 1;
      case 'GNOSIS':
        return 2;
      default:
        return 0;
    }
  }

  private async getMarketInfo(tokenId: string): Promise<{ tickSize: TickSize; negRisk: boolean }> {
    const cached = this.marketInfo.get(tokenId);
    if (cached) return cached;

    const client = this.ensureClient();
    const info = {
      tickSize: await client.getTickSize(tokenId),
      negRisk: await client.getNegRisk(tokenId),
    };
    this.marketInfo.set(tokenId, info);
    return info;
  }

  private async getBookPrice(tokenId: string, side: TradeSide): Promise<number | null> {
    try {
      const parsed = PriceResponseSchema.safeParse(await this.ensureClient().getPrice(tokenId, side));
      return parsed.success ? parsed.data.price : null;
    } catch (error) {
      this.log.warn('Price lookup failed, using target price', {
        marketId: abbreviate(tokenId),
        error: errorMessage(error),
      });
      return null;
    }
  }
}
