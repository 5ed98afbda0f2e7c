import type { TickSize } from '@polymarket/clob-client';
import { FINANCIAL, TRADE_SIDES, type TradeSide } from '../../config/constants.js';

/**
 * Limit price for a copy order: the current book price moved by the slippage buffer,
 * falling back to the target's price when the book has none, kept inside [0.01, 0.99]
 */
export function computeLimitPrice(
  side: TradeSide,
  bookPrice: number | null,
  referencePrice: number,
  maxSlippage: number,
  tickSize: TickSize = '0.01'
): number {
  const base = bookPrice !== null && bookPrice > 0 ? bookPrice : referencePrice;
  const buffered = side === TRADE_SIDES.BUY ? base + maxSlippage : base - maxSlippage;
  const decimals = tickSize.split('.')[1]?.length ?? 2;
  const rounded = Number(buffered.toFixed(decimals));
  return Math.min(FINANCIAL.MAX_PRICE, Math.max(FINANCIAL.MIN_PRICE, rounded));
}
