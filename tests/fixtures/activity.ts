/**
 * Activity feed and trade event fixtures
 */

import type { TradeEvent } from '../../src/services/copyTrading/types.js';

export const TARGET = '0x1111111111111111111111111111111111111111';
export const MARKET_A = '1000000000000000000000000000000000000000000000000000000000000000000000000001';
export const MARKET_B = '2000000000000000000000000000000000000000000000000000000000000000000000000002';

export interface RawActivity {
  proxyWallet: string;
  timestamp: number;
  conditionId: string;
  type: string;
  size: number;
  usdcSize: number;
  transactionHash: string;
  price: number;
  asset: string;
  side: 'BUY' | 'SELL';
  outcomeIndex: number;
  title: string;
  slug: string;
  outcome: string;
}

/**
 * A raw /activity record as the data API returns it
 */
export function activity(overrides: Partial<RawActivity> = {}): RawActivity {
  const base: RawActivity = {
    proxyWallet: TARGET,
    timestamp: 1_700_000_000,
    conditionId: '0xcondition',
    type: 'TRADE',
    size: 100,
    usdcSize: 55,
    transactionHash: '0xaaa',
    price: 0.55,
    asset: MARKET_A,
    side: 'BUY',
    outcomeIndex: 0,
    title: 'Will it rain tomorrow?',
    slug: 'will-it-rain-tomorrow',
    outcome: 'Yes',
  };
  return { ...base, ...overrides };
}

/**
 * A normalized target trade
 */
export function tradeEvent(overrides: Partial<TradeEvent> = {}): TradeEvent {
  return {
    eventId: '0xaaa:market-a:BUY',
    marketId: 'market-a',
    side: 'BUY',
    action: 'OPEN',
    size: 100,
    price: 0.55,
    observedAt: 1_700_000_000,
    ...overrides,
  };
}
