// Trade sides (position direction)
export const TRADE_SIDES = {
  BUY: 'BUY',
  SELL: 'SELL',
} as const;

export type TradeSide = (typeof TRADE_SIDES)[keyof typeof TRADE_SIDES];

// Target trade actions
export const TRADE_ACTIONS = {
  OPEN: 'OPEN',
  CLOSE: 'CLOSE',
} as const;

export type TradeAction = (typeof TRADE_ACTIONS)[keyof typeof TRADE_ACTIONS];

// Copy position statuses
export const POSITION_STATUSES = {
  NONE: 'NONE',
  OPEN: 'OPEN',
  CLOSING: 'CLOSING',
} as const;

export type PositionStatus = (typeof POSITION_STATUSES)[keyof typeof POSITION_STATUSES];

// Local actions the reconciler can decide on
export const ACTION_KINDS = {
  OPEN: 'OPEN',
  INCREASE: 'INCREASE',
  CLOSE: 'CLOSE',
} as const;

export type ActionKind = (typeof ACTION_KINDS)[keyof typeof ACTION_KINDS];

// What a processed-event marker records
export const APPLIED_ACTIONS = {
  ...ACTION_KINDS,
  FAILED: 'FAILED',
  RECONCILED: 'RECONCILED',
} as const;

export type AppliedAction = (typeof APPLIED_ACTIONS)[keyof typeof APPLIED_ACTIONS];

// Pending order lifecycle
export const PENDING_ORDER_STATUSES = {
  SUBMITTING: 'SUBMITTING',
  PARTIALLY_FILLED: 'PARTIALLY_FILLED',
  FILLED: 'FILLED',
  FAILED: 'FAILED',
} as const;

export type PendingOrderStatus = (typeof PENDING_ORDER_STATUSES)[keyof typeof PENDING_ORDER_STATUSES];

// Order status as reported by the exchange
export const EXCHANGE_ORDER_STATUSES = {
  OPEN: 'OPEN',
  FILLED: 'FILLED',
  CANCELLED: 'CANCELLED',
  REJECTED: 'REJECTED',
} as const;

export type ExchangeOrderStatus = (typeof EXCHANGE_ORDER_STATUSES)[keyof typeof EXCHANGE_ORDER_STATUSES];

// Order types
export const ORDER_TYPES = {
  GTC: 'GTC', // Good Till Cancelled
  FOK: 'FOK', // Fill or Kill
} as const;

export type OrderType = (typeof ORDER_TYPES)[keyof typeof ORDER_TYPES];

// Scale-in handling when the target adds to a position we already mirror
export const SCALE_IN_POLICIES = {
  FIXED: 'FIXED',
  IGNORE: 'IGNORE',
} as const;

export type ScaleInPolicy = (typeof SCALE_IN_POLICIES)[keyof typeof SCALE_IN_POLICIES];

// Driver cycle states
export const DRIVER_STATES = {
  IDLE: 'IDLE',
  POLLING: 'POLLING',
  RECONCILING: 'RECONCILING',
  EXECUTING: 'EXECUTING',
} as const;

export type DriverState = (typeof DRIVER_STATES)[keyof typeof DRIVER_STATES];

// API endpoints
export const POLYMARKET_ENDPOINTS = {
  CLOB: 'https://clob.polymarket.com',
  DATA_API: 'https://data-api.polymarket.com',
} as const;

// Financial constants
export const FINANCIAL = {
  // Price bounds for outcome tokens
  MIN_PRICE: 0.01,
  MAX_PRICE: 0.99,
  // Sizes below this are treated as zero
  SIZE_EPSILON: 1e-6,
} as const;
