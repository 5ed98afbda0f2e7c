import { pgTable, text, timestamp, numeric, integer, bigint, index } from 'drizzle-orm/pg-core';

/**
 * Copy positions table - the copier's own position per market
 * At most one row per market; a cleared position has no row
 */
export const copyPositions = pgTable(
  'copy_positions',
  {
    // Outcome token id
    marketId: text('market_id').primaryKey(),
    side: text('side'), // 'BUY' | 'SELL'
    size: numeric('size', { precision: 24, scale: 6 }).notNull(),
    avgEntryPrice: numeric('avg_entry_price', { precision: 10, scale: 6 }).notNull(),
    // Status: 'OPEN' | 'CLOSING'
    status: text('status').notNull().default('OPEN'),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    statusIdx: index('copy_positions_status_idx').on(table.status),
  })
);

/**
 * Processed events table - the idempotence gate
 * Keyed by the idempotence key of each applied leg (the target event id for single-leg actions)
 */
export const processedEvents = pgTable('processed_events', {
  eventId: text('event_id').primaryKey(),
  // 'OPEN' | 'INCREASE' | 'CLOSE' | 'FAILED' | 'RECONCILED'
  appliedAction: text('applied_action').notNull(),
  appliedAt: timestamp('applied_at').defaultNow().notNull(),
});

/**
 * Pending orders table - one row per action in flight
 * Deleted in the transaction that commits the fill; rows left behind are recovered at startup
 */
export const pendingOrders = pgTable(
  'pending_orders',
  {
    id: text('id').primaryKey(),
    eventId: text('event_id').notNull(),
    legKey: text('leg_key').notNull().unique(),
    marketId: text('market_id').notNull(),
    actionKind: text('action_kind').notNull(),
    intendedSide: text('intended_side').notNull(),
    orderSide: text('order_side').notNull(),
    intendedSize: numeric('intended_size', { precision: 24, scale: 6 }).notNull(),
    attemptCount: integer('attempt_count').notNull().default(0),
    exchangeOrderId: text('exchange_order_id'),
    filledSize: numeric('filled_size', { precision: 24, scale: 6 }).notNull().default('0'),
    filledNotional: numeric('filled_notional', { precision: 24, scale: 6 }).notNull().default('0'),
    // Status: 'SUBMITTING' | 'PARTIALLY_FILLED' | 'FILLED' | 'FAILED'
    status: text('status').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    marketIdx: index('pending_orders_market_idx').on(table.marketId),
    statusIdx: index('pending_orders_status_idx').on(table.status),
  })
);

/**
 * Feed cursors table - last event handed to the reconciler, per target
 */
export const feedCursors = pgTable('feed_cursors', {
  feedKey: text('feed_key').primaryKey(),
  observedAt: bigint('observed_at', { mode: 'number' }).notNull(),
  eventId: text('event_id').notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

// Type exports
export type CopyPositionRow = typeof copyPositions.$inferSelect;
export type NewCopyPositionRow = typeof copyPositions.$inferInsert;
export type ProcessedEventRow = typeof processedEvents.$inferSelect;
export type NewProcessedEventRow = typeof processedEvents.$inferInsert;
export type PendingOrderRow = typeof pendingOrders.$inferSelect;
export type NewPendingOrderRow = typeof pendingOrders.$inferInsert;
export type FeedCursorRow = typeof feedCursors.$inferSelect;
