import { eq } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import {
  ACTION_KINDS,
  APPLIED_ACTIONS,
  PENDING_ORDER_STATUSES,
  POSITION_STATUSES,
  TRADE_SIDES,
} from '../config/constants.js';
import type {
  CopyPosition,
  FeedCursor,
  PendingOrder,
  ProcessedEventMarker,
} from '../services/copyTrading/types.js';
import type { Database } from './index.js';
import type * as schema from './schema/index.js';
import {
  copyPositions,
  feedCursors,
  pendingOrders,
  processedEvents,
  type CopyPositionRow,
  type PendingOrderRow,
} from './schema/index.js';
import type { StateStore, StateStoreTransaction } from './StateStore.js';

// Both the root database and a transaction handle satisfy this
type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

function oneOf<T extends string>(values: Record<string, T>, value: string, column: string): T {
  const match = Object.values(values).find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected value "${value}" in column ${column}`);
  }
  return match;
}

function toPosition(row: CopyPositionRow): CopyPosition {
  return {
    marketId: row.marketId,
    side: row.side === null ? null : oneOf(TRADE_SIDES, row.side, 'copy_positions.side'),
    size: Number(row.size),
    avgEntryPrice: Number(row.avgEntryPrice),
    status: oneOf(POSITION_STATUSES, row.status, 'copy_positions.status'),
    updatedAt: row.updatedAt,
  };
}

function toPendingOrder(row: PendingOrderRow): PendingOrder {
  return {
    id: row.id,
    eventId: row.eventId,
    legKey: row.legKey,
    marketId: row.marketId,
    actionKind: oneOf(ACTION_KINDS, row.actionKind, 'pending_orders.action_kind'),
    intendedSide: oneOf(TRADE_SIDES, row.intendedSide, 'pending_orders.intended_side'),
    orderSide: oneOf(TRADE_SIDES, row.orderSide, 'pending_orders.order_side'),
    intendedSize: Number(row.intendedSize),
    attemptCount: row.attemptCount,
    exchangeOrderId: row.exchangeOrderId,
    filledSize: Number(row.filledSize),
    filledNotional: Number(row.filledNotional),
    status: oneOf(PENDING_ORDER_STATUSES, row.status, 'pending_orders.status'),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Writes shared by the root connection and transactions
 */
class DrizzleWriter implements StateStoreTransaction {
  constructor(protected readonly db: Executor) {}

  async insertMarker(marker: ProcessedEventMarker): Promise<boolean> {
    const inserted = await this.db
      .insert(processedEvents)
      .values({
        eventId: marker.eventId,
        appliedAction: marker.appliedAction,
        appliedAt: marker.appliedAt,
      })
      .onConflictDoNothing({ target: processedEvents.eventId })
      .returning({ eventId: processedEvents.eventId });
    return inserted.length > 0;
  }

  async upsertPosition(position: CopyPosition): Promise<void> {
    const values = {
      side: position.side,
      size: String(position.size),
      avgEntryPrice: String(position.avgEntryPrice),
      status: position.status,
      updatedAt: position.updatedAt,
    };
    await this.db
      .insert(copyPositions)
      .values({ marketId: position.marketId, ...values })
      .onConflictDoUpdate({ target: copyPositions.marketId, set: values });
  }

  async deletePosition(marketId: string): Promise<void> {
    await this.db.delete(copyPositions).where(eq(copyPositions.marketId, marketId));
  }

  async deletePendingOrder(id: string): Promise<void> {
    await this.db.delete(pendingOrders).where(eq(pendingOrders.id, id));
  }
}

/**
 * State store backed by Postgres through drizzle
 */
export class PostgresStateStore extends DrizzleWriter implements StateStore {
  constructor(db: Database) {
    super(db);
  }

  async transaction<T>(fn: (tx: StateStoreTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(new DrizzleWriter(tx)));
  }

  async isProcessed(eventId: string): Promise<boolean> {
    return (await this.getMarker(eventId)) !== null;
  }

  async getMarker(eventId: string): Promise<ProcessedEventMarker | null> {
    const rows = await this.db.select().from(processedEvents).where(eq(processedEvents.eventId, eventId)).limit(1);
    const row = rows[0];
    if (!row) return null;
    return {
      eventId: row.eventId,
      appliedAction: oneOf(APPLIED_ACTIONS, row.appliedAction, 'processed_events.applied_action'),
      appliedAt: row.appliedAt,
    };
  }

  async loadPositions(): Promise<CopyPosition[]> {
    const rows = await this.db.select().from(copyPositions);
    return rows.map(toPosition);
  }

  async savePosition(position: CopyPosition): Promise<void> {
    await this.upsertPosition(position);
  }

  async savePendingOrder(order: PendingOrder): Promise<void> {
    const values = {
      eventId: order.eventId,
      legKey: order.legKey,
      marketId: order.marketId,
      actionKind: order.actionKind,
      intendedSide: order.intendedSide,
      orderSide: order.orderSide,
      intendedSize: String(order.intendedSize),
      attemptCount: order.attemptCount,
      exchangeOrderId: order.exchangeOrderId,
      filledSize: String(order.filledSize),
      filledNotional: String(order.filledNotional),
      status: order.status,
      updatedAt: order.updatedAt,
    };
    await this.db
      .insert(pendingOrders)
      .values({ id: order.id, createdAt: order.createdAt, ...values })
      .onConflictDoUpdate({ target: pendingOrders.id, set: values });
  }

  async listPendingOrders(): Promise<PendingOrder[]> {
    const rows = await this.db.select().from(pendingOrders).orderBy(pendingOrders.createdAt);
    return rows.map(toPendingOrder);
  }

  async getCursor(feedKey: string): Promise<FeedCursor | null> {
    const rows = await this.db.select().from(feedCursors).where(eq(feedCursors.feedKey, feedKey)).limit(1);
    const row = rows[0];
    if (!row) return null;
    return { observedAt: row.observedAt, eventId: row.eventId };
  }

  async saveCursor(feedKey: string, cursor: FeedCursor): Promise<void> {
    const values = { observedAt: cursor.observedAt, eventId: cursor.eventId, updatedAt: new Date() };
    await this.db
      .insert(feedCursors)
      .values({ feedKey, ...values })
      .onConflictDoUpdate({ target: feedCursors.feedKey, set: values });
  }
}
