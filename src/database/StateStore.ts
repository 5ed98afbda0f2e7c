import type {
  CopyPosition,
  FeedCursor,
  PendingOrder,
  ProcessedEventMarker,
} from '../services/copyTrading/types.js';

/**
 * Writes that must commit together.
 * Throwing from inside a transaction callback rolls every write back.
 */
export interface StateStoreTransaction {
  /**
   * Insert a processed marker. Resolves false, writing nothing, when the key already exists.
   */
  insertMarker(marker: ProcessedEventMarker): Promise<boolean>;
  upsertPosition(position: CopyPosition): Promise<void>;
  deletePosition(marketId: string): Promise<void>;
  deletePendingOrder(id: string): Promise<void>;
}

/**
 * Durable copier state: positions, processed markers, pending orders and feed cursors.
 * No business logic lives behind this interface.
 */
export interface StateStore {
  transaction<T>(fn: (tx: StateStoreTransaction) => Promise<T>): Promise<T>;

  isProcessed(eventId: string): Promise<boolean>;
  getMarker(eventId: string): Promise<ProcessedEventMarker | null>;

  loadPositions(): Promise<CopyPosition[]>;
  savePosition(position: CopyPosition): Promise<void>;

  savePendingOrder(order: PendingOrder): Promise<void>;
  listPendingOrders(): Promise<PendingOrder[]>;
  deletePendingOrder(id: string): Promise<void>;

  getCursor(feedKey: string): Promise<FeedCursor | null>;
  saveCursor(feedKey: string, cursor: FeedCursor): Promise<void>;
}
