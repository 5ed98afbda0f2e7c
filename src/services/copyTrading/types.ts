/**
 * Copy Trading Type Definitions
 *
 * This module defines the types shared by the reconciliation engine:
 * - Target trade events and feed cursors
 * - Copy positions, processed markers and pending orders
 * - Reconciler decisions and executor outcomes
 * - Driver events
 */

import type {
  ActionKind,
  AppliedAction,
  DriverState,
  PendingOrderStatus,
  PositionStatus,
  TradeAction,
  TradeSide,
} from '../../config/constants.js';

/**
 * A trade observed on the target account. Never mutated once observed.
 */
export interface TradeEvent {
  readonly eventId: string;
  readonly marketId: string;
  readonly side: TradeSide;
  readonly action: TradeAction;
  readonly size: number;
  readonly price: number;
  // Unix seconds as reported by the feed
  readonly observedAt: number;
  // Descriptive only, used for logging
  readonly conditionId?: string;
  readonly outcome?: string;
  readonly title?: string;
  readonly transactionHash?: string;
}

/**
 * Position in the activity feed: the last event handed to the reconciler
 */
export interface FeedCursor {
  observedAt: number;
  eventId: string;
}

/**
 * The copier's own position in one market, built from confirmed fills only
 */
export interface CopyPosition {
  marketId: string;
  // null once the entry is cleared
  side: TradeSide | null;
  size: number;
  avgEntryPrice: number;
  status: PositionStatus;
  updatedAt: Date;
}

export interface ProcessedEventMarker {
  eventId: string;
  appliedAction: AppliedAction;
  appliedAt: Date;
}

/**
 * Execution record persisted while an action is in flight
 */
export interface PendingOrder {
  id: string;
  // Target event the action came from
  eventId: string;
  // Idempotence key committed with the fill
  legKey: string;
  marketId: string;
  actionKind: ActionKind;
  // Side of the copy position the action concerns
  intendedSide: TradeSide;
  // Side of the order sent to the exchange
  orderSide: TradeSide;
  intendedSize: number;
  attemptCount: number;
  exchangeOrderId: string | null;
  filledSize: number;
  filledNotional: number;
  status: PendingOrderStatus;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * One local action the reconciler wants executed
 */
export interface CopyAction {
  kind: ActionKind;
  eventId: string;
  idempotenceKey: string;
  marketId: string;
  // Side of the copy position the action concerns; a CLOSE sends the opposite order side
  side: TradeSide;
  size: number;
  referencePrice: number;
}

export type NoOpReason = 'already_processed' | 'no_position' | 'close_in_flight' | 'side_mismatch' | 'scale_in_ignored';

export type Decision =
  | { type: 'ACTIONS'; actions: CopyAction[] }
  | { type: 'NOOP'; reason: NoOpReason };

/**
 * Immutable view the reconciler decides against
 */
export interface LedgerSnapshot {
  position: Readonly<CopyPosition> | null;
  processed: boolean;
}

export type ExecutionOutcome =
  | { status: 'FILLED'; size: number; avgPrice: number }
  | { status: 'PARTIAL'; size: number; avgPrice: number; requestedSize: number }
  | { status: 'FAILED'; reason: string }
  // Exchange already held nothing to close; ledger corrected without an order
  | { status: 'RECONCILED'; reason: string };

/**
 * Ties a confirmed fill to the marker and pending record committed with it
 */
export interface FillCommit {
  idempotenceKey: string;
  appliedAction: AppliedAction;
  pendingOrderId?: string;
}

/**
 * Result of processing one event inside a cycle
 */
export interface EventResult {
  event: TradeEvent;
  decision: Decision;
  outcomes: Array<{ action: CopyAction; outcome: ExecutionOutcome }>;
}

export interface CycleSummary {
  startedAt: Date;
  durationMs: number;
  observed: number;
  processed: number;
  failed: number;
  cursor: FeedCursor | null;
}

/**
 * Driver events
 */
export interface CopyTradingEvents {
  cycleCompleted: (summary: CycleSummary) => void;
  eventProcessed: (result: EventResult) => void;
  eventFailed: (event: TradeEvent, error: Error) => void;
  pollFailed: (error: Error) => void;
  stateChanged: (state: DriverState) => void;
  started: () => void;
  stopped: () => void;
}
