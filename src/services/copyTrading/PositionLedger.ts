/**
 * Position Ledger
 *
 * The copier's own positions, one per market, derived only from fills the exchange confirmed.
 * Every size change commits together with its processed marker in one State Store
 * transaction; the in-memory view is updated only after that commit succeeds.
 */

import { FINANCIAL, POSITION_STATUSES, type TradeSide } from '../../config/constants.js';
import type { StateStore } from '../../database/StateStore.js';
import { DuplicateEventError } from '../../utils/errors.js';
import { abbreviate, logger } from '../../utils/logger.js';
import { openPositions } from '../../utils/metrics.js';
import type { CopyPosition, FillCommit, LedgerSnapshot } from './types.js';

const log = logger('PositionLedger');

function roundSize(value: number): number {
  return Number(value.toFixed(6));
}

function clearedPosition(marketId: string, at: Date): CopyPosition {
  return { marketId, side: null, size: 0, avgEntryPrice: 0, status: POSITION_STATUSES.NONE, updatedAt: at };
}

export class PositionLedger {
  // Only markets with a non-zero position have an entry
  private positions: Map<string, CopyPosition> = new Map();
  private store: StateStore;
  private now: () => Date;

  constructor(store: StateStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  /**
   * Hydrate from the State Store. A close interrupted by a restart is no longer in flight.
   */
  async load(): Promise<void> {
    const stored = await this.store.loadPositions();
    this.positions.clear();

    for (const position of stored) {
      if (position.size <= FINANCIAL.SIZE_EPSILON || position.side === null) {
        continue;
      }
      if (position.status === POSITION_STATUSES.CLOSING) {
        log.warn('Close was interrupted by a restart, position reopened', {
          marketId: abbreviate(position.marketId),
          size: position.size,
        });
      }
      this.positions.set(position.marketId, { ...position, status: POSITION_STATUSES.OPEN });
    }

    this.updateGauge();
    log.info('Ledger loaded', { openPositions: this.positions.size });
  }

  current(marketId: string): CopyPosition | null {
    const position = this.positions.get(marketId);
    return position ? { ...position } : null;
  }

  snapshot(marketId: string): Readonly<CopyPosition> | null {
    const position = this.positions.get(marketId);
    return position ? Object.freeze({ ...position }) : null;
  }

  /**
   * Snapshot the reconciler decides an event against
   */
  async snapshotFor(eventId: string, marketId: string): Promise<LedgerSnapshot> {
    return {
      position: this.snapshot(marketId),
      processed: await this.store.isProcessed(eventId),
    };
  }

  all(): CopyPosition[] {
    return Array.from(this.positions.values(), (position) => ({ ...position }));
  }

  /**
   * Apply a confirmed fill. `side` is the side of the executed order: the position's own side
   * adds to it, the opposite side reduces it. Reaching zero clears the entry.
   */
  async applyConfirmedFill(
    marketId: string,
    side: TradeSide,
    deltaSize: number,
    price: number,
    commit: FillCommit
  ): Promise<CopyPosition> {
    if (!(deltaSize > 0)) {
      throw new Error(`Confirmed fill size must be positive, got ${deltaSize}`);
    }

    const at = this.now();
    const existing = this.positions.get(marketId);
    let next: CopyPosition;

    if (!existing || existing.side === side) {
      const previousSize = existing?.size ?? 0;
      const previousAvg = existing?.avgEntryPrice ?? 0;
      const size = roundSize(previousSize + deltaSize);
      next = {
        marketId,
        side,
        size,
        avgEntryPrice: (previousSize * previousAvg + deltaSize * price) / size,
        status: POSITION_STATUSES.OPEN,
        updatedAt: at,
      };
    } else {
      const remaining = roundSize(existing.size - deltaSize);
      if (remaining < -FINANCIAL.SIZE_EPSILON) {
        log.warn('Reduction larger than held size, clearing position', {
          marketId: abbreviate(marketId),
          held: existing.size,
          reduction: deltaSize,
        });
      }
      next =
        remaining > FINANCIAL.SIZE_EPSILON
          ? { ...existing, size: remaining, status: POSITION_STATUSES.OPEN, updatedAt: at }
          : clearedPosition(marketId, at);
    }

    await this.commit(next, commit);

    log.info('Fill applied', {
      marketId: abbreviate(marketId),
      action: commit.appliedAction,
      side,
      delta: deltaSize,
      price,
      size: next.size,
      key: commit.idempotenceKey,
    });
    return { ...next };
  }

  /**
   * Record a processed marker without touching any position
   */
  async markProcessed(commit: FillCommit): Promise<void> {
    await this.store.transaction(async (tx) => {
      const inserted = await tx.insertMarker({
        eventId: commit.idempotenceKey,
        appliedAction: commit.appliedAction,
        appliedAt: this.now(),
      });
      if (!inserted) {
        throw new DuplicateEventError(commit.idempotenceKey);
      }
      if (commit.pendingOrderId) {
        await tx.deletePendingOrder(commit.pendingOrderId);
      }
    });
  }

  async markClosing(marketId: string): Promise<void> {
    await this.setStatus(marketId, POSITION_STATUSES.OPEN, POSITION_STATUSES.CLOSING);
  }

  async restoreOpen(marketId: string): Promise<void> {
    await this.setStatus(marketId, POSITION_STATUSES.CLOSING, POSITION_STATUSES.OPEN);
  }

  /**
   * Overwrite a stale entry with the size the exchange reports.
   * With a commit, the correction and its marker are written together.
   */
  async correct(marketId: string, size: number, reason: string, commit?: FillCommit): Promise<CopyPosition> {
    const existing = this.positions.get(marketId);
    const at = this.now();
    const next =
      existing && size > FINANCIAL.SIZE_EPSILON
        ? { ...existing, size: roundSize(size), updatedAt: at }
        : clearedPosition(marketId, at);

    if (commit) {
      await this.commit(next, commit);
    } else if (next.size > 0) {
      await this.store.savePosition(next);
      this.positions.set(marketId, next);
    } else {
      await this.store.transaction(async (tx) => tx.deletePosition(marketId));
      this.positions.delete(marketId);
    }
    this.updateGauge();

    log.warn('Ledger corrected from exchange', {
      marketId: abbreviate(marketId),
      previousSize: existing?.size ?? 0,
      size: next.size,
      reason,
    });
    return { ...next };
  }

  private async commit(next: CopyPosition, commit: FillCommit): Promise<void> {
    await this.store.transaction(async (tx) => {
      const inserted = await tx.insertMarker({
        eventId: commit.idempotenceKey,
        appliedAction: commit.appliedAction,
        appliedAt: next.updatedAt,
      });
      if (!inserted) {
        throw new DuplicateEventError(commit.idempotenceKey);
      }
      if (next.size > 0) {
        await tx.upsertPosition(next);
      } else {
        await tx.deletePosition(next.marketId);
      }
      if (commit.pendingOrderId) {
        await tx.deletePendingOrder(commit.pendingOrderId);
      }
    });

    if (next.size > 0) {
      this.positions.set(next.marketId, next);
    } else {
      this.positions.delete(next.marketId);
    }
    this.updateGauge();
  }

  private async setStatus(
    marketId: string,
    from: CopyPosition['status'],
    to: CopyPosition['status']
  ): Promise<void> {
    const existing = this.positions.get(marketId);
    if (!existing || existing.status !== from) {
      return;
    }
    const next = { ...existing, status: to, updatedAt: this.now() };
    await this.store.savePosition(next);
    this.positions.set(marketId, next);
  }

  private updateGauge(): void {
    openPositions.set(this.positions.size);
  }
}
