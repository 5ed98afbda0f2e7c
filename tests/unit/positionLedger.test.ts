import { describe, it, expect, beforeEach } from 'vitest';
import { PositionLedger } from '../../src/services/copyTrading/PositionLedger.js';
import type { PendingOrder } from '../../src/services/copyTrading/types.js';
import { DuplicateEventError } from '../../src/utils/errors.js';
import { InMemoryStateStore } from '../mocks/stateStore.js';

const NOW = new Date('2024-06-01T12:00:00Z');

function pendingOrder(id: string): PendingOrder {
  return {
    id,
    eventId: 'evt-1',
    legKey: 'evt-1',
    marketId: 'market-a',
    actionKind: 'OPEN',
    intendedSide: 'BUY',
    orderSide: 'BUY',
    intendedSize: 10,
    attemptCount: 1,
    exchangeOrderId: null,
    filledSize: 10,
    filledNotional: 5,
    status: 'FILLED',
    createdAt: NOW,
    updatedAt: NOW,
  };
}

describe('PositionLedger', () => {
  let store: InMemoryStateStore;
  let ledger: PositionLedger;

  beforeEach(() => {
    store = new InMemoryStateStore();
    ledger = new PositionLedger(store, () => NOW);
  });

  describe('applyConfirmedFill', () => {
    it('should create an open position from the first fill', async () => {
      const result = await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, {
        idempotenceKey: 'evt-1',
        appliedAction: 'OPEN',
      });

      expect(result).toEqual({
        marketId: 'market-a',
        side: 'BUY',
        size: 10,
        avgEntryPrice: 0.5,
        status: 'OPEN',
        updatedAt: NOW,
      });
      expect(ledger.current('market-a')).toEqual(result);
      expect(store.positions.get('market-a')).toEqual(result);
      expect(store.markers.get('evt-1')).toEqual({ eventId: 'evt-1', appliedAction: 'OPEN', appliedAt: NOW });
    });

    it('should add same-side fills at the volume-weighted price', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });
      const result = await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.7, {
        idempotenceKey: 'evt-2',
        appliedAction: 'INCREASE',
      });

      expect(result.size).toBe(20);
      expect(result.avgEntryPrice).toBeCloseTo(0.6, 10);
    });

    it('should reduce on an opposite-side fill and keep the entry price', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });
      const result = await ledger.applyConfirmedFill('market-a', 'SELL', 4, 0.9, {
        idempotenceKey: 'evt-2',
        appliedAction: 'CLOSE',
      });

      expect(result).toMatchObject({ side: 'BUY', size: 6, avgEntryPrice: 0.5, status: 'OPEN' });
    });

    it('should clear the entry when the size reaches zero', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });
      const result = await ledger.applyConfirmedFill('market-a', 'SELL', 10, 0.6, {
        idempotenceKey: 'evt-2',
        appliedAction: 'CLOSE',
      });

      expect(result).toEqual({
        marketId: 'market-a',
        side: null,
        size: 0,
        avgEntryPrice: 0,
        status: 'NONE',
        updatedAt: NOW,
      });
      expect(ledger.current('market-a')).toBeNull();
      expect(store.positions.has('market-a')).toBe(false);
      expect(ledger.all()).toEqual([]);
    });

    it('should clear rather than flip when a reduction exceeds the held size', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });
      const result = await ledger.applyConfirmedFill('market-a', 'SELL', 12, 0.6, {
        idempotenceKey: 'evt-2',
        appliedAction: 'CLOSE',
      });

      expect(result.size).toBe(0);
      expect(result.side).toBeNull();
    });

    it('should refuse a key that is already processed and leave the position alone', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });

      await expect(
        ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' })
      ).rejects.toBeInstanceOf(DuplicateEventError);

      expect(ledger.current('market-a')?.size).toBe(10);
      expect(store.positions.get('market-a')?.size).toBe(10);
    });

    it('should leave memory and store untouched when the commit fails', async () => {
      store.failNextCommit(new Error('connection reset'));

      await expect(
        ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' })
      ).rejects.toThrow('connection reset');

      expect(ledger.current('market-a')).toBeNull();
      expect(store.positions.size).toBe(0);
      expect(store.markers.size).toBe(0);
    });

    it('should delete the pending order in the same commit', async () => {
      await store.savePendingOrder(pendingOrder('pending-1'));

      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, {
        idempotenceKey: 'evt-1',
        appliedAction: 'OPEN',
        pendingOrderId: 'pending-1',
      });

      expect(store.pending.size).toBe(0);
      expect(store.transactionCount).toBe(1);
    });

    it('should reject non-positive fills', async () => {
      await expect(
        ledger.applyConfirmedFill('market-a', 'BUY', 0, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' })
      ).rejects.toThrow('Confirmed fill size must be positive, got 0');
    });
  });

  describe('markProcessed', () => {
    it('should record a FAILED marker without a position change', async () => {
      await store.savePendingOrder(pendingOrder('pending-1'));

      await ledger.markProcessed({ idempotenceKey: 'evt-1', appliedAction: 'FAILED', pendingOrderId: 'pending-1' });

      expect(await store.getMarker('evt-1')).toEqual({ eventId: 'evt-1', appliedAction: 'FAILED', appliedAt: NOW });
      expect(store.positions.size).toBe(0);
      expect(store.pending.size).toBe(0);
    });
  });

  describe('status transitions', () => {
    it('should persist CLOSING and back to OPEN', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });

      await ledger.markClosing('market-a');
      expect(ledger.current('market-a')?.status).toBe('CLOSING');
      expect(store.positions.get('market-a')?.status).toBe('CLOSING');

      await ledger.restoreOpen('market-a');
      expect(ledger.current('market-a')?.status).toBe('OPEN');
      expect(store.positions.get('market-a')?.status).toBe('OPEN');
    });

    it('should ignore transitions for markets without a position', async () => {
      await ledger.markClosing('market-z');
      expect(store.positions.size).toBe(0);
    });
  });

  describe('load', () => {
    it('should reopen positions left closing by a restart', async () => {
      await store.savePosition({
        marketId: 'market-a',
        side: 'BUY',
        size: 10,
        avgEntryPrice: 0.5,
        status: 'CLOSING',
        updatedAt: NOW,
      });
      await store.savePosition({
        marketId: 'market-b',
        side: 'BUY',
        size: 0,
        avgEntryPrice: 0,
        status: 'OPEN',
        updatedAt: NOW,
      });

      await ledger.load();

      expect(ledger.current('market-a')?.status).toBe('OPEN');
      expect(ledger.current('market-b')).toBeNull();
      expect(ledger.all()).toHaveLength(1);
    });
  });

  describe('correct', () => {
    it('should lower a stale size to the authoritative one', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });

      const result = await ledger.correct('market-a', 4, 'exchange holds less');

      expect(result).toMatchObject({ side: 'BUY', size: 4, avgEntryPrice: 0.5 });
      expect(store.positions.get('market-a')?.size).toBe(4);
    });

    it('should clear the entry and record the marker when a commit is given', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });

      await ledger.correct('market-a', 0, 'exchange holds nothing', {
        idempotenceKey: 'evt-2',
        appliedAction: 'RECONCILED',
      });

      expect(ledger.current('market-a')).toBeNull();
      expect(store.positions.has('market-a')).toBe(false);
      expect(store.markers.get('evt-2')?.appliedAction).toBe('RECONCILED');
    });
  });

  describe('snapshots', () => {
    it('should hand out frozen copies', async () => {
      await ledger.applyConfirmedFill('market-a', 'BUY', 10, 0.5, { idempotenceKey: 'evt-1', appliedAction: 'OPEN' });

      const snap = ledger.snapshot('market-a');
      expect(Object.isFrozen(snap)).toBe(true);

      const view = await ledger.snapshotFor('evt-1', 'market-a');
      expect(view.processed).toBe(true);
      expect(view.position?.size).toBe(10);

      const fresh = await ledger.snapshotFor('evt-9', 'market-b');
      expect(fresh).toEqual({ position: null, processed: false });
    });
  });
});
