import { describe, it, expect } from 'vitest';
import { Reconciler, closeLegKey } from '../../src/services/copyTrading/Reconciler.js';
import type { CopyPosition, LedgerSnapshot } from '../../src/services/copyTrading/types.js';
import { tradeEvent } from '../fixtures/activity.js';

function position(overrides: Partial<CopyPosition> = {}): Readonly<CopyPosition> {
  const base: CopyPosition = {
    marketId: 'market-a',
    side: 'BUY',
    size: 10,
    avgEntryPrice: 0.5,
    status: 'OPEN',
    updatedAt: new Date('2024-01-01T00:00:00Z'),
  };
  return Object.freeze({ ...base, ...overrides });
}

function snapshot(pos: Readonly<CopyPosition> | null, processed = false): LedgerSnapshot {
  return { position: pos, processed };
}

describe('Reconciler', () => {
  const reconciler = new Reconciler({ copySize: 10, scaleInPolicy: 'FIXED', increaseSize: 5 });

  describe('idempotence gate', () => {
    it('should return NoOp for a processed event whatever the position', () => {
      expect(reconciler.decide(tradeEvent(), snapshot(null, true))).toEqual({
        type: 'NOOP',
        reason: 'already_processed',
      });
      expect(reconciler.decide(tradeEvent({ action: 'CLOSE' }), snapshot(position(), true))).toEqual({
        type: 'NOOP',
        reason: 'already_processed',
      });
    });
  });

  describe('OPEN events', () => {
    it('should open the configured copy size when no position exists', () => {
      const decision = reconciler.decide(tradeEvent(), snapshot(null));

      expect(decision).toEqual({
        type: 'ACTIONS',
        actions: [
          {
            kind: 'OPEN',
            eventId: '0xaaa:market-a:BUY',
            idempotenceKey: '0xaaa:market-a:BUY',
            marketId: 'market-a',
            side: 'BUY',
            size: 10,
            referencePrice: 0.55,
          },
        ],
      });
    });

    it('should size opens independently of the target trade size', () => {
      for (const targetSize of [1, 100, 25000]) {
        const decision = reconciler.decide(tradeEvent({ size: targetSize }), snapshot(null));
        expect(decision.type).toBe('ACTIONS');
        if (decision.type === 'ACTIONS') {
          expect(decision.actions.map((action) => action.size)).toEqual([10]);
        }
      }
    });

    it('should treat a zero-size entry as no position', () => {
      const decision = reconciler.decide(tradeEvent(), snapshot(position({ size: 0, side: null, status: 'NONE' })));
      expect(decision.type === 'ACTIONS' && decision.actions[0]?.kind).toBe('OPEN');
    });

    it('should increase by the fixed increment on a same-side open', () => {
      const decision = reconciler.decide(tradeEvent(), snapshot(position()));

      expect(decision.type).toBe('ACTIONS');
      if (decision.type === 'ACTIONS') {
        expect(decision.actions).toHaveLength(1);
        expect(decision.actions[0]).toMatchObject({ kind: 'INCREASE', side: 'BUY', size: 5 });
      }
    });

    it('should ignore scale-ins under the IGNORE policy', () => {
      const ignoring = new Reconciler({ copySize: 10, scaleInPolicy: 'IGNORE', increaseSize: 10 });
      expect(ignoring.decide(tradeEvent(), snapshot(position()))).toEqual({
        type: 'NOOP',
        reason: 'scale_in_ignored',
      });
    });

    it('should close the opposite side before opening the new one', () => {
      const decision = reconciler.decide(tradeEvent({ side: 'SELL', eventId: 'evt-rev' }), snapshot(position({ size: 7 })));

      expect(decision.type).toBe('ACTIONS');
      if (decision.type === 'ACTIONS') {
        expect(decision.actions).toEqual([
          {
            kind: 'CLOSE',
            eventId: 'evt-rev',
            idempotenceKey: 'evt-rev:close',
            marketId: 'market-a',
            side: 'BUY',
            size: 7,
            referencePrice: 0.55,
          },
          {
            kind: 'OPEN',
            eventId: 'evt-rev',
            idempotenceKey: 'evt-rev',
            marketId: 'market-a',
            side: 'SELL',
            size: 10,
            referencePrice: 0.55,
          },
        ]);
      }
    });

    it('should not act while a close is in flight', () => {
      expect(reconciler.decide(tradeEvent(), snapshot(position({ status: 'CLOSING' })))).toEqual({
        type: 'NOOP',
        reason: 'close_in_flight',
      });
    });
  });

  describe('CLOSE events', () => {
    it('should close the full remaining size', () => {
      const decision = reconciler.decide(tradeEvent({ action: 'CLOSE', size: 3 }), snapshot(position({ size: 7.5 })));

      expect(decision.type).toBe('ACTIONS');
      if (decision.type === 'ACTIONS') {
        expect(decision.actions).toHaveLength(1);
        expect(decision.actions[0]).toMatchObject({ kind: 'CLOSE', side: 'BUY', size: 7.5 });
      }
    });

    it('should return NoOp without a position', () => {
      expect(reconciler.decide(tradeEvent({ action: 'CLOSE' }), snapshot(null))).toEqual({
        type: 'NOOP',
        reason: 'no_position',
      });
    });

    it('should return NoOp while already closing', () => {
      expect(reconciler.decide(tradeEvent({ action: 'CLOSE' }), snapshot(position({ status: 'CLOSING' })))).toEqual({
        type: 'NOOP',
        reason: 'close_in_flight',
      });
    });

    it('should return NoOp when the close is for the other side', () => {
      expect(reconciler.decide(tradeEvent({ action: 'CLOSE', side: 'SELL' }), snapshot(position()))).toEqual({
        type: 'NOOP',
        reason: 'side_mismatch',
      });
    });
  });

  it('should build reversal close keys from the event id', () => {
    expect(closeLegKey('0xabc:1:BUY')).toBe('0xabc:1:BUY:close');
  });

  it('should reject non-positive sizes', () => {
    expect(() => new Reconciler({ copySize: 0, scaleInPolicy: 'FIXED', increaseSize: 1 })).toThrow(
      'Copy and increase sizes must be positive'
    );
  });
});
