/**
 * Reconciler
 *
 * Decides which local action a target trade implies for the copier's own position.
 * Pure: reads an immutable ledger snapshot and returns a Decision, nothing else.
 *
 * | event   | copy position          | decision                                  |
 * |---------|------------------------|-------------------------------------------|
 * | any     | event already processed| NoOp                                      |
 * | OPEN    | none                   | OPEN copySize                             |
 * | OPEN    | open, same side        | INCREASE per scale-in policy              |
 * | OPEN    | open, opposite side    | CLOSE existing, then OPEN copySize        |
 * | OPEN    | closing                | NoOp                                      |
 * | CLOSE   | open, same side        | CLOSE full size                           |
 * | CLOSE   | anything else          | NoOp                                      |
 */

import {
  ACTION_KINDS,
  POSITION_STATUSES,
  SCALE_IN_POLICIES,
  TRADE_ACTIONS,
  type ScaleInPolicy,
} from '../../config/constants.js';
import type { CopyAction, Decision, LedgerSnapshot, NoOpReason, TradeEvent } from './types.js';

/**
 * Sizing configuration, fixed for the process lifetime
 */
export interface ReconcilerConfig {
  // Shares per OPEN, independent of the target's size
  copySize: number;
  scaleInPolicy: ScaleInPolicy;
  // Shares per INCREASE under the FIXED policy
  increaseSize: number;
}

/**
 * Idempotence key of the CLOSE leg of a reversal
 */
export function closeLegKey(eventId: string): string {
  return `${eventId}:close`;
}

function noop(reason: NoOpReason): Decision {
  return { type: 'NOOP', reason };
}

export class Reconciler {
  private readonly config: Readonly<ReconcilerConfig>;

  constructor(config: ReconcilerConfig) {
    if (!(config.copySize > 0) || !(config.increaseSize > 0)) {
      throw new Error('Copy and increase sizes must be positive');
    }
    this.config = Object.freeze({ ...config });
  }

  decide(event: TradeEvent, snapshot: LedgerSnapshot): Decision {
    if (snapshot.processed) {
      return noop('already_processed');
    }

    const position = snapshot.position;
    const held =
      position !== null && position.side !== null && position.size > 0 ? { ...position, side: position.side } : null;

    if (event.action === TRADE_ACTIONS.CLOSE) {
      if (held === null) return noop('no_position');
      if (held.status === POSITION_STATUSES.CLOSING) return noop('close_in_flight');
      if (held.side !== event.side) return noop('side_mismatch');

      return {
        type: 'ACTIONS',
        actions: [this.action(ACTION_KINDS.CLOSE, event, event.eventId, held.size)],
      };
    }

    if (held === null) {
      return {
        type: 'ACTIONS',
        actions: [this.action(ACTION_KINDS.OPEN, event, event.eventId, this.config.copySize)],
      };
    }

    if (held.status === POSITION_STATUSES.CLOSING) {
      return noop('close_in_flight');
    }

    if (held.side === event.side) {
      if (this.config.scaleInPolicy === SCALE_IN_POLICIES.IGNORE) {
        return noop('scale_in_ignored');
      }
      return {
        type: 'ACTIONS',
        actions: [this.action(ACTION_KINDS.INCREASE, event, event.eventId, this.config.increaseSize)],
      };
    }

    // Reversal: the close must confirm before the new side is opened
    return {
      type: 'ACTIONS',
      actions: [
        { ...this.action(ACTION_KINDS.CLOSE, event, closeLegKey(event.eventId), held.size), side: held.side },
        this.action(ACTION_KINDS.OPEN, event, event.eventId, this.config.copySize),
      ],
    };
  }

  private action(kind: CopyAction['kind'], event: TradeEvent, idempotenceKey: string, size: number): CopyAction {
    return {
      kind,
      eventId: event.eventId,
      idempotenceKey,
      marketId: event.marketId,
      side: event.side,
      size,
      referencePrice: event.price,
    };
  }
}
