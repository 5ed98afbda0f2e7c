import { v4 as uuidv4 } from 'uuid';
import {
  ACTION_KINDS,
  APPLIED_ACTIONS,
  EXCHANGE_ORDER_STATUSES,
  FINANCIAL,
  PENDING_ORDER_STATUSES,
  TRADE_SIDES,
  type OrderType,
  type TradeSide,
} from '../../config/constants.js';
import type { ExchangeGateway } from '../../clients/shared/interfaces.js';
import type { StateStore } from '../../database/StateStore.js';
import {
  classifyError,
  DuplicateEventError,
  ErrorCategory,
  errorMessage,
  InconsistencyError,
} from '../../utils/errors.js';
import { abbreviate, logger, type Logger } from '../../utils/logger.js';
import { ordersSubmitted, recordOutcome, startTimer } from '../../utils/metrics.js';
import { calculateDelay, sleep } from '../../utils/retry.js';
import type { PositionLedger } from './PositionLedger.js';
import type { CopyAction, ExecutionOutcome, PendingOrder } from './types.js';

/**
 * Order executor configuration
 */
export interface OrderExecutorConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  fillTimeoutMs: number;
  fillPollIntervalMs: number;
  orderType: OrderType;
}

export interface OrderExecutorDeps {
  exchange: ExchangeGateway;
  ledger: PositionLedger;
  store: StateStore;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface RecoverySummary {
  recovered: number;
  dropped: number;
  failed: number;
}

function opposite(side: TradeSide): TradeSide {
  return side === TRADE_SIDES.BUY ? TRADE_SIDES.SELL : TRADE_SIDES.BUY;
}

function roundSize(value: number): number {
  return Number(value.toFixed(6));
}

/**
 * Order Executor
 * Turns one CopyAction into exchange orders and commits whatever the exchange confirmed
 */
export class OrderExecutor {
  private log: Logger;
  private config: OrderExecutorConfig;
  private exchange: ExchangeGateway;
  private ledger: PositionLedger;
  private store: StateStore;
  private now: () => Date;
  private sleep: (ms: number) => Promise<void>;

  constructor(config: OrderExecutorConfig, deps: OrderExecutorDeps) {
    this.log = logger('OrderExecutor');
    this.config = config;
    this.exchange = deps.exchange;
    this.ledger = deps.ledger;
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Execute an action with bounded retries and commit the confirmed fill.
   * Rejections return FAILED straight away; transient errors consume an attempt.
   */
  async execute(action: CopyAction): Promise<ExecutionOutcome> {
    const elapsed = startTimer();
    const isClose = action.kind === ACTION_KINDS.CLOSE;
    const orderSide = isClose ? opposite(action.side) : action.side;
    let size = action.size;

    if (await this.store.isProcessed(action.idempotenceKey)) {
      // Submitting again would trade a leg whose marker can no longer be written
      this.log.warn('Leg already committed, nothing submitted', {
        eventId: action.eventId,
        marketId: abbreviate(action.marketId),
        action: action.kind,
        idempotenceKey: action.idempotenceKey,
      });
      return { status: 'FAILED', reason: 'leg already committed' };
    }

    if (isClose) {
      const held = await this.exchange.getPositionSize(action.marketId);

      if (held !== null && held <= FINANCIAL.SIZE_EPSILON) {
        await this.ledger.correct(action.marketId, 0, 'exchange holds no position to close', {
          idempotenceKey: action.idempotenceKey,
          appliedAction: APPLIED_ACTIONS.RECONCILED,
        });
        const outcome: ExecutionOutcome = { status: 'RECONCILED', reason: 'exchange holds no position to close' };
        recordOutcome(action.kind, outcome.status, 0, elapsed());
        return outcome;
      }

      if (held !== null && held < size - FINANCIAL.SIZE_EPSILON) {
        await this.ledger.correct(action.marketId, held, 'exchange holds less than the ledger');
        size = roundSize(held);
      }

      await this.ledger.markClosing(action.marketId);
    }

    const createdAt = this.now();
    const pending: PendingOrder = {
      id: uuidv4(),
      eventId: action.eventId,
      legKey: action.idempotenceKey,
      marketId: action.marketId,
      actionKind: action.kind,
      intendedSide: action.side,
      orderSide,
      intendedSize: size,
      attemptCount: 0,
      exchangeOrderId: null,
      filledSize: 0,
      filledNotional: 0,
      status: PENDING_ORDER_STATUSES.SUBMITTING,
      createdAt,
      updatedAt: createdAt,
    };

    try {
      await this.store.savePendingOrder(pending);
      const lastError = await this.fill(pending, action);
      const outcome = await this.commitFill(pending, lastError);
      recordOutcome(action.kind, outcome.status, 'size' in outcome ? outcome.size : 0, elapsed());
      return outcome;
    } finally {
      if (isClose) {
        await this.ledger.restoreOpen(action.marketId);
      }
    }
  }

  /**
   * Roll forward executions that never committed: interrupted by a restart, or whose commit failed.
   * Must run after the ledger is loaded and while no execution is in flight.
   */
  async recover(): Promise<RecoverySummary> {
    const summary: RecoverySummary = { recovered: 0, dropped: 0, failed: 0 };
    const orders = await this.store.listPendingOrders();

    for (const pending of orders) {
      try {
        if (await this.store.isProcessed(pending.legKey)) {
          await this.store.deletePendingOrder(pending.id);
          summary.dropped++;
          continue;
        }

        if (
          !pending.exchangeOrderId &&
          pending.filledSize <= FINANCIAL.SIZE_EPSILON &&
          pending.status !== PENDING_ORDER_STATUSES.FAILED
        ) {
          // Never reached the exchange; the event is redelivered because the cursor was not saved
          await this.store.deletePendingOrder(pending.id);
          summary.dropped++;
          this.log.info('Dropped unsubmitted order', {
            eventId: pending.eventId,
            marketId: abbreviate(pending.marketId),
            action: pending.actionKind,
          });
          continue;
        }

        await this.settle(pending);
        const outcome = await this.commit(pending, 'interrupted before commit');
        summary.recovered++;
        this.log.info('Recovered uncommitted order', {
          eventId: pending.eventId,
          marketId: abbreviate(pending.marketId),
          action: pending.actionKind,
          status: outcome.status,
        });
      } catch (error) {
        if (error instanceof DuplicateEventError) {
          await this.store.deletePendingOrder(pending.id);
          summary.dropped++;
          continue;
        }
        summary.failed++;
        this.log.error('Could not recover pending order', {
          eventId: pending.eventId,
          marketId: abbreviate(pending.marketId),
          action: pending.actionKind,
          reason: errorMessage(error),
        });
      }
    }

    if (orders.length > 0) {
      this.log.info('Recovery complete', { ...summary });
    }
    return summary;
  }

  /**
   * Submit orders until the intended size is filled or attempts run out.
   * Resolves with the last error seen, if any.
   */
  private async fill(pending: PendingOrder, action: CopyAction): Promise<string | null> {
    let lastError: string | null = null;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (attempt > 1) {
        await this.sleep(
          calculateDelay(attempt - 2, {
            initialDelayMs: this.config.initialDelayMs,
            maxDelayMs: this.config.maxDelayMs,
            multiplier: this.config.backoffMultiplier,
            jitter: 0.1,
          })
        );
      }

      try {
        // An order from a failed attempt may still hold fills
        await this.settle(pending, action.referencePrice);
        const residual = roundSize(pending.intendedSize - pending.filledSize);
        if (residual <= FINANCIAL.SIZE_EPSILON) break;

        pending.attemptCount = attempt;
        const orderId = await this.exchange.submitOrder({
          marketId: pending.marketId,
          side: pending.orderSide,
          size: residual,
          orderType: this.config.orderType,
          referencePrice: action.referencePrice,
        });
        ordersSubmitted.labels(pending.actionKind, pending.orderSide).inc();

        pending.exchangeOrderId = orderId;
        pending.updatedAt = this.now();
        await this.store.savePendingOrder(pending);

        await this.awaitFill(orderId);
        await this.settle(pending, action.referencePrice);
      } catch (error) {
        lastError = errorMessage(error);
        const category = classifyError(error);
        this.log.warn('Order attempt failed', {
          eventId: pending.eventId,
          marketId: abbreviate(pending.marketId),
          action: pending.actionKind,
          attempt,
          category,
          reason: lastError,
        });
        if (category !== ErrorCategory.TRANSIENT) break;
      }

      if (pending.intendedSize - pending.filledSize <= FINANCIAL.SIZE_EPSILON) break;
    }

    // Whatever is still resting must be accounted for before committing
    await this.settle(pending, action.referencePrice);
    return lastError;
  }

  /**
   * Poll until the order leaves the book or the fill timeout passes
   */
  private async awaitFill(orderId: string): Promise<void> {
    const polls = Math.max(1, Math.ceil(this.config.fillTimeoutMs / this.config.fillPollIntervalMs));
    let report = await this.exchange.getOrderStatus(orderId);

    for (let i = 0; i < polls && report.status === EXCHANGE_ORDER_STATUSES.OPEN; i++) {
      await this.sleep(this.config.fillPollIntervalMs);
      report = await this.exchange.getOrderStatus(orderId);
    }
  }

  /**
   * Cancel the outstanding order if it is still live and fold its matched size into the totals
   */
  private async settle(pending: PendingOrder, fallbackPrice?: number): Promise<void> {
    const orderId = pending.exchangeOrderId;
    if (!orderId) return;

    let report = await this.exchange.getOrderStatus(orderId);
    if (report.status === EXCHANGE_ORDER_STATUSES.OPEN) {
      await this.exchange.cancelOrder(orderId);
      report = await this.exchange.getOrderStatus(orderId);
      if (report.status === EXCHANGE_ORDER_STATUSES.OPEN) {
        this.log.warn('Order still live after cancel', { orderId: abbreviate(orderId) });
      }
    }

    if (report.filledSize > FINANCIAL.SIZE_EPSILON) {
      const price =
        report.avgPrice > 0
          ? report.avgPrice
          : (fallbackPrice ?? (pending.filledSize > 0 ? pending.filledNotional / pending.filledSize : 0));
      pending.filledSize = roundSize(pending.filledSize + report.filledSize);
      pending.filledNotional += report.filledSize * price;
      pending.status = PENDING_ORDER_STATUSES.PARTIALLY_FILLED;
    }

    pending.exchangeOrderId = null;
    pending.updatedAt = this.now();
    await this.store.savePendingOrder(pending);
  }

  /**
   * Commit a fresh execution. A fill that traded under a key committed elsewhere leaves the
   * exchange holding shares the ledger will never see.
   */
  private async commitFill(pending: PendingOrder, lastError: string | null): Promise<ExecutionOutcome> {
    try {
      return await this.commit(pending, lastError);
    } catch (error) {
      if (error instanceof DuplicateEventError && pending.filledSize > FINANCIAL.SIZE_EPSILON) {
        throw new InconsistencyError('Fill traded for a leg committed elsewhere', {
          context: {
            idempotenceKey: pending.legKey,
            marketId: pending.marketId,
            side: pending.orderSide,
            filledSize: pending.filledSize,
          },
          cause: error,
        });
      }
      throw error;
    }
  }

  /**
   * Turn the accumulated fill into an outcome and commit it with its marker
   */
  private async commit(pending: PendingOrder, lastError: string | null): Promise<ExecutionOutcome> {
    const filled = roundSize(pending.filledSize);
    const context = {
      eventId: pending.eventId,
      marketId: abbreviate(pending.marketId),
      action: pending.actionKind,
    };

    if (filled <= FINANCIAL.SIZE_EPSILON) {
      const reason = lastError ?? 'no fill before attempts ran out';
      pending.status = PENDING_ORDER_STATUSES.FAILED;
      await this.store.savePendingOrder(pending);
      await this.ledger.markProcessed({
        idempotenceKey: pending.legKey,
        appliedAction: APPLIED_ACTIONS.FAILED,
        pendingOrderId: pending.id,
      });
      this.log.error('Copy action failed', { ...context, reason, attempts: pending.attemptCount });
      return { status: 'FAILED', reason };
    }

    const avgPrice = pending.filledNotional / pending.filledSize;
    const complete = pending.intendedSize - filled <= FINANCIAL.SIZE_EPSILON;
    pending.status = complete ? PENDING_ORDER_STATUSES.FILLED : PENDING_ORDER_STATUSES.PARTIALLY_FILLED;
    await this.store.savePendingOrder(pending);
    await this.ledger.applyConfirmedFill(pending.marketId, pending.orderSide, filled, avgPrice, {
      idempotenceKey: pending.legKey,
      appliedAction: pending.actionKind,
      pendingOrderId: pending.id,
    });

    if (complete) {
      return { status: 'FILLED', size: filled, avgPrice };
    }

    this.log.warn('Copy action partially filled', {
      ...context,
      filled,
      requested: pending.intendedSize,
      reason: lastError ?? 'attempts exhausted',
    });
    return { status: 'PARTIAL', size: filled, avgPrice, requestedSize: pending.intendedSize };
  }
}
