/**
 * Copy Trading Driver
 *
 * Control loop tying the pieces together. Each cycle first commits pending orders left
 * uncommitted, then:
 * 1. POLLING - fetch target trades after the stored cursor
 * 2. RECONCILING - decide per event against the ledger
 * 3. EXECUTING - run the decided actions through the executor
 * 4. IDLE - persist the cursor and wait for the next tick
 *
 * Markets fan out to a bounded pool; events of one market run in order under a
 * per-market lock. A failing event is reported and never aborts the batch.
 */

import { EventEmitter } from 'events';
import { ACTION_KINDS, APPLIED_ACTIONS, DRIVER_STATES, type DriverState } from '../../config/constants.js';
import type { StateStore } from '../../database/StateStore.js';
import { KeyedMutex, runWithConcurrency } from '../../utils/concurrency.js';
import { classifyError, errorMessage } from '../../utils/errors.js';
import { abbreviate, logger } from '../../utils/logger.js';
import { cycleDuration, decisions, eventFailures, pollFailures, startTimer } from '../../utils/metrics.js';
import type { OrderExecutor } from './OrderExecutor.js';
import type { PositionLedger } from './PositionLedger.js';
import type { Reconciler } from './Reconciler.js';
import { compareCursor, type TargetObserver } from './TargetObserver.js';
import type { CycleSummary, EventResult, FeedCursor, TradeEvent } from './types.js';

const log = logger('CopyTradingDriver');

export interface DriverConfig {
  pollIntervalMs: number;
  maxConcurrentMarkets: number;
  skipHistoryOnStart: boolean;
}

export interface DriverDeps {
  observer: TargetObserver;
  reconciler: Reconciler;
  ledger: PositionLedger;
  executor: OrderExecutor;
  store: StateStore;
}

export interface DriverStatus {
  state: DriverState;
  isRunning: boolean;
  lastCycle: CycleSummary | null;
  lastError?: string;
  lastErrorAt?: Date;
}

export class CopyTradingDriver extends EventEmitter {
  private config: DriverConfig;
  private deps: DriverDeps;
  private locks = new KeyedMutex();

  // State
  private state: DriverState = DRIVER_STATES.IDLE;
  private isRunning: boolean = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleSummary | null> | null = null;
  private lastCycle: CycleSummary | null = null;
  private lastError?: string;
  private lastErrorAt?: Date;

  constructor(config: DriverConfig, deps: DriverDeps) {
    super();
    this.config = config;
    this.deps = deps;
  }

  /**
   * Recover interrupted executions, then poll every `pollIntervalMs`
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      log.warn('Driver already running');
      return;
    }

    await this.deps.executor.recover();

    this.isRunning = true;
    log.info('Copy trading started', {
      feed: this.deps.observer.feedKey,
      pollIntervalMs: this.config.pollIntervalMs,
      maxConcurrentMarkets: this.config.maxConcurrentMarkets,
    });
    this.emit('started');
    this.schedule(0);
  }

  /**
   * Stop scheduling cycles. Resolves once the cycle in flight, if any, has persisted its outcome.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.inFlight) {
      log.info('Waiting for in-flight cycle to finish');
      await this.inFlight;
    }

    log.info('Copy trading stopped');
    this.emit('stopped');
  }

  /**
   * Run one poll-reconcile-execute cycle. Overlapping calls share the cycle in flight.
   * Resolves null when pending orders could not be rolled forward or the poll failed.
   */
  runCycle(): Promise<CycleSummary | null> {
    if (!this.inFlight) {
      this.inFlight = this.cycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  getStatus(): DriverStatus {
    return {
      state: this.state,
      isRunning: this.isRunning,
      lastCycle: this.lastCycle,
      lastError: this.lastError,
      lastErrorAt: this.lastErrorAt,
    };
  }

  // ============================================
  // Cycle
  // ============================================

  private schedule(delayMs: number): void {
    if (!this.isRunning) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.runCycle();
    } catch (error) {
      this.recordError(error);
      log.error('Cycle aborted', { reason: errorMessage(error) });
    }
    this.schedule(this.config.pollIntervalMs);
  }

  private async cycle(): Promise<CycleSummary | null> {
    const startedAt = new Date();
    const elapsed = startTimer();
    const { observer, store, executor } = this.deps;

    try {
      // A fill whose commit failed last cycle is committed before anything new is decided
      try {
        await executor.recover();
      } catch (error) {
        this.recordError(error);
        log.error('Could not roll pending orders forward, cycle skipped', { reason: errorMessage(error) });
        return null;
      }

      this.setState(DRIVER_STATES.POLLING);

      let cursor: FeedCursor | null = null;
      let events: TradeEvent[] = [];
      let nextCursor: FeedCursor | null = null;
      try {
        cursor = await store.getCursor(observer.feedKey);

        if (cursor === null && this.config.skipHistoryOnStart) {
          const start = await observer.bootstrap();
          await store.saveCursor(observer.feedKey, start);
          return this.complete({ startedAt, durationMs: elapsed(), observed: 0, processed: 0, failed: 0, cursor: start });
        }

        ({ events, nextCursor } = await observer.poll(cursor));
      } catch (error) {
        pollFailures.inc();
        this.recordError(error);
        log.warn('Poll failed, cursor kept', { reason: errorMessage(error), category: classifyError(error) });
        this.emit('pollFailed', error instanceof Error ? error : new Error(String(error)));
        return null;
      }

      this.setState(DRIVER_STATES.RECONCILING);

      const byMarket = new Map<string, TradeEvent[]>();
      for (const event of events) {
        const group = byMarket.get(event.marketId);
        if (group) {
          group.push(event);
        } else {
          byMarket.set(event.marketId, [event]);
        }
      }

      const settled = await runWithConcurrency([...byMarket.values()], this.config.maxConcurrentMarkets, (group) =>
        this.processMarket(group)
      );

      let processed = 0;
      let failed = 0;
      for (const result of settled) {
        if (result.status === 'fulfilled') {
          processed += result.value.processed;
          failed += result.value.failed;
        }
      }

      if (nextCursor && (cursor === null || compareCursor(nextCursor, cursor) > 0)) {
        await store.saveCursor(observer.feedKey, nextCursor);
      }

      return this.complete({
        startedAt,
        durationMs: elapsed(),
        observed: events.length,
        processed,
        failed,
        cursor: nextCursor,
      });
    } finally {
      this.setState(DRIVER_STATES.IDLE);
    }
  }

  private complete(summary: CycleSummary): CycleSummary {
    this.lastCycle = summary;
    cycleDuration.observe(summary.durationMs);

    if (summary.observed > 0) {
      log.info('Cycle complete', {
        observed: summary.observed,
        processed: summary.processed,
        failed: summary.failed,
        durationMs: Math.round(summary.durationMs),
      });
    }
    this.emit('cycleCompleted', summary);
    return summary;
  }

  /**
   * Events of one market, in feed order
   */
  private async processMarket(events: TradeEvent[]): Promise<{ processed: number; failed: number }> {
    let processed = 0;
    let failed = 0;

    for (const event of events) {
      const ok = await this.locks.runExclusive(event.marketId, () => this.processEvent(event));
      if (ok) {
        processed++;
      } else {
        failed++;
      }
    }
    return { processed, failed };
  }

  /**
   * Decide and execute one event. Resolves false when processing threw.
   */
  private async processEvent(event: TradeEvent): Promise<boolean> {
    const { ledger, reconciler, executor } = this.deps;
    let attempted = 'decide';

    try {
      const snapshot = await ledger.snapshotFor(event.eventId, event.marketId);
      const decision = reconciler.decide(event, snapshot);
      const result: EventResult = { event, decision, outcomes: [] };

      if (decision.type === 'NOOP') {
        decisions.labels(decision.reason).inc();
        if (decision.reason === 'already_processed') {
          log.debug('Event already processed', { eventId: event.eventId });
        } else {
          log.info('No action for target trade', {
            eventId: event.eventId,
            marketId: abbreviate(event.marketId),
            action: event.action,
            reason: decision.reason,
          });
        }
        this.emit('eventProcessed', result);
        return true;
      }

      decisions.labels(decision.actions.map((action) => action.kind).join('+')).inc();

      for (const [index, action] of decision.actions.entries()) {
        attempted = action.kind;
        this.setState(DRIVER_STATES.EXECUTING);

        const outcome = await executor.execute(action);
        result.outcomes.push({ action, outcome });

        const confirmed = outcome.status === 'FILLED' || outcome.status === 'RECONCILED';
        const remaining = decision.actions.length - index - 1;
        if (!confirmed && action.kind === ACTION_KINDS.CLOSE && remaining > 0) {
          // Opening the other side now would hold both sides at once
          await ledger.markProcessed({ idempotenceKey: event.eventId, appliedAction: APPLIED_ACTIONS.FAILED });
          log.error('Reversal close incomplete, new side not opened', {
            eventId: event.eventId,
            marketId: abbreviate(event.marketId),
            action: action.kind,
            reason: outcome.status === 'FAILED' ? outcome.reason : `closed ${outcome.status.toLowerCase()}`,
          });
          break;
        }
      }

      this.emit('eventProcessed', result);
      return true;
    } catch (error) {
      const category = classifyError(error);
      eventFailures.labels(category).inc();
      this.recordError(error);
      log.error('Failed to process target trade', {
        eventId: event.eventId,
        marketId: abbreviate(event.marketId),
        action: attempted,
        reason: errorMessage(error),
        category,
      });
      this.emit('eventFailed', event, error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  }

  private setState(state: DriverState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('stateChanged', state);
  }

  private recordError(error: unknown): void {
    this.lastError = errorMessage(error);
    this.lastErrorAt = new Date();
  }
}
