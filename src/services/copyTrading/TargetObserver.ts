/**
 * Target Observer
 *
 * Polls the Polymarket data API for the target account's trades and turns them
 * into an ordered, restartable sequence of TradeEvents.
 *
 * Flow:
 * 1. Pages through /activity?user={address}&type=TRADE oldest first, starting at the cursor
 * 2. Validates and normalizes each record, dropping malformed ones
 * 3. Keeps events strictly after the cursor, coalesces same-cycle duplicates
 * 4. Returns them oldest first with the cursor of the last one
 *
 * The observer does not consult processed markers; redelivery is expected and
 * handled by the idempotence gate downstream.
 */

import axios, { type AxiosInstance } from 'axios';
import { TRADE_ACTIONS, TRADE_SIDES } from '../../config/constants.js';
import { ActivityRecordSchema, type ActivityRecord } from '../../clients/polymarket/types.js';
import { abbreviate, logger } from '../../utils/logger.js';
import { eventsObserved } from '../../utils/metrics.js';
import type { FeedCursor, TradeEvent } from './types.js';

const log = logger('TargetObserver');

type SortDirection = 'ASC' | 'DESC';

/**
 * Target observer configuration
 */
export interface TargetObserverConfig {
  targetAddress: string;
  dataApiUrl: string;
  pageSize: number;
  maxPages: number;
  requestTimeoutMs: number;
}

export interface PollResult {
  events: TradeEvent[];
  nextCursor: FeedCursor | null;
}

/**
 * Order two feed positions by (observedAt, eventId)
 */
export function compareCursor(a: FeedCursor, b: FeedCursor): number {
  if (a.observedAt !== b.observedAt) {
    return a.observedAt - b.observedAt;
  }
  return a.eventId < b.eventId ? -1 : a.eventId > b.eventId ? 1 : 0;
}

export function cursorOf(event: TradeEvent): FeedCursor {
  return { observedAt: event.observedAt, eventId: event.eventId };
}

/**
 * Convert a validated activity record into a TradeEvent.
 * The copier only ever holds outcome tokens long, so a target buy opens and a target sell closes.
 */
export function activityToTradeEvent(record: ActivityRecord): TradeEvent {
  return {
    eventId: `${record.transactionHash}:${record.asset}:${record.side}`,
    marketId: record.asset,
    side: TRADE_SIDES.BUY,
    action: record.side === 'BUY' ? TRADE_ACTIONS.OPEN : TRADE_ACTIONS.CLOSE,
    size: record.size,
    price: record.price,
    observedAt: Math.floor(record.timestamp),
    conditionId: record.conditionId,
    outcome: record.outcome,
    title: record.title,
    transactionHash: record.transactionHash,
  };
}

/**
 * Target Observer service
 */
export class TargetObserver {
  private config: TargetObserverConfig;
  private httpClient: AxiosInstance;

  constructor(config: TargetObserverConfig, httpClient?: AxiosInstance) {
    this.config = { ...config, targetAddress: config.targetAddress.toLowerCase() };

    this.httpClient =
      httpClient ??
      axios.create({
        baseURL: this.config.dataApiUrl,
        timeout: this.config.requestTimeoutMs,
      });
  }

  /**
   * Key the cursor is stored under
   */
  get feedKey(): string {
    return `activity:${this.config.targetAddress}`;
  }

  /**
   * Fetch events strictly after `since`, oldest first.
   * A backlog larger than the page window is drained over several polls.
   * Transport errors propagate; the caller keeps its cursor.
   */
  async poll(since: FeedCursor | null): Promise<PollResult> {
    const collected = new Map<string, TradeEvent>();
    let exhausted = false;

    for (let page = 0; page < this.config.maxPages; page++) {
      const records = await this.fetchPage(page * this.config.pageSize, 'ASC', since?.observedAt);

      for (const event of this.normalize(records)) {
        // Overlapping pages may repeat a record; first one wins
        if (!collected.has(event.eventId)) {
          collected.set(event.eventId, event);
        }
      }

      if (records.length < this.config.pageSize) {
        exhausted = true;
        break;
      }
    }

    let events = [...collected.values()]
      .filter((event) => since === null || compareCursor(cursorOf(event), since) > 0)
      .sort((a, b) => compareCursor(cursorOf(a), cursorOf(b)));

    if (!exhausted) {
      events = this.trimToWindow(events);
    }

    for (const event of events) {
      eventsObserved.labels(event.action).inc();
    }

    const last = events[events.length - 1];
    const nextCursor = last ? cursorOf(last) : since;

    if (events.length > 0) {
      log.info('New target trades', {
        target: abbreviate(this.config.targetAddress),
        count: events.length,
        through: nextCursor?.observedAt,
      });
    }

    return { events, nextCursor };
  }

  /**
   * The window may end partway through the trades of its newest second. Those are held back
   * so the cursor stays below them and the next poll fetches the whole second.
   */
  private trimToWindow(events: TradeEvent[]): TradeEvent[] {
    const newest = events[events.length - 1];
    if (!newest) return events;

    const complete = events.filter((event) => event.observedAt < newest.observedAt);
    if (complete.length === 0) {
      const windowSize = this.config.maxPages * this.config.pageSize;
      if (events.length >= windowSize) {
        log.warn('Feed window holds a single second of trades; some of them may be skipped', {
          target: abbreviate(this.config.targetAddress),
          observedAt: newest.observedAt,
          windowSize,
        });
      }
      return events;
    }

    log.info('Feed window full, remaining trades follow on the next poll', {
      target: abbreviate(this.config.targetAddress),
      through: complete[complete.length - 1]?.observedAt,
      heldBack: events.length - complete.length,
    });
    return complete;
  }

  /**
   * Cursor at the newest existing trade, so history is not copied on a first start.
   * An empty feed yields a cursor at the current time.
   */
  async bootstrap(): Promise<FeedCursor> {
    const records = await this.fetchPage(0, 'DESC');
    const newest = this.normalize(records).reduce<TradeEvent | null>(
      (latest, event) => (latest === null || compareCursor(cursorOf(event), cursorOf(latest)) > 0 ? event : latest),
      null
    );

    const cursor = newest ? cursorOf(newest) : { observedAt: Math.floor(Date.now() / 1000), eventId: '' };

    log.info('Skipping target history', {
      target: abbreviate(this.config.targetAddress),
      historicalTrades: records.length,
      from: cursor.observedAt,
    });
    return cursor;
  }

  /**
   * Fetch one page of target activity
   */
  private async fetchPage(offset: number, direction: SortDirection, start?: number): Promise<unknown[]> {
    try {
      const response = await this.httpClient.get<unknown>('/activity', {
        params: {
          user: this.config.targetAddress,
          type: 'TRADE',
          limit: this.config.pageSize,
          offset,
          sortBy: 'TIMESTAMP',
          sortDirection: direction,
          ...(start !== undefined ? { start } : {}),
        },
      });

      return Array.isArray(response.data) ? response.data : [];
    } catch (error) {
      if (axios.isAxiosError(error)) {
        log.error('Failed to fetch target activity', {
          target: abbreviate(this.config.targetAddress),
          status: error.response?.status,
          message: error.message,
        });
      }
      throw error;
    }
  }

  private normalize(records: unknown[]): TradeEvent[] {
    const events: TradeEvent[] = [];

    for (const record of records) {
      const parsed = ActivityRecordSchema.safeParse(record);
      if (!parsed.success) {
        log.warn('Dropping malformed activity record', {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        continue;
      }

      // Redeems, splits and merges are not trades
      if (parsed.data.type !== 'TRADE') {
        continue;
      }

      events.push(activityToTradeEvent(parsed.data));
    }

    return events;
  }
}
