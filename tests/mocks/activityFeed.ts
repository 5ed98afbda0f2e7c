/**
 * In-process stand-in for the data API /activity endpoint
 */

import axios, { type AxiosInstance } from 'axios';
import type { RawActivity } from '../fixtures/activity.js';

export class FakeActivityFeed {
  readonly requests: Array<Record<string, unknown>> = [];
  readonly client: AxiosInstance;

  private records: RawActivity[] = [];
  private failures: Error[] = [];

  constructor() {
    this.client = axios.create({
      adapter: async (config) => {
        const params: Record<string, unknown> = { ...config.params };
        this.requests.push(params);

        const failure = this.failures.shift();
        if (failure) {
          throw failure;
        }

        const start = params['start'] === undefined ? null : Number(params['start']);
        const offset = Number(params['offset'] ?? 0);
        const limit = Number(params['limit'] ?? 100);
        // Newest first unless asked otherwise, like the real endpoint
        const direction = params['sortDirection'] === 'ASC' ? 1 : -1;
        const page = this.records
          .filter((record) => start === null || record.timestamp >= start)
          .sort((a, b) => direction * (a.timestamp - b.timestamp))
          .slice(offset, offset + limit);

        return { data: page, status: 200, statusText: 'OK', headers: {}, config };
      },
    });
  }

  publish(...records: RawActivity[]): void {
    this.records.push(...records);
  }

  failNext(error: Error): void {
    this.failures.push(error);
  }
}
