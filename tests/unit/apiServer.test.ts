import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import { createApiServer, startApiServer } from '../../src/api/server.js';
import type { HealthCheckDependencies } from '../../src/api/routes/health.js';
import { CopyTradingDriver } from '../../src/services/copyTrading/CopyTradingDriver.js';
import { OrderExecutor } from '../../src/services/copyTrading/OrderExecutor.js';
import { PositionLedger } from '../../src/services/copyTrading/PositionLedger.js';
import { Reconciler } from '../../src/services/copyTrading/Reconciler.js';
import { TargetObserver } from '../../src/services/copyTrading/TargetObserver.js';
import { TARGET } from '../fixtures/activity.js';
import { FakeActivityFeed } from '../mocks/activityFeed.js';
import { ScriptedExchange } from '../mocks/exchange.js';
import { InMemoryStateStore } from '../mocks/stateStore.js';

describe('API server', () => {
  let driver: CopyTradingDriver;
  let ledger: PositionLedger;
  let server: Server | null;

  beforeEach(() => {
    const store = new InMemoryStateStore();
    const exchange = new ScriptedExchange();
    ledger = new PositionLedger(store);
    const executor = new OrderExecutor(
      {
        maxAttempts: 1,
        initialDelayMs: 1,
        maxDelayMs: 1,
        backoffMultiplier: 2,
        fillTimeoutMs: 1,
        fillPollIntervalMs: 1,
        orderType: 'GTC',
      },
      { exchange, ledger, store, sleep: async () => undefined }
    );
    const observer = new TargetObserver(
      { targetAddress: TARGET, dataApiUrl: 'http://data-api.test', pageSize: 50, maxPages: 1, requestTimeoutMs: 1000 },
      new FakeActivityFeed().client
    );
    driver = new CopyTradingDriver(
      { pollIntervalMs: 60_000, maxConcurrentMarkets: 1, skipHistoryOnStart: false },
      { observer, reconciler: new Reconciler({ copySize: 10, scaleInPolicy: 'FIXED', increaseSize: 10 }), ledger, executor, store }
    );
    server = null;
  });

  afterEach(async () => {
    await driver.stop();
    const running = server;
    if (running) {
      await new Promise<void>((resolve, reject) => running.close((error) => (error ? reject(error) : resolve())));
    }
  });

  async function serve(deps: Omit<HealthCheckDependencies, 'driver'> = {}): Promise<string> {
    const listening = createApiServer({ driver, ...deps }).listen(0);
    server = listening;
    await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
    const address = listening.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    return `http://127.0.0.1:${port}`;
  }

  it('should report a stopped driver as unhealthy', async () => {
    const base = await serve();

    const response = await fetch(`${base}/health`);

    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      status: 'unhealthy',
      components: { driver: { status: 'stopped', state: 'IDLE', lastCycleAt: null } },
    });
  });

  it('should report a running driver with its last cycle', async () => {
    await driver.start();
    await driver.runCycle();
    const base = await serve({ ledger, exchange: 'paper', checkDatabase: async () => true });

    const response = await fetch(`${base}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'healthy',
      components: {
        driver: { status: 'running', lastCycleObserved: 0, lastCycleFailed: 0 },
        ledger: { openPositions: 0 },
        exchange: { name: 'paper' },
        database: { status: 'connected', connected: true },
      },
    });
  });

  it('should degrade when the database is unreachable', async () => {
    await driver.start();
    const base = await serve({ checkDatabase: async () => false });

    const response = await fetch(`${base}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'degraded', components: { database: { connected: false } } });
  });

  describe('startApiServer', () => {
    it('should reject when the port is already bound', async () => {
      const first = await startApiServer(createApiServer({ driver }), 0);
      server = first;
      const address = first.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;

      await expect(startApiServer(createApiServer({ driver }), port)).rejects.toMatchObject({ code: 'EADDRINUSE' });
    });

    it('should keep serving after a server error', async () => {
      const running = await startApiServer(createApiServer({ driver }), 0);
      server = running;

      expect(() => running.emit('error', new Error('socket failure'))).not.toThrow();
      expect(running.listening).toBe(true);
    });
  });

  it('should expose prometheus metrics', async () => {
    const base = await serve();

    const response = await fetch(`${base}/metrics`);

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('copy_cycle_duration_ms');
  });
});
