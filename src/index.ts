#!/usr/bin/env node
import type { Server } from 'http';
import { getConfig, isPaperTrading, validateCredentials, type Config } from './config/index.js';
import { logger } from './utils/logger.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { checkHealth, closeDb, getDb, initializeDb } from './database/index.js';
import { PostgresStateStore } from './database/PostgresStateStore.js';
import { PaperExchange } from './clients/paper/PaperExchange.js';
import type { ExchangeGateway } from './clients/shared/interfaces.js';
import {
  CopyTradingDriver,
  OrderExecutor,
  PositionLedger,
  Reconciler,
  TargetObserver,
} from './services/copyTrading/index.js';
import { createApiServer, startApiServer } from './api/server.js';

const log = logger('Main');

/**
 * Pick the paper or live exchange. Live trading authenticates before the loop starts.
 */
async function createExchange(config: Config, ledger: PositionLedger): Promise<ExchangeGateway> {
  if (isPaperTrading()) {
    const paper = new PaperExchange({
      initialBalance: config.trading.paperTradingBalance,
      maxSlippage: config.execution.maxSlippage,
    });
    // Positions from an earlier paper run still need something to sell against
    paper.seedHoldings(ledger.all());
    return paper;
  }

  const creds = validateCredentials();
  if (!creds.valid) {
    throw new ConfigurationError(`Live trading needs credentials, missing: ${creds.missing.join(', ')}`);
  }

  // Loaded on demand so paper runs never pull in the signing stack
  const { PolymarketExchange } = await import('./clients/polymarket/PolymarketExchange.js');
  const live = new PolymarketExchange(config.polymarket, { maxSlippage: config.execution.maxSlippage });
  await live.connect();
  return live;
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  log.info('Starting polymirror');

  // Load and validate configuration
  const config = getConfig();
  log.info('Configuration loaded', {
    env: config.env,
    paperTrading: isPaperTrading(),
    target: config.copyTrading.targetAddress,
    copySize: config.copyTrading.copySize,
    scaleInPolicy: config.copyTrading.scaleInPolicy,
    pollIntervalMs: config.copyTrading.pollIntervalMs,
  });

  // Initialize database
  await initializeDb();
  const store = new PostgresStateStore(getDb());

  const ledger = new PositionLedger(store);
  await ledger.load();

  const exchange = await createExchange(config, ledger);

  const executor = new OrderExecutor(
    {
      maxAttempts: config.execution.maxAttempts,
      initialDelayMs: config.execution.initialDelayMs,
      maxDelayMs: config.execution.maxDelayMs,
      backoffMultiplier: config.execution.backoffMultiplier,
      fillTimeoutMs: config.execution.fillTimeoutMs,
      fillPollIntervalMs: config.execution.fillPollIntervalMs,
      orderType: config.execution.orderType,
    },
    { exchange, ledger, store }
  );

  const observer = new TargetObserver({
    targetAddress: config.copyTrading.targetAddress,
    dataApiUrl: config.polymarket.dataApiUrl,
    pageSize: config.copyTrading.feedPageSize,
    maxPages: config.copyTrading.feedMaxPages,
    requestTimeoutMs: config.copyTrading.requestTimeoutMs,
  });

  const reconciler = new Reconciler({
    copySize: config.copyTrading.copySize,
    scaleInPolicy: config.copyTrading.scaleInPolicy,
    increaseSize: config.copyTrading.increaseSize,
  });

  const driver = new CopyTradingDriver(
    {
      pollIntervalMs: config.copyTrading.pollIntervalMs,
      maxConcurrentMarkets: config.copyTrading.maxConcurrentMarkets,
      skipHistoryOnStart: config.copyTrading.skipHistoryOnStart,
    },
    { observer, reconciler, ledger, executor, store }
  );

  // A port that cannot be bound fails startup before any order is placed
  let server: Server | null = null;
  if (config.api.enableMetrics) {
    const app = createApiServer({
      driver,
      ledger,
      exchange: exchange.name,
      checkDatabase: async () => (await checkHealth()).connected,
      staleAfterMs: config.copyTrading.pollIntervalMs * 5,
    });
    server = await startApiServer(app, config.api.metricsPort);
    log.info(`Health and metrics listening on port ${config.api.metricsPort}`);
  }

  await driver.start();

  // Graceful shutdown: no new cycles, in-flight executions persist first
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down...`);

    try {
      await driver.stop();
      server?.close();
      await closeDb();
      log.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      log.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  log.info(`Paper trading mode: ${isPaperTrading() ? 'ENABLED' : 'DISABLED - LIVE TRADING'}`);
  if (!isPaperTrading()) {
    log.warn('WARNING: Live trading is enabled. Real money is at risk!');
  }
}

// Run main
main().catch(async (error: unknown) => {
  if (error instanceof ConfigurationError) {
    log.error('Invalid configuration', { reason: error.message });
  } else {
    log.error('Fatal error', { reason: errorMessage(error) });
  }
  await closeDb().catch((closeError: unknown) => {
    log.warn('Database close failed', { reason: errorMessage(closeError) });
  });
  process.exit(1);
});
