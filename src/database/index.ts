import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { getConfig } from '../config/index.js';
import { logger, type Logger } from '../utils/logger.js';
import * as schema from './schema/index.js';

// Re-export schema
export * from './schema/index.js';

let dbInstance: ReturnType<typeof createDb> | null = null;
let sqlClient: ReturnType<typeof postgres> | null = null;

const log: Logger = logger('Database');

// Kept in step with ./schema/copyTrading.ts; `db:push` applies the same layout through drizzle-kit
const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS copy_positions (
    market_id text PRIMARY KEY,
    side text,
    size numeric(24, 6) NOT NULL,
    avg_entry_price numeric(10, 6) NOT NULL,
    status text NOT NULL DEFAULT 'OPEN',
    updated_at timestamp NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS copy_positions_status_idx ON copy_positions (status);

  CREATE TABLE IF NOT EXISTS processed_events (
    event_id text PRIMARY KEY,
    applied_action text NOT NULL,
    applied_at timestamp NOT NULL DEFAULT now()
  );

  CREATE TABLE IF NOT EXISTS pending_orders (
    id text PRIMARY KEY,
    event_id text NOT NULL,
    leg_key text NOT NULL UNIQUE,
    market_id text NOT NULL,
    action_kind text NOT NULL,
    intended_side text NOT NULL,
    order_side text NOT NULL,
    intended_size numeric(24, 6) NOT NULL,
    attempt_count integer NOT NULL DEFAULT 0,
    exchange_order_id text,
    filled_size numeric(24, 6) NOT NULL DEFAULT '0',
    filled_notional numeric(24, 6) NOT NULL DEFAULT '0',
    status text NOT NULL,
    created_at timestamp NOT NULL DEFAULT now(),
    updated_at timestamp NOT NULL DEFAULT now()
  );
  CREATE INDEX IF NOT EXISTS pending_orders_market_idx ON pending_orders (market_id);
  CREATE INDEX IF NOT EXISTS pending_orders_status_idx ON pending_orders (status);

  CREATE TABLE IF NOT EXISTS feed_cursors (
    feed_key text PRIMARY KEY,
    observed_at bigint NOT NULL,
    event_id text NOT NULL,
    updated_at timestamp NOT NULL DEFAULT now()
  );
`;

function createDb(client: ReturnType<typeof postgres>, debug: boolean) {
  return drizzle(client, {
    schema,
    logger: debug,
  });
}

/**
 * Get database connection
 * Uses singleton pattern to reuse connections
 */
export function getDb() {
  if (!dbInstance) {
    const config = getConfig();

    log.info('Connecting to database', {
      url: config.database.url.replace(/:[^:@]+@/, ':****@'), // Hide password
    });

    // Create postgres client
    sqlClient = postgres(config.database.url, {
      max: config.database.poolSize,
      idle_timeout: 20,
      connect_timeout: 10,
      onnotice: () => undefined, // Suppress notices
    });

    // Create drizzle instance with schema
    dbInstance = createDb(sqlClient, config.logLevel === 'debug');

    log.info('Database connected');
  }

  return dbInstance;
}

/**
 * Close database connection
 */
export async function closeDb(): Promise<void> {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    dbInstance = null;
    log.info('Database connection closed');
  }
}

function getSqlClient(): ReturnType<typeof postgres> {
  if (!sqlClient) {
    getDb(); // Initialize connection
  }

  if (!sqlClient) {
    throw new Error('Database not connected');
  }

  return sqlClient;
}

/**
 * Check database connection health
 */
export async function checkHealth(): Promise<{ connected: boolean; latencyMs: number }> {
  const start = Date.now();

  try {
    await getSqlClient().unsafe('SELECT 1');
    return {
      connected: true,
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    log.error('Database health check failed', { error: error instanceof Error ? error.message : String(error) });
    return {
      connected: false,
      latencyMs: Date.now() - start,
    };
  }
}

/**
 * Initialize database, creating any missing tables
 */
export async function initializeDb(): Promise<void> {
  const client = getSqlClient();

  try {
    // Simple protocol so the script can carry several statements
    await client.unsafe(CREATE_TABLES_SQL).simple();
    log.info('Database tables verified');
  } catch (error) {
    log.error('Failed to initialize database', { error: error instanceof Error ? error.message : String(error) });
    throw error;
  }
}

// Export types
export type Database = ReturnType<typeof getDb>;
