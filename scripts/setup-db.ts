#!/usr/bin/env tsx
/**
 * Database setup script
 * Creates the copier's tables and verifies they are reachable
 */

import { sql } from 'drizzle-orm';
import { checkHealth, closeDb, getDb, initializeDb } from '../src/database/index.js';
import { logger } from '../src/utils/logger.js';

const log = logger('SetupDB');

const TABLES = ['copy_positions', 'processed_events', 'pending_orders', 'feed_cursors'];

async function setupDatabase(): Promise<void> {
  const health = await checkHealth();
  if (!health.connected) {
    throw new Error('Database is not reachable; check DATABASE_URL');
  }
  log.info('Connected', { latencyMs: health.latencyMs });

  await initializeDb();

  log.info('Verifying schema...');
  const db = getDb();
  for (const table of TABLES) {
    try {
      await db.execute(sql`SELECT 1 FROM ${sql.identifier(table)} LIMIT 1`);
      log.info(`✓ Table ${table} exists`);
    } catch (error) {
      log.warn(`✗ Table ${table} may not exist or is not accessible`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

setupDatabase()
  .then(() => {
    log.info('Setup complete');
  })
  .catch((error: unknown) => {
    log.error('Setup failed', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  })
  .finally(() => closeDb());
