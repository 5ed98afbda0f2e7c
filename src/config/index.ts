import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigSchema, type Config } from './schema.js';
import { POLYMARKET_ENDPOINTS } from './constants.js';
import { ConfigurationError } from '../utils/errors.js';

// Load environment variables
dotenv.config();

/**
 * Parse boolean from environment variable
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse number from environment variable
 */
function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse an optional number; unset or blank stays undefined so schema defaults apply
 */
function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Build configuration object from environment variables
 */
function buildConfigFromEnv(): unknown {
  const env = process.env;

  return {
    env: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',

    polymarket: {
      privateKey: env['POLYMARKET_PRIVATE_KEY'] || undefined,
      // L2 API credentials - derived from the private key when absent
      apiKey: env['POLYMARKET_API_KEY'] || undefined,
      apiSecret: env['POLYMARKET_API_SECRET'] || undefined,
      apiPassphrase: env['POLYMARKET_API_PASSPHRASE'] || undefined,
      // Funder address - the proxy wallet where the USDC and positions are held
      funderAddress: env['POLYMARKET_FUNDER_ADDRESS'] || undefined,
      chainId: parseNumber(env['POLYMARKET_CHAIN_ID'], 137),
      host: env['POLYMARKET_HOST'] || POLYMARKET_ENDPOINTS.CLOB,
      dataApiUrl: env['POLYMARKET_DATA_API_URL'] || POLYMARKET_ENDPOINTS.DATA_API,
      signatureType: env['POLYMARKET_SIGNATURE_TYPE'] || 'EOA',
    },

    database: {
      url: env['DATABASE_URL'] || 'postgresql://localhost:5432/polymirror',
      poolSize: parseNumber(env['DATABASE_POOL_SIZE'], 10),
    },

    copyTrading: {
      targetAddress: env['TARGET_ADDRESS'],
      copySize: parseNumber(env['COPY_SIZE'], 10),
      scaleInPolicy: (env['COPY_SCALE_IN_POLICY'] || 'FIXED').toUpperCase(),
      increaseSize: parseOptionalNumber(env['COPY_INCREASE_SIZE']),
      pollIntervalMs: parseNumber(env['POLL_INTERVAL_MS'], 10000),
      maxConcurrentMarkets: parseNumber(env['COPY_MAX_CONCURRENT_MARKETS'], 3),
      skipHistoryOnStart: parseBoolean(env['COPY_SKIP_HISTORY'], true),
      feedPageSize: parseNumber(env['FEED_PAGE_SIZE'], 100),
      feedMaxPages: parseNumber(env['FEED_MAX_PAGES'], 5),
      requestTimeoutMs: parseNumber(env['FEED_REQUEST_TIMEOUT_MS'], 10000),
    },

    execution: {
      maxAttempts: parseNumber(env['ORDER_MAX_ATTEMPTS'], 3),
      initialDelayMs: parseNumber(env['ORDER_RETRY_DELAY_MS'], 1000),
      maxDelayMs: parseNumber(env['ORDER_RETRY_MAX_DELAY_MS'], 30000),
      backoffMultiplier: parseNumber(env['ORDER_BACKOFF_MULTIPLIER'], 2),
      fillTimeoutMs: parseNumber(env['ORDER_FILL_TIMEOUT_MS'], 10000),
      fillPollIntervalMs: parseNumber(env['ORDER_FILL_POLL_MS'], 1000),
      maxSlippage: parseNumber(env['ORDER_MAX_SLIPPAGE'], 0.02),
      orderType: env['ORDER_TYPE'] || 'GTC',
    },

    trading: {
      paperTrading: parseBoolean(env['PAPER_TRADING'], true),
      paperTradingBalance: parseNumber(env['PAPER_TRADING_BALANCE'], 10000),
    },

    api: {
      enableMetrics: parseBoolean(env['METRICS_ENABLED'], false),
      metricsPort: parseNumber(env['METRICS_PORT'], 9090),
    },
  };
}

/**
 * Validate and load configuration
 */
function loadConfig(): Config {
  const rawConfig = buildConfigFromEnv();

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
      throw new ConfigurationError(`Configuration validation failed:\n${issues}`);
    }
    throw error;
  }
}

// Singleton config instance
let configInstance: Config | null = null;

/**
 * Get the configuration instance (lazy loaded)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reload configuration from environment (useful for testing)
 */
export function reloadConfig(): Config {
  configInstance = loadConfig();
  return configInstance;
}

/**
 * Validate that the credentials live trading needs are present
 */
export function validateCredentials(): { valid: boolean; missing: string[]; hasL2Creds: boolean } {
  const config = getConfig();
  const missing: string[] = [];

  if (!config.polymarket.privateKey) {
    missing.push('POLYMARKET_PRIVATE_KEY');
  }
  const hasL2Creds = !!(config.polymarket.apiKey && config.polymarket.apiSecret && config.polymarket.apiPassphrase);

  return {
    valid: missing.length === 0,
    missing,
    hasL2Creds,
  };
}

/**
 * Check if running in paper trading mode
 */
export function isPaperTrading(): boolean {
  return getConfig().trading.paperTrading;
}

// Re-export types and constants
export * from './schema.js';
export * from './constants.js';
