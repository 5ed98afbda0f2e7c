import { z } from 'zod';

const ethAddress = z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 0x-prefixed 20-byte hex address');

// Polymarket configuration schema
const PolymarketConfigSchema = z.object({
  privateKey: z.string().optional(),
  // L2 API credentials - used directly instead of deriving from the private key
  apiKey: z.string().optional(),
  apiSecret: z.string().optional(),
  apiPassphrase: z.string().optional(),
  // Proxy wallet holding the USDC, when it differs from the signer
  funderAddress: ethAddress.optional(),
  chainId: z.number().default(137),
  host: z.string().default('https://clob.polymarket.com'),
  dataApiUrl: z.string().default('https://data-api.polymarket.com'),
  signatureType: z.enum(['EOA', 'PROXY', 'GNOSIS']).default('EOA'),
});

// Database configuration schema
const DatabaseConfigSchema = z.object({
  url: z.string().url(),
  poolSize: z.number().min(1).max(100).default(10),
});

// Copy trading configuration schema
const CopyTradingConfigSchema = z
  .object({
    targetAddress: ethAddress,
    // Fixed number of shares per copied open
    copySize: z.number().positive().default(10),
    scaleInPolicy: z.enum(['FIXED', 'IGNORE']).default('FIXED'),
    increaseSize: z.number().positive().optional(),
    pollIntervalMs: z.number().int().min(250).default(10000),
    maxConcurrentMarkets: z.number().int().min(1).max(50).default(3),
    skipHistoryOnStart: z.boolean().default(true),
    feedPageSize: z.number().int().min(1).max(500).default(100),
    feedMaxPages: z.number().int().min(1).max(100).default(5),
    requestTimeoutMs: z.number().positive().default(10000),
  })
  .transform((value) => ({
    ...value,
    increaseSize: value.increaseSize ?? value.copySize,
  }));

// Order execution configuration schema
const ExecutionConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    initialDelayMs: z.number().positive().default(1000),
    maxDelayMs: z.number().positive().default(30000),
    backoffMultiplier: z.number().min(1).default(2),
    fillTimeoutMs: z.number().positive().default(10000),
    fillPollIntervalMs: z.number().positive().default(1000),
    maxSlippage: z.number().min(0).max(0.5).default(0.02),
    orderType: z.enum(['GTC', 'FOK']).default('GTC'),
  })
  .refine((value) => value.fillPollIntervalMs <= value.fillTimeoutMs, {
    message: 'fillPollIntervalMs must not exceed fillTimeoutMs',
    path: ['fillPollIntervalMs'],
  });

// Trading mode configuration schema
const TradingConfigSchema = z.object({
  paperTrading: z.boolean().default(true),
  paperTradingBalance: z.number().positive().default(10000),
});

// API configuration schema
const ApiConfigSchema = z.object({
  enableMetrics: z.boolean().default(false),
  metricsPort: z.number().min(1).max(65535).default(9090),
});

// Main configuration schema
export const ConfigSchema = z.object({
  env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  polymarket: PolymarketConfigSchema,
  database: DatabaseConfigSchema,
  copyTrading: CopyTradingConfigSchema,
  execution: ExecutionConfigSchema,
  trading: TradingConfigSchema,
  api: ApiConfigSchema,
});

// Export types
export type Config = z.infer<typeof ConfigSchema>;
export type PolymarketConfig = z.infer<typeof PolymarketConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type CopyTradingConfig = z.infer<typeof CopyTradingConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type TradingConfig = z.infer<typeof TradingConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
