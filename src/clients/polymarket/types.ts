/**
 * Polymarket-specific types
 * These represent the raw data structures from the Polymarket APIs,
 * validated at the boundary before anything downstream sees them
 */

import { z } from 'zod';

// Numbers arrive as JSON numbers from the data API and as strings from the CLOB
const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

// ============================================
// Data API Types (Activity & Positions)
// ============================================

export const ActivityRecordSchema = z.object({
  proxyWallet: z.string().optional(),
  timestamp: numeric,
  conditionId: z.string().optional(),
  type: z.string(),
  size: numeric.pipe(z.number().nonnegative()),
  usdcSize: numeric.optional(),
  transactionHash: z.string().min(1),
  price: numeric.pipe(z.number().min(0).max(1)),
  asset: z.string().min(1),
  side: z.enum(['BUY', 'SELL']),
  outcomeIndex: z.number().optional(),
  title: z.string().optional(),
  slug: z.string().optional(),
  outcome: z.string().optional(),
});

export type ActivityRecord = z.infer<typeof ActivityRecordSchema>;

/**
 * Response of getBalanceAllowance. Balances are integer strings in 6-decimal base units;
 * the SDK can hand back an error object instead of throwing.
 */
export const BalanceAllowanceSchema = z
  .object({
    balance: z.string().optional(),
    error: z.string().optional(),
    status: z.number().optional(),
  })
  .passthrough();

export type BalanceAllowance = z.infer<typeof BalanceAllowanceSchema>;

// ============================================
// CLOB Types (Orders & Prices)
// ============================================

/**
 * Response of postOrder. The SDK can hand back an error object instead of throwing.
 */
export const PostOrderResponseSchema = z
  .object({
    success: z.boolean().optional(),
    errorMsg: z.string().optional(),
    orderID: z.string().optional(),
    status: z.union([z.string(), z.number()]).optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type PostOrderResponse = z.infer<typeof PostOrderResponseSchema>;

export const OpenOrderSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    original_size: numeric,
    size_matched: numeric,
    price: numeric,
    side: z.string().optional(),
    asset_id: z.string().optional(),
  })
  .passthrough();

export type OpenOrder = z.infer<typeof OpenOrderSchema>;

export const PriceResponseSchema = z.object({
  price: numeric,
});

// Signature types for the CLOB client
export type SignatureType = 0 | 1 | 2; // 0 = EOA, 1 = POLY_PROXY, 2 = GNOSIS_SAFE
