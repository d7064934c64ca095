/**
 * Input validation utilities.
 */

import { z } from "zod";
import type { Greeks, OptionIdentity } from "../types/options.js";

/** Validate an option identity as stored on disk */
export const OptionIdentitySchema = z.object({
  symbol: z.string().min(1),
  expiry: z.string().regex(/^\d{8}$/, "Expiry must be YYYYMMDD"),
  strike: z.number().positive().finite(),
  right: z.enum(["C", "P"]),
  exchange: z.string().min(1),
  currency: z.string().min(1),
});

export const GreeksSchema = z.object({
  delta: z.number().finite().min(-1).max(1),
  gamma: z.number().finite(),
  theta: z.number().finite(),
  vega: z.number().finite(),
});

/** One persisted cache record */
export const CacheRecordSchema = GreeksSchema.extend({
  identity: OptionIdentitySchema,
  capturedAt: z.string().datetime(),
});

export const CacheFileSchema = z.object({
  version: z.literal(1),
  lastUpdated: z.string().datetime(),
  entries: z.record(CacheRecordSchema),
});

export type CacheRecord = z.infer<typeof CacheRecordSchema>;
export type CacheFile = z.infer<typeof CacheFileSchema>;

/** Canonical string key: SYMBOL_STRIKE_EXPIRY_RIGHT_EXCHANGE_CURRENCY */
export function optionKey(identity: OptionIdentity): string {
  const { symbol, strike, expiry, right, exchange, currency } = identity;
  return `${symbol}_${strike}_${expiry}_${right}_${exchange}_${currency}`;
}

const UNSET_SENTINEL = 1e10;

/**
 * Whether a set of Greeks from the feed can be used.
 * IBKR marks "not computed" with -2 and unset fields with huge sentinels.
 */
export function isUsableGreeks(greeks: Greeks): boolean {
  if (!GreeksSchema.safeParse(greeks).success) return false;
  return [greeks.gamma, greeks.theta, greeks.vega].every(
    (value) => Math.abs(value) < UNSET_SENTINEL
  );
}
