/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

export const MarketDataTypeSchema = z.enum([
  "realtime",
  "frozen",
  "delayed",
  "delayed_frozen",
]);

export type MarketDataTypeName = z.infer<typeof MarketDataTypeSchema>;

const ConfigSchema = z.object({
  // IBKR
  ibkr: z.object({
    host: z.string().default("127.0.0.1"),
    port: z.coerce.number().int().positive().default(7497),
    clientId: z.coerce.number().int().nonnegative().default(1),
    account: z.string().optional(),
    connectTimeoutMs: z.coerce.number().int().positive().default(10_000),
    // Delayed data is free for every account and still carries model Greeks
    marketDataType: MarketDataTypeSchema.default("delayed"),
  }),

  // Greeks acquisition + cache
  greeks: z.object({
    waitSeconds: z.coerce.number().nonnegative().default(15),
    retryWaitSeconds: z.coerce.number().nonnegative().default(20),
    maxAgeHours: z.coerce.number().positive().default(48),
    cacheFile: z.string().default("data/greeks-cache.json"),
  }),

  positions: z.object({
    timeoutMs: z.coerce.number().int().positive().default(10_000),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Empty strings in .env files mean "unset" */
function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    ibkr: {
      host: envValue(env, "IBKR_HOST"),
      port: envValue(env, "IBKR_PORT"),
      clientId: envValue(env, "IBKR_CLIENT_ID"),
      account: envValue(env, "IBKR_ACCOUNT"),
      connectTimeoutMs: envValue(env, "IBKR_CONNECT_TIMEOUT_MS"),
      marketDataType: envValue(env, "IBKR_MARKET_DATA_TYPE"),
    },
    greeks: {
      waitSeconds: envValue(env, "GREEKS_WAIT_SECONDS"),
      retryWaitSeconds: envValue(env, "GREEKS_RETRY_WAIT_SECONDS"),
      maxAgeHours: envValue(env, "GREEKS_MAX_AGE_HOURS"),
      cacheFile: envValue(env, "GREEKS_CACHE_FILE"),
    },
    positions: {
      timeoutMs: envValue(env, "POSITIONS_TIMEOUT_MS"),
    },
    logLevel: envValue(env, "LOG_LEVEL"),
    nodeEnv: envValue(env, "NODE_ENV"),
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();
