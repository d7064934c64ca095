import { vi } from "vitest";
import type { Log } from "../../src/utils/logger.js";
import type { Greeks, OptionIdentity, OptionRight } from "../../src/types/options.js";
import type { InstrumentPosition, OptionPosition } from "../../src/types/portfolio.js";

export const HOUR_MS = 60 * 60 * 1000;

/** Log stand-in whose calls can be asserted */
export function createLog() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Log;
}

export function option(
  symbol: string,
  strike: number,
  right: OptionRight,
  expiry = "20261218"
): OptionIdentity {
  return { symbol, expiry, strike, right, exchange: "SMART", currency: "USD" };
}

export function greeks(delta: number, gamma = 0.02, theta = -0.05, vega = 0.12): Greeks {
  return { delta, gamma, theta, vega };
}

export function optionPosition(
  identity: OptionIdentity,
  quantity = 1,
  multiplier = 100
): OptionPosition {
  return {
    secType: "OPT",
    identity,
    symbol: identity.symbol,
    quantity,
    multiplier,
    averageCost: 0,
    marketPrice: 0,
    marketValue: 0,
    unrealizedPnL: 0,
    realizedPnL: 0,
  };
}

export function stockPosition(symbol: string, quantity = 100): InstrumentPosition {
  return {
    secType: "STK",
    symbol,
    exchange: "SMART",
    currency: "USD",
    quantity,
    multiplier: 1,
    averageCost: 0,
    marketPrice: 0,
    marketValue: 0,
    unrealizedPnL: 0,
    realizedPnL: 0,
  };
}
