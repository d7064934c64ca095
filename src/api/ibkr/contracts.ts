/**
 * Normalizes IBKR contract payloads into positions and option identities.
 */

import type { OptionRight } from "../../types/options.js";
import type {
  InstrumentType,
  Position,
} from "../../types/portfolio.js";

/** The subset of an @stoqey/ib Contract read here */
export interface ContractFields {
  conId?: number;
  symbol?: string;
  secType?: string;
  lastTradeDateOrContractMonth?: string;
  strike?: number;
  right?: string;
  multiplier?: number | string;
  exchange?: string;
  primaryExch?: string;
  currency?: string;
  localSymbol?: string;
}

/** Per-position values pushed by updatePortfolio */
export interface PortfolioValues {
  quantity: number;
  marketPrice: number;
  marketValue: number;
  averageCost: number;
  unrealizedPnL: number;
  realizedPnL: number;
  account?: string;
}

/**
 * Build a Position from a portfolio update.
 * Returns null for contracts without a symbol and for options whose
 * expiry, strike or right cannot be read (they cannot be keyed).
 */
export function toPosition(
  contract: ContractFields,
  values: PortfolioValues
): Position | null {
  const symbol = contract.symbol?.trim();
  if (!symbol) return null;

  const secType = (contract.secType ?? "").toUpperCase();
  const currency = contract.currency || "USD";
  const base = {
    symbol,
    account: values.account,
    quantity: values.quantity,
    averageCost: values.averageCost,
    marketPrice: values.marketPrice,
    marketValue: values.marketValue,
    unrealizedPnL: values.unrealizedPnL,
    realizedPnL: values.realizedPnL,
    localSymbol: contract.localSymbol,
    conId: contract.conId,
  };

  if (secType === "OPT") {
    const right = normalizeRight(contract.right);
    const expiry = normalizeExpiry(contract.lastTradeDateOrContractMonth);
    const strike = contract.strike;
    if (!right || !expiry || strike === undefined || !(strike > 0)) return null;

    return {
      ...base,
      secType: "OPT",
      multiplier: parseMultiplier(contract.multiplier, 100),
      identity: {
        symbol,
        expiry,
        strike,
        right,
        exchange: contract.exchange || "SMART",
        currency,
      },
    };
  }

  return {
    ...base,
    secType: toInstrumentType(secType),
    multiplier: parseMultiplier(contract.multiplier, 1),
    exchange: contract.exchange || contract.primaryExch || "SMART",
    currency,
  };
}

/** "C", "CALL", "P", "PUT" → C/P */
export function normalizeRight(right: string | undefined): OptionRight | null {
  const upper = (right ?? "").trim().toUpperCase();
  if (upper === "C" || upper === "CALL") return "C";
  if (upper === "P" || upper === "PUT") return "P";
  return null;
}

/** IBKR sometimes appends a time and zone: "20261218 16:00 US/Eastern" */
export function normalizeExpiry(expiry: string | undefined): string | null {
  const match = (expiry ?? "").trim().match(/^(\d{8})/);
  return match ? match[1] : null;
}

function parseMultiplier(raw: number | string | undefined, fallback: number): number {
  const value = typeof raw === "number" ? raw : parseFloat(raw ?? "");
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

function toInstrumentType(secType: string): InstrumentType {
  switch (secType) {
    case "STK": return "STK";
    case "FUT": return "FUT";
    case "CASH": return "CASH";
    case "IND": return "IND";
    case "BOND": return "BOND";
    default: return "OTHER";
  }
}
