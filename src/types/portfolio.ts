/**
 * Portfolio and reconciliation report type definitions.
 */

import type {
  OptionIdentity,
  Greeks,
  GreeksProvenance,
  ReconciledGreeks,
} from "./options.js";

export type InstrumentType = "STK" | "FUT" | "CASH" | "IND" | "BOND" | "OTHER";

interface PositionBase {
  symbol: string;
  account?: string;
  quantity: number;
  averageCost: number;
  marketPrice: number;
  marketValue: number;
  unrealizedPnL: number;
  realizedPnL: number;
  multiplier: number;
  localSymbol?: string;
  conId?: number;
}

/** Option position; the only kind that carries Greeks */
export interface OptionPosition extends PositionBase {
  secType: "OPT";
  identity: OptionIdentity;
}

/** Stock, future or any other non-option holding */
export interface InstrumentPosition extends PositionBase {
  secType: InstrumentType;
  exchange: string;
  currency: string;
}

export type Position = OptionPosition | InstrumentPosition;

/** Yields the account's current holdings */
export interface PositionSource {
  getPositions(): Promise<Position[]>;
}

export type ProvenanceCounts = Record<GreeksProvenance, number>;

export interface ReconciliationSummary extends ProvenanceCounts {
  total: number;
}

/** Outcome of one reconciliation pass */
export interface ReconciliationReport {
  results: Map<string, ReconciledGreeks>;
  summary: ReconciliationSummary;
  /** False when the feed was disconnected or the fetch itself blew up */
  upstreamAvailable: boolean;
  /** Upstream unavailable, or options requested and none came back live */
  degraded: boolean;
  /** Live snapshots written to the cache in this pass */
  persisted: number;
  startedAt: Date;
  finishedAt: Date;
}

/** Aggregate position-weighted Greeks */
export interface PortfolioGreeks extends Greeks {
  coverage: ProvenanceCounts;
  /** Keys of option positions with no Greeks at all */
  missing: string[];
}
