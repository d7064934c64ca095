/**
 * Portfolio Greeks Aggregation
 *
 * Position-weighted exposure from reconciled per-option Greeks. Values are
 * per share as reported by IBKR, so each position scales by
 * quantity × multiplier (100 for standard equity options).
 *
 * Options without Greeks are counted and listed, never zero-filled: a
 * leverage figure built on a partial book has to know what it is missing.
 */

import { optionKey } from "../utils/validation.js";
import type { Greeks, ReconciledGreeks } from "../types/options.js";
import type {
  PortfolioGreeks,
  Position,
  ProvenanceCounts,
} from "../types/portfolio.js";

/** Aggregate Greeks across multiple positions */
export function aggregateGreeks(
  positions: Array<{
    greeks: Greeks;
    quantity: number;
    multiplier: number;
  }>
): Greeks {
  const total: Greeks = { delta: 0, gamma: 0, theta: 0, vega: 0 };

  for (const pos of positions) {
    const scale = pos.quantity * pos.multiplier;
    total.delta += pos.greeks.delta * scale;
    total.gamma += pos.greeks.gamma * scale;
    total.theta += pos.greeks.theta * scale;
    total.vega += pos.greeks.vega * scale;
  }

  return total;
}

/**
 * Sum reconciled Greeks over the option positions held.
 * Non-option positions are ignored; coverage counts option positions.
 */
export function aggregatePortfolioGreeks(
  positions: readonly Position[],
  results: ReadonlyMap<string, ReconciledGreeks>
): PortfolioGreeks {
  const coverage: ProvenanceCounts = { live: 0, cache: 0, missing: 0 };
  const missing: string[] = [];
  const weighted: Parameters<typeof aggregateGreeks>[0] = [];

  for (const position of positions) {
    if (position.secType !== "OPT") continue;

    const key = optionKey(position.identity);
    const result = results.get(key);
    if (!result || result.provenance === "missing") {
      coverage.missing++;
      if (!missing.includes(key)) missing.push(key);
      continue;
    }

    coverage[result.provenance]++;
    weighted.push({
      greeks: result.snapshot,
      quantity: position.quantity,
      multiplier: position.multiplier,
    });
  }

  return { ...aggregateGreeks(weighted), coverage, missing };
}
