/**
 * Portfolio Greeks Aggregation Tests
 */

import { describe, it, expect } from "vitest";
import { aggregateGreeks, aggregatePortfolioGreeks } from "../../src/quant/greeks.js";
import { optionKey } from "../../src/utils/validation.js";
import type { ReconciledGreeks } from "../../src/types/options.js";
import { greeks, option, optionPosition, stockPosition } from "../helpers/fixtures.js";

const CAPTURED = new Date("2026-03-02T15:00:00.000Z");

const aapl = option("AAPL", 150, "C");
const msft = option("MSFT", 400, "P");
const spy = option("SPY", 500, "C");

describe("aggregateGreeks", () => {
  it("scales by quantity × multiplier", () => {
    const total = aggregateGreeks([
      { greeks: greeks(0.5, 0.02, -0.04, 0.1), quantity: 2, multiplier: 100 },
      { greeks: greeks(-0.25, 0.01, -0.02, 0.05), quantity: -4, multiplier: 100 },
    ]);

    expect(total.delta).toBeCloseTo(200, 10);
    expect(total.gamma).toBeCloseTo(0, 10);
    expect(total.theta).toBeCloseTo(0, 10);
    expect(total.vega).toBeCloseTo(0, 10);
  });

  it("returns zeros for no positions", () => {
    expect(aggregateGreeks([])).toEqual({ delta: 0, gamma: 0, theta: 0, vega: 0 });
  });
});

describe("aggregatePortfolioGreeks", () => {
  const results = new Map<string, ReconciledGreeks>([
    [optionKey(aapl), {
      provenance: "live",
      key: optionKey(aapl),
      identity: aapl,
      snapshot: { identity: aapl, ...greeks(0.55), capturedAt: CAPTURED, source: "live" },
    }],
    [optionKey(msft), {
      provenance: "cache",
      key: optionKey(msft),
      identity: msft,
      snapshot: { identity: msft, ...greeks(-0.3), capturedAt: CAPTURED, source: "cache" },
      ageHours: 10,
    }],
    [optionKey(spy), {
      provenance: "missing",
      key: optionKey(spy),
      identity: spy,
      reason: "live fetch timed out; no cached Greeks",
    }],
  ]);

  it("sums live and cached Greeks and lists options without any", () => {
    const portfolio = aggregatePortfolioGreeks(
      [optionPosition(aapl, 2), optionPosition(msft, -1), optionPosition(spy, 5), stockPosition("AAPL")],
      results
    );

    // 0.55 × 200 + (-0.3) × (-100)
    expect(portfolio.delta).toBeCloseTo(140, 10);
    expect(portfolio.coverage).toEqual({ live: 1, cache: 1, missing: 1 });
    expect(portfolio.missing).toEqual([optionKey(spy)]);
  });

  it("counts options absent from the reconciled set as missing", () => {
    const portfolio = aggregatePortfolioGreeks([optionPosition(option("QQQ", 450, "P"))], results);

    expect(portfolio.delta).toBe(0);
    expect(portfolio.coverage).toEqual({ live: 0, cache: 0, missing: 1 });
    expect(portfolio.missing).toEqual(["QQQ_450_20261218_P_SMART_USD"]);
  });
});
