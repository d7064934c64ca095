/**
 * Reconciliation report rendering: a JSON-ready shape for downstream
 * consumers and a plain-text table for the console.
 */

import type { GreeksProvenance, ReconciledGreeks } from "../types/options.js";
import type {
  ReconciliationReport,
  ReconciliationSummary,
} from "../types/portfolio.js";

export interface ReconciledGreeksJson {
  key: string;
  symbol: string;
  expiry: string;
  strike: number;
  right: "C" | "P";
  exchange: string;
  currency: string;
  provenance: GreeksProvenance;
  delta?: number;
  gamma?: number;
  theta?: number;
  vega?: number;
  capturedAt?: string;
  ageHours?: number;
  reason?: string;
  lastObservedAt?: string;
}

export interface ReconciliationReportJson {
  startedAt: string;
  finishedAt: string;
  upstreamAvailable: boolean;
  degraded: boolean;
  persisted: number;
  summary: ReconciliationSummary;
  options: ReconciledGreeksJson[];
}

export function toReportJson(report: ReconciliationReport): ReconciliationReportJson {
  return {
    startedAt: report.startedAt.toISOString(),
    finishedAt: report.finishedAt.toISOString(),
    upstreamAvailable: report.upstreamAvailable,
    degraded: report.degraded,
    persisted: report.persisted,
    summary: { ...report.summary },
    options: Array.from(report.results.values()).map(toResultJson),
  };
}

function toResultJson(result: ReconciledGreeks): ReconciledGreeksJson {
  const base = {
    key: result.key,
    ...result.identity,
    provenance: result.provenance,
  };

  switch (result.provenance) {
    case "live":
    case "cache": {
      const { delta, gamma, theta, vega, capturedAt } = result.snapshot;
      return {
        ...base,
        delta,
        gamma,
        theta,
        vega,
        capturedAt: capturedAt.toISOString(),
        ...(result.provenance === "cache"
          ? { ageHours: round(result.ageHours, 2) }
          : {}),
      };
    }
    case "missing":
      return {
        ...base,
        reason: result.reason,
        ...(result.lastObservedAt
          ? { lastObservedAt: result.lastObservedAt.toISOString() }
          : {}),
      };
  }
}

/** Console table, one line per option plus a summary line */
export function formatReport(report: ReconciliationReport): string {
  const { summary } = report;
  const lines: string[] = [
    `Option Greeks: ${summary.total} options ` +
      `(${summary.live} live, ${summary.cache} cache, ${summary.missing} missing)`,
  ];
  if (report.degraded) {
    lines.push(
      report.upstreamAvailable
        ? "⚠ Degraded: no live Greeks received"
        : "⚠ Degraded: Greeks feed unavailable"
    );
  }
  lines.push("");

  for (const result of report.results.values()) {
    const label = result.key.padEnd(36);
    if (result.provenance === "missing") {
      lines.push(`  ${label} MISSING  ${result.reason}`);
      continue;
    }
    const { delta, gamma, theta, vega } = result.snapshot;
    const tag = result.provenance === "live"
      ? "LIVE    "
      : `CACHE ${result.ageHours.toFixed(1)}h`.padEnd(8);
    lines.push(
      `  ${label} ${tag} Δ ${fmt(delta)}  Γ ${fmt(gamma)}  Θ ${fmt(theta)}  ν ${fmt(vega)}`
    );
  }

  return lines.join("\n");
}

function fmt(value: number): string {
  return (value >= 0 ? " " : "") + value.toFixed(4);
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
