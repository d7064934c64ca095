/**
 * Reconciliation Engine
 *
 * One pass per call: collects the option identities held, fetches live
 * Greeks (primary pass, then a single retry over whatever did not succeed),
 * and merges the outcome with the cache. Every option ends up with exactly
 * one provenance:
 *
 *   live    → fetched in this pass, written back to the cache
 *   cache   → no live result, but a cached snapshot younger than the horizon
 *   missing → neither; the reason says why
 *
 * Only a failure to persist the cache is fatal. An unreachable feed degrades
 * the pass to cache/missing results.
 */

import { componentLogger, type Log } from "../utils/logger.js";
import { optionKey } from "../utils/validation.js";
import { UPSTREAM_UNAVAILABLE, type GreeksFetcher } from "../api/ibkr/greeks-fetcher.js";
import type { CacheInfo, GreeksCacheStore } from "../storage/greeks-cache.js";
import type {
  FetchOutcome,
  GreeksSnapshot,
  OptionIdentity,
  ReconciledGreeks,
} from "../types/options.js";
import type {
  Position,
  ReconciliationReport,
  ReconciliationSummary,
} from "../types/portfolio.js";

export const DEFAULT_PRIMARY_BUDGET_MS = 15_000;
export const DEFAULT_RETRY_BUDGET_MS = 20_000;

const HOUR_MS = 60 * 60 * 1000;

export type GreeksAcquirer = Pick<GreeksFetcher, "acquire">;

export interface ReconciliationEngineOptions {
  fetcher: GreeksAcquirer;
  cache: GreeksCacheStore;
  primaryBudgetMs?: number;
  /** 0 disables the retry pass */
  retryBudgetMs?: number;
  now?: () => Date;
  log?: Log;
}

interface PassResult {
  outcomes: Map<string, FetchOutcome>;
  upstreamAvailable: boolean;
}

export class ReconciliationEngine {
  private readonly fetcher: GreeksAcquirer;
  private readonly cache: GreeksCacheStore;
  private readonly primaryBudgetMs: number;
  private readonly retryBudgetMs: number;
  private readonly now: () => Date;
  private readonly log: Log;

  constructor(options: ReconciliationEngineOptions) {
    this.fetcher = options.fetcher;
    this.cache = options.cache;
    this.primaryBudgetMs = options.primaryBudgetMs ?? DEFAULT_PRIMARY_BUDGET_MS;
    this.retryBudgetMs = options.retryBudgetMs ?? DEFAULT_RETRY_BUDGET_MS;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? componentLogger("reconcile");
  }

  /**
   * Reconcile live and cached Greeks for every option position.
   * Rejects only with CachePersistenceError.
   */
  async reconcile(positions: readonly Position[]): Promise<ReconciliationReport> {
    const startedAt = this.now();
    const identities = optionIdentitiesOf(positions);

    const seeded = this.cache.loadAll();
    this.log.info(describeCache(this.cache.describe()));

    let outcomes = new Map<string, FetchOutcome>();
    let upstreamAvailable = true;

    if (identities.length === 0) {
      this.log.info("No option positions to reconcile");
    } else {
      const primary = await this.runPass(identities, this.primaryBudgetMs);
      outcomes = primary.outcomes;
      upstreamAvailable = primary.upstreamAvailable;

      const residual = identities.filter(
        (identity) => outcomes.get(optionKey(identity))?.status !== "succeeded"
      );

      if (residual.length > 0 && !upstreamAvailable) {
        this.log.warn(`Upstream unavailable; skipping retry for ${residual.length} options`);
      } else if (residual.length > 0 && this.retryBudgetMs > 0) {
        this.log.info(`Retrying ${residual.length} options without Greeks...`);
        const retry = await this.runPass(residual, this.retryBudgetMs);
        upstreamAvailable = retry.upstreamAvailable;
        for (const [key, outcome] of retry.outcomes) {
          outcomes.set(key, outcome);
        }
      }
    }

    const results = new Map<string, ReconciledGreeks>();
    for (const identity of identities) {
      const key = optionKey(identity);
      results.set(key, this.resolve(key, identity, outcomes.get(key), seeded));
    }

    const persisted = this.persistLive(results);
    const summary = summarize(results);
    this.logSummary(results, summary);

    return {
      results,
      summary,
      upstreamAvailable,
      degraded: !upstreamAvailable || (summary.total > 0 && summary.live === 0),
      persisted,
      startedAt,
      finishedAt: this.now(),
    };
  }

  /** One acquire() call; a throw or a disconnected feed marks the upstream unavailable */
  private async runPass(
    identities: readonly OptionIdentity[],
    budgetMs: number
  ): Promise<PassResult> {
    try {
      const outcomes = await this.fetcher.acquire(identities, budgetMs);
      const unavailable = Array.from(outcomes.values()).some(
        (outcome) => outcome.status === "failed" && outcome.reason === UPSTREAM_UNAVAILABLE
      );
      return { outcomes, upstreamAvailable: !unavailable };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn(`Greeks fetch failed, falling back to cache: ${message}`);
      const outcomes = new Map<string, FetchOutcome>();
      for (const identity of identities) {
        outcomes.set(optionKey(identity), {
          status: "failed",
          reason: `${UPSTREAM_UNAVAILABLE}: ${message}`,
        });
      }
      return { outcomes, upstreamAvailable: false };
    }
  }

  private resolve(
    key: string,
    identity: OptionIdentity,
    outcome: FetchOutcome | undefined,
    seeded: Map<string, GreeksSnapshot>
  ): ReconciledGreeks {
    if (outcome?.status === "succeeded") {
      return { provenance: "live", key, identity, snapshot: outcome.snapshot };
    }

    // The fetch passes take time: a seeded record may have expired meanwhile
    const cached = seeded.has(key) ? this.cache.get(identity) : undefined;
    if (cached) {
      return {
        provenance: "cache",
        key,
        identity,
        snapshot: cached,
        ageHours: (this.now().getTime() - cached.capturedAt.getTime()) / HOUR_MS,
      };
    }

    const failure = describeFailure(outcome);
    const stale = this.cache.inspect(identity);
    if (stale) {
      return {
        provenance: "missing",
        key,
        identity,
        reason: `${failure}; cached Greeks expired (${stale.ageHours.toFixed(1)}h old)`,
        lastObservedAt: stale.snapshot.capturedAt,
      };
    }
    return {
      provenance: "missing",
      key,
      identity,
      reason: `${failure}; no cached Greeks`,
    };
  }

  /** Write every live snapshot back; save() errors propagate */
  private persistLive(results: Map<string, ReconciledGreeks>): number {
    let written = 0;
    for (const result of results.values()) {
      if (result.provenance !== "live") continue;
      try {
        if (this.cache.put(result.identity, result.snapshot)) written++;
      } catch (err) {
        if (!(err instanceof RangeError)) throw err;
        this.log.warn(`Not caching ${result.key}: ${err.message}`);
      }
    }

    if (written > 0) this.cache.save();
    return written;
  }

  private logSummary(
    results: Map<string, ReconciledGreeks>,
    summary: ReconciliationSummary
  ): void {
    for (const result of results.values()) {
      switch (result.provenance) {
        case "live":
          this.log.debug(`  ${result.key}: live`);
          break;
        case "cache":
          this.log.info(`  ${result.key}: cache (${result.ageHours.toFixed(1)}h old)`);
          break;
        case "missing":
          this.log.warn(`  ${result.key}: missing (${result.reason})`);
          break;
      }
    }

    this.log.info(
      `Greeks for ${summary.total} options: ` +
      `${summary.live} live, ${summary.cache} cache, ${summary.missing} missing`
    );
  }
}

/** Distinct option identities held, in position order */
export function optionIdentitiesOf(positions: readonly Position[]): OptionIdentity[] {
  const unique = new Map<string, OptionIdentity>();
  for (const position of positions) {
    if (position.secType !== "OPT") continue;
    const key = optionKey(position.identity);
    if (!unique.has(key)) unique.set(key, position.identity);
  }
  return Array.from(unique.values());
}

export function summarize(results: Map<string, ReconciledGreeks>): ReconciliationSummary {
  const summary: ReconciliationSummary = { total: 0, live: 0, cache: 0, missing: 0 };
  for (const result of results.values()) {
    summary.total++;
    summary[result.provenance]++;
  }
  return summary;
}

function describeFailure(outcome: FetchOutcome | undefined): string {
  if (!outcome) return "live fetch not attempted";
  if (outcome.status === "failed") return `live fetch failed (${outcome.reason})`;
  return "live fetch timed out";
}

function describeCache(info: CacheInfo): string {
  const where = info.filePath ? ` at ${info.filePath}` : "";
  if (info.lastUpdated === null || info.ageHours === null) {
    return `Greeks cache${where}: ${info.entryCount} records, never saved`;
  }
  return (
    `Greeks cache${where}: ${info.validEntryCount}/${info.entryCount} records valid, ` +
    `last updated ${info.ageHours.toFixed(1)}h ago`
  );
}
