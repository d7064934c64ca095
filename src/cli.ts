#!/usr/bin/env node
/**
 * greeks-reconcile: fetch live option Greeks from TWS / IB Gateway,
 * reconcile them with the local cache and print the result.
 *
 *   greeks-reconcile [--wait-greeks 15] [--retry-wait 20] [--json]
 *   greeks-reconcile cache-info
 */

import { Command, InvalidArgumentError } from "commander";
import { config } from "./config/index.js";
import { componentLogger } from "./utils/logger.js";
import { CachePersistenceError } from "./utils/errors.js";
import { IBKRClient } from "./api/ibkr/client.js";
import { GreeksFetcher } from "./api/ibkr/greeks-fetcher.js";
import { FileGreeksCache, type CacheInfo } from "./storage/greeks-cache.js";
import { ReconciliationEngine } from "./reconcile/engine.js";
import { formatReport, toReportJson } from "./reconcile/report.js";
import { aggregatePortfolioGreeks } from "./quant/greeks.js";

const log = componentLogger("cli");

// Type literals, not interfaces: opts<T>() requires an index-signature-compatible T
type ReconcileOptions = {
  waitGreeks: number;
  retryWait: number;
  account?: string;
  cacheFile: string;
  json: boolean;
};

type CacheInfoOptions = {
  cacheFile: string;
  json: boolean;
};

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return seconds;
}

async function reconcileCommand(options: ReconcileOptions): Promise<void> {
  const client = new IBKRClient({ account: options.account ?? config.ibkr.account });
  const cache = new FileGreeksCache(options.cacheFile, {
    maxAgeHours: config.greeks.maxAgeHours,
  });

  try {
    await client.connect();
    const positions = await client.getPositions();

    const engine = new ReconciliationEngine({
      fetcher: new GreeksFetcher(client),
      cache,
      primaryBudgetMs: options.waitGreeks * 1000,
      retryBudgetMs: options.retryWait * 1000,
    });
    const report = await engine.reconcile(positions);
    const portfolio = aggregatePortfolioGreeks(positions, report.results);

    if (options.json) {
      console.log(JSON.stringify({ ...toReportJson(report), portfolio }, null, 2));
      return;
    }

    console.log(formatReport(report));
    console.log("");
    console.log(
      `Portfolio: Δ ${portfolio.delta.toFixed(2)}  Γ ${portfolio.gamma.toFixed(4)}  ` +
      `Θ ${portfolio.theta.toFixed(2)}  ν ${portfolio.vega.toFixed(2)}` +
      (portfolio.missing.length > 0
        ? `  (excludes ${portfolio.missing.length} options without Greeks)`
        : "")
    );
  } finally {
    await client.disconnect();
  }
}

function cacheInfoCommand(options: CacheInfoOptions): void {
  const cache = new FileGreeksCache(options.cacheFile, {
    maxAgeHours: config.greeks.maxAgeHours,
  });
  const info = cache.describe();

  if (options.json) {
    console.log(JSON.stringify({
      ...info,
      lastUpdated: info.lastUpdated?.toISOString() ?? null,
    }, null, 2));
    return;
  }
  console.log(formatCacheInfo(info));
}

function formatCacheInfo(info: CacheInfo): string {
  return [
    `File:          ${info.filePath ?? "(memory)"}`,
    `Last updated:  ${info.lastUpdated ? info.lastUpdated.toISOString() : "never"}`,
    `Age:           ${info.ageHours === null ? "n/a" : `${info.ageHours.toFixed(1)}h`}`,
    `Records:       ${info.entryCount} (${info.validEntryCount} within ${config.greeks.maxAgeHours}h)`,
  ].join("\n");
}

const program = new Command();

program
  .name("greeks-reconcile")
  .description("Reconcile live IBKR option Greeks with the local Greeks cache")
  .enablePositionalOptions()
  .option("--wait-greeks <seconds>", "primary wait for live Greeks", parseSeconds, config.greeks.waitSeconds)
  .option("--retry-wait <seconds>", "retry wait for options still without Greeks (0 = no retry)", parseSeconds, config.greeks.retryWaitSeconds)
  .option("--account <id>", "IBKR account to read positions from")
  .option("--cache-file <path>", "Greeks cache file", config.greeks.cacheFile)
  .option("--json", "print the report as JSON", false)
  .action(async () => {
    await reconcileCommand(program.opts<ReconcileOptions>());
  });

program
  .command("cache-info")
  .description("Show the Greeks cache file, its age and record counts")
  .option("--cache-file <path>", "Greeks cache file", config.greeks.cacheFile)
  .option("--json", "print as JSON", false)
  .action((options: CacheInfoOptions) => {
    cacheInfoCommand(options);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CachePersistenceError) {
    log.error(`${err.message}; live Greeks from this run were not saved`);
  } else {
    log.error(`greeks-reconcile failed: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exitCode = 1;
});
