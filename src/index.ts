/**
 * Option Greeks Reconciler: library entry point.
 * The command-line tool lives in cli.ts.
 */

export * from "./types/options.js";
export * from "./types/portfolio.js";
export * from "./types/market.js";

export { IBKRClient, type IBKRClientOptions } from "./api/ibkr/client.js";
export { toPosition, normalizeExpiry, normalizeRight } from "./api/ibkr/contracts.js";
export {
  GreeksFetcher,
  UPSTREAM_UNAVAILABLE,
  type GreeksFetcherOptions,
} from "./api/ibkr/greeks-fetcher.js";

export {
  DEFAULT_MAX_AGE_HOURS,
  FileGreeksCache,
  MemoryGreeksCache,
  type CacheInfo,
  type CacheInspection,
  type GreeksCacheOptions,
  type GreeksCacheStore,
} from "./storage/greeks-cache.js";

export {
  DEFAULT_PRIMARY_BUDGET_MS,
  DEFAULT_RETRY_BUDGET_MS,
  ReconciliationEngine,
  optionIdentitiesOf,
  summarize,
  type GreeksAcquirer,
  type ReconciliationEngineOptions,
} from "./reconcile/engine.js";
export {
  formatReport,
  toReportJson,
  type ReconciledGreeksJson,
  type ReconciliationReportJson,
} from "./reconcile/report.js";

export * from "./quant/index.js";

export { CachePersistenceError } from "./utils/errors.js";
export { optionKey, isUsableGreeks } from "./utils/validation.js";
export { loadConfig, type Config } from "./config/index.js";
