/**
 * Greeks Fetcher
 *
 * Turns the push-based Greeks feed into a single bounded wait:
 * acquire(identities, budgetMs) subscribes every identity, collects
 * responses in whatever order they arrive, and resolves as soon as every
 * identity has a terminal outcome or the budget runs out. Anything still
 * pending at that point is TimedOut; partial completion is normal.
 *
 * Every identity that was requested is unsubscribed again before acquire()
 * resolves, on every exit path.
 */

import { componentLogger, type Log } from "../../utils/logger.js";
import { isUsableGreeks, optionKey } from "../../utils/validation.js";
import type {
  FetchOutcome,
  Greeks,
  OptionIdentity,
} from "../../types/options.js";
import type { GreeksFeed } from "../../types/market.js";

export const UPSTREAM_UNAVAILABLE = "upstream unavailable";

export interface GreeksFetcherOptions {
  now?: () => Date;
  log?: Log;
}

export class GreeksFetcher {
  private readonly feed: GreeksFeed;
  private readonly now: () => Date;
  private readonly log: Log;

  constructor(feed: GreeksFeed, options: GreeksFetcherOptions = {}) {
    this.feed = feed;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? componentLogger("greeks-fetcher");
  }

  /**
   * Fetch Greeks for a set of options within budgetMs.
   * Never rejects; failures are reported per identity.
   */
  async acquire(
    identities: readonly OptionIdentity[],
    budgetMs: number
  ): Promise<Map<string, FetchOutcome>> {
    const requested = new Map<string, OptionIdentity>();
    for (const identity of identities) {
      requested.set(optionKey(identity), identity);
    }

    const outcomes = new Map<string, FetchOutcome>();
    if (requested.size === 0) return outcomes;

    if (!this.feed.isConnected) {
      this.log.warn(`Feed not connected; ${requested.size} Greeks requests not issued`);
      for (const key of requested.keys()) {
        outcomes.set(key, { status: "failed", reason: UPSTREAM_UNAVAILABLE });
      }
      return outcomes;
    }

    this.log.info(
      `Fetching Greeks for ${requested.size} options (waiting up to ${formatSeconds(budgetMs)})...`
    );
    const startedAt = Date.now();

    return new Promise((resolve) => {
      let issuing = true;
      let finished = false;

      const finish = () => {
        if (finished) return;
        finished = true;
        clearTimeout(timer);

        // Requests that threw on subscribe are cancelled too; unsubscribe is idempotent
        for (const [key, identity] of requested) {
          try {
            this.feed.unsubscribeGreeks(identity);
          } catch (err) {
            this.log.warn(`Failed to unsubscribe ${key}: ${err}`);
          }
        }

        for (const key of requested.keys()) {
          if (!outcomes.has(key)) outcomes.set(key, { status: "timed_out" });
        }

        this.logPass(outcomes, Date.now() - startedAt);
        resolve(outcomes);
      };

      const settle = (key: string, outcome: FetchOutcome) => {
        if (finished || outcomes.has(key)) return;
        outcomes.set(key, outcome);
        if (!issuing && outcomes.size === requested.size) finish();
      };

      const timer = setTimeout(finish, Math.max(0, budgetMs));

      for (const [key, identity] of requested) {
        try {
          this.feed.subscribeGreeks(identity, {
            onGreeks: (greeks: Greeks) => {
              if (!isUsableGreeks(greeks)) {
                this.log.debug(`Ignoring unusable Greeks for ${key}`);
                return;
              }
              settle(key, {
                status: "succeeded",
                snapshot: {
                  identity,
                  delta: greeks.delta,
                  gamma: greeks.gamma,
                  theta: greeks.theta,
                  vega: greeks.vega,
                  capturedAt: this.now(),
                  source: "live",
                },
              });
            },
            onError: (reason: string) => {
              settle(key, { status: "failed", reason });
            },
          });
        } catch (err) {
          settle(key, {
            status: "failed",
            reason: `subscribe failed: ${err instanceof Error ? err.message : String(err)}`,
          });
        }
      }

      issuing = false;
      if (outcomes.size === requested.size) finish();
    });
  }

  private logPass(outcomes: Map<string, FetchOutcome>, elapsedMs: number): void {
    let succeeded = 0;
    let timedOut = 0;
    let failed = 0;
    for (const [key, outcome] of outcomes) {
      switch (outcome.status) {
        case "succeeded":
          succeeded++;
          this.log.debug(`  ✓ ${key}: δ=${outcome.snapshot.delta.toFixed(4)}`);
          break;
        case "timed_out":
          timedOut++;
          this.log.debug(`  … ${key}: no Greeks before the deadline`);
          break;
        case "failed":
          failed++;
          this.log.debug(`  ✗ ${key}: ${outcome.reason}`);
          break;
      }
    }

    this.log.info(
      `Greeks received for ${succeeded}/${outcomes.size} options in ` +
      `${formatSeconds(elapsedMs)} (timed out: ${timedOut}, failed: ${failed})`
    );
  }
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
