/**
 * Option identity, Greeks and fetch outcome definitions.
 */

export type OptionRight = "C" | "P";

/**
 * Immutable key of one option contract. The same identity is used to
 * request live Greeks and to look them up in the cache.
 */
export interface OptionIdentity {
  readonly symbol: string;
  /** Expiry as IBKR's lastTradeDateOrContractMonth, YYYYMMDD */
  readonly expiry: string;
  readonly strike: number;
  readonly right: OptionRight;
  readonly exchange: string;
  readonly currency: string;
}

/** Model Greeks for a single contract */
export interface Greeks {
  delta: number;   // ∂V/∂S  — price sensitivity
  gamma: number;   // ∂²V/∂S² — delta acceleration
  theta: number;   // ∂V/∂t  — time decay (per day)
  vega: number;    // ∂V/∂σ  — IV sensitivity
}

export type GreeksSource = "live" | "cache";

export interface GreeksSnapshot extends Greeks {
  identity: OptionIdentity;
  /** When the live fetch for this identity completed */
  capturedAt: Date;
  source: GreeksSource;
}

/** Per-identity result of one fetch pass */
export type FetchOutcome =
  | { status: "succeeded"; snapshot: GreeksSnapshot }
  | { status: "timed_out" }
  | { status: "failed"; reason: string };

export type FetchStatus = FetchOutcome["status"];

/** Provenance of a reconciled value */
export type GreeksProvenance = "live" | "cache" | "missing";

export type ReconciledGreeks =
  | {
      provenance: "live";
      key: string;
      identity: OptionIdentity;
      snapshot: GreeksSnapshot;
    }
  | {
      provenance: "cache";
      key: string;
      identity: OptionIdentity;
      snapshot: GreeksSnapshot;
      ageHours: number;
    }
  | {
      provenance: "missing";
      key: string;
      identity: OptionIdentity;
      reason: string;
      /** Capture time of an expired record still on disk, if any */
      lastObservedAt?: Date;
    };
