/**
 * Greeks Cache
 *
 * Keeps the last live Greeks observed for every option so that leverage and
 * risk figures stay computable while the market is closed or the feed only
 * answers for part of the book.
 *
 * Entries older than the staleness horizon (48h by default) are logically
 * absent: get() and loadAll() skip them, but they stay on disk until a newer
 * live observation supersedes them, so the last value remains inspectable.
 *
 * File: data/greeks-cache.json
 */

import fs from "fs";
import path from "path";
import { componentLogger, type Log } from "../utils/logger.js";
import { CachePersistenceError } from "../utils/errors.js";
import {
  CacheFileSchema,
  optionKey,
  type CacheFile,
} from "../utils/validation.js";
import type {
  Greeks,
  GreeksSnapshot,
  OptionIdentity,
} from "../types/options.js";

export const DEFAULT_MAX_AGE_HOURS = 48;

const HOUR_MS = 60 * 60 * 1000;

// ── Types ──────────────────────────────────────────────

export interface CacheInspection {
  snapshot: GreeksSnapshot;
  ageHours: number;
  expired: boolean;
}

export interface CacheInfo {
  filePath?: string;
  lastUpdated: Date | null;
  ageHours: number | null;
  entryCount: number;
  /** Entries still inside the staleness horizon */
  validEntryCount: number;
}

/** Persisted mapping from option identity to its last live Greeks */
export interface GreeksCacheStore {
  /** Snapshot if present and not expired */
  get(identity: OptionIdentity): GreeksSnapshot | undefined;
  /**
   * Overwrite the record for an identity. Returns false, keeping the stored
   * record, when the snapshot was captured before the one already held.
   */
  put(identity: OptionIdentity, snapshot: GreeksSnapshot): boolean;
  /** Every record that is not expired, keyed by optionKey() */
  loadAll(): Map<string, GreeksSnapshot>;
  /** Raw record regardless of expiry */
  inspect(identity: OptionIdentity): CacheInspection | undefined;
  /** Persist the whole store; throws CachePersistenceError */
  save(): void;
  describe(): CacheInfo;
}

export interface GreeksCacheOptions {
  maxAgeHours?: number;
  now?: () => Date;
  log?: Log;
}

interface StoredRecord {
  identity: OptionIdentity;
  greeks: Greeks;
  capturedAtMs: number;
}

// ── In-memory store ────────────────────────────────────

export class MemoryGreeksCache implements GreeksCacheStore {
  protected records: Map<string, StoredRecord> = new Map();
  protected lastUpdated: Date | null = null;
  protected readonly maxAgeMs: number;
  protected readonly now: () => Date;
  protected readonly log: Log;

  constructor(options: GreeksCacheOptions = {}) {
    this.maxAgeMs = (options.maxAgeHours ?? DEFAULT_MAX_AGE_HOURS) * HOUR_MS;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? componentLogger("greeks-cache");
  }

  get(identity: OptionIdentity): GreeksSnapshot | undefined {
    const inspection = this.inspect(identity);
    return inspection && !inspection.expired ? inspection.snapshot : undefined;
  }

  put(identity: OptionIdentity, snapshot: GreeksSnapshot): boolean {
    this.ensureLoaded();

    const capturedAtMs = snapshot.capturedAt.getTime();
    if (!Number.isFinite(capturedAtMs)) {
      throw new RangeError(`Invalid capture time for ${optionKey(identity)}`);
    }
    if (capturedAtMs > this.now().getTime()) {
      throw new RangeError(
        `Refusing to cache ${optionKey(identity)} captured in the future ` +
        `(${snapshot.capturedAt.toISOString()})`
      );
    }

    const key = optionKey(identity);
    const existing = this.records.get(key);
    if (existing && existing.capturedAtMs > capturedAtMs) {
      this.log.debug(`Kept newer cached Greeks for ${key}`);
      return false;
    }

    this.records.set(key, {
      identity: Object.freeze({ ...identity }),
      greeks: {
        delta: snapshot.delta,
        gamma: snapshot.gamma,
        theta: snapshot.theta,
        vega: snapshot.vega,
      },
      capturedAtMs,
    });
    return true;
  }

  loadAll(): Map<string, GreeksSnapshot> {
    this.ensureLoaded();
    const nowMs = this.now().getTime();
    const result = new Map<string, GreeksSnapshot>();

    for (const [key, record] of this.records) {
      if (nowMs - record.capturedAtMs < this.maxAgeMs) {
        result.set(key, toSnapshot(record));
      }
    }
    return result;
  }

  inspect(identity: OptionIdentity): CacheInspection | undefined {
    this.ensureLoaded();
    const record = this.records.get(optionKey(identity));
    if (!record) return undefined;

    const ageMs = this.now().getTime() - record.capturedAtMs;
    return {
      snapshot: toSnapshot(record),
      ageHours: ageMs / HOUR_MS,
      expired: ageMs >= this.maxAgeMs,
    };
  }

  save(): void {
    this.lastUpdated = this.now();
  }

  describe(): CacheInfo {
    this.ensureLoaded();
    const nowMs = this.now().getTime();
    let validEntryCount = 0;
    for (const record of this.records.values()) {
      if (nowMs - record.capturedAtMs < this.maxAgeMs) validEntryCount++;
    }

    return {
      lastUpdated: this.lastUpdated,
      ageHours: this.lastUpdated
        ? (nowMs - this.lastUpdated.getTime()) / HOUR_MS
        : null,
      entryCount: this.records.size,
      validEntryCount,
    };
  }

  /** Hook for stores backed by durable storage */
  protected ensureLoaded(): void {}
}

// ── JSON file store ────────────────────────────────────

/**
 * File-backed cache. Read in full on first use, rewritten in full on save()
 * through a temp file + rename. A corrupt file is logged and treated as an
 * empty cache; it is replaced on the next successful save.
 */
export class FileGreeksCache extends MemoryGreeksCache {
  readonly filePath: string;
  private loaded = false;

  constructor(filePath: string, options: GreeksCacheOptions = {}) {
    super(options);
    this.filePath = path.resolve(filePath);
  }

  /** Drop in-memory state and read the file again */
  reload(): void {
    this.loaded = false;
    this.ensureLoaded();
  }

  save(): void {
    this.ensureLoaded();
    const stamp = this.now();

    const file: CacheFile = {
      version: 1,
      lastUpdated: stamp.toISOString(),
      entries: {},
    };
    for (const [key, record] of this.records) {
      file.entries[key] = {
        identity: { ...record.identity },
        ...record.greeks,
        capturedAt: new Date(record.capturedAtMs).toISOString(),
      };
    }

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmpFile = `${this.filePath}.tmp`;
      fs.writeFileSync(tmpFile, JSON.stringify(file, null, 2), "utf-8");
      fs.renameSync(tmpFile, this.filePath);
    } catch (err) {
      throw new CachePersistenceError(this.filePath, err);
    }

    this.lastUpdated = stamp;
    this.log.info(`Saved Greeks cache: ${this.records.size} records`);
  }

  describe(): CacheInfo {
    return { ...super.describe(), filePath: this.filePath };
  }

  protected ensureLoaded(): void {
    if (this.loaded) return;
    this.loaded = true;
    this.records = new Map();
    this.lastUpdated = null;

    if (!fs.existsSync(this.filePath)) {
      this.log.info(`No Greeks cache file at ${this.filePath}`);
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      this.log.warn(`Greeks cache ${this.filePath} is unreadable, treating as empty: ${err}`);
      return;
    }

    const result = CacheFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      this.log.warn(
        `Greeks cache ${this.filePath} is corrupt, treating as empty: ` +
        `${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid format"}`
      );
      return;
    }

    const nowMs = this.now().getTime();
    let dropped = 0;
    for (const entry of Object.values(result.data.entries)) {
      const capturedAtMs = Date.parse(entry.capturedAt);
      if (capturedAtMs > nowMs) {
        dropped++;
        continue;
      }
      const { identity, capturedAt: _capturedAt, ...greeks } = entry;
      const key = optionKey(identity);
      const existing = this.records.get(key);
      if (existing && existing.capturedAtMs >= capturedAtMs) continue;
      this.records.set(key, {
        identity: Object.freeze({ ...identity }),
        greeks,
        capturedAtMs,
      });
    }

    if (dropped > 0) {
      this.log.warn(`Dropped ${dropped} cached Greeks stamped in the future`);
    }
    this.lastUpdated = new Date(result.data.lastUpdated);
    this.log.info(`Loaded Greeks cache: ${this.records.size} records`);
  }
}

// ── Helpers ────────────────────────────────────────────

function toSnapshot(record: StoredRecord): GreeksSnapshot {
  return {
    ...record.greeks,
    identity: record.identity,
    capturedAt: new Date(record.capturedAtMs),
    source: "cache",
  };
}
