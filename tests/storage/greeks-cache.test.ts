/**
 * Greeks Cache Tests
 *
 * Expiry horizon, write ordering and the JSON file round trip.
 */

import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  FileGreeksCache,
  MemoryGreeksCache,
} from "../../src/storage/greeks-cache.js";
import { CachePersistenceError } from "../../src/utils/errors.js";
import { optionKey } from "../../src/utils/validation.js";
import type { GreeksSnapshot, OptionIdentity } from "../../src/types/options.js";
import { createLog, greeks, HOUR_MS, option } from "../helpers/fixtures.js";

const T0 = new Date("2026-03-02T15:00:00.000Z");

const aapl = option("AAPL", 150, "C");
const msft = option("MSFT", 400, "P");

function snapshot(identity: OptionIdentity, delta: number, capturedAt: Date): GreeksSnapshot {
  return { identity, ...greeks(delta), capturedAt, source: "live" };
}

/** Clock that tests can move forward */
function clock(start: Date) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("MemoryGreeksCache", () => {
  let time: ReturnType<typeof clock>;
  let cache: MemoryGreeksCache;

  beforeEach(() => {
    time = clock(T0);
    cache = new MemoryGreeksCache({ now: time.now, log: createLog() });
  });

  it("returns a stored snapshot marked as cached", () => {
    cache.put(aapl, snapshot(aapl, 0.55, T0));

    const cached = cache.get(aapl);
    expect(cached?.delta).toBe(0.55);
    expect(cached?.source).toBe("cache");
    expect(cached?.capturedAt.getTime()).toBe(T0.getTime());
    expect(cached?.identity).toEqual(aapl);
  });

  it("returns undefined for an unknown identity", () => {
    expect(cache.get(aapl)).toBeUndefined();
    expect(cache.inspect(aapl)).toBeUndefined();
  });

  describe("expiry", () => {
    it("serves a snapshot just under 48 hours old in full", () => {
      cache.put(aapl, snapshot(aapl, 0.55, T0));
      time.advance(48 * HOUR_MS - 1);

      expect(cache.get(aapl)?.delta).toBe(0.55);
      expect(cache.loadAll().size).toBe(1);
    });

    it("treats a snapshot of exactly 48 hours as absent", () => {
      cache.put(aapl, snapshot(aapl, 0.55, T0));
      time.advance(48 * HOUR_MS);

      expect(cache.get(aapl)).toBeUndefined();
      expect(cache.loadAll().size).toBe(0);
    });

    it("keeps expired records inspectable", () => {
      cache.put(aapl, snapshot(aapl, 0.55, T0));
      time.advance(50 * HOUR_MS);

      const inspection = cache.inspect(aapl);
      expect(inspection?.expired).toBe(true);
      expect(inspection?.ageHours).toBe(50);
      expect(inspection?.snapshot.delta).toBe(0.55);
    });

    it("honours a custom horizon", () => {
      cache = new MemoryGreeksCache({ now: time.now, maxAgeHours: 1, log: createLog() });
      cache.put(aapl, snapshot(aapl, 0.55, T0));
      time.advance(HOUR_MS);

      expect(cache.get(aapl)).toBeUndefined();
    });
  });

  describe("put", () => {
    it("overwrites with a newer capture", () => {
      cache.put(aapl, snapshot(aapl, 0.55, T0));
      time.advance(HOUR_MS);

      expect(cache.put(aapl, snapshot(aapl, 0.6, time.now()))).toBe(true);
      expect(cache.get(aapl)?.delta).toBe(0.6);
    });

    it("keeps the stored record when the incoming capture is older", () => {
      time.advance(HOUR_MS);
      cache.put(aapl, snapshot(aapl, 0.6, time.now()));

      expect(cache.put(aapl, snapshot(aapl, 0.55, T0))).toBe(false);
      expect(cache.get(aapl)?.delta).toBe(0.6);
    });

    it("rejects a capture time in the future", () => {
      const future = new Date(T0.getTime() + 1);

      expect(() => cache.put(aapl, snapshot(aapl, 0.55, future))).toThrow(RangeError);
      expect(cache.get(aapl)).toBeUndefined();
    });

    it("rejects an invalid capture time", () => {
      expect(() => cache.put(aapl, snapshot(aapl, 0.55, new Date(Number.NaN)))).toThrow(RangeError);
    });
  });

  it("loadAll keys snapshots by option key and skips expired ones", () => {
    cache.put(aapl, snapshot(aapl, 0.55, T0));
    time.advance(49 * HOUR_MS);
    cache.put(msft, snapshot(msft, -0.3, time.now()));

    const all = cache.loadAll();
    expect(Array.from(all.keys())).toEqual([optionKey(msft)]);
  });

  it("describes record counts and the last save", () => {
    cache.put(aapl, snapshot(aapl, 0.55, T0));
    cache.save();
    time.advance(49 * HOUR_MS);
    cache.put(msft, snapshot(msft, -0.3, time.now()));

    expect(cache.describe()).toEqual({
      lastUpdated: T0,
      ageHours: 49,
      entryCount: 2,
      validEntryCount: 1,
    });
  });
});

describe("FileGreeksCache", () => {
  let dir: string;
  let filePath: string;
  let time: ReturnType<typeof clock>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "greeks-cache-"));
    filePath = path.join(dir, "data", "greeks-cache.json");
    time = clock(T0);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function openCache(log = createLog()) {
    return new FileGreeksCache(filePath, { now: time.now, log });
  }

  it("round-trips records through the file", () => {
    const cache = openCache();
    cache.put(aapl, snapshot(aapl, 0.55, T0));
    cache.put(msft, snapshot(msft, -0.3, T0));
    cache.save();

    time.advance(10 * HOUR_MS);
    const reopened = openCache();
    const cached = reopened.get(aapl);

    expect(cached?.delta).toBe(0.55);
    expect(cached?.gamma).toBe(0.02);
    expect(cached?.capturedAt.toISOString()).toBe(T0.toISOString());
    expect(reopened.loadAll().size).toBe(2);
    expect(reopened.describe()).toEqual({
      filePath,
      lastUpdated: T0,
      ageHours: 10,
      entryCount: 2,
      validEntryCount: 2,
    });
  });

  it("writes the versioned file format without leaving a temp file", () => {
    const cache = openCache();
    cache.put(aapl, snapshot(aapl, 0.55, T0));
    cache.save();

    const written = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    expect(written).toEqual({
      version: 1,
      lastUpdated: T0.toISOString(),
      entries: {
        [optionKey(aapl)]: {
          identity: aapl,
          delta: 0.55,
          gamma: 0.02,
          theta: -0.05,
          vega: 0.12,
          capturedAt: T0.toISOString(),
        },
      },
    });
    expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
  });

  it("keeps expired records on disk until superseded", () => {
    const cache = openCache();
    cache.put(aapl, snapshot(aapl, 0.55, T0));
    time.advance(50 * HOUR_MS);
    cache.put(msft, snapshot(msft, -0.3, time.now()));
    cache.save();

    const written = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    expect(Object.keys(written.entries).sort()).toEqual(
      [optionKey(aapl), optionKey(msft)].sort()
    );
  });

  it("starts empty when the file does not exist", () => {
    const log = createLog();
    const cache = openCache(log);

    expect(cache.loadAll().size).toBe(0);
    expect(log.warn).not.toHaveBeenCalled();
    expect(log.info).toHaveBeenCalledWith(`No Greeks cache file at ${filePath}`);
  });

  it("treats a file that is not JSON as empty and warns", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "{ not json", "utf-8");
    const log = createLog();

    const cache = openCache(log);

    expect(cache.loadAll().size).toBe(0);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it("treats a file with the wrong shape as empty and warns", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({ timestamp: "yesterday", greeks: {} }), "utf-8");
    const log = createLog();

    const cache = openCache(log);

    expect(cache.get(aapl)).toBeUndefined();
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it("replaces a corrupt file on the next save", () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "garbage", "utf-8");

    const cache = openCache();
    cache.put(aapl, snapshot(aapl, 0.55, T0));
    cache.save();

    expect(openCache().get(aapl)?.delta).toBe(0.55);
  });

  it("drops entries stamped in the future on load", () => {
    const future = new Date(T0.getTime() + HOUR_MS);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify({
      version: 1,
      lastUpdated: T0.toISOString(),
      entries: {
        [optionKey(aapl)]: { identity: aapl, ...greeks(0.55), capturedAt: future.toISOString() },
        [optionKey(msft)]: { identity: msft, ...greeks(-0.3), capturedAt: T0.toISOString() },
      },
    }), "utf-8");
    const log = createLog();

    const cache = openCache(log);

    expect(cache.inspect(aapl)).toBeUndefined();
    expect(cache.get(msft)?.delta).toBe(-0.3);
    expect(log.warn).toHaveBeenCalledWith("Dropped 1 cached Greeks stamped in the future");
  });

  it("throws CachePersistenceError when the destination cannot be written", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "", "utf-8");
    filePath = path.join(blocker, "greeks-cache.json");

    const cache = openCache();
    cache.put(aapl, snapshot(aapl, 0.55, T0));

    expect(() => cache.save()).toThrow(CachePersistenceError);
    try {
      cache.save();
    } catch (err) {
      expect(err).toBeInstanceOf(CachePersistenceError);
      if (err instanceof CachePersistenceError) {
        expect(err.filePath).toBe(filePath);
      }
    }
  });

  it("reload() picks up changes written by another instance", () => {
    const reader = openCache();
    expect(reader.get(aapl)).toBeUndefined();

    const writer = openCache();
    writer.put(aapl, snapshot(aapl, 0.55, T0));
    writer.save();

    reader.reload();
    expect(reader.get(aapl)?.delta).toBe(0.55);
  });
});
