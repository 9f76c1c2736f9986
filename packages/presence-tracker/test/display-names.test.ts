import { describe, expect, it } from "vitest";
import { AdmissionGate } from "../src/admission-gate.js";
import { DisplayNameDirectory, TimedCache } from "../src/display-names.js";
import type { DisplayNameSource } from "../src/types.js";
import { silentLogger, StaticNames } from "./fakes.js";

describe("TimedCache", () => {
  it("expires entries after the ttl", () => {
    const cache = new TimedCache<string, string>(100);
    cache.set("a", "Alice", 0);

    expect(cache.get("a", 99)).toBe("Alice");
    expect(cache.get("a", 100)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("prunes expired entries", () => {
    const cache = new TimedCache<string, string>(100);
    cache.set("a", "Alice", 0);
    cache.set("b", "Bob", 50);

    expect(cache.prune(120)).toBe(1);
    expect(cache.get("b", 120)).toBe("Bob");
  });
});

describe("DisplayNameDirectory", () => {
  it("serves remembered names and fetches only misses", async () => {
    const source = new StaticNames({ b: "Bob" });
    const directory = new DisplayNameDirectory(60_000, source, silentLogger());
    directory.remember("a", "Alice", 0);

    const names = await directory.resolve("realm-1", ["a", "b", "c"], { nowMs: 10 });

    expect(Object.fromEntries(names)).toEqual({ a: "Alice", b: "Bob", c: "c" });
    expect(source.requests).toEqual([["b", "c"]]);
  });

  it("bypasses the cache when asked", async () => {
    const source = new StaticNames({ a: "Alice Renamed" });
    const directory = new DisplayNameDirectory(60_000, source, silentLogger());
    directory.remember("a", "Alice", 0);

    const names = await directory.resolve("realm-1", ["a"], { bypassCacheFor: new Set(["a"]), nowMs: 10 });

    expect(names.get("a")).toBe("Alice Renamed");
  });

  it("falls back to cached names or ids when the lookup fails", async () => {
    const failing: DisplayNameSource = {
      fetchDisplayNames: async () => {
        throw new Error("lookup down");
      },
    };
    const directory = new DisplayNameDirectory(60_000, failing, silentLogger());
    directory.remember("a", "Alice", 0);

    const names = await directory.resolve("realm-1", ["a", "b"], { bypassCacheFor: new Set(["a"]), nowMs: 10 });

    expect(Object.fromEntries(names)).toEqual({ a: "Alice", b: "b" });
  });

  it("uses raw ids without a lookup source", async () => {
    const directory = new DisplayNameDirectory(60_000, undefined, silentLogger());

    const names = await directory.resolve("realm-1", ["x"]);

    expect(names.get("x")).toBe("x");
  });

  it("waits for a free admission slot before looking names up", async () => {
    const gate = new AdmissionGate(1);
    await gate.acquire();
    const source = new StaticNames({ a: "Alice" });
    const directory = new DisplayNameDirectory(60_000, source, silentLogger(), gate);

    const pending = directory.resolve("realm-1", ["a"], { nowMs: 0 });
    await Promise.resolve();

    expect(source.requests).toEqual([]);
    expect(gate.queued).toBe(1);

    gate.release();
    expect((await pending).get("a")).toBe("Alice");
    expect(gate.inFlight).toBe(0);
  });
});
