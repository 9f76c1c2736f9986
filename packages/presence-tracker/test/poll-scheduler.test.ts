import { afterEach, describe, expect, it, vi } from "vitest";
import { InvariantViolationError } from "../src/errors.js";
import { PresenceTracker, type TrackerConfig } from "../src/tracker.js";
import type { PresenceSource } from "../src/types.js";
import {
  GatedSource,
  makeDestination,
  memoryStores,
  RecordingDelivery,
  ScriptedSource,
  silentLogger,
  snapshot,
  UNREACHABLE,
} from "./fakes.js";

const HOUR = 60 * 60 * 1000;

const config: TrackerConfig = {
  pollIntervalSec: 60,
  pollConcurrency: 2,
  channelFailureLimit: 3,
  realmMissingFailureLimit: 7,
  offlineRoleFailureLimit: 3,
  staleAfterHours: 24,
  offlineGraceSec: 300,
  displayNameTtlSec: 3600,
};

describe("PollScheduler", () => {
  const opened: Array<{ close: () => void }> = [];
  let clock = 0;

  afterEach(() => {
    clock = 0;
    while (opened.length > 0) {
      opened.pop()?.close();
    }
  });

  function setup(source: PresenceSource, onFatal?: (error: unknown) => void) {
    const stores = memoryStores();
    opened.push(stores);
    const delivery = new RecordingDelivery();
    const tracker = new PresenceTracker({
      config,
      stores,
      source,
      delivery,
      log: silentLogger(),
      now: () => clock,
      onFatal,
    });
    return { stores, delivery, tracker };
  }

  it("skips a realm whose previous cycle is still running", async () => {
    const source = new GatedSource();
    const { tracker } = setup(source);
    tracker.scheduler.track("realm-1");

    const first = tracker.scheduler.runCycle("realm-1");
    const second = await tracker.scheduler.runCycle("realm-1");
    expect(second).toEqual({ status: "skipped", realmId: "realm-1" });
    expect(tracker.scheduler.isPolling("realm-1")).toBe(true);

    await vi.waitFor(() => expect(source.waiting).toBe(1));
    source.releaseAll(snapshot("a"));

    expect(await first).toEqual({
      status: "completed",
      realmId: "realm-1",
      reachable: true,
      joined: ["a"],
      left: [],
      stale: false,
      dropped: false,
    });
    expect(source.polls).toEqual(["realm-1"]);
    expect(tracker.scheduler.isPolling("realm-1")).toBe(false);
  });

  it("announces an outage once per transition", async () => {
    const source = new ScriptedSource().script("realm-1", UNREACHABLE, UNREACHABLE, UNREACHABLE, snapshot(), UNREACHABLE);
    const { stores, delivery, tracker } = setup(source);
    await stores.destinations.save(makeDestination({ offlineRoleId: "role-1" }));
    await tracker.initialize();
    const downs: number[] = [];
    tracker.bus.on("realm.down", "test", (event) => {
      downs.push(event.timestampMs);
    });

    for (let cycle = 1; cycle <= 5; cycle += 1) {
      clock = cycle;
      await tracker.scheduler.runCycle("realm-1");
    }

    expect(downs).toEqual([1, 5]);
    expect(delivery.sent.filter((entry) => entry.message.title === "Realm Offline")).toHaveLength(2);
    expect(tracker.offline.isOffline("realm-1")).toBe(true);
  });

  it("reports people who were online when the realm went down", async () => {
    const source = new ScriptedSource().script("realm-1", snapshot("a", "b"), UNREACHABLE);
    const { stores, tracker } = setup(source);
    await stores.destinations.save(makeDestination());
    await tracker.initialize();

    await tracker.scheduler.runCycle("realm-1");
    const result = await tracker.scheduler.runCycle("realm-1");

    expect(result).toMatchObject({ status: "completed", reachable: false, left: ["a", "b"] });
    expect(tracker.presence.count("realm-1")).toBe(0);
  });

  it("reports restored participants as left when the realm was already down", async () => {
    const source = new ScriptedSource().script("realm-1", UNREACHABLE);
    const { stores, tracker } = setup(source);
    await stores.destinations.save(makeDestination());
    await stores.offlineMarkers.add("realm-1", 0);
    await stores.sessions.upsertMany([
      { correlationId: "c-a", realmId: "realm-1", participantId: "a", online: true, lastSeenMs: 0 },
    ]);
    await tracker.initialize();
    const downs: number[] = [];
    const left: string[][] = [];
    tracker.bus.on("realm.down", "test", (event) => {
      downs.push(event.timestampMs);
    });
    tracker.bus.on("presence.changed", "test", (delta) => {
      left.push(Array.from(delta.left));
    });

    clock = 1;
    const result = await tracker.scheduler.runCycle("realm-1");

    expect(result).toMatchObject({ status: "completed", reachable: false, left: ["a"] });
    expect(downs).toEqual([]);
    expect(left).toEqual([["a"]]);
    expect(await stores.sessions.listOnline()).toEqual([]);
  });

  it("leaves state alone when a poll fails transiently", async () => {
    const source = new ScriptedSource().script("realm-1", snapshot("a"), new Error("timeout"));
    const { tracker } = setup(source);
    tracker.scheduler.track("realm-1");

    await tracker.scheduler.runCycle("realm-1");
    const result = await tracker.scheduler.runCycle("realm-1");

    expect(result).toEqual({ status: "failed", realmId: "realm-1", error: "timeout" });
    expect(Array.from(tracker.presence.current("realm-1"))).toEqual(["a"]);
    expect(tracker.offline.isOffline("realm-1")).toBe(false);
  });

  it("drops a stale realm that has nowhere left to deliver", async () => {
    const source = new ScriptedSource().script("realm-1", snapshot());
    const { stores, tracker } = setup(source);
    await stores.destinations.save(makeDestination({ channelUrl: null, liveUpdates: false }));
    await tracker.initialize();
    const dropped: string[] = [];
    tracker.bus.on("realm.dropped", "test", (event) => {
      dropped.push(event.realmId);
    });

    clock = 0;
    await tracker.scheduler.runCycle("realm-1");
    clock = 24 * HOUR;
    const result = await tracker.scheduler.runCycle("realm-1");

    expect(result).toMatchObject({ status: "completed", stale: true, dropped: true });
    expect(dropped).toEqual(["realm-1"]);
    expect(source.unsubscribed).toEqual(["realm-1"]);
    expect(tracker.scheduler.isDropped("realm-1")).toBe(true);
    expect(tracker.scheduler.isTracked("realm-1")).toBe(false);
  });

  it("keeps a stale realm while a destination can still be warned", async () => {
    const source = new ScriptedSource().script("realm-1", snapshot());
    const { stores, delivery, tracker } = setup(source);
    await stores.destinations.save(makeDestination());
    await tracker.initialize();

    clock = 0;
    await tracker.scheduler.runCycle("realm-1");
    clock = 24 * HOUR;
    const result = await tracker.scheduler.runCycle("realm-1");

    expect(result).toMatchObject({ status: "completed", stale: true, dropped: false });
    expect(delivery.sent.map((entry) => entry.message.title)).toEqual(["Warning"]);
    expect(tracker.scheduler.isTracked("realm-1")).toBe(true);
  });

  it("polls every tracked realm on a tick", async () => {
    const source = new ScriptedSource()
      .script("realm-1", snapshot("a"))
      .script("realm-2", snapshot("b"));
    const { stores, tracker } = setup(source);
    await stores.destinations.save(makeDestination());
    await stores.destinations.save(makeDestination({ destinationId: "dest-2", realmId: "realm-2" }));

    const results = await tracker.scheduler.tick();

    expect(results.map((result) => result.realmId).sort()).toEqual(["realm-1", "realm-2"]);
    expect(source.polls.sort()).toEqual(["realm-1", "realm-2"]);
  });

  it("ticks on the poll interval until stopped", async () => {
    vi.useFakeTimers();
    try {
      const source = new ScriptedSource().script("realm-1", snapshot("a"));
      const { stores, tracker } = setup(source);
      await stores.destinations.save(makeDestination());

      tracker.start();
      await vi.advanceTimersByTimeAsync(59_000);
      expect(source.polls).toEqual([]);

      await vi.advanceTimersByTimeAsync(1_000);
      await vi.waitFor(() => expect(source.polls).toEqual(["realm-1"]));

      await tracker.stop();
      await vi.advanceTimersByTimeAsync(120_000);
      expect(source.polls).toEqual(["realm-1"]);
    } finally {
      vi.useRealTimers();
    }
  });

  it("escalates invariant violations to the fatal handler", async () => {
    const source = new ScriptedSource().script("realm-1", snapshot("a"));
    const fatal: unknown[] = [];
    const { tracker } = setup(source, (error) => {
      fatal.push(error);
    });
    tracker.scheduler.track("realm-1");
    tracker.bus.on("presence.changed", "corrupt", () => {
      throw new InvariantViolationError("broken");
    });

    await expect(tracker.scheduler.runCycle("realm-1")).rejects.toThrow(InvariantViolationError);
    expect(fatal).toHaveLength(1);
    expect(tracker.scheduler.isPolling("realm-1")).toBe(false);
  });

  it("retries a realm after a store error instead of shutting down", async () => {
    const source = new ScriptedSource().script("realm-1", snapshot("a"));
    const fatal: unknown[] = [];
    const { stores, tracker } = setup(source, (error) => {
      fatal.push(error);
    });
    await stores.destinations.save(makeDestination());
    tracker.scheduler.track("realm-1");
    const reset = vi.spyOn(stores.failureCounters, "reset").mockRejectedValue(new Error("SQLITE_BUSY: database is locked"));

    const failed = await tracker.scheduler.runCycle("realm-1");
    reset.mockRestore();

    expect(failed).toEqual({ status: "failed", realmId: "realm-1", error: "SQLITE_BUSY: database is locked" });
    expect(fatal).toEqual([]);
    expect(tracker.scheduler.isPolling("realm-1")).toBe(false);
    expect(tracker.scheduler.isTracked("realm-1")).toBe(true);
    expect(await tracker.scheduler.runCycle("realm-1")).toMatchObject({ status: "completed" });
  });

  it("forgets a realm only after its running cycle settles", async () => {
    const source = new GatedSource();
    const { tracker } = setup(source);
    tracker.scheduler.track("realm-1");

    const cycle = tracker.scheduler.runCycle("realm-1");
    await vi.waitFor(() => expect(source.waiting).toBe(1));
    let forgotten = false;
    const untracked = tracker.scheduler.untrack("realm-1").then(() => {
      forgotten = true;
    });
    await Promise.resolve();

    expect(forgotten).toBe(false);
    expect(tracker.scheduler.isTracked("realm-1")).toBe(false);

    source.releaseAll(snapshot("a"));
    await cycle;
    await untracked;

    expect(forgotten).toBe(true);
    expect(tracker.presence.count("realm-1")).toBe(0);
  });
});
