import { afterEach, describe, expect, it } from "vitest";
import { IdentityResolver } from "../src/identity.js";
import { PresenceStateStore } from "../src/presence-store.js";
import { memoryStores } from "./fakes.js";

const MINUTE = 60_000;

describe("PresenceStateStore", () => {
  const opened: Array<{ close: () => void }> = [];

  afterEach(() => {
    while (opened.length > 0) {
      opened.pop()?.close();
    }
  });

  it("applies joins and leaves and drops empty realms", () => {
    const store = new PresenceStateStore();
    store.apply("realm-1", ["a", "b"], []);
    store.apply("realm-1", ["c"], ["a"]);

    expect(Array.from(store.current("realm-1")).sort()).toEqual(["b", "c"]);
    expect(store.count("realm-1")).toBe(2);

    store.apply("realm-1", [], ["b", "c"]);
    expect(store.count("realm-1")).toBe(0);
    expect(store.listRealmIds()).toEqual([]);
  });

  it("hands out copies of the online set", () => {
    const store = new PresenceStateStore();
    store.apply("realm-1", ["a"], []);

    const snapshot = store.current("realm-1");
    store.apply("realm-1", ["b"], []);

    expect(snapshot.size).toBe(1);
  });

  it("clear returns who was online", () => {
    const store = new PresenceStateStore();
    store.apply("realm-1", ["a", "b"], []);

    expect(Array.from(store.clear("realm-1")).sort()).toEqual(["a", "b"]);
    expect(store.count("realm-1")).toBe(0);
    expect(store.clear("realm-1").size).toBe(0);
  });

  it("flips long-unseen sessions offline before restoring the rest", async () => {
    const stores = memoryStores();
    opened.push(stores);
    const now = 100 * MINUTE;
    await stores.sessions.upsertMany([
      { correlationId: "c-old", realmId: "realm-1", participantId: "old", online: true, lastSeenMs: now - 10 * MINUTE },
      { correlationId: "c-new", realmId: "realm-1", participantId: "new", online: true, lastSeenMs: now - MINUTE },
      { correlationId: "c-gone", realmId: "realm-2", participantId: "gone", online: false, lastSeenMs: now },
    ]);

    const store = new PresenceStateStore();
    const identities = new IdentityResolver();
    const result = await store.initialize(stores.sessions, identities, 5 * MINUTE, now);

    expect(result).toEqual({ correctedOffline: 1, restoredOnline: 1 });
    expect(Array.from(store.current("realm-1"))).toEqual(["new"]);
    expect(store.count("realm-2")).toBe(0);
    expect(identities.resolve("realm-1", "new")).toBe("c-new");
    expect((await stores.sessions.get("c-old"))?.online).toBe(false);
  });
});
