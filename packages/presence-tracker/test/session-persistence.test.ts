import { afterEach, describe, expect, it } from "vitest";
import { IdentityResolver } from "../src/identity.js";
import { SessionPersistence } from "../src/session-persistence.js";
import { memoryStores } from "./fakes.js";

describe("SessionPersistence", () => {
  const opened: Array<{ close: () => void }> = [];

  afterEach(() => {
    while (opened.length > 0) {
      opened.pop()?.close();
    }
  });

  it("writes joined rows online and left rows offline", async () => {
    const stores = memoryStores();
    opened.push(stores);
    const identities = new IdentityResolver();
    const persistence = new SessionPersistence(stores.sessions, identities);

    await persistence.persistDelta({ realmId: "realm-1", joined: new Set(["a", "b"]), left: new Set(), timestampMs: 10 });
    await persistence.persistDelta({ realmId: "realm-1", joined: new Set(), left: new Set(["a"]), timestampMs: 20 });

    expect(await stores.sessions.get(identities.resolve("realm-1", "a"))).toEqual({
      correlationId: identities.resolve("realm-1", "a"),
      realmId: "realm-1",
      participantId: "a",
      online: false,
      lastSeenMs: 20,
    });
    expect((await stores.sessions.listOnline()).map((row) => row.participantId)).toEqual(["b"]);
  });

  it("keeps separate rows for pairs whose ids contain hyphens", async () => {
    const stores = memoryStores();
    opened.push(stores);
    const persistence = new SessionPersistence(stores.sessions, new IdentityResolver());

    await persistence.persistDelta({ realmId: "realm-1", joined: new Set(["x"]), left: new Set(), timestampMs: 10 });
    await persistence.persistDelta({ realmId: "realm", joined: new Set(), left: new Set(["1-x"]), timestampMs: 20 });

    const online = await stores.sessions.listOnline();
    expect(online.map((row) => [row.realmId, row.participantId])).toEqual([["realm-1", "x"]]);
  });
});
