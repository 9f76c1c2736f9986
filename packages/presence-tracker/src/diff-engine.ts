import type { PresenceStateStore } from "./presence-store.js";
import type { PresenceDelta, RealmStaleEvent } from "./types.js";

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  const out = new Set<string>();
  for (const id of a) {
    if (!b.has(id)) {
      out.add(id);
    }
  }
  return out;
}

export class DiffEngine {
  private readonly lastDataAtMs = new Map<string, number>();
  private readonly lastStaleAtMs = new Map<string, number>();

  constructor(
    private readonly store: PresenceStateStore,
    private readonly staleAfterMs: number,
  ) {}

  /**
   * Diffs a fresh roster against the store. Only membership counts: whatever
   * per-poll tokens the source attaches to a participant are ignored.
   */
  observe(realmId: string, snapshot: Iterable<string>, timestampMs: number): PresenceDelta | null {
    const next = new Set(snapshot);
    if (next.size > 0) {
      this.lastDataAtMs.set(realmId, timestampMs);
      this.lastStaleAtMs.delete(realmId);
    }

    const previous = this.store.current(realmId);
    const joined = difference(next, previous);
    const left = difference(previous, next);
    if (joined.size === 0 && left.size === 0) {
      return null;
    }

    this.store.apply(realmId, joined, left);
    return { realmId, joined, left, timestampMs };
  }

  /** Everyone still held for the realm is recorded as gone. */
  observeUnreachable(realmId: string, timestampMs: number): PresenceDelta | null {
    const left = this.store.clear(realmId);
    if (left.size === 0) {
      return null;
    }
    return { realmId, joined: new Set(), left, timestampMs };
  }

  /**
   * Reports a realm that has produced no participants for `staleAfterMs`.
   * Fires at most once per window while the silence lasts.
   */
  checkStaleness(realmId: string, timestampMs: number): RealmStaleEvent | null {
    const lastDataAtMs = this.lastDataAtMs.get(realmId);
    if (lastDataAtMs === undefined) {
      this.lastDataAtMs.set(realmId, timestampMs);
      return null;
    }
    if (timestampMs - lastDataAtMs < this.staleAfterMs) {
      return null;
    }

    const lastStaleAtMs = this.lastStaleAtMs.get(realmId);
    if (lastStaleAtMs !== undefined && timestampMs - lastStaleAtMs < this.staleAfterMs) {
      return null;
    }
    this.lastStaleAtMs.set(realmId, timestampMs);
    return { realmId, lastDataAtMs, timestampMs };
  }

  forget(realmId: string): void {
    this.lastDataAtMs.delete(realmId);
    this.lastStaleAtMs.delete(realmId);
    this.store.clear(realmId);
  }
}
