import type { AdmissionGate } from "./admission-gate.js";
import type { DisplayNameSource, Logger } from "./types.js";

interface CacheEntry<V> {
  value: V;
  expiresAtMs: number;
}

export class TimedCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();

  constructor(private readonly ttlMs: number) {}

  get(key: K, nowMs = Date.now()): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAtMs <= nowMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V, nowMs = Date.now()): void {
    this.entries.set(key, { value, expiresAtMs: nowMs + this.ttlMs });
  }

  prune(nowMs = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAtMs <= nowMs) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface ResolveOptions {
  bypassCacheFor?: ReadonlySet<string>;
  nowMs?: number;
}

/**
 * Turns participant ids into something readable. Names seen in snapshots are
 * cached; misses are fetched in one batch and anything still unknown falls
 * back to the raw id. Lookups hit the same upstream as polls, so they share
 * the poll admission gate when one is given.
 */
export class DisplayNameDirectory {
  private readonly cache: TimedCache<string, string>;

  constructor(
    ttlMs: number,
    private readonly source: DisplayNameSource | undefined,
    private readonly log: Logger,
    private readonly gate?: AdmissionGate,
  ) {
    this.cache = new TimedCache(ttlMs);
  }

  remember(participantId: string, displayName: string, nowMs = Date.now()): void {
    this.cache.set(participantId, displayName, nowMs);
  }

  async resolve(
    realmId: string,
    participantIds: Iterable<string>,
    options: ResolveOptions = {},
  ): Promise<Map<string, string>> {
    const nowMs = options.nowMs ?? Date.now();
    const names = new Map<string, string>();
    const misses: string[] = [];

    for (const participantId of participantIds) {
      const cached = options.bypassCacheFor?.has(participantId) ? undefined : this.cache.get(participantId, nowMs);
      if (cached !== undefined) {
        names.set(participantId, cached);
      } else {
        misses.push(participantId);
      }
    }

    const source = this.source;
    if (misses.length > 0 && source) {
      const lookup = () => source.fetchDisplayNames(realmId, misses);
      try {
        const fetched = await (this.gate ? this.gate.run(lookup) : lookup());
        for (const [participantId, displayName] of fetched) {
          this.cache.set(participantId, displayName, nowMs);
          names.set(participantId, displayName);
        }
      } catch (error) {
        this.log.warn({ err: error, realmId, count: misses.length }, "display name lookup failed");
      }
    }

    for (const participantId of misses) {
      if (!names.has(participantId)) {
        names.set(participantId, this.cache.get(participantId, nowMs) ?? participantId);
      }
    }
    return names;
  }

  prune(nowMs = Date.now()): number {
    return this.cache.prune(nowMs);
  }
}
