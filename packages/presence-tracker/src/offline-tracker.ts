import type { OfflineMarkerStore } from "./types.js";

/**
 * Durable set of realms believed unreachable. Memory mirrors the store so
 * lookups stay synchronous; every transition is written through.
 */
export class OfflineRealmTracker {
  private readonly offline = new Set<string>();

  constructor(private readonly markers: OfflineMarkerStore) {}

  async load(): Promise<number> {
    this.offline.clear();
    for (const realmId of await this.markers.list()) {
      this.offline.add(realmId);
    }
    return this.offline.size;
  }

  isOffline(realmId: string): boolean {
    return this.offline.has(realmId);
  }

  /** Returns true only when the realm was not already marked. */
  async markOffline(realmId: string, nowMs = Date.now()): Promise<boolean> {
    if (this.offline.has(realmId)) {
      return false;
    }
    await this.markers.add(realmId, nowMs);
    this.offline.add(realmId);
    return true;
  }

  async markOnline(realmId: string): Promise<boolean> {
    if (!this.offline.has(realmId)) {
      return false;
    }
    await this.markers.remove(realmId);
    this.offline.delete(realmId);
    return true;
  }

  list(): string[] {
    return Array.from(this.offline);
  }
}
