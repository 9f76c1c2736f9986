import type { IdentityResolver } from "./identity.js";
import type { SessionStore } from "./types.js";

export interface RecoveryResult {
  correctedOffline: number;
  restoredOnline: number;
}

export class PresenceStateStore {
  private readonly online = new Map<string, Set<string>>();

  current(realmId: string): ReadonlySet<string> {
    return new Set(this.online.get(realmId) ?? []);
  }

  count(realmId: string): number {
    return this.online.get(realmId)?.size ?? 0;
  }

  apply(realmId: string, joined: Iterable<string>, left: Iterable<string>): void {
    let members = this.online.get(realmId);
    if (!members) {
      members = new Set();
      this.online.set(realmId, members);
    }
    for (const participantId of left) {
      members.delete(participantId);
    }
    for (const participantId of joined) {
      members.add(participantId);
    }
    if (members.size === 0) {
      this.online.delete(realmId);
    }
  }

  /** Empties the realm and returns who was online. */
  clear(realmId: string): ReadonlySet<string> {
    const members = this.online.get(realmId) ?? new Set<string>();
    this.online.delete(realmId);
    return members;
  }

  listRealmIds(): string[] {
    return Array.from(this.online.keys());
  }

  /**
   * Rebuilds memory from durable rows. Rows still flagged online but not seen
   * within the grace window are presumed lost across a restart and flipped
   * offline before anything is loaded.
   */
  async initialize(
    sessions: SessionStore,
    identities: IdentityResolver,
    graceMs: number,
    nowMs = Date.now(),
  ): Promise<RecoveryResult> {
    const correctedOffline = await sessions.markStaleOffline(nowMs - graceMs);
    const rows = await sessions.listOnline();
    for (const row of rows) {
      identities.seed(row.realmId, row.participantId, row.correlationId);
      this.apply(row.realmId, [row.participantId], []);
    }
    return { correctedOffline, restoredOnline: rows.length };
  }
}
