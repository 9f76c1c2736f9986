import type { EventBus } from "./event-bus.js";
import type { IdentityResolver } from "./identity.js";
import type { ParticipantSession, PresenceDelta, PresenceEventMap, SessionStore } from "./types.js";

/** Writes presence transitions to the session table, keyed by correlation id. */
export class SessionPersistence {
  constructor(
    private readonly sessions: SessionStore,
    private readonly identities: IdentityResolver,
  ) {}

  register(bus: EventBus<PresenceEventMap>): void {
    bus.on("presence.changed", "session-persistence", (delta) => this.persistDelta(delta));
    bus.on("realm.down", "session-persistence", (event) =>
      this.persistDelta({
        realmId: event.realmId,
        joined: new Set(),
        left: event.disconnected,
        timestampMs: event.timestampMs,
      }),
    );
    bus.on("presence.refreshed", "session-persistence", (event) =>
      this.sessions.touch(event.realmId, Array.from(event.online), event.timestampMs),
    );
  }

  async persistDelta(delta: PresenceDelta): Promise<void> {
    const rows: ParticipantSession[] = [];
    for (const participantId of delta.joined) {
      rows.push(this.row(delta, participantId, true));
    }
    for (const participantId of delta.left) {
      rows.push(this.row(delta, participantId, false));
    }
    if (rows.length > 0) {
      await this.sessions.upsertMany(rows);
    }
  }

  private row(delta: PresenceDelta, participantId: string, online: boolean): ParticipantSession {
    return {
      correlationId: this.identities.resolve(delta.realmId, participantId),
      realmId: delta.realmId,
      participantId,
      online,
      lastSeenMs: delta.timestampMs,
    };
  }
}
