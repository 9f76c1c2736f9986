import type { PresenceSocketOutbound } from "@realm-presence/presence-contracts";
import type { EventBus } from "./event-bus.js";
import type { OfflineRealmTracker } from "./offline-tracker.js";
import type { PresenceStateStore } from "./presence-store.js";
import type { PresenceDelta, PresenceEventMap } from "./types.js";

export interface FeedBinding {
  realmId: string;
  send: (message: PresenceSocketOutbound) => void;
  close: (code: number, reason: string) => void;
}

/** Live presence feed for websocket subscribers, one set of bindings per realm. */
export class PresenceSocketHub {
  private readonly bindings = new Set<FeedBinding>();

  constructor(
    private readonly presence: PresenceStateStore,
    private readonly offline: OfflineRealmTracker,
  ) {}

  register(bus: EventBus<PresenceEventMap>): void {
    bus.on("presence.changed", "presence-feed", (delta) => this.publishDelta(delta));
    bus.on("realm.down", "presence-feed", (event) => {
      if (event.disconnected.size > 0) {
        this.publishDelta({
          realmId: event.realmId,
          joined: new Set(),
          left: event.disconnected,
          timestampMs: event.timestampMs,
        });
      }
      this.broadcast(event.realmId, {
        type: "realm.status",
        realmId: event.realmId,
        status: "down",
        timestampMs: event.timestampMs,
      });
    });
    bus.on("realm.stale", "presence-feed", (event) => {
      this.broadcast(event.realmId, {
        type: "realm.status",
        realmId: event.realmId,
        status: "stale",
        timestampMs: event.timestampMs,
      });
    });
    bus.on("realm.dropped", "presence-feed", (event) => {
      this.broadcast(event.realmId, {
        type: "realm.status",
        realmId: event.realmId,
        status: "dropped",
        timestampMs: event.timestampMs,
      });
      for (const binding of this.forRealm(event.realmId)) {
        binding.close(4410, "realm_dropped");
      }
    });
  }

  attach(binding: FeedBinding): void {
    this.bindings.add(binding);
    this.sendSnapshot(binding);
  }

  detach(binding: FeedBinding): void {
    this.bindings.delete(binding);
  }

  sendSnapshot(binding: FeedBinding, nowMs = Date.now()): void {
    binding.send({
      type: "presence.snapshot",
      realmId: binding.realmId,
      online: Array.from(this.presence.current(binding.realmId)).sort(),
      offline: this.offline.isOffline(binding.realmId),
      timestampMs: nowMs,
    });
  }

  get size(): number {
    return this.bindings.size;
  }

  private publishDelta(delta: PresenceDelta): void {
    this.broadcast(delta.realmId, {
      type: "presence.delta",
      realmId: delta.realmId,
      joined: Array.from(delta.joined).sort(),
      left: Array.from(delta.left).sort(),
      onlineCount: this.presence.count(delta.realmId),
      timestampMs: delta.timestampMs,
    });
  }

  private broadcast(realmId: string, message: PresenceSocketOutbound): void {
    for (const binding of this.forRealm(realmId)) {
      binding.send(message);
    }
  }

  private forRealm(realmId: string): FeedBinding[] {
    return Array.from(this.bindings).filter((binding) => binding.realmId === realmId);
  }
}
