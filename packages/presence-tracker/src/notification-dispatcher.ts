import type { DestinationConfig, FailureClass } from "@realm-presence/presence-contracts";
import type { DisplayNameDirectory } from "./display-names.js";
import { ChannelMissingError, DeliveryPermissionError, EntitlementLostError } from "./errors.js";
import type { EventBus } from "./event-bus.js";
import type { InvalidationPolicy } from "./invalidation-policy.js";
import { renderRealmOffline, renderRealmUnlinked, renderRosterChange, renderStaleWarning } from "./messages.js";
import type { PresenceStateStore } from "./presence-store.js";
import type {
  DeliveryClient,
  DestinationStore,
  Logger,
  PresenceDelta,
  PresenceEventMap,
  RealmDownEvent,
  RealmStaleEvent,
  RenderedMessage,
} from "./types.js";

export interface NotificationDispatcherDeps {
  destinations: DestinationStore;
  delivery: DeliveryClient;
  policy: InvalidationPolicy;
  names: DisplayNameDirectory;
  presence: PresenceStateStore;
  log: Logger;
  staleAfterHours: number;
}

function mentionsRoles(message: RenderedMessage): boolean {
  return (message.mentionRoles?.length ?? 0) > 0;
}

export type DeliveryOutcome = "delivered" | "failed" | "disabled";

export class NotificationDispatcher {
  constructor(private readonly deps: NotificationDispatcherDeps) {}

  register(bus: EventBus<PresenceEventMap>): void {
    bus.on("presence.changed", "notifications", (delta) => this.onPresenceChanged(delta));
    bus.on("realm.down", "notifications", (event) => this.onRealmDown(event));
    bus.on("realm.stale", "notifications", (event) => this.onRealmStale(event));
  }

  async onPresenceChanged(delta: PresenceDelta): Promise<void> {
    const { destinations, names, policy, presence } = this.deps;
    const live = (await destinations.listByRealm(delta.realmId)).filter((destination) => destination.liveUpdates);
    if (live.length === 0) {
      return;
    }

    const bypassCacheFor = live.some((destination) => destination.refreshNames) ? delta.joined : undefined;
    const resolved = await names.resolve(delta.realmId, [...delta.joined, ...delta.left], { bypassCacheFor });
    const message = renderRosterChange(delta, resolved, presence.count(delta.realmId));

    for (const destination of live) {
      if (!destination.entitled) {
        await policy.deactivateEntitlement(destination);
        continue;
      }
      if (!destination.channelUrl) {
        await policy.deactivateLiveUpdates(destination);
        continue;
      }
      await this.deliverTo(destination, message);
    }
  }

  async onRealmDown(event: RealmDownEvent): Promise<void> {
    // Roster updates are time sensitive, so they go out before the offline notices.
    if (event.disconnected.size > 0) {
      await this.onPresenceChanged({
        realmId: event.realmId,
        joined: new Set(),
        left: event.disconnected,
        timestampMs: event.timestampMs,
      });
    }

    for (const destination of await this.deps.destinations.listByRealm(event.realmId)) {
      if (!destination.channelUrl || !destination.offlineRoleId) {
        continue;
      }
      await this.deliverTo(destination, renderRealmOffline(event, destination.offlineRoleId));
    }
  }

  async onRealmStale(event: RealmStaleEvent): Promise<void> {
    const { destinations, policy, staleAfterHours } = this.deps;
    for (const destination of await destinations.listByRealm(event.realmId)) {
      if (!destination.channelUrl) {
        await policy.unlinkRealm(destination);
        continue;
      }
      if (!destination.warningNotifications) {
        continue;
      }

      const outcome = await policy.recordFailure(destination, "realm-missing");
      if (outcome.disabled) {
        await this.deliverTo(destination, renderRealmUnlinked(event.realmId, event.timestampMs));
        continue;
      }
      await this.deliverTo(destination, renderStaleWarning(event, staleAfterHours));
    }
  }

  async deliverTo(destination: DestinationConfig, message: RenderedMessage): Promise<DeliveryOutcome> {
    const { delivery, policy, log } = this.deps;
    try {
      await delivery.deliver(destination, message);
    } catch (error) {
      if (error instanceof EntitlementLostError) {
        await policy.deactivateEntitlement(destination);
        return "disabled";
      }
      if (error instanceof DeliveryPermissionError || error instanceof ChannelMissingError) {
        // A refused role ping counts against the role, not the channel; at the limit the role is cleared.
        const failureClass: FailureClass =
          error instanceof DeliveryPermissionError && mentionsRoles(message) ? "offline-role" : "channel";
        const outcome = await policy.recordFailure(destination, failureClass);
        log.warn(
          { err: error, destinationId: destination.destinationId, failureClass, failures: outcome.count },
          "destination rejected delivery",
        );
        return outcome.disabled ? "disabled" : "failed";
      }
      log.warn({ err: error, destinationId: destination.destinationId }, "delivery failed");
      return "failed";
    }

    await policy.recordSuccess(destination, "channel");
    if (mentionsRoles(message)) {
      await policy.recordSuccess(destination, "offline-role");
    }
    return "delivered";
  }
}
