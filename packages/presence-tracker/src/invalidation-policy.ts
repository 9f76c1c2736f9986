import type { DestinationConfig, FailureClass } from "@realm-presence/presence-contracts";
import type { DestinationStore, FailureCounterStore, Logger } from "./types.js";

export type FailureLimits = Record<FailureClass, number>;

export interface FailureOutcome {
  count: number;
  disabled: boolean;
}

function deactivate(config: DestinationConfig, failureClass: FailureClass): DestinationConfig {
  switch (failureClass) {
    case "channel":
      return { ...config, channelUrl: null, liveUpdates: false };
    case "realm-missing":
      return { ...config, realmId: null, liveUpdates: false, refreshNames: false };
    case "offline-role":
      return { ...config, offlineRoleId: null };
  }
}

/**
 * Counts consecutive failures per destination and failure class and switches
 * features off once a class reaches its limit. Operators re-enable them by
 * saving the destination again.
 */
export class InvalidationPolicy {
  constructor(
    private readonly destinations: DestinationStore,
    private readonly counters: FailureCounterStore,
    private readonly limits: FailureLimits,
    private readonly log: Logger,
  ) {}

  limitFor(failureClass: FailureClass): number {
    return this.limits[failureClass];
  }

  async recordFailure(destination: DestinationConfig, failureClass: FailureClass): Promise<FailureOutcome> {
    const count = await this.counters.increment(destination.destinationId, failureClass);
    if (count < this.limits[failureClass]) {
      this.log.debug(
        { destinationId: destination.destinationId, failureClass, count },
        "recorded destination failure",
      );
      return { count, disabled: false };
    }

    await this.disable(destination.destinationId, failureClass);
    await this.counters.reset(destination.destinationId, failureClass);
    return { count, disabled: true };
  }

  async recordSuccess(destination: DestinationConfig, failureClass: FailureClass): Promise<void> {
    await this.counters.reset(destination.destinationId, failureClass);
  }

  /** The realm answered with data again, so every subscriber starts over. */
  async recordRealmData(realmId: string): Promise<void> {
    for (const destination of await this.destinations.listByRealm(realmId)) {
      await this.counters.reset(destination.destinationId, "realm-missing");
    }
  }

  /** Authoritative signal: switches premium features off without touching any counter. */
  async deactivateEntitlement(destination: DestinationConfig): Promise<void> {
    const current = await this.destinations.get(destination.destinationId);
    if (!current || (!current.liveUpdates && !current.refreshNames)) {
      return;
    }
    await this.destinations.save({ ...current, liveUpdates: false, refreshNames: false });
    this.log.info({ destinationId: destination.destinationId }, "entitlement lost, live features disabled");
  }

  async deactivateLiveUpdates(destination: DestinationConfig): Promise<void> {
    const current = await this.destinations.get(destination.destinationId);
    if (!current || !current.liveUpdates) {
      return;
    }
    await this.destinations.save({ ...current, liveUpdates: false });
    this.log.info({ destinationId: destination.destinationId }, "live updates disabled, no channel configured");
  }

  /** Detaches a destination that can no longer receive anything about its realm. */
  async unlinkRealm(destination: DestinationConfig): Promise<void> {
    const current = await this.destinations.get(destination.destinationId);
    if (!current || current.realmId === null) {
      return;
    }
    await this.destinations.save({ ...current, realmId: null, liveUpdates: false, refreshNames: false });
    this.log.info({ destinationId: destination.destinationId, realmId: current.realmId }, "destination unlinked from realm");
  }

  /** A realm is worth polling while at least one linked destination has somewhere to deliver. */
  async hasViableDestination(realmId: string): Promise<boolean> {
    const linked = await this.destinations.listByRealm(realmId);
    return linked.some((destination) => destination.channelUrl !== null);
  }

  private async disable(destinationId: string, failureClass: FailureClass): Promise<void> {
    const current = await this.destinations.get(destinationId);
    if (!current) {
      return;
    }
    const next = deactivate(current, failureClass);
    await this.destinations.save(next);
    this.log.warn({ destinationId, failureClass, realmId: current.realmId }, "destination disabled after repeated failures");
  }
}
