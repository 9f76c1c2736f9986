import type { PollCycleResult } from "@realm-presence/presence-contracts";
import type { AdmissionGate } from "./admission-gate.js";
import type { DiffEngine } from "./diff-engine.js";
import type { DisplayNameDirectory } from "./display-names.js";
import { InvariantViolationError } from "./errors.js";
import type { EventBus } from "./event-bus.js";
import type { InvalidationPolicy } from "./invalidation-policy.js";
import type { OfflineRealmTracker } from "./offline-tracker.js";
import type { PresenceStateStore } from "./presence-store.js";
import type {
  DestinationStore,
  Logger,
  PollOutcome,
  PresenceEventMap,
  PresenceSource,
  SnapshotParticipant,
} from "./types.js";

export interface PollSchedulerDeps {
  source: PresenceSource;
  diff: DiffEngine;
  presence: PresenceStateStore;
  offline: OfflineRealmTracker;
  policy: InvalidationPolicy;
  destinations: DestinationStore;
  names: DisplayNameDirectory;
  bus: EventBus<PresenceEventMap>;
  gate: AdmissionGate;
  log: Logger;
  intervalMs: number;
  now?: () => number;
  onFatal?: (error: unknown) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface CycleChanges {
  reachable: boolean;
  joined: string[];
  left: string[];
}

/**
 * Polls every tracked realm on a fixed interval. All source calls go through
 * the admission gate, and a realm never has two cycles running at once: the
 * cycle owns that realm's presence state until it settles.
 */
export class PollScheduler {
  private readonly inFlight = new Map<string, Promise<PollCycleResult>>();
  private readonly rotation = new Set<string>();
  private readonly dropped = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private readonly now: () => number;

  constructor(private readonly deps: PollSchedulerDeps) {
    this.now = deps.now ?? Date.now;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.deps.log.error({ err: error }, "poll tick failed");
      });
    }, this.deps.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.allSettled(Array.from(this.inFlight.values()));
  }

  async tick(): Promise<PollCycleResult[]> {
    await this.refreshRotation();
    const settled = await Promise.allSettled(Array.from(this.rotation, (realmId) => this.runCycle(realmId)));
    const results: PollCycleResult[] = [];
    for (const outcome of settled) {
      if (outcome.status === "fulfilled") {
        results.push(outcome.value);
      }
    }
    return results;
  }

  async refreshRotation(): Promise<void> {
    const linked = await this.deps.destinations.listLinkedRealmIds();
    this.rotation.clear();
    for (const realmId of linked) {
      if (!this.dropped.has(realmId)) {
        this.rotation.add(realmId);
      }
    }
  }

  /**
   * Starts a cycle unless one is already running for the realm, in which case it is skipped.
   * Only invariant violations escape; any other failure leaves the realm for the next tick.
   */
  runCycle(realmId: string): Promise<PollCycleResult> {
    if (this.inFlight.has(realmId)) {
      return Promise.resolve({ status: "skipped", realmId });
    }
    const cycle = this.executeCycle(realmId)
      .catch((error: unknown): PollCycleResult => {
        if (error instanceof InvariantViolationError) {
          this.reportFatal(error, realmId);
          throw error;
        }
        this.deps.log.error({ err: error, realmId }, "poll cycle failed, retrying next tick");
        return { status: "failed", realmId, error: errorMessage(error) };
      })
      .finally(() => {
        this.inFlight.delete(realmId);
      });
    this.inFlight.set(realmId, cycle);
    return cycle;
  }

  /** Re-admits a realm, including one that was dropped. */
  track(realmId: string): void {
    this.dropped.delete(realmId);
    this.rotation.add(realmId);
  }

  /** Takes the realm out of rotation and forgets it once any running cycle has settled. */
  async untrack(realmId: string): Promise<void> {
    this.rotation.delete(realmId);
    const pending = this.inFlight.get(realmId);
    if (pending) {
      await Promise.allSettled([pending]);
    }
    this.deps.diff.forget(realmId);
  }

  isPolling(realmId: string): boolean {
    return this.inFlight.has(realmId);
  }

  isTracked(realmId: string): boolean {
    return this.rotation.has(realmId);
  }

  isDropped(realmId: string): boolean {
    return this.dropped.has(realmId);
  }

  trackedRealmIds(): string[] {
    return Array.from(this.rotation);
  }

  private async executeCycle(realmId: string): Promise<PollCycleResult> {
    const { gate, source, log } = this.deps;
    let outcome: PollOutcome;
    try {
      outcome = await gate.run(() => source.poll(realmId));
    } catch (error) {
      log.warn({ err: error, realmId }, "presence poll failed, retrying next cycle");
      return { status: "failed", realmId, error: errorMessage(error) };
    }

    const timestampMs = this.now();
    const changes = outcome.kind === "snapshot"
      ? await this.applySnapshot(realmId, outcome.participants, timestampMs)
      : await this.applyUnreachable(realmId, timestampMs);

    const stale = this.deps.diff.checkStaleness(realmId, timestampMs);
    let dropped = false;
    if (stale) {
      await this.deps.bus.emit("realm.stale", stale);
      if (!(await this.deps.policy.hasViableDestination(realmId))) {
        await this.drop(realmId, timestampMs);
        dropped = true;
      }
    }

    return { status: "completed", realmId, ...changes, stale: stale !== null, dropped };
  }

  private async applySnapshot(
    realmId: string,
    participants: SnapshotParticipant[],
    timestampMs: number,
  ): Promise<CycleChanges> {
    const { bus, diff, names, offline, policy, presence, log } = this.deps;
    for (const participant of participants) {
      if (participant.displayName) {
        names.remember(participant.participantId, participant.displayName, timestampMs);
      }
    }

    if (await offline.markOnline(realmId)) {
      log.info({ realmId }, "realm reachable again");
    }

    const ids = participants.map((participant) => participant.participantId);
    const delta = diff.observe(realmId, ids, timestampMs);
    if (delta) {
      await bus.emit("presence.changed", delta);
    }
    await bus.emit("presence.refreshed", { realmId, online: presence.current(realmId), timestampMs });
    if (ids.length > 0) {
      await policy.recordRealmData(realmId);
    }

    return {
      reachable: true,
      joined: delta ? Array.from(delta.joined) : [],
      left: delta ? Array.from(delta.left) : [],
    };
  }

  private async applyUnreachable(realmId: string, timestampMs: number): Promise<CycleChanges> {
    const { bus, diff, offline, log } = this.deps;
    const transitioned = await offline.markOffline(realmId, timestampMs);
    const delta = diff.observeUnreachable(realmId, timestampMs);

    if (transitioned) {
      log.info({ realmId, disconnected: delta?.left.size ?? 0 }, "realm unreachable");
      await bus.emit("realm.down", { realmId, disconnected: delta?.left ?? new Set(), timestampMs });
    } else if (delta) {
      // Participants restored from storage for a realm that was already down.
      await bus.emit("presence.changed", delta);
    }

    return { reachable: false, joined: [], left: delta ? Array.from(delta.left) : [] };
  }

  private async drop(realmId: string, timestampMs: number): Promise<void> {
    const { bus, diff, offline, source, log } = this.deps;
    this.rotation.delete(realmId);
    this.dropped.add(realmId);
    try {
      await source.unsubscribe(realmId);
    } catch (error) {
      log.warn({ err: error, realmId }, "could not unsubscribe from realm");
    }
    await offline.markOnline(realmId);
    diff.forget(realmId);
    log.info({ realmId }, "realm dropped from poll rotation");
    await bus.emit("realm.dropped", { realmId, timestampMs });
  }

  private reportFatal(error: unknown, realmId: string): void {
    if (this.deps.onFatal) {
      this.deps.onFatal(error);
      return;
    }
    this.deps.log.fatal({ err: error, realmId }, "poll cycle aborted");
  }
}
