import { AdmissionGate } from "./admission-gate.js";
import type { AppConfig } from "./config.js";
import { DiffEngine } from "./diff-engine.js";
import { DisplayNameDirectory } from "./display-names.js";
import { EventBus } from "./event-bus.js";
import { IdentityResolver } from "./identity.js";
import { InvalidationPolicy } from "./invalidation-policy.js";
import { NotificationDispatcher } from "./notification-dispatcher.js";
import { OfflineRealmTracker } from "./offline-tracker.js";
import { PollScheduler } from "./poll-scheduler.js";
import { PresenceSocketHub } from "./presence-socket-hub.js";
import { PresenceStateStore } from "./presence-store.js";
import { SessionPersistence } from "./session-persistence.js";
import type { SqliteStores } from "./stores.js";
import type {
  DeliveryClient,
  DisplayNameSource,
  Logger,
  PresenceEventMap,
  PresenceSource,
} from "./types.js";

export type TrackerConfig = Pick<
  AppConfig,
  | "pollIntervalSec"
  | "pollConcurrency"
  | "channelFailureLimit"
  | "realmMissingFailureLimit"
  | "offlineRoleFailureLimit"
  | "staleAfterHours"
  | "offlineGraceSec"
  | "displayNameTtlSec"
>;

export interface PresenceTrackerOptions {
  config: TrackerConfig;
  stores: SqliteStores;
  source: PresenceSource;
  delivery: DeliveryClient;
  displayNames?: DisplayNameSource;
  log: Logger;
  now?: () => number;
  onFatal?: (error: unknown) => void;
}

export interface StartupSummary {
  correctedOffline: number;
  restoredOnline: number;
  offlineRealms: number;
  trackedRealms: number;
}

/**
 * Wires the pipeline together. Consumers are registered once, in a fixed
 * order: durable session rows first, then notifications, then the live feed.
 */
export class PresenceTracker {
  readonly identities = new IdentityResolver();
  readonly presence = new PresenceStateStore();
  readonly offline: OfflineRealmTracker;
  readonly diff: DiffEngine;
  readonly bus: EventBus<PresenceEventMap>;
  readonly policy: InvalidationPolicy;
  readonly names: DisplayNameDirectory;
  readonly dispatcher: NotificationDispatcher;
  readonly persistence: SessionPersistence;
  readonly feed: PresenceSocketHub;
  readonly scheduler: PollScheduler;
  readonly gate: AdmissionGate;

  private readonly now: () => number;

  constructor(private readonly options: PresenceTrackerOptions) {
    const { config, stores, log } = options;
    this.now = options.now ?? Date.now;

    this.gate = new AdmissionGate(config.pollConcurrency);
    this.offline = new OfflineRealmTracker(stores.offlineMarkers);
    this.diff = new DiffEngine(this.presence, config.staleAfterHours * 60 * 60 * 1000);
    this.bus = new EventBus<PresenceEventMap>(log);
    this.policy = new InvalidationPolicy(
      stores.destinations,
      stores.failureCounters,
      {
        channel: config.channelFailureLimit,
        "realm-missing": config.realmMissingFailureLimit,
        "offline-role": config.offlineRoleFailureLimit,
      },
      log,
    );
    this.names = new DisplayNameDirectory(config.displayNameTtlSec * 1000, options.displayNames, log, this.gate);
    this.persistence = new SessionPersistence(stores.sessions, this.identities);
    this.dispatcher = new NotificationDispatcher({
      destinations: stores.destinations,
      delivery: options.delivery,
      policy: this.policy,
      names: this.names,
      presence: this.presence,
      log,
      staleAfterHours: config.staleAfterHours,
    });
    this.feed = new PresenceSocketHub(this.presence, this.offline);

    this.persistence.register(this.bus);
    this.dispatcher.register(this.bus);
    this.feed.register(this.bus);

    this.scheduler = new PollScheduler({
      source: options.source,
      diff: this.diff,
      presence: this.presence,
      offline: this.offline,
      policy: this.policy,
      destinations: stores.destinations,
      names: this.names,
      bus: this.bus,
      gate: this.gate,
      log,
      intervalMs: config.pollIntervalSec * 1000,
      now: this.now,
      onFatal: options.onFatal,
    });
  }

  async initialize(): Promise<StartupSummary> {
    const { config, stores, log } = this.options;
    const recovery = await this.presence.initialize(
      stores.sessions,
      this.identities,
      config.offlineGraceSec * 1000,
      this.now(),
    );
    const offlineRealms = await this.offline.load();
    await this.scheduler.refreshRotation();

    const summary: StartupSummary = {
      ...recovery,
      offlineRealms,
      trackedRealms: this.scheduler.trackedRealmIds().length,
    };
    log.info(summary, "presence state restored");
    return summary;
  }

  start(): void {
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
  }
}
