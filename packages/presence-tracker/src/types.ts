import type { FastifyBaseLogger } from "fastify";
import type { DestinationConfig, FailureClass } from "@realm-presence/presence-contracts";

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error" | "fatal">;

export interface SnapshotParticipant {
  participantId: string;
  displayName?: string;
}

export type PollOutcome =
  | { kind: "snapshot"; participants: SnapshotParticipant[] }
  | { kind: "unreachable" };

export interface PresenceSource {
  /** Resolves with the realm's roster or an explicit unreachable signal; rejects on transient errors. */
  poll(realmId: string): Promise<PollOutcome>;
  unsubscribe(realmId: string): Promise<void>;
}

export interface PresenceDelta {
  realmId: string;
  joined: ReadonlySet<string>;
  left: ReadonlySet<string>;
  timestampMs: number;
}

export interface PresenceRefreshedEvent {
  realmId: string;
  online: ReadonlySet<string>;
  timestampMs: number;
}

export interface RealmDownEvent {
  realmId: string;
  disconnected: ReadonlySet<string>;
  timestampMs: number;
}

export interface RealmStaleEvent {
  realmId: string;
  lastDataAtMs: number;
  timestampMs: number;
}

export interface RealmDroppedEvent {
  realmId: string;
  timestampMs: number;
}

export interface PresenceEventMap {
  "presence.changed": PresenceDelta;
  "presence.refreshed": PresenceRefreshedEvent;
  "realm.down": RealmDownEvent;
  "realm.stale": RealmStaleEvent;
  "realm.dropped": RealmDroppedEvent;
}

export interface ParticipantSession {
  correlationId: string;
  realmId: string;
  participantId: string;
  online: boolean;
  lastSeenMs: number;
}

export interface SessionStore {
  upsertMany(sessions: ParticipantSession[]): Promise<void>;
  touch(realmId: string, participantIds: string[], lastSeenMs: number): Promise<void>;
  markStaleOffline(beforeMs: number): Promise<number>;
  listOnline(): Promise<ParticipantSession[]>;
  get(correlationId: string): Promise<ParticipantSession | undefined>;
  deleteRealm(realmId: string): Promise<void>;
}

export interface DestinationStore {
  get(destinationId: string): Promise<DestinationConfig | undefined>;
  listByRealm(realmId: string): Promise<DestinationConfig[]>;
  listLinkedRealmIds(): Promise<string[]>;
  save(config: DestinationConfig): Promise<void>;
  delete(destinationId: string): Promise<void>;
}

export interface OfflineMarkerStore {
  add(realmId: string, markedAtMs: number): Promise<void>;
  remove(realmId: string): Promise<void>;
  list(): Promise<string[]>;
}

export interface FailureCounterStore {
  increment(destinationId: string, failureClass: FailureClass): Promise<number>;
  reset(destinationId: string, failureClass: FailureClass): Promise<void>;
  get(destinationId: string, failureClass: FailureClass): Promise<number>;
}

export interface MessageField {
  name: string;
  value: string;
}

export interface RenderedMessage {
  content?: string;
  title?: string;
  description?: string;
  color: number;
  fields: MessageField[];
  footer?: string;
  timestampMs?: number;
  mentionRoles?: string[];
}

export interface DeliveryClient {
  deliver(destination: DestinationConfig, message: RenderedMessage): Promise<void>;
}

export interface DisplayNameSource {
  fetchDisplayNames(realmId: string, participantIds: string[]): Promise<Map<string, string>>;
}
