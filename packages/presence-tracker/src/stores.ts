import type { DestinationConfig, FailureClass } from "@realm-presence/presence-contracts";
import type { DatabaseInstance } from "./database.js";
import type {
  DestinationStore,
  FailureCounterStore,
  OfflineMarkerStore,
  ParticipantSession,
  SessionStore,
} from "./types.js";

interface SessionRow {
  correlation_id: string;
  realm_id: string;
  participant_id: string;
  online: number;
  last_seen: number;
}

interface DestinationRow {
  destination_id: string;
  realm_id: string | null;
  channel_url: string | null;
  live_updates: number;
  warning_notifications: number;
  offline_role_id: string | null;
  refresh_names: number;
  entitled: number;
}

function rowToSession(row: SessionRow): ParticipantSession {
  return {
    correlationId: row.correlation_id,
    realmId: row.realm_id,
    participantId: row.participant_id,
    online: row.online === 1,
    lastSeenMs: row.last_seen,
  };
}

function rowToDestination(row: DestinationRow): DestinationConfig {
  return {
    destinationId: row.destination_id,
    realmId: row.realm_id,
    channelUrl: row.channel_url,
    liveUpdates: row.live_updates === 1,
    warningNotifications: row.warning_notifications === 1,
    offlineRoleId: row.offline_role_id,
    refreshNames: row.refresh_names === 1,
    entitled: row.entitled === 1,
  };
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

export function createSqliteSessionStore(db: DatabaseInstance): SessionStore {
  // Conflicts on the correlation id only refresh presence; identity columns never change.
  const upsertStmt = db.prepare<{
    correlationId: string;
    realmId: string;
    participantId: string;
    online: number;
    lastSeen: number;
  }>(`
    INSERT INTO player_sessions (correlation_id, realm_id, participant_id, online, last_seen)
    VALUES (@correlationId, @realmId, @participantId, @online, @lastSeen)
    ON CONFLICT(correlation_id) DO UPDATE SET online = excluded.online, last_seen = excluded.last_seen
  `);

  const touchStmt = db.prepare<{ realmId: string; participantId: string; lastSeen: number }>(`
    UPDATE player_sessions SET last_seen = @lastSeen
    WHERE realm_id = @realmId AND participant_id = @participantId AND online = 1
  `);

  const markStaleStmt = db.prepare<{ before: number }>(`
    UPDATE player_sessions SET online = 0 WHERE online = 1 AND last_seen < @before
  `);

  const selectOnlineStmt = db.prepare<[], SessionRow>(`
    SELECT * FROM player_sessions WHERE online = 1 ORDER BY realm_id, participant_id
  `);

  const selectByIdStmt = db.prepare<{ correlationId: string }, SessionRow>(`
    SELECT * FROM player_sessions WHERE correlation_id = @correlationId
  `);

  const deleteRealmStmt = db.prepare<{ realmId: string }>(`
    DELETE FROM player_sessions WHERE realm_id = @realmId
  `);

  const upsertAll = db.transaction((sessions: ParticipantSession[]) => {
    for (const session of sessions) {
      upsertStmt.run({
        correlationId: session.correlationId,
        realmId: session.realmId,
        participantId: session.participantId,
        online: flag(session.online),
        lastSeen: session.lastSeenMs,
      });
    }
  });

  const touchAll = db.transaction((realmId: string, participantIds: string[], lastSeen: number) => {
    for (const participantId of participantIds) {
      touchStmt.run({ realmId, participantId, lastSeen });
    }
  });

  return {
    async upsertMany(sessions: ParticipantSession[]): Promise<void> {
      upsertAll(sessions);
    },

    async touch(realmId: string, participantIds: string[], lastSeenMs: number): Promise<void> {
      touchAll(realmId, participantIds, lastSeenMs);
    },

    async markStaleOffline(beforeMs: number): Promise<number> {
      return markStaleStmt.run({ before: beforeMs }).changes;
    },

    async listOnline(): Promise<ParticipantSession[]> {
      return selectOnlineStmt.all().map(rowToSession);
    },

    async get(correlationId: string): Promise<ParticipantSession | undefined> {
      const row = selectByIdStmt.get({ correlationId });
      return row ? rowToSession(row) : undefined;
    },

    async deleteRealm(realmId: string): Promise<void> {
      deleteRealmStmt.run({ realmId });
    },
  };
}

export function createSqliteDestinationStore(db: DatabaseInstance): DestinationStore {
  const selectByIdStmt = db.prepare<{ destinationId: string }, DestinationRow>(`
    SELECT * FROM destinations WHERE destination_id = @destinationId
  `);

  const selectByRealmStmt = db.prepare<{ realmId: string }, DestinationRow>(`
    SELECT * FROM destinations WHERE realm_id = @realmId ORDER BY destination_id
  `);

  const selectRealmIdsStmt = db.prepare<[], { realm_id: string }>(`
    SELECT DISTINCT realm_id FROM destinations WHERE realm_id IS NOT NULL ORDER BY realm_id
  `);

  const upsertStmt = db.prepare<{
    destinationId: string;
    realmId: string | null;
    channelUrl: string | null;
    liveUpdates: number;
    warningNotifications: number;
    offlineRoleId: string | null;
    refreshNames: number;
    entitled: number;
  }>(`
    INSERT INTO destinations (
      destination_id, realm_id, channel_url, live_updates,
      warning_notifications, offline_role_id, refresh_names, entitled
    )
    VALUES (
      @destinationId, @realmId, @channelUrl, @liveUpdates,
      @warningNotifications, @offlineRoleId, @refreshNames, @entitled
    )
    ON CONFLICT(destination_id) DO UPDATE SET
      realm_id = excluded.realm_id,
      channel_url = excluded.channel_url,
      live_updates = excluded.live_updates,
      warning_notifications = excluded.warning_notifications,
      offline_role_id = excluded.offline_role_id,
      refresh_names = excluded.refresh_names,
      entitled = excluded.entitled
  `);

  const deleteStmt = db.prepare<{ destinationId: string }>(`
    DELETE FROM destinations WHERE destination_id = @destinationId
  `);

  return {
    async get(destinationId: string): Promise<DestinationConfig | undefined> {
      const row = selectByIdStmt.get({ destinationId });
      return row ? rowToDestination(row) : undefined;
    },

    async listByRealm(realmId: string): Promise<DestinationConfig[]> {
      return selectByRealmStmt.all({ realmId }).map(rowToDestination);
    },

    async listLinkedRealmIds(): Promise<string[]> {
      return selectRealmIdsStmt.all().map((row) => row.realm_id);
    },

    async save(config: DestinationConfig): Promise<void> {
      upsertStmt.run({
        destinationId: config.destinationId,
        realmId: config.realmId,
        channelUrl: config.channelUrl,
        liveUpdates: flag(config.liveUpdates),
        warningNotifications: flag(config.warningNotifications),
        offlineRoleId: config.offlineRoleId,
        refreshNames: flag(config.refreshNames),
        entitled: flag(config.entitled),
      });
    },

    async delete(destinationId: string): Promise<void> {
      deleteStmt.run({ destinationId });
    },
  };
}

export function createSqliteOfflineMarkerStore(db: DatabaseInstance): OfflineMarkerStore {
  const insertStmt = db.prepare<{ realmId: string; markedAt: number }>(`
    INSERT INTO offline_realms (realm_id, marked_at) VALUES (@realmId, @markedAt)
    ON CONFLICT(realm_id) DO NOTHING
  `);

  const deleteStmt = db.prepare<{ realmId: string }>(`
    DELETE FROM offline_realms WHERE realm_id = @realmId
  `);

  const selectAllStmt = db.prepare<[], { realm_id: string }>(`
    SELECT realm_id FROM offline_realms ORDER BY marked_at, realm_id
  `);

  return {
    async add(realmId: string, markedAtMs: number): Promise<void> {
      insertStmt.run({ realmId, markedAt: markedAtMs });
    },

    async remove(realmId: string): Promise<void> {
      deleteStmt.run({ realmId });
    },

    async list(): Promise<string[]> {
      return selectAllStmt.all().map((row) => row.realm_id);
    },
  };
}

export function createSqliteFailureCounterStore(db: DatabaseInstance): FailureCounterStore {
  const incrementStmt = db.prepare<{ destinationId: string; failureClass: string }, { count: number }>(`
    INSERT INTO failure_counters (destination_id, failure_class, count)
    VALUES (@destinationId, @failureClass, 1)
    ON CONFLICT(destination_id, failure_class) DO UPDATE SET count = count + 1
    RETURNING count
  `);

  const resetStmt = db.prepare<{ destinationId: string; failureClass: string }>(`
    DELETE FROM failure_counters WHERE destination_id = @destinationId AND failure_class = @failureClass
  `);

  const selectStmt = db.prepare<{ destinationId: string; failureClass: string }, { count: number }>(`
    SELECT count FROM failure_counters WHERE destination_id = @destinationId AND failure_class = @failureClass
  `);

  return {
    async increment(destinationId: string, failureClass: FailureClass): Promise<number> {
      const row = incrementStmt.get({ destinationId, failureClass });
      if (!row) {
        throw new Error(`Failure counter upsert returned no row for ${destinationId}/${failureClass}`);
      }
      return row.count;
    },

    async reset(destinationId: string, failureClass: FailureClass): Promise<void> {
      resetStmt.run({ destinationId, failureClass });
    },

    async get(destinationId: string, failureClass: FailureClass): Promise<number> {
      return selectStmt.get({ destinationId, failureClass })?.count ?? 0;
    },
  };
}

export interface SqliteStores {
  sessions: SessionStore;
  destinations: DestinationStore;
  offlineMarkers: OfflineMarkerStore;
  failureCounters: FailureCounterStore;
}

export function createSqliteStores(db: DatabaseInstance): SqliteStores {
  return {
    sessions: createSqliteSessionStore(db),
    destinations: createSqliteDestinationStore(db),
    offlineMarkers: createSqliteOfflineMarkerStore(db),
    failureCounters: createSqliteFailureCounterStore(db),
  };
}
