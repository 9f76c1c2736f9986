import type { Database as DatabaseInstance } from "better-sqlite3";
import Database from "better-sqlite3";

export type { DatabaseInstance };

export function openDatabase(path: string): DatabaseInstance {
  const db = new Database(path);
  if (path !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("synchronous = NORMAL");
  initSchema(db);
  return db;
}

function initSchema(db: DatabaseInstance): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS player_sessions (
      correlation_id TEXT PRIMARY KEY,
      realm_id TEXT NOT NULL,
      participant_id TEXT NOT NULL,
      online INTEGER NOT NULL DEFAULT 0,
      last_seen INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_player_sessions_online ON player_sessions(online, last_seen)
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_player_sessions_realm ON player_sessions(realm_id, participant_id)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS destinations (
      destination_id TEXT PRIMARY KEY,
      realm_id TEXT,
      channel_url TEXT,
      live_updates INTEGER NOT NULL DEFAULT 0,
      warning_notifications INTEGER NOT NULL DEFAULT 1,
      offline_role_id TEXT,
      refresh_names INTEGER NOT NULL DEFAULT 0,
      entitled INTEGER NOT NULL DEFAULT 0
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_destinations_realm ON destinations(realm_id)
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS offline_realms (
      realm_id TEXT PRIMARY KEY,
      marked_at INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS failure_counters (
      destination_id TEXT NOT NULL,
      failure_class TEXT NOT NULL,
      count INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (destination_id, failure_class)
    )
  `);
}
