export interface AppConfig {
  port: number;
  host: string;
  controlAuthToken: string;
  presenceSocketSecret: string;
  presenceSocketTokenTtlSec: number;
  databasePath: string;
  livekitServerApiUrl: string;
  livekitApiKey: string;
  livekitApiSecret: string;
  trackerIdentity: string;
  pollIntervalSec: number;
  pollConcurrency: number;
  channelFailureLimit: number;
  realmMissingFailureLimit: number;
  offlineRoleFailureLimit: number;
  staleAfterHours: number;
  offlineGraceSec: number;
  displayNameTtlSec: number;
  feedTokensPerMinutePerIp: number;
  logLevel: string;
  prettyLogs: boolean;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value;
}

function numberEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function positiveIntEnv(name: string, fallback: number): number {
  const parsed = numberEnv(name, fallback);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Env var ${name} must be a positive integer: ${parsed}`);
  }
  return parsed;
}

function booleanEnv(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }
  throw new Error(`Invalid boolean env var ${name}: ${value}`);
}

export function loadConfig(): AppConfig {
  return {
    port: numberEnv("PORT", 8080),
    host: process.env.HOST ?? "0.0.0.0",
    controlAuthToken: required("CONTROL_AUTH_TOKEN"),
    presenceSocketSecret: required("PRESENCE_SOCKET_SECRET"),
    presenceSocketTokenTtlSec: numberEnv("PRESENCE_SOCKET_TOKEN_TTL_SEC", 900),
    databasePath: process.env.DATABASE_PATH ?? "realm-presence.db",
    livekitServerApiUrl: process.env.LIVEKIT_SERVER_API_URL ?? "http://127.0.0.1:7880",
    livekitApiKey: required("LIVEKIT_API_KEY"),
    livekitApiSecret: required("LIVEKIT_API_SECRET"),
    trackerIdentity: process.env.TRACKER_IDENTITY ?? "presence-tracker",
    pollIntervalSec: numberEnv("POLL_INTERVAL_SEC", 60),
    pollConcurrency: positiveIntEnv("POLL_CONCURRENCY", 12),
    channelFailureLimit: positiveIntEnv("CHANNEL_FAILURE_LIMIT", 3),
    realmMissingFailureLimit: positiveIntEnv("REALM_MISSING_FAILURE_LIMIT", 7),
    offlineRoleFailureLimit: positiveIntEnv("OFFLINE_ROLE_FAILURE_LIMIT", 3),
    staleAfterHours: numberEnv("STALE_AFTER_HOURS", 24),
    offlineGraceSec: numberEnv("OFFLINE_GRACE_SEC", 300),
    displayNameTtlSec: numberEnv("DISPLAY_NAME_TTL_SEC", 3600),
    feedTokensPerMinutePerIp: numberEnv("FEED_TOKENS_PER_MINUTE_PER_IP", 60),
    logLevel: process.env.LOG_LEVEL ?? "info",
    prettyLogs: booleanEnv("LOG_PRETTY", process.env.NODE_ENV !== "production"),
  };
}
