import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import websocket from "@fastify/websocket";
import { z } from "zod";
import {
  DestinationConfigInputSchema,
  PresenceFeedRequestSchema,
  PresenceSocketInboundSchema,
  RealmIdSchema,
  type DestinationConfig,
  type PresenceFeedResponse,
  type PresenceSocketOutbound,
  type RealmPresence,
} from "@realm-presence/presence-contracts";
import { assertControlAuth, mintPresenceFeedToken, verifyPresenceFeedToken } from "./auth.js";
import type { AppConfig } from "./config.js";
import { openDatabase, type DatabaseInstance } from "./database.js";
import { LiveKitPresenceSource } from "./livekit-source.js";
import type { FeedBinding } from "./presence-socket-hub.js";
import { FixedWindowRateLimiter } from "./rate-limit.js";
import { createSqliteStores } from "./stores.js";
import { PresenceTracker } from "./tracker.js";
import type { DeliveryClient, DisplayNameSource, PresenceSource } from "./types.js";
import { WebhookDeliveryClient } from "./webhook-delivery.js";

export interface ServerDeps {
  source?: PresenceSource;
  displayNames?: DisplayNameSource;
  delivery?: DeliveryClient;
  database?: DatabaseInstance;
  now?: () => number;
  onFatal?: (error: unknown) => void;
}

const RealmParamsSchema = z.object({ realmId: RealmIdSchema });
const DestinationParamsSchema = z.object({ destinationId: z.string().min(1).max(128) });

function decodeFrame(raw: unknown): string | null {
  if (typeof raw === "string") {
    return raw;
  }
  if (Buffer.isBuffer(raw)) {
    return raw.toString("utf8");
  }
  if (Array.isArray(raw) && raw.every((chunk) => Buffer.isBuffer(chunk))) {
    return Buffer.concat(raw).toString("utf8");
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString("utf8");
  }
  return null;
}

function feedUrlFromRequest(request: FastifyRequest): string {
  const forwardedProto = typeof request.headers["x-forwarded-proto"] === "string"
    ? request.headers["x-forwarded-proto"]
    : undefined;
  const forwardedHost = typeof request.headers["x-forwarded-host"] === "string"
    ? request.headers["x-forwarded-host"]
    : undefined;
  const host = request.headers.host ?? "127.0.0.1:8080";

  const proto = (forwardedProto ?? request.protocol) === "https" ? "wss" : "ws";
  return `${proto}://${forwardedHost ?? host}/presence-socket`;
}

export async function buildServer(config: AppConfig, deps: ServerDeps = {}): Promise<FastifyInstance> {
  const app = Fastify({
    bodyLimit: 100_000,
    logger: {
      level: config.logLevel,
      transport: config.prettyLogs ? { target: "pino-pretty" } : undefined,
    },
  });

  await app.register(websocket);

  const ownsDatabase = !deps.database;
  const db = deps.database ?? openDatabase(config.databasePath);
  const stores = createSqliteStores(db);
  const source: PresenceSource = deps.source ?? new LiveKitPresenceSource(
    config.livekitServerApiUrl,
    config.livekitApiKey,
    config.livekitApiSecret,
    config.trackerIdentity,
  );
  const displayNames = deps.displayNames ?? (source instanceof LiveKitPresenceSource ? source : undefined);

  const tracker = new PresenceTracker({
    config,
    stores,
    source,
    delivery: deps.delivery ?? new WebhookDeliveryClient(),
    displayNames,
    log: app.log,
    now: deps.now,
    onFatal: deps.onFatal,
  });

  const feedLimiter = new FixedWindowRateLimiter(config.feedTokensPerMinutePerIp, 60_000);
  const maintenance = setInterval(() => {
    feedLimiter.prune();
    tracker.names.prune();
  }, 60_000);
  maintenance.unref();

  /** Drops everything held for a realm once no destination references it any more. */
  async function releaseRealmIfUnused(realmId: string): Promise<boolean> {
    const remaining = await stores.destinations.listByRealm(realmId);
    if (remaining.length > 0) {
      return false;
    }
    await tracker.scheduler.untrack(realmId);
    await tracker.offline.markOnline(realmId);
    await stores.sessions.deleteRealm(realmId);
    try {
      await source.unsubscribe(realmId);
    } catch (error) {
      app.log.warn({ err: error, realmId }, "could not unsubscribe from released realm");
    }
    return true;
  }

  app.addHook("onReady", async () => {
    await tracker.initialize();
    tracker.start();
  });

  app.addHook("onClose", async () => {
    clearInterval(maintenance);
    await tracker.stop();
    if (ownsDatabase) {
      db.close();
    }
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "unhandled request error");
    reply.code(500).send({ error: "internal_error", requestId: request.id });
  });

  app.get("/health", async () => ({ ok: true, ts: Date.now() }));

  app.get("/ready", async () => ({
    ok: true,
    pollIntervalSec: config.pollIntervalSec,
    pollConcurrency: config.pollConcurrency,
    trackedRealms: tracker.scheduler.trackedRealmIds().length,
    offlineRealms: tracker.offline.list().length,
  }));

  app.get("/realms", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const realms = tracker.scheduler.trackedRealmIds().sort().map((realmId) => ({
      realmId,
      onlineCount: tracker.presence.count(realmId),
      offline: tracker.offline.isOffline(realmId),
    }));
    return reply.send({ realms });
  });

  app.get("/realms/:realmId/presence", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const params = RealmParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    const { realmId } = params.data;
    const body: RealmPresence = {
      realmId,
      online: Array.from(tracker.presence.current(realmId)).sort(),
      offline: tracker.offline.isOffline(realmId),
      tracked: tracker.scheduler.isTracked(realmId),
      timestampMs: Date.now(),
    };
    return reply.send(body);
  });

  app.post("/realms/:realmId/poll", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const params = RealmParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    const { realmId } = params.data;
    if (!tracker.scheduler.isTracked(realmId)) {
      return reply.code(404).send({ error: "realm_not_tracked" });
    }

    const result = await tracker.scheduler.runCycle(realmId);
    if (result.status === "skipped") {
      return reply.code(409).send({ error: "realm_busy", realmId });
    }
    return reply.send(result);
  });

  app.get("/destinations/:destinationId", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const params = DestinationParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    const destination = await stores.destinations.get(params.data.destinationId);
    if (!destination) {
      return reply.code(404).send({ error: "destination_not_found" });
    }
    return reply.send(destination);
  });

  app.put("/destinations/:destinationId", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const params = DestinationParamsSchema.safeParse(request.params);
    const parsed = DestinationConfigInputSchema.safeParse(request.body);
    if (!params.success || !parsed.success) {
      const details = !parsed.success ? parsed.error.flatten() : undefined;
      return reply.code(400).send({ error: "invalid_request", details });
    }

    const { destinationId } = params.data;
    const previous = await stores.destinations.get(destinationId);
    const destination: DestinationConfig = { destinationId, ...parsed.data };
    await stores.destinations.save(destination);

    // Saving again is how operators re-enable a destination the policy switched off.
    await tracker.policy.recordSuccess(destination, "channel");
    await tracker.policy.recordSuccess(destination, "realm-missing");
    await tracker.policy.recordSuccess(destination, "offline-role");

    if (destination.realmId) {
      tracker.scheduler.track(destination.realmId);
    }
    if (previous?.realmId && previous.realmId !== destination.realmId) {
      await releaseRealmIfUnused(previous.realmId);
    }

    request.log.info({ destinationId, realmId: destination.realmId }, "destination saved");
    return reply.send(destination);
  });

  app.delete("/destinations/:destinationId", async (request, reply) => {
    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const params = DestinationParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    const destination = await stores.destinations.get(params.data.destinationId);
    if (!destination) {
      return reply.code(404).send({ error: "destination_not_found" });
    }

    await stores.destinations.delete(destination.destinationId);
    await tracker.policy.recordSuccess(destination, "channel");
    await tracker.policy.recordSuccess(destination, "realm-missing");
    await tracker.policy.recordSuccess(destination, "offline-role");
    const released = destination.realmId ? await releaseRealmIfUnused(destination.realmId) : false;
    return reply.send({ ok: true, destinationId: destination.destinationId, releasedRealm: released });
  });

  app.post("/feeds", async (request, reply) => {
    if (!feedLimiter.allow(`feeds:${request.ip}`)) {
      return reply.code(429).send({ error: "rate_limited" });
    }

    try {
      assertControlAuth(request.headers.authorization, config.controlAuthToken);
    } catch {
      return reply.code(401).send({ error: "unauthorized" });
    }

    const parsed = PresenceFeedRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const { realmId } = parsed.data;
    const response: PresenceFeedResponse = {
      realmId,
      feedUrl: feedUrlFromRequest(request),
      feedToken: mintPresenceFeedToken({ realmId }, config.presenceSocketSecret, config.presenceSocketTokenTtlSec),
      expiresAtMs: Date.now() + (config.presenceSocketTokenTtlSec * 1000),
    };
    return reply.send(response);
  });

  app.get("/presence-socket", { websocket: true }, (socket, request) => {
    const requestUrl = new URL(request.url, "http://localhost");
    const token = requestUrl.searchParams.get("token") ?? "";

    let realmId: string;
    try {
      realmId = verifyPresenceFeedToken(token, config.presenceSocketSecret).realmId;
    } catch {
      const failure: PresenceSocketOutbound = {
        type: "presence.error",
        code: "auth_failed",
        message: "Invalid feed token",
        recoverable: true,
      };
      socket.send(JSON.stringify(failure));
      socket.close(4401, "unauthorized");
      return;
    }

    const binding: FeedBinding = {
      realmId,
      send: (message) => {
        if (socket.readyState === socket.OPEN) {
          socket.send(JSON.stringify(message));
        }
      },
      close: (code, reason) => {
        if (socket.readyState === socket.OPEN) {
          socket.close(code, reason);
        }
      },
    };

    tracker.feed.attach(binding);

    socket.on("message", (raw: unknown) => {
      const payload = decodeFrame(raw);
      if (payload === null) {
        binding.send({
          type: "presence.error",
          code: "invalid_frame",
          message: "Inbound socket frame type is not supported",
          recoverable: false,
        });
        binding.close(4400, "invalid_frame");
        return;
      }

      let parsedJson: unknown;
      try {
        parsedJson = JSON.parse(payload);
      } catch {
        binding.send({
          type: "presence.error",
          code: "invalid_json",
          message: "Inbound socket payload is not valid JSON",
          recoverable: false,
        });
        binding.close(4400, "invalid_json");
        return;
      }

      const parsedMessage = PresenceSocketInboundSchema.safeParse(parsedJson);
      if (!parsedMessage.success) {
        binding.send({
          type: "presence.error",
          code: "invalid_message",
          message: "Inbound socket message failed validation",
          recoverable: false,
        });
        binding.close(4400, "invalid_message");
        return;
      }

      if (parsedMessage.data.type === "presence.snapshot.request") {
        tracker.feed.sendSnapshot(binding);
      }
    });

    socket.on("close", () => {
      tracker.feed.detach(binding);
    });
  });

  return app;
}
