import { z } from "zod";

export const RealmIdSchema = z.string().min(1).max(128);
export const ParticipantIdSchema = z.string().min(1).max(128);

export const FailureClassSchema = z.enum(["channel", "realm-missing", "offline-role"]);

export const DestinationConfigInputSchema = z.object({
  realmId: RealmIdSchema.nullable(),
  channelUrl: z.string().url().nullable(),
  liveUpdates: z.boolean().default(false),
  warningNotifications: z.boolean().default(true),
  offlineRoleId: z.string().min(1).nullable().default(null),
  refreshNames: z.boolean().default(false),
  entitled: z.boolean().default(false),
});

export const DestinationConfigSchema = DestinationConfigInputSchema.extend({
  destinationId: z.string().min(1),
});

export const RealmPresenceSchema = z.object({
  realmId: RealmIdSchema,
  online: z.array(ParticipantIdSchema),
  offline: z.boolean(),
  tracked: z.boolean(),
  timestampMs: z.number().int().nonnegative(),
});

export const PollCycleResultSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("skipped"), realmId: RealmIdSchema }),
  z.object({ status: z.literal("failed"), realmId: RealmIdSchema, error: z.string() }),
  z.object({
    status: z.literal("completed"),
    realmId: RealmIdSchema,
    reachable: z.boolean(),
    joined: z.array(ParticipantIdSchema),
    left: z.array(ParticipantIdSchema),
    stale: z.boolean(),
    dropped: z.boolean(),
  }),
]);

export const PresenceFeedRequestSchema = z.object({
  realmId: RealmIdSchema,
});

export const PresenceFeedResponseSchema = z.object({
  realmId: RealmIdSchema,
  feedUrl: z.string().url(),
  feedToken: z.string().min(1),
  expiresAtMs: z.number().int().nonnegative(),
});

export const PresenceSnapshotMessageSchema = z.object({
  type: z.literal("presence.snapshot"),
  realmId: RealmIdSchema,
  online: z.array(ParticipantIdSchema),
  offline: z.boolean(),
  timestampMs: z.number().int().nonnegative(),
});

export const PresenceDeltaMessageSchema = z.object({
  type: z.literal("presence.delta"),
  realmId: RealmIdSchema,
  joined: z.array(ParticipantIdSchema),
  left: z.array(ParticipantIdSchema),
  onlineCount: z.number().int().nonnegative(),
  timestampMs: z.number().int().nonnegative(),
});

export const RealmStatusMessageSchema = z.object({
  type: z.literal("realm.status"),
  realmId: RealmIdSchema,
  status: z.enum(["down", "stale", "dropped"]),
  timestampMs: z.number().int().nonnegative(),
});

export const PresenceErrorMessageSchema = z.object({
  type: z.literal("presence.error"),
  code: z.string(),
  message: z.string(),
  recoverable: z.boolean(),
});

export const PresenceSnapshotRequestMessageSchema = z.object({
  type: z.literal("presence.snapshot.request"),
});

export const PresenceSocketInboundSchema = z.discriminatedUnion("type", [
  PresenceSnapshotRequestMessageSchema,
]);

export const PresenceSocketOutboundSchema = z.discriminatedUnion("type", [
  PresenceSnapshotMessageSchema,
  PresenceDeltaMessageSchema,
  RealmStatusMessageSchema,
  PresenceErrorMessageSchema,
]);

export type FailureClass = z.infer<typeof FailureClassSchema>;
export type DestinationConfigInput = z.infer<typeof DestinationConfigInputSchema>;
export type DestinationConfig = z.infer<typeof DestinationConfigSchema>;
export type RealmPresence = z.infer<typeof RealmPresenceSchema>;
export type PollCycleResult = z.infer<typeof PollCycleResultSchema>;
export type PresenceFeedRequest = z.infer<typeof PresenceFeedRequestSchema>;
export type PresenceFeedResponse = z.infer<typeof PresenceFeedResponseSchema>;
export type PresenceSocketInbound = z.infer<typeof PresenceSocketInboundSchema>;
export type PresenceSocketOutbound = z.infer<typeof PresenceSocketOutboundSchema>;
