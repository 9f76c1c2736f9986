import { RoomServiceClient } from "livekit-server-sdk";
import type { DisplayNameSource, PollOutcome, PresenceSource } from "./types.js";

function isNotFound(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  const status = "status" in error ? error.status : undefined;
  const code = "code" in error ? error.code : undefined;
  return status === 404 || code === "not_found";
}

/**
 * Treats each LiveKit room as a realm. The tracker joins rooms under its own
 * identity, which is left out of every roster and removed again on unsubscribe.
 */
export class LiveKitPresenceSource implements PresenceSource, DisplayNameSource {
  private readonly roomService: RoomServiceClient;

  constructor(
    serverApiUrl: string,
    apiKey: string,
    apiSecret: string,
    private readonly trackerIdentity: string,
  ) {
    this.roomService = new RoomServiceClient(serverApiUrl, apiKey, apiSecret);
  }

  async poll(realmId: string): Promise<PollOutcome> {
    let participants: Awaited<ReturnType<RoomServiceClient["listParticipants"]>>;
    try {
      participants = await this.roomService.listParticipants(realmId);
    } catch (error) {
      if (isNotFound(error)) {
        return { kind: "unreachable" };
      }
      throw error;
    }

    return {
      kind: "snapshot",
      participants: participants
        .filter((participant) => participant.identity !== this.trackerIdentity)
        .map((participant) => ({
          participantId: participant.identity,
          displayName: participant.name.length > 0 ? participant.name : undefined,
        })),
    };
  }

  async unsubscribe(realmId: string): Promise<void> {
    try {
      await this.roomService.removeParticipant(realmId, this.trackerIdentity);
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }
  }

  async fetchDisplayNames(realmId: string, participantIds: string[]): Promise<Map<string, string>> {
    const wanted = new Set(participantIds);
    const names = new Map<string, string>();
    for (const participant of await this.roomService.listParticipants(realmId)) {
      if (wanted.has(participant.identity) && participant.name.length > 0) {
        names.set(participant.identity, participant.name);
      }
    }
    return names;
  }
}
