import { randomUUID } from "node:crypto";
import { InvariantViolationError } from "./errors.js";

// Ids may contain any separator, so the pair is encoded rather than joined.
function pairKey(realmId: string, participantId: string): string {
  return JSON.stringify([realmId, participantId]);
}

/**
 * Hands out correlation ids for (realm, participant) pairs. The id is the
 * conflict key for session upserts, so a pair must never get a second one.
 */
export class IdentityResolver {
  private readonly ids = new Map<string, string>();

  constructor(private readonly generate: () => string = randomUUID) {}

  resolve(realmId: string, participantId: string): string {
    const key = pairKey(realmId, participantId);
    let id = this.ids.get(key);
    if (!id) {
      id = this.generate();
      this.ids.set(key, id);
    }
    return id;
  }

  /** Preloads an id read back from durable storage. */
  seed(realmId: string, participantId: string, correlationId: string): void {
    const key = pairKey(realmId, participantId);
    const existing = this.ids.get(key);
    if (existing && existing !== correlationId) {
      throw new InvariantViolationError(
        `Correlation id mismatch for ${realmId}/${participantId}: ${existing} already assigned, got ${correlationId}`,
      );
    }
    this.ids.set(key, correlationId);
  }

  get size(): number {
    return this.ids.size;
  }
}
