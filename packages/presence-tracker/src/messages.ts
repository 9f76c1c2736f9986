import type { MessageField, PresenceDelta, RealmDownEvent, RealmStaleEvent, RenderedMessage } from "./types.js";

export const ROSTER_COLOR = 0x607d8b;
export const WARNING_COLOR = 0xf1c40f;
export const DISABLED_COLOR = 0xe74c3c;

function namesFor(ids: Iterable<string>, names: ReadonlyMap<string, string>): string {
  return Array.from(ids, (id) => names.get(id) ?? id)
    .sort((a, b) => a.localeCompare(b))
    .join("\n");
}

export function renderRosterChange(
  delta: PresenceDelta,
  names: ReadonlyMap<string, string>,
  onlineCount: number,
): RenderedMessage {
  const fields: MessageField[] = [];
  if (delta.joined.size > 0) {
    fields.push({ name: "Joined", value: namesFor(delta.joined, names) });
  }
  if (delta.left.size > 0) {
    fields.push({ name: "Left", value: namesFor(delta.left, names) });
  }
  return {
    color: ROSTER_COLOR,
    fields,
    footer: `${onlineCount} online as of`,
    timestampMs: delta.timestampMs,
  };
}

export function renderRealmOffline(event: RealmDownEvent, offlineRoleId: string): RenderedMessage {
  return {
    content: `<@&${offlineRoleId}>`,
    title: "Realm Offline",
    description: "The realm appears to be offline (or possibly it has no participants).",
    color: WARNING_COLOR,
    fields: [],
    timestampMs: event.timestampMs,
    mentionRoles: [offlineRoleId],
  };
}

export function renderStaleWarning(event: RealmStaleEvent, staleAfterHours: number): RenderedMessage {
  return {
    title: "Warning",
    description:
      `No information about realm ${event.realmId} has arrived for the last ${staleAfterHours} hours. ` +
      "The realm may have been shut down or be inactive. If it is running, make sure the tracker " +
      "account has not been removed or banned from it, then save this destination again. " +
      "Unlink the realm from this destination if you no longer want these notices.",
    color: WARNING_COLOR,
    fields: [],
    timestampMs: event.timestampMs,
  };
}

export function renderRealmUnlinked(realmId: string, timestampMs: number): RenderedMessage {
  return {
    title: "Realm Unlinked",
    description:
      `Realm ${realmId} has sent no data for too long, so this destination has been unlinked from it. ` +
      "Save the destination with the realm again once the realm is reachable.",
    color: DISABLED_COLOR,
    fields: [],
    timestampMs,
  };
}
