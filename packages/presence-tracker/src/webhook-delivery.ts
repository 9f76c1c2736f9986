import type { DestinationConfig } from "@realm-presence/presence-contracts";
import {
  ChannelMissingError,
  DeliveryError,
  DeliveryPermissionError,
  EntitlementLostError,
} from "./errors.js";
import type { DeliveryClient, RenderedMessage } from "./types.js";

export interface WebhookPayload {
  content?: string;
  embeds: Array<{
    title?: string;
    description?: string;
    color: number;
    fields: Array<{ name: string; value: string; inline: boolean }>;
    footer?: { text: string };
    timestamp?: string;
  }>;
  allowed_mentions: { parse: string[]; roles: string[] };
}

export function toWebhookPayload(message: RenderedMessage): WebhookPayload {
  return {
    content: message.content,
    embeds: [
      {
        title: message.title,
        description: message.description,
        color: message.color,
        fields: message.fields.map((field) => ({ ...field, inline: true })),
        footer: message.footer ? { text: message.footer } : undefined,
        timestamp: message.timestampMs !== undefined ? new Date(message.timestampMs).toISOString() : undefined,
      },
    ],
    allowed_mentions: { parse: [], roles: message.mentionRoles ?? [] },
  };
}

export class WebhookDeliveryClient implements DeliveryClient {
  constructor(
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly timeoutMs = 10_000,
  ) {}

  async deliver(destination: DestinationConfig, message: RenderedMessage): Promise<void> {
    if (!destination.channelUrl) {
      throw new ChannelMissingError(`Destination ${destination.destinationId} has no channel`);
    }

    const response = await this.fetchImpl(destination.channelUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(toWebhookPayload(message)),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    // Nothing is read from the reply; releasing the body frees the connection.
    await response.body?.cancel();
    if (response.ok) {
      return;
    }

    const reason = `Delivery to ${destination.destinationId} failed with ${response.status}`;
    switch (response.status) {
      case 401:
      case 403:
        throw new DeliveryPermissionError(reason, response.status);
      case 404:
      case 410:
        throw new ChannelMissingError(reason, response.status);
      case 402:
        throw new EntitlementLostError(reason, response.status);
      default:
        throw new DeliveryError(reason, response.status);
    }
  }
}
