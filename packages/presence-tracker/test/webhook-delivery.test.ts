import { describe, expect, it } from "vitest";
import {
  ChannelMissingError,
  DeliveryError,
  DeliveryPermissionError,
  EntitlementLostError,
} from "../src/errors.js";
import { renderRealmOffline } from "../src/messages.js";
import { toWebhookPayload, WebhookDeliveryClient } from "../src/webhook-delivery.js";
import { makeDestination } from "./fakes.js";

interface CapturedRequest {
  url: string;
  body: string;
}

function fakeFetch(status: number, captured: CapturedRequest[] = []): typeof fetch {
  return async (input, init) => {
    captured.push({ url: String(input), body: typeof init?.body === "string" ? init.body : "" });
    return new Response(null, { status });
  };
}

describe("toWebhookPayload", () => {
  it("maps a rendered message to an embed with role mentions", () => {
    const payload = toWebhookPayload(
      renderRealmOffline({ realmId: "realm-1", disconnected: new Set(), timestampMs: 0 }, "role-9"),
    );

    expect(payload.content).toBe("<@&role-9>");
    expect(payload.embeds[0]?.title).toBe("Realm Offline");
    expect(payload.embeds[0]?.timestamp).toBe("1970-01-01T00:00:00.000Z");
    expect(payload.allowed_mentions).toEqual({ parse: [], roles: ["role-9"] });
  });

  it("marks fields inline and wraps the footer", () => {
    const payload = toWebhookPayload({ color: 1, fields: [{ name: "Joined", value: "a" }], footer: "1 online as of" });

    expect(payload.embeds[0]?.fields).toEqual([{ name: "Joined", value: "a", inline: true }]);
    expect(payload.embeds[0]?.footer).toEqual({ text: "1 online as of" });
    expect(payload.allowed_mentions.roles).toEqual([]);
  });
});

describe("WebhookDeliveryClient", () => {
  it("posts the payload to the channel url", async () => {
    const captured: CapturedRequest[] = [];
    const client = new WebhookDeliveryClient(fakeFetch(204, captured));

    await client.deliver(makeDestination(), { color: 1, fields: [], title: "Hi" });

    expect(captured).toHaveLength(1);
    expect(captured[0]?.url).toBe("https://hooks.example.test/dest-1");
    expect(JSON.parse(captured[0]?.body ?? "{}").embeds[0].title).toBe("Hi");
  });

  it("classifies rejections by status", async () => {
    const message = { color: 1, fields: [] };
    const cases: Array<[number, new (...args: never[]) => Error]> = [
      [403, DeliveryPermissionError],
      [401, DeliveryPermissionError],
      [404, ChannelMissingError],
      [410, ChannelMissingError],
      [402, EntitlementLostError],
      [500, DeliveryError],
    ];

    for (const [status, expected] of cases) {
      const client = new WebhookDeliveryClient(fakeFetch(status));
      await expect(client.deliver(makeDestination(), message)).rejects.toBeInstanceOf(expected);
    }
  });

  it("refuses destinations without a channel", async () => {
    const captured: CapturedRequest[] = [];
    const client = new WebhookDeliveryClient(fakeFetch(204, captured));

    await expect(client.deliver(makeDestination({ channelUrl: null }), { color: 1, fields: [] }))
      .rejects.toBeInstanceOf(ChannelMissingError);
    expect(captured).toEqual([]);
  });

  it("releases the response body whatever the status", async () => {
    let cancelled = 0;
    const fetchWithBody = (status: number): typeof fetch => async () => {
      const response = new Response("reply", { status });
      const body = response.body;
      if (body) {
        const cancel = body.cancel.bind(body);
        body.cancel = async (reason) => {
          cancelled += 1;
          return cancel(reason);
        };
      }
      return response;
    };

    await new WebhookDeliveryClient(fetchWithBody(200)).deliver(makeDestination(), { color: 1, fields: [] });
    await expect(new WebhookDeliveryClient(fetchWithBody(403)).deliver(makeDestination(), { color: 1, fields: [] }))
      .rejects.toBeInstanceOf(DeliveryPermissionError);

    expect(cancelled).toBe(2);
  });
});
