// Crisis Relay - Telephony tests

import { describe, it, expect, vi } from "vitest";
import { buildBridgeTwiml, describeLocation, escapeXml, LoggingTelephony, TwilioTelephony } from "./telephony.js";
import type { TwilioClient } from "./telephony.js";
import type { Logger } from "./logger.js";

const contact = { name: "Sam", phone: "+15550100" };
const bridge = { id: "bridge-1", greeting: "This is Maya's safety companion." };

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function fakeTwilio() {
  const messages = vi.fn().mockResolvedValue({ sid: "SM123" });
  const calls = vi.fn().mockResolvedValue({ sid: "CA456" });
  const client: TwilioClient = { messages: { create: messages }, calls: { create: calls } };
  return { client, messages, calls };
}

describe("describeLocation", () => {
  it("links a known fix", () => {
    expect(describeLocation({ known: true, fix: { lat: 1.5, lon: 2.25, timestamp: 0 } })).toBe(
      "Last known location: https://maps.google.com/maps?q=1.5,2.25 (at 1970-01-01T00:00:00.000Z)",
    );
  });

  it("says when the location is unknown", () => {
    expect(describeLocation({ known: false })).toBe("Location unknown");
  });
});

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`Tom & "Jerry" <'x'>`)).toBe("Tom &amp; &quot;Jerry&quot; &lt;&apos;x&apos;&gt;");
  });
});

describe("buildBridgeTwiml", () => {
  it("only greets when there is no public host", () => {
    expect(buildBridgeTwiml(bridge, undefined)).toBe(
      `<Response><Say voice="alice">This is Maya&apos;s safety companion.</Say></Response>`,
    );
  });

  it("connects a media stream tagged with the bridge id", () => {
    expect(buildBridgeTwiml(bridge, "https://relay.example.test/")).toBe(
      `<Response><Say voice="alice">This is Maya&apos;s safety companion.</Say>` +
        `<Connect><Stream url="wss://relay.example.test/media">` +
        `<Parameter name="bridgeId" value="bridge-1" />` +
        `</Stream></Connect></Response>`,
    );
  });
});

describe("TwilioTelephony", () => {
  it("sends the message with the location appended", async () => {
    const { client, messages } = fakeTwilio();
    const telephony = new TwilioTelephony(client, { from: "+15550199", logger: silentLogger() });

    const ack = await telephony.sendNotification(contact, "Maya needs help.", { known: false });

    expect(ack).toEqual({ contact, reference: "SM123" });
    expect(messages).toHaveBeenCalledWith({
      body: "Maya needs help.\n\nLocation unknown",
      from: "+15550199",
      to: "+15550100",
    });
  });

  it("dials the contact into the bridge", async () => {
    const { client, calls } = fakeTwilio();
    const telephony = new TwilioTelephony(client, { from: "+15550199", logger: silentLogger() });

    const handle = await telephony.dial(contact, bridge);

    expect(handle).toEqual({ contact, bridgeId: "bridge-1", reference: "CA456" });
    expect(calls).toHaveBeenCalledWith({
      twiml: buildBridgeTwiml(bridge, undefined),
      from: "+15550199",
      to: "+15550100",
    });
  });

  it("propagates Twilio errors without retrying", async () => {
    const { client, messages } = fakeTwilio();
    messages.mockRejectedValue(new Error("invalid number"));
    const telephony = new TwilioTelephony(client, { from: "+15550199", logger: silentLogger() });

    await expect(telephony.sendNotification(contact, "x", { known: false })).rejects.toThrow("invalid number");
    expect(messages).toHaveBeenCalledTimes(1);
  });
});

describe("LoggingTelephony", () => {
  it("acknowledges with numbered unsent references and warns", async () => {
    const logger = silentLogger();
    const telephony = new LoggingTelephony(logger);

    await expect(telephony.sendNotification(contact, "hello", { known: false })).resolves.toEqual({
      contact,
      reference: "unsent-1",
    });
    await expect(telephony.dial(contact, bridge)).resolves.toEqual({
      contact,
      bridgeId: "bridge-1",
      reference: "unsent-2",
    });
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});
