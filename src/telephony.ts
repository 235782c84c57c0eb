// Crisis Relay - Telephony
// Text-message notifications and the primary-contact call through Twilio.
// Neither call is retried: a duplicate alert or a second ringing phone is
// worse than one logged failure.

import type { CallHandle, EmergencyContact, LocationReading, NotificationAck } from "./types.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { formatMapsLink } from "./location-store.js";

// ─── Collaborator contract ──────────────────────────────────────────────────────

/** What a dialled call needs to know about the bridge it connects to. */
export interface BridgeEndpoint {
  readonly id: string;
  /** Spoken to the contact when the call connects. */
  readonly greeting: string;
}

export interface Telephony {
  sendNotification(contact: EmergencyContact, message: string, location: LocationReading): Promise<NotificationAck>;
  dial(contact: EmergencyContact, bridge: BridgeEndpoint): Promise<CallHandle>;
}

// ─── Twilio client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the Twilio REST surface we use.
 * The SDK client returned by `twilio(sid, token)` satisfies it.
 */
export interface TwilioClient {
  messages: {
    create(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
  };
  calls: {
    create(params: { twiml: string; from: string; to: string }): Promise<{ sid: string }>;
  };
}

export interface TwilioTelephonyOptions {
  /** Caller id and sender number in E.164. */
  from: string;
  /** Public host of the media gateway. Without it calls play the greeting only. */
  publicHost?: string;
  logger?: Logger;
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function describeLocation(location: LocationReading): string {
  if (!location.known) return "Location unknown";
  const { fix } = location;
  return `Last known location: ${formatMapsLink(fix)} (at ${new Date(fix.timestamp).toISOString()})`;
}

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * TwiML for the bridged call: greet the contact, then hand the audio to the
 * media gateway, which relays the contact's questions to the bridge.
 */
export function buildBridgeTwiml(bridge: BridgeEndpoint, publicHost: string | undefined): string {
  const say = `<Say voice="alice">${escapeXml(bridge.greeting)}</Say>`;
  if (!publicHost) {
    return `<Response>${say}</Response>`;
  }
  const host = publicHost.replace(/^https?:\/\//, "").replace(/\/+$/, "");
  return (
    `<Response>${say}<Connect><Stream url="wss://${escapeXml(host)}/media">` +
    `<Parameter name="bridgeId" value="${escapeXml(bridge.id)}" />` +
    `</Stream></Connect></Response>`
  );
}

// ─── Twilio ─────────────────────────────────────────────────────────────────────

export class TwilioTelephony implements Telephony {
  private readonly client: TwilioClient;
  private readonly from: string;
  private readonly publicHost: string | undefined;
  private readonly logger: Logger;

  constructor(client: TwilioClient, options: TwilioTelephonyOptions) {
    this.client = client;
    this.from = options.from;
    this.publicHost = options.publicHost;
    this.logger = options.logger ?? createConsoleLogger("Telephony");
  }

  async sendNotification(contact: EmergencyContact, message: string, location: LocationReading): Promise<NotificationAck> {
    const sent = await this.client.messages.create({
      body: `${message}\n\n${describeLocation(location)}`,
      from: this.from,
      to: contact.phone,
    });
    this.logger.info(`Notification sent to ${contact.name} (${sent.sid})`);
    return { contact, reference: sent.sid };
  }

  async dial(contact: EmergencyContact, bridge: BridgeEndpoint): Promise<CallHandle> {
    const call = await this.client.calls.create({
      twiml: buildBridgeTwiml(bridge, this.publicHost),
      from: this.from,
      to: contact.phone,
    });
    this.logger.info(`Bridge ${bridge.id} dialled to ${contact.name} (${call.sid})`);
    return { contact, bridgeId: bridge.id, reference: call.sid };
  }
}

// ─── Unconfigured deployments ───────────────────────────────────────────────────

/**
 * Stands in when no Twilio credentials are configured: every dispatch is
 * logged and acknowledged so the rest of the escalation path still runs.
 */
export class LoggingTelephony implements Telephony {
  private readonly logger: Logger;
  private counter = 0;

  constructor(logger: Logger = createConsoleLogger("Telephony")) {
    this.logger = logger;
  }

  async sendNotification(contact: EmergencyContact, message: string, location: LocationReading): Promise<NotificationAck> {
    this.logger.warn(
      `Telephony not configured; notification for ${contact.name} not sent (${message.length} chars, location ${location.known ? "known" : "unknown"})`,
    );
    return { contact, reference: `unsent-${++this.counter}` };
  }

  async dial(contact: EmergencyContact, bridge: BridgeEndpoint): Promise<CallHandle> {
    this.logger.warn(`Telephony not configured; bridge ${bridge.id} to ${contact.name} not dialled`);
    return { contact, bridgeId: bridge.id, reference: `unsent-${++this.counter}` };
  }
}
