// Crisis Relay - Client message schemas
//
// Every JSON frame from the client is validated here before it reaches a
// session. Binary frames are audio chunks and are decoded by the frame codec.

import { z } from "zod";
import { InputError } from "./errors.js";

const contactSchema = z.object({
  name: z.string().trim().min(1).max(100),
  phone: z.string().trim().min(3).max(32),
});

export const audioFormatSchema = z.object({
  type: z.literal("audio_format"),
  channels: z.number(),
  sampleRate: z.number(),
  encoding: z.string(),
});

export const clientMessageSchema = z.discriminatedUnion("type", [
  audioFormatSchema,
  z.object({ type: z.literal("audio_end") }),
  z.object({
    type: z.literal("text"),
    content: z.string().trim().min(1).max(2000),
    speak: z.boolean().default(false),
  }),
  z.object({
    type: z.literal("location"),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    timestamp: z.number().finite(),
  }),
  z.object({ type: z.literal("sos") }),
  z.object({ type: z.literal("heartbeat") }),
  z.object({
    type: z.literal("user_profile"),
    name: z.string().trim().min(1).max(100),
    contacts: z.array(contactSchema).min(1).max(10),
  }),
  z.object({ type: z.literal("silent_mode"), enabled: z.boolean() }),
  z.object({ type: z.literal("cancel_countdown") }),
  z.object({ type: z.literal("confirm_safe") }),
  z.object({ type: z.literal("end_session") }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type AudioFormatMessage = z.infer<typeof audioFormatSchema>;

/** A decoded binary audio frame. */
export interface AudioChunkMessage {
  type: "audio_chunk";
  bytes: Buffer;
  seq: number;
}

/** What a session's input receiver accepts: everything but the transport handshake. */
export type InboundMessage = Exclude<ClientMessage, AudioFormatMessage> | AudioChunkMessage;

/**
 * Validates a parsed JSON frame.
 * @throws InputError naming the first problem found
 */
export function parseClientMessage(raw: unknown): ClientMessage {
  const result = clientMessageSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new InputError(`Invalid message: ${where}${issue ? issue.message : "unknown problem"}`);
  }
  return result.data;
}

/**
 * Parses a text frame as JSON and validates it.
 * @throws InputError for invalid JSON or an invalid message
 */
export function parseClientFrame(text: string): ClientMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new InputError("Invalid JSON message");
  }
  return parseClientMessage(raw);
}
