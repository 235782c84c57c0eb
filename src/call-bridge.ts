// Crisis Relay - Call Bridge
//
// Lets an emergency contact on the phone ask free-form questions that the
// intelligence backend answers from the session's log and location. Bridges
// outlive the user's connection: a contact may still be on the line after the
// user's app has gone away.

import { v4 as uuidv4 } from "uuid";
import type { EmergencyContact } from "./types.js";
import type { CrisisSession } from "./session.js";
import type { IntelligenceBackend } from "./intelligence.js";
import type { SynthesisEngine } from "./synthesis.js";
import { collectAudio } from "./synthesis.js";
import type { BridgeEndpoint } from "./telephony.js";
import type { ControlTokenVocabulary } from "./control-tokens.js";
import { joinTextParts, scanControlTokens } from "./control-tokens.js";
import { removeFalseCapabilityClaims } from "./capability-guard.js";
import { BRIDGE_VOICE_PROFILE } from "./voice-profiles.js";
import { callCollaborator } from "./collaborator-call.js";
import { InputError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

export const MAX_QUESTION_LENGTH = 1000;

/** Said when the backend's answer is empty after filtering. */
export const BRIDGE_FALLBACK_ANSWER = "I don't have more details. Please try calling them directly.";

export interface CallBridgeDeps {
  intelligence: IntelligenceBackend;
  synthesis: SynthesisEngine;
  vocabulary: ControlTokenVocabulary;
  timeoutMs: number;
  contextSize: number;
  logger?: Logger;
}

export interface BridgeAnswer {
  text: string;
  /** 8 kHz WAV, or null when audio was not requested. */
  audio: Buffer | null;
}

export class CallBridge implements BridgeEndpoint {
  readonly id: string;
  readonly greeting: string;
  readonly contact: EmergencyContact;
  readonly createdAt: number;
  private readonly session: CrisisSession;
  private readonly deps: CallBridgeDeps;
  private readonly logger: Logger;

  constructor(session: CrisisSession, contact: EmergencyContact, deps: CallBridgeDeps) {
    this.id = uuidv4();
    this.session = session;
    this.contact = contact;
    this.deps = deps;
    this.createdAt = Date.now();
    this.logger = deps.logger ?? createConsoleLogger("CallBridge");
    this.greeting =
      `Hi ${contact.name}, this is ${session.userName}'s safety companion. ` +
      `${session.userName} has triggered an emergency alert. You can ask me what happened.`;
  }

  get sessionId(): string {
    return this.session.id;
  }

  /**
   * Answers one question from the contact. Both the question and the answer
   * go into the session log on the bridge channel.
   *
   * @throws InputError for an empty or oversized question
   * @throws CollaboratorTimeout / CollaboratorFailure from the backends
   */
  async ask(question: string, withAudio: boolean): Promise<BridgeAnswer> {
    const trimmed = question.trim();
    if (trimmed.length === 0 || trimmed.length > MAX_QUESTION_LENGTH) {
      throw new InputError(`Question must be 1-${MAX_QUESTION_LENGTH} characters`);
    }

    const { session, deps } = this;
    const context = session.log.tail(deps.contextSize);
    session.log.append({
      speaker: "contact",
      channel: "bridge",
      text: trimmed,
      timestamp: new Date(),
      mode: session.mode,
    });

    const raw = await callCollaborator(
      "intelligence",
      (signal) =>
        deps.intelligence.respond(
          {
            transcript: trimmed,
            mode: session.mode,
            context,
            persona: {
              kind: "contact",
              userName: session.userName,
              contactName: this.contact.name,
              location: session.location.read(),
            },
          },
          signal,
        ),
      { timeoutMs: deps.timeoutMs },
    );

    // Tokens in a contact-facing answer never touch the user's mode
    const stripped = joinTextParts(scanControlTokens(raw, deps.vocabulary));
    const text = removeFalseCapabilityClaims(stripped).text || BRIDGE_FALLBACK_ANSWER;

    session.log.append({
      speaker: "assistant",
      channel: "bridge",
      text,
      timestamp: new Date(),
      mode: session.mode,
    });

    if (!withAudio) {
      return { text, audio: null };
    }

    const audio = await callCollaborator(
      "synthesis",
      (signal) => collectAudio(deps.synthesis.synthesize(text, BRIDGE_VOICE_PROFILE, "telephony", signal)),
      { timeoutMs: deps.timeoutMs },
    );
    this.logger.info(`Bridge ${this.id} answered (${audio.length} bytes audio)`);
    return { text, audio };
  }
}

// ─── Registry ───────────────────────────────────────────────────────────────────

/** Default lifetime of a bridge: long enough for a worried contact to keep asking. */
export const DEFAULT_BRIDGE_MAX_AGE_MS = 60 * 60 * 1000;

export class CallBridgeRegistry {
  private readonly bridges = new Map<string, CallBridge>();
  private readonly maxAgeMs: number;

  constructor(maxAgeMs: number = DEFAULT_BRIDGE_MAX_AGE_MS) {
    this.maxAgeMs = maxAgeMs;
  }

  register(bridge: CallBridge): void {
    this.prune();
    this.bridges.set(bridge.id, bridge);
  }

  get(id: string): CallBridge | null {
    this.prune();
    return this.bridges.get(id) ?? null;
  }

  get size(): number {
    return this.bridges.size;
  }

  private prune(): void {
    const cutoff = Date.now() - this.maxAgeMs;
    for (const [id, bridge] of this.bridges) {
      if (bridge.createdAt < cutoff) {
        this.bridges.delete(id);
      }
    }
  }
}
