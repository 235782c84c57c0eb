// Crisis Relay - Session Manager
// Top-level owner of every live session: creates the CrisisSession and its
// coordinator on connect, routes inbound messages, and tears both down on
// disconnect or explicit end.
//
// Shutdown is escalation-safe: an escalation already dispatching is allowed
// to finish before the session's report is filed and the transport closed.

import { v4 as uuidv4 } from "uuid";
import type { EmergencyContact, SessionEndReason, SessionTransport, UserProfile } from "./types.js";
import { CrisisSession } from "./session.js";
import type { InboundMessage } from "./messages.js";
import { PipelineCoordinator } from "./pipeline-coordinator.js";
import type { CoordinatorConfig } from "./pipeline-coordinator.js";
import { GuardianRelay } from "./guardian-relay.js";
import { CallBridge, CallBridgeRegistry } from "./call-bridge.js";
import type { SpeechToText } from "./speech-to-text.js";
import type { IntelligenceBackend } from "./intelligence.js";
import type { SynthesisEngine } from "./synthesis.js";
import type { Telephony } from "./telephony.js";
import type { ReportSink } from "./evidence-vault.js";
import type { VoiceProfileTable } from "./voice-profiles.js";
import type { ControlTokenVocabulary } from "./control-tokens.js";
import type { WatchdogConfig } from "./silence-watchdog.js";
import { InputError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerConfig extends CoordinatorConfig {
  watchdog: Partial<WatchdogConfig>;
  /** Profile every new session starts with, until the client sends its own. */
  defaultProfile: UserProfile;
}

export interface SessionManagerDeps {
  speechToText: SpeechToText;
  intelligence: IntelligenceBackend;
  synthesis: SynthesisEngine;
  telephony: Telephony;
  reportSink: ReportSink;
  profiles: VoiceProfileTable;
  vocabulary: ControlTokenVocabulary;
  config: SessionManagerConfig;
  bridges?: CallBridgeRegistry;
  logger?: Logger;
}

interface ManagedSession {
  session: CrisisSession;
  coordinator: PipelineCoordinator;
  transport: SessionTransport;
}

export class SessionManager {
  readonly bridges: CallBridgeRegistry;
  private readonly sessions = new Map<string, ManagedSession>();
  private readonly ending = new Map<string, Promise<void>>();
  private readonly deps: SessionManagerDeps;
  private readonly relay: GuardianRelay;
  private readonly logger: Logger;

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("SessionManager");
    this.bridges = deps.bridges ?? new CallBridgeRegistry();
    this.relay = new GuardianRelay({
      telephony: deps.telephony,
      openBridge: (session, contact) => this.openBridge(session, contact),
      timeoutMs: deps.config.timeoutMs,
      logger: deps.logger,
    });
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Creates a session for a new connection, arms its watchdog, and announces
   * it on the transport.
   */
  createSession(transport: SessionTransport): CrisisSession {
    const { deps } = this;
    const id = uuidv4();

    const session: CrisisSession = new CrisisSession({
      id,
      vocabulary: deps.vocabulary,
      profiles: deps.profiles,
      userProfile: deps.config.defaultProfile,
      watchdog: deps.config.watchdog,
      onSilence: (silenceSeconds) => coordinator.onSilence(silenceSeconds),
    });

    const coordinator: PipelineCoordinator = new PipelineCoordinator(
      session,
      transport,
      {
        speechToText: deps.speechToText,
        intelligence: deps.intelligence,
        synthesis: deps.synthesis,
        relay: this.relay,
        reportSink: deps.reportSink,
        config: deps.config,
        logger: deps.logger,
      },
      {
        onFatal: () => this.endInBackground(id, "invariant_violation"),
        onEndRequested: () => this.endInBackground(id, "user_ended"),
      },
    );

    this.sessions.set(id, { session, coordinator, transport });
    session.recordActivity();
    transport.send({ type: "session_started", sessionId: id, mode: session.mode });
    this.logger.info(`Created session ${id}`);
    return session;
  }

  /**
   * Retrieves a live session by ID.
   * Throws if the session does not exist.
   */
  getSession(sessionId: string): CrisisSession {
    return this.getEntry(sessionId).session;
  }

  /**
   * Routes one validated inbound message to the session's input receiver.
   * @throws InputError when the session cannot accept it
   */
  handleMessage(sessionId: string, message: InboundMessage): void {
    this.getEntry(sessionId).coordinator.receive(message);
  }

  /** Resolves once the session's queued work and background tasks settle. */
  idle(sessionId: string): Promise<void> {
    return this.getEntry(sessionId).coordinator.idle();
  }

  /**
   * Ends a session. Duties are cancelled and the watchdog disarmed at once;
   * an in-flight escalation is awaited before the report is filed. A graceful
   * disconnect never escalates. Calling this twice is harmless.
   */
  endSession(sessionId: string, reason: SessionEndReason): Promise<void> {
    const pending = this.ending.get(sessionId);
    if (pending) return pending;

    const entry = this.sessions.get(sessionId);
    if (!entry) return Promise.resolve();

    const task = this.teardown(sessionId, entry, reason).finally(() => {
      this.ending.delete(sessionId);
    });
    this.ending.set(sessionId, task);
    return task;
  }

  /** Ends every live session. */
  async shutdown(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.endSession(id, "server_shutdown")));
  }

  // ─── Private ────────────────────────────────────────────────────────────────

  private getEntry(sessionId: string): ManagedSession {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new InputError(`Session not found: ${sessionId}`);
    }
    return entry;
  }

  private async teardown(sessionId: string, entry: ManagedSession, reason: SessionEndReason): Promise<void> {
    const { session, coordinator, transport } = entry;
    this.logger.info(`Ending session ${sessionId} (${reason})`);

    coordinator.stop();
    session.close();

    await coordinator.settleBackground();

    // A plain disconnect only leaves evidence behind when something happened
    const escalated = session.snapshot().escalations.length > 0;
    if (reason !== "disconnect" || escalated) {
      coordinator.fileReport();
      await coordinator.settleBackground();
    }

    this.sessions.delete(sessionId);
    transport.send({ type: "session_ended", reason });
    transport.close();
    this.logger.info(`Session ${sessionId} ended`);
  }

  private endInBackground(sessionId: string, reason: SessionEndReason): void {
    this.endSession(sessionId, reason).catch((err: unknown) => {
      this.logger.error(`Failed to end session ${sessionId}: ${describeError(err)}`);
    });
  }

  private openBridge(session: CrisisSession, contact: EmergencyContact): CallBridge {
    const { deps } = this;
    const bridge = new CallBridge(session, contact, {
      intelligence: deps.intelligence,
      synthesis: deps.synthesis,
      vocabulary: deps.vocabulary,
      timeoutMs: deps.config.timeoutMs,
      contextSize: deps.config.contextSize,
      logger: deps.logger,
    });
    this.bridges.register(bridge);
    this.logger.info(`Opened call bridge ${bridge.id} for session ${session.id}`);
    return bridge;
  }
}
