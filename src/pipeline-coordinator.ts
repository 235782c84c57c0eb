// Crisis Relay - Pipeline Coordinator
//
// Runs one session's three duties against its CrisisSession:
//   input receiver  synchronous demux of every inbound message
//   voice duty      segment -> speech-to-text -> intelligence -> synthesis
//   text duty       text -> intelligence -> (optional) synthesis
//
// Each duty is a FIFO queue, so units within a duty keep arrival order while
// the two duties interleave freely at collaborator awaits. Session state is
// only touched through the session's synchronous methods.
//
// Escalations and reports run in the background and are tracked so shutdown
// can wait for them; session cancellation never aborts them.

import type { DegradedUnit, EntryChannel, EscalationTrigger, SessionTransport } from "./types.js";
import { CrisisSignal } from "./types.js";
import type { CrisisSession } from "./session.js";
import type { InboundMessage } from "./messages.js";
import type { SpeechToText } from "./speech-to-text.js";
import type { IntelligenceBackend } from "./intelligence.js";
import type { SynthesisEngine } from "./synthesis.js";
import { collectAudio } from "./synthesis.js";
import type { GuardianRelay } from "./guardian-relay.js";
import type { ReportSink } from "./evidence-vault.js";
import { UtteranceSegmenter } from "./utterance-segmenter.js";
import type { AudioSegment, SegmenterConfig } from "./utterance-segmenter.js";
import { removeFalseCapabilityClaims } from "./capability-guard.js";
import { detectUserIntents } from "./user-intents.js";
import { callCollaborator } from "./collaborator-call.js";
import { CrisisRelayError, InputError, StateInvariantViolation, describeError } from "./errors.js";
import { SerialQueue } from "./utils/serial-queue.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

/** Sent when the capability guard strips every sentence of a reply. */
export const FALLBACK_REPLY = "I'm here with you.";

export interface CoordinatorConfig {
  timeoutMs: number;
  contextSize: number;
  countdownSeconds: number;
  safeWord: string;
  segmenter?: Partial<SegmenterConfig>;
}

export interface CoordinatorDeps {
  speechToText: SpeechToText;
  intelligence: IntelligenceBackend;
  synthesis: SynthesisEngine;
  relay: GuardianRelay;
  reportSink: ReportSink;
  config: CoordinatorConfig;
  logger?: Logger;
}

export interface CoordinatorHooks {
  /** The session hit an invariant violation and must end. */
  onFatal: (err: StateInvariantViolation) => void;
  /** The user asked to end the session. */
  onEndRequested: () => void;
}

export class PipelineCoordinator {
  private readonly session: CrisisSession;
  private readonly transport: SessionTransport;
  private readonly deps: CoordinatorDeps;
  private readonly hooks: CoordinatorHooks;
  private readonly logger: Logger;

  private readonly controller = new AbortController();
  private readonly segmenter: UtteranceSegmenter;
  private readonly voiceQueue: SerialQueue;
  private readonly textQueue: SerialQueue;
  private readonly background = new Set<Promise<void>>();

  private lastAudioSeq = -1;
  private countdownTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(session: CrisisSession, transport: SessionTransport, deps: CoordinatorDeps, hooks: CoordinatorHooks) {
    this.session = session;
    this.transport = transport;
    this.deps = deps;
    this.hooks = hooks;
    this.logger = deps.logger ?? createConsoleLogger("PipelineCoordinator");

    this.voiceQueue = new SerialQueue((err) => this.handleUnitError("voice", err));
    this.textQueue = new SerialQueue((err) => this.handleUnitError("text", err));
    this.segmenter = new UtteranceSegmenter(deps.config.segmenter ?? {}, (segment) => {
      const arrivedAt = Date.now();
      this.voiceQueue.enqueue(() => this.processSegment(segment, arrivedAt));
    });
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get countdownActive(): boolean {
    return this.countdownTimer !== null;
  }

  // ─── Input receiver ─────────────────────────────────────────────────────────

  /**
   * Routes one inbound message. Never awaits; slow work is queued.
   * @throws InputError for a unit the session cannot accept
   */
  receive(message: InboundMessage): void {
    if (this.cancelled) {
      throw new InputError("Session has ended");
    }

    switch (message.type) {
      case "audio_chunk":
        if (message.seq <= this.lastAudioSeq) {
          throw new InputError(`Stale audio chunk seq ${message.seq} (last ${this.lastAudioSeq})`);
        }
        this.lastAudioSeq = message.seq;
        this.session.recordActivity();
        this.segmenter.feedChunk(message.bytes, message.seq);
        break;

      case "audio_end":
        this.session.recordActivity();
        this.segmenter.flush();
        break;

      case "text": {
        this.session.recordActivity();
        const arrivedAt = Date.now();
        const { content, speak } = message;
        this.textQueue.enqueue(() => this.respond(content, "text", speak, arrivedAt));
        break;
      }

      case "location":
        // Location alone is not a sign of life
        this.session.location.update({ lat: message.lat, lon: message.lon, timestamp: message.timestamp });
        break;

      case "sos":
        this.session.recordActivity();
        this.escalate("sos_button");
        break;

      case "heartbeat":
        this.session.recordActivity();
        break;

      case "user_profile":
        this.session.setUserProfile({ name: message.name, contacts: message.contacts });
        this.logger.info(`Session ${this.session.id}: profile set with ${message.contacts.length} contact(s)`);
        break;

      case "silent_mode":
        this.session.setSilentMode(message.enabled);
        break;

      case "cancel_countdown":
        this.cancelCountdown();
        break;

      case "confirm_safe":
        this.confirmSafe();
        break;

      case "end_session":
        this.hooks.onEndRequested();
        break;

      default: {
        const _exhaustive: never = message;
        throw new InputError(`Unknown message type: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  /** Invoked by the session's watchdog. */
  onSilence(silenceSeconds: number): void {
    this.logger.warn(`Session ${this.session.id}: no activity for ${silenceSeconds}s`);
    this.escalate("silence");
  }

  // ─── Duties ─────────────────────────────────────────────────────────────────

  private async processSegment(segment: AudioSegment, arrivedAt: number): Promise<void> {
    if (this.cancelled) return;
    const { speechToText, config } = this.deps;
    const transcript = await callCollaborator("speech-to-text", (signal) => speechToText.transcribe(segment, signal), {
      timeoutMs: config.timeoutMs,
      signal: this.controller.signal,
      retryOnTimeout: true,
    });
    if (transcript.length === 0 || this.cancelled) {
      return;
    }
    this.transport.send({ type: "transcript", text: transcript });
    await this.respond(transcript, "voice", true, arrivedAt);
  }

  /**
   * Shared tail of both duties: log the user's words, ask the backend, apply
   * its tokens, then answer in text and (optionally) audio.
   */
  private async respond(userText: string, channel: EntryChannel, speakAloud: boolean, arrivedAt: number): Promise<void> {
    // Units still queued when the session ended are dropped unread
    if (this.cancelled) return;
    const { session, transport, deps } = this;
    const { config } = deps;
    const signal = this.controller.signal;

    const context = session.log.tail(config.contextSize);
    session.log.append({ speaker: "user", channel, text: userText, timestamp: new Date(), mode: session.mode });
    this.handleUserIntents(userText);

    const raw = await callCollaborator(
      "intelligence",
      (s) =>
        deps.intelligence.respond(
          {
            transcript: userText,
            mode: session.mode,
            context,
            persona: { kind: "companion", userName: session.userName, safeWord: config.safeWord },
          },
          s,
        ),
      { timeoutMs: config.timeoutMs, signal },
    );

    const application = session.applyResponse(raw);
    for (const warning of application.warnings) {
      this.logger.warn(`Session ${session.id}: ${warning}`);
    }
    if (application.changed) {
      this.logger.info(`Session ${session.id}: mode ${application.previousMode} -> ${application.mode}`);
      transport.send({ type: "mode_changed", mode: application.mode });
    }
    this.handleSignals(application.signals);

    if (application.cleanedText.length === 0) {
      return;
    }

    const guarded = removeFalseCapabilityClaims(application.cleanedText);
    if (guarded.removed.length > 0) {
      this.logger.warn(`Session ${session.id}: removed ${guarded.removed.length} false capability claim(s)`);
    }
    const text = guarded.text || FALLBACK_REPLY;

    // Captured once: a later mode change cannot alter this request
    const profile = session.voiceProfile;

    session.log.append({ speaker: "assistant", channel, text, timestamp: new Date(), mode: application.mode });
    transport.send({ type: "text_out", content: text, mode: application.mode, latencyMs: Date.now() - arrivedAt });

    if (!speakAloud || session.silentMode) {
      return;
    }

    const audio = await callCollaborator(
      "synthesis",
      (s) => collectAudio(deps.synthesis.synthesize(text, profile, "browser", s)),
      { timeoutMs: config.timeoutMs, signal },
    );
    if (!this.cancelled) {
      transport.sendAudio(audio, profile, "browser");
    }
  }

  private handleUserIntents(userText: string): void {
    const intents = detectUserIntents(userText, this.deps.config.safeWord);
    if (intents.safe) {
      this.confirmSafe();
      return;
    }
    if (intents.cancel) {
      this.cancelCountdown();
    }
    if (intents.callRequest) {
      this.escalate("user_request");
    }
  }

  private handleSignals(signals: readonly CrisisSignal[]): void {
    for (const raised of signals) {
      switch (raised) {
        case CrisisSignal.SOS:
          this.escalate("sos_signal");
          break;
        case CrisisSignal.CALL:
          this.escalate("call_signal");
          break;
        case CrisisSignal.TIMER:
          this.startCountdown();
          break;
        case CrisisSignal.SAFE:
          this.confirmSafe();
          break;
        default: {
          const _exhaustive: never = raised;
          throw new StateInvariantViolation(`Unhandled signal ${String(_exhaustive)}`);
        }
      }
    }
  }

  private handleUnitError(unit: DegradedUnit, err: unknown): void {
    if (this.cancelled) {
      this.logger.info(`Session ${this.session.id}: ${unit} unit abandoned after cancellation`);
      return;
    }
    if (err instanceof StateInvariantViolation) {
      this.logger.error(`Session ${this.session.id}: ${err.message}`);
      this.hooks.onFatal(err);
      return;
    }
    const reason = err instanceof CrisisRelayError ? err.code : "internal_error";
    this.logger.error(`Session ${this.session.id}: ${unit} unit failed: ${describeError(err)}`);
    this.transport.send({ type: "degraded", unit, reason });
  }

  // ─── Escalation, countdown, safety ──────────────────────────────────────────

  private escalate(trigger: EscalationTrigger): void {
    if (this.cancelled || this.session.isClosed) {
      this.logger.info(`Session ${this.session.id}: ${trigger} ignored after the session ended`);
      return;
    }
    const task = this.deps.relay.escalate(this.session, trigger).then((result) => {
      if (result.status !== "dispatched") return;
      const { outcome } = result;
      this.cancelCountdown(false);
      this.transport.send({
        type: "escalation_notice",
        trigger: outcome.trigger,
        notified: outcome.notified.length,
        failed: outcome.failed.length,
        callInitiated: outcome.call !== null,
      });
    });
    this.track(task, `escalation (${trigger})`);
  }

  private startCountdown(): void {
    if (this.countdownTimer) {
      this.logger.info(`Session ${this.session.id}: countdown already running`);
      return;
    }
    const { countdownSeconds } = this.deps.config;
    this.countdownTimer = setTimeout(() => {
      this.countdownTimer = null;
      this.escalate("countdown");
    }, countdownSeconds * 1000);
    this.transport.send({ type: "countdown_started", seconds: countdownSeconds });
  }

  /** Returns false when no countdown was running. */
  private cancelCountdown(notify = true): boolean {
    if (!this.countdownTimer) return false;
    clearTimeout(this.countdownTimer);
    this.countdownTimer = null;
    if (notify) {
      this.transport.send({ type: "countdown_cancelled" });
    }
    return true;
  }

  /** The user is safe: stop any countdown, end the escalation episode, file a report. */
  private confirmSafe(): void {
    this.cancelCountdown();
    if (this.session.resetEscalation()) {
      this.logger.info(`Session ${this.session.id}: escalation reset by user`);
      this.transport.send({ type: "escalation_reset" });
    }
    this.fileReport();
  }

  fileReport(): void {
    const snapshot = this.session.snapshot();
    const task = callCollaborator("reporting", () => this.deps.reportSink.append(snapshot), {
      timeoutMs: this.deps.config.timeoutMs,
    }).then((handle) => {
      this.logger.info(`Session ${this.session.id}: report written to ${handle.path}`);
      this.transport.send({ type: "report_ready", fileName: handle.fileName });
    });
    this.track(task, "report");
  }

  private track(task: Promise<void>, label: string): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        this.logger.error(`Session ${this.session.id}: ${label} failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Cancels both duties and any countdown. In-flight collaborator calls are
   * abandoned; background escalations and reports keep running.
   */
  stop(): void {
    if (this.cancelled) return;
    this.controller.abort(new Error("Session ended"));
    this.segmenter.stop();
    if (this.countdownTimer) {
      clearTimeout(this.countdownTimer);
      this.countdownTimer = null;
    }
  }

  /** Resolves once no duty has queued work and no background task is running. */
  async idle(): Promise<void> {
    for (;;) {
      await Promise.all([this.voiceQueue.idle(), this.textQueue.idle()]);
      await Promise.allSettled([...this.background]);
      if (this.voiceQueue.size === 0 && this.textQueue.size === 0 && this.background.size === 0) {
        return;
      }
    }
  }

  /** Resolves once every background escalation and report has settled. */
  async settleBackground(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background]);
    }
  }
}
