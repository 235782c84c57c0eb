// Crisis Relay - Shared TypeScript interfaces and types

// ─── Crisis Modes ───────────────────────────────────────────────────────────────

export enum CrisisMode {
  DEFAULT = "DEFAULT",
  STEALTH = "STEALTH",
  DECOY = "DECOY",
  URGENT = "URGENT",
  CALM = "CALM",
  PIZZA_OPS = "PIZZA_OPS",
}

export const CRISIS_MODES: readonly CrisisMode[] = Object.freeze(Object.values(CrisisMode));

export function isCrisisMode(value: string): value is CrisisMode {
  return CRISIS_MODES.some((mode) => mode === value);
}

// ─── Signals ────────────────────────────────────────────────────────────────────

/** Signals raised by `SIGNAL:<name>` control tokens. They never change the mode. */
export enum CrisisSignal {
  CALL = "CALL",
  SOS = "SOS",
  TIMER = "TIMER",
  SAFE = "SAFE",
}

export const CRISIS_SIGNALS: readonly CrisisSignal[] = Object.freeze(Object.values(CrisisSignal));

export function isCrisisSignal(value: string): value is CrisisSignal {
  return CRISIS_SIGNALS.some((signal) => signal === value);
}

// ─── Voice Profiles ─────────────────────────────────────────────────────────────

export interface VoiceProfile {
  readonly voiceId: string;
  readonly style: string;
  /** Rate offset applied by the synthesis backend, roughly -50..50. */
  readonly rate: number;
  /** Pitch offset applied by the synthesis backend, roughly -50..50. */
  readonly pitch: number;
}

/** Output encodings the synthesis collaborator must support. */
export type SynthesisFormat = "browser" | "telephony";

// ─── Conversation Log ───────────────────────────────────────────────────────────

export type Speaker = "user" | "assistant" | "contact";

export type EntryChannel = "voice" | "text" | "bridge";

export interface ConversationEntry {
  readonly seq: number;
  readonly speaker: Speaker;
  readonly channel: EntryChannel;
  readonly text: string;
  readonly timestamp: Date;
  /** Mode in force once this entry was appended. */
  readonly mode: CrisisMode;
}

export type NewConversationEntry = Omit<ConversationEntry, "seq">;

// ─── Location ───────────────────────────────────────────────────────────────────

export interface LocationFix {
  readonly lat: number;
  readonly lon: number;
  /** Epoch milliseconds reported by the device. */
  readonly timestamp: number;
}

export type LocationReading =
  | { readonly known: false }
  | { readonly known: true; readonly fix: LocationFix };

// ─── Contacts & Escalation ──────────────────────────────────────────────────────

export interface EmergencyContact {
  readonly name: string;
  readonly phone: string;
}

export interface UserProfile {
  readonly name: string;
  readonly contacts: readonly EmergencyContact[];
}

export enum EscalationState {
  IDLE = "idle",
  ESCALATING = "escalating",
  ESCALATED = "escalated",
}

export type EscalationTrigger =
  | "silence"
  | "sos_button"
  | "sos_signal"
  | "call_signal"
  | "countdown"
  | "user_request";

export interface NotificationAck {
  readonly contact: EmergencyContact;
  readonly reference: string;
}

export interface CallHandle {
  readonly contact: EmergencyContact;
  readonly bridgeId: string;
  readonly reference: string;
}

export interface EscalationOutcome {
  readonly trigger: EscalationTrigger;
  readonly notified: readonly NotificationAck[];
  readonly failed: readonly EmergencyContact[];
  readonly call: CallHandle | null;
}

// ─── Reporting ──────────────────────────────────────────────────────────────────

export interface ModeChange {
  readonly from: CrisisMode;
  readonly to: CrisisMode;
  readonly at: Date;
}

/** Read-only view of a session handed to escalation and reporting collaborators. */
export interface SessionSnapshot {
  readonly sessionId: string;
  readonly takenAt: Date;
  readonly userName: string;
  readonly mode: CrisisMode;
  readonly location: LocationReading;
  readonly entries: readonly ConversationEntry[];
  readonly modeHistory: readonly ModeChange[];
  readonly escalations: readonly EscalationOutcome[];
}

export interface ReportHandle {
  readonly fileName: string;
  readonly path: string;
}

// ─── Outbound Messages ──────────────────────────────────────────────────────────

export type DegradedUnit = "voice" | "text" | "bridge";

export type SessionEndReason = "disconnect" | "user_ended" | "invariant_violation" | "server_shutdown";

export type ServerMessage =
  | { type: "session_started"; sessionId: string; mode: CrisisMode }
  | { type: "mode_changed"; mode: CrisisMode }
  | { type: "transcript"; text: string }
  | { type: "text_out"; content: string; mode: CrisisMode; latencyMs: number }
  | { type: "audio_out"; profile: VoiceProfile; format: SynthesisFormat; byteLength: number }
  | {
      type: "escalation_notice";
      trigger: EscalationTrigger;
      notified: number;
      failed: number;
      callInitiated: boolean;
    }
  | { type: "escalation_reset" }
  | { type: "countdown_started"; seconds: number }
  | { type: "countdown_cancelled" }
  | { type: "degraded"; unit: DegradedUnit; reason: string }
  | { type: "report_ready"; fileName: string }
  | { type: "session_ended"; reason: SessionEndReason }
  | { type: "error"; message: string; recoverable: boolean }
  | { type: "audio_format_error"; message: string };

/** Outbound side of one session's duplex channel. */
export interface SessionTransport {
  send(message: ServerMessage): void;
  sendAudio(audio: Buffer, profile: VoiceProfile, format: SynthesisFormat): void;
  close(): void;
}

// ─── Utilities ──────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}
