// Crisis Relay - Session aggregate
//
// One CrisisSession per connection. Each mutable field has a single writer
// method on this class; duties never assign fields directly. Because each of
// those methods runs to completion without awaiting, every update is atomic
// with respect to the other duties of the session.

import { EscalationState } from "./types.js";
import type {
  CrisisMode,
  EmergencyContact,
  EscalationOutcome,
  SessionSnapshot,
  UserProfile,
  VoiceProfile,
} from "./types.js";
import { ConversationLog } from "./conversation-log.js";
import { LocationStore } from "./location-store.js";
import { CrisisModeMachine } from "./crisis-mode.js";
import type { ModeApplication } from "./crisis-mode.js";
import type { ControlTokenVocabulary } from "./control-tokens.js";
import type { VoiceProfileTable } from "./voice-profiles.js";
import { SilenceWatchdog } from "./silence-watchdog.js";
import type { WatchdogConfig } from "./silence-watchdog.js";
import { InputError } from "./errors.js";

export interface CrisisSessionOptions {
  id: string;
  vocabulary: ControlTokenVocabulary;
  profiles: VoiceProfileTable;
  userProfile: UserProfile;
  watchdog: Partial<WatchdogConfig>;
  /** Called when the silence watchdog fires. */
  onSilence: (silenceSeconds: number) => void;
}

export class CrisisSession {
  readonly id: string;
  readonly createdAt: Date;
  readonly log = new ConversationLog();
  readonly location = new LocationStore();

  private readonly modeMachine: CrisisModeMachine;
  private readonly profiles: VoiceProfileTable;
  private readonly watchdog: SilenceWatchdog;
  private userProfile: UserProfile;
  private escalationState: EscalationState = EscalationState.IDLE;
  private readonly escalationHistory: EscalationOutcome[] = [];
  private silent = false;
  private closed = false;

  constructor(options: CrisisSessionOptions) {
    this.id = options.id;
    this.createdAt = new Date();
    this.modeMachine = new CrisisModeMachine(options.vocabulary);
    this.profiles = options.profiles;
    this.userProfile = options.userProfile;
    this.watchdog = new SilenceWatchdog(options.watchdog, { onFire: options.onSilence });
  }

  // ─── Mode ───────────────────────────────────────────────────────────────────

  get mode(): CrisisMode {
    return this.modeMachine.mode;
  }

  /**
   * Profile for the current mode. Callers capture it once per synthesis
   * request, so a later mode change cannot alter a request in flight.
   * @throws StateInvariantViolation if the mode has no profile
   */
  get voiceProfile(): VoiceProfile {
    return this.profiles.lookup(this.modeMachine.mode);
  }

  /** Parses control tokens out of a reply and commits the resulting mode in one step. */
  applyResponse(rawText: string): ModeApplication {
    return this.modeMachine.apply(rawText);
  }

  // ─── Liveness ───────────────────────────────────────────────────────────────

  recordActivity(): void {
    if (this.closed) return;
    this.watchdog.recordActivity();
  }

  get silenceDeadline(): number | null {
    return this.watchdog.deadline;
  }

  // ─── User profile ───────────────────────────────────────────────────────────

  get userName(): string {
    return this.userProfile.name;
  }

  get contacts(): readonly EmergencyContact[] {
    return this.userProfile.contacts;
  }

  /** @throws InputError when the profile names no contacts */
  setUserProfile(profile: UserProfile): void {
    if (profile.contacts.length === 0) {
      throw new InputError("A user profile needs at least one emergency contact");
    }
    this.userProfile = Object.freeze({
      name: profile.name,
      contacts: Object.freeze(profile.contacts.map((contact) => Object.freeze({ ...contact }))),
    });
  }

  get silentMode(): boolean {
    return this.silent;
  }

  setSilentMode(enabled: boolean): void {
    this.silent = enabled;
  }

  // ─── Escalation ─────────────────────────────────────────────────────────────

  get escalation(): EscalationState {
    return this.escalationState;
  }

  /** idle -> escalating. Returns false (and changes nothing) in any other state. */
  beginEscalation(): boolean {
    if (this.escalationState !== EscalationState.IDLE) return false;
    this.escalationState = EscalationState.ESCALATING;
    return true;
  }

  completeEscalation(outcome: EscalationOutcome): void {
    this.escalationHistory.push(outcome);
    this.escalationState = EscalationState.ESCALATED;
  }

  /**
   * Explicit reset after the user confirms safety: escalated -> idle.
   * Returns false when idle, or while a dispatch is still in flight.
   */
  resetEscalation(): boolean {
    if (this.escalationState !== EscalationState.ESCALATED) return false;
    this.escalationState = EscalationState.IDLE;
    return true;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  get isClosed(): boolean {
    return this.closed;
  }

  /** Read-only copy for escalation and reporting. */
  snapshot(): SessionSnapshot {
    return Object.freeze({
      sessionId: this.id,
      takenAt: new Date(),
      userName: this.userProfile.name,
      mode: this.modeMachine.mode,
      location: this.location.read(),
      entries: this.log.snapshot(),
      modeHistory: this.modeMachine.modeHistory,
      escalations: [...this.escalationHistory],
    });
  }

  /** Disarms the watchdog for good. Sub-structures share the session's lifetime. */
  close(): void {
    this.closed = true;
    this.watchdog.stop();
  }
}
