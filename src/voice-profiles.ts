// Crisis Relay - Voice Profile Table
//
// Maps every crisis mode to the synthesis parameters used for it. The table is
// validated once at startup; lookups at request time cannot fail unless the
// session's mode has been corrupted.

import { CRISIS_MODES, CrisisMode, isCrisisMode } from "./types.js";
import type { VoiceProfile } from "./types.js";
import { ConfigurationError, StateInvariantViolation } from "./errors.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

const PRIMARY_VOICE = "en-US-natalie";

/** Offsets outside this range are rejected by the synthesis backend. */
export const PROFILE_OFFSET_LIMIT = 50;

export const DEFAULT_VOICE_PROFILES: Readonly<Record<CrisisMode, VoiceProfile>> = Object.freeze({
  [CrisisMode.DEFAULT]: Object.freeze({ voiceId: PRIMARY_VOICE, style: "Conversational", rate: 0, pitch: 0 }),
  [CrisisMode.STEALTH]: Object.freeze({ voiceId: PRIMARY_VOICE, style: "Meditative", rate: -15, pitch: -10 }),
  // A different speaker so the call sounds like someone else on the line
  [CrisisMode.DECOY]: Object.freeze({ voiceId: "en-IN-aarav", style: "Conversational", rate: 5, pitch: 0 }),
  [CrisisMode.URGENT]: Object.freeze({ voiceId: PRIMARY_VOICE, style: "Conversational", rate: 10, pitch: 5 }),
  [CrisisMode.CALM]: Object.freeze({ voiceId: PRIMARY_VOICE, style: "Meditative", rate: -20, pitch: -5 }),
  [CrisisMode.PIZZA_OPS]: Object.freeze({ voiceId: PRIMARY_VOICE, style: "Conversational", rate: 5, pitch: 2 }),
});

// ─── Table ──────────────────────────────────────────────────────────────────────

export class VoiceProfileTable {
  private readonly profiles: ReadonlyMap<CrisisMode, VoiceProfile>;

  /**
   * @throws ConfigurationError when a mode has no profile, a key is not a
   *   known mode, or a profile carries unusable values.
   */
  constructor(entries: Readonly<Record<string, VoiceProfile | undefined>> = DEFAULT_VOICE_PROFILES) {
    const problems = validateVoiceProfileEntries(entries);
    if (problems.length > 0) {
      throw new ConfigurationError(`Voice profile table is invalid: ${problems.join("; ")}`);
    }

    const profiles = new Map<CrisisMode, VoiceProfile>();
    for (const [key, profile] of Object.entries(entries)) {
      if (profile && isCrisisMode(key)) {
        profiles.set(key, Object.freeze({ ...profile }));
      }
    }
    this.profiles = profiles;
  }

  /** Modes with a defined profile. Always the full closed mode set. */
  get modes(): readonly CrisisMode[] {
    return [...this.profiles.keys()];
  }

  lookup(mode: CrisisMode): VoiceProfile {
    const profile = this.profiles.get(mode);
    if (!profile) {
      throw new StateInvariantViolation(`No voice profile for mode "${String(mode)}"`);
    }
    return profile;
  }
}

// ─── Validation ─────────────────────────────────────────────────────────────────

export function validateVoiceProfileEntries(
  entries: Readonly<Record<string, VoiceProfile | undefined>>,
): string[] {
  const problems: string[] = [];

  for (const mode of CRISIS_MODES) {
    if (!entries[mode]) {
      problems.push(`missing profile for ${mode}`);
    }
  }

  for (const [key, profile] of Object.entries(entries)) {
    if (!isCrisisMode(key)) {
      problems.push(`unknown mode "${key}"`);
      continue;
    }
    if (!profile) continue;
    if (profile.voiceId.trim().length === 0) {
      problems.push(`${key}: empty voiceId`);
    }
    if (profile.style.trim().length === 0) {
      problems.push(`${key}: empty style`);
    }
    for (const field of ["rate", "pitch"] as const) {
      const value = profile[field];
      if (!Number.isInteger(value) || Math.abs(value) > PROFILE_OFFSET_LIMIT) {
        problems.push(`${key}: ${field} must be an integer within ±${PROFILE_OFFSET_LIMIT}`);
      }
    }
  }

  return problems;
}

/** Voice used on bridged calls with an emergency contact, whatever the user's mode. */
export const BRIDGE_VOICE_PROFILE: VoiceProfile = Object.freeze({
  voiceId: PRIMARY_VOICE,
  style: "Conversational",
  rate: 5,
  pitch: 0,
});
