// Crisis Relay - Voice profile table tests

import { describe, it, expect } from "vitest";
import {
  BRIDGE_VOICE_PROFILE,
  DEFAULT_VOICE_PROFILES,
  VoiceProfileTable,
  validateVoiceProfileEntries,
} from "./voice-profiles.js";
import { CRISIS_MODES, CrisisMode } from "./types.js";
import type { VoiceProfile } from "./types.js";
import { ConfigurationError, StateInvariantViolation } from "./errors.js";

describe("VoiceProfileTable", () => {
  it("covers every mode by default", () => {
    const table = new VoiceProfileTable();
    expect([...table.modes].sort()).toEqual([...CRISIS_MODES].sort());
    for (const mode of CRISIS_MODES) {
      expect(table.lookup(mode)).toEqual(DEFAULT_VOICE_PROFILES[mode]);
    }
  });

  it("uses a quiet meditative profile for STEALTH", () => {
    expect(new VoiceProfileTable().lookup(CrisisMode.STEALTH)).toEqual({
      voiceId: "en-US-natalie",
      style: "Meditative",
      rate: -15,
      pitch: -10,
    });
  });

  it("uses a different speaker for DECOY", () => {
    const table = new VoiceProfileTable();
    expect(table.lookup(CrisisMode.DECOY).voiceId).not.toBe(table.lookup(CrisisMode.DEFAULT).voiceId);
  });

  it("refuses a table that misses a mode", () => {
    const { CALM: _omitted, ...partial } = DEFAULT_VOICE_PROFILES;
    expect(() => new VoiceProfileTable(partial)).toThrow(ConfigurationError);
    expect(() => new VoiceProfileTable(partial)).toThrow("missing profile for CALM");
  });

  it("returns the same profile object on every lookup", () => {
    const table = new VoiceProfileTable();
    expect(table.lookup(CrisisMode.URGENT)).toBe(table.lookup(CrisisMode.URGENT));
  });

  it("throws StateInvariantViolation for a value outside the mode set", () => {
    const table = new VoiceProfileTable();
    const corrupted: unknown = "SHOUTING";
    const isMode = (value: unknown): value is CrisisMode => typeof value === "string";
    if (!isMode(corrupted)) throw new Error("unreachable");
    expect(() => table.lookup(corrupted)).toThrow(StateInvariantViolation);
  });

  it("copies entries so later edits to the input do not leak in", () => {
    const entries: Record<string, VoiceProfile> = { ...DEFAULT_VOICE_PROFILES };
    entries[CrisisMode.CALM] = { voiceId: "en-US-natalie", style: "Meditative", rate: -20, pitch: -5 };
    const table = new VoiceProfileTable(entries);
    entries[CrisisMode.CALM] = { voiceId: "other", style: "Angry", rate: 50, pitch: 50 };
    expect(table.lookup(CrisisMode.CALM).voiceId).toBe("en-US-natalie");
  });
});

describe("validateVoiceProfileEntries", () => {
  it("finds nothing wrong with the defaults", () => {
    expect(validateVoiceProfileEntries(DEFAULT_VOICE_PROFILES)).toEqual([]);
  });

  it("reports unknown modes, empty fields and out-of-range offsets", () => {
    const problems = validateVoiceProfileEntries({
      ...DEFAULT_VOICE_PROFILES,
      WHISPER: { voiceId: "x", style: "y", rate: 0, pitch: 0 },
      [CrisisMode.URGENT]: { voiceId: " ", style: "", rate: 51, pitch: 1.5 },
    });
    // URGENT keeps its original key position in the spread
    expect(problems).toEqual([
      "URGENT: empty voiceId",
      "URGENT: empty style",
      "URGENT: rate must be an integer within ±50",
      "URGENT: pitch must be an integer within ±50",
      'unknown mode "WHISPER"',
    ]);
  });
});

describe("BRIDGE_VOICE_PROFILE", () => {
  it("stays within the offset limits", () => {
    expect(validateVoiceProfileEntries({ ...DEFAULT_VOICE_PROFILES, [CrisisMode.DEFAULT]: BRIDGE_VOICE_PROFILE })).toEqual(
      [],
    );
  });
});
