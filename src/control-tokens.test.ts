// Crisis Relay - Control-token grammar tests

import { describe, it, expect } from "vitest";
import {
  ControlTokenVocabulary,
  joinTextParts,
  scanControlTokens,
} from "./control-tokens.js";
import { CRISIS_MODES, CrisisMode, CrisisSignal } from "./types.js";
import { VoiceProfileTable } from "./voice-profiles.js";
import { ConfigurationError } from "./errors.js";

const vocabulary = new ControlTokenVocabulary(CRISIS_MODES);

function clean(raw: string, vocab: ControlTokenVocabulary = vocabulary): string {
  return joinTextParts(scanControlTokens(raw, vocab));
}

describe("ControlTokenVocabulary", () => {
  it("resolves mode names case-insensitively", () => {
    expect(vocabulary.resolveMode("stealth")).toBe(CrisisMode.STEALTH);
    expect(vocabulary.resolveMode("Pizza_Ops")).toBe(CrisisMode.PIZZA_OPS);
  });

  it("resolves the PIZZA alias to PIZZA_OPS", () => {
    expect(vocabulary.resolveMode("PIZZA")).toBe(CrisisMode.PIZZA_OPS);
  });

  it("returns null for names outside the vocabulary", () => {
    expect(vocabulary.resolveMode("BANANA")).toBeNull();
    expect(vocabulary.resolveSignal("DANCE")).toBeNull();
  });

  it("resolves every signal", () => {
    expect(vocabulary.resolveSignal("sos")).toBe(CrisisSignal.SOS);
    expect(vocabulary.resolveSignal("CALL")).toBe(CrisisSignal.CALL);
    expect(vocabulary.resolveSignal("timer")).toBe(CrisisSignal.TIMER);
    expect(vocabulary.resolveSignal("Safe")).toBe(CrisisSignal.SAFE);
  });

  it("builds from a complete profile table", () => {
    const vocab = ControlTokenVocabulary.fromProfileTable(new VoiceProfileTable());
    expect(vocab.resolveMode("DECOY")).toBe(CrisisMode.DECOY);
  });

  it("rejects empty delimiters", () => {
    expect(() => new ControlTokenVocabulary(CRISIS_MODES, { delimiters: { open: "", close: "]" } })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects an alias that targets a mode outside the vocabulary", () => {
    expect(() => new ControlTokenVocabulary([CrisisMode.DEFAULT, CrisisMode.CALM])).toThrow(
      "Mode alias PIZZA targets unknown mode PIZZA_OPS",
    );
  });

  it("returns a fresh pattern on every call", () => {
    const a = vocabulary.tokenPattern();
    const b = vocabulary.tokenPattern();
    expect(a).not.toBe(b);
    expect(a.flags).toBe("gi");
  });
});

describe("scanControlTokens", () => {
  it("splits text and tokens left to right", () => {
    const parts = scanControlTokens("hi [MODE:CALM] there [SIGNAL:SOS]", vocabulary);
    expect(parts).toEqual([
      { type: "text", text: "hi " },
      { type: "token", token: { kind: "mode", mode: CrisisMode.CALM, raw: "[MODE:CALM]" } },
      { type: "text", text: " there " },
      { type: "token", token: { kind: "signal", signal: CrisisSignal.SOS, raw: "[SIGNAL:SOS]" } },
    ]);
  });

  it("classifies unknown names as unrecognized tokens", () => {
    const parts = scanControlTokens("[MODE:BANANA][SIGNAL:DANCE]", vocabulary);
    expect(parts).toEqual([
      { type: "token", token: { kind: "unrecognized", raw: "[MODE:BANANA]" } },
      { type: "token", token: { kind: "unrecognized", raw: "[SIGNAL:DANCE]" } },
    ]);
  });

  it("accepts inner whitespace, lower-case kinds and a qualifier", () => {
    const parts = scanControlTokens("[ mode : urgent : high ]", vocabulary);
    expect(parts).toEqual([
      { type: "token", token: { kind: "mode", mode: CrisisMode.URGENT, raw: "[ mode : urgent : high ]" } },
    ]);
  });

  it("leaves bracketed text that is not token-shaped alone", () => {
    expect(scanControlTokens("[laughs] okay", vocabulary)).toEqual([{ type: "text", text: "[laughs] okay" }]);
  });

  it("returns no parts for empty input", () => {
    expect(scanControlTokens("", vocabulary)).toEqual([]);
  });
});

describe("joinTextParts", () => {
  it("removes tokens and collapses the whitespace they leave", () => {
    expect(clean("[MODE:STEALTH] stay quiet")).toBe("stay quiet");
    expect(clean("stay  [MODE:CALM]  with me")).toBe("stay with me");
  });

  it("does not leave a space before punctuation", () => {
    expect(clean("Okay [SIGNAL:SOS]. Help is coming [MODE:URGENT]!")).toBe("Okay. Help is coming!");
  });

  it("joins text directly around a token without adding a space", () => {
    expect(clean("blue[MODE:CALM]berry")).toBe("blueberry");
  });

  it("strips unrecognized tokens too", () => {
    expect(clean("[MODE:BANANA] hello")).toBe("hello");
  });

  it("yields an empty string when only tokens are present", () => {
    expect(clean("[SIGNAL:SOS] [MODE:URGENT]")).toBe("");
  });

  it("uses configured delimiters only", () => {
    const angled = new ControlTokenVocabulary(CRISIS_MODES, { delimiters: { open: "<<", close: ">>" } });
    const parts = scanControlTokens("<<MODE:CALM>> breathe [MODE:URGENT]", angled);
    expect(parts[0]).toEqual({
      type: "token",
      token: { kind: "mode", mode: CrisisMode.CALM, raw: "<<MODE:CALM>>" },
    });
    expect(joinTextParts(parts)).toBe("breathe [MODE:URGENT]");
  });
});
