// Property-Based Tests for the crisis mode state machine
// Last recognized MODE token wins, whatever else is interleaved.

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { applyControlTokens } from "./crisis-mode.js";
import { ControlTokenVocabulary } from "./control-tokens.js";
import { CRISIS_MODES, CRISIS_SIGNALS, CrisisMode } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const vocabulary = new ControlTokenVocabulary(CRISIS_MODES);

type Fragment =
  | { kind: "mode"; mode: CrisisMode; text: string }
  | { kind: "noise"; text: string }
  | { kind: "word"; text: string };

const modeFragment: fc.Arbitrary<Fragment> = fc
  .constantFrom(...CRISIS_MODES)
  .map((mode): Fragment => ({ kind: "mode", mode, text: `[MODE:${mode}]` }));

const noiseFragment: fc.Arbitrary<Fragment> = fc.oneof(
  fc.constantFrom("BANANA", "LOUD", "QUIET").map((name): Fragment => ({ kind: "noise", text: `[MODE:${name}]` })),
  fc.constantFrom(...CRISIS_SIGNALS).map((signal): Fragment => ({ kind: "noise", text: `[SIGNAL:${signal}]` })),
  fc.constantFrom("PING", "WAVE").map((name): Fragment => ({ kind: "noise", text: `[SIGNAL:${name}]` })),
);

const wordFragment: fc.Arbitrary<Fragment> = fc
  .constantFrom("hello", "stay", "with", "me", "okay.", "breathe")
  .map((text): Fragment => ({ kind: "word", text }));

const fragments = fc.array(fc.oneof(modeFragment, noiseFragment, wordFragment), { maxLength: 30 });

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("applyControlTokens properties", () => {
  it("final mode is the last recognized MODE token, or the current mode when there is none", () => {
    fc.assert(
      fc.property(fc.constantFrom(...CRISIS_MODES), fragments, (initial, parts) => {
        const raw = parts.map((part) => part.text).join(" ");
        const modes = parts.flatMap((part) => (part.kind === "mode" ? [part.mode] : []));
        const expected = modes.length > 0 ? modes[modes.length - 1] : initial;

        expect(applyControlTokens(initial, raw, vocabulary).mode).toBe(expected);
      }),
    );
  });

  it("cleaned text is the natural-language words in order", () => {
    fc.assert(
      fc.property(fragments, (parts) => {
        const raw = parts.map((part) => part.text).join(" ");
        const words = parts.flatMap((part) => (part.kind === "word" ? [part.text] : []));

        expect(applyControlTokens(CrisisMode.DEFAULT, raw, vocabulary).cleanedText).toBe(words.join(" "));
      }),
    );
  });

  it("produces one warning per unrecognized token", () => {
    fc.assert(
      fc.property(fragments, (parts) => {
        const raw = parts.map((part) => part.text).join(" ");
        const unknown = parts.filter((part) => /\[(MODE:(BANANA|LOUD|QUIET)|SIGNAL:(PING|WAVE))\]/.test(part.text));

        expect(applyControlTokens(CrisisMode.DEFAULT, raw, vocabulary).warnings).toHaveLength(unknown.length);
      }),
    );
  });
});
