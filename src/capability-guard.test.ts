// Crisis Relay - Capability guard tests

import { describe, it, expect } from "vitest";
import { hasFalseCapabilityClaim, removeFalseCapabilityClaims, splitSentences } from "./capability-guard.js";

describe("splitSentences", () => {
  it("splits on terminal punctuation followed by whitespace", () => {
    expect(splitSentences("Stay there. Are you safe? Good!  Keep going")).toEqual([
      "Stay there.",
      "Are you safe?",
      "Good!",
      "Keep going",
    ]);
  });

  it("returns nothing for blank text", () => {
    expect(splitSentences("   ")).toEqual([]);
  });
});

describe("hasFalseCapabilityClaim", () => {
  it.each([
    "I'll call the police now.",
    "I am tracking your phone.",
    "Let me dispatch someone.",
    "I'm sending an ambulance.",
    "I've alerted emergency services.",
    "Authorities have been notified.",
    "Help is on the way.",
  ])("flags %s", (sentence) => {
    expect(hasFalseCapabilityClaim(sentence)).toBe(true);
  });

  it.each([
    "I'm calling your contacts now.",
    "Your sister has your location.",
    "Should I call your emergency contacts?",
    "You can call 911 yourself if you need to.",
  ])("allows %s", (sentence) => {
    expect(hasFalseCapabilityClaim(sentence)).toBe(false);
  });
});

describe("removeFalseCapabilityClaims", () => {
  it("drops only the offending sentences", () => {
    const result = removeFalseCapabilityClaims("Stay calm. Help is on the way. Keep your phone close.");
    expect(result).toEqual({
      text: "Stay calm. Keep your phone close.",
      removed: ["Help is on the way."],
    });
  });

  it("returns empty text when every sentence is a false claim", () => {
    expect(removeFalseCapabilityClaims("I'll call the police. I am tracking him.").text).toBe("");
  });

  it("leaves clean text unchanged", () => {
    expect(removeFalseCapabilityClaims("Breathe with me.")).toEqual({ text: "Breathe with me.", removed: [] });
  });
});
