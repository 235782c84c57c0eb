// Crisis Relay - Crisis mode state machine tests

import { describe, it, expect } from "vitest";
import { CrisisModeMachine, applyControlTokens } from "./crisis-mode.js";
import { ControlTokenVocabulary } from "./control-tokens.js";
import { CRISIS_MODES, CrisisMode, CrisisSignal } from "./types.js";

const vocabulary = new ControlTokenVocabulary(CRISIS_MODES);

describe("applyControlTokens", () => {
  it("switches to STEALTH and strips the token", () => {
    const result = applyControlTokens(CrisisMode.DEFAULT, "[MODE:STEALTH] stay quiet", vocabulary);
    expect(result).toEqual({
      cleanedText: "stay quiet",
      previousMode: CrisisMode.DEFAULT,
      mode: CrisisMode.STEALTH,
      changed: true,
      signals: [],
      warnings: [],
    });
  });

  it("raises SOS without leaving DEFAULT", () => {
    const result = applyControlTokens(CrisisMode.DEFAULT, "[SIGNAL:SOS] [MODE:DEFAULT] okay", vocabulary);
    expect(result.mode).toBe(CrisisMode.DEFAULT);
    expect(result.changed).toBe(false);
    expect(result.signals).toEqual([CrisisSignal.SOS]);
    expect(result.cleanedText).toBe("okay");
  });

  it("returns to DEFAULT from another mode while raising SOS", () => {
    const result = applyControlTokens(CrisisMode.URGENT, "[SIGNAL:SOS] [MODE:DEFAULT] okay", vocabulary);
    expect(result.previousMode).toBe(CrisisMode.URGENT);
    expect(result.mode).toBe(CrisisMode.DEFAULT);
    expect(result.changed).toBe(true);
  });

  it("lets the last mode token win", () => {
    const result = applyControlTokens(CrisisMode.DEFAULT, "[MODE:CALM] a [MODE:URGENT] b", vocabulary);
    expect(result.mode).toBe(CrisisMode.URGENT);
    expect(result.cleanedText).toBe("a b");
  });

  it("keeps the current mode when there is no mode token", () => {
    const result = applyControlTokens(CrisisMode.DECOY, "just text", vocabulary);
    expect(result.mode).toBe(CrisisMode.DECOY);
    expect(result.changed).toBe(false);
  });

  it("deduplicates signals in order of first appearance", () => {
    const result = applyControlTokens(CrisisMode.DEFAULT, "[SIGNAL:CALL][SIGNAL:SOS][signal:call]", vocabulary);
    expect(result.signals).toEqual([CrisisSignal.CALL, CrisisSignal.SOS]);
  });

  it("drops unrecognized tokens with a warning and no mode change", () => {
    const result = applyControlTokens(CrisisMode.CALM, "[MODE:NOPE] hi [SIGNAL:WAVE]", vocabulary);
    expect(result.mode).toBe(CrisisMode.CALM);
    expect(result.cleanedText).toBe("hi");
    expect(result.warnings).toEqual([
      "Unrecognized control token [MODE:NOPE] dropped",
      "Unrecognized control token [SIGNAL:WAVE] dropped",
    ]);
  });

  it("ignores unrecognized tokens after a recognized one", () => {
    const result = applyControlTokens(CrisisMode.DEFAULT, "[MODE:PIZZA] [MODE:BANANA] pepperoni?", vocabulary);
    expect(result.mode).toBe(CrisisMode.PIZZA_OPS);
    expect(result.cleanedText).toBe("pepperoni?");
  });
});

describe("CrisisModeMachine", () => {
  const at = new Date("2026-03-01T12:00:00.000Z");

  it("starts in DEFAULT", () => {
    const machine = new CrisisModeMachine(vocabulary);
    expect(machine.mode).toBe(CrisisMode.DEFAULT);
    expect(machine.modeHistory).toEqual([]);
  });

  it("commits the resulting mode and records the change", () => {
    const machine = new CrisisModeMachine(vocabulary, () => at);
    machine.apply("[MODE:URGENT] run");
    expect(machine.mode).toBe(CrisisMode.URGENT);
    expect(machine.modeHistory).toEqual([{ from: CrisisMode.DEFAULT, to: CrisisMode.URGENT, at }]);
  });

  it("does not record re-entering the same mode", () => {
    const machine = new CrisisModeMachine(vocabulary, () => at);
    machine.apply("[MODE:CALM]");
    machine.apply("[MODE:CALM] again");
    expect(machine.modeHistory).toHaveLength(1);
  });

  it("applies successive responses against the committed mode", () => {
    const machine = new CrisisModeMachine(vocabulary, () => at);
    machine.apply("[MODE:STEALTH]");
    const second = machine.apply("[MODE:DECOY] hey, it's me");
    expect(second.previousMode).toBe(CrisisMode.STEALTH);
    expect(machine.mode).toBe(CrisisMode.DECOY);
    expect(machine.modeHistory.map((change) => change.to)).toEqual([CrisisMode.STEALTH, CrisisMode.DECOY]);
  });

  it("hands out a copy of the history", () => {
    const machine = new CrisisModeMachine(vocabulary, () => at);
    machine.apply("[MODE:CALM]");
    const history = machine.modeHistory;
    machine.apply("[MODE:URGENT]");
    expect(history).toHaveLength(1);
  });
});
