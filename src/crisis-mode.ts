// Crisis Relay - Crisis Mode State Machine
//
// DEFAULT is the initial mode; there is no terminal mode. A recognised
// MODE token transitions unconditionally and the last one in a response wins.
// SIGNAL tokens never change the mode, they are handed back to the caller.

import { CrisisMode } from "./types.js";
import type { CrisisSignal, ModeChange } from "./types.js";
import { joinTextParts, scanControlTokens } from "./control-tokens.js";
import type { ControlTokenVocabulary } from "./control-tokens.js";

export interface ModeApplication {
  /** Response text with every control token removed. */
  cleanedText: string;
  previousMode: CrisisMode;
  mode: CrisisMode;
  changed: boolean;
  /** Signals in order of first appearance, without duplicates. */
  signals: CrisisSignal[];
  /** One entry per dropped, unrecognised token. */
  warnings: string[];
}

/**
 * Pure transition function: reads only `currentMode` and `rawText`.
 * Persisting the resulting mode is the caller's job.
 */
export function applyControlTokens(
  currentMode: CrisisMode,
  rawText: string,
  vocabulary: ControlTokenVocabulary,
): ModeApplication {
  const parts = scanControlTokens(rawText, vocabulary);
  let mode = currentMode;
  const signals: CrisisSignal[] = [];
  const warnings: string[] = [];

  for (const part of parts) {
    if (part.type !== "token") continue;
    const { token } = part;
    switch (token.kind) {
      case "mode":
        mode = token.mode;
        break;
      case "signal":
        if (!signals.includes(token.signal)) {
          signals.push(token.signal);
        }
        break;
      case "unrecognized":
        warnings.push(`Unrecognized control token ${token.raw} dropped`);
        break;
      default: {
        const exhaustiveCheck: never = token;
        throw new Error(`Unhandled control token: ${JSON.stringify(exhaustiveCheck)}`);
      }
    }
  }

  return {
    cleanedText: joinTextParts(parts),
    previousMode: currentMode,
    mode,
    changed: mode !== currentMode,
    signals,
    warnings,
  };
}

/**
 * Single owner of a session's mode. `apply` reads and writes the mode in one
 * synchronous step, so concurrent duties cannot lose a transition.
 */
export class CrisisModeMachine {
  private current: CrisisMode = CrisisMode.DEFAULT;
  private readonly history: ModeChange[] = [];
  private readonly vocabulary: ControlTokenVocabulary;
  private readonly now: () => Date;

  constructor(vocabulary: ControlTokenVocabulary, now: () => Date = () => new Date()) {
    this.vocabulary = vocabulary;
    this.now = now;
  }

  get mode(): CrisisMode {
    return this.current;
  }

  get modeHistory(): readonly ModeChange[] {
    return [...this.history];
  }

  apply(rawText: string): ModeApplication {
    const result = applyControlTokens(this.current, rawText, this.vocabulary);
    if (result.changed) {
      this.history.push(Object.freeze({ from: this.current, to: result.mode, at: this.now() }));
      this.current = result.mode;
    }
    return result;
  }
}
