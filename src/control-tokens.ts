// Crisis Relay - Control-token grammar
//
// Generated responses interleave natural-language text with delimited
// instructions:
//
//   token     := OPEN kind ":" name [ ":" qualifier ] CLOSE
//   kind      := "MODE" | "SIGNAL"            (case-insensitive)
//   name      := [A-Za-z_]+                   (normalised to upper case)
//   qualifier := [A-Za-z0-9_]+                (accepted, currently unused)
//
// Anything matching the token shape is stripped from the text. Whether it is
// recognised is decided by a closed vocabulary built at startup from the voice
// profile table, so an unknown name is a testable condition, not a silent miss.

import { CRISIS_MODES, CRISIS_SIGNALS, CrisisMode } from "./types.js";
import type { CrisisSignal } from "./types.js";
import type { VoiceProfileTable } from "./voice-profiles.js";
import { ConfigurationError } from "./errors.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface TokenDelimiters {
  readonly open: string;
  readonly close: string;
}

export const DEFAULT_DELIMITERS: TokenDelimiters = Object.freeze({ open: "[", close: "]" });

/** Alternate names the language model is known to emit for a mode. */
export const DEFAULT_MODE_ALIASES: Readonly<Record<string, CrisisMode>> = Object.freeze({
  PIZZA: CrisisMode.PIZZA_OPS,
});

export type ControlToken =
  | { kind: "mode"; mode: CrisisMode; raw: string }
  | { kind: "signal"; signal: CrisisSignal; raw: string }
  | { kind: "unrecognized"; raw: string };

export type ScannedPart = { type: "text"; text: string } | { type: "token"; token: ControlToken };

export interface VocabularyOptions {
  delimiters?: TokenDelimiters;
  aliases?: Readonly<Record<string, CrisisMode>>;
}

// ─── Vocabulary ─────────────────────────────────────────────────────────────────

export class ControlTokenVocabulary {
  readonly delimiters: TokenDelimiters;
  private readonly modes: ReadonlyMap<string, CrisisMode>;
  private readonly signals: ReadonlyMap<string, CrisisSignal>;
  private readonly patternSource: string;

  /**
   * Builds the vocabulary for the modes the profile table covers.
   * @throws ConfigurationError when the table does not cover every mode or an
   *   alias points outside the table.
   */
  static fromProfileTable(table: VoiceProfileTable, options: VocabularyOptions = {}): ControlTokenVocabulary {
    const covered = new Set(table.modes);
    const missing = CRISIS_MODES.filter((mode) => !covered.has(mode));
    if (missing.length > 0) {
      throw new ConfigurationError(`Control-token vocabulary has modes without profiles: ${missing.join(", ")}`);
    }
    return new ControlTokenVocabulary(table.modes, options);
  }

  constructor(modes: readonly CrisisMode[], options: VocabularyOptions = {}) {
    const { delimiters = DEFAULT_DELIMITERS, aliases = DEFAULT_MODE_ALIASES } = options;
    if (delimiters.open.length === 0 || delimiters.close.length === 0) {
      throw new ConfigurationError("Control-token delimiters must be non-empty");
    }

    const modeNames = new Map<string, CrisisMode>();
    for (const mode of modes) {
      modeNames.set(mode, mode);
    }
    for (const [alias, mode] of Object.entries(aliases)) {
      if (!modeNames.has(mode)) {
        throw new ConfigurationError(`Mode alias ${alias} targets unknown mode ${mode}`);
      }
      modeNames.set(alias.toUpperCase(), mode);
    }

    this.delimiters = delimiters;
    this.modes = modeNames;
    const signalNames = new Map<string, CrisisSignal>();
    for (const signal of CRISIS_SIGNALS) {
      signalNames.set(signal, signal);
    }
    this.signals = signalNames;
    this.patternSource =
      `${escapeRegExp(delimiters.open)}\\s*(MODE|SIGNAL)\\s*:\\s*([A-Za-z_]+)` +
      `(?:\\s*:\\s*[A-Za-z0-9_]+)?\\s*${escapeRegExp(delimiters.close)}`;
  }

  resolveMode(name: string): CrisisMode | null {
    return this.modes.get(name.toUpperCase()) ?? null;
  }

  resolveSignal(name: string): CrisisSignal | null {
    return this.signals.get(name.toUpperCase()) ?? null;
  }

  /** A fresh global pattern; callers own its lastIndex. */
  tokenPattern(): RegExp {
    return new RegExp(this.patternSource, "gi");
  }
}

// ─── Scanner ────────────────────────────────────────────────────────────────────

/** Splits raw text into text runs and tokens, left to right. */
export function scanControlTokens(rawText: string, vocabulary: ControlTokenVocabulary): ScannedPart[] {
  const parts: ScannedPart[] = [];
  let cursor = 0;

  for (const match of rawText.matchAll(vocabulary.tokenPattern())) {
    const start = match.index ?? 0;
    if (start > cursor) {
      parts.push({ type: "text", text: rawText.slice(cursor, start) });
    }
    const [raw, kind = "", name = ""] = match;
    parts.push({ type: "token", token: classifyToken(raw, kind, name, vocabulary) });
    cursor = start + raw.length;
  }

  if (cursor < rawText.length) {
    parts.push({ type: "text", text: rawText.slice(cursor) });
  }
  return parts;
}

function classifyToken(raw: string, kind: string, name: string, vocabulary: ControlTokenVocabulary): ControlToken {
  if (kind.toUpperCase() === "MODE") {
    const mode = vocabulary.resolveMode(name);
    return mode ? { kind: "mode", mode, raw } : { kind: "unrecognized", raw };
  }
  const signal = vocabulary.resolveSignal(name);
  return signal ? { kind: "signal", signal, raw } : { kind: "unrecognized", raw };
}

/**
 * Joins the text runs in order. Whitespace left behind by removed tokens is
 * collapsed, and never precedes punctuation.
 */
export function joinTextParts(parts: readonly ScannedPart[]): string {
  return parts
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("")
    .replace(/\s+/g, " ")
    .replace(/\s+([.,!?;:])/g, "$1")
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
