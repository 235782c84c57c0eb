// Crisis Relay - User phrase detection
// Plain keyword checks on what the user said or typed. These run before the
// intelligence backend answers, so they work even when it is down.

export interface UserIntents {
  /** The configured safe word was said. */
  safe: boolean;
  /** The user asked to cancel a running countdown. */
  cancel: boolean;
  /** The user asked for their contacts to be called. */
  callRequest: boolean;
}

const CALL_QUALIFIERS = ["contact", "now", "help", "please"];

function containsWord(haystack: string, word: string): boolean {
  const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`\\b${escaped}\\b`).test(haystack);
}

export function detectUserIntents(text: string, safeWord: string): UserIntents {
  const lower = text.toLowerCase();
  const safe = safeWord.trim().length > 0 && lower.includes(safeWord.trim().toLowerCase());
  const cancel = containsWord(lower, "cancel");
  const callRequest = containsWord(lower, "call") && CALL_QUALIFIERS.some((word) => lower.includes(word));
  return { safe, cancel, callRequest };
}
