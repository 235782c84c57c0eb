// Crisis Relay - Capability Guard
// Deterministic, rule-based filter run on every reply before it is logged,
// sent or synthesized. Drops sentences in which the assistant claims an action
// it cannot take: contacting emergency services, dispatching help, tracking
// anyone. No LLM calls, pure regex matching.

// ─── Pattern Definitions ────────────────────────────────────────────────────────

/** First-person promises of an action the system has no way to perform. */
const FALSE_ACTION_PATTERNS: RegExp[] = [
  /\b(?:i'm|i am|i will|i'll|i can|let me|i'm going to|i am going to)\s+(?:track(?:ing)?|locat(?:e|ing)|trac(?:e|ing)|ping(?:ing)?|monitor(?:ing)?|dispatch(?:ing)?)\b/i,
  /\b(?:i'm|i am|i will|i'll|i can|let me)\s+(?:call|contact|alert)\s+(?:911|112|the police|police|an ambulance|emergency services)\b/i,
  /\b(?:i'm|i am|i will|i'll|i can|let me)\s+send(?:ing)?\s+(?:the police|police|an ambulance|help)\b/i,
];

/** Claims that responders already know or are coming. */
const FALSE_STATUS_PATTERNS: RegExp[] = [
  /\b(?:i've|i have)\s+(?:sent|dispatched|called|alerted)\s+(?:the police|police|an ambulance|emergency services|911|112|help)\b/i,
  /\bauthorities\s+(?:are|have been)\s+(?:notified|alerted|dispatched|on (?:the |their )?way)\b/i,
  /\b(?:police|an ambulance|help)\s+is\s+on\s+(?:the|its|their)\s+way\b/i,
];

const ALL_PATTERNS = [...FALSE_ACTION_PATTERNS, ...FALSE_STATUS_PATTERNS];

// ─── Helpers ────────────────────────────────────────────────────────────────────

/**
 * Split text into sentences at `.`, `!` or `?` followed by whitespace.
 * Trailing text without terminal punctuation is its own sentence.
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export interface CapabilityCheckResult {
  /** Text with offending sentences removed; "" when nothing survived. */
  text: string;
  removed: string[];
}

// ─── Public API ─────────────────────────────────────────────────────────────────

export function hasFalseCapabilityClaim(sentence: string): boolean {
  return ALL_PATTERNS.some((pattern) => pattern.test(sentence));
}

export function removeFalseCapabilityClaims(text: string): CapabilityCheckResult {
  const kept: string[] = [];
  const removed: string[] = [];

  for (const sentence of splitSentences(text)) {
    if (hasFalseCapabilityClaim(sentence)) {
      removed.push(sentence);
    } else {
      kept.push(sentence);
    }
  }

  return { text: kept.join(" "), removed };
}
