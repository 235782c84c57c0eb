// Crisis Relay - Conversation Log
//
// Append-only timeline for one session. Insertion order is the evidentiary
// order; entries are frozen as they go in and never change afterwards.

import type { ConversationEntry, NewConversationEntry } from "./types.js";

export class ConversationLog {
  private readonly entries: ConversationEntry[] = [];
  private nextSeq = 1;

  /** Appends synchronously. JavaScript's run-to-completion makes this the single serialization point. */
  append(entry: NewConversationEntry): ConversationEntry {
    const stored: ConversationEntry = Object.freeze({
      seq: this.nextSeq++,
      speaker: entry.speaker,
      channel: entry.channel,
      text: entry.text,
      timestamp: new Date(entry.timestamp.getTime()),
      mode: entry.mode,
    });
    this.entries.push(stored);
    return stored;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Copy of the whole log; later appends do not show up in it. */
  snapshot(): readonly ConversationEntry[] {
    return Object.freeze([...this.entries]);
  }

  /** The most recent `count` entries, oldest first. */
  tail(count: number): readonly ConversationEntry[] {
    if (count <= 0) return [];
    return this.entries.slice(-count);
  }
}
