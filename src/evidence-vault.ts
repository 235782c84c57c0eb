// Crisis Relay - Evidence Vault
// The reporting collaborator: renders a session snapshot into a plain-text
// incident timeline and writes it to disk. The log's insertion order is the
// report's order.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ConversationEntry, EscalationOutcome, ReportHandle, SessionSnapshot } from "./types.js";
import { formatMapsLink } from "./location-store.js";

// ─── Collaborator contract ──────────────────────────────────────────────────────

export interface ReportSink {
  append(snapshot: SessionSnapshot): Promise<ReportHandle>;
}

// ─── Formatting ─────────────────────────────────────────────────────────────────

/**
 * Formats a date as `HH:MM:SS` in UTC.
 */
export function formatClock(date: Date): string {
  return date.toISOString().slice(11, 19);
}

const SPEAKER_LABELS: Readonly<Record<ConversationEntry["speaker"], string>> = {
  user: "USER",
  assistant: "COMPANION",
  contact: "CONTACT",
};

/**
 * Renders log entries one per line:
 *   [HH:MM:SS] SPEAKER (MODE, channel): text
 */
export function formatTimeline(entries: readonly ConversationEntry[]): string {
  return entries
    .map(
      (entry) =>
        `[${formatClock(entry.timestamp)}] ${SPEAKER_LABELS[entry.speaker]} (${entry.mode}, ${entry.channel}): ${entry.text}`,
    )
    .join("\n");
}

function formatEscalation(outcome: EscalationOutcome): string {
  const notified = outcome.notified.map((ack) => ack.contact.name).join(", ") || "none";
  const failed = outcome.failed.map((contact) => contact.name).join(", ") || "none";
  const call = outcome.call ? `${outcome.call.contact.name} (${outcome.call.reference})` : "not connected";
  return `- trigger: ${outcome.trigger}; notified: ${notified}; failed: ${failed}; call: ${call}`;
}

export function formatIncidentReport(snapshot: SessionSnapshot): string {
  const lines: string[] = [];

  lines.push("=== Crisis Relay Incident Report ===");
  lines.push("");
  lines.push(`Session ID: ${snapshot.sessionId}`);
  lines.push(`User: ${snapshot.userName}`);
  lines.push(`Generated: ${snapshot.takenAt.toISOString()}`);
  lines.push(`Final mode: ${snapshot.mode}`);

  if (snapshot.location.known) {
    const { fix } = snapshot.location;
    lines.push(`Last location: ${fix.lat}, ${fix.lon} at ${new Date(fix.timestamp).toISOString()}`);
    lines.push(`Map: ${formatMapsLink(fix)}`);
  } else {
    lines.push("Last location: unknown");
  }

  lines.push("");
  lines.push("--- Mode changes ---");
  if (snapshot.modeHistory.length === 0) {
    lines.push("(none)");
  }
  for (const change of snapshot.modeHistory) {
    lines.push(`[${formatClock(change.at)}] ${change.from} -> ${change.to}`);
  }

  lines.push("");
  lines.push("--- Escalations ---");
  if (snapshot.escalations.length === 0) {
    lines.push("(none)");
  }
  for (const outcome of snapshot.escalations) {
    lines.push(formatEscalation(outcome));
  }

  lines.push("");
  lines.push("--- Timeline ---");
  lines.push(snapshot.entries.length > 0 ? formatTimeline(snapshot.entries) : "(empty)");

  return lines.join("\n") + "\n";
}

/**
 * Builds the report file name.
 * Format: `incident_{sessionId}_{YYYYMMDD-HHmmss}.txt` (UTC)
 */
export function buildReportFileName(snapshot: SessionSnapshot): string {
  const stamp = snapshot.takenAt.toISOString().replace(/[-:]/g, "").replace("T", "-").slice(0, 15);
  return `incident_${snapshot.sessionId}_${stamp}.txt`;
}

// ─── Vault ──────────────────────────────────────────────────────────────────────

/**
 * Writes incident reports under `baseDir`, one file per call.
 */
export class EvidenceVault implements ReportSink {
  private readonly baseDir: string;

  constructor(baseDir: string = "output/reports") {
    this.baseDir = baseDir;
  }

  async append(snapshot: SessionSnapshot): Promise<ReportHandle> {
    await mkdir(this.baseDir, { recursive: true });
    const fileName = buildReportFileName(snapshot);
    const path = join(this.baseDir, fileName);
    await writeFile(path, formatIncidentReport(snapshot), "utf-8");
    return { fileName, path };
  }
}
