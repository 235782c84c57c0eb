// Crisis Relay - Guardian Relay Escalation
//
// 1. snapshot location and log
// 2. notify every contact, each independently
// 3. dial the primary contact into a call bridge
// 4. mark the session escalated
//
// A session escalates at most once until it is explicitly reset; every
// further trigger in the same episode is a logged no-op. Dispatch is never
// retried and never cancelled by a disconnect,
// but an ended session cannot start one.

import type {
  CallHandle,
  EmergencyContact,
  EscalationOutcome,
  EscalationState,
  EscalationTrigger,
  NotificationAck,
  SessionSnapshot,
} from "./types.js";
import type { CrisisSession } from "./session.js";
import type { Telephony } from "./telephony.js";
import type { CallBridge } from "./call-bridge.js";
import { callCollaborator } from "./collaborator-call.js";
import { EscalationDispatchFailure, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

export interface GuardianRelayDeps {
  telephony: Telephony;
  /** Creates and registers the bridge the primary contact is dialled into. */
  openBridge: (session: CrisisSession, contact: EmergencyContact) => CallBridge;
  timeoutMs: number;
  logger?: Logger;
}

export type EscalationResult =
  | { status: "dispatched"; outcome: EscalationOutcome }
  | { status: "suppressed"; state: EscalationState }
  | { status: "closed" };

/** How many of the user's latest utterances a notification quotes. */
export const NOTIFICATION_QUOTE_COUNT = 3;

const TRIGGER_DESCRIPTIONS: Readonly<Record<EscalationTrigger, string>> = {
  silence: "They stopped responding during an active safety session.",
  sos_button: "They pressed the SOS button.",
  sos_signal: "Their safety companion detected immediate danger.",
  call_signal: "Their safety companion judged that they need a contact now.",
  countdown: "A safety countdown ran out without being cancelled.",
  user_request: "They asked for their emergency contacts to be called.",
};

// ─── Message composition ────────────────────────────────────────────────────────

export function composeNotification(
  snapshot: SessionSnapshot,
  contact: EmergencyContact,
  trigger: EscalationTrigger,
): string {
  const lines = [
    `Hi ${contact.name},`,
    "",
    "EMERGENCY ALERT",
    `${snapshot.userName} needs your help. ${TRIGGER_DESCRIPTIONS[trigger]}`,
  ];

  const quotes = snapshot.entries
    .filter((entry) => entry.speaker === "user")
    .slice(-NOTIFICATION_QUOTE_COUNT)
    .map((entry) => `- "${entry.text}"`);
  if (quotes.length > 0) {
    lines.push("", `What ${snapshot.userName} said last:`, ...quotes);
  }

  return lines.join("\n");
}

// ─── Relay ──────────────────────────────────────────────────────────────────────

export class GuardianRelay {
  private readonly deps: GuardianRelayDeps;
  private readonly logger: Logger;

  constructor(deps: GuardianRelayDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("GuardianRelay");
  }

  async escalate(session: CrisisSession, trigger: EscalationTrigger): Promise<EscalationResult> {
    // An ended session never starts a new episode; one already in flight finishes
    if (session.isClosed) {
      this.logger.info(`Escalation (${trigger}) refused for session ${session.id}: session has ended`);
      return { status: "closed" };
    }
    if (!session.beginEscalation()) {
      this.logger.info(`Escalation (${trigger}) suppressed for session ${session.id}: already ${session.escalation}`);
      return { status: "suppressed", state: session.escalation };
    }

    const snapshot = session.snapshot();
    const contacts = session.contacts;
    this.logger.warn(`Escalating session ${session.id} (${trigger}) to ${contacts.length} contact(s)`);

    if (contacts.length === 0) {
      this.logger.error(`Session ${session.id} has no emergency contacts; nobody was notified`);
    }

    const [notifications, call] = await Promise.all([
      this.notifyAll(snapshot, contacts, trigger),
      contacts.length > 0 ? this.dialPrimary(session, contacts[0]) : Promise.resolve(null),
    ]);

    const outcome: EscalationOutcome = Object.freeze({
      trigger,
      notified: notifications.notified,
      failed: notifications.failed,
      call,
    });
    session.completeEscalation(outcome);
    this.logger.info(
      `Escalation complete for session ${session.id}: ${outcome.notified.length} notified, ` +
        `${outcome.failed.length} failed, call ${call ? "initiated" : "not initiated"}`,
    );
    return { status: "dispatched", outcome };
  }

  private async notifyAll(
    snapshot: SessionSnapshot,
    contacts: readonly EmergencyContact[],
    trigger: EscalationTrigger,
  ): Promise<{ notified: NotificationAck[]; failed: EmergencyContact[] }> {
    const { telephony, timeoutMs } = this.deps;
    const results = await Promise.allSettled(
      contacts.map((contact) =>
        callCollaborator(
          "telephony",
          () => telephony.sendNotification(contact, composeNotification(snapshot, contact, trigger), snapshot.location),
          { timeoutMs },
        ),
      ),
    );

    const notified: NotificationAck[] = [];
    const failed: EmergencyContact[] = [];
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        notified.push(result.value);
      } else {
        const failure = new EscalationDispatchFailure(contacts[index].name, result.reason);
        this.logger.error(`${failure.message} (session ${snapshot.sessionId})`);
        failed.push(contacts[index]);
      }
    });
    return { notified, failed };
  }

  private async dialPrimary(session: CrisisSession, primary: EmergencyContact): Promise<CallHandle | null> {
    try {
      const bridge = this.deps.openBridge(session, primary);
      return await callCollaborator("telephony", () => this.deps.telephony.dial(primary, bridge), {
        timeoutMs: this.deps.timeoutMs,
      });
    } catch (err) {
      this.logger.error(`Dialling ${primary.name} failed for session ${session.id}: ${describeError(err)}`);
      return null;
    }
  }
}
