// Crisis Relay - Error taxonomy
//
// Everything below StateInvariantViolation is recoverable: the failed unit is
// dropped and the session keeps listening. Only invariant violations end a
// session.

export type CrisisRelayErrorCode =
  | "input_error"
  | "collaborator_timeout"
  | "collaborator_failure"
  | "state_invariant_violation"
  | "escalation_dispatch_failure"
  | "configuration_error";

/** Names used for collaborators in logs and error messages. */
export type CollaboratorName = "speech-to-text" | "intelligence" | "synthesis" | "telephony" | "reporting";

export abstract class CrisisRelayError extends Error {
  abstract readonly code: CrisisRelayErrorCode;
  /** True when the session may continue after this error. */
  abstract readonly recoverable: boolean;

  toJSON() {
    return { code: this.code, message: this.message };
  }
}

/** Malformed or unsupported inbound message. */
export class InputError extends CrisisRelayError {
  readonly code = "input_error" as const;
  readonly recoverable = true;

  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class CollaboratorTimeout extends CrisisRelayError {
  readonly code = "collaborator_timeout" as const;
  readonly recoverable = true;
  readonly collaborator: CollaboratorName;
  readonly timeoutMs: number;

  constructor(collaborator: CollaboratorName, timeoutMs: number) {
    super(`${collaborator} did not respond within ${timeoutMs}ms`);
    this.name = "CollaboratorTimeout";
    this.collaborator = collaborator;
    this.timeoutMs = timeoutMs;
  }
}

export class CollaboratorFailure extends CrisisRelayError {
  readonly code = "collaborator_failure" as const;
  readonly recoverable = true;
  readonly collaborator: CollaboratorName;

  constructor(collaborator: CollaboratorName, cause: unknown) {
    super(`${collaborator} failed: ${describeError(cause)}`, { cause });
    this.name = "CollaboratorFailure";
    this.collaborator = collaborator;
  }
}

/** The session reached a state the data model forbids. Fatal to the session. */
export class StateInvariantViolation extends CrisisRelayError {
  readonly code = "state_invariant_violation" as const;
  readonly recoverable = false;

  constructor(message: string) {
    super(message);
    this.name = "StateInvariantViolation";
  }
}

/** One contact could not be notified. Never rolls back the escalation. */
export class EscalationDispatchFailure extends CrisisRelayError {
  readonly code = "escalation_dispatch_failure" as const;
  readonly recoverable = true;
  readonly contactName: string;

  constructor(contactName: string, cause: unknown) {
    super(`Notification to ${contactName} failed: ${describeError(cause)}`, { cause });
    this.name = "EscalationDispatchFailure";
    this.contactName = contactName;
  }
}

/** Startup-time configuration problem (missing keys, incomplete profile table). */
export class ConfigurationError extends CrisisRelayError {
  readonly code = "configuration_error" as const;
  readonly recoverable = false;

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
