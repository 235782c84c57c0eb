// Crisis Relay - Deadline wrapper for collaborator calls
//
// Every call to speech-to-text, intelligence, synthesis or telephony goes
// through callCollaborator so a slow or failing backend costs one unit, never
// the session.

import { CollaboratorFailure, CollaboratorTimeout, CrisisRelayError } from "./errors.js";
import type { CollaboratorName } from "./errors.js";

export interface CollaboratorCallOptions {
  timeoutMs: number;
  /** Session-level cancellation. An aborted call rejects with the signal's reason. */
  signal?: AbortSignal;
  /**
   * Retry once after a timeout. Only for idempotent reads such as
   * transcription; never for dispatch or dial.
   */
  retryOnTimeout?: boolean;
}

/**
 * Runs `operation` against a deadline. The operation receives an AbortSignal
 * that fires on timeout or session cancellation so it can stop network work.
 *
 * @throws CollaboratorTimeout when the deadline passes
 * @throws CollaboratorFailure for any other rejection
 */
export async function callCollaborator<T>(
  name: CollaboratorName,
  operation: (signal: AbortSignal) => Promise<T>,
  options: CollaboratorCallOptions,
): Promise<T> {
  try {
    return await attempt(name, operation, options);
  } catch (err) {
    if (err instanceof CollaboratorTimeout && options.retryOnTimeout && !options.signal?.aborted) {
      return attempt(name, operation, options);
    }
    throw err;
  }
}

function attempt<T>(
  name: CollaboratorName,
  operation: (signal: AbortSignal) => Promise<T>,
  options: CollaboratorCallOptions,
): Promise<T> {
  const { timeoutMs, signal } = options;
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      fn();
    };

    const onAbort = () => {
      controller.abort();
      settle(() => reject(signal ? abortReason(signal) : new Error("Aborted")));
    };

    const timer = setTimeout(() => {
      controller.abort();
      settle(() => reject(new CollaboratorTimeout(name, timeoutMs)));
    }, timeoutMs);

    signal?.addEventListener("abort", onAbort, { once: true });

    operation(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (err: unknown) =>
        settle(() => reject(err instanceof CrisisRelayError ? err : new CollaboratorFailure(name, err))),
    );
  });
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("Session cancelled");
}

