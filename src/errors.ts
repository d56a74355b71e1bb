// Error taxonomy for the orchestration core.
//
// Only SessionClosedError (and SessionNotFoundError for unknown ids) reach the
// caller. Everything else is handled inside the owning component and turned
// into a ledger event.

export type OrchestratorErrorKind =
  | "GuardViolation"
  | "SessionClosed"
  | "SessionNotFound"
  | "CollaboratorTimeout"
  | "RedactionFailure"
  | "EscalationExhausted";

export abstract class OrchestratorError extends Error {
  abstract readonly kind: OrchestratorErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SessionClosedError extends OrchestratorError {
  readonly kind = "SessionClosed" as const;

  constructor(readonly sessionId: string) {
    super(`Session is closed: ${sessionId}`);
  }
}

export class SessionNotFoundError extends OrchestratorError {
  readonly kind = "SessionNotFound" as const;

  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class GuardViolationError extends OrchestratorError {
  readonly kind = "GuardViolation" as const;

  constructor(
    readonly from: string,
    readonly to: string,
    detail?: string,
  ) {
    super(`Illegal transition ${from} → ${to}${detail ? `: ${detail}` : ""}`);
  }
}

export class CollaboratorTimeoutError extends OrchestratorError {
  readonly kind = "CollaboratorTimeout" as const;

  constructor(
    readonly collaborator: string,
    readonly timeoutMs: number,
  ) {
    super(`${collaborator} did not respond within ${timeoutMs}ms`);
  }
}

export class RedactionFailureError extends OrchestratorError {
  readonly kind = "RedactionFailure" as const;
}

export class EscalationExhaustedError extends OrchestratorError {
  readonly kind = "EscalationExhausted" as const;

  constructor(
    readonly planId: string,
    readonly attempts: number,
  ) {
    super(`Hand-off attempts exhausted for plan ${planId} after ${attempts} attempt(s)`);
  }
}

/** Message text for logs and event payloads. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
