// Support Session Orchestrator - Shared TypeScript interfaces and types
// Session phases, risk verdicts, ledger events, escalation plans and the
// gateway message shapes shared by every component.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionPhase {
  INIT = "INIT",
  CONSENTED = "CONSENTED",
  TRIAGE = "TRIAGE",
  SUPPORT_LOOP = "SUPPORT_LOOP",
  RISK_CHECK = "RISK_CHECK",
  RESOURCES = "RESOURCES",
  ESCALATE = "ESCALATE",
  CLOSE = "CLOSE",
}

export type CloseReason =
  | "user_exit"
  | "consent_revoked"
  | "consent_timeout"
  | "idle_timeout"
  | "hard_timeout"
  | "message_cap"
  | "escalation_completed"
  | "escalation_failed"
  | "shutdown";

export type TransitionReason =
  | "consent_granted"
  | "triage_started"
  | "triage_completed"
  | "triage_timeout"
  | "resources_requested"
  | "resources_delivered"
  | "risk_fast_path"
  | CloseReason;

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── Risk ───────────────────────────────────────────────────────────────────────

export enum Severity {
  NONE = "NONE",
  LOW = "LOW",
  MEDIUM = "MEDIUM",
  HIGH = "HIGH",
  CRITICAL = "CRITICAL",
}

export interface RiskVerdict {
  severity: Severity;
  /** 0.0 – 1.0 */
  confidence: number;
  /** Matched signal identifiers, e.g. "suicide:end my life", "modifier:immediacy" */
  signals: string[];
  /** True when part of the assessment was produced under collaborator failure. */
  degraded: boolean;
  timestamp: string;
}

// ─── Redaction ──────────────────────────────────────────────────────────────────

export type EntityType =
  | "PHONE"
  | "EMAIL"
  | "SSN"
  | "CREDIT_CARD"
  | "IP_ADDRESS"
  | "ADDRESS"
  | "DATE"
  | "ZIP_CODE"
  | "MEDICATION"
  | "MEDICAL_RECORD"
  | "INSURANCE"
  | "NAME"
  | "UNCLASSIFIED";

export interface RedactedEntity {
  type: EntityType;
  /** Span in the original text, end exclusive. */
  start: number;
  end: number;
  /** Stable reversible token substituted into the sanitized text. */
  token: string;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface TriageSummary {
  summary: string;
  degraded: boolean;
  completedAt: string;
}

export interface PendingEscalation {
  severity: Severity;
  attempts: number;
  nextRetryAt: Date;
  lastError: string;
}

export interface Session {
  id: string;
  phase: SessionPhase;
  consentGiven: boolean; // never reset once true
  consentRevoked: boolean;
  createdAt: Date;
  lastActivityAt: Date;
  phaseEnteredAt: Date;
  messageCount: number;
  riskHistory: RiskVerdict[];
  locale: string;
  metadata: Record<string, string>; // caller-owned, opaque
  triageSummary: TriageSummary | null;
  escalation: EscalationPlan | null;
  pendingEscalation: PendingEscalation | null;
  closeReason: CloseReason | null;
  closedAt: Date | null;
}

export type TurnIntent = "exit" | "resources";

/** What the caller-facing boundary hands in for one user message. */
export interface TurnInput {
  text: string;
  /** Explicit consent signal. Only a literal `true` grants; `false` after consent revokes. */
  consent?: boolean;
  intent?: TurnIntent;
}

/** A recorded turn. Only the sanitized form is kept. */
export interface Turn {
  id: string;
  sessionId: string;
  number: number;
  sanitizedText: string;
  entities: RedactedEntity[];
  phase: SessionPhase;
  receivedAt: string;
}

// ─── Event Ledger ───────────────────────────────────────────────────────────────

export type LedgerEventKind =
  | "session.created"
  | "session.closed"
  | "turn.received"
  | "reply.sent"
  | "redaction.failed"
  | "risk.assessed"
  | "risk.degraded"
  | "phase.transitioned"
  | "guard.rejected"
  | "consent.granted"
  | "consent.revoked"
  | "triage.completed"
  | "resources.delivered"
  | "collaborator.timeout"
  | "collaborator.failed"
  | "escalation.planned"
  | "escalation.directive_issued"
  | "escalation.handoff_attempted"
  | "escalation.completed"
  | "escalation.failed"
  | "escalation.unresolved";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type EventPayload = { [key: string]: JsonValue };

export interface LedgerEvent {
  sessionId: string;
  /** Gapless, starting at 1 per session. */
  sequence: number;
  kind: LedgerEventKind;
  timestamp: string;
  payload: EventPayload;
}

// ─── Escalation ─────────────────────────────────────────────────────────────────

export type EscalationStatus = "PENDING" | "IN_PROGRESS" | "COMPLETED" | "FAILED";
export type EscalationChannel = "emergency_services" | "warm_transfer";
export type EscalationPriority = "URGENT" | "HIGH";

export interface EmergencyDirective {
  emergencyNumber: string;
  message: string;
  issuedAt: string;
}

export interface HandoffAttempt {
  attempt: number;
  startedAt: string;
  finishedAt: string;
  outcome: "connected" | "initiated" | "rejected" | "timeout" | "error";
  transferId: string | null;
  detail: string | null;
}

export interface EscalationPlan {
  id: string;
  sessionId: string;
  severity: Severity;
  channel: EscalationChannel;
  priority: EscalationPriority;
  status: EscalationStatus;
  directive: EmergencyDirective | null;
  attempts: HandoffAttempt[];
  fallbackResources: SupportResource[];
  createdAt: string;
  resolvedAt: string | null;
}

// ─── Resources ──────────────────────────────────────────────────────────────────

export type ResourceCategory =
  | "crisis"
  | "suicide_prevention"
  | "domestic_violence"
  | "mental_health"
  | "general";

export interface SupportResource {
  id: string;
  name: string;
  category: ResourceCategory;
  phone: string | null;
  text: string | null;
  website: string | null;
  hours: string;
  description: string;
}

export interface ResourceBundle {
  locale: string;
  category: ResourceCategory;
  emergencyNumber: string;
  resources: SupportResource[];
}

// ─── Turn Results ───────────────────────────────────────────────────────────────

export interface TurnResult {
  sessionId: string;
  turnNumber: number;
  phase: SessionPhase;
  reply: string;
  verdict: RiskVerdict;
  escalation: EscalationPlan | null;
  resources: ResourceBundle | null;
  closed: boolean;
  closeReason: CloseReason | null;
}

// ─── Gateway Messages (WebSocket feed) ──────────────────────────────────────────

// Client → Server messages
export type ClientMessage =
  | { type: "turn"; text: string; consent?: boolean; intent?: TurnIntent }
  | { type: "replay"; fromSequence: number }
  | { type: "close" };

// Server → Client messages
export type ServerMessage =
  | { type: "event"; event: LedgerEvent }
  | { type: "turn_result"; result: TurnResult }
  | { type: "replay"; events: LedgerEvent[] }
  | { type: "session_closed"; sessionId: string }
  | { type: "error"; message: string; recoverable: boolean };
