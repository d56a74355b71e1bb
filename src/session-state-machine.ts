// Support Session Orchestrator - Session State Machine
// Owns one session's phase, guards and risk history. Consumes turns, applies
// the transition table, decides fast-path preemption and emits every state
// change to the event ledger. Callers (the SessionManager) hold the session's
// lock for the duration of every public method.

import { SessionPhase, Severity } from "./types.js";
import type {
  CloseReason,
  EscalationPlan,
  EventPayload,
  LedgerEvent,
  LedgerEventKind,
  ResourceBundle,
  ResourceCategory,
  RiskVerdict,
  Session,
  TransitionReason,
  Turn,
  TurnInput,
  TurnResult,
} from "./types.js";
import type { OrchestratorConfig } from "./config.js";
import type { EventLedger } from "./event-ledger.js";
import type { LedgerStore } from "./ledger-store.js";
import { toSessionRecord } from "./ledger-store.js";
import type { RedactionGate, TokenVault } from "./redaction-gate.js";
import type { RiskAssessment, RiskMonitor } from "./risk-monitor.js";
import type { GeneratedReply, Responder } from "./responder.js";
import { SAFE_FALLBACK_REPLY, partialSummary } from "./responder.js";
import type { ResourceDirectory } from "./resource-directory.js";
import type { Escalator } from "./escalation-coordinator.js";
import { emergencyMessage } from "./escalation-coordinator.js";
import { isSeverity, severityAtLeast } from "./severity.js";
import { CollaboratorTimeoutError, GuardViolationError, SessionClosedError, describeError } from "./errors.js";
import { findPhrases, withTimeout } from "./utils.js";
import type { Logger } from "./logger.js";

// ─── Transition table ───────────────────────────────────────────────────────────

/**
 * Legal edges. ESCALATE and CLOSE are reachable from every non-terminal phase
 * (fast-path and ANY → CLOSE); CLOSE is absorbing.
 */
export const TRANSITIONS: ReadonlyMap<SessionPhase, ReadonlySet<SessionPhase>> = new Map([
  [SessionPhase.INIT, new Set([SessionPhase.CONSENTED, SessionPhase.ESCALATE, SessionPhase.CLOSE])],
  [SessionPhase.CONSENTED, new Set([SessionPhase.TRIAGE, SessionPhase.ESCALATE, SessionPhase.CLOSE])],
  [SessionPhase.TRIAGE, new Set([SessionPhase.SUPPORT_LOOP, SessionPhase.ESCALATE, SessionPhase.CLOSE])],
  [
    SessionPhase.SUPPORT_LOOP,
    new Set([SessionPhase.RISK_CHECK, SessionPhase.RESOURCES, SessionPhase.ESCALATE, SessionPhase.CLOSE]),
  ],
  [SessionPhase.RISK_CHECK, new Set([SessionPhase.SUPPORT_LOOP, SessionPhase.ESCALATE, SessionPhase.CLOSE])],
  [SessionPhase.RESOURCES, new Set([SessionPhase.SUPPORT_LOOP, SessionPhase.ESCALATE, SessionPhase.CLOSE])],
  [SessionPhase.ESCALATE, new Set([SessionPhase.CLOSE])],
  [SessionPhase.CLOSE, new Set<SessionPhase>()],
]);

export function isLegalTransition(from: SessionPhase, to: SessionPhase): boolean {
  return TRANSITIONS.get(from)?.has(to) ?? false;
}

export function isTerminalPhase(phase: SessionPhase): boolean {
  return phase === SessionPhase.ESCALATE || phase === SessionPhase.CLOSE;
}

const PHASES: ReadonlySet<string> = new Set<string>(Object.values(SessionPhase));

export function isSessionPhase(value: unknown): value is SessionPhase {
  return typeof value === "string" && PHASES.has(value);
}

// ─── Fixed replies ──────────────────────────────────────────────────────────────

export const CONSENT_PROMPT =
  "Hi, I'm a peer-support assistant, not a therapist or emergency service. " +
  "Our conversation is recorded in redacted form for safety review. " +
  "Please confirm that you consent to continue.";

export const TRIAGE_OPENING = "Thank you. What would you like to talk about today?";

export const CLOSING_REPLY =
  "Thank you for talking with me. If things get harder, please reach out to a crisis line or someone you trust.";

/** User phrasings that count as an explicit request for resources. */
export const RESOURCE_REQUEST_PHRASES = [
  "resources",
  "hotline",
  "helpline",
  "phone number",
  "who can i call",
  "who should i call",
  "where can i get help",
  "find a therapist",
  "talk to a person",
  "talk to someone real",
  "professional help",
];

export function formatResourceReply(bundle: ResourceBundle): string {
  const lines = bundle.resources.map((r) => {
    const contact = [r.phone ? `call ${r.phone}` : null, r.text ? `text ${r.text}` : null, r.website]
      .filter((c): c is string => c !== null)
      .join(", ");
    return `- ${r.name} (${r.hours}): ${contact}`;
  });
  return [
    "Here are some services that can help:",
    ...lines,
    `In an emergency, call ${bundle.emergencyNumber}.`,
  ].join("\n");
}

// ─── Dependencies ───────────────────────────────────────────────────────────────

/** Collaborators shared by every machine. None of them hold per-session state. */
export interface MachineContext {
  config: Readonly<OrchestratorConfig>;
  ledger: EventLedger;
  store: LedgerStore;
  gate: RedactionGate;
  monitor: RiskMonitor;
  responder: Responder;
  directory: ResourceDirectory;
  escalator: Escalator;
  vault: TokenVault | null;
  logger: Logger;
  now: () => Date;
  idFactory: () => string;
}

type GenerationOutcome =
  | { ok: true; reply: GeneratedReply }
  | { ok: false; timedOut: boolean; error: string };

export interface ReplayedState {
  phase: SessionPhase;
  consentGiven: boolean;
  messageCount: number;
  riskHistory: RiskVerdict[];
  closeReason: string | null;
}

// ─── SessionStateMachine ────────────────────────────────────────────────────────

export class SessionStateMachine {
  private readonly recentTexts: string[] = [];

  private constructor(
    private readonly state: Session,
    private readonly ctx: MachineContext,
  ) {}

  /** Creates the session in INIT and records `session.created`. */
  static async create(
    ctx: MachineContext,
    id: string,
    locale: string,
    metadata: Record<string, string>,
  ): Promise<SessionStateMachine> {
    const now = ctx.now();
    const session: Session = {
      id,
      phase: SessionPhase.INIT,
      consentGiven: false,
      consentRevoked: false,
      createdAt: now,
      lastActivityAt: now,
      phaseEnteredAt: now,
      messageCount: 0,
      riskHistory: [],
      locale,
      metadata: { ...metadata },
      triageSummary: null,
      escalation: null,
      pendingEscalation: null,
      closeReason: null,
      closedAt: null,
    };
    const machine = new SessionStateMachine(session, ctx);
    await ctx.ledger.append(id, "session.created", { locale, metadata: { ...metadata } });
    await machine.persist();
    return machine;
  }

  get id(): string {
    return this.state.id;
  }

  get phase(): SessionPhase {
    return this.state.phase;
  }

  get isClosed(): boolean {
    return this.state.phase === SessionPhase.CLOSE;
  }

  /** Live session object. Read-only for everyone but this machine. */
  get session(): Readonly<Session> {
    return this.state;
  }

  snapshot(): Session {
    return structuredClone(this.state);
  }

  // ─── Turns ──────────────────────────────────────────────────────────────────

  /**
   * Processes one user turn.
   *
   * Order of recorded events: `redaction.failed`? → `turn.received` →
   * `risk.degraded`? → `risk.assessed` → (`phase.transitioned` to ESCALATE |
   * phase-local events) → limit closure.
   *
   * @throws SessionClosedError when the session is in CLOSE. Nothing is mutated.
   */
  async handleTurn(input: TurnInput): Promise<TurnResult> {
    const session = this.state;
    if (session.phase === SessionPhase.CLOSE) {
      throw new SessionClosedError(session.id);
    }

    await this.settle();

    const now = this.ctx.now();
    this.touch(now);

    const { turn, redactionFailed } = await this.recordTurn(input);
    const context = this.recentTexts.slice();
    this.remember(turn.sanitizedText);

    const phaseAtStart = session.phase;
    const wantsGeneration =
      (phaseAtStart === SessionPhase.TRIAGE || phaseAtStart === SessionPhase.SUPPORT_LOOP) &&
      input.intent !== "exit" &&
      input.consent !== false;
    // Generation runs alongside the risk assessment and is discarded on preemption
    const generation = wantsGeneration ? this.startGeneration() : null;

    const assessment = await this.ctx.monitor.assess(turn.sanitizedText, {
      recentTexts: context,
      history: session.riskHistory,
      // Kept in memory for the keyword path only; the ledger holds the UNCLASSIFIED token
      unredactedText: redactionFailed ? input.text : undefined,
    });
    const verdict = assessment.verdict;
    await this.recordVerdict(turn, assessment);
    session.riskHistory.push(verdict);

    let reply: string;
    let resources: ResourceBundle | null = null;

    if (!isTerminalPhase(phaseAtStart) && severityAtLeast(verdict.severity, this.ctx.config.escalationThreshold)) {
      reply = await this.escalate(verdict, turn.number);
    } else if (input.consent === false && session.consentGiven && !session.consentRevoked) {
      await this.append("consent.revoked", { turnNumber: turn.number });
      session.consentRevoked = true;
      this.ctx.vault?.forget(session.id);
      await this.close("consent_revoked");
      reply = CLOSING_REPLY;
    } else if (input.intent === "exit") {
      await this.close("user_exit");
      reply = CLOSING_REPLY;
    } else {
      switch (session.phase) {
        case SessionPhase.INIT:
          reply = await this.handleConsent(input, turn.number);
          break;
        case SessionPhase.TRIAGE:
          reply = await this.completeTriage(turn, generation);
          break;
        case SessionPhase.SUPPORT_LOOP: {
          const result = await this.supportTurn(input, turn, generation);
          reply = result.reply;
          resources = result.resources;
          break;
        }
        case SessionPhase.ESCALATE:
          reply = this.escalationReply();
          break;
        default:
          // settle() leaves no CONSENTED or RESOURCES behind; RISK_CHECK is never entered
          throw new GuardViolationError(session.phase, session.phase, "phase is not a resting phase");
      }
    }

    if (session.phase !== SessionPhase.CLOSE) {
      const limit = this.limitReached(this.ctx.now());
      if (limit) await this.close(limit);
    }

    await this.persist();
    return {
      sessionId: session.id,
      turnNumber: turn.number,
      phase: session.phase,
      reply,
      verdict,
      escalation: session.escalation,
      resources,
      closed: session.phase === SessionPhase.CLOSE,
      closeReason: session.closeReason,
    };
  }

  // ─── Forced transitions (sweeps, caller close) ──────────────────────────────

  /** Forces CLOSE. No-op when already closed. */
  async forceClose(reason: CloseReason): Promise<boolean> {
    if (this.state.phase === SessionPhase.CLOSE) return false;
    if (reason === "consent_revoked" && !this.state.consentRevoked) {
      await this.append("consent.revoked", {});
      this.state.consentRevoked = true;
      this.ctx.vault?.forget(this.state.id);
    }
    await this.close(reason);
    await this.persist();
    return true;
  }

  /** TRIAGE exceeded its window: proceed with a degraded summary. */
  async completeTriageOnTimeout(): Promise<boolean> {
    if (this.state.phase !== SessionPhase.TRIAGE) return false;
    this.state.triageSummary = {
      summary: "No triage input received before the triage window elapsed",
      degraded: true,
      completedAt: this.ctx.now().toISOString(),
    };
    await this.append("triage.completed", {
      summary: this.state.triageSummary.summary,
      degraded: true,
      reason: "triage_timeout",
    });
    await this.transition(SessionPhase.SUPPORT_LOOP, "triage_timeout");
    await this.persist();
    return true;
  }

  /**
   * Retries an escalation the coordinator could not act on. Once the retry
   * budget is spent the escalation is resolved FAILED and the session closes.
   */
  async retryPendingEscalation(): Promise<boolean> {
    const pending = this.state.pendingEscalation;
    if (!pending || this.state.phase !== SessionPhase.ESCALATE) return false;

    if (pending.attempts > this.ctx.config.escalationRetryMax) {
      await this.append("escalation.failed", {
        planId: null,
        kind: "EscalationExhausted",
        attempts: pending.attempts,
        error: pending.lastError,
      });
      this.state.pendingEscalation = null;
      await this.close("escalation_failed");
    } else {
      await this.runEscalation(pending.severity);
    }
    await this.persist();
    return true;
  }

  // ─── Replay ─────────────────────────────────────────────────────────────────

  /**
   * Rebuilds phase trajectory and risk history from a session's event stream.
   * @throws GuardViolationError on an illegal edge or a sequence gap.
   */
  static replay(events: readonly LedgerEvent[]): ReplayedState {
    const state: ReplayedState = {
      phase: SessionPhase.INIT,
      consentGiven: false,
      messageCount: 0,
      riskHistory: [],
      closeReason: null,
    };
    const ordered = [...events].sort((a, b) => a.sequence - b.sequence);

    ordered.forEach((event, index) => {
      if (event.sequence !== index + 1) {
        throw new GuardViolationError(state.phase, state.phase, `sequence gap at ${index + 1}`);
      }
      const p = event.payload;
      switch (event.kind) {
        case "turn.received":
          state.messageCount++;
          break;
        case "consent.granted":
          state.consentGiven = true;
          break;
        case "risk.assessed":
          state.riskHistory.push(verdictFromPayload(p));
          break;
        case "phase.transitioned": {
          const { from, to } = p;
          if (!isSessionPhase(from) || !isSessionPhase(to)) {
            throw new GuardViolationError(String(from), String(to), "unknown phase in event");
          }
          if (from !== state.phase || !isLegalTransition(from, to)) {
            throw new GuardViolationError(from, to, `replay was in ${state.phase}`);
          }
          state.phase = to;
          if (to === SessionPhase.CLOSE) state.closeReason = typeof p.reason === "string" ? p.reason : null;
          break;
        }
        default:
          break;
      }
    });

    return state;
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  /**
   * Finishes a phase change left halfway by a failed ledger append, so that
   * every turn starts from a resting phase.
   */
  private async settle(): Promise<void> {
    switch (this.state.phase) {
      case SessionPhase.CONSENTED:
        this.ctx.logger.warn(`Session ${this.state.id} resuming triage after an interrupted consent`);
        await this.transition(SessionPhase.TRIAGE, "triage_started");
        break;
      case SessionPhase.RESOURCES:
        this.ctx.logger.warn(`Session ${this.state.id} returning to support after an interrupted resource delivery`);
        await this.transition(SessionPhase.SUPPORT_LOOP, "resources_delivered");
        break;
      default:
        break;
    }
  }

  /** The turn counts once `turn.received` is in the ledger. */
  private async recordTurn(input: TurnInput): Promise<{ turn: Turn; redactionFailed: boolean }> {
    const session = this.state;
    const number = session.messageCount + 1;
    const redaction = this.ctx.gate.redact(input.text);
    if (redaction.failed) {
      await this.append("redaction.failed", {
        turnNumber: number,
        kind: "RedactionFailure",
        reason: redaction.failureReason,
      });
    }
    this.ctx.vault?.capture(session.id, input.text, redaction, session.consentGiven && !session.consentRevoked);

    const turn: Turn = {
      id: this.ctx.idFactory(),
      sessionId: session.id,
      number,
      sanitizedText: redaction.sanitizedText,
      entities: redaction.entities,
      phase: session.phase,
      receivedAt: this.ctx.now().toISOString(),
    };
    await this.append("turn.received", {
      turnId: turn.id,
      turnNumber: turn.number,
      phase: turn.phase,
      text: turn.sanitizedText,
      entities: turn.entities.map((e) => ({ type: e.type, start: e.start, end: e.end, token: e.token })),
      consent: input.consent ?? null,
      intent: input.intent ?? null,
    });
    session.messageCount = number;
    return { turn, redactionFailed: redaction.failed };
  }

  private async recordVerdict(turn: Turn, assessment: RiskAssessment): Promise<void> {
    const { verdict } = assessment;
    if (verdict.degraded) {
      await this.append("risk.degraded", {
        turnNumber: turn.number,
        severity: verdict.severity,
        classifierOutcome: assessment.classifierOutcome,
        error: assessment.classifierError,
      });
    }
    await this.append("risk.assessed", {
      turnNumber: turn.number,
      checkpoint: turn.phase === SessionPhase.SUPPORT_LOOP ? SessionPhase.RISK_CHECK : turn.phase,
      severity: verdict.severity,
      confidence: verdict.confidence,
      signals: [...verdict.signals],
      degraded: verdict.degraded,
      sustained: assessment.sustained,
      timestamp: verdict.timestamp,
    });
  }

  private async handleConsent(input: TurnInput, turnNumber: number): Promise<string> {
    if (input.consent !== true) {
      await this.append("guard.rejected", {
        turnNumber,
        kind: "GuardViolation",
        from: SessionPhase.INIT,
        to: SessionPhase.CONSENTED,
        guard: "explicit consent",
      });
      return CONSENT_PROMPT;
    }
    await this.append("consent.granted", { turnNumber });
    this.state.consentGiven = true;
    await this.transition(SessionPhase.CONSENTED, "consent_granted");
    await this.transition(SessionPhase.TRIAGE, "triage_started");
    return TRIAGE_OPENING;
  }

  private async completeTriage(turn: Turn, generation: Promise<GenerationOutcome> | null): Promise<string> {
    const outcome = generation ? await generation : null;
    let reply = SAFE_FALLBACK_REPLY;
    if (outcome?.ok && outcome.reply.summary) {
      reply = outcome.reply.text;
      this.state.triageSummary = {
        summary: outcome.reply.summary,
        degraded: false,
        completedAt: this.ctx.now().toISOString(),
      };
    } else {
      if (outcome && !outcome.ok) await this.recordGenerationFailure(outcome);
      this.state.triageSummary = {
        summary: partialSummary(turn.sanitizedText),
        degraded: true,
        completedAt: this.ctx.now().toISOString(),
      };
    }
    await this.append("triage.completed", {
      turnNumber: turn.number,
      summary: this.state.triageSummary.summary,
      degraded: this.state.triageSummary.degraded,
    });
    await this.transition(SessionPhase.SUPPORT_LOOP, "triage_completed");
    await this.append("reply.sent", { turnNumber: turn.number, text: reply, fallback: reply === SAFE_FALLBACK_REPLY });
    return reply;
  }

  private async supportTurn(
    input: TurnInput,
    turn: Turn,
    generation: Promise<GenerationOutcome> | null,
  ): Promise<{ reply: string; resources: ResourceBundle | null }> {
    const outcome = generation ? await generation : null;
    if (outcome && !outcome.ok) await this.recordGenerationFailure(outcome);

    const requested =
      input.intent === "resources" ||
      findPhrases(turn.sanitizedText, RESOURCE_REQUEST_PHRASES).length > 0 ||
      (outcome?.ok === true && outcome.reply.resourceNeed);

    if (requested) {
      return this.deliverResources(turn.number, input.intent === "resources" ? "user" : "detected");
    }

    const reply = outcome?.ok ? outcome.reply.text : SAFE_FALLBACK_REPLY;
    await this.append("reply.sent", { turnNumber: turn.number, text: reply, fallback: !outcome?.ok });
    return { reply, resources: null };
  }

  private async deliverResources(
    turnNumber: number,
    trigger: "user" | "detected",
  ): Promise<{ reply: string; resources: ResourceBundle | null }> {
    const category = this.resourceCategory();
    await this.transition(SessionPhase.RESOURCES, "resources_requested", { trigger });

    let bundle: ResourceBundle | null = null;
    try {
      bundle = await withTimeout(
        this.ctx.directory.lookup(this.state.locale, category),
        this.ctx.config.directoryTimeoutMs,
        "resource directory",
      );
      await this.append("resources.delivered", {
        turnNumber,
        category,
        locale: bundle.locale,
        emergencyNumber: bundle.emergencyNumber,
        resourceIds: bundle.resources.map((r) => r.id),
      });
    } catch (err) {
      await this.recordCollaboratorError("resource directory", err);
    }

    const reply = bundle ? formatResourceReply(bundle) : emergencyMessage(this.ctx.config.fallbackEmergencyNumber);
    await this.append("reply.sent", { turnNumber, text: reply, fallback: bundle === null });

    const limit = this.limitReached(this.ctx.now());
    if (limit) {
      await this.close(limit);
    } else {
      await this.transition(SessionPhase.SUPPORT_LOOP, "resources_delivered");
    }
    return { reply, resources: bundle };
  }

  /** Fast path: ESCALATE is recorded before anything else happens. */
  private async escalate(verdict: RiskVerdict, turnNumber: number): Promise<string> {
    await this.transition(SessionPhase.ESCALATE, "risk_fast_path", {
      severity: verdict.severity,
      turnNumber,
    });
    this.ctx.logger.warn(`Session ${this.state.id} escalated at turn ${turnNumber} (severity ${verdict.severity})`);
    await this.runEscalation(verdict.severity);
    return this.escalationReply();
  }

  /**
   * Hands the escalation to the coordinator. Returns false when the coordinator
   * could not be reached; the escalation is then left pending for retry.
   */
  private async runEscalation(severity: Severity): Promise<boolean> {
    const session = this.state;
    const request = {
      sessionId: session.id,
      severity,
      contextSummary: this.contextSummary(severity),
      locale: session.locale,
      emergency: severityAtLeast(severity, this.ctx.config.emergencyThreshold),
      resourceCategory: this.resourceCategory(),
    };

    try {
      const plan = await this.ctx.escalator.escalate(request, (kind, payload) =>
        this.ctx.ledger.append(session.id, kind, payload),
      );
      session.escalation = plan;
      session.pendingEscalation = null;
      await this.close(plan.status === "COMPLETED" ? "escalation_completed" : "escalation_failed");
      return true;
    } catch (err) {
      const attempts = (session.pendingEscalation?.attempts ?? 0) + 1;
      const nextRetryAt = new Date(this.ctx.now().getTime() + this.ctx.config.escalationRetryIntervalMs);
      session.pendingEscalation = { severity, attempts, nextRetryAt, lastError: describeError(err) };
      this.ctx.logger.error(
        `Escalation for session ${session.id} unresolved after ${attempts} attempt(s): ${describeError(err)}`,
      );
      await this.append("escalation.unresolved", {
        severity,
        attempts,
        nextRetryAt: nextRetryAt.toISOString(),
        error: describeError(err),
      });
      return false;
    }
  }

  private escalationReply(): string {
    const plan: EscalationPlan | null = this.state.escalation;
    if (!plan) {
      const pending = this.state.pendingEscalation;
      const emergency = pending !== null && severityAtLeast(pending.severity, this.ctx.config.emergencyThreshold);
      const concern = "I'm concerned about your safety and I'm getting you connected with someone who can help.";
      return emergency ? `${emergencyMessage(this.ctx.config.fallbackEmergencyNumber)}\n${concern}` : concern;
    }

    const parts: string[] = [];
    if (plan.directive) parts.push(plan.directive.message);
    if (plan.status === "COMPLETED") {
      parts.push("A trained crisis responder is being connected with you now.");
    } else {
      parts.push("I wasn't able to connect you to a responder directly. Please reach out to one of these services:");
      for (const r of plan.fallbackResources) {
        parts.push(`- ${r.name}: ${r.phone ?? r.text ?? r.website ?? ""}`.trimEnd());
      }
    }
    return parts.join("\n");
  }

  private async close(reason: CloseReason): Promise<void> {
    const session = this.state;
    if (session.phase === SessionPhase.CLOSE) return;

    const plan = session.escalation;
    if (plan && (plan.status === "PENDING" || plan.status === "IN_PROGRESS")) {
      await this.append("escalation.failed", { planId: plan.id, kind: "EscalationExhausted", reason });
      plan.status = "FAILED";
      plan.resolvedAt = this.ctx.now().toISOString();
    }
    if (session.pendingEscalation) {
      await this.append("escalation.failed", {
        planId: null,
        kind: "EscalationExhausted",
        attempts: session.pendingEscalation.attempts,
        reason,
      });
      session.pendingEscalation = null;
    }

    await this.transition(SessionPhase.CLOSE, reason);
    session.closeReason = reason;
    session.closedAt = this.ctx.now();
    await this.append("session.closed", { reason, messageCount: session.messageCount });
    this.ctx.logger.info(`Session ${session.id} closed (${reason}) after ${session.messageCount} turn(s)`);
  }

  /**
   * The phase moves only once `phase.transitioned` is in the ledger.
   * @throws GuardViolationError for an edge missing from TRANSITIONS.
   */
  private async transition(to: SessionPhase, reason: TransitionReason, extra: EventPayload = {}): Promise<void> {
    const from = this.state.phase;
    if (!isLegalTransition(from, to)) {
      throw new GuardViolationError(from, to);
    }
    await this.append("phase.transitioned", { ...extra, from, to, reason });
    this.state.phase = to;
    this.state.phaseEnteredAt = this.ctx.now();
  }

  private startGeneration(): Promise<GenerationOutcome> {
    const context = {
      phase: this.state.phase,
      recentTurns: this.recentTexts.slice(),
      triageSummary: this.state.triageSummary?.summary ?? null,
      locale: this.state.locale,
    };
    return withTimeout(this.ctx.responder.generate(context), this.ctx.config.generationTimeoutMs, "responder").then(
      (reply): GenerationOutcome => ({ ok: true, reply }),
      (err: unknown): GenerationOutcome => ({
        ok: false,
        timedOut: err instanceof CollaboratorTimeoutError,
        error: describeError(err),
      }),
    );
  }

  private async recordGenerationFailure(outcome: { timedOut: boolean; error: string }): Promise<void> {
    await this.append(outcome.timedOut ? "collaborator.timeout" : "collaborator.failed", {
      collaborator: "responder",
      error: outcome.error,
      fallback: "safe reply",
    });
  }

  private async recordCollaboratorError(collaborator: string, err: unknown): Promise<void> {
    await this.append(err instanceof CollaboratorTimeoutError ? "collaborator.timeout" : "collaborator.failed", {
      collaborator,
      error: describeError(err),
    });
  }

  private resourceCategory(): ResourceCategory {
    const signals = this.state.riskHistory.slice(-this.ctx.config.recentContextTurns).flatMap((v) => v.signals);
    return this.ctx.monitor.keywordMatcher.resourceCategoryFor(signals) ?? "mental_health";
  }

  private contextSummary(severity: Severity): string {
    const latest = this.state.riskHistory[this.state.riskHistory.length - 1];
    const parts = [`Risk severity ${severity}`, `turns ${this.state.messageCount}`];
    if (latest && latest.signals.length > 0) parts.push(`signals: ${latest.signals.join(", ")}`);
    if (this.state.triageSummary) parts.push(`concern: ${this.state.triageSummary.summary}`);
    return parts.join("; ");
  }

  private limitReached(now: Date): CloseReason | null {
    const { config } = this.ctx;
    if (this.state.messageCount >= config.messageCap) return "message_cap";
    if (now.getTime() - this.state.createdAt.getTime() >= config.hardTimeoutMs) return "hard_timeout";
    return null;
  }

  private touch(now: Date): void {
    if (now.getTime() > this.state.lastActivityAt.getTime()) {
      this.state.lastActivityAt = now;
    }
  }

  private remember(sanitizedText: string): void {
    this.recentTexts.push(sanitizedText);
    while (this.recentTexts.length > this.ctx.config.recentContextTurns) this.recentTexts.shift();
  }

  private append(kind: LedgerEventKind, payload: EventPayload): Promise<LedgerEvent> {
    return this.ctx.ledger.append(this.state.id, kind, payload);
  }

  private async persist(): Promise<void> {
    await this.ctx.store.saveSessionRecord(toSessionRecord(this.state));
  }
}

function verdictFromPayload(p: EventPayload): RiskVerdict {
  const { severity, confidence, signals, degraded, timestamp } = p;
  if (
    !isSeverity(severity) ||
    typeof confidence !== "number" ||
    !Array.isArray(signals) ||
    typeof degraded !== "boolean" ||
    typeof timestamp !== "string"
  ) {
    throw new Error("risk.assessed event has a malformed payload");
  }
  return {
    severity,
    confidence,
    signals: signals.filter((s): s is string => typeof s === "string"),
    degraded,
    timestamp,
  };
}
