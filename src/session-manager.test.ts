// Unit tests for SessionManager
// Drives whole sessions through the public API with an injected clock and
// in-process collaborators, then checks results and the recorded event stream.

import { describe, it, expect, beforeEach } from "vitest";
import { SessionManager } from "./session-manager.js";
import type { SessionManagerDeps } from "./session-manager.js";
import { createConfig } from "./config.js";
import type { OrchestratorConfig } from "./config.js";
import { SessionPhase, Severity } from "./types.js";
import type { LedgerEvent } from "./types.js";
import type { Logger } from "./logger.js";
import type { RiskClassifier } from "./risk-monitor.js";
import type { Escalator } from "./escalation-coordinator.js";
import type { WarmTransferClient } from "./warm-transfer.js";
import type { ObservabilityRecord } from "./observability.js";
import { RedactionGate, TokenVault } from "./redaction-gate.js";
import { InMemoryLedgerStore } from "./ledger-store.js";
import type { LedgerStore } from "./ledger-store.js";
import { SessionClosedError, SessionNotFoundError } from "./errors.js";
import { CLOSING_REPLY, CONSENT_PROMPT, TRIAGE_OPENING } from "./session-state-machine.js";
import { SAFE_FALLBACK_REPLY } from "./responder.js";
import { emergencyMessage } from "./escalation-coordinator.js";

const T0 = new Date("2026-03-01T12:00:00.000Z");

const silent: Logger = { info: () => {}, warn: () => {}, error: () => {} };

let clock: Date;

function advance(ms: number): void {
  clock = new Date(clock.getTime() + ms);
}

function createManager(
  overrides: Partial<OrchestratorConfig> = {},
  deps: Omit<SessionManagerDeps, "config" | "logger" | "now"> = {},
): SessionManager {
  return new SessionManager({
    config: createConfig({ handoffRetryDelayMs: 0, ...overrides }),
    logger: silent,
    now: () => clock,
    ...deps,
  });
}

/** INIT → TRIAGE → SUPPORT_LOOP in two turns (11 events). */
async function reachSupportLoop(manager: SessionManager, sessionId: string): Promise<void> {
  await manager.submitTurn(sessionId, { text: "hello there", consent: true });
  await manager.submitTurn(sessionId, { text: "work has been hard" });
}

function kinds(events: readonly LedgerEvent[]): string[] {
  return events.map((e) => e.kind);
}

/** In-memory store whose first append matching `match` fails. */
function failOnce(match: (event: LedgerEvent) => boolean): LedgerStore {
  const inner = new InMemoryLedgerStore();
  let armed = true;
  return {
    appendEvent: async (event) => {
      if (armed && match(event)) {
        armed = false;
        throw new Error("disk full");
      }
      await inner.appendEvent(event);
    },
    readEvents: (sessionId, fromSequence) => inner.readEvents(sessionId, fromSequence),
    saveSessionRecord: (record) => inner.saveSessionRecord(record),
    deleteSessionRecord: (sessionId) => inner.deleteSessionRecord(sessionId),
  };
}

function transitionTo(phase: SessionPhase): (event: LedgerEvent) => boolean {
  return (event) => event.kind === "phase.transitioned" && event.payload.to === phase;
}

describe("SessionManager", () => {
  let manager: SessionManager;

  beforeEach(() => {
    clock = T0;
    manager = createManager();
  });

  // ─── createSession ──────────────────────────────────────────────────────────

  describe("createSession()", () => {
    it("creates a session in INIT with defaults", async () => {
      const session = await manager.createSession();

      expect(session.phase).toBe(SessionPhase.INIT);
      expect(session.consentGiven).toBe(false);
      expect(session.messageCount).toBe(0);
      expect(session.locale).toBe("US");
      expect(session.createdAt).toEqual(T0);
      expect(session.closeReason).toBeNull();
    });

    it("normalizes the locale to a region and records session.created", async () => {
      const session = await manager.createSession({ locale: "en-gb", metadata: { channel: "web" } });
      const events = await manager.replay(session.id);

      expect(session.locale).toBe("GB");
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        sequence: 1,
        kind: "session.created",
        payload: { locale: "GB", metadata: { channel: "web" } },
      });
    });

    it("creates sessions with unique IDs", async () => {
      const a = await manager.createSession();
      const b = await manager.createSession();

      expect(a.id).not.toBe(b.id);
    });

    it("returns a snapshot the caller cannot use to mutate the session", async () => {
      const session = await manager.createSession();
      session.phase = SessionPhase.CLOSE;

      expect(manager.getSession(session.id).phase).toBe(SessionPhase.INIT);
    });
  });

  // ─── getSession ─────────────────────────────────────────────────────────────

  describe("getSession()", () => {
    it("throws SessionNotFoundError for an unknown id", () => {
      expect(() => manager.getSession("missing")).toThrow(SessionNotFoundError);
    });
  });

  // ─── Consent ────────────────────────────────────────────────────────────────

  describe("consent guard", () => {
    it("stays in INIT and re-prompts without explicit consent", async () => {
      const { id } = await manager.createSession();
      const result = await manager.submitTurn(id, { text: "hello" });
      const events = await manager.replay(id);

      expect(result.phase).toBe(SessionPhase.INIT);
      expect(result.reply).toBe(CONSENT_PROMPT);
      expect(result.closed).toBe(false);
      expect(kinds(events)).toEqual(["session.created", "turn.received", "risk.assessed", "guard.rejected"]);
      expect(events[3].payload).toEqual({
        turnNumber: 1,
        kind: "GuardViolation",
        from: "INIT",
        to: "CONSENTED",
        guard: "explicit consent",
      });
    });

    it("treats consent: false before consent as not consenting", async () => {
      const { id } = await manager.createSession();
      const result = await manager.submitTurn(id, { text: "no", consent: false });

      expect(result.phase).toBe(SessionPhase.INIT);
      expect(result.reply).toBe(CONSENT_PROMPT);
    });

    it("moves INIT → CONSENTED → TRIAGE on explicit consent", async () => {
      const { id } = await manager.createSession();
      const result = await manager.submitTurn(id, { text: "yes", consent: true });
      const events = await manager.replay(id, 2);

      expect(result.phase).toBe(SessionPhase.TRIAGE);
      expect(result.reply).toBe(TRIAGE_OPENING);
      expect(manager.getSession(id).consentGiven).toBe(true);
      expect(kinds(events)).toEqual([
        "turn.received",
        "risk.assessed",
        "consent.granted",
        "phase.transitioned",
        "phase.transitioned",
      ]);
      expect(events[3].payload).toEqual({ from: "INIT", to: "CONSENTED", reason: "consent_granted" });
      expect(events[4].payload).toEqual({ from: "CONSENTED", to: "TRIAGE", reason: "triage_started" });
    });

    it("closes an INIT session once the consent window elapses", async () => {
      const { id } = await manager.createSession();

      advance(5 * 60_000 - 1);
      expect(await manager.sweepPhaseTimeouts()).toBe(0);

      advance(1);
      expect(await manager.sweepPhaseTimeouts()).toBe(1);

      const session = manager.getSession(id);
      expect(session.phase).toBe(SessionPhase.CLOSE);
      expect(session.closeReason).toBe("consent_timeout");
      const events = await manager.replay(id, 2);
      expect(events.map((e) => e.payload)).toEqual([
        { from: "INIT", to: "CLOSE", reason: "consent_timeout" },
        { reason: "consent_timeout", messageCount: 0 },
      ]);
    });
  });

  // ─── Triage and support loop ────────────────────────────────────────────────

  describe("triage", () => {
    it("completes triage on the first triage turn and enters SUPPORT_LOOP", async () => {
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "hello there", consent: true });
      const result = await manager.submitTurn(id, { text: "work has been hard" });
      const events = await manager.replay(id, 7);

      expect(result.phase).toBe(SessionPhase.SUPPORT_LOOP);
      expect(result.reply).toBe(
        "Thank you for sharing that with me. How has this been affecting you day to day?",
      );
      expect(kinds(events)).toEqual([
        "turn.received",
        "risk.assessed",
        "triage.completed",
        "phase.transitioned",
        "reply.sent",
      ]);
      expect(events[1].payload.checkpoint).toBe("TRIAGE");
      expect(events[2].payload).toEqual({ turnNumber: 2, summary: "work has been hard", degraded: false });
      expect(manager.getSession(id).triageSummary).toMatchObject({ summary: "work has been hard", degraded: false });
    });

    it("proceeds with a degraded summary when TRIAGE times out", async () => {
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "hello there", consent: true });

      advance(10 * 60_000);
      expect(await manager.sweepPhaseTimeouts()).toBe(1);

      const session = manager.getSession(id);
      expect(session.phase).toBe(SessionPhase.SUPPORT_LOOP);
      expect(session.triageSummary?.degraded).toBe(true);
      const [last] = (await manager.replay(id)).slice(-1);
      expect(last.payload).toEqual({ from: "TRIAGE", to: "SUPPORT_LOOP", reason: "triage_timeout" });
    });
  });

  describe("support loop", () => {
    it("records the RISK_CHECK checkpoint and replies safely below the threshold", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "I feel desperate" });
      const events = await manager.replay(id, 12);

      expect(result.phase).toBe(SessionPhase.SUPPORT_LOOP);
      expect(result.verdict.severity).toBe(Severity.MEDIUM);
      expect(result.reply).toBe(SAFE_FALLBACK_REPLY);
      expect(kinds(events)).toEqual(["turn.received", "risk.assessed", "reply.sent"]);
      expect(events[1].payload).toMatchObject({ checkpoint: "RISK_CHECK", severity: "MEDIUM", signals: ["crisis:desperate"] });
    });

    it("offers a coping technique when the turn names a fitting situation", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "I feel so overwhelmed lately" });
      const [, , sent] = await manager.replay(id, 12);

      expect(result.verdict.severity).toBe(Severity.NONE);
      expect(result.reply).toMatch(/^It sounds like everything is piling up at once\./);
      expect(sent.payload).toMatchObject({ turnNumber: 3, text: result.reply, fallback: false });
    });

    it("delivers resources on a detected request and returns to SUPPORT_LOOP", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "can you give me a hotline number" });
      const events = await manager.replay(id, 14);

      expect(result.phase).toBe(SessionPhase.SUPPORT_LOOP);
      expect(result.resources?.resources.map((r) => r.id)).toEqual(["us-samhsa-helpline"]);
      expect(result.reply).toBe(
        "Here are some services that can help:\n" +
          "- SAMHSA National Helpline (24/7): call 1-800-662-4357, https://www.samhsa.gov/find-help/national-helpline\n" +
          "In an emergency, call 911.",
      );
      expect(kinds(events)).toEqual([
        "phase.transitioned",
        "resources.delivered",
        "reply.sent",
        "phase.transitioned",
      ]);
      expect(events[0].payload).toEqual({
        trigger: "detected",
        from: "SUPPORT_LOOP",
        to: "RESOURCES",
        reason: "resources_requested",
      });
      expect(events[1].payload).toEqual({
        turnNumber: 3,
        category: "mental_health",
        locale: "US",
        emergencyNumber: "911",
        resourceIds: ["us-samhsa-helpline"],
      });
      expect(events[3].payload).toEqual({ from: "RESOURCES", to: "SUPPORT_LOOP", reason: "resources_delivered" });
    });

    it("marks an explicit resources intent as user-triggered", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      await manager.submitTurn(id, { text: "okay", intent: "resources" });
      const [transition] = await manager.replay(id, 14);

      expect(transition.payload.trigger).toBe("user");
    });
  });

  // ─── Fast-path escalation ───────────────────────────────────────────────────

  describe("fast-path escalation", () => {
    it("moves straight to ESCALATE and issues the directive before any hand-off", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "I want to end my life tonight" });
      const events = await manager.replay(id, 12);

      expect(kinds(events)).toEqual([
        "turn.received",
        "risk.assessed",
        "phase.transitioned",
        "escalation.planned",
        "escalation.directive_issued",
        "escalation.handoff_attempted",
        "escalation.handoff_attempted",
        "escalation.handoff_attempted",
        "escalation.failed",
        "phase.transitioned",
        "session.closed",
      ]);
      expect(events[1].payload).toMatchObject({
        severity: "CRITICAL",
        signals: ["suicide:end my life", "modifier:immediacy"],
      });
      expect(events[2].payload).toEqual({
        severity: "CRITICAL",
        turnNumber: 3,
        from: "SUPPORT_LOOP",
        to: "ESCALATE",
        reason: "risk_fast_path",
      });
      expect(events[4].payload).toMatchObject({ emergencyNumber: "911" });
      expect(events[8].payload).toMatchObject({ attempts: 3, fallbackResourceIds: ["us-988-lifeline"] });

      expect(result.closed).toBe(true);
      expect(result.closeReason).toBe("escalation_failed");
      expect(result.escalation?.status).toBe("FAILED");
      expect(result.escalation?.channel).toBe("emergency_services");
      expect(result.reply).toBe(
        `${emergencyMessage("911")}\n` +
          "I wasn't able to connect you to a responder directly. Please reach out to one of these services:\n" +
          "- 988 Suicide & Crisis Lifeline: 988",
      );
    });

    it("closes with escalation_completed when the hand-off connects", async () => {
      const transfer: WarmTransferClient = {
        initiate: async () => ({ status: "connected", transferId: "tx-1", detail: null }),
      };
      manager = createManager({}, { transfer });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "I have been thinking about suicide" });

      expect(result.verdict.severity).toBe(Severity.HIGH);
      expect(result.closeReason).toBe("escalation_completed");
      expect(result.escalation).toMatchObject({ status: "COMPLETED", channel: "warm_transfer", directive: null });
      expect(result.reply).toBe("A trained crisis responder is being connected with you now.");
      expect(manager.getStats().escalations).toBe(1);
    });

    it("escalates from INIT without consent", async () => {
      const { id } = await manager.createSession();
      const result = await manager.submitTurn(id, { text: "I want to end my life tonight" });
      const events = await manager.replay(id);

      expect(events[3].payload).toMatchObject({ from: "INIT", to: "ESCALATE", reason: "risk_fast_path" });
      expect(result.phase).toBe(SessionPhase.CLOSE);
    });

    it("escalates a crisis turn whose redaction failed without storing its text", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "I am going to kill myself tonight \uD800" });
      const events = await manager.replay(id, 12);

      expect(result.verdict.severity).toBe(Severity.CRITICAL);
      expect(result.verdict.degraded).toBe(true);
      expect(result.verdict.signals).toContain("suicide:kill myself");
      expect(result.verdict.signals).toContain("redaction:failed");
      expect(result.closeReason).toBe("escalation_failed");
      expect(kinds(events).slice(0, 5)).toEqual([
        "redaction.failed",
        "turn.received",
        "risk.degraded",
        "risk.assessed",
        "phase.transitioned",
      ]);
      expect(events[0].payload).toMatchObject({ turnNumber: 3, kind: "RedactionFailure" });
      expect(events[1].payload.text).toMatch(/^\[UNCLASSIFIED:/);
      expect(events[1].payload.entities).toMatchObject([{ type: "UNCLASSIFIED", start: 0 }]);
      expect(events[4].payload).toMatchObject({ from: "SUPPORT_LOOP", to: "ESCALATE", reason: "risk_fast_path" });
    });

    it("rejects further turns once the escalation closed the session", async () => {
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "I want to end my life tonight" });

      await expect(manager.submitTurn(id, { text: "hello" })).rejects.toBeInstanceOf(SessionClosedError);
    });
  });

  // ─── Degraded risk ──────────────────────────────────────────────────────────

  describe("classifier failure", () => {
    it("floors a timed-out classifier verdict at MEDIUM and keeps the session open", async () => {
      const classifier: RiskClassifier = { classify: () => new Promise(() => {}) };
      manager = createManager({ classifierTimeoutMs: 20 }, { classifier });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "I had a long day at work" });
      // Earlier turns were degraded too, so turn 3 starts at sequence 14
      const events = await manager.replay(id, 14);

      expect(result.phase).toBe(SessionPhase.SUPPORT_LOOP);
      expect(result.verdict).toMatchObject({
        severity: Severity.MEDIUM,
        confidence: 0.5,
        signals: ["classifier:timeout"],
        degraded: true,
      });
      expect(kinds(events)).toEqual(["turn.received", "risk.degraded", "risk.assessed", "reply.sent"]);
      expect(events[1].payload).toEqual({
        turnNumber: 3,
        severity: "MEDIUM",
        classifierOutcome: "timeout",
        error: "risk classifier did not respond within 20ms",
      });
    });

    it("takes the higher of keyword and classifier severity", async () => {
      const classifier: RiskClassifier = {
        classify: async (text) =>
          text.includes("nothing matters")
            ? { severity: Severity.HIGH, confidence: 0.9 }
            : { severity: Severity.NONE, confidence: 0.9 },
      };
      manager = createManager({}, { classifier });
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "hello there", consent: true });
      const result = await manager.submitTurn(id, { text: "nothing matters anymore" });

      expect(result.verdict.signals).toEqual(["classifier:HIGH"]);
      expect(result.phase).toBe(SessionPhase.CLOSE);
      expect(result.closeReason).toBe("escalation_failed");
    });
  });

  // ─── Closing ────────────────────────────────────────────────────────────────

  describe("closing", () => {
    it("closes on the message cap and rejects the next turn", async () => {
      manager = createManager({ messageCap: 3 });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "still here" });
      const events = await manager.replay(id);

      expect(result.closed).toBe(true);
      expect(result.closeReason).toBe("message_cap");
      expect(result.reply).toBe(SAFE_FALLBACK_REPLY);
      expect(events.slice(-2).map((e) => e.payload)).toEqual([
        { from: "SUPPORT_LOOP", to: "CLOSE", reason: "message_cap" },
        { reason: "message_cap", messageCount: 3 },
      ]);
      await expect(manager.submitTurn(id, { text: "hello?" })).rejects.toBeInstanceOf(SessionClosedError);
    });

    it("revokes consent on consent: false and forgets vaulted values", async () => {
      const vault = new TokenVault();
      manager = createManager({}, { vault });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      await manager.submitTurn(id, { text: "my email is sam@example.org" });
      expect(vault.size(id)).toBe(1);

      const result = await manager.submitTurn(id, { text: "stop", consent: false });
      const events = await manager.replay(id);

      expect(result.closeReason).toBe("consent_revoked");
      expect(result.reply).toBe(CLOSING_REPLY);
      expect(vault.size(id)).toBe(0);
      expect(kinds(events).slice(-3)).toEqual(["consent.revoked", "phase.transitioned", "session.closed"]);
    });

    it("closes on an exit intent", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      const result = await manager.submitTurn(id, { text: "bye", intent: "exit" });

      expect(result.closeReason).toBe("user_exit");
      expect(result.reply).toBe(CLOSING_REPLY);
    });

    it("closeSession is idempotent", async () => {
      const { id } = await manager.createSession();
      await manager.closeSession(id);
      const again = await manager.closeSession(id, "shutdown");

      expect(again.closeReason).toBe("user_exit");
      expect(kinds(await manager.replay(id))).toEqual(["session.created", "phase.transitioned", "session.closed"]);
    });

    it("revokeConsent records the revocation before closing", async () => {
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "yes", consent: true });
      const session = await manager.revokeConsent(id);

      expect(session.consentRevoked).toBe(true);
      expect(session.closeReason).toBe("consent_revoked");
      expect(kinds(await manager.replay(id)).slice(-3)).toEqual([
        "consent.revoked",
        "phase.transitioned",
        "session.closed",
      ]);
    });
  });

  // ─── Sweeps ─────────────────────────────────────────────────────────────────

  describe("sweeps", () => {
    it("closes idle sessions only after the idle timeout", async () => {
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "yes", consent: true });

      advance(30 * 60_000 - 1);
      expect(await manager.sweepIdle()).toBe(0);
      advance(1);
      expect(await manager.sweepIdle()).toBe(1);
      expect(manager.getSession(id).closeReason).toBe("idle_timeout");
    });

    it("closes sessions past the hard timeout regardless of activity", async () => {
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "yes", consent: true });
      advance(119 * 60_000);
      await manager.submitTurn(id, { text: "work has been hard" });
      advance(60_000);

      expect(await manager.sweepHardTimeouts()).toBe(1);
      expect(manager.getSession(id).closeReason).toBe("hard_timeout");
    });

    it("leaves closed sessions alone", async () => {
      const { id } = await manager.createSession();
      await manager.closeSession(id);
      advance(3 * 60 * 60_000);

      expect(await manager.sweepIdle()).toBe(0);
      expect(await manager.sweepHardTimeouts()).toBe(0);
    });
  });

  // ─── Escalation retries ─────────────────────────────────────────────────────

  describe("escalation retries", () => {
    it("keeps ESCALATE pending when the coordinator throws, then fails after the retry budget", async () => {
      const escalator: Escalator = {
        escalate: async () => {
          throw new Error("coordinator offline");
        },
      };
      manager = createManager({ escalationRetryMax: 1, escalationRetryIntervalMs: 1_000 }, { escalator });
      const { id } = await manager.createSession();
      const result = await manager.submitTurn(id, { text: "I want to end my life tonight" });

      expect(result.phase).toBe(SessionPhase.ESCALATE);
      expect(result.closed).toBe(false);
      expect(result.reply).toBe(
        `${emergencyMessage("911")}\nI'm concerned about your safety and I'm getting you connected with someone who can help.`,
      );
      expect(manager.getStats().pendingEscalations).toBe(1);
      const [unresolved] = (await manager.replay(id)).slice(-1);
      expect(unresolved).toMatchObject({
        kind: "escalation.unresolved",
        payload: { severity: "CRITICAL", attempts: 1, nextRetryAt: "2026-03-01T12:00:01.000Z", error: "coordinator offline" },
      });

      expect(await manager.sweepEscalationRetries()).toBe(0);

      advance(1_000);
      expect(await manager.sweepEscalationRetries()).toBe(1);
      expect(manager.getSession(id).pendingEscalation?.attempts).toBe(2);

      advance(1_000);
      expect(await manager.sweepEscalationRetries()).toBe(1);
      const session = manager.getSession(id);
      expect(session.phase).toBe(SessionPhase.CLOSE);
      expect(session.closeReason).toBe("escalation_failed");
      expect(session.pendingEscalation).toBeNull();
      expect(kinds(await manager.replay(id)).slice(-3)).toEqual([
        "escalation.failed",
        "phase.transitioned",
        "session.closed",
      ]);
    });

    it("resolves the escalation on a successful retry", async () => {
      let calls = 0;
      const escalator: Escalator = {
        escalate: async (request) => {
          calls++;
          if (calls === 1) throw new Error("coordinator offline");
          return {
            id: "plan-1",
            sessionId: request.sessionId,
            severity: request.severity,
            channel: "warm_transfer",
            priority: "HIGH",
            status: "COMPLETED",
            directive: null,
            attempts: [],
            fallbackResources: [],
            createdAt: clock.toISOString(),
            resolvedAt: clock.toISOString(),
          };
        },
      };
      manager = createManager({ escalationRetryIntervalMs: 1_000 }, { escalator });
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "I have been thinking about suicide" });

      advance(1_000);
      await manager.sweepEscalationRetries();

      const session = manager.getSession(id);
      expect(session.closeReason).toBe("escalation_completed");
      expect(session.escalation?.id).toBe("plan-1");
    });
  });

  // ─── Closed-session policy ──────────────────────────────────────────────────

  describe("closed-session policy", () => {
    it("archives closed sessions until retention expires", async () => {
      const { id } = await manager.createSession();
      await manager.closeSession(id);

      expect(manager.getSession(id).phase).toBe(SessionPhase.CLOSE);
      expect(manager.listActiveSessions()).toEqual([]);

      advance(7 * 24 * 60 * 60_000);
      expect(manager.purgeExpired()).toBe(1);
      expect(() => manager.getSession(id)).toThrow(SessionNotFoundError);
    });

    it("destroys closed sessions but keeps their events replayable", async () => {
      const store = new InMemoryLedgerStore();
      manager = createManager({ closedSessionPolicy: "destroy" }, { store });
      const { id } = await manager.createSession();
      await manager.closeSession(id);

      expect(() => manager.getSession(id)).toThrow(SessionClosedError);
      await expect(manager.submitTurn(id, { text: "hi" })).rejects.toBeInstanceOf(SessionClosedError);
      expect(kinds(await manager.replay(id))).toEqual(["session.created", "phase.transitioned", "session.closed"]);
      expect(manager.getStats().closed).toBe(1);

      advance(7 * 24 * 60 * 60_000);
      expect(manager.purgeExpired()).toBe(1);
      expect(() => manager.getSession(id)).toThrow(SessionNotFoundError);
      expect(await manager.replay(id)).toHaveLength(3);
    });

    it("forgets vaulted values when an archived session is purged", async () => {
      const vault = new TokenVault();
      manager = createManager({ closedSessionRetentionMs: 1000 }, { vault });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      await manager.submitTurn(id, { text: "my email is sam@example.org" });
      await manager.closeSession(id);
      expect(vault.size(id)).toBe(1);

      advance(5000);
      expect(manager.purgeExpired()).toBe(1);
      expect(vault.size(id)).toBe(0);
    });

    it("throws SessionNotFoundError when replaying an unknown session", async () => {
      await expect(manager.replay("missing")).rejects.toBeInstanceOf(SessionNotFoundError);
    });
  });

  // ─── Token reveal ───────────────────────────────────────────────────────────

  describe("revealToken()", () => {
    const gate = new RedactionGate({ salt: "test-salt" });
    const token = gate.tokenFor("EMAIL", "sam@example.org");

    it("returns the original value while consent is in force", async () => {
      manager = createManager({}, { vault: new TokenVault(), gate });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      await manager.submitTurn(id, { text: "my email is sam@example.org" });

      expect(manager.revealToken(id, token)).toBe("sam@example.org");
      expect(manager.revealToken(id, gate.tokenFor("EMAIL", "other@example.org"))).toBeNull();
    });

    it("returns null once consent is revoked", async () => {
      manager = createManager({}, { vault: new TokenVault(), gate });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      await manager.submitTurn(id, { text: "my email is sam@example.org" });
      await manager.revokeConsent(id);

      expect(manager.revealToken(id, token)).toBeNull();
    });

    it("returns null without a vault", async () => {
      manager = createManager({}, { gate });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      await manager.submitTurn(id, { text: "my email is sam@example.org" });

      expect(manager.revealToken(id, token)).toBeNull();
    });

    it("throws SessionNotFoundError for an unknown session", () => {
      expect(() => manager.revealToken("missing", token)).toThrow(SessionNotFoundError);
    });
  });

  // ─── Ledger write failures ──────────────────────────────────────────────────

  describe("ledger write failures", () => {
    it("does not count a turn whose turn.received was not stored", async () => {
      manager = createManager({}, { store: failOnce((e) => e.kind === "turn.received") });
      const { id } = await manager.createSession();

      await expect(manager.submitTurn(id, { text: "hello there", consent: true })).rejects.toThrow("disk full");
      expect(manager.getSession(id)).toMatchObject({ phase: SessionPhase.INIT, messageCount: 0 });

      const result = await manager.submitTurn(id, { text: "hello there", consent: true });
      expect(result.turnNumber).toBe(1);
      expect(result.phase).toBe(SessionPhase.TRIAGE);
    });

    it("keeps SUPPORT_LOOP when the move to RESOURCES was not stored", async () => {
      manager = createManager({}, { store: failOnce(transitionTo(SessionPhase.RESOURCES)) });
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);

      await expect(manager.submitTurn(id, { text: "can you give me a hotline number" })).rejects.toThrow("disk full");
      expect(manager.getSession(id)).toMatchObject({ phase: SessionPhase.SUPPORT_LOOP, messageCount: 3 });

      const result = await manager.submitTurn(id, { text: "okay" });
      expect(result.turnNumber).toBe(4);
      expect(result.phase).toBe(SessionPhase.SUPPORT_LOOP);

      await manager.closeSession(id);
      const session = manager.getSession(id);
      expect(await manager.audit(id)).toEqual({
        phase: SessionPhase.CLOSE,
        consentGiven: true,
        messageCount: 4,
        riskHistory: session.riskHistory,
        closeReason: "user_exit",
      });
    });

    it("finishes an interrupted consent on the next turn", async () => {
      manager = createManager({}, { store: failOnce(transitionTo(SessionPhase.TRIAGE)) });
      const { id } = await manager.createSession();

      await expect(manager.submitTurn(id, { text: "hello there", consent: true })).rejects.toThrow("disk full");
      expect(manager.getSession(id)).toMatchObject({ phase: SessionPhase.CONSENTED, consentGiven: true });

      const result = await manager.submitTurn(id, { text: "work has been hard" });
      const transitions = (await manager.replay(id)).filter((e) => e.kind === "phase.transitioned");

      expect(result.phase).toBe(SessionPhase.SUPPORT_LOOP);
      expect(transitions.map((e) => [e.payload.from, e.payload.to])).toEqual([
        ["INIT", "CONSENTED"],
        ["CONSENTED", "TRIAGE"],
        ["TRIAGE", "SUPPORT_LOOP"],
      ]);
      expect(await manager.audit(id)).toMatchObject({ phase: SessionPhase.SUPPORT_LOOP, messageCount: 2 });
    });
  });

  // ─── Ledger ─────────────────────────────────────────────────────────────────

  describe("ledger", () => {
    it("never stores raw identifiers from turn text", async () => {
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "yes, reach me at sam@example.org", consent: true });
      const events = await manager.replay(id);
      const received = events.find((e) => e.kind === "turn.received");

      expect(JSON.stringify(events)).not.toContain("sam@example.org");
      expect(received?.payload.entities).toMatchObject([{ type: "EMAIL" }]);
    });

    it("replays to the live session state", async () => {
      const { id } = await manager.createSession();
      await reachSupportLoop(manager, id);
      await manager.submitTurn(id, { text: "I feel desperate" });
      const session = manager.getSession(id);
      const audit = await manager.audit(id);

      expect(audit).toEqual({
        phase: session.phase,
        consentGiven: true,
        messageCount: 3,
        riskHistory: session.riskHistory,
        closeReason: null,
      });
      expect(await manager.audit(id)).toEqual(audit);
    });

    it("streams new events to subscribers until they unsubscribe", async () => {
      const { id } = await manager.createSession();
      const seen: number[] = [];
      const unsubscribe = manager.subscribe(id, (event) => seen.push(event.sequence));

      await manager.submitTurn(id, { text: "hello" });
      unsubscribe();
      await manager.submitTurn(id, { text: "hello again" });

      expect(seen).toEqual([2, 3, 4]);
    });

    it("keeps sequences gapless when turns race on one session", async () => {
      const { id } = await manager.createSession();
      const results = await Promise.all([
        manager.submitTurn(id, { text: "one" }),
        manager.submitTurn(id, { text: "two" }),
        manager.submitTurn(id, { text: "three" }),
      ]);
      const events = await manager.replay(id);

      expect(results.map((r) => r.turnNumber)).toEqual([1, 2, 3]);
      expect(events.map((e) => e.sequence)).toEqual(events.map((_, i) => i + 1));
    });
  });

  // ─── Stats and shutdown ─────────────────────────────────────────────────────

  describe("getStats() and shutdown()", () => {
    it("counts sessions by phase", async () => {
      const a = await manager.createSession();
      const b = await manager.createSession();
      await manager.submitTurn(a.id, { text: "yes", consent: true });
      await manager.closeSession(b.id);

      const stats = manager.getStats();
      expect(stats.active).toBe(1);
      expect(stats.closed).toBe(1);
      expect(stats.totalCreated).toBe(2);
      expect(stats.turnsProcessed).toBe(1);
      expect(stats.byPhase.TRIAGE).toBe(1);
      expect(stats.byPhase.CLOSE).toBe(1);
      expect(stats.observability).toBeNull();
    });

    it("closes open sessions and drains the observability sink on shutdown", async () => {
      const records: ObservabilityRecord[] = [];
      manager = createManager({}, { observabilitySink: { deliver: (record) => void records.push(record) } });
      const { id } = await manager.createSession();
      await manager.submitTurn(id, { text: "hello" });

      await manager.shutdown();

      expect(manager.getSession(id).closeReason).toBe("shutdown");
      expect(records.map((r) => (r.type === "event" ? r.event.sequence : -1))).toEqual([1, 2, 3, 4, 5, 6]);
      expect(manager.getStats().observability).toMatchObject({ delivered: 6, dropped: 0 });
    });
  });
});
