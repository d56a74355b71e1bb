// Support Session Orchestrator - Session Manager
// Registry and scheduler of live sessions. Owns the id → state machine map,
// serializes work per session through a keyed mutex, and runs the idle,
// hard-timeout, phase-timeout, escalation-retry and retention sweeps.
//
// Sessions never share mutable state: turns for different sessions proceed in
// parallel, and sweep-triggered closures wait for the same per-session lock as
// turns do.

import { v4 as uuidv4 } from "uuid";
import { SessionPhase } from "./types.js";
import type { CloseReason, LedgerEvent, Session, TurnInput, TurnResult } from "./types.js";
import type { OrchestratorConfig } from "./config.js";
import { DEFAULT_CONFIG } from "./config.js";
import { EventLedger } from "./event-ledger.js";
import type { LedgerListener } from "./event-ledger.js";
import type { LedgerStore } from "./ledger-store.js";
import { InMemoryLedgerStore } from "./ledger-store.js";
import { RedactionGate } from "./redaction-gate.js";
import type { TokenVault } from "./redaction-gate.js";
import { KeywordRiskMatcher } from "./keyword-risk-matcher.js";
import { RiskMonitor } from "./risk-monitor.js";
import type { RiskClassifier } from "./risk-monitor.js";
import type { Responder } from "./responder.js";
import { TemplateResponder } from "./responder.js";
import type { ResourceDirectory } from "./resource-directory.js";
import { StaticResourceDirectory } from "./resource-directory.js";
import type { WarmTransferClient } from "./warm-transfer.js";
import { UnconfiguredWarmTransfer } from "./warm-transfer.js";
import { EscalationCoordinator } from "./escalation-coordinator.js";
import type { Escalator } from "./escalation-coordinator.js";
import { ObservabilityPump } from "./observability.js";
import type { ObservabilitySink, ObservabilityStats } from "./observability.js";
import { SessionStateMachine } from "./session-state-machine.js";
import type { MachineContext, ReplayedState } from "./session-state-machine.js";
import { SessionClosedError, SessionNotFoundError, describeError } from "./errors.js";
import { KeyedMutex } from "./utils/keyed-mutex.js";
import { normalizeLocale } from "./utils.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  config?: Readonly<OrchestratorConfig>;
  store?: LedgerStore;
  gate?: RedactionGate;
  matcher?: KeywordRiskMatcher;
  /** Optional external classifier. Absent means keyword-only risk assessment. */
  classifier?: RiskClassifier | null;
  responder?: Responder;
  directory?: ResourceDirectory;
  transfer?: WarmTransferClient;
  /** Overrides the EscalationCoordinator built from directory and transfer. */
  escalator?: Escalator;
  observabilitySink?: ObservabilitySink | null;
  vault?: TokenVault | null;
  /** One logger for every component. Defaults to per-component console loggers. */
  logger?: Logger;
  now?: () => Date;
  idFactory?: () => string;
}

export interface CreateSessionOptions {
  locale?: string;
  metadata?: Record<string, string>;
}

export interface SessionStats {
  active: number;
  closed: number;
  totalCreated: number;
  turnsProcessed: number;
  escalations: number;
  pendingEscalations: number;
  byPhase: Record<SessionPhase, number>;
  limits: {
    messageCap: number;
    idleTimeoutMs: number;
    hardTimeoutMs: number;
    escalationThreshold: string;
  };
  observability: ObservabilityStats | null;
}

interface Tombstone {
  reason: CloseReason;
  closedAt: Date;
}

export class SessionManager {
  private machines: Map<string, SessionStateMachine> = new Map();
  private tombstones: Map<string, Tombstone> = new Map();
  private readonly mutex = new KeyedMutex();
  private readonly config: Readonly<OrchestratorConfig>;
  private readonly context: MachineContext;
  private readonly store: LedgerStore;
  private readonly pump: ObservabilityPump | null;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  private idleTimer: ReturnType<typeof setInterval> | null = null;
  private hardTimer: ReturnType<typeof setInterval> | null = null;
  private runningSweeps: Set<Promise<void>> = new Set();

  private totalCreated = 0;
  private turnsProcessed = 0;
  private escalations = 0;

  readonly ledger: EventLedger;

  constructor(deps: SessionManagerDeps = {}) {
    this.config = deps.config ?? DEFAULT_CONFIG;
    this.now = deps.now ?? (() => new Date());
    this.idFactory = deps.idFactory ?? uuidv4;
    const loggerFor = (component: string): Logger => deps.logger ?? createConsoleLogger(component);
    this.logger = loggerFor("SessionManager");

    this.store = deps.store ?? new InMemoryLedgerStore();
    const gate = deps.gate ?? new RedactionGate({ salt: this.config.redactionTokenSalt });
    const monitor = new RiskMonitor({
      matcher: deps.matcher ?? new KeywordRiskMatcher(),
      classifier: deps.classifier ?? null,
      classifierTimeoutMs: this.config.classifierTimeoutMs,
      sustainedRiskTurns: this.config.sustainedRiskTurns,
      logger: loggerFor("RiskMonitor"),
      now: this.now,
    });
    const directory = deps.directory ?? new StaticResourceDirectory(undefined, this.config.defaultLocale);
    const escalator =
      deps.escalator ??
      new EscalationCoordinator({
        directory,
        transfer: deps.transfer ?? new UnconfiguredWarmTransfer(),
        config: this.config,
        logger: loggerFor("EscalationCoordinator"),
        now: this.now,
      });

    this.pump = deps.observabilitySink
      ? new ObservabilityPump(deps.observabilitySink, this.config.observabilityQueueSize, loggerFor("Observability"), this.now)
      : null;
    this.ledger = new EventLedger({
      store: this.store,
      gate,
      pump: this.pump,
      logger: loggerFor("EventLedger"),
      now: this.now,
    });

    this.context = {
      config: this.config,
      ledger: this.ledger,
      store: this.store,
      gate,
      monitor,
      responder: deps.responder ?? new TemplateResponder(),
      directory,
      escalator,
      vault: deps.vault ?? null,
      logger: loggerFor("SessionStateMachine"),
      now: this.now,
      idFactory: this.idFactory,
    };

    this.logger.info(
      `Risk classifier: ${monitor.hasClassifier ? "enabled" : "keyword-only"}, ` +
        `escalation threshold ${this.config.escalationThreshold}, message cap ${this.config.messageCap}`,
    );
  }

  // ─── Lifecycle operations ───────────────────────────────────────────────────

  async createSession(options: CreateSessionOptions = {}): Promise<Session> {
    const id = this.idFactory();
    const locale = normalizeLocale(options.locale, this.config.defaultLocale);
    const machine = await this.mutex.runExclusive(id, () =>
      SessionStateMachine.create(this.context, id, locale, options.metadata ?? {}),
    );
    this.machines.set(id, machine);
    this.totalCreated++;
    this.logger.info(`Session created: ${id} (locale ${locale})`);
    return machine.snapshot();
  }

  /**
   * @throws SessionNotFoundError for unknown ids.
   * @throws SessionClosedError for destroyed sessions still within retention.
   */
  getSession(sessionId: string): Session {
    return this.resolve(sessionId).snapshot();
  }

  /**
   * Original value behind a redaction token. Null when the vault is disabled,
   * consent is not in force or the token was never captured for this session.
   * @throws SessionNotFoundError for unknown ids.
   * @throws SessionClosedError for destroyed sessions still within retention.
   */
  revealToken(sessionId: string, token: string): string | null {
    const { session } = this.resolve(sessionId);
    const vault = this.context.vault;
    if (!vault) return null;
    const value = vault.reveal(sessionId, token, session.consentGiven && !session.consentRevoked);
    if (value !== null) this.logger.info(`Revealed ${token} for session ${sessionId}`);
    return value;
  }

  /**
   * Processes one turn under the session's lock.
   * @throws SessionClosedError when the session is closed (or destroyed).
   * @throws SessionNotFoundError for unknown ids.
   */
  async submitTurn(sessionId: string, input: TurnInput): Promise<TurnResult> {
    this.resolve(sessionId);
    return this.mutex.runExclusive(sessionId, async () => {
      // Re-resolve: the session may have been destroyed while this turn waited
      const machine = this.resolve(sessionId);
      const wasEscalated = machine.phase === SessionPhase.ESCALATE;
      const result = await machine.handleTurn(input);
      this.turnsProcessed++;
      if (!wasEscalated && (machine.phase === SessionPhase.ESCALATE || machine.session.escalation)) {
        this.escalations++;
      }
      await this.afterOperation(machine);
      return result;
    });
  }

  /** Closes a session. Closing an already closed session returns it unchanged. */
  async closeSession(sessionId: string, reason: CloseReason = "user_exit"): Promise<Session> {
    this.resolve(sessionId);
    return this.mutex.runExclusive(sessionId, async () => {
      const machine = this.resolve(sessionId);
      await machine.forceClose(reason);
      const snapshot = machine.snapshot();
      await this.afterOperation(machine);
      return snapshot;
    });
  }

  /** Consent revocation is a first-class input forcing CLOSE. */
  async revokeConsent(sessionId: string): Promise<Session> {
    return this.closeSession(sessionId, "consent_revoked");
  }

  listActiveSessions(): Session[] {
    return [...this.machines.values()].filter((m) => !m.isClosed).map((m) => m.snapshot());
  }

  /**
   * Events from `fromSequence` on. Works for closed and destroyed sessions
   * because events are never deleted.
   */
  async replay(sessionId: string, fromSequence = 1): Promise<LedgerEvent[]> {
    if (!this.machines.has(sessionId) && !this.tombstones.has(sessionId)) {
      const stored = await this.ledger.replay(sessionId, fromSequence);
      if (stored.length === 0) throw new SessionNotFoundError(sessionId);
      return stored;
    }
    return this.ledger.replay(sessionId, fromSequence);
  }

  /** Replays the full stream through a fresh state machine. */
  async audit(sessionId: string): Promise<ReplayedState> {
    return SessionStateMachine.replay(await this.replay(sessionId, 1));
  }

  /** Live feed of new events for a session. Returns the unsubscribe function. */
  subscribe(sessionId: string, listener: LedgerListener): () => void {
    this.resolve(sessionId);
    return this.ledger.subscribe(sessionId, listener);
  }

  getStats(): SessionStats {
    const byPhase: Record<SessionPhase, number> = {
      [SessionPhase.INIT]: 0,
      [SessionPhase.CONSENTED]: 0,
      [SessionPhase.TRIAGE]: 0,
      [SessionPhase.SUPPORT_LOOP]: 0,
      [SessionPhase.RISK_CHECK]: 0,
      [SessionPhase.RESOURCES]: 0,
      [SessionPhase.ESCALATE]: 0,
      [SessionPhase.CLOSE]: 0,
    };
    let active = 0;
    let closed = this.tombstones.size;
    let pending = 0;
    for (const machine of this.machines.values()) {
      byPhase[machine.phase]++;
      if (machine.isClosed) closed++;
      else active++;
      if (machine.session.pendingEscalation) pending++;
    }
    return {
      active,
      closed,
      totalCreated: this.totalCreated,
      turnsProcessed: this.turnsProcessed,
      escalations: this.escalations,
      pendingEscalations: pending,
      byPhase,
      limits: {
        messageCap: this.config.messageCap,
        idleTimeoutMs: this.config.idleTimeoutMs,
        hardTimeoutMs: this.config.hardTimeoutMs,
        escalationThreshold: this.config.escalationThreshold,
      },
      observability: this.pump?.stats ?? null,
    };
  }

  // ─── Sweeps ─────────────────────────────────────────────────────────────────

  /** Closes sessions idle for longer than the idle timeout. Returns the number closed. */
  async sweepIdle(): Promise<number> {
    return this.sweep("idle", (session, now) =>
      now - session.lastActivityAt.getTime() >= this.config.idleTimeoutMs ? "idle_timeout" : null,
    );
  }

  /** Closes sessions older than the hard timeout regardless of activity. */
  async sweepHardTimeouts(): Promise<number> {
    return this.sweep("hard", (session, now) =>
      now - session.createdAt.getTime() >= this.config.hardTimeoutMs ? "hard_timeout" : null,
    );
  }

  /**
   * INIT past the consent timeout closes with `consent_timeout`; TRIAGE past
   * the triage timeout proceeds with a degraded summary.
   */
  async sweepPhaseTimeouts(): Promise<number> {
    const consentClosed = await this.sweep("consent", (session, now) =>
      session.phase === SessionPhase.INIT && now - session.phaseEnteredAt.getTime() >= this.config.consentTimeoutMs
        ? "consent_timeout"
        : null,
    );

    let triaged = 0;
    const now = this.now().getTime();
    const candidates = [...this.machines.values()].filter(
      (m) => m.phase === SessionPhase.TRIAGE && now - m.session.phaseEnteredAt.getTime() >= this.config.triageTimeoutMs,
    );
    await Promise.all(
      candidates.map((candidate) =>
        this.guarded(candidate.id, "triage timeout", async (machine) => {
          const elapsed = this.now().getTime() - machine.session.phaseEnteredAt.getTime();
          if (machine.phase === SessionPhase.TRIAGE && elapsed >= this.config.triageTimeoutMs) {
            if (await machine.completeTriageOnTimeout()) triaged++;
          }
        }),
      ),
    );
    return consentClosed + triaged;
  }

  /** Retries escalations whose coordinator call failed, once their retry time has come. */
  async sweepEscalationRetries(): Promise<number> {
    let retried = 0;
    const due = (machine: SessionStateMachine): boolean => {
      const pending = machine.session.pendingEscalation;
      return pending !== null && pending.nextRetryAt.getTime() <= this.now().getTime();
    };
    const candidates = [...this.machines.values()].filter(due);
    await Promise.all(
      candidates.map((candidate) =>
        this.guarded(candidate.id, "escalation retry", async (machine) => {
          if (!due(machine)) return;
          if (await machine.retryPendingEscalation()) retried++;
          await this.afterOperation(machine);
        }),
      ),
    );
    return retried;
  }

  /** Drops archived sessions and tombstones older than the retention window. */
  purgeExpired(): number {
    const cutoff = this.now().getTime() - this.config.closedSessionRetentionMs;
    let purged = 0;
    for (const [id, machine] of this.machines) {
      const closedAt = machine.session.closedAt;
      if (closedAt && closedAt.getTime() <= cutoff && !this.mutex.isLocked(id)) {
        this.machines.delete(id);
        this.ledger.release(id);
        this.context.vault?.forget(id);
        purged++;
      }
    }
    for (const [id, tombstone] of this.tombstones) {
      if (tombstone.closedAt.getTime() <= cutoff) {
        this.tombstones.delete(id);
        purged++;
      }
    }
    if (purged > 0) this.logger.info(`Purged ${purged} closed session(s) past retention`);
    return purged;
  }

  // ─── Scheduling ─────────────────────────────────────────────────────────────

  /** Starts the idle and hard-timeout sweep timers. Timers do not keep the process alive. */
  start(): void {
    if (this.idleTimer || this.hardTimer) return;
    this.idleTimer = setInterval(() => {
      this.track(async () => {
        await this.sweepIdle();
        await this.sweepPhaseTimeouts();
        await this.sweepEscalationRetries();
        this.purgeExpired();
      });
    }, this.config.idleSweepIntervalMs);
    this.hardTimer = setInterval(() => {
      this.track(async () => {
        await this.sweepHardTimeouts();
      });
    }, this.config.hardSweepIntervalMs);
    this.idleTimer.unref();
    this.hardTimer.unref();
    this.logger.info(
      `Sweeps started (idle every ${this.config.idleSweepIntervalMs}ms, hard every ${this.config.hardSweepIntervalMs}ms)`,
    );
  }

  /** Stops the timers and waits for sweeps already running. */
  async stop(): Promise<void> {
    if (this.idleTimer) clearInterval(this.idleTimer);
    if (this.hardTimer) clearInterval(this.hardTimer);
    this.idleTimer = null;
    this.hardTimer = null;
    await Promise.all([...this.runningSweeps]);
  }

  /** Stops sweeping, closes every open session with `shutdown` and drains observability. */
  async shutdown(): Promise<void> {
    await this.stop();
    const open = [...this.machines.values()].filter((m) => !m.isClosed);
    await Promise.all(
      open.map((m) =>
        this.guarded(m.id, "shutdown", async (machine) => {
          await machine.forceClose("shutdown");
          await this.afterOperation(machine);
        }),
      ),
    );
    await this.pump?.flush();
    this.logger.info(`Shutdown complete, closed ${open.length} session(s)`);
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private resolve(sessionId: string): SessionStateMachine {
    const machine = this.machines.get(sessionId);
    if (machine) return machine;
    if (this.tombstones.has(sessionId)) throw new SessionClosedError(sessionId);
    throw new SessionNotFoundError(sessionId);
  }

  /**
   * Runs `check` for every open session, outside any lock, then re-checks under
   * the session's lock before closing.
   */
  private async sweep(
    name: string,
    check: (session: Readonly<Session>, now: number) => CloseReason | null,
  ): Promise<number> {
    const now = this.now().getTime();
    const candidates = [...this.machines.values()].filter((m) => !m.isClosed && check(m.session, now) !== null);
    let closed = 0;
    await Promise.all(
      candidates.map((candidate) =>
        this.guarded(candidate.id, `${name} sweep`, async (machine) => {
          if (machine.isClosed) return;
          const reason = check(machine.session, this.now().getTime());
          if (reason && (await machine.forceClose(reason))) {
            closed++;
            await this.afterOperation(machine);
          }
        }),
      ),
    );
    if (closed > 0) this.logger.info(`${name} sweep closed ${closed} session(s)`);
    return closed;
  }

  /** Runs `task` under the session's lock; failures are logged per session. */
  private async guarded(
    sessionId: string,
    label: string,
    task: (machine: SessionStateMachine) => Promise<void>,
  ): Promise<void> {
    try {
      await this.mutex.runExclusive(sessionId, async () => {
        const machine = this.machines.get(sessionId);
        if (machine) await task(machine);
      });
    } catch (err) {
      this.logger.error(`${label} failed for session ${sessionId}: ${describeError(err)}`);
    }
  }

  private track(run: () => Promise<void>): void {
    const sweep: Promise<void> = run()
      .catch((err: unknown) => {
        this.logger.error(`Sweep failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.runningSweeps.delete(sweep);
      });
    this.runningSweeps.add(sweep);
  }

  /** Applies the closed-session policy once a machine reaches CLOSE. */
  private async afterOperation(machine: SessionStateMachine): Promise<void> {
    if (!machine.isClosed || this.config.closedSessionPolicy !== "destroy") return;
    const { id } = machine;
    const session = machine.session;
    this.machines.delete(id);
    this.tombstones.set(id, {
      reason: session.closeReason ?? "shutdown",
      closedAt: session.closedAt ?? this.now(),
    });
    this.context.vault?.forget(id);
    this.ledger.release(id);
    await this.store.deleteSessionRecord(id);
  }
}
