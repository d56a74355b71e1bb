// Support Session Orchestrator - Escalation Coordinator
// Terminal-phase collaborator. Builds an EscalationPlan, surfaces an
// emergency-number directive first when the severity calls for it, then makes
// bounded warm hand-off attempts. Every step is reported as a ledger event and
// every plan resolves to COMPLETED or FAILED.

import { v4 as uuidv4 } from "uuid";
import type {
  EmergencyDirective,
  EscalationPlan,
  EventPayload,
  HandoffAttempt,
  LedgerEventKind,
  ResourceCategory,
  Severity,
  SupportResource,
} from "./types.js";
import type { OrchestratorConfig } from "./config.js";
import type { ResourceDirectory } from "./resource-directory.js";
import type { WarmTransferClient } from "./warm-transfer.js";
import { CollaboratorTimeoutError, EscalationExhaustedError, describeError } from "./errors.js";
import { delay, withTimeout } from "./utils.js";
import type { Logger } from "./logger.js";

export interface EscalationRequest {
  sessionId: string;
  severity: Severity;
  /** Redacted context for the human responder. */
  contextSummary: string;
  locale: string;
  /** True when the severity reaches the emergency threshold. */
  emergency: boolean;
  /** Category of the fallback resources attached to a failed plan. */
  resourceCategory: ResourceCategory;
}

/** Appends one event to the escalating session's ledger stream. */
export type EscalationEventSink = (kind: LedgerEventKind, payload: EventPayload) => Promise<unknown>;

export interface Escalator {
  escalate(request: EscalationRequest, record: EscalationEventSink): Promise<EscalationPlan>;
}

export type CoordinatorConfig = Pick<
  OrchestratorConfig,
  | "handoffMaxAttempts"
  | "handoffTimeoutMs"
  | "handoffRetryDelayMs"
  | "directoryTimeoutMs"
  | "fallbackEmergencyNumber"
>;

export interface EscalationCoordinatorOptions {
  directory: ResourceDirectory;
  transfer: WarmTransferClient;
  config: CoordinatorConfig;
  logger: Logger;
  now?: () => Date;
  idFactory?: () => string;
}

export function emergencyMessage(emergencyNumber: string): string {
  return (
    `If you are in immediate danger or thinking about acting on these thoughts, ` +
    `please call ${emergencyNumber} now. You do not have to go through this alone.`
  );
}

export class EscalationCoordinator implements Escalator {
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(private readonly options: EscalationCoordinatorOptions) {
    this.now = options.now ?? (() => new Date());
    this.idFactory = options.idFactory ?? uuidv4;
  }

  async escalate(request: EscalationRequest, record: EscalationEventSink): Promise<EscalationPlan> {
    const { config, logger } = this.options;
    const plan: EscalationPlan = {
      id: this.idFactory(),
      sessionId: request.sessionId,
      severity: request.severity,
      channel: request.emergency ? "emergency_services" : "warm_transfer",
      priority: request.emergency ? "URGENT" : "HIGH",
      status: "PENDING",
      directive: null,
      attempts: [],
      fallbackResources: [],
      createdAt: this.now().toISOString(),
      resolvedAt: null,
    };

    await record("escalation.planned", {
      planId: plan.id,
      severity: plan.severity,
      channel: plan.channel,
      priority: plan.priority,
    });

    // Emergency directive strictly precedes any hand-off attempt
    if (request.emergency) {
      plan.directive = await this.issueDirective(request, record);
      await record("escalation.directive_issued", {
        planId: plan.id,
        emergencyNumber: plan.directive.emergencyNumber,
        issuedAt: plan.directive.issuedAt,
      });
    }

    plan.status = "IN_PROGRESS";
    for (let attempt = 1; attempt <= config.handoffMaxAttempts; attempt++) {
      const result = await this.attemptHandoff(plan, request, attempt);
      plan.attempts.push(result);
      await record("escalation.handoff_attempted", {
        planId: plan.id,
        attempt: result.attempt,
        outcome: result.outcome,
        transferId: result.transferId,
        detail: result.detail,
      });

      if (result.outcome === "connected" || result.outcome === "initiated") {
        plan.status = "COMPLETED";
        plan.resolvedAt = this.now().toISOString();
        logger.info(`Plan ${plan.id} for session ${plan.sessionId} completed after ${attempt} attempt(s)`);
        await record("escalation.completed", {
          planId: plan.id,
          attempts: attempt,
          transferId: result.transferId,
        });
        return plan;
      }

      if (attempt < config.handoffMaxAttempts && config.handoffRetryDelayMs > 0) {
        await delay(config.handoffRetryDelayMs);
      }
    }

    const exhausted = new EscalationExhaustedError(plan.id, plan.attempts.length);
    plan.fallbackResources = await this.fallbackResources(request);
    plan.status = "FAILED";
    plan.resolvedAt = this.now().toISOString();
    logger.warn(`${exhausted.message} (session ${plan.sessionId})`);
    await record("escalation.failed", {
      planId: plan.id,
      kind: exhausted.kind,
      attempts: plan.attempts.length,
      fallbackResourceIds: plan.fallbackResources.map((r) => r.id),
    });
    return plan;
  }

  private async issueDirective(request: EscalationRequest, record: EscalationEventSink): Promise<EmergencyDirective> {
    const { config } = this.options;
    let emergencyNumber = config.fallbackEmergencyNumber;
    try {
      const bundle = await withTimeout(
        this.options.directory.lookup(request.locale, "crisis"),
        config.directoryTimeoutMs,
        "resource directory",
      );
      emergencyNumber = bundle.emergencyNumber;
    } catch (err) {
      await record(err instanceof CollaboratorTimeoutError ? "collaborator.timeout" : "collaborator.failed", {
        collaborator: "resource directory",
        error: describeError(err),
        fallback: "configured emergency number",
      });
    }
    return {
      emergencyNumber,
      message: emergencyMessage(emergencyNumber),
      issuedAt: this.now().toISOString(),
    };
  }

  private async attemptHandoff(plan: EscalationPlan, request: EscalationRequest, attempt: number): Promise<HandoffAttempt> {
    const startedAt = this.now().toISOString();
    try {
      const status = await withTimeout(
        this.options.transfer.initiate({
          sessionId: plan.sessionId,
          planId: plan.id,
          severity: plan.severity,
          priority: plan.priority,
          contextSummary: request.contextSummary,
          attempt,
        }),
        this.options.config.handoffTimeoutMs,
        "warm transfer",
      );
      return {
        attempt,
        startedAt,
        finishedAt: this.now().toISOString(),
        outcome: status.status,
        transferId: status.transferId,
        detail: status.detail,
      };
    } catch (err) {
      return {
        attempt,
        startedAt,
        finishedAt: this.now().toISOString(),
        outcome: err instanceof CollaboratorTimeoutError ? "timeout" : "error",
        transferId: null,
        detail: describeError(err),
      };
    }
  }

  private async fallbackResources(request: EscalationRequest): Promise<SupportResource[]> {
    try {
      const bundle = await withTimeout(
        this.options.directory.lookup(request.locale, request.resourceCategory),
        this.options.config.directoryTimeoutMs,
        "resource directory",
      );
      return bundle.resources;
    } catch (err) {
      this.options.logger.warn(`Fallback resource lookup failed for plan on session ${request.sessionId}: ${describeError(err)}`);
      return [];
    }
  }
}
