// Support Session Orchestrator - Warm Transfer
// Hand-off of an escalated session to a human responder. Only the escalation
// coordinator calls these clients; each call is bounded by the coordinator.

import type { EscalationPriority, Severity } from "./types.js";

export interface HandoffRequest {
  sessionId: string;
  planId: string;
  severity: Severity;
  priority: EscalationPriority;
  /** Redacted summary. Never carries raw turn text. */
  contextSummary: string;
  attempt: number;
}

export type TransferState = "connected" | "initiated" | "rejected";

export interface TransferStatus {
  status: TransferState;
  transferId: string | null;
  detail: string | null;
}

export interface WarmTransferClient {
  initiate(request: HandoffRequest): Promise<TransferStatus>;
}

// ─── HTTP client ────────────────────────────────────────────────────────────────

export interface HttpWarmTransferOptions {
  endpoint: string;
  apiKey?: string;
  fetchImpl?: typeof fetch;
}

/**
 * POSTs the hand-off request as JSON and expects
 * `{ "status": "connected" | "initiated" | "rejected", "transferId"?: string }`.
 */
export class HttpWarmTransferClient implements WarmTransferClient {
  private readonly endpoint: string;
  private readonly apiKey: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpWarmTransferOptions) {
    if (!options.endpoint) {
      throw new Error("HttpWarmTransferClient: endpoint is required");
    }
    this.endpoint = options.endpoint;
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async initiate(request: HandoffRequest): Promise<TransferStatus> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const response = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify(request),
    });

    if (!response.ok) {
      return { status: "rejected", transferId: null, detail: `HTTP ${response.status}` };
    }

    const body: unknown = await response.json();
    return parseTransferStatus(body);
  }
}

/**
 * @throws Error when the body is not a recognizable transfer status.
 */
export function parseTransferStatus(body: unknown): TransferStatus {
  if (typeof body !== "object" || body === null) {
    throw new Error("Warm transfer response is not an object");
  }
  const fields: Record<string, unknown> = { ...body };
  const status = fields.status;
  if (status !== "connected" && status !== "initiated" && status !== "rejected") {
    throw new Error(`Warm transfer response has unknown status ${JSON.stringify(status)}`);
  }
  const transferId = typeof fields.transferId === "string" ? fields.transferId : null;
  const detail = typeof fields.detail === "string" ? fields.detail : null;
  return { status, transferId, detail };
}

// ─── Unconfigured ───────────────────────────────────────────────────────────────

/** Used when no endpoint is configured: every attempt is rejected. */
export class UnconfiguredWarmTransfer implements WarmTransferClient {
  async initiate(): Promise<TransferStatus> {
    return { status: "rejected", transferId: null, detail: "No warm-transfer endpoint configured" };
  }
}
