// Support Session Orchestrator - Ledger Store
// Durable home of the redacted event stream and of one record per session.
// Only redacted data ever reaches a store.
//
// File layout:
//   {baseDir}/{sessionId}/
//     events.jsonl   one LedgerEvent per line, in sequence order
//     session.json   latest SessionRecord

import { appendFile, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type {
  CloseReason,
  EscalationStatus,
  EventPayload,
  JsonValue,
  LedgerEvent,
  LedgerEventKind,
  RiskVerdict,
  Session,
  SessionPhase,
} from "./types.js";

export interface SessionRecord {
  id: string;
  phase: SessionPhase;
  consentGiven: boolean;
  consentRevoked: boolean;
  createdAt: string;
  lastActivityAt: string;
  messageCount: number;
  riskHistory: RiskVerdict[];
  locale: string;
  escalationStatus: EscalationStatus | null;
  closeReason: CloseReason | null;
  closedAt: string | null;
}

export interface LedgerStore {
  appendEvent(event: LedgerEvent): Promise<void>;
  /** Events with sequence >= fromSequence, in order. */
  readEvents(sessionId: string, fromSequence?: number): Promise<LedgerEvent[]>;
  saveSessionRecord(record: SessionRecord): Promise<void>;
  deleteSessionRecord(sessionId: string): Promise<void>;
}

export function toSessionRecord(session: Session): SessionRecord {
  return {
    id: session.id,
    phase: session.phase,
    consentGiven: session.consentGiven,
    consentRevoked: session.consentRevoked,
    createdAt: session.createdAt.toISOString(),
    lastActivityAt: session.lastActivityAt.toISOString(),
    messageCount: session.messageCount,
    riskHistory: session.riskHistory.map((v) => ({ ...v, signals: [...v.signals] })),
    locale: session.locale,
    escalationStatus: session.escalation?.status ?? null,
    closeReason: session.closeReason,
    closedAt: session.closedAt?.toISOString() ?? null,
  };
}

// ─── In-memory ──────────────────────────────────────────────────────────────────

export class InMemoryLedgerStore implements LedgerStore {
  private events: Map<string, LedgerEvent[]> = new Map();
  private records: Map<string, SessionRecord> = new Map();

  async appendEvent(event: LedgerEvent): Promise<void> {
    const stream = this.events.get(event.sessionId) ?? [];
    stream.push(event);
    this.events.set(event.sessionId, stream);
  }

  async readEvents(sessionId: string, fromSequence = 1): Promise<LedgerEvent[]> {
    return (this.events.get(sessionId) ?? []).filter((e) => e.sequence >= fromSequence);
  }

  async saveSessionRecord(record: SessionRecord): Promise<void> {
    this.records.set(record.id, record);
  }

  async deleteSessionRecord(sessionId: string): Promise<void> {
    this.records.delete(sessionId);
  }

  getSessionRecord(sessionId: string): SessionRecord | undefined {
    return this.records.get(sessionId);
  }
}

// ─── File-backed ────────────────────────────────────────────────────────────────

const SAFE_SEGMENT = /^[A-Za-z0-9_-]{1,128}$/;

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function isEventPayload(value: unknown): value is EventPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value) && isJsonValue(value);
}

const EVENT_KINDS: ReadonlySet<string> = new Set<LedgerEventKind>([
  "session.created",
  "session.closed",
  "turn.received",
  "reply.sent",
  "redaction.failed",
  "risk.assessed",
  "risk.degraded",
  "phase.transitioned",
  "guard.rejected",
  "consent.granted",
  "consent.revoked",
  "triage.completed",
  "resources.delivered",
  "collaborator.timeout",
  "collaborator.failed",
  "escalation.planned",
  "escalation.directive_issued",
  "escalation.handoff_attempted",
  "escalation.completed",
  "escalation.failed",
  "escalation.unresolved",
]);

function isEventKind(value: unknown): value is LedgerEventKind {
  return typeof value === "string" && EVENT_KINDS.has(value);
}

/**
 * Parses one stored line.
 * @throws Error when the line is not a well-formed LedgerEvent.
 */
export function parseLedgerEvent(line: string): LedgerEvent {
  const raw: unknown = JSON.parse(line);
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error("Ledger line is not an object");
  }
  const record: Record<string, unknown> = { ...raw };
  const { sessionId, sequence, kind, timestamp, payload } = record;
  if (
    typeof sessionId !== "string" ||
    typeof sequence !== "number" ||
    !Number.isInteger(sequence) ||
    typeof timestamp !== "string" ||
    !isEventKind(kind) ||
    !isEventPayload(payload)
  ) {
    throw new Error("Ledger line is not a well-formed event");
  }
  return { sessionId, sequence, kind, timestamp, payload };
}

export class FileLedgerStore implements LedgerStore {
  constructor(private readonly baseDir: string = "ledger") {}

  async appendEvent(event: LedgerEvent): Promise<void> {
    const dir = await this.sessionDir(event.sessionId, true);
    await appendFile(join(dir, "events.jsonl"), `${JSON.stringify(event)}\n`, "utf-8");
  }

  async readEvents(sessionId: string, fromSequence = 1): Promise<LedgerEvent[]> {
    const dir = await this.sessionDir(sessionId, false);
    let content: string;
    try {
      content = await readFile(join(dir, "events.jsonl"), "utf-8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    return content
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map(parseLedgerEvent)
      .filter((e) => e.sequence >= fromSequence);
  }

  async saveSessionRecord(record: SessionRecord): Promise<void> {
    const dir = await this.sessionDir(record.id, true);
    await writeFile(join(dir, "session.json"), JSON.stringify(record, null, 2), "utf-8");
  }

  async deleteSessionRecord(sessionId: string): Promise<void> {
    const dir = await this.sessionDir(sessionId, false);
    await rm(join(dir, "session.json"), { force: true });
  }

  private async sessionDir(sessionId: string, create: boolean): Promise<string> {
    if (!SAFE_SEGMENT.test(sessionId)) {
      throw new Error(`Session id is not a safe path segment: ${sessionId}`);
    }
    const dir = join(this.baseDir, sessionId);
    if (create) await mkdir(dir, { recursive: true });
    return dir;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
