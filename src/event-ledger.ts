// Support Session Orchestrator - Event Ledger
// Append-only, per-session, strictly ordered log. Sequence numbers are gapless
// and start at 1. Every payload passes through the redaction gate before the
// event is stored, fanned out to live subscribers and copied to observability.

import type { EventPayload, LedgerEvent, LedgerEventKind } from "./types.js";
import type { LedgerStore } from "./ledger-store.js";
import type { RedactionGate } from "./redaction-gate.js";
import type { ObservabilityPump } from "./observability.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

export type LedgerListener = (event: LedgerEvent) => void;

export interface EventLedgerOptions {
  store: LedgerStore;
  gate: RedactionGate;
  pump?: ObservabilityPump | null;
  logger: Logger;
  now?: () => Date;
}

interface SessionStream {
  nextSequence: number;
  events: LedgerEvent[];
  listeners: Set<LedgerListener>;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export class EventLedger {
  private readonly streams: Map<string, SessionStream> = new Map();
  private readonly now: () => Date;

  constructor(private readonly options: EventLedgerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Appends one event. The sequence number is reserved before the store write
   * and released again if the write fails, so a failed append leaves no gap.
   * Callers serialize appends per session (the session lock).
   */
  async append(sessionId: string, kind: LedgerEventKind, payload: EventPayload = {}): Promise<LedgerEvent> {
    const stream = this.stream(sessionId);
    const sequence = stream.nextSequence++;
    const redacted = this.options.gate.redactPayload(payload).payload;
    const event: LedgerEvent = deepFreeze({
      sessionId,
      sequence,
      kind,
      timestamp: this.now().toISOString(),
      payload: redacted,
    });

    try {
      await this.options.store.appendEvent(event);
    } catch (err) {
      if (stream.nextSequence === sequence + 1) stream.nextSequence = sequence;
      this.options.logger.error(`Append of ${kind} #${sequence} for session ${sessionId} failed: ${describeError(err)}`);
      throw err;
    }

    stream.events.push(event);
    for (const listener of stream.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.options.logger.warn(`Subscriber for session ${sessionId} threw: ${describeError(err)}`);
      }
    }
    this.options.pump?.publish(event);
    return event;
  }

  /**
   * Live feed of new events for one session. Returns the unsubscribe function.
   */
  subscribe(sessionId: string, listener: LedgerListener): () => void {
    const stream = this.stream(sessionId);
    stream.listeners.add(listener);
    return () => {
      stream.listeners.delete(listener);
    };
  }

  /**
   * Events with sequence >= fromSequence, in order. Falls back to the store
   * for sessions whose in-memory stream was released.
   */
  async replay(sessionId: string, fromSequence = 1): Promise<LedgerEvent[]> {
    const stream = this.streams.get(sessionId);
    if (stream && stream.events.length > 0) {
      return stream.events.filter((e) => e.sequence >= fromSequence);
    }
    return this.options.store.readEvents(sessionId, fromSequence);
  }

  /** In-memory events for a session, in order. */
  events(sessionId: string): readonly LedgerEvent[] {
    return this.streams.get(sessionId)?.events ?? [];
  }

  lastSequence(sessionId: string): number {
    return (this.streams.get(sessionId)?.nextSequence ?? 1) - 1;
  }

  /** Drops the in-memory copy and listeners. Stored events are kept. */
  release(sessionId: string): void {
    this.streams.delete(sessionId);
  }

  private stream(sessionId: string): SessionStream {
    let stream = this.streams.get(sessionId);
    if (!stream) {
      stream = { nextSequence: 1, events: [], listeners: new Set() };
      this.streams.set(sessionId, stream);
    }
    return stream;
  }
}
