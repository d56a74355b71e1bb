// Support Session Orchestrator - Observability Pump
// Fire-and-forget copy of every ledger event to an external sink. Publishing
// only enqueues; delivery happens on a later tick so a slow or failing sink
// never holds a session lock. Overflow drops the oldest record and reports the
// loss as an `observability.dropped` meta record.

import type { LedgerEvent } from "./types.js";
import { BoundedQueue } from "./bounded-queue.js";
import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface DroppedMetaRecord {
  type: "meta";
  kind: "observability.dropped";
  /** Records lost since the previous meta record. */
  dropped: number;
  totalDropped: number;
  timestamp: string;
}

export type ObservabilityRecord = { type: "event"; event: LedgerEvent } | DroppedMetaRecord;

export interface ObservabilitySink {
  deliver(record: ObservabilityRecord): void | Promise<void>;
}

export interface ObservabilityStats {
  queued: number;
  delivered: number;
  dropped: number;
  failed: number;
}

export class ObservabilityPump {
  private readonly queue: BoundedQueue<LedgerEvent>;
  private draining: Promise<void> | null = null;
  private droppedSinceReport = 0;
  private delivered = 0;
  private failed = 0;

  constructor(
    private readonly sink: ObservabilitySink,
    capacity: number,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.queue = new BoundedQueue<LedgerEvent>(capacity);
  }

  /** Never blocks and never throws. */
  publish(event: LedgerEvent): void {
    const evicted = this.queue.enqueue(event);
    if (evicted) {
      this.droppedSinceReport++;
      this.logger.warn(
        `Queue full, dropped ${evicted.kind} #${evicted.sequence} for session ${evicted.sessionId}`,
      );
    }
    this.schedule();
  }

  /** Resolves once everything queued so far has been handed to the sink. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  get stats(): ObservabilityStats {
    return {
      queued: this.queue.size,
      delivered: this.delivered,
      dropped: this.queue.droppedCount,
      failed: this.failed,
    };
  }

  private schedule(): void {
    if (this.draining) return;
    this.draining = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.drain())
      .catch((err: unknown) => {
        this.logger.error(`Drain loop failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.draining = null;
        if (this.queue.size > 0 || this.droppedSinceReport > 0) this.schedule();
      });
  }

  private async drain(): Promise<void> {
    for (;;) {
      if (this.droppedSinceReport > 0) {
        const dropped = this.droppedSinceReport;
        this.droppedSinceReport = 0;
        await this.deliver({
          type: "meta",
          kind: "observability.dropped",
          dropped,
          totalDropped: this.queue.droppedCount,
          timestamp: this.now().toISOString(),
        });
      }
      const event = this.queue.dequeue();
      if (!event) return;
      await this.deliver({ type: "event", event });
    }
  }

  private async deliver(record: ObservabilityRecord): Promise<void> {
    try {
      await this.sink.deliver(record);
      this.delivered++;
    } catch (err) {
      this.failed++;
      this.logger.warn(`Sink rejected ${record.type === "event" ? record.event.kind : record.kind}: ${describeError(err)}`);
    }
  }
}

/** Sink that writes one log line per record. Carries kinds and ids only. */
export function createLoggingSink(logger: Logger): ObservabilitySink {
  return {
    deliver(record: ObservabilityRecord): void {
      if (record.type === "meta") {
        logger.warn(`${record.kind}: ${record.dropped} record(s) lost (total ${record.totalDropped})`);
        return;
      }
      const { event } = record;
      logger.info(`${event.sessionId} #${event.sequence} ${event.kind}`);
    },
  };
}
