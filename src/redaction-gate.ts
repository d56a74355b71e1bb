// Support Session Orchestrator - Redaction Gate
// Stateless transform between raw turn text and everything persisted, logged or
// emitted. Detection is regex based and biased toward redacting: overlapping
// and doubtful spans are masked.

import { createHash } from "node:crypto";
import type { EntityType, EventPayload, JsonValue, RedactedEntity } from "./types.js";
import { RedactionFailureError, describeError } from "./errors.js";

// ─── Detectors ──────────────────────────────────────────────────────────────────

export interface EntitySpan {
  start: number;
  end: number;
}

/** A pluggable detector. Detectors run in priority order (earlier wins ties). */
export interface EntityDetector {
  type: EntityType;
  detect(text: string): EntitySpan[];
}

const MEDICATIONS = [
  "Prozac", "Zoloft", "Lexapro", "Celexa", "Paxil", "Wellbutrin", "Effexor",
  "Cymbalta", "Abilify", "Risperdal", "Seroquel", "Zyprexa", "Depakote",
  "Lithium", "Xanax", "Ativan", "Klonopin", "Valium", "Adderall", "Ritalin",
  "Vyvanse", "Sertraline", "Fluoxetine", "Lorazepam",
];

/**
 * Detector over a global regex. When `group` is set only that capture group is
 * masked; the group must end the match.
 */
export function regexDetector(type: EntityType, pattern: RegExp, group?: number): EntityDetector {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  return {
    type,
    detect(text: string): EntitySpan[] {
      const spans: EntitySpan[] = [];
      for (const match of text.matchAll(new RegExp(pattern.source, flags))) {
        const index = match.index ?? 0;
        const end = index + match[0].length;
        const captured = group === undefined ? match[0] : match[group];
        if (captured === undefined || captured.length === 0) continue;
        spans.push({ start: end - captured.length, end });
      }
      return spans;
    },
  };
}

export const DEFAULT_DETECTORS: readonly EntityDetector[] = [
  regexDetector("EMAIL", /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/),
  regexDetector("MEDICAL_RECORD", /\bMRN[:#\s]*\d{6,10}\b/i),
  regexDetector("SSN", /\b\d{3}-\d{2}-\d{4}\b/),
  regexDetector("CREDIT_CARD", /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/),
  regexDetector("PHONE", /(?<![\w+])(?:\+?1[-.\s]?)?(?:\(\d{3}\)\s?|\d{3}[-.\s]?)\d{3}[-.\s]?\d{4}(?!\w)/),
  regexDetector("IP_ADDRESS", /\b\d{1,3}(?:\.\d{1,3}){3}\b/),
  regexDetector("INSURANCE", /\b[A-Z]{2,3}\d{6,10}\b/),
  regexDetector(
    "ADDRESS",
    /\b\d+\s+(?:[A-Za-z]+\s+){1,4}(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Lane|Ln|Drive|Dr|Court|Ct|Way)\b\.?/,
  ),
  regexDetector("DATE", /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/),
  regexDetector("ZIP_CODE", /\b\d{5}(?:-\d{4})?\b/),
  regexDetector("MEDICATION", new RegExp(`\\b(?:${MEDICATIONS.join("|")})\\b`, "i")),
  regexDetector("NAME", /\b(?:[Mm]y name is|[Cc]all me|I'm called)\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/, 1),
  regexDetector("NAME", /\b(?:Mr|Mrs|Ms|Mx|Dr|Prof)\.?\s+[A-Z][a-z]+(?:\s+[A-Z][a-z]+)?/),
];

// ─── Gate ───────────────────────────────────────────────────────────────────────

export interface RedactionResult {
  sanitizedText: string;
  /** Ordered by start offset; spans never overlap. */
  entities: RedactedEntity[];
  /** True when detection failed and the whole text was masked. */
  failed: boolean;
  failureReason: string | null;
}

export interface RedactionGateOptions {
  /** Salt mixed into token hashes. Same salt and value always yield the same token. */
  salt?: string;
  detectors?: readonly EntityDetector[];
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Payload keys that hold identifiers or timestamps and are never scanned. */
const PASSTHROUGH_KEYS = new Set([
  "sessionId",
  "planId",
  "turnId",
  "transferId",
  "timestamp",
  "issuedAt",
  "startedAt",
  "finishedAt",
  "createdAt",
  "resolvedAt",
  "nextRetryAt",
  "token",
]);

export class RedactionGate {
  private readonly salt: string;
  private readonly detectors: readonly EntityDetector[];

  constructor(options: RedactionGateOptions = {}) {
    this.salt = options.salt ?? "support-session";
    this.detectors = options.detectors ?? DEFAULT_DETECTORS;
  }

  /** `[TYPE:xxxxxxxx]`, stable for a given salt and value. */
  tokenFor(type: EntityType, value: string): string {
    const hash = createHash("sha256").update(`${this.salt}:${value}`).digest("hex").slice(0, 8);
    return `[${type}:${hash}]`;
  }

  /**
   * Sanitizes `text`. Never throws: when detection fails the entire text is
   * replaced by one UNCLASSIFIED token.
   */
  redact(text: string): RedactionResult {
    try {
      return this.detect(text);
    } catch (err) {
      const token = this.tokenFor("UNCLASSIFIED", text);
      return {
        sanitizedText: token,
        entities: [{ type: "UNCLASSIFIED", start: 0, end: text.length, token }],
        failed: true,
        failureReason: describeError(err),
      };
    }
  }

  /**
   * Redacts every string inside a payload, leaving identifier and timestamp
   * keys as they are. Returns the redacted copy and the number of entities masked.
   */
  redactPayload(payload: EventPayload): { payload: EventPayload; entityCount: number } {
    let entityCount = 0;

    const walk = (value: JsonValue, key: string | null): JsonValue => {
      if (typeof value === "string") {
        if (key !== null && PASSTHROUGH_KEYS.has(key)) return value;
        const result = this.redact(value);
        entityCount += result.entities.length;
        return result.sanitizedText;
      }
      if (Array.isArray(value)) return value.map((item) => walk(item, key));
      if (value !== null && typeof value === "object") {
        const out: { [k: string]: JsonValue } = {};
        for (const [k, v] of Object.entries(value)) out[k] = walk(v, k);
        return out;
      }
      return value;
    };

    const out: EventPayload = {};
    for (const [k, v] of Object.entries(payload)) out[k] = walk(v, k);
    return { payload: out, entityCount };
  }

  private detect(text: string): RedactionResult {
    if (LONE_SURROGATE.test(text)) {
      throw new RedactionFailureError("Input contains malformed UTF-16 and cannot be classified");
    }

    const candidates: { type: EntityType; span: EntitySpan; priority: number }[] = [];
    this.detectors.forEach((detector, priority) => {
      for (const span of detector.detect(text)) {
        if (span.start < 0 || span.end > text.length || span.end <= span.start) {
          throw new RedactionFailureError(`Detector ${detector.type} returned an invalid span`);
        }
        candidates.push({ type: detector.type, span, priority });
      }
    });

    // Earliest start first, then longest, then detector priority
    candidates.sort(
      (a, b) =>
        a.span.start - b.span.start ||
        b.span.end - b.span.start - (a.span.end - a.span.start) ||
        a.priority - b.priority,
    );

    const entities: RedactedEntity[] = [];
    let sanitized = "";
    let cursor = 0;
    for (const { type, span } of candidates) {
      if (span.start < cursor) continue;
      const token = this.tokenFor(type, text.slice(span.start, span.end));
      entities.push({ type, start: span.start, end: span.end, token });
      sanitized += text.slice(cursor, span.start) + token;
      cursor = span.end;
    }
    sanitized += text.slice(cursor);

    return { sanitizedText: sanitized, entities, failed: false, failureReason: null };
  }
}

// ─── Token Vault ────────────────────────────────────────────────────────────────

/**
 * Optional reversible lookup for redaction tokens, scoped per session.
 * Values are only captured and revealed for sessions with consent.
 */
export class TokenVault {
  private readonly sessions: Map<string, Map<string, string>> = new Map();

  /** Stores token → original value pairs. Returns the number captured. */
  capture(sessionId: string, originalText: string, result: RedactionResult, consentGiven: boolean): number {
    if (!consentGiven || result.failed) return 0;
    let entries = this.sessions.get(sessionId);
    let captured = 0;
    for (const entity of result.entities) {
      if (!entries) {
        entries = new Map();
        this.sessions.set(sessionId, entries);
      }
      entries.set(entity.token, originalText.slice(entity.start, entity.end));
      captured++;
    }
    return captured;
  }

  reveal(sessionId: string, token: string, consentGiven: boolean): string | null {
    if (!consentGiven) return null;
    return this.sessions.get(sessionId)?.get(token) ?? null;
  }

  forget(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  size(sessionId: string): number {
    return this.sessions.get(sessionId)?.size ?? 0;
  }
}
