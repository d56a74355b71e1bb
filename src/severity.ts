// Ordering helpers for risk severities. NONE < LOW < MEDIUM < HIGH < CRITICAL.

import { Severity } from "./types.js";

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  [Severity.NONE]: 0,
  [Severity.LOW]: 1,
  [Severity.MEDIUM]: 2,
  [Severity.HIGH]: 3,
  [Severity.CRITICAL]: 4,
};

const BY_RANK: readonly Severity[] = [
  Severity.NONE,
  Severity.LOW,
  Severity.MEDIUM,
  Severity.HIGH,
  Severity.CRITICAL,
];

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function severityAtLeast(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return SEVERITY_RANK[a] >= SEVERITY_RANK[b] ? a : b;
}

/** Raise by `steps` levels, saturating at CRITICAL. */
export function raiseSeverity(severity: Severity, steps = 1): Severity {
  return BY_RANK[Math.min(SEVERITY_RANK[severity] + steps, BY_RANK.length - 1)];
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

/**
 * Parses a severity name case-insensitively.
 * @throws Error for anything that is not one of the five levels.
 */
export function parseSeverity(value: string): Severity {
  const upper = value.trim().toUpperCase();
  if (!isSeverity(upper)) {
    throw new Error(`Invalid severity "${value}". Expected one of: ${BY_RANK.join(", ")}`);
  }
  return upper;
}
