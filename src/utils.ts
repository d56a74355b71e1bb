// Shared utilities for the Support Session Orchestrator.
//
// Deterministic helpers used across the risk matcher, the state machine and
// the escalation coordinator: bounded collaborator calls, phrase matching and
// locale normalization.

import { CollaboratorTimeoutError } from "./errors.js";

// ─── withTimeout ────────────────────────────────────────────────────────────────

/**
 * Race a collaborator call against a timer.
 *
 * The timer is always cleared, so a call that settles in time leaves nothing
 * scheduled behind it. A late settlement of the underlying promise is ignored.
 *
 * @throws CollaboratorTimeoutError when `timeoutMs` elapses first.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, collaborator: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new CollaboratorTimeoutError(collaborator, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer !== undefined) clearTimeout(timer);
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─── Phrase matching ────────────────────────────────────────────────────────────

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Builds a case-insensitive matcher for a phrase bounded by non-word
 * characters, so "now" does not fire inside "know".
 */
export function phrasePattern(phrase: string): RegExp {
  const body = escapeRegExp(phrase.trim().toLowerCase()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?:^|[^\\p{L}\\p{N}_])${body}(?=$|[^\\p{L}\\p{N}_])`, "iu");
}

/** Returns the phrases (in input order) that occur in `text`. */
export function findPhrases(text: string, phrases: readonly string[]): string[] {
  return phrases.filter((phrase) => phrasePattern(phrase).test(text));
}

// ─── Locale ─────────────────────────────────────────────────────────────────────

/**
 * Reduces a locale tag to an upper-case region code.
 *  "en-US" → "US", "fr_CA" → "CA", "gb" → "GB", "" → fallback
 */
export function normalizeLocale(locale: string | undefined, fallback: string): string {
  if (!locale || locale.trim().length === 0) return fallback;
  const parts = locale.trim().split(/[-_]/);
  const region = parts.length > 1 ? parts[parts.length - 1] : parts[0];
  return region.toUpperCase();
}
