// Support Session Orchestrator - Keyword Risk Matcher
// Deterministic, always-available risk path. No model calls: lexicon phrases,
// severity modifiers and compound patterns from data/risk-lexicon.json.

import { readFileSync } from "node:fs";
import { Severity } from "./types.js";
import type { ResourceCategory } from "./types.js";
import { compareSeverity, isSeverity, raiseSeverity } from "./severity.js";
import { phrasePattern } from "./utils.js";

// ─── Lexicon ────────────────────────────────────────────────────────────────────

export interface LexiconCategory {
  id: string;
  baseSeverity: Severity;
  resourceCategory: ResourceCategory;
  phrases: string[];
}

export interface LexiconPattern {
  id: string;
  category: string;
  severity: Severity;
  regex: string;
}

export interface RiskLexicon {
  categories: LexiconCategory[];
  modifiers: { immediacy: string[]; plan: string[]; means: string[] };
  specificPhrases: string[];
  ambiguityCues: string[];
  patterns: LexiconPattern[];
  patternConfidence: number;
}

const RESOURCE_CATEGORIES: readonly ResourceCategory[] = [
  "crisis",
  "suicide_prevention",
  "domestic_violence",
  "mental_health",
  "general",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new Error(`Risk lexicon: "${field}" must be an array of strings`);
  }
  return value;
}

function stringField(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`Risk lexicon: "${field}" must be a non-empty string`);
  }
  return value;
}

function severityField(record: Record<string, unknown>, field: string): Severity {
  const value = record[field];
  if (!isSeverity(value)) {
    throw new Error(`Risk lexicon: "${field}" must be a severity, got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Validates a parsed lexicon document.
 * @throws Error naming the first malformed field.
 */
export function parseRiskLexicon(raw: unknown): RiskLexicon {
  if (!isRecord(raw)) throw new Error("Risk lexicon: document must be an object");
  const { categories, modifiers, patterns } = raw;
  if (!Array.isArray(categories)) throw new Error('Risk lexicon: "categories" must be an array');
  if (!isRecord(modifiers)) throw new Error('Risk lexicon: "modifiers" must be an object');
  if (!Array.isArray(patterns)) throw new Error('Risk lexicon: "patterns" must be an array');

  const parsedCategories = categories.map((entry): LexiconCategory => {
    if (!isRecord(entry)) throw new Error("Risk lexicon: category entries must be objects");
    const resourceCategory = RESOURCE_CATEGORIES.find((c) => c === entry.resourceCategory);
    if (!resourceCategory) {
      throw new Error(`Risk lexicon: unknown resourceCategory ${JSON.stringify(entry.resourceCategory)}`);
    }
    return {
      id: stringField(entry, "id"),
      baseSeverity: severityField(entry, "baseSeverity"),
      resourceCategory,
      phrases: stringArray(entry.phrases, "phrases"),
    };
  });

  const parsedPatterns = patterns.map((entry): LexiconPattern => {
    if (!isRecord(entry)) throw new Error("Risk lexicon: pattern entries must be objects");
    return {
      id: stringField(entry, "id"),
      category: stringField(entry, "category"),
      severity: severityField(entry, "severity"),
      regex: stringField(entry, "regex"),
    };
  });

  const patternConfidence = raw.patternConfidence;
  if (typeof patternConfidence !== "number" || patternConfidence < 0 || patternConfidence > 1) {
    throw new Error('Risk lexicon: "patternConfidence" must be a number in [0, 1]');
  }

  return {
    categories: parsedCategories,
    modifiers: {
      immediacy: stringArray(modifiers.immediacy, "modifiers.immediacy"),
      plan: stringArray(modifiers.plan, "modifiers.plan"),
      means: stringArray(modifiers.means, "modifiers.means"),
    },
    specificPhrases: stringArray(raw.specificPhrases, "specificPhrases"),
    ambiguityCues: stringArray(raw.ambiguityCues, "ambiguityCues"),
    patterns: parsedPatterns,
    patternConfidence,
  };
}

let defaultLexicon: RiskLexicon | null = null;

/** Loads and caches the bundled lexicon. */
export function loadDefaultRiskLexicon(): RiskLexicon {
  if (!defaultLexicon) {
    const file = new URL("../data/risk-lexicon.json", import.meta.url);
    defaultLexicon = parseRiskLexicon(JSON.parse(readFileSync(file, "utf-8")));
  }
  return defaultLexicon;
}

// ─── Matcher ────────────────────────────────────────────────────────────────────

export interface RiskFactor {
  category: string;
  severity: Severity;
  confidence: number;
  /** Phrases or the pattern id that produced this factor. */
  matches: string[];
}

export interface KeywordAssessment {
  severity: Severity;
  confidence: number;
  signals: string[];
  factors: RiskFactor[];
}

interface CompiledPhrase {
  phrase: string;
  pattern: RegExp;
}

function compile(phrases: readonly string[]): CompiledPhrase[] {
  return phrases.map((phrase) => ({ phrase, pattern: phrasePattern(phrase) }));
}

function matching(text: string, compiled: readonly CompiledPhrase[]): string[] {
  return compiled.filter((c) => c.pattern.test(text)).map((c) => c.phrase);
}

function clamp01(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;
}

/**
 * Scores sanitized text against the risk lexicon.
 *
 * Per category: base severity, raised one level by an immediacy cue, MEDIUM or
 * below raised one level by a plan cue, raised one level by a means cue.
 * Confidence is 0.6 plus 0.1 per matched phrase (capped at +0.3), +0.2 when a
 * specific phrase matched, -0.2 when an ambiguity cue is present. Ambiguity
 * never lowers severity.
 */
export class KeywordRiskMatcher {
  private readonly categories: { category: LexiconCategory; phrases: CompiledPhrase[] }[];
  private readonly immediacy: CompiledPhrase[];
  private readonly plan: CompiledPhrase[];
  private readonly means: CompiledPhrase[];
  private readonly ambiguity: CompiledPhrase[];
  private readonly specific: Set<string>;
  private readonly patterns: { pattern: LexiconPattern; regex: RegExp }[];

  constructor(private readonly lexicon: RiskLexicon = loadDefaultRiskLexicon()) {
    this.categories = lexicon.categories.map((category) => ({
      category,
      phrases: compile(category.phrases),
    }));
    this.immediacy = compile(lexicon.modifiers.immediacy);
    this.plan = compile(lexicon.modifiers.plan);
    this.means = compile(lexicon.modifiers.means);
    this.ambiguity = compile(lexicon.ambiguityCues);
    this.specific = new Set(lexicon.specificPhrases.map((p) => p.toLowerCase()));
    this.patterns = lexicon.patterns.map((pattern) => ({
      pattern,
      regex: new RegExp(pattern.regex, "i"),
    }));
  }

  assess(sanitizedText: string): KeywordAssessment {
    const text = sanitizedText.replace(/[‘’]/g, "'");
    const factors: RiskFactor[] = [];

    const immediate = matching(text, this.immediacy).length > 0;
    const planned = matching(text, this.plan).length > 0;
    const meansPresent = matching(text, this.means).length > 0;
    const ambiguous = matching(text, this.ambiguity).length > 0;

    for (const { category, phrases } of this.categories) {
      const found = matching(text, phrases);
      if (found.length === 0) continue;

      let severity = category.baseSeverity;
      if (immediate) severity = raiseSeverity(severity);
      if (planned && compareSeverity(severity, Severity.MEDIUM) <= 0) severity = raiseSeverity(severity);
      if (meansPresent) severity = raiseSeverity(severity);

      let bonus = Math.min(found.length * 0.1, 0.3);
      if (found.some((p) => this.specific.has(p.toLowerCase()))) bonus += 0.2;
      if (ambiguous) bonus -= 0.2;

      factors.push({ category: category.id, severity, confidence: clamp01(0.6 + bonus), matches: found });
    }

    for (const { pattern, regex } of this.patterns) {
      if (!regex.test(text)) continue;
      const confidence = clamp01(this.lexicon.patternConfidence - (ambiguous ? 0.2 : 0));
      factors.push({ category: pattern.category, severity: pattern.severity, confidence, matches: [pattern.id] });
    }

    if (factors.length === 0) {
      return { severity: Severity.NONE, confidence: 0, signals: [], factors };
    }

    let top = factors[0];
    for (const factor of factors.slice(1)) {
      const order = compareSeverity(factor.severity, top.severity);
      if (order > 0 || (order === 0 && factor.confidence > top.confidence)) top = factor;
    }

    const signals: string[] = [];
    for (const factor of factors) {
      for (const match of factor.matches) signals.push(`${factor.category}:${match}`);
    }
    if (immediate) signals.push("modifier:immediacy");
    if (planned) signals.push("modifier:plan");
    if (meansPresent) signals.push("modifier:means");
    if (ambiguous) signals.push("modifier:ambiguity");

    return { severity: top.severity, confidence: top.confidence, signals, factors };
  }

  /**
   * Resource category of the first lexicon category (in lexicon order) named
   * by the given signals, or null when none is.
   */
  resourceCategoryFor(signals: readonly string[]): ResourceCategory | null {
    for (const { category } of this.categories) {
      if (signals.some((s) => s.startsWith(`${category.id}:`))) return category.resourceCategory;
    }
    return null;
  }
}
