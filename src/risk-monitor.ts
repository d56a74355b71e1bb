// Support Session Orchestrator - Risk Monitor
// Combines the deterministic keyword path with an optional external classifier.
// The verdict takes the maximum severity of the two paths; a classifier that
// fails or times out, or a turn whose redaction failed, yields a degraded
// verdict floored at MEDIUM.

import { Severity } from "./types.js";
import type { RiskVerdict } from "./types.js";
import { KeywordRiskMatcher } from "./keyword-risk-matcher.js";
import { compareSeverity, isSeverity, maxSeverity } from "./severity.js";
import { CollaboratorTimeoutError, describeError } from "./errors.js";
import { withTimeout } from "./utils.js";
import type { Logger } from "./logger.js";

// ─── Classifier contract ────────────────────────────────────────────────────────

export interface RiskClassification {
  severity: Severity;
  /** 0.0 – 1.0 */
  confidence: number;
}

export interface RiskClassifier {
  classify(sanitizedText: string, recentContext: readonly string[]): Promise<RiskClassification>;
}

export interface RiskContext {
  /** Sanitized text of the most recent turns, oldest first. */
  recentTexts: readonly string[];
  /** The session's verdict history before this turn. */
  history: readonly RiskVerdict[];
  /**
   * Original turn text, supplied only when redaction failed and the sanitized
   * text is a single UNCLASSIFIED token. Only the keyword path reads it; it is
   * never sent to the classifier.
   */
  unredactedText?: string;
}

export type ClassifierOutcome = "ok" | "absent" | "timeout" | "error";

export interface RiskAssessment {
  verdict: RiskVerdict;
  classifierOutcome: ClassifierOutcome;
  classifierError: string | null;
  /** True when the sustained-MEDIUM rule raised the verdict. */
  sustained: boolean;
}

export interface RiskMonitorOptions {
  matcher?: KeywordRiskMatcher;
  classifier?: RiskClassifier | null;
  classifierTimeoutMs: number;
  /** Consecutive non-degraded MEDIUM verdicts that raise to HIGH. 0 disables. */
  sustainedRiskTurns: number;
  logger?: Logger;
  now?: () => Date;
}

/** Confidence given to a verdict whose severity comes only from the degraded floor. */
export const DEGRADED_FLOOR_CONFIDENCE = 0.5;

// ─── RiskMonitor ────────────────────────────────────────────────────────────────

export class RiskMonitor {
  private readonly matcher: KeywordRiskMatcher;
  private readonly classifier: RiskClassifier | null;
  private readonly now: () => Date;

  constructor(private readonly options: RiskMonitorOptions) {
    this.matcher = options.matcher ?? new KeywordRiskMatcher();
    this.classifier = options.classifier ?? null;
    this.now = options.now ?? (() => new Date());
  }

  get keywordMatcher(): KeywordRiskMatcher {
    return this.matcher;
  }

  get hasClassifier(): boolean {
    return this.classifier !== null;
  }

  async assess(sanitizedText: string, context: RiskContext): Promise<RiskAssessment> {
    const unredacted = context.unredactedText;
    const keyword = this.matcher.assess(unredacted ?? sanitizedText);
    const classified = await this.runClassifier(sanitizedText, context.recentTexts);

    let severity = keyword.severity;
    let confidence = keyword.confidence;
    const signals = [...keyword.signals];
    let degraded = false;

    if (unredacted !== undefined) {
      degraded = true;
      signals.push("redaction:failed");
    }

    if (classified.classification) {
      const { severity: modelSeverity, confidence: modelConfidence } = classified.classification;
      const order = compareSeverity(modelSeverity, severity);
      if (order > 0 || (order === 0 && modelConfidence > confidence)) {
        confidence = modelConfidence;
      }
      severity = maxSeverity(severity, modelSeverity);
      signals.push(`classifier:${modelSeverity}`);
    } else if (classified.outcome === "timeout" || classified.outcome === "error") {
      degraded = true;
      signals.push(`classifier:${classified.outcome}`);
    }

    if (degraded && compareSeverity(severity, Severity.MEDIUM) < 0) {
      severity = Severity.MEDIUM;
      confidence = DEGRADED_FLOOR_CONFIDENCE;
    }

    const sustained = !degraded && this.isSustainedMedium(severity, context.history);
    if (sustained) {
      severity = Severity.HIGH;
      signals.push("sustained:medium");
    }

    return {
      verdict: {
        severity,
        confidence,
        signals,
        degraded,
        timestamp: this.now().toISOString(),
      },
      classifierOutcome: classified.outcome,
      classifierError: classified.error,
      sustained,
    };
  }

  private isSustainedMedium(severity: Severity, history: readonly RiskVerdict[]): boolean {
    const window = this.options.sustainedRiskTurns;
    if (window <= 0 || severity !== Severity.MEDIUM) return false;
    if (window === 1) return true;
    const previous = history.slice(-(window - 1));
    return (
      previous.length === window - 1 &&
      previous.every((v) => v.severity === Severity.MEDIUM && !v.degraded)
    );
  }

  private async runClassifier(
    text: string,
    recentTexts: readonly string[],
  ): Promise<{ outcome: ClassifierOutcome; classification: RiskClassification | null; error: string | null }> {
    if (!this.classifier) return { outcome: "absent", classification: null, error: null };

    try {
      const result = await withTimeout(
        this.classifier.classify(text, recentTexts),
        this.options.classifierTimeoutMs,
        "risk classifier",
      );
      if (!isSeverity(result.severity) || !(result.confidence >= 0 && result.confidence <= 1)) {
        throw new Error("Classifier returned a malformed classification");
      }
      return { outcome: "ok", classification: result, error: null };
    } catch (err) {
      const outcome: ClassifierOutcome = err instanceof CollaboratorTimeoutError ? "timeout" : "error";
      this.options.logger?.warn(`Classifier ${outcome}, using degraded verdict: ${describeError(err)}`);
      return { outcome, classification: null, error: describeError(err) };
    }
  }
}
