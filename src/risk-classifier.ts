// Support Session Orchestrator - OpenAI Risk Classifier
// External classifier path of the risk monitor. Sees sanitized text only.

import type { RiskClassification, RiskClassifier } from "./risk-monitor.js";
import type { OpenAIClient } from "./openai-client.js";
import { completeJson } from "./openai-client.js";
import { parseSeverity } from "./severity.js";

const SYSTEM_PROMPT = `You assess messages sent to a mental-health support service for safety risk.
Rate the risk of harm to self or others expressed in the LATEST message, using earlier messages only as context.
Severity levels: NONE, LOW, MEDIUM, HIGH, CRITICAL.
CRITICAL means imminent danger (intent with plan, means or timeframe). HIGH means explicit suicidal or violent ideation.
Bracketed tokens such as [PHONE:1a2b3c4d] are redacted personal details.
Respond with ONLY a JSON object: {"severity": "<level>", "confidence": <number between 0 and 1>}`;

export class OpenAIRiskClassifier implements RiskClassifier {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = "gpt-4o-mini",
  ) {}

  async classify(sanitizedText: string, recentContext: readonly string[]): Promise<RiskClassification> {
    const context = recentContext.length > 0 ? recentContext.map((t) => `- ${t}`).join("\n") : "(none)";
    const user = `Earlier messages:\n${context}\n\nLatest message:\n${sanitizedText}`;
    const raw = await completeJson(this.client, this.model, { system: SYSTEM_PROMPT, user }, 0);
    return parseClassification(raw);
  }
}

/**
 * @throws Error when the severity is unknown or the confidence is outside [0, 1].
 */
export function parseClassification(raw: Record<string, unknown>): RiskClassification {
  if (typeof raw.severity !== "string") {
    throw new Error("Classifier response missing 'severity'");
  }
  const severity = parseSeverity(raw.severity);
  const confidence = raw.confidence;
  if (typeof confidence !== "number" || !(confidence >= 0 && confidence <= 1)) {
    throw new Error("Classifier response has invalid 'confidence'");
  }
  return { severity, confidence };
}
