// Support Session Orchestrator - Responder
// Language-generation collaborator for TRIAGE and SUPPORT_LOOP turns. The core
// treats it as a black box; any failure degrades to SAFE_FALLBACK_REPLY.

import { readFileSync } from "node:fs";
import { SessionPhase } from "./types.js";
import type { OpenAIClient } from "./openai-client.js";
import { completeJson } from "./openai-client.js";
import { findPhrases } from "./utils.js";

export interface GenerationContext {
  phase: SessionPhase;
  /** Sanitized text of the most recent turns, oldest first; the last is the current turn. */
  recentTurns: readonly string[];
  triageSummary: string | null;
  locale: string;
}

export interface GeneratedReply {
  text: string;
  /** Set when the reply judges that the user would benefit from resources. */
  resourceNeed: boolean;
  /** TRIAGE only: short summary of the user's concern. */
  summary: string | null;
}

export interface Responder {
  generate(context: GenerationContext): Promise<GeneratedReply>;
}

export const SAFE_FALLBACK_REPLY =
  "Thank you for telling me. I'm here with you. Could you say a little more about what is going on for you right now?";

const TRIAGE_SUMMARY_LIMIT = 280;

/** Degraded triage summary built from the sanitized turn itself. */
export function partialSummary(sanitizedText: string): string {
  const trimmed = sanitizedText.trim().replace(/\s+/g, " ");
  return trimmed.length > TRIAGE_SUMMARY_LIMIT ? `${trimmed.slice(0, TRIAGE_SUMMARY_LIMIT - 1)}…` : trimmed;
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

const SUPPORT_PROMPT = `You are a warm, non-judgmental peer-support companion in a text chat.
You never diagnose, prescribe or claim to be a therapist. Use reflective listening and keep replies under 120 words.
Bracketed tokens such as [NAME:1a2b3c4d] are redacted personal details; never ask the user to repeat them.
Respond with ONLY a JSON object: {"reply": "<message>", "resourceNeed": <true if the user would benefit from hotline or professional resources>}`;

const TRIAGE_PROMPT = `You are a warm peer-support companion opening a conversation in a text chat.
Acknowledge what the user shared and ask one gentle follow-up question. Never diagnose.
Bracketed tokens such as [NAME:1a2b3c4d] are redacted personal details.
Respond with ONLY a JSON object: {"reply": "<message>", "summary": "<one-sentence neutral summary of the user's concern>", "resourceNeed": <boolean>}`;

export class OpenAIResponder implements Responder {
  constructor(
    private readonly client: OpenAIClient,
    private readonly model: string = "gpt-4o-mini",
  ) {}

  async generate(context: GenerationContext): Promise<GeneratedReply> {
    const triage = context.phase === SessionPhase.TRIAGE;
    const history = context.recentTurns.map((t, i) => `${i + 1}. ${t}`).join("\n");
    const user = [
      context.triageSummary ? `Concern summary: ${context.triageSummary}` : null,
      `User region: ${context.locale}`,
      `Recent user messages (latest last):\n${history}`,
    ]
      .filter((line): line is string => line !== null)
      .join("\n\n");

    const raw = await completeJson(
      this.client,
      this.model,
      { system: triage ? TRIAGE_PROMPT : SUPPORT_PROMPT, user },
      0.7,
    );
    return parseGeneratedReply(raw, triage);
  }
}

/**
 * @throws Error when the reply text is missing, or the summary is missing on a triage turn.
 */
export function parseGeneratedReply(raw: Record<string, unknown>, triage: boolean): GeneratedReply {
  if (typeof raw.reply !== "string" || raw.reply.trim().length === 0) {
    throw new Error("LLM response missing or invalid 'reply' field");
  }
  let summary: string | null = null;
  if (triage) {
    if (typeof raw.summary !== "string" || raw.summary.trim().length === 0) {
      throw new Error("LLM response missing or invalid 'summary' field");
    }
    summary = partialSummary(raw.summary);
  }
  return { text: raw.reply.trim(), resourceNeed: raw.resourceNeed === true, summary };
}

// ─── Template ───────────────────────────────────────────────────────────────────

export interface CopingTechnique {
  id: string;
  name: string;
  /** Phrases in the user's turn that select this technique. */
  cues: string[];
  reply: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function techniqueString(entry: Record<string, unknown>, field: string, index: number): string {
  const value = entry[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new Error(`Coping techniques: techniques[${index}].${field} must be a non-empty string`);
  }
  return value;
}

/** @throws Error naming the first malformed entry. */
export function parseCopingTechniques(raw: unknown): CopingTechnique[] {
  if (!isRecord(raw) || !Array.isArray(raw.techniques)) {
    throw new Error('Coping techniques: document must have a "techniques" array');
  }
  return raw.techniques.map((entry: unknown, index) => {
    if (!isRecord(entry)) throw new Error(`Coping techniques: techniques[${index}] must be an object`);
    const cues = entry.cues;
    if (!Array.isArray(cues) || cues.length === 0 || !cues.every((c): c is string => typeof c === "string")) {
      throw new Error(`Coping techniques: techniques[${index}].cues must be a non-empty array of strings`);
    }
    return {
      id: techniqueString(entry, "id", index),
      name: techniqueString(entry, "name", index),
      cues,
      reply: techniqueString(entry, "reply", index),
    };
  });
}

export function loadDefaultCopingTechniques(): CopingTechnique[] {
  const file = new URL("../data/coping-techniques.json", import.meta.url);
  return parseCopingTechniques(JSON.parse(readFileSync(file, "utf-8")));
}

/**
 * Fixed replies, used when no language model is configured. A support-loop
 * turn gets the first coping technique whose cue it mentions, otherwise
 * SAFE_FALLBACK_REPLY.
 */
export class TemplateResponder implements Responder {
  constructor(private readonly techniques: readonly CopingTechnique[] = loadDefaultCopingTechniques()) {}

  async generate(context: GenerationContext): Promise<GeneratedReply> {
    const latest = context.recentTurns[context.recentTurns.length - 1] ?? "";
    if (context.phase === SessionPhase.TRIAGE) {
      return {
        text: "Thank you for sharing that with me. How has this been affecting you day to day?",
        resourceNeed: false,
        summary: partialSummary(latest),
      };
    }
    const technique = this.techniques.find((t) => findPhrases(latest, t.cues).length > 0);
    return { text: technique?.reply ?? SAFE_FALLBACK_REPLY, resourceNeed: false, summary: null };
  }
}
