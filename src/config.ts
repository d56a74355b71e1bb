// Support Session Orchestrator - Configuration
//
// One immutable configuration value, built once from the environment and
// injected into the SessionManager. Nothing reads process.env after startup.

import { Severity } from "./types.js";
import { parseSeverity, severityAtLeast } from "./severity.js";

export type ClosedSessionPolicy = "archive" | "destroy";

export interface OrchestratorConfig {
  /** INIT sessions without consent are closed after this long. */
  consentTimeoutMs: number;
  /** TRIAGE proceeds with a degraded summary after this long. */
  triageTimeoutMs: number;
  /** Inactivity window before forced CLOSE. */
  idleTimeoutMs: number;
  /** Absolute session age ceiling, independent of activity. */
  hardTimeoutMs: number;
  messageCap: number;

  classifierTimeoutMs: number;
  generationTimeoutMs: number;
  directoryTimeoutMs: number;
  handoffTimeoutMs: number;
  handoffMaxAttempts: number;
  handoffRetryDelayMs: number;

  /** Retries for an escalation the coordinator could not act on at all. */
  escalationRetryMax: number;
  escalationRetryIntervalMs: number;

  idleSweepIntervalMs: number;
  hardSweepIntervalMs: number;

  escalationThreshold: Severity;
  emergencyThreshold: Severity;
  /** Consecutive non-degraded MEDIUM verdicts that are raised to HIGH. 0 disables. */
  sustainedRiskTurns: number;
  recentContextTurns: number;

  observabilityQueueSize: number;
  closedSessionPolicy: ClosedSessionPolicy;
  closedSessionRetentionMs: number;

  defaultLocale: string;
  fallbackEmergencyNumber: string;
  redactionTokenSalt: string;

  generationModel: string;
  classifierModel: string;
}

const MINUTE = 60_000;

export const DEFAULT_CONFIG: Readonly<OrchestratorConfig> = Object.freeze({
  consentTimeoutMs: 5 * MINUTE,
  triageTimeoutMs: 10 * MINUTE,
  idleTimeoutMs: 30 * MINUTE,
  hardTimeoutMs: 120 * MINUTE,
  messageCap: 50,

  classifierTimeoutMs: 4_000,
  generationTimeoutMs: 8_000,
  directoryTimeoutMs: 2_000,
  handoffTimeoutMs: 5_000,
  handoffMaxAttempts: 3,
  handoffRetryDelayMs: 500,

  escalationRetryMax: 5,
  escalationRetryIntervalMs: 30_000,

  idleSweepIntervalMs: MINUTE,
  hardSweepIntervalMs: MINUTE,

  escalationThreshold: Severity.HIGH,
  emergencyThreshold: Severity.CRITICAL,
  sustainedRiskTurns: 3,
  recentContextTurns: 5,

  observabilityQueueSize: 1_000,
  closedSessionPolicy: "archive",
  closedSessionRetentionMs: 7 * 24 * 60 * MINUTE,

  defaultLocale: "US",
  fallbackEmergencyNumber: "911",
  redactionTokenSalt: "support-session",

  generationModel: "gpt-4o-mini",
  classifierModel: "gpt-4o-mini",
});

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number, allowZero = false): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || (!allowZero && value === 0)) {
    throw new Error(`Invalid ${name}: "${raw}". Expected a ${allowZero ? "non-negative" : "positive"} integer.`);
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw.trim() === "" ? fallback : raw.trim();
}

/**
 * Checks cross-field constraints and freezes the result.
 *
 * The escalation threshold may be lowered to MEDIUM but never raised above
 * HIGH, and the emergency threshold cannot sit below it.
 *
 * @throws Error describing every violated constraint.
 */
export function validateConfig(config: OrchestratorConfig): Readonly<OrchestratorConfig> {
  const errors: string[] = [];

  if (!severityAtLeast(config.escalationThreshold, Severity.MEDIUM) || severityAtLeast(config.escalationThreshold, Severity.CRITICAL)) {
    errors.push(`escalationThreshold must be MEDIUM or HIGH, got ${config.escalationThreshold}`);
  }
  if (!severityAtLeast(config.emergencyThreshold, config.escalationThreshold)) {
    errors.push(`emergencyThreshold (${config.emergencyThreshold}) must not be below escalationThreshold (${config.escalationThreshold})`);
  }
  if (config.messageCap < 1) {
    errors.push(`messageCap must be at least 1, got ${config.messageCap}`);
  }
  if (config.handoffMaxAttempts < 1) {
    errors.push(`handoffMaxAttempts must be at least 1, got ${config.handoffMaxAttempts}`);
  }
  if (config.observabilityQueueSize < 1) {
    errors.push(`observabilityQueueSize must be at least 1, got ${config.observabilityQueueSize}`);
  }
  if (config.closedSessionPolicy !== "archive" && config.closedSessionPolicy !== "destroy") {
    errors.push(`closedSessionPolicy must be "archive" or "destroy", got "${String(config.closedSessionPolicy)}"`);
  }

  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join("; ")}`);
  }
  return Object.freeze({ ...config });
}

/** Merges overrides over DEFAULT_CONFIG and validates. Used by tests and embedders. */
export function createConfig(overrides: Partial<OrchestratorConfig> = {}): Readonly<OrchestratorConfig> {
  return validateConfig({ ...DEFAULT_CONFIG, ...overrides });
}

/**
 * Builds the configuration from environment variables.
 * Unset or empty variables keep their default.
 */
export function loadConfig(env: Env = process.env): Readonly<OrchestratorConfig> {
  const policy = readString(env, "CLOSED_SESSION_POLICY", DEFAULT_CONFIG.closedSessionPolicy);
  if (policy !== "archive" && policy !== "destroy") {
    throw new Error(`Invalid CLOSED_SESSION_POLICY: "${policy}". Expected "archive" or "destroy".`);
  }

  return validateConfig({
    consentTimeoutMs: readPositiveInt(env, "CONSENT_TIMEOUT_MS", DEFAULT_CONFIG.consentTimeoutMs),
    triageTimeoutMs: readPositiveInt(env, "TRIAGE_TIMEOUT_MS", DEFAULT_CONFIG.triageTimeoutMs),
    idleTimeoutMs: readPositiveInt(env, "SESSION_IDLE_TIMEOUT_MS", DEFAULT_CONFIG.idleTimeoutMs),
    hardTimeoutMs: readPositiveInt(env, "SESSION_HARD_TIMEOUT_MS", DEFAULT_CONFIG.hardTimeoutMs),
    messageCap: readPositiveInt(env, "MAX_MESSAGES_PER_SESSION", DEFAULT_CONFIG.messageCap),

    classifierTimeoutMs: readPositiveInt(env, "CLASSIFIER_TIMEOUT_MS", DEFAULT_CONFIG.classifierTimeoutMs),
    generationTimeoutMs: readPositiveInt(env, "GENERATION_TIMEOUT_MS", DEFAULT_CONFIG.generationTimeoutMs),
    directoryTimeoutMs: readPositiveInt(env, "DIRECTORY_TIMEOUT_MS", DEFAULT_CONFIG.directoryTimeoutMs),
    handoffTimeoutMs: readPositiveInt(env, "HANDOFF_TIMEOUT_MS", DEFAULT_CONFIG.handoffTimeoutMs),
    handoffMaxAttempts: readPositiveInt(env, "HANDOFF_MAX_ATTEMPTS", DEFAULT_CONFIG.handoffMaxAttempts),
    handoffRetryDelayMs: readPositiveInt(env, "HANDOFF_RETRY_DELAY_MS", DEFAULT_CONFIG.handoffRetryDelayMs, true),

    escalationRetryMax: readPositiveInt(env, "ESCALATION_RETRY_MAX", DEFAULT_CONFIG.escalationRetryMax, true),
    escalationRetryIntervalMs: readPositiveInt(env, "ESCALATION_RETRY_INTERVAL_MS", DEFAULT_CONFIG.escalationRetryIntervalMs),

    idleSweepIntervalMs: readPositiveInt(env, "IDLE_SWEEP_INTERVAL_MS", DEFAULT_CONFIG.idleSweepIntervalMs),
    hardSweepIntervalMs: readPositiveInt(env, "HARD_SWEEP_INTERVAL_MS", DEFAULT_CONFIG.hardSweepIntervalMs),

    escalationThreshold: parseSeverity(readString(env, "ESCALATION_THRESHOLD", DEFAULT_CONFIG.escalationThreshold)),
    emergencyThreshold: parseSeverity(readString(env, "EMERGENCY_THRESHOLD", DEFAULT_CONFIG.emergencyThreshold)),
    sustainedRiskTurns: readPositiveInt(env, "SUSTAINED_RISK_TURNS", DEFAULT_CONFIG.sustainedRiskTurns, true),
    recentContextTurns: readPositiveInt(env, "RECENT_CONTEXT_TURNS", DEFAULT_CONFIG.recentContextTurns),

    observabilityQueueSize: readPositiveInt(env, "OBSERVABILITY_QUEUE_SIZE", DEFAULT_CONFIG.observabilityQueueSize),
    closedSessionPolicy: policy,
    closedSessionRetentionMs: readPositiveInt(env, "CLOSED_SESSION_RETENTION_MS", DEFAULT_CONFIG.closedSessionRetentionMs),

    defaultLocale: readString(env, "DEFAULT_LOCALE", DEFAULT_CONFIG.defaultLocale).toUpperCase(),
    fallbackEmergencyNumber: readString(env, "FALLBACK_EMERGENCY_NUMBER", DEFAULT_CONFIG.fallbackEmergencyNumber),
    redactionTokenSalt: readString(env, "REDACTION_TOKEN_SALT", DEFAULT_CONFIG.redactionTokenSalt),

    generationModel: readString(env, "OPENAI_GENERATION_MODEL", DEFAULT_CONFIG.generationModel),
    classifierModel: readString(env, "OPENAI_CLASSIFIER_MODEL", DEFAULT_CONFIG.classifierModel),
  });
}
