import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, createConfig, loadConfig, validateConfig } from "./config.js";
import { Severity } from "./types.js";

describe("DEFAULT_CONFIG", () => {
  it("is frozen", () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });

  it("escalates at HIGH and treats CRITICAL as an emergency", () => {
    expect(DEFAULT_CONFIG.escalationThreshold).toBe(Severity.HIGH);
    expect(DEFAULT_CONFIG.emergencyThreshold).toBe(Severity.CRITICAL);
    expect(DEFAULT_CONFIG.messageCap).toBe(50);
  });
});

describe("validateConfig / createConfig", () => {
  it("accepts a MEDIUM escalation threshold", () => {
    expect(createConfig({ escalationThreshold: Severity.MEDIUM }).escalationThreshold).toBe(Severity.MEDIUM);
  });

  it("rejects an escalation threshold above HIGH", () => {
    expect(() => createConfig({ escalationThreshold: Severity.CRITICAL })).toThrow(
      "escalationThreshold must be MEDIUM or HIGH, got CRITICAL",
    );
  });

  it("rejects an escalation threshold below MEDIUM", () => {
    expect(() => createConfig({ escalationThreshold: Severity.LOW })).toThrow(
      "escalationThreshold must be MEDIUM or HIGH, got LOW",
    );
  });

  it("rejects an emergency threshold below the escalation threshold", () => {
    expect(() => createConfig({ emergencyThreshold: Severity.MEDIUM })).toThrow(
      "emergencyThreshold (MEDIUM) must not be below escalationThreshold (HIGH)",
    );
  });

  it("joins every violation into one message", () => {
    expect(() => validateConfig({ ...DEFAULT_CONFIG, messageCap: 0, handoffMaxAttempts: 0 })).toThrow(
      "Invalid configuration: messageCap must be at least 1, got 0; handoffMaxAttempts must be at least 1, got 0",
    );
  });

  it("returns a frozen copy", () => {
    const config = createConfig({ messageCap: 3 });
    expect(config.messageCap).toBe(3);
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe("loadConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads limits, thresholds and locale from the environment", () => {
    const config = loadConfig({
      MAX_MESSAGES_PER_SESSION: "10",
      SESSION_IDLE_TIMEOUT_MS: "60000",
      ESCALATION_THRESHOLD: "medium",
      DEFAULT_LOCALE: "gb",
      CLOSED_SESSION_POLICY: "destroy",
      HANDOFF_RETRY_DELAY_MS: "0",
    });
    expect(config.messageCap).toBe(10);
    expect(config.idleTimeoutMs).toBe(60000);
    expect(config.escalationThreshold).toBe(Severity.MEDIUM);
    expect(config.defaultLocale).toBe("GB");
    expect(config.closedSessionPolicy).toBe("destroy");
    expect(config.handoffRetryDelayMs).toBe(0);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ MAX_MESSAGES_PER_SESSION: "  " }).messageCap).toBe(50);
  });

  it("rejects a non-integer limit", () => {
    expect(() => loadConfig({ MAX_MESSAGES_PER_SESSION: "ten" })).toThrow(
      'Invalid MAX_MESSAGES_PER_SESSION: "ten". Expected a positive integer.',
    );
  });

  it("rejects zero where zero is not allowed", () => {
    expect(() => loadConfig({ SESSION_HARD_TIMEOUT_MS: "0" })).toThrow(
      'Invalid SESSION_HARD_TIMEOUT_MS: "0". Expected a positive integer.',
    );
  });

  it("rejects negative values where zero is allowed", () => {
    expect(() => loadConfig({ SUSTAINED_RISK_TURNS: "-1" })).toThrow(
      'Invalid SUSTAINED_RISK_TURNS: "-1". Expected a non-negative integer.',
    );
  });

  it("rejects an unknown retention policy", () => {
    expect(() => loadConfig({ CLOSED_SESSION_POLICY: "shred" })).toThrow(
      'Invalid CLOSED_SESSION_POLICY: "shred". Expected "archive" or "destroy".',
    );
  });

  it("rejects an unknown severity name", () => {
    expect(() => loadConfig({ ESCALATION_THRESHOLD: "severe" })).toThrow('Invalid severity "severe"');
  });
});
