import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import {
  assertActive,
  assertStepTarget,
  executionRecord,
  isPastExpiry,
  newSession,
  parseProfile,
  shouldExpire,
  usableSession
} from "../src/session/lifecycle.js";
import { PROFILE } from "./helpers.js";

const TIMING = { sessionTtlHours: 24, retentionHours: 24 };
const T0 = Date.parse("2026-03-01T10:00:00.000Z");

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof ValidationError ? err.code : "other";
  }
}

describe("session lifecycle", () => {
  it("creates an active session at step 1 with expiry and ttl derived from the timing", () => {
    const s = newSession(PROFILE, TIMING, T0);
    expect(s.currentStep).toBe(1);
    expect(s.status).toBe("active");
    expect(s.version).toBe(1);
    expect(s.createdAt).toBe("2026-03-01T10:00:00.000Z");
    expect(s.expiresAt).toBe("2026-03-02T10:00:00.000Z");
    expect(s.ttl).toBe(Math.floor(Date.parse("2026-03-03T10:00:00.000Z") / 1000));
    expect(s.executions).toEqual([]);
    expect(s.sessionId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("keeps the record at least an hour past expiry", () => {
    const s = newSession(PROFILE, { sessionTtlHours: 24, retentionHours: 0 }, T0);
    expect(s.ttl).toBe(Math.floor(Date.parse("2026-03-02T11:00:00.000Z") / 1000));
  });

  it("rejects enumeration values that are not exact", () => {
    expect(codeOf(() => parseProfile({ industry: "restaurant", region: "Seoul", size: "small" }))).toBe("invalid_profile");
    expect(codeOf(() => parseProfile({ industry: "restaurant", region: " seoul", size: "small" }))).toBe("invalid_profile");
    expect(codeOf(() => parseProfile({ ...PROFILE, extra: true }))).toBe("invalid_profile");
    expect(parseProfile({ ...PROFILE, description: "Noodle bar" }).description).toBe("Noodle bar");
  });

  it("refuses a stored session whose profile no longer validates", () => {
    const s = newSession(PROFILE, TIMING, T0);
    expect(codeOf(() => usableSession({ ...s, profile: { industry: "bakery", region: "seoul", size: "small" } }))).toBe("invalid_profile");
    expect(usableSession({ ...s, profile: { ...PROFILE } }).profile.region).toBe("seoul");
  });

  it("expires only active sessions strictly after expiresAt", () => {
    const s = newSession(PROFILE, TIMING, T0);
    const expiry = Date.parse(s.expiresAt);
    expect(isPastExpiry(s, expiry)).toBe(false);
    expect(isPastExpiry(s, expiry + 1)).toBe(true);
    expect(shouldExpire(s, expiry + 1)).toBe(true);
    expect(shouldExpire({ ...s, status: "completed" }, expiry + 1)).toBe(false);
  });

  it("blocks mutation of terminal sessions", () => {
    const s = newSession(PROFILE, TIMING, T0);
    expect(codeOf(() => assertActive(s))).toBeNull();
    expect(codeOf(() => assertActive({ ...s, status: "failed" }))).toBe("session_closed");
  });

  it("allows staying on the current step or advancing by exactly one", () => {
    expect(codeOf(() => assertStepTarget(2, 2))).toBeNull();
    expect(codeOf(() => assertStepTarget(2, 3))).toBeNull();
    expect(codeOf(() => assertStepTarget(2, 4))).toBe("step_order");
    expect(codeOf(() => assertStepTarget(3, 2))).toBe("step_order");
    expect(codeOf(() => assertStepTarget(5, 6))).toBe("invalid_step");
    expect(codeOf(() => assertStepTarget(1, 0))).toBe("invalid_step");
    expect(codeOf(() => assertStepTarget(1, 1.5))).toBe("invalid_step");
  });

  it("builds frozen execution records with rounded, non-negative latency", () => {
    const record = executionRecord({ agent: "naming", tool: "stub_namer", status: "success", latencyMs: 12.6, at: "2026-03-01T10:00:00.000Z" });
    expect(record).toEqual({
      agent: "naming",
      tool: "stub_namer",
      status: "success",
      latencyMs: 13,
      metadata: {},
      at: "2026-03-01T10:00:00.000Z"
    });
    expect(Object.isFrozen(record)).toBe(true);
    expect(executionRecord({ agent: "a", tool: "t", status: "error", latencyMs: -5 }).latencyMs).toBe(0);
  });
});
