import { randomUUID } from "node:crypto";
import { ValidationError } from "../errors.js";
import {
  BusinessProfileSchema,
  FIRST_STEP,
  LAST_STEP,
  type AgentExecutionRecord,
  type BusinessProfile,
  type StoredSession,
  type WorkflowSession
} from "./schemas.js";

export type SessionTiming = {
  sessionTtlHours: number;
  retentionHours: number;
};

const HOUR_MS = 60 * 60 * 1000;

/** Records must outlive `expiresAt` so an overdue session can still be read and marked Expired. */
export const MIN_RETENTION_HOURS = 1;

export function parseProfile(input: unknown): BusinessProfile {
  const parsed = BusinessProfileSchema.safeParse(input);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "profile").join(", ");
    throw new ValidationError("invalid_profile", `Business profile is invalid (${fields})`);
  }
  return parsed.data;
}

export function newSession(profileInput: unknown, timing: SessionTiming, nowMs = Date.now()): WorkflowSession {
  const profile = parseProfile(profileInput);
  const createdAt = new Date(nowMs).toISOString();
  const expiresAtMs = nowMs + timing.sessionTtlHours * HOUR_MS;
  return {
    sessionId: randomUUID(),
    version: 1,
    currentStep: FIRST_STEP,
    status: "active",
    createdAt,
    updatedAt: createdAt,
    expiresAt: new Date(expiresAtMs).toISOString(),
    ttl: Math.floor((expiresAtMs + Math.max(MIN_RETENTION_HOURS, timing.retentionHours) * HOUR_MS) / 1000),
    profile,
    executions: []
  };
}

/**
 * A stored session is only usable while its profile still validates. The profile is never
 * repaired: an invalid one makes the session permanently unusable.
 */
export function usableSession(stored: StoredSession): WorkflowSession {
  const profile = BusinessProfileSchema.safeParse(stored.profile);
  if (!profile.success) {
    throw new ValidationError("invalid_profile", `Session ${stored.sessionId} has an invalid business profile and cannot be used`);
  }
  return { ...stored, profile: profile.data };
}

export function isPastExpiry(session: Pick<WorkflowSession, "expiresAt">, nowMs = Date.now()): boolean {
  const expiresMs = Date.parse(session.expiresAt);
  return Number.isFinite(expiresMs) && nowMs > expiresMs;
}

/** Only active sessions expire; completed and failed are already terminal. */
export function shouldExpire(session: WorkflowSession, nowMs = Date.now()): boolean {
  return session.status === "active" && isPastExpiry(session, nowMs);
}

export function assertActive(session: WorkflowSession): void {
  if (session.status !== "active") {
    throw new ValidationError("session_closed", `Session ${session.sessionId} is ${session.status} and can no longer change`);
  }
}

/** The step counter moves by at most one per commit and never backwards. */
export function assertStepTarget(currentStep: number, targetStep: number): void {
  if (!Number.isInteger(targetStep) || targetStep < FIRST_STEP || targetStep > LAST_STEP) {
    throw new ValidationError("invalid_step", `Step ${targetStep} is outside ${FIRST_STEP}..${LAST_STEP}`);
  }
  if (targetStep !== currentStep && targetStep !== currentStep + 1) {
    throw new ValidationError(
      "step_order",
      `Cannot move from step ${currentStep} to step ${targetStep}; only ${currentStep} or ${currentStep + 1} is allowed`
    );
  }
}

export function executionRecord(
  input: Omit<AgentExecutionRecord, "at" | "latencyMs" | "metadata"> & {
    latencyMs: number;
    metadata?: Record<string, unknown>;
    at?: string;
  }
): AgentExecutionRecord {
  return Object.freeze({
    ...input,
    latencyMs: Math.max(0, Math.round(input.latencyMs)),
    metadata: Object.freeze({ ...(input.metadata ?? {}) }),
    at: input.at ?? new Date().toISOString()
  });
}
