import { EventEmitter } from "node:events";
import { nowIso } from "../utils.js";
import type { SessionStatus, StepName } from "./schemas.js";

export const SESSION_EVENT_TYPES = ["log", "error", "step_advanced", "variants_committed", "status_changed"] as const;
export type SessionEventType = (typeof SESSION_EVENT_TYPES)[number];

export type SessionEventPayloads = {
  log: { message: string; step?: StepName; at: string };
  error: { message: string; step?: StepName; at: string };
  step_advanced: { from: number; to: number; at: string };
  variants_committed: { step: StepName; generation: number; fallbackCount: number; total: number; at: string };
  status_changed: { status: SessionStatus; at: string };
};

type Listener = (type: SessionEventType, payload: unknown) => void;

/**
 * Per-session event streams. Emitters are created lazily and dropped when the last subscriber
 * leaves, so sessions without listeners cost nothing.
 */
export class SessionEvents {
  private readonly emitters = new Map<string, EventEmitter>();

  private emitter(sessionId: string): EventEmitter {
    let emitter = this.emitters.get(sessionId);
    if (!emitter) {
      emitter = new EventEmitter();
      // Node throws on unobserved "error" events; session errors are an optional stream.
      emitter.on("error", () => undefined);
      this.emitters.set(sessionId, emitter);
    }
    return emitter;
  }

  emit<T extends SessionEventType>(sessionId: string, type: T, payload: SessionEventPayloads[T]): void {
    const emitter = this.emitters.get(sessionId);
    if (!emitter) return;
    emitter.emit(type, payload);
  }

  log(sessionId: string, message: string, step?: StepName): void {
    this.emit(sessionId, "log", { message, step, at: nowIso() });
  }

  error(sessionId: string, message: string, step?: StepName): void {
    this.emit(sessionId, "error", { message, step, at: nowIso() });
  }

  listenerCount(sessionId: string): number {
    const emitter = this.emitters.get(sessionId);
    if (!emitter) return 0;
    return SESSION_EVENT_TYPES.reduce((sum, type) => sum + emitter.listenerCount(type), 0) - 1;
  }

  subscribe(sessionId: string, onEvent: Listener): () => void {
    const emitter = this.emitter(sessionId);
    const handlers = SESSION_EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) emitter.off(type, handler);
      if (this.listenerCount(sessionId) <= 0) this.emitters.delete(sessionId);
    };
  }
}
