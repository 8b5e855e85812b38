import { SessionBusyError } from "./errors.js";

/**
 * Serializes work per session: one operation runs at a time for a given id and the rest wait in
 * FIFO order. Different sessions never wait on each other.
 */
export class SessionLane {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly queued = new Map<string, number>();
  private readonly generating = new Set<string>();

  pending(sessionId: string): number {
    return this.queued.get(sessionId) ?? 0;
  }

  isGenerating(sessionId: string): boolean {
    return this.generating.has(sessionId);
  }

  run<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    this.queued.set(sessionId, this.pending(sessionId) + 1);

    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);

    void tail.then(() => {
      const left = this.pending(sessionId) - 1;
      if (left > 0) this.queued.set(sessionId, left);
      else this.queued.delete(sessionId);
      if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
    });

    return result;
  }

  /** Like `run`, but a second generation for the same session is rejected instead of queued. */
  runGeneration<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    if (this.generating.has(sessionId)) return Promise.reject(new SessionBusyError(sessionId));
    this.generating.add(sessionId);
    return this.run(sessionId, task).finally(() => {
      this.generating.delete(sessionId);
    });
  }
}
