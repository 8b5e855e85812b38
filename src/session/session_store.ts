import { ConcurrentModificationError } from "../errors.js";
import { WorkflowSessionSchema, type StoredSession } from "./schemas.js";

export type PutOptions = {
  /** Version the caller read; `null` when creating a record that must not exist yet. */
  expectedVersion: number | null;
};

export type SweepOptions = { dryRun?: boolean };

export type SessionListItem = Pick<StoredSession, "sessionId" | "status" | "currentStep" | "createdAt" | "expiresAt" | "ttl">;

/**
 * Key-value session storage. Writes replace the whole record. Once `ttl` (epoch seconds) passes a
 * record is hidden from reads; only `sweep` deletes it, so its blobs can be removed alongside.
 */
export interface SessionStore {
  get(sessionId: string): Promise<StoredSession | null>;
  put(record: StoredSession, options: PutOptions): Promise<void>;
  list(): Promise<SessionListItem[]>;
  delete(sessionId: string): Promise<boolean>;
  /** Removes records whose ttl has passed and returns their ids; `dryRun` only reports them. */
  sweep(nowMs?: number, options?: SweepOptions): Promise<string[]>;
}

export function isPastTtl(record: Pick<StoredSession, "ttl">, nowMs: number): boolean {
  return nowMs >= record.ttl * 1000;
}

export function parseStoredSession(raw: unknown): StoredSession | null {
  const parsed = WorkflowSessionSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function checkVersion(sessionId: string, current: StoredSession | null, expectedVersion: number | null): void {
  const actual = current ? current.version : null;
  if (actual !== expectedVersion) {
    throw new ConcurrentModificationError(sessionId, expectedVersion ?? 0, actual);
  }
}

export function listItem(record: StoredSession): SessionListItem {
  return {
    sessionId: record.sessionId,
    status: record.status,
    currentStep: record.currentStep,
    createdAt: record.createdAt,
    expiresAt: record.expiresAt,
    ttl: record.ttl
  };
}

export class MemorySessionStore implements SessionStore {
  private readonly records = new Map<string, string>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(sessionId: string): Promise<StoredSession | null> {
    const raw = this.records.get(sessionId);
    if (raw === undefined) return null;
    const record = parseStoredSession(JSON.parse(raw));
    if (!record || isPastTtl(record, this.now())) return null;
    return record;
  }

  async put(record: StoredSession, options: PutOptions): Promise<void> {
    checkVersion(record.sessionId, await this.get(record.sessionId), options.expectedVersion);
    // Stored serialized so callers never share object references with the store.
    this.records.set(record.sessionId, JSON.stringify(record));
  }

  async list(): Promise<SessionListItem[]> {
    const out: SessionListItem[] = [];
    for (const id of this.records.keys()) {
      const record = await this.get(id);
      if (record) out.push(listItem(record));
    }
    return out.sort((a, b) => (a.createdAt < b.createdAt ? 1 : -1));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.records.delete(sessionId);
  }

  async sweep(nowMs = this.now(), options: SweepOptions = {}): Promise<string[]> {
    const removed: string[] = [];
    for (const [id, raw] of this.records) {
      const record = parseStoredSession(JSON.parse(raw));
      if (!record || isPastTtl(record, nowMs)) {
        if (!options.dryRun) this.records.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }
}
