import fs from "node:fs/promises";
import path from "node:path";
import { ensureDir, outputRootAbs, tryReadJsonFile, writeJsonFile } from "../utils.js";
import type { StoredSession } from "./schemas.js";
import {
  checkVersion,
  isPastTtl,
  listItem,
  parseStoredSession,
  type PutOptions,
  type SessionListItem,
  type SessionStore,
  type SweepOptions
} from "./session_store.js";

const SESSION_FILE = "session.json";
const SESSION_ID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function sessionsRootAbs(): string {
  return path.join(outputRootAbs(), "sessions");
}

/** One directory per session holding `session.json`, written atomically. */
export class FileSessionStore implements SessionStore {
  private readonly root: string;

  constructor(
    root?: string,
    private readonly now: () => number = Date.now
  ) {
    this.root = root ?? sessionsRootAbs();
  }

  private sessionPath(sessionId: string): string {
    return path.join(this.root, sessionId, SESSION_FILE);
  }

  private async read(sessionId: string): Promise<StoredSession | null> {
    if (!SESSION_ID_RE.test(sessionId)) return null;
    const raw = await tryReadJsonFile(this.sessionPath(sessionId));
    if (raw === null) return null;
    return parseStoredSession(raw);
  }

  async get(sessionId: string): Promise<StoredSession | null> {
    const record = await this.read(sessionId);
    if (!record || isPastTtl(record, this.now())) return null;
    return record;
  }

  async put(record: StoredSession, options: PutOptions): Promise<void> {
    if (!SESSION_ID_RE.test(record.sessionId)) throw new Error(`Invalid session id: ${record.sessionId}`);
    checkVersion(record.sessionId, await this.get(record.sessionId), options.expectedVersion);
    await writeJsonFile(this.sessionPath(record.sessionId), record);
  }

  private async sessionIds(): Promise<string[]> {
    await ensureDir(this.root);
    const entries = await fs.readdir(this.root, { withFileTypes: true });
    return entries.filter((ent) => ent.isDirectory() && SESSION_ID_RE.test(ent.name)).map((ent) => ent.name);
  }

  async list(): Promise<SessionListItem[]> {
    const out: SessionListItem[] = [];
    for (const id of await this.sessionIds()) {
      const record = await this.get(id);
      if (record) out.push(listItem(record));
    }
    return out.sort((a, b) => (a.createdAt < b.createdAt ? 1 : -1));
  }

  async delete(sessionId: string): Promise<boolean> {
    if (!SESSION_ID_RE.test(sessionId)) return false;
    const dir = path.join(this.root, sessionId);
    const existed = await fs
      .stat(dir)
      .then((st) => st.isDirectory())
      .catch(() => false);
    await fs.rm(dir, { recursive: true, force: true });
    return existed;
  }

  async sweep(nowMs = this.now(), options: SweepOptions = {}): Promise<string[]> {
    const removed: string[] = [];
    for (const id of await this.sessionIds()) {
      const record = await this.read(id);
      if (record && !isPastTtl(record, nowMs)) continue;
      if (!options.dryRun) await this.delete(id);
      removed.push(id);
    }
    return removed;
  }
}
