import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConcurrentModificationError } from "../src/errors.js";
import { FileSessionStore } from "../src/session/file_session.store.js";
import { newSession } from "../src/session/lifecycle.js";
import { MemorySessionStore, type SessionStore } from "../src/session/session_store.js";
import { clock, HOUR_MS, PROFILE } from "./helpers.js";

const TIMING = { sessionTtlHours: 1, retentionHours: 1 };

let tmpDir = "";

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "brandsmith-store-"));
  process.env.BRANDSMITH_OUTPUT_DIR = tmpDir;
});

afterEach(async () => {
  delete process.env.BRANDSMITH_OUTPUT_DIR;
  await fs.rm(tmpDir, { recursive: true, force: true });
});

const stores: [string, (now: () => number) => SessionStore][] = [
  ["memory", (now) => new MemorySessionStore(now)],
  ["file", (now) => new FileSessionStore(path.join(tmpDir, "sessions"), now)]
];

describe.each(stores)("%s session store", (_kind, make) => {
  it("creates, reads and replaces records with optimistic versioning", async () => {
    const c = clock();
    const store = make(c.now);
    const s = newSession(PROFILE, TIMING, c.now());

    await store.put(s, { expectedVersion: null });
    await expect(store.put(s, { expectedVersion: null })).rejects.toBeInstanceOf(ConcurrentModificationError);

    await store.put({ ...s, version: 2, currentStep: 2 }, { expectedVersion: 1 });
    const stale = store.put({ ...s, version: 2, currentStep: 2 }, { expectedVersion: 1 });
    await expect(stale).rejects.toThrow(/expected version 1, found 2/);

    const read = await store.get(s.sessionId);
    expect(read?.version).toBe(2);
    expect(read?.currentStep).toBe(2);
  });

  it("hides records once their ttl has passed and leaves removal to the sweep", async () => {
    const c = clock();
    const store = make(c.now);
    const s = newSession(PROFILE, TIMING, c.now());
    await store.put(s, { expectedVersion: null });

    c.advance(2 * HOUR_MS - 1);
    expect(await store.get(s.sessionId)).not.toBeNull();
    c.advance(1);
    expect(await store.get(s.sessionId)).toBeNull();
    expect(await store.list()).toEqual([]);

    expect(await store.sweep()).toEqual([s.sessionId]);
    expect(await store.delete(s.sessionId)).toBe(false);
  });

  it("sweeps expired records, or only reports them on a dry run", async () => {
    const c = clock();
    const store = make(c.now);
    const old = newSession(PROFILE, TIMING, c.now());
    await store.put(old, { expectedVersion: null });
    c.advance(HOUR_MS);
    const fresh = newSession(PROFILE, TIMING, c.now());
    await store.put(fresh, { expectedVersion: null });

    const sweepAt = c.now() + HOUR_MS;
    expect(await store.sweep(sweepAt, { dryRun: true })).toEqual([old.sessionId]);
    expect(await store.delete(old.sessionId)).toBe(true);
    await store.put(old, { expectedVersion: null });

    expect(await store.sweep(sweepAt)).toEqual([old.sessionId]);
    expect(await store.delete(old.sessionId)).toBe(false);
    expect((await store.list()).map((item) => item.sessionId)).toEqual([fresh.sessionId]);
  });

  it("lists newest sessions first", async () => {
    const c = clock();
    const store = make(c.now);
    const first = newSession(PROFILE, TIMING, c.now());
    c.advance(1000);
    const second = newSession(PROFILE, TIMING, c.now());
    await store.put(first, { expectedVersion: null });
    await store.put(second, { expectedVersion: null });

    const listed = await store.list();
    expect(listed.map((item) => item.sessionId)).toEqual([second.sessionId, first.sessionId]);
    expect(listed[0]).toEqual({
      sessionId: second.sessionId,
      status: "active",
      currentStep: 1,
      createdAt: second.createdAt,
      expiresAt: second.expiresAt,
      ttl: second.ttl
    });
  });
});

describe("file session store", () => {
  it("ignores ids that are not session ids and unreadable records", async () => {
    const root = path.join(tmpDir, "sessions");
    const store = new FileSessionStore(root);
    expect(await store.get("../etc")).toBeNull();

    const s = newSession(PROFILE, TIMING);
    await fs.mkdir(path.join(root, s.sessionId), { recursive: true });
    await fs.writeFile(path.join(root, s.sessionId, "session.json"), "{ not json", "utf8");
    expect(await store.get(s.sessionId)).toBeNull();
    expect(await store.sweep()).toEqual([s.sessionId]);
  });
});
