import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  assetsRootAbs,
  compactTimestamp,
  hash32,
  isSafeBlobKey,
  mulberry32,
  outputRootAbs,
  randomSuffix,
  readJsonFile,
  repoRoot,
  toErrorMessage,
  tryReadJsonFile,
  wait,
  writeBinaryFile,
  writeJsonFile
} from "../src/utils.js";

let savedOutputDir: string | undefined;
let tmp: string | null = null;

beforeEach(async () => {
  savedOutputDir = process.env.BRANDSMITH_OUTPUT_DIR;
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "brandsmith-utils-"));
});

afterEach(async () => {
  if (savedOutputDir === undefined) delete process.env.BRANDSMITH_OUTPUT_DIR;
  else process.env.BRANDSMITH_OUTPUT_DIR = savedOutputDir;
  if (tmp) await fs.rm(tmp, { recursive: true, force: true }).catch(() => undefined);
  tmp = null;
});

describe("paths", () => {
  it("finds the package root and its assets", async () => {
    const root = repoRoot();
    await expect(fs.stat(path.join(root, "package.json"))).resolves.toBeTruthy();
    expect(assetsRootAbs()).toBe(path.join(root, "assets"));
  });

  it("honours BRANDSMITH_OUTPUT_DIR", () => {
    process.env.BRANDSMITH_OUTPUT_DIR = "  /tmp/brandsmith-elsewhere ";
    expect(outputRootAbs()).toBe(path.resolve("/tmp/brandsmith-elsewhere"));
    process.env.BRANDSMITH_OUTPUT_DIR = "";
    expect(outputRootAbs()).toBe(path.join(repoRoot(), "output"));
  });
});

describe("files", () => {
  it("writes JSON and bytes into fresh directories", async () => {
    const dir = tmp ?? "";
    const jsonPath = path.join(dir, "a", "b", "record.json");
    await writeJsonFile(jsonPath, { ok: true });
    expect(await fs.readFile(jsonPath, "utf8")).toBe('{\n  "ok": true\n}\n');
    expect(await readJsonFile(jsonPath)).toEqual({ ok: true });

    const binPath = path.join(dir, "c", "blob.bin");
    await writeBinaryFile(binPath, new Uint8Array([1, 2, 3]));
    expect([...(await fs.readFile(binPath))]).toEqual([1, 2, 3]);
    expect((await fs.readdir(path.join(dir, "c"))).filter((f) => f.includes(".tmp."))).toEqual([]);
  });

  it("returns null for missing or unparseable JSON", async () => {
    const dir = tmp ?? "";
    expect(await tryReadJsonFile(path.join(dir, "missing.json"))).toBeNull();
    await fs.writeFile(path.join(dir, "bad.json"), "{nope");
    expect(await tryReadJsonFile(path.join(dir, "bad.json"))).toBeNull();
  });
});

describe("helpers", () => {
  it("compacts timestamps to digits", () => {
    expect(compactTimestamp(new Date("2026-03-01T10:04:05.067Z"))).toBe("20260301100405067");
  });

  it("draws suffixes from lowercase letters and digits", () => {
    expect(randomSuffix(8)).toMatch(/^[a-z0-9]{8}$/);
  });

  it("hashes and seeds deterministically", () => {
    expect(hash32("")).toBe(0x811c9dc5);
    expect(hash32("signage")).toBe(hash32("signage"));
    const a = mulberry32(42);
    const b = mulberry32(42);
    const first = a();
    expect(first).toBe(b());
    expect(first).toBeGreaterThanOrEqual(0);
    expect(first).toBeLessThan(1);
  });

  it("accepts only relative slash-separated blob keys", () => {
    expect(isSafeBlobKey("signage/abc/modern_1.png")).toBe(true);
    expect(isSafeBlobKey("/signage/abc")).toBe(false);
    expect(isSafeBlobKey("signage/../etc")).toBe(false);
    expect(isSafeBlobKey("signage//abc")).toBe(false);
    expect(isSafeBlobKey("signage\\abc")).toBe(false);
    expect(isSafeBlobKey("signage/a b")).toBe(false);
  });

  it("describes thrown values", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
  });

  it("waits and stops on abort", async () => {
    await expect(wait(0)).resolves.toBeUndefined();
    const controller = new AbortController();
    const pending = wait(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow("Cancelled");

    const aborted = new AbortController();
    aborted.abort();
    await expect(wait(5, aborted.signal)).rejects.toThrow("Cancelled");
  });
});
