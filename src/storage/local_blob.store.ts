import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod";
import { isSafeBlobKey, outputRootAbs, tryReadJsonFile, writeBinaryFile, writeJsonFile } from "../utils.js";
import type { BlobListing, BlobMetadata, BlobStore, StoredBlob } from "./blob_store.js";

export type LocalBlobStoreOptions = {
  root?: string;
  publicBaseUrl: string;
  signingSecret: string;
  now?: () => number;
};

const MetaFileSchema = z.object({
  contentType: z.string(),
  metadata: z.record(z.string())
});

type MetaFile = z.infer<typeof MetaFileSchema>;

export const BLOB_ROUTE_PREFIX = "/api/blobs";

export function blobsRootAbs(): string {
  return path.join(outputRootAbs(), "blobs");
}

function assertSafeKey(key: string): void {
  if (!isSafeBlobKey(key)) throw new Error(`Invalid blob key: ${key}`);
}

/**
 * Disk-backed blob storage for local runs. Object bytes live under `objects/`, content type and
 * metadata under `meta/`. Read URLs point back at the HTTP API and carry an HMAC over the key and
 * expiry.
 */
export class LocalBlobStore implements BlobStore {
  readonly kind = "local";
  private readonly root: string;
  private readonly publicBaseUrl: string;
  private readonly signingSecret: string;
  private readonly now: () => number;

  constructor(options: LocalBlobStoreOptions) {
    this.root = options.root ?? blobsRootAbs();
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, "");
    this.signingSecret = options.signingSecret;
    this.now = options.now ?? Date.now;
  }

  private objectPath(key: string): string {
    return path.join(this.root, "objects", ...key.split("/"));
  }

  private metaPath(key: string): string {
    return `${path.join(this.root, "meta", ...key.split("/"))}.json`;
  }

  objectUrl(key: string): string {
    return `${this.publicBaseUrl}${BLOB_ROUTE_PREFIX}/${key}`;
  }

  async put(key: string, bytes: Uint8Array, contentType: string, metadata: BlobMetadata): Promise<{ key: string; url: string }> {
    assertSafeKey(key);
    await writeBinaryFile(this.objectPath(key), bytes);
    const meta: MetaFile = { contentType, metadata };
    await writeJsonFile(this.metaPath(key), meta);
    return { key, url: this.objectUrl(key) };
  }

  async get(key: string): Promise<StoredBlob | null> {
    if (!isSafeBlobKey(key)) return null;
    const bytes = await fs.readFile(this.objectPath(key)).catch(() => null);
    if (!bytes) return null;
    const meta = MetaFileSchema.safeParse(await tryReadJsonFile(this.metaPath(key)));
    return {
      bytes: new Uint8Array(bytes),
      contentType: meta.success ? meta.data.contentType : "application/octet-stream",
      metadata: meta.success ? meta.data.metadata : {}
    };
  }

  async list(prefix: string): Promise<BlobListing[]> {
    const objectsRoot = path.join(this.root, "objects");
    const out: BlobListing[] = [];

    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
      for (const ent of entries) {
        const abs = path.join(dir, ent.name);
        if (ent.isDirectory()) {
          await walk(abs);
          continue;
        }
        if (!ent.isFile()) continue;
        const key = path.relative(objectsRoot, abs).split(path.sep).join("/");
        if (!key.startsWith(prefix)) continue;
        const st = await fs.stat(abs).catch(() => null);
        if (!st) continue;
        out.push({ key, size: st.size, lastModified: st.mtime.toISOString() });
      }
    };

    await walk(objectsRoot);
    return out.sort((a, b) => a.key.localeCompare(b.key));
  }

  async presignGet(key: string, expiresInSeconds: number): Promise<string> {
    assertSafeKey(key);
    const expires = Math.floor(this.now() / 1000) + Math.max(1, Math.floor(expiresInSeconds));
    const signature = this.sign(key, expires);
    return `${this.objectUrl(key)}?expires=${expires}&signature=${signature}`;
  }

  verifySignedRead(key: string, expires: number, signature: string): boolean {
    if (!isSafeBlobKey(key) || !Number.isFinite(expires)) return false;
    if (Math.floor(this.now() / 1000) > expires) return false;
    const expected = Buffer.from(this.sign(key, expires), "hex");
    const given = Buffer.from(signature, "hex");
    return expected.length === given.length && crypto.timingSafeEqual(expected, given);
  }

  async deletePrefix(prefix: string): Promise<number> {
    const listed = await this.list(prefix);
    for (const item of listed) {
      await fs.rm(this.objectPath(item.key), { force: true });
      await fs.rm(this.metaPath(item.key), { force: true });
    }
    return listed.length;
  }

  private sign(key: string, expires: number): string {
    return crypto.createHmac("sha256", this.signingSecret).update(`${key}\n${expires}`, "utf8").digest("hex");
  }
}
