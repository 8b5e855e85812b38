import { PersistenceError } from "../errors.js";
import type { FetchLike } from "../providers/types.js";
import type { BlobReference } from "../session/schemas.js";
import type { BlobStore } from "../storage/blob_store.js";
import { compactTimestamp, randomSuffix, toErrorMessage } from "../utils.js";

export type VariantNamespace = "signage" | "interior";

export type PersistInput = {
  transientUrl: string;
  sessionId: string;
  namespace: VariantNamespace;
  style: string;
  provider: string;
};

export type BlobPersisterOptions = {
  downloadTimeoutMs: number;
  fetch?: FetchLike;
  now?: () => Date;
};

export function variantKey(namespace: string, sessionId: string, style: string, at: Date, suffix = randomSuffix(8)): string {
  return `${namespace}/${sessionId}/${style}_${compactTimestamp(at)}_${suffix}`;
}

/**
 * Copies a provider-hosted image into the blob store. Failures never propagate: the caller gets
 * the provider URL back, marked as provider-hosted with the reason it was not persisted.
 */
export class BlobPersister {
  private readonly downloadTimeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly now: () => Date;

  constructor(
    private readonly store: BlobStore,
    options: BlobPersisterOptions
  ) {
    this.downloadTimeoutMs = options.downloadTimeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  async persist(input: PersistInput): Promise<BlobReference> {
    try {
      const { bytes, contentType } = await this.download(input.transientUrl);
      const key = variantKey(input.namespace, input.sessionId, input.style, this.now());
      const stored = await this.store
        .put(key, bytes, contentType, {
          "session-id": input.sessionId,
          style: input.style,
          provider: input.provider,
          "source-url": input.transientUrl.startsWith("data:") ? "data-url" : input.transientUrl
        })
        .catch((err: unknown) => {
          throw new PersistenceError("upload", toErrorMessage(err));
        });
      return { storage: "durable", key: stored.key, url: stored.url };
    } catch (err) {
      const error = err instanceof PersistenceError ? err : new PersistenceError("download", toErrorMessage(err));
      console.warn(
        `[persister] keeping provider-hosted URL for ${input.namespace}/${input.sessionId}/${input.style} (${error.phase} failed: ${error.message})`
      );
      return { storage: "provider", url: input.transientUrl, persistenceError: `${error.phase}: ${error.message}` };
    }
  }

  private async download(url: string): Promise<{ bytes: Uint8Array; contentType: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.downloadTimeoutMs);
    try {
      const res = await this.fetchFn(url, { signal: controller.signal });
      if (!res.ok) throw new PersistenceError("download", `HTTP ${res.status}`);
      const bytes = new Uint8Array(await res.arrayBuffer());
      if (bytes.length === 0) throw new PersistenceError("download", "empty body");
      return { bytes, contentType: res.headers.get("content-type") ?? "application/octet-stream" };
    } catch (err) {
      if (controller.signal.aborted) throw new PersistenceError("download", `timed out after ${this.downloadTimeoutMs}ms`);
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
