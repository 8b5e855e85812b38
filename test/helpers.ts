import type { GenerateOptions, GenerateResult, FetchLike, ImageGenerator, PromptSpec } from "../src/providers/types.js";
import type { BlobListing, BlobMetadata, BlobStore, StoredBlob } from "../src/storage/blob_store.js";

export const PROFILE = { industry: "restaurant", region: "seoul", size: "small" } as const;

export const ANALYSIS = {
  summary: "Lunch demand is strong around the office district",
  score: 72,
  insights: ["Foot traffic peaks between 11:30 and 13:30"],
  marketTrends: ["Set menus under 10,000 won"],
  recommendations: ["Keep the sign readable from across the street"],
  generatedAt: "2026-01-05T09:00:00.000Z"
};

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 1500): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

/** Settles `promise` and returns what it rejected with; fails if it resolved. */
export async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
}

export type Deferred<T> = { promise: Promise<T>; resolve: (value: T) => void };

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function clock(startIso = "2026-03-01T10:00:00.000Z") {
  let nowMs = Date.parse(startIso);
  return {
    now: () => nowMs,
    advance(ms: number) {
      nowMs += ms;
    }
  };
}

export const HOUR_MS = 60 * 60 * 1000;

/** In-process blob store; `failPuts` makes every upload fail. */
export class MemoryBlobStore implements BlobStore {
  readonly kind = "memory";
  readonly objects = new Map<string, StoredBlob>();
  failPuts = false;

  async put(key: string, bytes: Uint8Array, contentType: string, metadata: BlobMetadata): Promise<{ key: string; url: string }> {
    if (this.failPuts) throw new Error("bucket unavailable");
    this.objects.set(key, { bytes, contentType, metadata });
    return { key, url: `https://blobs.test/${key}` };
  }

  async get(key: string): Promise<StoredBlob | null> {
    return this.objects.get(key) ?? null;
  }

  async list(prefix: string): Promise<BlobListing[]> {
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, blob]) => ({ key, size: blob.bytes.length, lastModified: "2026-03-01T10:00:00.000Z" }));
  }

  async presignGet(key: string, expiresInSeconds: number): Promise<string> {
    return `https://blobs.test/${key}?ttl=${expiresInSeconds}`;
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix));
    for (const key of keys) this.objects.delete(key);
    return keys.length;
  }
}

export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function pngResponse(): Response {
  return new Response(PNG_BYTES, { status: 200, headers: { "content-type": "image/png" } });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

export type FetchCall = { url: string; init?: RequestInit };

/** Records every call and answers from `handler`. */
export function fakeFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>): FetchLike & { calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fn = async (url: string, init?: RequestInit) => {
    calls.push({ url, init });
    return handler(url, init);
  };
  return Object.assign(fn, { calls });
}

export function scriptedGenerator(
  id: string,
  behavior: (spec: PromptSpec, options: GenerateOptions) => Promise<GenerateResult>
): ImageGenerator & { specs: PromptSpec[] } {
  const specs: PromptSpec[] = [];
  return {
    id,
    specs,
    generate: async (spec, options = {}) => {
      specs.push(spec);
      return behavior(spec, options);
    }
  };
}

export function success(url: string, prompt = "prompt"): GenerateResult {
  return { success: true, url, prompt, attempts: 1 };
}
