import { describe, expect, it } from "vitest";
import { BlobPersister, variantKey, type PersistInput } from "../src/pipeline/blob_persister.js";
import { fakeFetch, MemoryBlobStore, pngResponse } from "./helpers.js";

const AT = new Date("2026-03-01T10:00:00.000Z");

const INPUT: PersistInput = {
  transientUrl: "https://cdn.test/tmp/abc.png",
  sessionId: "session-1",
  namespace: "signage",
  style: "modern",
  provider: "alpha"
};

describe("variantKey", () => {
  it("places the style, a compact timestamp and a suffix under the session", () => {
    expect(variantKey("interior", "session-1", "cozy", AT, "k3y9x2ab")).toBe("interior/session-1/cozy_20260301100000000_k3y9x2ab");
    expect(variantKey("signage", "session-1", "modern", AT)).toMatch(/^signage\/session-1\/modern_20260301100000000_[a-z0-9]{8}$/);
  });
});

describe("BlobPersister", () => {
  it("copies the image into the store and returns a durable reference", async () => {
    const blobs = new MemoryBlobStore();
    const fetch = fakeFetch(() => pngResponse());
    const persister = new BlobPersister(blobs, { downloadTimeoutMs: 1000, fetch, now: () => AT });

    const ref = await persister.persist(INPUT);
    expect(fetch.calls.map((c) => c.url)).toEqual(["https://cdn.test/tmp/abc.png"]);
    expect(ref.storage).toBe("durable");
    if (ref.storage !== "durable") return;
    expect(ref.key).toMatch(/^signage\/session-1\/modern_20260301100000000_[a-z0-9]{8}$/);
    expect(ref.url).toBe(`https://blobs.test/${ref.key}`);

    const stored = blobs.objects.get(ref.key);
    expect(stored?.contentType).toBe("image/png");
    expect(stored?.metadata).toEqual({
      "session-id": "session-1",
      style: "modern",
      provider: "alpha",
      "source-url": "https://cdn.test/tmp/abc.png"
    });
  });

  it("does not copy data URLs into metadata", async () => {
    const blobs = new MemoryBlobStore();
    const persister = new BlobPersister(blobs, { downloadTimeoutMs: 1000, fetch: fakeFetch(() => pngResponse()) });
    const ref = await persister.persist({ ...INPUT, transientUrl: "data:image/svg+xml;base64,PHN2Zy8+" });
    expect(ref.storage).toBe("durable");
    expect([...blobs.objects.values()][0].metadata["source-url"]).toBe("data-url");
  });

  it("keeps the provider URL when the download fails", async () => {
    const blobs = new MemoryBlobStore();
    const cases: [string, BlobPersister][] = [
      ["download: HTTP 404", new BlobPersister(blobs, { downloadTimeoutMs: 1000, fetch: fakeFetch(() => new Response("gone", { status: 404 })) })],
      ["download: empty body", new BlobPersister(blobs, { downloadTimeoutMs: 1000, fetch: fakeFetch(() => new Response(new Uint8Array(0))) })],
      ["download: fetch failed", new BlobPersister(blobs, { downloadTimeoutMs: 1000, fetch: fakeFetch(() => Promise.reject(new TypeError("fetch failed"))) })]
    ];

    for (const [persistenceError, persister] of cases) {
      expect(await persister.persist(INPUT)).toEqual({ storage: "provider", url: INPUT.transientUrl, persistenceError });
    }
    expect(blobs.objects.size).toBe(0);
  });

  it("gives up on a download that outlives its timeout", async () => {
    const hanging = fakeFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        })
    );
    const persister = new BlobPersister(new MemoryBlobStore(), { downloadTimeoutMs: 20, fetch: hanging });
    expect(await persister.persist(INPUT)).toEqual({
      storage: "provider",
      url: INPUT.transientUrl,
      persistenceError: "download: timed out after 20ms"
    });
  });

  it("keeps the provider URL when the upload fails", async () => {
    const blobs = new MemoryBlobStore();
    blobs.failPuts = true;
    const persister = new BlobPersister(blobs, { downloadTimeoutMs: 1000, fetch: fakeFetch(() => pngResponse()) });
    expect(await persister.persist(INPUT)).toEqual({
      storage: "provider",
      url: INPUT.transientUrl,
      persistenceError: "upload: bucket unavailable"
    });
  });
});
