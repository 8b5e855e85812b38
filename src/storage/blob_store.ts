import type { BlobReference } from "../session/schemas.js";

export type BlobMetadata = Record<string, string>;

export type StoredBlob = {
  bytes: Uint8Array;
  contentType: string;
  metadata: BlobMetadata;
};

export type BlobListing = {
  key: string;
  size: number;
  lastModified: string;
};

export interface BlobStore {
  readonly kind: string;
  put(key: string, bytes: Uint8Array, contentType: string, metadata: BlobMetadata): Promise<{ key: string; url: string }>;
  get(key: string): Promise<StoredBlob | null>;
  list(prefix: string): Promise<BlobListing[]>;
  /** Time-bounded read URL for a stored key. */
  presignGet(key: string, expiresInSeconds: number): Promise<string>;
  /** Session-wide cleanup; returns the number of deleted objects. */
  deletePrefix(prefix: string): Promise<number>;
}

export const SESSION_BLOB_NAMESPACES = ["signage", "interior", "reports"] as const;
export type SessionBlobNamespace = (typeof SESSION_BLOB_NAMESPACES)[number];

export function sessionPrefix(namespace: SessionBlobNamespace, sessionId: string): string {
  return `${namespace}/${sessionId}/`;
}

/** Fresh read URL for a variant: durable blobs are presigned, other references are already public. */
export async function readUrlFor(store: BlobStore, ref: BlobReference, ttlSeconds: number): Promise<string> {
  if (ref.storage === "durable") return store.presignGet(ref.key, ttlSeconds);
  return ref.url;
}
