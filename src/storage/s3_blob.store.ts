import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { BlobListing, BlobMetadata, BlobStore, StoredBlob } from "./blob_store.js";

export type S3BlobStoreOptions = {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  client?: S3Client;
};

const DELETE_BATCH = 1000;

export class S3BlobStore implements BlobStore {
  readonly kind = "s3";
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly objectBaseUrl: string;

  constructor(options: S3BlobStoreOptions) {
    this.bucket = options.bucket;
    const config: S3ClientConfig = { region: options.region };
    if (options.endpoint) config.endpoint = options.endpoint;
    if (options.forcePathStyle) config.forcePathStyle = true;
    this.client = options.client ?? new S3Client(config);

    const endpoint = options.endpoint?.replace(/\/+$/, "");
    if (endpoint) this.objectBaseUrl = `${endpoint}/${this.bucket}`;
    else this.objectBaseUrl = `https://${this.bucket}.s3.${options.region}.amazonaws.com`;
  }

  async put(key: string, bytes: Uint8Array, contentType: string, metadata: BlobMetadata): Promise<{ key: string; url: string }> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
        Metadata: metadata
      })
    );
    return { key, url: `${this.objectBaseUrl}/${key}` };
  }

  async get(key: string): Promise<StoredBlob | null> {
    try {
      const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!res.Body) return null;
      return {
        bytes: await res.Body.transformToByteArray(),
        contentType: res.ContentType ?? "application/octet-stream",
        metadata: res.Metadata ?? {}
      };
    } catch (err) {
      if (err instanceof NoSuchKey) return null;
      throw err;
    }
  }

  async list(prefix: string): Promise<BlobListing[]> {
    const out: BlobListing[] = [];
    let token: string | undefined;
    do {
      const res = await this.client.send(
        new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix, ContinuationToken: token })
      );
      for (const obj of res.Contents ?? []) {
        if (!obj.Key) continue;
        out.push({
          key: obj.Key,
          size: obj.Size ?? 0,
          lastModified: (obj.LastModified ?? new Date(0)).toISOString()
        });
      }
      token = res.IsTruncated ? res.NextContinuationToken : undefined;
    } while (token);
    return out;
  }

  async presignGet(key: string, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.bucket, Key: key }), {
      expiresIn: Math.max(1, Math.floor(expiresInSeconds))
    });
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = (await this.list(prefix)).map((item) => item.key);
    for (let i = 0; i < keys.length; i += DELETE_BATCH) {
      const batch = keys.slice(i, i + DELETE_BATCH);
      await this.client.send(
        new DeleteObjectsCommand({
          Bucket: this.bucket,
          Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true }
        })
      );
    }
    return keys.length;
  }
}
