import { MAX_VARIANTS } from "./session/schemas.js";
import { MIN_RETENTION_HOURS, type SessionTiming } from "./session/lifecycle.js";

export type GenerationMode = "live" | "stub";

export type RetryPolicy = {
  /** Budget for a single HTTP attempt. */
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
};

export type ImageProviderConfig = {
  id: string;
  endpoint: string;
  apiKey?: string;
  model?: string;
};

export type S3Config = {
  bucket: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
};

export type AppConfig = {
  port: number;
  generationMode: GenerationMode;
  sessionStore: "file" | "memory";
  blobStore: "local" | "s3";
  s3: S3Config | null;
  publicBaseUrl: string;
  blobSigningSecret: string;
  presignTtlSeconds: number;
  timing: SessionTiming;
  fanOutDeadlineMs: number;
  retry: RetryPolicy;
  maxPromptLength: number;
  downloadTimeoutMs: number;
  providers: ImageProviderConfig[];
  naming: { apiKey?: string; model: string };
  fallbackBaseUrl: string;
};

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 5050;
const DEFAULT_OPENAI_IMAGES_ENDPOINT = "https://api.openai.com/v1/images/generations";
const DEFAULT_NAMING_MODEL = "gpt-4.1-mini";
const DEV_SIGNING_SECRET = "brandsmith-dev-signing-secret";

function str(env: Env, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function boundedInt(env: Env, key: string, fallback: number, min: number, max: number): number {
  const raw = Number(str(env, key) ?? fallback);
  if (!Number.isFinite(raw)) return fallback;
  return Math.min(max, Math.max(min, Math.round(raw)));
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
  const raw = str(env, key)?.toLowerCase();
  const match = allowed.find((value) => value === raw);
  return match ?? fallback;
}

function flag(env: Env, key: string): boolean {
  const raw = str(env, key)?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/** Longest time one generate call can take: every attempt times out and every backoff is slept. */
export function worstCaseCallBudgetMs(policy: RetryPolicy): number {
  let total = 0;
  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    total += policy.timeoutMs;
    if (attempt < policy.maxAttempts - 1) total += policy.baseDelayMs * 2 ** attempt;
  }
  return total;
}

/**
 * The fan-out deadline never exceeds the summed worst-case budgets of its calls, and a single
 * attempt's timeout never exceeds the deadline.
 */
export function clampFanOutTiming(
  deadlineMs: number,
  policy: RetryPolicy,
  slots = MAX_VARIANTS
): { deadlineMs: number; retry: RetryPolicy } {
  const deadline = Math.max(1, Math.min(deadlineMs, worstCaseCallBudgetMs(policy) * Math.max(1, slots)));
  return { deadlineMs: deadline, retry: { ...policy, timeoutMs: Math.min(policy.timeoutMs, deadline) } };
}

function providerConfigs(env: Env): ImageProviderConfig[] {
  const ids = (str(env, "BRANDSMITH_IMAGE_PROVIDERS") ?? "openai")
    .split(",")
    .map((id) => id.trim().toLowerCase())
    .filter((id) => /^[a-z0-9_-]+$/.test(id));

  return [...new Set(ids)].map((id) => {
    const envId = id.toUpperCase().replace(/-/g, "_");
    const apiKey = str(env, `BRANDSMITH_PROVIDER_${envId}_API_KEY`) ?? (id === "openai" ? str(env, "OPENAI_API_KEY") : undefined);
    const endpoint = str(env, `BRANDSMITH_PROVIDER_${envId}_ENDPOINT`) ?? (id === "openai" ? DEFAULT_OPENAI_IMAGES_ENDPOINT : "");
    const model = str(env, `BRANDSMITH_PROVIDER_${envId}_MODEL`) ?? (id === "openai" ? "dall-e-3" : undefined);
    return { id, endpoint, apiKey, model };
  });
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = boundedInt(env, "BRANDSMITH_PORT", boundedInt(env, "PORT", DEFAULT_PORT, 1, 65535), 1, 65535);
  const blobStore = oneOf(env, "BRANDSMITH_BLOB_STORE", ["local", "s3"] as const, "local");
  const bucket = str(env, "BRANDSMITH_S3_BUCKET");
  if (blobStore === "s3" && !bucket) {
    throw new Error("BRANDSMITH_BLOB_STORE=s3 requires BRANDSMITH_S3_BUCKET");
  }

  const signingSecret = str(env, "BRANDSMITH_BLOB_SIGNING_SECRET");
  if (!signingSecret && blobStore === "local") {
    console.warn("[config] BRANDSMITH_BLOB_SIGNING_SECRET not set; using a development secret for local blob links");
  }

  const { deadlineMs, retry } = clampFanOutTiming(boundedInt(env, "BRANDSMITH_FANOUT_DEADLINE_MS", 90_000, 100, 600_000), {
    timeoutMs: boundedInt(env, "BRANDSMITH_PROVIDER_TIMEOUT_MS", 30_000, 100, 300_000),
    maxAttempts: boundedInt(env, "BRANDSMITH_PROVIDER_MAX_ATTEMPTS", 3, 1, 6),
    baseDelayMs: boundedInt(env, "BRANDSMITH_PROVIDER_BASE_DELAY_MS", 1_000, 0, 30_000)
  });

  const publicBaseUrl = (str(env, "BRANDSMITH_PUBLIC_BASE_URL") ?? `http://localhost:${port}`).replace(/\/+$/, "");

  return {
    port,
    generationMode: oneOf(env, "BRANDSMITH_GENERATION_MODE", ["live", "stub"] as const, "live"),
    sessionStore: oneOf(env, "BRANDSMITH_SESSION_STORE", ["file", "memory"] as const, "file"),
    blobStore,
    s3:
      bucket !== undefined
        ? {
            bucket,
            region: str(env, "BRANDSMITH_S3_REGION") ?? str(env, "AWS_REGION") ?? "ap-northeast-2",
            endpoint: str(env, "BRANDSMITH_S3_ENDPOINT"),
            forcePathStyle: flag(env, "BRANDSMITH_S3_FORCE_PATH_STYLE")
          }
        : null,
    publicBaseUrl,
    blobSigningSecret: signingSecret ?? DEV_SIGNING_SECRET,
    presignTtlSeconds: boundedInt(env, "BRANDSMITH_PRESIGN_TTL_SECONDS", 3600, 60, 7 * 24 * 3600),
    timing: {
      sessionTtlHours: boundedInt(env, "BRANDSMITH_SESSION_TTL_HOURS", 24, 1, 24 * 30),
      retentionHours: boundedInt(env, "BRANDSMITH_SESSION_RETENTION_HOURS", 24, MIN_RETENTION_HOURS, 24 * 90)
    },
    fanOutDeadlineMs: deadlineMs,
    retry,
    maxPromptLength: boundedInt(env, "BRANDSMITH_PROVIDER_MAX_PROMPT_LENGTH", 1000, 200, 4000),
    downloadTimeoutMs: boundedInt(env, "BRANDSMITH_DOWNLOAD_TIMEOUT_MS", 15_000, 100, 120_000),
    providers: providerConfigs(env),
    naming: {
      apiKey: str(env, "OPENAI_API_KEY"),
      model: str(env, "BRANDSMITH_NAMING_MODEL") ?? DEFAULT_NAMING_MODEL
    },
    fallbackBaseUrl: (str(env, "BRANDSMITH_FALLBACK_BASE_URL") ?? publicBaseUrl).replace(/\/+$/, "")
  };
}
