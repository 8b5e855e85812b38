import { describe, expect, it } from "vitest";
import { clampFanOutTiming, loadConfig, worstCaseCallBudgetMs } from "../src/config.js";
import { TerminalProviderError } from "../src/errors.js";
import { createGeneratorSource, providerStatuses } from "../src/providers/registry.js";

const QUIET = { BRANDSMITH_BLOB_SIGNING_SECRET: "test-secret" };

describe("loadConfig", () => {
  it("falls back to defaults for a bare environment", () => {
    const config = loadConfig(QUIET);
    expect(config.port).toBe(5050);
    expect(config.generationMode).toBe("live");
    expect(config.sessionStore).toBe("file");
    expect(config.blobStore).toBe("local");
    expect(config.s3).toBeNull();
    expect(config.publicBaseUrl).toBe("http://localhost:5050");
    expect(config.fallbackBaseUrl).toBe("http://localhost:5050");
    expect(config.fanOutDeadlineMs).toBe(90_000);
    expect(config.retry).toEqual({ timeoutMs: 30_000, maxAttempts: 3, baseDelayMs: 1_000 });
    expect(config.timing).toEqual({ sessionTtlHours: 24, retentionHours: 24 });
    expect(config.providers).toEqual([
      { id: "openai", endpoint: "https://api.openai.com/v1/images/generations", apiKey: undefined, model: "dall-e-3" }
    ]);
  });

  it("reads provider credentials per id and ignores malformed ids", () => {
    const config = loadConfig({
      ...QUIET,
      OPENAI_API_KEY: "test-openai-key",
      BRANDSMITH_IMAGE_PROVIDERS: "openai, Stability-AI,bad id!,openai",
      BRANDSMITH_PROVIDER_STABILITY_AI_API_KEY: "test-secret",
      BRANDSMITH_PROVIDER_STABILITY_AI_ENDPOINT: "https://images.test/v1"
    });
    expect(config.providers).toEqual([
      { id: "openai", endpoint: "https://api.openai.com/v1/images/generations", apiKey: "test-openai-key", model: "dall-e-3" },
      { id: "stability-ai", endpoint: "https://images.test/v1", apiKey: "test-secret", model: undefined }
    ]);
    expect(config.naming.apiKey).toBe("test-openai-key");
  });

  it("bounds numeric settings and ignores unparseable ones", () => {
    const config = loadConfig({ ...QUIET, BRANDSMITH_PROVIDER_MAX_ATTEMPTS: "99", BRANDSMITH_PROVIDER_BASE_DELAY_MS: "soon", PORT: "7000" });
    expect(config.retry.maxAttempts).toBe(6);
    expect(config.retry.baseDelayMs).toBe(1_000);
    expect(config.port).toBe(7000);
    expect(loadConfig({ ...QUIET, BRANDSMITH_SESSION_RETENTION_HOURS: "0" }).timing.retentionHours).toBe(1);
  });

  it("requires a bucket for S3 blob storage", () => {
    expect(() => loadConfig({ ...QUIET, BRANDSMITH_BLOB_STORE: "s3" })).toThrow("BRANDSMITH_BLOB_STORE=s3 requires BRANDSMITH_S3_BUCKET");
    const config = loadConfig({ ...QUIET, BRANDSMITH_BLOB_STORE: "S3", BRANDSMITH_S3_BUCKET: "brand-assets", BRANDSMITH_S3_FORCE_PATH_STYLE: "true" });
    expect(config.s3).toEqual({ bucket: "brand-assets", region: "ap-northeast-2", endpoint: undefined, forcePathStyle: true });
  });

  it("strips trailing slashes from public URLs", () => {
    const config = loadConfig({ ...QUIET, BRANDSMITH_PUBLIC_BASE_URL: "https://brandsmith.test/", BRANDSMITH_FALLBACK_BASE_URL: "https://cdn.test/static//" });
    expect(config.publicBaseUrl).toBe("https://brandsmith.test");
    expect(config.fallbackBaseUrl).toBe("https://cdn.test/static");
  });
});

describe("fan-out timing", () => {
  it("sums every attempt's timeout and every backoff", () => {
    expect(worstCaseCallBudgetMs({ timeoutMs: 30_000, maxAttempts: 3, baseDelayMs: 1_000 })).toBe(93_000);
    expect(worstCaseCallBudgetMs({ timeoutMs: 500, maxAttempts: 1, baseDelayMs: 1_000 })).toBe(500);
  });

  it("caps the deadline at the slots' worst case and the timeout at the deadline", () => {
    expect(clampFanOutTiming(600_000, { timeoutMs: 1_000, maxAttempts: 2, baseDelayMs: 500 })).toEqual({
      deadlineMs: 7_500,
      retry: { timeoutMs: 1_000, maxAttempts: 2, baseDelayMs: 500 }
    });
    expect(clampFanOutTiming(200, { timeoutMs: 5_000, maxAttempts: 3, baseDelayMs: 100 }).retry.timeoutMs).toBe(200);
  });

  it("applies the clamp when loading configuration", () => {
    const config = loadConfig({
      ...QUIET,
      BRANDSMITH_FANOUT_DEADLINE_MS: "600000",
      BRANDSMITH_PROVIDER_TIMEOUT_MS: "1000",
      BRANDSMITH_PROVIDER_MAX_ATTEMPTS: "1"
    });
    expect(config.fanOutDeadlineMs).toBe(3_000);
  });
});

describe("provider registry", () => {
  it("serves offline generators in stub mode", () => {
    const config = loadConfig({ ...QUIET, BRANDSMITH_GENERATION_MODE: "stub", BRANDSMITH_IMAGE_PROVIDERS: "openai,backup" });
    expect(createGeneratorSource(config)().map((g) => g.id)).toEqual(["stub-openai", "stub-backup"]);
    expect(providerStatuses(config)).toEqual([
      { id: "openai", configured: true },
      { id: "backup", configured: true }
    ]);
  });

  it("builds only the providers that have credentials", () => {
    const config = loadConfig({
      ...QUIET,
      BRANDSMITH_IMAGE_PROVIDERS: "openai,backup",
      BRANDSMITH_PROVIDER_BACKUP_API_KEY: "test-secret",
      BRANDSMITH_PROVIDER_BACKUP_ENDPOINT: "https://images.test/v1"
    });
    expect(providerStatuses(config)).toEqual([
      { id: "openai", configured: false },
      { id: "backup", configured: true }
    ]);
    expect(createGeneratorSource(config)().map((g) => g.id)).toEqual(["backup"]);
  });

  it("reports missing credentials when no provider can be built", () => {
    const source = createGeneratorSource(loadConfig(QUIET));
    expect(source).toThrow(TerminalProviderError);
    expect(source).toThrow("openai: No API key configured for provider openai");
  });
});
