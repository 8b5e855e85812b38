import type { AppConfig } from "./config.js";
import { BlobPersister } from "./pipeline/blob_persister.js";
import { assertFallbackCoverage, FallbackRegistry, loadFallbackCatalog, type FallbackCatalog } from "./pipeline/fallbacks.js";
import { FanOutOrchestrator } from "./pipeline/fan_out.js";
import { StubNameGenerator, type NameGenerator } from "./pipeline/naming.js";
import { AgentNameGenerator } from "./pipeline/naming_agent.js";
import { ReportWriter } from "./pipeline/report.js";
import { loadStyleCatalog, type StyleCatalog } from "./pipeline/styles.js";
import { createGeneratorSource, providerStatuses, type ProviderStatus } from "./providers/registry.js";
import type { FetchLike, GeneratorSource } from "./providers/types.js";
import { SessionStateCommitter } from "./session/committer.js";
import { FileSessionStore } from "./session/file_session.store.js";
import { VariantSelector } from "./session/selector.js";
import { SessionEvents } from "./session/session_events.js";
import { MemorySessionStore, type SessionStore } from "./session/session_store.js";
import { SessionLane } from "./session_lane.js";
import type { BlobStore } from "./storage/blob_store.js";
import { LocalBlobStore } from "./storage/local_blob.store.js";
import { S3BlobStore } from "./storage/s3_blob.store.js";
import { WorkflowService } from "./workflow.js";

export type HealthInfo = {
  generationMode: AppConfig["generationMode"];
  sessionStore: AppConfig["sessionStore"];
  blobStore: AppConfig["blobStore"];
  providers: ProviderStatus[];
  namingAgent: boolean;
  fanOutDeadlineMs: number;
};

export type Runtime = {
  service: WorkflowService;
  /** Set when blobs are served by this process and read links must be verified here. */
  localBlobs: LocalBlobStore | null;
  health: HealthInfo;
};

export type RuntimeOverrides = {
  store?: SessionStore;
  blobs?: BlobStore;
  generators?: GeneratorSource;
  names?: NameGenerator;
  catalog?: StyleCatalog;
  fallbacks?: FallbackCatalog;
  fetch?: FetchLike;
  now?: () => number;
};

function createBlobStore(config: AppConfig): BlobStore {
  if (config.blobStore === "s3" && config.s3) {
    return new S3BlobStore({
      bucket: config.s3.bucket,
      region: config.s3.region,
      endpoint: config.s3.endpoint,
      forcePathStyle: config.s3.forcePathStyle
    });
  }
  return new LocalBlobStore({ publicBaseUrl: config.publicBaseUrl, signingSecret: config.blobSigningSecret });
}

function createNameGenerator(config: AppConfig): NameGenerator {
  if (config.generationMode === "live" && config.naming.apiKey) {
    return new AgentNameGenerator({ apiKey: config.naming.apiKey, model: config.naming.model });
  }
  if (config.generationMode === "live") console.warn("[naming] OPENAI_API_KEY not set; using the offline name generator");
  return new StubNameGenerator();
}

/** Chooses every capability once, from configuration. */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const now = overrides.now ?? Date.now;
  const store = overrides.store ?? (config.sessionStore === "memory" ? new MemorySessionStore(now) : new FileSessionStore(undefined, now));
  const blobs = overrides.blobs ?? createBlobStore(config);
  const events = new SessionEvents();
  const committer = new SessionStateCommitter({ store, events, now });
  const names = overrides.names ?? createNameGenerator(config);
  const catalog = overrides.catalog ?? loadStyleCatalog();
  const fallbacks = overrides.fallbacks ?? loadFallbackCatalog(catalog);
  if (overrides.fallbacks) assertFallbackCoverage(overrides.fallbacks, catalog);

  const fanOut = new FanOutOrchestrator({
    persister: new BlobPersister(blobs, { downloadTimeoutMs: config.downloadTimeoutMs, fetch: overrides.fetch }),
    fallbacks: new FallbackRegistry(fallbacks, config.fallbackBaseUrl),
    generators: overrides.generators ?? createGeneratorSource(config, { fetch: overrides.fetch }),
    now
  });

  const service = new WorkflowService({
    store,
    blobs,
    events,
    lane: new SessionLane(),
    committer,
    selector: new VariantSelector(committer),
    fanOut,
    catalog,
    names,
    reports: new ReportWriter(blobs, config.presignTtlSeconds),
    timing: config.timing,
    fanOutDeadlineMs: config.fanOutDeadlineMs,
    presignTtlSeconds: config.presignTtlSeconds,
    now
  });

  return {
    service,
    localBlobs: blobs instanceof LocalBlobStore ? blobs : null,
    health: {
      generationMode: config.generationMode,
      sessionStore: config.sessionStore,
      blobStore: config.blobStore,
      providers: providerStatuses(config),
      namingAgent: names.kind === "agent",
      fanOutDeadlineMs: config.fanOutDeadlineMs
    }
  };
}
