import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { FanOutOrchestrator, FanOutResult } from "./pipeline/fan_out.js";
import type { NameGenerator } from "./pipeline/naming.js";
import { interiorPrompt, signagePrompt } from "./pipeline/prompts.js";
import type { ReportManifest, ReportWriter } from "./pipeline/report.js";
import { chooseStyles, findStyle, stepCatalog, type StyleCatalog } from "./pipeline/styles.js";
import type { PromptSpec } from "./providers/types.js";
import { variantSetOf, type SessionStateCommitter } from "./session/committer.js";
import { assertActive, assertStepTarget, executionRecord, parseProfile, type SessionTiming } from "./session/lifecycle.js";
import {
  FIRST_STEP,
  INTERIOR_STEP,
  LAST_STEP,
  MAX_NAME_REGENERATIONS,
  MAX_NAME_SUGGESTIONS,
  SESSION_STATUSES,
  SIGNAGE_STEP,
  stepName,
  type BusinessProfile,
  type ExecutionStatus,
  type NameSuggestion,
  type ReportManifestRef,
  type SessionStatus,
  type StepName,
  type VariantSet,
  type VariantStep,
  type WorkflowSession
} from "./session/schemas.js";
import type { SessionEvents } from "./session/session_events.js";
import type { SessionListItem, SessionStore } from "./session/session_store.js";
import type { SelectResponse, VariantSelector } from "./session/selector.js";
import type { SessionLane } from "./session_lane.js";
import { readUrlFor, SESSION_BLOB_NAMESPACES, sessionPrefix, type BlobStore } from "./storage/blob_store.js";
import { toErrorMessage } from "./utils.js";

export const CreateSessionBodySchema = z.object({ profile: z.unknown() }).strict();

export const GenerateRequestSchema = z
  .object({
    sessionId: z.string().uuid(),
    action: z.enum(["generate", "select"]).default("generate"),
    priorStepArtifact: z.string().min(1).optional(),
    businessProfile: z.unknown().optional(),
    selectedVariantUrl: z.string().min(1).optional(),
    styles: z.array(z.string()).optional()
  })
  .strict();

export const SelectRequestSchema = z
  .object({
    sessionId: z.string().uuid(),
    selectedVariantUrl: z.string().min(1)
  })
  .strict();

export const SelectNameBodySchema = z.object({ name: z.string().trim().min(1) }).strict();
export const FailBodySchema = z.object({ reason: z.string().trim().min(1).max(1000) }).strict();
export const CleanupBodySchema = z.object({ dryRun: z.boolean().optional() }).strict();

export const ListSessionsQuerySchema = z
  .object({
    status: z.enum(SESSION_STATUSES).optional(),
    step: z.coerce.number().int().min(FIRST_STEP).max(LAST_STEP).optional(),
    limit: z.coerce.number().int().min(1).max(200).default(50)
  })
  .strict();

export type GenerateRequest = z.input<typeof GenerateRequestSchema>;

export type ResponseVariant = {
  url: string;
  previewUrl: string;
  provider: string;
  style: string;
  isFallback: boolean;
  fallbackReason?: string;
  storage: "durable" | "provider" | "fallback";
  selected: boolean;
};

export type GenerateResponse = {
  sessionId: string;
  step: number;
  generation: number;
  variants: ResponseVariant[];
  totalGenerated: number;
  canProceed: boolean;
  message: string;
};

export type CompleteResponse = {
  session: WorkflowSession;
  report: ReportManifestRef;
  manifest: ReportManifest;
};

export type CleanupResult = {
  dryRun: boolean;
  expired: string[];
  removed: string[];
  deletedBlobs: number;
};

export type SessionStatistics = {
  total: number;
  byStatus: Record<SessionStatus, number>;
  byStep: Record<StepName, number>;
};

export type WorkflowDeps = {
  store: SessionStore;
  blobs: BlobStore;
  events: SessionEvents;
  lane: SessionLane;
  committer: SessionStateCommitter;
  selector: VariantSelector;
  fanOut: FanOutOrchestrator;
  catalog: StyleCatalog;
  names: NameGenerator;
  reports: ReportWriter;
  timing: SessionTiming;
  fanOutDeadlineMs: number;
  presignTtlSeconds: number;
  now?: () => number;
};

export function parseBody<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
    throw new ValidationError("invalid_request", issues);
  }
  return parsed.data;
}

function isVariantStep(step: number): step is VariantStep {
  return step === SIGNAGE_STEP || step === INTERIOR_STEP;
}

function sameProfile(a: BusinessProfile, b: BusinessProfile): boolean {
  return a.industry === b.industry && a.region === b.region && a.size === b.size && (a.description ?? "") === (b.description ?? "");
}

function fanOutStatus(result: FanOutResult): ExecutionStatus {
  const fallbacks = result.outcomes.filter((o) => o.status === "fallback").length;
  if (fallbacks === 0) return "success";
  if (result.deadlineHit) return "timeout";
  return fallbacks === result.outcomes.length ? "error" : "success";
}

function generateMessage(label: string, total: number, fallbacks: number, skipped: boolean): string {
  if (skipped) return `Image generation is unavailable; showing ${total} ready-made ${label} designs`;
  if (fallbacks === 0) return `Generated ${total} ${label} variants`;
  if (fallbacks === total) return `All ${label} providers failed; showing ${total} ready-made designs`;
  return `Generated ${total - fallbacks} of ${total} ${label} variants; ${fallbacks} replaced by ready-made designs`;
}

/**
 * The workflow entry points used by the HTTP layer. Every operation that touches a session runs
 * in that session's lane.
 */
export class WorkflowService {
  private readonly now: () => number;

  constructor(private readonly deps: WorkflowDeps) {
    this.now = deps.now ?? Date.now;
  }

  get events(): SessionEvents {
    return this.deps.events;
  }

  async createSession(body: unknown): Promise<WorkflowSession> {
    const { profile } = parseBody(CreateSessionBodySchema, body);
    return this.deps.committer.create(profile, this.deps.timing);
  }

  async getSession(sessionId: string): Promise<WorkflowSession> {
    return this.deps.lane.run(sessionId, () => this.deps.committer.refresh(sessionId));
  }

  /** Newest first, optionally narrowed to one status or one current step. */
  async listSessions(query: unknown = {}): Promise<SessionListItem[]> {
    const { status, step, limit } = parseBody(ListSessionsQuerySchema, query);
    const items = await this.deps.store.list();
    return items
      .filter((item) => (status === undefined || item.status === status) && (step === undefined || item.currentStep === step))
      .slice(0, limit);
  }

  async sessionStatistics(): Promise<SessionStatistics> {
    const byStatus: Record<SessionStatus, number> = { active: 0, completed: 0, failed: 0, expired: 0 };
    const byStep: Record<StepName, number> = { analysis: 0, naming: 0, signage: 0, interior: 0, report: 0 };
    const items = await this.deps.store.list();
    for (const item of items) {
      byStatus[item.status] += 1;
      byStep[stepName(item.currentStep)] += 1;
    }
    return { total: items.length, byStatus, byStep };
  }

  async recordAnalysis(sessionId: string, analysis: unknown): Promise<WorkflowSession> {
    return this.deps.lane.run(sessionId, async () => {
      const saved = await this.deps.committer.commitAnalysis(sessionId, analysis);
      this.deps.events.log(sessionId, "Analysis recorded", "analysis");
      return saved;
    });
  }

  async generateNames(sessionId: string): Promise<WorkflowSession> {
    return this.deps.lane.run(sessionId, async () => {
      const session = await this.deps.committer.load(sessionId);
      assertActive(session);
      assertStepTarget(session.currentStep, 2);
      if (!session.analysis) throw new ValidationError("step_order", "Record the analysis before generating names");
      if (session.names && session.names.regenerationCount >= MAX_NAME_REGENERATIONS) {
        throw new ValidationError("regeneration_limit", `Names can be regenerated at most ${MAX_NAME_REGENERATIONS} times`);
      }

      const tool = this.deps.names.kind === "agent" ? "brand_namer_agent" : "stub_namer";
      const exclude = session.names?.excludedNames ?? [];
      const started = this.now();
      this.deps.events.log(sessionId, `Generating names (${exclude.length} excluded)`, "naming");

      let suggestions: NameSuggestion[];
      try {
        suggestions = await this.deps.names.generate({
          profile: session.profile,
          analysis: session.analysis,
          exclude,
          count: MAX_NAME_SUGGESTIONS
        });
      } catch (err) {
        const message = toErrorMessage(err);
        this.deps.events.error(sessionId, `Name generation failed: ${message}`, "naming");
        await this.deps.committer.appendExecution(
          sessionId,
          executionRecord({ agent: "naming", tool, status: "error", latencyMs: this.now() - started, errorMessage: message })
        );
        throw err;
      }
      if (suggestions.length === 0) {
        throw new ValidationError("invalid_request", "No new names could be generated; every candidate was already suggested");
      }

      return this.deps.committer.commitNames(
        sessionId,
        suggestions,
        executionRecord({
          agent: "naming",
          tool,
          status: "success",
          latencyMs: this.now() - started,
          metadata: { count: suggestions.length, excluded: exclude.length }
        })
      );
    });
  }

  async selectName(sessionId: string, body: unknown): Promise<WorkflowSession> {
    const { name } = parseBody(SelectNameBodySchema, body);
    return this.deps.lane.run(sessionId, () => this.deps.committer.commitNameSelection(sessionId, name));
  }

  async handleSelect(body: unknown): Promise<SelectResponse> {
    const request = parseBody(SelectRequestSchema, body);
    return this.deps.lane.run(request.sessionId, async () => {
      const response = await this.deps.selector.select(request);
      this.deps.events.log(request.sessionId, `Variant selected; next step ${response.nextStep}`);
      return response;
    });
  }

  async handleGenerate(body: unknown): Promise<GenerateResponse> {
    const request = parseBody(GenerateRequestSchema, body);

    if (request.action === "select") {
      if (!request.selectedVariantUrl) throw new ValidationError("invalid_request", "selectedVariantUrl is required to select");
      const selectedVariantUrl = request.selectedVariantUrl;
      return this.deps.lane.run(request.sessionId, async () => {
        const selection = await this.deps.selector.select({ sessionId: request.sessionId, selectedVariantUrl });
        const session = await this.deps.committer.refresh(request.sessionId);
        const step = selection.nextStep - 1;
        const set = isVariantStep(step) ? variantSetOf(session, step) : undefined;
        return this.response(session, step, set, `Selected variant; continue with step ${selection.nextStep}`);
      });
    }

    return this.deps.lane.runGeneration(request.sessionId, async () => {
      const session = await this.deps.committer.load(request.sessionId);
      assertActive(session);
      if (request.businessProfile !== undefined && !sameProfile(parseProfile(request.businessProfile), session.profile)) {
        throw new ValidationError("invalid_request", "businessProfile does not match the session; the profile cannot change");
      }

      const step = session.currentStep;
      if (!isVariantStep(step)) {
        throw new ValidationError("step_order", `Step ${step} (${stepName(step)}) does not generate images`);
      }
      const prior = this.priorArtifact(session, step);
      if (request.priorStepArtifact !== undefined && request.priorStepArtifact !== prior) {
        throw new ValidationError("invalid_request", `priorStepArtifact does not match the ${step === SIGNAGE_STEP ? "selected name" : "selected signage"}`);
      }

      const styles = chooseStyles(this.deps.catalog, step, session.profile.industry, request.styles);
      const buildPrompt = this.promptBuilder(session, step);
      const label = stepName(step);
      this.deps.events.log(session.sessionId, `Generating ${styles.length} ${label} variants (${styles.join(", ")})`, label);

      const result = await this.deps.fanOut.run({
        sessionId: session.sessionId,
        step,
        styles,
        buildPrompt,
        deadlineMs: this.deps.fanOutDeadlineMs
      });

      const fallbackCount = result.outcomes.filter((o) => o.status === "fallback").length;
      const status = fanOutStatus(result);
      const failures = result.outcomes.filter((o) => o.errorKind).map((o) => `${o.style}: ${o.errorKind}`);
      const execution = executionRecord({
        agent: label,
        tool: "fan_out",
        status,
        latencyMs: result.latencyMs,
        ...(failures.length > 0 ? { errorMessage: failures.join("; ") } : {}),
        metadata: {
          styles,
          fallbackCount,
          deadlineHit: result.deadlineHit,
          skipped: result.skipped,
          providers: result.outcomes.map((o) => o.provider),
          attempts: result.outcomes.map((o) => o.attempts),
          storage: result.outcomes.map((o) => o.storage)
        }
      });
      if (fallbackCount > 0) {
        this.deps.events.error(session.sessionId, `${fallbackCount} ${label} slot(s) fell back (${failures.join("; ")})`, label);
      }

      const saved = await this.deps.committer.commitVariants(session.sessionId, {
        step,
        targetStep: step,
        variants: result.variants,
        execution
      });
      return this.response(saved, step, variantSetOf(saved, step), generateMessage(label, result.variants.length, fallbackCount, result.skipped));
    });
  }

  private priorArtifact(session: WorkflowSession, step: VariantStep): string | undefined {
    return step === SIGNAGE_STEP ? session.names?.selectedName : session.signage?.selectedUrl;
  }

  private promptBuilder(session: WorkflowSession, step: VariantStep): (style: string) => PromptSpec {
    const businessName = session.names?.selectedName;
    if (!businessName) throw new ValidationError("step_order", `${stepName(step)} needs a selected business name`);
    const catalog = stepCatalog(this.deps.catalog, step);

    if (step === SIGNAGE_STEP) {
      return (style) => {
        const definition = findStyle(this.deps.catalog, step, style);
        if (!definition) throw new ValidationError("invalid_request", `Unknown style ${style}`);
        return signagePrompt({ businessName, profile: session.profile, style: definition, catalog });
      };
    }

    const signageStyle = session.signage?.variants.find((v) => v.selected)?.style;
    if (!signageStyle) throw new ValidationError("step_order", "Interior needs a selected signage variant");
    return (style) => {
      const definition = findStyle(this.deps.catalog, step, style);
      if (!definition) throw new ValidationError("invalid_request", `Unknown style ${style}`);
      return interiorPrompt({ businessName, profile: session.profile, signageStyle, style: definition, catalog });
    };
  }

  private async response(session: WorkflowSession, step: number, set: VariantSet | undefined, message: string): Promise<GenerateResponse> {
    const variants: ResponseVariant[] = [];
    for (const v of set?.variants ?? []) {
      variants.push({
        url: v.blob.url,
        previewUrl: await readUrlFor(this.deps.blobs, v.blob, this.deps.presignTtlSeconds),
        provider: v.provider,
        style: v.style,
        isFallback: v.isFallback,
        ...(v.fallbackReason ? { fallbackReason: v.fallbackReason } : {}),
        storage: v.blob.storage,
        selected: v.selected
      });
    }
    return {
      sessionId: session.sessionId,
      step,
      generation: set?.generation ?? 0,
      variants,
      totalGenerated: variants.filter((v) => !v.isFallback).length,
      canProceed: session.status === "active" && variants.length > 0,
      message
    };
  }

  async failSession(sessionId: string, body: unknown): Promise<WorkflowSession> {
    const { reason } = parseBody(FailBodySchema, body);
    return this.deps.lane.run(sessionId, async () => {
      const saved = await this.deps.committer.markFailed(sessionId, reason);
      this.deps.events.error(sessionId, `Session failed: ${reason}`);
      return saved;
    });
  }

  async completeSession(sessionId: string): Promise<CompleteResponse> {
    return this.deps.lane.run(sessionId, async () => {
      const session = await this.deps.committer.load(sessionId);
      assertActive(session);
      const started = this.now();
      const written = await this.deps.reports.write(session, new Date(started));
      const report: ReportManifestRef = { key: written.key, url: written.url, generatedAt: written.generatedAt };
      const saved = await this.deps.committer.commitReport(
        sessionId,
        report,
        executionRecord({
          agent: "report",
          tool: "write_manifest",
          status: "success",
          latencyMs: this.now() - started,
          metadata: { key: written.key }
        })
      );
      this.deps.events.log(sessionId, `Report written to ${written.key}`, "report");
      return { session: saved, report, manifest: written.manifest };
    });
  }

  /** Marks overdue sessions Expired, then removes records past their ttl along with their blobs. */
  async cleanup(body: unknown): Promise<CleanupResult> {
    const dryRun = parseBody(CleanupBodySchema, body ?? {}).dryRun ?? false;
    const nowMs = this.now();

    const removed = await this.deps.store.sweep(nowMs, { dryRun });
    let deletedBlobs = 0;
    if (!dryRun) {
      for (const sessionId of removed) {
        for (const namespace of SESSION_BLOB_NAMESPACES) {
          deletedBlobs += await this.deps.blobs.deletePrefix(sessionPrefix(namespace, sessionId));
        }
      }
    }

    const expired: string[] = [];
    for (const item of await this.deps.store.list()) {
      if (item.status !== "active" || Date.parse(item.expiresAt) >= nowMs) continue;
      if (dryRun) {
        expired.push(item.sessionId);
        continue;
      }
      if (await this.deps.lane.run(item.sessionId, () => this.deps.committer.expireIfDue(item.sessionId))) {
        expired.push(item.sessionId);
      }
    }

    if (!dryRun && (removed.length > 0 || expired.length > 0)) {
      console.log(`[cleanup] expired ${expired.length} session(s), removed ${removed.length}, deleted ${deletedBlobs} blob(s)`);
    }
    return { dryRun, expired, removed, deletedBlobs };
  }
}
