import { TerminalProviderError } from "../errors.js";
import type { GeneratorSource, ImageGenerator, PromptSpec } from "../providers/types.js";
import { INTERIOR_STEP, MAX_VARIANTS, type GeneratedVariant, type VariantStep } from "../session/schemas.js";
import { toErrorMessage } from "../utils.js";
import type { BlobPersister } from "./blob_persister.js";
import type { FallbackRegistry } from "./fallbacks.js";

export type FanOutRequest = {
  sessionId: string;
  step: VariantStep;
  styles: readonly string[];
  buildPrompt: (style: string) => PromptSpec;
  deadlineMs: number;
};

export type SlotOutcome = {
  style: string;
  provider: string;
  status: "success" | "fallback";
  attempts: number;
  latencyMs: number;
  errorKind?: string;
  errorMessage?: string;
  storage: GeneratedVariant["blob"]["storage"];
};

export type FanOutResult = {
  variants: GeneratedVariant[];
  outcomes: SlotOutcome[];
  /** True when no generator could be constructed and nothing was called. */
  skipped: boolean;
  deadlineHit: boolean;
  latencyMs: number;
};

type SlotResult =
  | { ok: true; variant: GeneratedVariant; provider: string; attempts: number; latencyMs: number }
  | { ok: false; provider: string; attempts: number; latencyMs: number; reason: string; message: string; prompt: string };

export type FanOutDeps = {
  persister: BlobPersister;
  fallbacks: FallbackRegistry;
  generators: GeneratorSource;
  now?: () => number;
};

export class FanOutOrchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: FanOutDeps) {
    this.now = deps.now ?? Date.now;
  }

  async run(request: FanOutRequest): Promise<FanOutResult> {
    const started = this.now();
    const styles = request.styles.slice(0, MAX_VARIANTS);

    let generators: ImageGenerator[];
    try {
      generators = this.deps.generators();
    } catch (err) {
      if (!(err instanceof TerminalProviderError)) throw err;
      generators = [];
      console.warn(`[fan-out] ${request.sessionId}: no image generator available (${err.message}); using fallbacks`);
    }
    if (generators.length === 0) {
      return this.allFallback(request, styles, "missing_credentials", started);
    }

    const controller = new AbortController();
    const results: (SlotResult | undefined)[] = styles.map(() => undefined);
    let closed = false;

    const tracked = styles.map((style, index) =>
      this.runSlot(request, style, generators[index % generators.length], controller.signal).then((result) => {
        if (!closed) {
          results[index] = result;
          return;
        }
        if (result.ok && result.variant.blob.storage === "durable") {
          console.warn(`[fan-out] ${request.sessionId}: discarding late ${style} result (orphaned key ${result.variant.blob.key})`);
        }
      })
    );

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<"deadline">((resolve) => {
      timer = setTimeout(() => resolve("deadline"), Math.max(0, request.deadlineMs));
    });
    const finished = await Promise.race([Promise.all(tracked).then(() => "done" as const), deadline]);
    clearTimeout(timer);

    // Pending slots stop retrying; an in-flight persist is left to finish on its own.
    closed = true;
    const deadlineHit = finished === "deadline";
    if (deadlineHit) controller.abort();

    const generatedAt = new Date(this.now()).toISOString();
    const variants: GeneratedVariant[] = [];
    const outcomes: SlotOutcome[] = [];

    styles.forEach((style, index) => {
      const result = results[index];
      if (result?.ok) {
        variants.push(result.variant);
        outcomes.push({
          style,
          provider: result.provider,
          status: "success",
          attempts: result.attempts,
          latencyMs: result.latencyMs,
          storage: result.variant.blob.storage
        });
        return;
      }

      const reason = result ? result.reason : "deadline";
      const fallback = this.deps.fallbacks.variant(request.step, style, reason, result?.prompt ?? request.buildPrompt(style).prompt, generatedAt);
      variants.push(fallback);
      outcomes.push({
        style,
        provider: result?.provider ?? generators[index % generators.length].id,
        status: "fallback",
        attempts: result?.attempts ?? 0,
        latencyMs: result ? result.latencyMs : this.now() - started,
        errorKind: reason,
        errorMessage: result ? result.message : `No result within ${request.deadlineMs}ms`,
        storage: "fallback"
      });
    });

    return { variants, outcomes, skipped: false, deadlineHit, latencyMs: this.now() - started };
  }

  private async runSlot(request: FanOutRequest, style: string, generator: ImageGenerator, signal: AbortSignal): Promise<SlotResult> {
    const started = this.now();
    let prompt = "";
    try {
      const spec = request.buildPrompt(style);
      prompt = spec.prompt;
      const result = await generator.generate(spec, { signal });
      if (!result.success) {
        return {
          ok: false,
          provider: generator.id,
          attempts: result.attempts,
          latencyMs: this.now() - started,
          reason: result.error.kind,
          message: result.error.message,
          prompt: result.prompt
        };
      }

      const blob = await this.deps.persister.persist({
        transientUrl: result.url,
        sessionId: request.sessionId,
        namespace: request.step === INTERIOR_STEP ? "interior" : "signage",
        style,
        provider: generator.id
      });
      const variant: GeneratedVariant = {
        provider: generator.id,
        style,
        prompt: result.prompt,
        ...(result.revisedPrompt ? { revisedPrompt: result.revisedPrompt } : {}),
        blob,
        generatedAt: new Date(this.now()).toISOString(),
        isFallback: false,
        selected: false
      };
      return { ok: true, variant, provider: generator.id, attempts: result.attempts, latencyMs: this.now() - started };
    } catch (err) {
      console.warn(`[fan-out] ${request.sessionId}: ${style} slot failed unexpectedly: ${toErrorMessage(err)}`);
      return {
        ok: false,
        provider: generator.id,
        attempts: 0,
        latencyMs: this.now() - started,
        reason: "internal_error",
        message: toErrorMessage(err),
        prompt
      };
    }
  }

  private allFallback(request: FanOutRequest, styles: readonly string[], reason: string, started: number): FanOutResult {
    const generatedAt = new Date(this.now()).toISOString();
    const variants = styles.map((style) => this.deps.fallbacks.variant(request.step, style, reason, request.buildPrompt(style).prompt, generatedAt));
    return {
      variants,
      outcomes: styles.map((style): SlotOutcome => ({
        style,
        provider: "none",
        status: "fallback",
        attempts: 0,
        latencyMs: 0,
        errorKind: reason,
        storage: "fallback"
      })),
      skipped: true,
      deadlineHit: false,
      latencyMs: this.now() - started
    };
  }
}
