import { z } from "zod";
import type { RetryPolicy } from "../config.js";
import { ProviderError, TerminalProviderError, TransientProviderError } from "../errors.js";
import { toErrorMessage, wait } from "../utils.js";
import { sanitizePrompt } from "./prompt_sanitizer.js";
import type { FetchLike, GenerateOptions, GenerateResult, ImageGenerator, PromptSpec, SleepFn } from "./types.js";

export type ProviderClientOptions = {
  id: string;
  endpoint: string;
  apiKey?: string;
  model?: string;
  maxPromptLength: number;
  policy: RetryPolicy;
  fetch?: FetchLike;
  sleep?: SleepFn;
};

const DirectResponseSchema = z.object({
  imageURL: z.string().min(1),
  revisedPrompt: z.string().optional()
});

const ImagesApiResponseSchema = z.object({
  data: z
    .array(
      z.object({
        url: z.string().min(1),
        revised_prompt: z.string().optional()
      })
    )
    .min(1)
});

type ParsedImage = { url: string; revisedPrompt?: string };

function parseImageResponse(body: unknown): ParsedImage | null {
  const direct = DirectResponseSchema.safeParse(body);
  if (direct.success) return { url: direct.data.imageURL, revisedPrompt: direct.data.revisedPrompt };
  const images = ImagesApiResponseSchema.safeParse(body);
  if (images.success) {
    const [first] = images.data.data;
    return { url: first.url, revisedPrompt: first.revised_prompt };
  }
  return null;
}

export function backoffDelayMs(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * One external image-generation API. Each call sanitizes the prompt, then retries rate limits,
 * server errors, timeouts and transport failures with exponential backoff. Any other 4xx is
 * terminal. The client keeps no state between calls.
 */
export class ProviderClient implements ImageGenerator {
  readonly id: string;
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly model?: string;
  private readonly maxPromptLength: number;
  private readonly policy: RetryPolicy;
  private readonly fetchFn: FetchLike;
  private readonly sleep: SleepFn;

  constructor(options: ProviderClientOptions) {
    this.id = options.id;
    const apiKey = options.apiKey?.trim();
    if (!apiKey) {
      throw new TerminalProviderError(options.id, "missing_credentials", `No API key configured for provider ${options.id}`);
    }
    if (!options.endpoint) {
      throw new TerminalProviderError(options.id, "missing_credentials", `No endpoint configured for provider ${options.id}`);
    }
    this.apiKey = apiKey;
    this.endpoint = options.endpoint;
    this.model = options.model;
    this.maxPromptLength = options.maxPromptLength;
    this.policy = { ...options.policy, maxAttempts: Math.max(1, options.policy.maxAttempts) };
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? wait;
  }

  async generate(spec: PromptSpec, options: GenerateOptions = {}): Promise<GenerateResult> {
    const signal = options.signal;
    const prompt = sanitizePrompt(spec.prompt, { maxLength: this.maxPromptLength });
    const body = JSON.stringify({
      ...(this.model ? { model: this.model } : {}),
      prompt,
      size: spec.size,
      quality: spec.quality,
      style: spec.style,
      n: 1
    });

    let attempts = 0;
    let lastError: ProviderError | null = null;

    for (let attempt = 0; attempt < this.policy.maxAttempts; attempt++) {
      if (signal?.aborted) break;
      attempts++;
      const outcome = await this.attempt(body, signal).then(
        (image) => ({ ok: true as const, image }),
        (err: unknown) => ({ ok: false as const, error: this.classify(err) })
      );
      if (outcome.ok) {
        return { success: true, url: outcome.image.url, revisedPrompt: outcome.image.revisedPrompt, prompt, attempts };
      }

      const error = outcome.error;
      lastError = error;
      if (!error.retryable || attempt === this.policy.maxAttempts - 1) break;

      const delay = backoffDelayMs(this.policy.baseDelayMs, attempt);
      console.warn(
        `[provider:${this.id}] attempt ${attempts}/${this.policy.maxAttempts} failed (${error.kind}); retrying in ${delay}ms`
      );
      const slept = await this.sleep(delay, signal).then(
        () => true,
        () => false
      );
      if (!slept) break;
    }

    return {
      success: false,
      error: lastError ?? new TransientProviderError(this.id, "timeout", "Cancelled before the first attempt"),
      prompt,
      attempts
    };
  }

  private async attempt(body: string, outer?: AbortSignal): Promise<ParsedImage> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.policy.timeoutMs);
    const onOuterAbort = () => controller.abort();
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    try {
      let res: Response;
      try {
        res = await this.fetchFn(this.endpoint, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${this.apiKey}`
          },
          body,
          signal: controller.signal
        });
      } catch (err) {
        if (timedOut) throw new TransientProviderError(this.id, "timeout", `Timed out after ${this.policy.timeoutMs}ms`);
        if (outer?.aborted) throw new TransientProviderError(this.id, "timeout", "Aborted by the fan-out deadline");
        throw new TransientProviderError(this.id, "network_error", toErrorMessage(err));
      }

      if (res.status === 429) {
        throw new TransientProviderError(this.id, "rate_limit", "Rate limited (HTTP 429)", res.status);
      }
      if (res.status >= 500) {
        throw new TransientProviderError(this.id, "server_error", `Server error (HTTP ${res.status})`, res.status);
      }
      if (res.status >= 400) {
        const detail = await res.text().catch(() => "");
        throw new TerminalProviderError(
          this.id,
          "invalid_prompt",
          `Request rejected (HTTP ${res.status})${detail ? `: ${detail.slice(0, 200)}` : ""}`,
          res.status
        );
      }
      if (!res.ok) {
        throw new TransientProviderError(this.id, "server_error", `Unexpected HTTP ${res.status}`, res.status);
      }

      let payload: unknown;
      try {
        payload = await res.json();
      } catch (err) {
        if (timedOut) throw new TransientProviderError(this.id, "timeout", `Timed out after ${this.policy.timeoutMs}ms`);
        throw new TransientProviderError(this.id, "server_error", `Unreadable response body: ${toErrorMessage(err)}`, res.status);
      }

      const image = parseImageResponse(payload);
      if (!image) throw new TransientProviderError(this.id, "server_error", "Response did not contain an image URL", res.status);
      return image;
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    }
  }

  private classify(err: unknown): ProviderError {
    if (err instanceof ProviderError) return err;
    return new TransientProviderError(this.id, "network_error", toErrorMessage(err));
  }
}
