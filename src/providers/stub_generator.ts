import { hash32, mulberry32, wait } from "../utils.js";
import { TransientProviderError } from "../errors.js";
import { sanitizePrompt } from "./prompt_sanitizer.js";
import type { GenerateOptions, GenerateResult, ImageGenerator, PromptSpec } from "./types.js";

export type StubImageGeneratorOptions = {
  id: string;
  maxPromptLength: number;
  latencyMs?: number;
};

function escapeXml(text: string): string {
  return text.replace(/[<>&"']/g, (ch) => `&#${ch.charCodeAt(0)};`);
}

function hsl(rand: () => number, lightness: number): string {
  return `hsl(${Math.floor(rand() * 360)}, ${45 + Math.floor(rand() * 40)}%, ${lightness}%)`;
}

/** Deterministic SVG placeholder for a prompt, encoded as a `data:` URL. */
export function placeholderImageUrl(seedText: string, caption: string): string {
  const rand = mulberry32(hash32(seedText));
  const svg = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="1024" height="576" viewBox="0 0 1024 576">`,
    `<rect width="1024" height="576" fill="${hsl(rand, 88)}"/>`,
    `<rect x="112" y="168" width="800" height="240" rx="24" fill="${hsl(rand, 32)}"/>`,
    `<text x="512" y="300" font-family="sans-serif" font-size="48" fill="#ffffff" text-anchor="middle">${escapeXml(caption.slice(0, 40))}</text>`,
    `</svg>`
  ].join("");
  return `data:image/svg+xml;base64,${Buffer.from(svg, "utf8").toString("base64")}`;
}

/** Offline generator used when `BRANDSMITH_GENERATION_MODE=stub`. */
export class StubImageGenerator implements ImageGenerator {
  readonly id: string;
  private readonly maxPromptLength: number;
  private readonly latencyMs: number;

  constructor(options: StubImageGeneratorOptions) {
    this.id = options.id;
    this.maxPromptLength = options.maxPromptLength;
    this.latencyMs = Math.max(0, options.latencyMs ?? 0);
  }

  async generate(spec: PromptSpec, options: GenerateOptions = {}): Promise<GenerateResult> {
    const prompt = sanitizePrompt(spec.prompt, { maxLength: this.maxPromptLength });
    const completed = await wait(this.latencyMs, options.signal).then(
      () => true,
      () => false
    );
    if (!completed) {
      return {
        success: false,
        error: new TransientProviderError(this.id, "timeout", "Aborted by the fan-out deadline"),
        prompt,
        attempts: 1
      };
    }
    return {
      success: true,
      url: placeholderImageUrl(`${this.id}:${prompt}`, `${this.id} ${spec.style}`),
      prompt,
      attempts: 1
    };
  }
}
