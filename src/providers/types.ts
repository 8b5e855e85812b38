import type { ProviderError } from "../errors.js";

export type ImageQuality = "standard" | "hd";
export type RenderStyle = "vivid" | "natural";

/** What a generate call asks for; `style` is the provider's rendering style, not a catalog style. */
export type PromptSpec = {
  prompt: string;
  size: string;
  quality: ImageQuality;
  style: RenderStyle;
};

export type GenerateSuccess = {
  success: true;
  url: string;
  revisedPrompt?: string;
  /** Prompt as actually sent, after sanitation. */
  prompt: string;
  attempts: number;
};

export type GenerateFailure = {
  success: false;
  error: ProviderError;
  prompt: string;
  attempts: number;
};

export type GenerateResult = GenerateSuccess | GenerateFailure;

export type GenerateOptions = {
  signal?: AbortSignal;
};

export interface ImageGenerator {
  readonly id: string;
  generate(spec: PromptSpec, options?: GenerateOptions): Promise<GenerateResult>;
}

/**
 * Builds the generators for one fan-out. Throws TerminalProviderError(missing_credentials) when
 * no generator can be constructed.
 */
export type GeneratorSource = () => ImageGenerator[];

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;
