import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { SIGNAGE_STEP, type GeneratedVariant, type VariantStep } from "../session/schemas.js";
import { assetsRootAbs, isSafeBlobKey } from "../utils.js";
import { loadStyleCatalog, type StyleCatalog } from "./styles.js";

const FallbackEntrySchema = z.object({
  key: z.string().refine(isSafeBlobKey, "fallback key must be a relative blob key"),
  description: z.string().min(1),
  palette: z.array(z.string()).optional()
});

const StepFallbacksSchema = z.record(FallbackEntrySchema);

export const FallbackCatalogSchema = z.object({
  signage: StepFallbacksSchema,
  interior: StepFallbacksSchema
});

export type FallbackEntry = z.infer<typeof FallbackEntrySchema>;
export type FallbackCatalog = z.infer<typeof FallbackCatalogSchema>;

export function fallbackCatalogPath(): string {
  return path.join(assetsRootAbs(), "fallbacks.json");
}

/** Every style the catalog can choose needs its own entry; selection is by URL. */
export function assertFallbackCoverage(fallbacks: FallbackCatalog, styles: StyleCatalog): void {
  const missing: string[] = [];
  for (const step of ["signage", "interior"] as const) {
    for (const style of styles[step].styles) {
      if (!fallbacks[step][style.id]) missing.push(`${step}/${style.id}`);
    }
  }
  if (missing.length > 0) throw new Error(`Fallback catalog has no entry for: ${missing.join(", ")}`);
}

export function loadFallbackCatalog(styles: StyleCatalog = loadStyleCatalog(), file = fallbackCatalogPath()): FallbackCatalog {
  const catalog = FallbackCatalogSchema.parse(JSON.parse(readFileSync(file, "utf8")));
  assertFallbackCoverage(catalog, styles);
  return catalog;
}

export type FallbackReason = string;

/** Pre-registered substitutes, one per (step, style). Building one never calls out. */
export class FallbackRegistry {
  constructor(
    private readonly catalog: FallbackCatalog,
    private readonly baseUrl: string
  ) {}

  entry(step: VariantStep, style: string): FallbackEntry {
    const entry = (step === SIGNAGE_STEP ? this.catalog.signage : this.catalog.interior)[style];
    if (!entry) throw new Error(`No fallback registered for style ${style} at step ${step}`);
    return entry;
  }

  url(key: string): string {
    return `${this.baseUrl.replace(/\/+$/, "")}/${key}`;
  }

  variant(step: VariantStep, style: string, reason: FallbackReason, prompt: string, generatedAt: string): GeneratedVariant {
    const entry = this.entry(step, style);
    return {
      provider: "fallback",
      style,
      prompt,
      blob: { storage: "fallback", key: entry.key, url: this.url(entry.key) },
      generatedAt,
      isFallback: true,
      fallbackReason: reason,
      description: entry.description,
      ...(entry.palette ? { palette: [...entry.palette] } : {}),
      selected: false
    };
  }
}
