import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { INDUSTRIES, MAX_VARIANTS, SIGNAGE_STEP, type Industry, type VariantStep } from "../session/schemas.js";
import { assetsRootAbs } from "../utils.js";

const StyleSchema = z.object({
  id: z.string().regex(/^[a-z0-9_-]+$/),
  label: z.string().min(1),
  renderStyle: z.enum(["vivid", "natural"]),
  descriptor: z.string().min(1),
  palette: z.array(z.string()).optional()
});

const StepCatalogSchema = z
  .object({
    size: z.string().min(1),
    quality: z.enum(["standard", "hd"]),
    styles: z.array(StyleSchema).min(1),
    industryPrecedence: z.record(z.enum(INDUSTRIES), z.array(z.string())).default({})
  })
  .superRefine((step, ctx) => {
    const known = new Set(step.styles.map((s) => s.id));
    if (known.size !== step.styles.length) ctx.addIssue({ code: "custom", message: "duplicate style id" });
    for (const [industry, order] of Object.entries(step.industryPrecedence)) {
      const unknown = order.filter((id) => !known.has(id));
      if (unknown.length > 0) ctx.addIssue({ code: "custom", message: `${industry} references unknown styles: ${unknown.join(", ")}` });
    }
  });

export const StyleCatalogSchema = z.object({
  signage: StepCatalogSchema,
  interior: StepCatalogSchema
});

export type StyleDefinition = z.infer<typeof StyleSchema>;
export type StepCatalog = z.infer<typeof StepCatalogSchema>;
export type StyleCatalog = z.infer<typeof StyleCatalogSchema>;

let cached: { file: string; catalog: StyleCatalog } | null = null;

export function styleCatalogPath(): string {
  return path.join(assetsRootAbs(), "style_catalog.json");
}

export function loadStyleCatalog(file = styleCatalogPath()): StyleCatalog {
  if (cached && cached.file === file) return cached.catalog;
  const catalog = StyleCatalogSchema.parse(JSON.parse(readFileSync(file, "utf8")));
  cached = { file, catalog };
  return catalog;
}

export function stepCatalog(catalog: StyleCatalog, step: VariantStep): StepCatalog {
  return step === SIGNAGE_STEP ? catalog.signage : catalog.interior;
}

export function findStyle(catalog: StyleCatalog, step: VariantStep, styleId: string): StyleDefinition | undefined {
  return stepCatalog(catalog, step).styles.find((s) => s.id === styleId);
}

/**
 * An explicit request (1..3 distinct known styles) wins. Otherwise the industry's precedence list
 * comes first, padded with the remaining styles in catalog order.
 */
export function chooseStyles(catalog: StyleCatalog, step: VariantStep, industry: Industry, requested?: readonly string[]): string[] {
  const entry = stepCatalog(catalog, step);
  const known = entry.styles.map((s) => s.id);

  if (requested !== undefined) {
    if (requested.length < 1 || requested.length > MAX_VARIANTS) {
      throw new ValidationError("cardinality", `Request between 1 and ${MAX_VARIANTS} styles (got ${requested.length})`);
    }
    if (new Set(requested).size !== requested.length) {
      throw new ValidationError("invalid_request", "Requested styles must be distinct");
    }
    const unknown = requested.filter((id) => !known.includes(id));
    if (unknown.length > 0) {
      throw new ValidationError("invalid_request", `Unknown styles: ${unknown.join(", ")} (known: ${known.join(", ")})`);
    }
    return [...requested];
  }

  const ordered: string[] = [];
  for (const id of [...(entry.industryPrecedence[industry] ?? []), ...known]) {
    if (!ordered.includes(id)) ordered.push(id);
  }
  return ordered.slice(0, MAX_VARIANTS);
}
