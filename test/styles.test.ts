import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { assertFallbackCoverage, FallbackRegistry, loadFallbackCatalog } from "../src/pipeline/fallbacks.js";
import { interiorPrompt, signagePrompt } from "../src/pipeline/prompts.js";
import { chooseStyles, findStyle, loadStyleCatalog, stepCatalog, StyleCatalogSchema, type StyleDefinition } from "../src/pipeline/styles.js";

const catalog = loadStyleCatalog();

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof ValidationError ? err.code : "other";
  }
}

function style(id: string): StyleDefinition {
  return { id, label: id.toUpperCase(), renderStyle: "natural", descriptor: `${id} look` };
}

describe("style selection", () => {
  it("orders styles by the industry's precedence", () => {
    expect(chooseStyles(catalog, 3, "restaurant")).toEqual(["vibrant", "classic", "traditional"]);
    expect(chooseStyles(catalog, 3, "other")).toEqual(["modern", "classic", "vibrant"]);
    expect(chooseStyles(catalog, 4, "restaurant")).toEqual(["cozy", "modern", "industrial"]);
  });

  it("pads a short precedence list with the remaining styles in catalog order", () => {
    const small = StyleCatalogSchema.parse({
      signage: { size: "1024x1024", quality: "hd", styles: ["a", "b", "c", "d"].map(style), industryPrecedence: { retail: ["b"] } },
      interior: { size: "1024x1024", quality: "hd", styles: [style("x")] }
    });
    expect(chooseStyles(small, 3, "retail")).toEqual(["b", "a", "c"]);
    expect(chooseStyles(small, 3, "finance")).toEqual(["a", "b", "c"]);
    expect(chooseStyles(small, 4, "retail")).toEqual(["x"]);
  });

  it("honours an explicit request of one to three distinct known styles", () => {
    expect(chooseStyles(catalog, 3, "restaurant", ["minimal"])).toEqual(["minimal"]);
    expect(codeOf(() => chooseStyles(catalog, 3, "restaurant", []))).toBe("cardinality");
    expect(codeOf(() => chooseStyles(catalog, 3, "restaurant", ["modern", "classic", "vibrant", "minimal"]))).toBe("cardinality");
    expect(codeOf(() => chooseStyles(catalog, 3, "restaurant", ["modern", "modern"]))).toBe("invalid_request");
    expect(codeOf(() => chooseStyles(catalog, 3, "restaurant", ["cozy"]))).toBe("invalid_request");
  });

  it("rejects a catalog whose precedence names unknown styles", () => {
    const parsed = StyleCatalogSchema.safeParse({
      signage: { size: "1024x1024", quality: "hd", styles: [style("a")], industryPrecedence: { retail: ["zzz"] } },
      interior: { size: "1024x1024", quality: "hd", styles: [style("x")] }
    });
    expect(parsed.success).toBe(false);
  });
});

describe("prompt builders", () => {
  const profile = { industry: "restaurant", region: "busan", size: "small", description: "Late-night noodle bar" } as const;

  it("describes the signboard with the catalog's image settings", () => {
    const definition = findStyle(catalog, 3, "vibrant");
    if (!definition) throw new Error("vibrant missing from catalog");
    const spec = signagePrompt({ businessName: "Haneul Noodle", profile, style: definition, catalog: catalog.signage });

    expect(spec.size).toBe("1792x1024");
    expect(spec.quality).toBe("standard");
    expect(spec.style).toBe("vivid");
    expect(spec.prompt).toBe(
      'Storefront signboard for "Haneul Noodle", a small restaurant business in busan, South Korea (Late-night noodle bar). ' +
        "Vibrant style: bold saturated colours, rounded playful lettering, neon accent outline. " +
        "Show the sign mounted on the shop facade in daylight; the business name must be the only text."
    );
  });

  it("ties the interior to the chosen sign and lists its palette", () => {
    const definition = findStyle(catalog, 4, "cozy");
    if (!definition) throw new Error("cozy missing from catalog");
    const spec = interiorPrompt({ businessName: "Haneul Noodle", profile, signageStyle: "vibrant", style: definition, catalog: catalog.interior });
    expect(spec.prompt).toContain("It should feel consistent with the vibrant storefront sign. Colour palette: #F3E9DC, #C08552, #5E3023.");
    expect(spec.style).toBe("natural");
  });
});

describe("FallbackRegistry", () => {
  it("registers a distinct design for every catalog style", () => {
    const fallbacks = loadFallbackCatalog(catalog);
    const registry = new FallbackRegistry(fallbacks, "http://brandsmith.test/");
    for (const step of [3, 4] as const) {
      const styles = stepCatalog(catalog, step).styles.map((s) => s.id);
      const urls = styles.map((id) => registry.variant(step, id, "deadline", "", "2026-03-01T10:00:00.000Z").blob.url);
      expect(new Set(urls).size).toBe(styles.length);
    }
    expect(registry.entry(3, "traditional").key).toBe("fallbacks/signage/traditional.svg");
    expect(() => registry.entry(3, "cozy")).toThrow("No fallback registered for style cozy at step 3");
  });

  it("rejects a fallback catalog that leaves a style uncovered", () => {
    const fallbacks = loadFallbackCatalog(catalog);
    const signage = Object.fromEntries(Object.entries(fallbacks.signage).filter(([id]) => id !== "minimal"));
    expect(() => assertFallbackCoverage({ ...fallbacks, signage }, catalog)).toThrow("Fallback catalog has no entry for: signage/minimal");
  });

  it("builds a fallback variant from the style's entry", () => {
    const registry = new FallbackRegistry(loadFallbackCatalog(), "http://brandsmith.test/");

    const v = registry.variant(4, "luxury", "rate_limit", "luxury interior", "2026-03-01T10:00:00.000Z");
    expect(v).toEqual({
      provider: "fallback",
      style: "luxury",
      prompt: "luxury interior",
      blob: { storage: "fallback", key: "fallbacks/interior/luxury.svg", url: "http://brandsmith.test/fallbacks/interior/luxury.svg" },
      generatedAt: "2026-03-01T10:00:00.000Z",
      isFallback: true,
      fallbackReason: "rate_limit",
      description: "Luxury interior mood board",
      palette: ["#1C1C1C", "#D4AF37", "#F8F4EC"],
      selected: false
    });
  });
});
