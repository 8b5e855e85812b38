import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { INDUSTRIES, NameSuggestionSchema, type AnalysisResult, type BusinessProfile, type NameSuggestion } from "../session/schemas.js";
import { assetsRootAbs, hash32, mulberry32 } from "../utils.js";

export type NameGenerationInput = {
  profile: BusinessProfile;
  analysis?: AnalysisResult;
  /** Names already suggested in this session; never suggested again. */
  exclude: readonly string[];
  count: number;
  signal?: AbortSignal;
};

export interface NameGenerator {
  readonly kind: "agent" | "stub";
  generate(input: NameGenerationInput): Promise<NameSuggestion[]>;
}

export function nameKey(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Drops invalid, duplicate and excluded names, then caps at `count`. */
export function normalizeSuggestions(raw: readonly unknown[], exclude: readonly string[], count: number): NameSuggestion[] {
  const seen = new Set(exclude.map(nameKey));
  const out: NameSuggestion[] = [];
  for (const item of raw) {
    const parsed = NameSuggestionSchema.safeParse(item);
    if (!parsed.success) continue;
    const key = nameKey(parsed.data.name);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(parsed.data);
    if (out.length >= count) break;
  }
  return out;
}

const PartsSchema = z.object({
  prefixes: z.array(z.string().min(1)).min(1),
  suffixes: z.array(z.string().min(1)).min(1)
});

const NamePartsSchema = z.object({
  common: PartsSchema,
  industries: z.record(z.enum(INDUSTRIES), PartsSchema).default({})
});

export type NameParts = z.infer<typeof NamePartsSchema>;

export function loadNameParts(file = path.join(assetsRootAbs(), "name_parts.json")): NameParts {
  return NamePartsSchema.parse(JSON.parse(readFileSync(file, "utf8")));
}

const MAX_CANDIDATES = 200;

/** Deterministic offline generator: same profile and exclusions give the same names. */
export class StubNameGenerator implements NameGenerator {
  readonly kind = "stub";

  constructor(private readonly parts: NameParts = loadNameParts()) {}

  async generate(input: NameGenerationInput): Promise<NameSuggestion[]> {
    const { profile } = input;
    const industry = this.parts.industries[profile.industry];
    const prefixes = [...(industry?.prefixes ?? []), ...this.parts.common.prefixes];
    const suffixes = [...(industry?.suffixes ?? []), ...this.parts.common.suffixes];
    const rand = mulberry32(hash32(`${profile.industry}|${profile.region}|${profile.size}|${input.exclude.map(nameKey).sort().join(",")}`));
    const pick = (list: readonly string[]) => list[Math.floor(rand() * list.length)];
    const score = () => 60 + Math.floor(rand() * 40);

    const seen = new Set(input.exclude.map(nameKey));
    const out: NameSuggestion[] = [];
    for (let i = 0; i < MAX_CANDIDATES && out.length < input.count; i++) {
      const name = `${pick(prefixes)} ${pick(suffixes)}`;
      if (seen.has(nameKey(name))) continue;
      seen.add(nameKey(name));
      const pronunciationScore = score();
      const searchScore = score();
      out.push({
        name,
        description: `${name}: a ${profile.industry} name that reads easily on a ${profile.region} street sign`,
        pronunciationScore,
        searchScore,
        overallScore: Math.round((pronunciationScore + searchScore) / 2)
      });
    }
    return out;
  }
}
