import { Agent, Runner, setDefaultOpenAIKey } from "@openai/agents";
import { z } from "zod";
import { normalizeSuggestions, type NameGenerationInput, type NameGenerator } from "./naming.js";
import type { NameSuggestion } from "../session/schemas.js";

export const NamingAgentOutputSchema = z.object({
  suggestions: z.array(
    z.object({
      name: z.string(),
      description: z.string(),
      pronunciationScore: z.number(),
      searchScore: z.number(),
      overallScore: z.number()
    })
  )
});

export function makeNamingAgent(model: string) {
  return new Agent({
    name: "Brand Namer",
    handoffDescription: "Suggests business names for a small business.",
    model,
    modelSettings: { temperature: 0.8 },
    tools: [],
    outputType: NamingAgentOutputSchema,
    instructions: `You are the Brand Namer.

You will receive a business profile, an optional market analysis summary and a list of names that must not be used.

Rules:
- Suggest short, memorable business names that work on a storefront sign in South Korea.
- Never repeat or lightly modify a name from the excluded list.
- For each name give a one-sentence description and three scores from 0 to 100:
  pronunciationScore, searchScore, overallScore.
- Return ONLY valid JSON matching the output schema, with top-level key suggestions.
- No extra keys.`
  });
}

export function namingPrompt(input: NameGenerationInput): string {
  const lines = [
    `BUSINESS PROFILE`,
    `industry: ${input.profile.industry}`,
    `region: ${input.profile.region}`,
    `size: ${input.profile.size}`
  ];
  if (input.profile.description) lines.push(`description: ${input.profile.description}`);
  if (input.analysis) {
    lines.push("", "MARKET ANALYSIS", input.analysis.summary, ...input.analysis.insights.map((i) => `- ${i}`));
  }
  lines.push("", `EXCLUDED NAMES`, input.exclude.length > 0 ? input.exclude.join(", ") : "(none)");
  // Ask for extras so exclusions and duplicates still leave enough names.
  lines.push("", `Suggest ${input.count + 2} names.`);
  return lines.join("\n");
}

export class AgentNameGenerator implements NameGenerator {
  readonly kind = "agent";
  private readonly agent: ReturnType<typeof makeNamingAgent>;
  private readonly runner = new Runner();

  constructor(options: { apiKey: string; model: string }) {
    setDefaultOpenAIKey(options.apiKey);
    this.agent = makeNamingAgent(options.model);
  }

  async generate(input: NameGenerationInput): Promise<NameSuggestion[]> {
    const result = await this.runner.run(this.agent, namingPrompt(input), { maxTurns: 2, signal: input.signal });
    const output = NamingAgentOutputSchema.safeParse(result.finalOutput);
    if (!output.success) throw new Error("Brand Namer produced no usable output");
    const clamp = (score: number) => Math.min(100, Math.max(0, Math.round(score)));
    const scored = output.data.suggestions.map((s) => ({
      ...s,
      pronunciationScore: clamp(s.pronunciationScore),
      searchScore: clamp(s.searchScore),
      overallScore: clamp(s.overallScore)
    }));
    return normalizeSuggestions(scored, input.exclude, input.count);
  }
}
