import { z } from "zod";

export const STEP_ORDER = ["analysis", "naming", "signage", "interior", "report"] as const;
export type StepName = (typeof STEP_ORDER)[number];

export const FIRST_STEP = 1;
export const LAST_STEP = STEP_ORDER.length;
export const SIGNAGE_STEP = 3;
export const INTERIOR_STEP = 4;
export const REPORT_STEP = 5;

export const MAX_VARIANTS = 3;
export const MAX_NAME_SUGGESTIONS = 3;
export const MAX_NAME_REGENERATIONS = 3;

export const INDUSTRIES = [
  "restaurant",
  "retail",
  "service",
  "healthcare",
  "education",
  "technology",
  "manufacturing",
  "construction",
  "finance",
  "other"
] as const;

export const REGIONS = [
  "seoul",
  "busan",
  "daegu",
  "incheon",
  "gwangju",
  "daejeon",
  "ulsan",
  "gyeonggi",
  "gangwon",
  "chungbuk",
  "chungnam",
  "jeonbuk",
  "jeonnam",
  "gyeongbuk",
  "gyeongnam",
  "jeju"
] as const;

export const BUSINESS_SIZES = ["small", "medium", "large"] as const;

export const SESSION_STATUSES = ["active", "completed", "failed", "expired"] as const;
export const EXECUTION_STATUSES = ["success", "error", "timeout", "retry"] as const;

export function stepName(step: number): StepName {
  const name = STEP_ORDER[step - 1];
  if (!name) throw new RangeError(`Unknown workflow step ${step}`);
  return name;
}

// Enumerations are closed and exact: "Seoul" or " seoul" are rejected, not corrected.
export const BusinessProfileSchema = z
  .object({
    industry: z.enum(INDUSTRIES),
    region: z.enum(REGIONS),
    size: z.enum(BUSINESS_SIZES),
    description: z.string().max(2000).optional()
  })
  .strict();

const Score = z.number().min(0).max(100);

export const AnalysisResultSchema = z
  .object({
    summary: z.string().min(1),
    score: Score,
    insights: z.array(z.string().min(1)).min(1),
    marketTrends: z.array(z.string().min(1)).default([]),
    recommendations: z.array(z.string().min(1)).default([]),
    generatedAt: z.string().datetime()
  })
  .strict();

export const NameSuggestionSchema = z
  .object({
    name: z.string().trim().min(1).max(80),
    description: z.string().min(1),
    pronunciationScore: Score,
    searchScore: Score,
    overallScore: Score
  })
  .strict();

export const NameSuggestionSetSchema = z
  .object({
    suggestions: z.array(NameSuggestionSchema).max(MAX_NAME_SUGGESTIONS),
    selectedName: z.string().optional(),
    regenerationCount: z.number().int().min(0).max(MAX_NAME_REGENERATIONS),
    excludedNames: z.array(z.string())
  })
  .strict();

export const BlobReferenceSchema = z.discriminatedUnion("storage", [
  z.object({ storage: z.literal("durable"), key: z.string().min(1), url: z.string().min(1) }).strict(),
  z.object({ storage: z.literal("provider"), url: z.string().min(1), persistenceError: z.string() }).strict(),
  z.object({ storage: z.literal("fallback"), key: z.string().min(1), url: z.string().min(1) }).strict()
]);

export const GeneratedVariantSchema = z
  .object({
    provider: z.string().min(1),
    style: z.string().min(1),
    prompt: z.string(),
    revisedPrompt: z.string().optional(),
    blob: BlobReferenceSchema,
    generatedAt: z.string().datetime(),
    isFallback: z.boolean(),
    fallbackReason: z.string().optional(),
    description: z.string().optional(),
    palette: z.array(z.string()).optional(),
    selected: z.boolean()
  })
  .strict();

export const VariantSetSchema = z
  .object({
    step: z.union([z.literal(3), z.literal(4)]),
    generation: z.number().int().min(1),
    variants: z.array(GeneratedVariantSchema).max(MAX_VARIANTS),
    selectedUrl: z.string().optional(),
    generatedAt: z.string().datetime()
  })
  .strict()
  .refine((set) => set.variants.filter((v) => v.selected).length <= 1, {
    message: "at most one variant may be selected",
    path: ["variants"]
  });

export const AgentExecutionRecordSchema = z
  .object({
    agent: z.string().min(1),
    tool: z.string().min(1),
    status: z.enum(EXECUTION_STATUSES),
    latencyMs: z.number().int().min(0),
    errorMessage: z.string().optional(),
    metadata: z.record(z.unknown()),
    at: z.string().datetime()
  })
  .strict();

export const ReportManifestRefSchema = z
  .object({
    key: z.string().min(1),
    url: z.string().min(1),
    generatedAt: z.string().datetime()
  })
  .strict();

export const WorkflowSessionSchema = z
  .object({
    sessionId: z.string().uuid(),
    version: z.number().int().min(1),
    currentStep: z.number().int().min(1).max(LAST_STEP),
    status: z.enum(SESSION_STATUSES),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
    expiresAt: z.string().datetime(),
    ttl: z.number().int(),
    profile: z.unknown(),
    analysis: AnalysisResultSchema.optional(),
    names: NameSuggestionSetSchema.optional(),
    signage: VariantSetSchema.optional(),
    interior: VariantSetSchema.optional(),
    report: ReportManifestRefSchema.optional(),
    failureReason: z.string().optional(),
    executions: z.array(AgentExecutionRecordSchema)
  })
  .strict();

export type BusinessProfile = z.infer<typeof BusinessProfileSchema>;
export type Industry = BusinessProfile["industry"];
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type NameSuggestion = z.infer<typeof NameSuggestionSchema>;
export type NameSuggestionSet = z.infer<typeof NameSuggestionSetSchema>;
export type BlobReference = z.infer<typeof BlobReferenceSchema>;
export type GeneratedVariant = z.infer<typeof GeneratedVariantSchema>;
export type VariantSet = z.infer<typeof VariantSetSchema>;
export type VariantStep = VariantSet["step"];
export type AgentExecutionRecord = z.infer<typeof AgentExecutionRecordSchema>;
export type ExecutionStatus = AgentExecutionRecord["status"];
export type ReportManifestRef = z.infer<typeof ReportManifestRefSchema>;
export type SessionStatus = (typeof SESSION_STATUSES)[number];

// The stored profile stays `unknown` until re-validated, so a tampered record cannot
// masquerade as a usable session.
export type StoredSession = z.infer<typeof WorkflowSessionSchema>;
export type WorkflowSession = Omit<StoredSession, "profile"> & { profile: BusinessProfile };
