import { ValidationError } from "../errors.js";
import type { BlobReference, GeneratedVariant, VariantSet, WorkflowSession } from "../session/schemas.js";
import { readUrlFor, type BlobStore } from "../storage/blob_store.js";
import { compactTimestamp } from "../utils.js";

export type ReportVariant = {
  style: string;
  provider: string;
  isFallback: boolean;
  storage: BlobReference["storage"];
  url: string;
  description?: string;
  palette?: string[];
};

export type ReportManifest = {
  sessionId: string;
  generatedAt: string;
  profile: WorkflowSession["profile"];
  analysis: { summary: string; score: number; insights: string[]; recommendations: string[] } | null;
  businessName: string;
  nameDescription?: string;
  signage: ReportVariant;
  interior: ReportVariant;
  executions: { total: number; errors: number; fallbacks: number };
};

export function reportKey(sessionId: string, at: Date): string {
  return `reports/${sessionId}/report_${compactTimestamp(at)}.json`;
}

function selectedVariant(set: VariantSet | undefined, label: string): GeneratedVariant {
  const chosen = set?.variants.find((v) => v.selected);
  if (!chosen) throw new ValidationError("step_order", `The report needs a selected ${label} variant`);
  return chosen;
}

export class ReportWriter {
  constructor(
    private readonly blobs: BlobStore,
    private readonly presignTtlSeconds: number
  ) {}

  private async describe(variant: GeneratedVariant): Promise<ReportVariant> {
    return {
      style: variant.style,
      provider: variant.provider,
      isFallback: variant.isFallback,
      storage: variant.blob.storage,
      url: await readUrlFor(this.blobs, variant.blob, this.presignTtlSeconds),
      ...(variant.description ? { description: variant.description } : {}),
      ...(variant.palette ? { palette: variant.palette } : {})
    };
  }

  async build(session: WorkflowSession, at: Date): Promise<ReportManifest> {
    const businessName = session.names?.selectedName;
    if (!businessName) throw new ValidationError("step_order", "The report needs a selected business name");
    const signage = selectedVariant(session.signage, "signage");
    const interior = selectedVariant(session.interior, "interior");
    const fallbacks = [...(session.signage?.variants ?? []), ...(session.interior?.variants ?? [])].filter((v) => v.isFallback).length;

    return {
      sessionId: session.sessionId,
      generatedAt: at.toISOString(),
      profile: session.profile,
      analysis: session.analysis
        ? {
            summary: session.analysis.summary,
            score: session.analysis.score,
            insights: session.analysis.insights,
            recommendations: session.analysis.recommendations
          }
        : null,
      businessName,
      nameDescription: session.names?.suggestions.find((s) => s.name === businessName)?.description,
      signage: await this.describe(signage),
      interior: await this.describe(interior),
      executions: {
        total: session.executions.length,
        errors: session.executions.filter((e) => e.status === "error").length,
        fallbacks
      }
    };
  }

  async write(session: WorkflowSession, at = new Date()): Promise<{ key: string; url: string; generatedAt: string; manifest: ReportManifest }> {
    const manifest = await this.build(session, at);
    const key = reportKey(session.sessionId, at);
    const bytes = new TextEncoder().encode(`${JSON.stringify(manifest, null, 2)}\n`);
    await this.blobs.put(key, bytes, "application/json", { "session-id": session.sessionId, kind: "report" });
    return { key, url: await this.blobs.presignGet(key, this.presignTtlSeconds), generatedAt: manifest.generatedAt, manifest };
  }
}
