import { CommitError, ExpiredSessionError, NotFoundError, ValidationError } from "../errors.js";
import { nameKey } from "../pipeline/naming.js";
import { assertActive, assertStepTarget, executionRecord, newSession, shouldExpire, usableSession, type SessionTiming } from "./lifecycle.js";
import {
  AnalysisResultSchema,
  INTERIOR_STEP,
  MAX_NAME_REGENERATIONS,
  MAX_NAME_SUGGESTIONS,
  MAX_VARIANTS,
  REPORT_STEP,
  SIGNAGE_STEP,
  stepName,
  type AgentExecutionRecord,
  type GeneratedVariant,
  type NameSuggestion,
  type ReportManifestRef,
  type VariantSet,
  type VariantStep,
  type WorkflowSession
} from "./schemas.js";
import type { SessionEvents } from "./session_events.js";
import type { SessionStore } from "./session_store.js";

export type VariantCommit = {
  step: VariantStep;
  targetStep: number;
  variants: readonly GeneratedVariant[];
  execution: AgentExecutionRecord;
};

export type CommitterDeps = {
  store: SessionStore;
  events: SessionEvents;
  now?: () => number;
};

export function variantSetOf(session: WorkflowSession, step: VariantStep): VariantSet | undefined {
  return step === SIGNAGE_STEP ? session.signage : session.interior;
}

function withVariantSet(session: WorkflowSession, step: VariantStep, set: VariantSet): WorkflowSession {
  return step === SIGNAGE_STEP ? { ...session, signage: set } : { ...session, interior: set };
}

/**
 * A previous selection survives a regeneration only if the new set still contains its URL;
 * otherwise it is cleared. At most one variant ends up selected.
 */
export function mergeVariantSet(
  previous: VariantSet | undefined,
  step: VariantStep,
  variants: readonly GeneratedVariant[],
  generatedAt: string
): VariantSet {
  const carried = previous?.selectedUrl;
  const carriedIndex = carried === undefined ? -1 : variants.findIndex((v) => v.blob.url === carried);
  return {
    step,
    generation: (previous?.generation ?? 0) + 1,
    variants: variants.map((v, i) => ({ ...v, selected: i === carriedIndex })),
    ...(carriedIndex >= 0 ? { selectedUrl: carried } : {}),
    generatedAt
  };
}

function durableKeys(variants: readonly GeneratedVariant[]): string[] {
  return variants.flatMap((v) => (v.blob.storage === "durable" ? [v.blob.key] : []));
}

/**
 * Every write to a session goes through here: read, validate against the step machine, write
 * back with the version that was read, append one execution record.
 */
export class SessionStateCommitter {
  private readonly store: SessionStore;
  private readonly events: SessionEvents;
  private readonly now: () => number;

  constructor(deps: CommitterDeps) {
    this.store = deps.store;
    this.events = deps.events;
    this.now = deps.now ?? Date.now;
  }

  private iso(): string {
    return new Date(this.now()).toISOString();
  }

  async create(profileInput: unknown, timing: SessionTiming): Promise<WorkflowSession> {
    const session = newSession(profileInput, timing, this.now());
    await this.store.put(session, { expectedVersion: null });
    console.log(`[session] created ${session.sessionId} (${session.profile.industry}/${session.profile.region})`);
    return session;
  }

  private async read(sessionId: string): Promise<WorkflowSession> {
    const stored = await this.store.get(sessionId);
    if (!stored) throw new NotFoundError(`Session ${sessionId} not found`);
    return usableSession(stored);
  }

  private async write(previous: WorkflowSession, next: WorkflowSession): Promise<WorkflowSession> {
    const record: WorkflowSession = { ...next, version: previous.version + 1, updatedAt: this.iso() };
    await this.store.put(record, { expectedVersion: previous.version });
    if (previous.currentStep !== record.currentStep) {
      this.events.emit(record.sessionId, "step_advanced", { from: previous.currentStep, to: record.currentStep, at: record.updatedAt });
    }
    if (previous.status !== record.status) {
      this.events.emit(record.sessionId, "status_changed", { status: record.status, at: record.updatedAt });
    }
    return record;
  }

  private async expire(session: WorkflowSession): Promise<WorkflowSession> {
    const expired = await this.write(session, { ...session, status: "expired" });
    console.log(`[session] ${session.sessionId} expired (expiresAt ${session.expiresAt})`);
    return expired;
  }

  /** Current state for reads. An overdue active session is moved to Expired first. */
  async refresh(sessionId: string): Promise<WorkflowSession> {
    const session = await this.read(sessionId);
    return shouldExpire(session, this.now()) ? this.expire(session) : session;
  }

  async expireIfDue(sessionId: string): Promise<boolean> {
    const session = await this.read(sessionId);
    if (!shouldExpire(session, this.now())) return false;
    await this.expire(session);
    return true;
  }

  /** Loads a session for mutation. Expired sessions are marked and rejected. */
  async load(sessionId: string): Promise<WorkflowSession> {
    const session = await this.read(sessionId);
    if (shouldExpire(session, this.now())) {
      await this.expire(session);
      throw new ExpiredSessionError(sessionId, session.expiresAt);
    }
    if (session.status === "expired") throw new ExpiredSessionError(sessionId, session.expiresAt);
    return session;
  }

  private async mutate(sessionId: string, change: (session: WorkflowSession) => WorkflowSession): Promise<WorkflowSession> {
    const session = await this.load(sessionId);
    assertActive(session);
    return this.write(session, change(session));
  }

  async appendExecution(sessionId: string, record: AgentExecutionRecord): Promise<WorkflowSession> {
    return this.mutate(sessionId, (session) => ({ ...session, executions: [...session.executions, record] }));
  }

  async commitAnalysis(sessionId: string, input: unknown): Promise<WorkflowSession> {
    const parsed = AnalysisResultSchema.safeParse(input);
    if (!parsed.success) {
      const fields = parsed.error.issues.map((issue) => issue.path.join(".") || "analysis").join(", ");
      throw new ValidationError("invalid_request", `Analysis result is invalid (${fields})`);
    }
    return this.mutate(sessionId, (session) => {
      assertStepTarget(session.currentStep, 2);
      return {
        ...session,
        analysis: parsed.data,
        currentStep: 2,
        executions: [
          ...session.executions,
          executionRecord({
            agent: "market_analyst",
            tool: "record_analysis",
            status: "success",
            latencyMs: 0,
            metadata: { score: parsed.data.score, insights: parsed.data.insights.length }
          })
        ]
      };
    });
  }

  async commitNames(sessionId: string, suggestions: readonly NameSuggestion[], execution: AgentExecutionRecord): Promise<WorkflowSession> {
    return this.mutate(sessionId, (session) => {
      assertStepTarget(session.currentStep, 2);
      if (!session.analysis) throw new ValidationError("step_order", "Record the analysis before generating names");
      if (suggestions.length > MAX_NAME_SUGGESTIONS) {
        throw new ValidationError("cardinality", `At most ${MAX_NAME_SUGGESTIONS} name suggestions (got ${suggestions.length})`);
      }

      const previous = session.names;
      const regenerationCount = previous ? previous.regenerationCount + 1 : 0;
      if (regenerationCount > MAX_NAME_REGENERATIONS) {
        throw new ValidationError("regeneration_limit", `Names can be regenerated at most ${MAX_NAME_REGENERATIONS} times`);
      }

      const excluded = [...(previous?.excludedNames ?? [])];
      const seen = new Set(excluded.map(nameKey));
      for (const s of suggestions) {
        if (seen.has(nameKey(s.name))) continue;
        seen.add(nameKey(s.name));
        excluded.push(s.name);
      }

      return {
        ...session,
        names: { suggestions: [...suggestions], regenerationCount, excludedNames: excluded },
        executions: [...session.executions, execution]
      };
    });
  }

  async commitNameSelection(sessionId: string, name: string): Promise<WorkflowSession> {
    const session = await this.load(sessionId);
    assertActive(session);
    const names = session.names;
    if (!names) throw new ValidationError("step_order", "No name suggestions to select from");
    const chosen = names.suggestions.find((s) => nameKey(s.name) === nameKey(name));
    if (!chosen) throw new NotFoundError(`"${name}" is not one of the current name suggestions`);
    if (session.currentStep === SIGNAGE_STEP && names.selectedName === chosen.name) return session;
    assertStepTarget(session.currentStep, SIGNAGE_STEP);
    if (session.signage) {
      throw new ValidationError("step_order", `Signage was already generated for "${names.selectedName ?? ""}"`);
    }

    return this.write(session, {
      ...session,
      names: { ...names, selectedName: chosen.name },
      currentStep: SIGNAGE_STEP,
      executions: [
        ...session.executions,
        executionRecord({ agent: "user", tool: "select_name", status: "success", latencyMs: 0, metadata: { name: chosen.name } })
      ]
    });
  }

  private assertVariantPrerequisites(session: WorkflowSession, step: VariantStep): void {
    if (step === SIGNAGE_STEP && !session.names?.selectedName) {
      throw new ValidationError("step_order", "Signage needs a selected business name");
    }
    if (step === INTERIOR_STEP && !session.signage?.selectedUrl) {
      throw new ValidationError("step_order", "Interior needs a selected signage variant");
    }
  }

  async commitVariants(sessionId: string, commit: VariantCommit): Promise<WorkflowSession> {
    const session = await this.load(sessionId);
    assertActive(session);
    assertStepTarget(session.currentStep, commit.targetStep);
    if (commit.targetStep !== commit.step) {
      throw new ValidationError("step_order", `A ${stepName(commit.step)} set cannot be committed to step ${commit.targetStep}`);
    }
    if (commit.variants.length > MAX_VARIANTS) {
      throw new ValidationError("cardinality", `At most ${MAX_VARIANTS} variants per set (got ${commit.variants.length})`);
    }
    if (commit.variants.filter((v) => v.selected).length > 1) {
      throw new ValidationError("cardinality", "At most one variant may be selected");
    }
    const urls = commit.variants.map((v) => v.blob.url);
    const repeated = urls.find((url, i) => urls.indexOf(url) !== i);
    if (repeated !== undefined) {
      throw new ValidationError("duplicate_variant", `Two variants in one set share the URL ${repeated}`);
    }
    this.assertVariantPrerequisites(session, commit.step);

    const set = mergeVariantSet(variantSetOf(session, commit.step), commit.step, commit.variants, this.iso());
    const next = withVariantSet(session, commit.step, set);

    let saved: WorkflowSession;
    try {
      saved = await this.write(session, {
        ...next,
        currentStep: commit.targetStep,
        executions: [...session.executions, commit.execution]
      });
    } catch (err) {
      const keys = durableKeys(commit.variants);
      console.warn(`[committer] ${sessionId}: commit failed; ${keys.length} durable blob(s) left for recovery`);
      throw new CommitError(sessionId, keys, err);
    }

    const fallbackCount = set.variants.filter((v) => v.isFallback).length;
    this.events.emit(sessionId, "variants_committed", {
      step: stepName(commit.step),
      generation: set.generation,
      fallbackCount,
      total: set.variants.length,
      at: saved.updatedAt
    });
    return saved;
  }

  async commitVariantSelection(sessionId: string, step: VariantStep, url: string): Promise<WorkflowSession> {
    return this.mutate(sessionId, (session) => {
      assertStepTarget(session.currentStep, step + 1);
      const set = variantSetOf(session, step);
      if (!set) throw new NotFoundError(`No ${stepName(step)} variants have been generated`);
      const index = set.variants.findIndex((v) => v.blob.url === url);
      if (index < 0) throw new NotFoundError(`Variant ${url} is not in the current ${stepName(step)} set`);

      const selectedSet: VariantSet = {
        ...set,
        selectedUrl: url,
        variants: set.variants.map((v, i) => ({ ...v, selected: i === index }))
      };
      return {
        ...withVariantSet(session, step, selectedSet),
        currentStep: step + 1,
        executions: [
          ...session.executions,
          executionRecord({
            agent: "user",
            tool: "select_variant",
            status: "success",
            latencyMs: 0,
            metadata: { step: stepName(step), style: set.variants[index].style, isFallback: set.variants[index].isFallback }
          })
        ]
      };
    });
  }

  async commitReport(sessionId: string, report: ReportManifestRef, execution: AgentExecutionRecord): Promise<WorkflowSession> {
    return this.mutate(sessionId, (session) => {
      if (session.currentStep !== REPORT_STEP) {
        throw new ValidationError("step_order", `The report is built at step ${REPORT_STEP} (session is at ${session.currentStep})`);
      }
      return { ...session, report, status: "completed", executions: [...session.executions, execution] };
    });
  }

  async markFailed(sessionId: string, reason: string): Promise<WorkflowSession> {
    return this.mutate(sessionId, (session) => ({
      ...session,
      status: "failed",
      failureReason: reason,
      executions: [
        ...session.executions,
        executionRecord({
          agent: "workflow",
          tool: "fail",
          status: "error",
          latencyMs: 0,
          errorMessage: reason,
          metadata: { step: stepName(session.currentStep) }
        })
      ]
    }));
  }
}
