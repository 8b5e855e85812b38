import { NotFoundError, ValidationError } from "../errors.js";
import { assertActive } from "./lifecycle.js";
import { variantSetOf, type SessionStateCommitter } from "./committer.js";
import { INTERIOR_STEP, SIGNAGE_STEP, type VariantStep, type WorkflowSession } from "./schemas.js";

export type SelectRequest = {
  sessionId: string;
  selectedVariantUrl: string;
};

export type SelectResponse = {
  sessionId: string;
  selectedVariantUrl: string;
  nextStep: number;
  canProceed: boolean;
};

function isVariantStep(step: number): step is VariantStep {
  return step === SIGNAGE_STEP || step === INTERIOR_STEP;
}

/** The step whose selection already moved the session forward, if it was this URL. */
function alreadySelectedStep(session: WorkflowSession, url: string): VariantStep | null {
  const previous = session.currentStep - 1;
  if (!isVariantStep(previous)) return null;
  return variantSetOf(session, previous)?.selectedUrl === url ? previous : null;
}

export class VariantSelector {
  constructor(private readonly committer: SessionStateCommitter) {}

  async select(request: SelectRequest): Promise<SelectResponse> {
    const session = await this.committer.load(request.sessionId);
    assertActive(session);
    const url = request.selectedVariantUrl;

    const repeated = alreadySelectedStep(session, url);
    if (repeated !== null) {
      return { sessionId: session.sessionId, selectedVariantUrl: url, nextStep: session.currentStep, canProceed: true };
    }

    const step = session.currentStep;
    if (step > INTERIOR_STEP) throw new NotFoundError(`Variant ${url} is not the selected interior variant`);
    if (!isVariantStep(step)) {
      throw new ValidationError("step_order", `Step ${step} has no variants to select`);
    }
    const set = variantSetOf(session, step);
    if (!set) throw new NotFoundError(`No variants generated yet for step ${step}`);
    if (!set.variants.some((v) => v.blob.url === url)) {
      throw new NotFoundError(`Variant ${url} is not in the current set`);
    }

    const saved = await this.committer.commitVariantSelection(session.sessionId, step, url);
    return { sessionId: saved.sessionId, selectedVariantUrl: url, nextStep: saved.currentStep, canProceed: true };
  }
}
