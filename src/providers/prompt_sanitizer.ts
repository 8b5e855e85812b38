export const SAFETY_QUALIFIER =
  "Commercial design concept, family friendly, no real people, no existing brand logos or trademarks.";

export const DEFAULT_DENY_LIST: readonly string[] = [
  "nude",
  "naked",
  "nsfw",
  "gore",
  "blood",
  "weapon",
  "gun",
  "violence",
  "drugs",
  "celebrity",
  "trademark",
  "copyrighted"
];

export type SanitizeOptions = {
  maxLength: number;
  denyList?: readonly string[];
  qualifier?: string;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function stripDenied(text: string, denyList: readonly string[]): string {
  let out = text;
  for (const term of denyList) {
    if (term.trim().length === 0) continue;
    out = out.replace(new RegExp(`\\b${escapeRegExp(term.trim())}\\b`, "gi"), " ");
  }
  return out;
}

/**
 * Strips deny-listed terms (whole words, any case), collapses whitespace and truncates so the
 * prompt plus the safety qualifier fits `maxLength`. The qualifier is always present.
 */
export function sanitizePrompt(raw: string, options: SanitizeOptions): string {
  const qualifier = options.qualifier ?? SAFETY_QUALIFIER;
  const body = stripDenied(raw, options.denyList ?? DEFAULT_DENY_LIST)
    .replace(/\s+/g, " ")
    .trim();

  const budget = options.maxLength - qualifier.length - 1;
  if (budget <= 0) return qualifier.slice(0, Math.max(0, options.maxLength));

  const truncated = body.length > budget ? body.slice(0, budget).trimEnd() : body;
  return truncated.length > 0 ? `${truncated} ${qualifier}` : qualifier;
}
