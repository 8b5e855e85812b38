import type { PromptSpec } from "../providers/types.js";
import type { BusinessProfile } from "../session/schemas.js";
import type { StepCatalog, StyleDefinition } from "./styles.js";

export type SignagePromptInput = {
  businessName: string;
  profile: BusinessProfile;
  style: StyleDefinition;
  catalog: StepCatalog;
};

export type InteriorPromptInput = {
  businessName: string;
  profile: BusinessProfile;
  signageStyle: string;
  style: StyleDefinition;
  catalog: StepCatalog;
};

function businessContext(profile: BusinessProfile): string {
  const base = `a ${profile.size} ${profile.industry} business in ${profile.region}, South Korea`;
  return profile.description ? `${base} (${profile.description})` : base;
}

export function signagePrompt(input: SignagePromptInput): PromptSpec {
  return {
    prompt: [
      `Storefront signboard for "${input.businessName}", ${businessContext(input.profile)}.`,
      `${input.style.label} style: ${input.style.descriptor}.`,
      `Show the sign mounted on the shop facade in daylight; the business name must be the only text.`
    ].join(" "),
    size: input.catalog.size,
    quality: input.catalog.quality,
    style: input.style.renderStyle
  };
}

export function interiorPrompt(input: InteriorPromptInput): PromptSpec {
  const palette = input.style.palette?.length ? ` Colour palette: ${input.style.palette.join(", ")}.` : "";
  return {
    prompt: [
      `Interior design concept for "${input.businessName}", ${businessContext(input.profile)}.`,
      `${input.style.label} style: ${input.style.descriptor}.`,
      `It should feel consistent with the ${input.signageStyle} storefront sign.${palette}`,
      `Wide-angle view of the customer area, no people.`
    ].join(" "),
    size: input.catalog.size,
    quality: input.catalog.quality,
    style: input.style.renderStyle
  };
}
