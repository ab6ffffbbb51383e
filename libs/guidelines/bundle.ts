import raw from "./data/guidelines.json";
import { GuidelineBundleSchema, type GuidelineBundle } from "./types";

// Validated once at load; a malformed bundle fails the cold start.
export const GUIDELINE_BUNDLE: GuidelineBundle = GuidelineBundleSchema.parse(raw);

export const GENERIC_ACTION =
    "No guideline-based dosing recommendation is available; perform a clinician-reviewed pharmacogenomic assessment.";

export function fallbackActionFor(drug: string): string | null {
    const actions = GUIDELINE_BUNDLE.fallbackActions;
    return Object.prototype.hasOwnProperty.call(actions, drug) ? actions[drug] : null;
}
