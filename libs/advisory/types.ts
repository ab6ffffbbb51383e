import type { CpicLevel, Phenotype, RiskLabel, Severity, Variant } from "../validation/dto";
import type { GuidelineRecord } from "../guidelines/types";

export interface RiskSuggestionRequest {
    drug: string;
    variants: readonly Variant[];
    options: readonly GuidelineRecord[];
}

/** Advisory risk call, already normalized onto the closed enumerations. */
export interface RiskSuggestion {
    label: RiskLabel;
    severity: Severity;
    phenotype: Phenotype;
    diplotype: string;
    gene: string;
    recommendation: string | null;
    cpicLevel: CpicLevel;
    confidencePercent: number;
}

export interface ExplanationRequest {
    drug: string;
    phenotype: string;
    guideline: GuidelineRecord | null;
}

export interface Explanation {
    summary: string;
    mechanism: string;
    recommendation: string | null;
}

export interface AdvisoryModel {
    readonly configured: boolean;
    suggestRisk(req: RiskSuggestionRequest, fallback: FallbackCall): Promise<RiskSuggestion>;
    explain(req: ExplanationRequest): Promise<Explanation>;
}

/** Deterministic values a suggestion falls back to field by field. */
export interface FallbackCall {
    gene: string;
    diplotype: string;
}
