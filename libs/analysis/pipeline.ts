import type { RiskAssessment } from "../validation/dto";
import type { VcfParseResult } from "../adapters";
import type { ConfidenceConfig } from "../config/confidence";
import type { AdvisoryModel, Explanation, RiskSuggestion } from "../advisory/types";
import type { GuidelineRecord, GuidelineStore } from "../guidelines/types";
import { GENERIC_ACTION, fallbackActionFor } from "../guidelines/bundle";
import { assessDrugRisk, guidelineTitleFor } from "../rules/engine";
import { computeHybridConfidence, describeConfidenceModel, type Narrative } from "../confidence/model";
import { normalizeDrugName } from "../pgx/markers";
import { toAnalysisReport, type AnalysisReport, type NarrativeSource } from "../mappers/report";
import { detectBottlenecks, type Bottleneck } from "./bottlenecks";
import { errorMessage } from "../errors";

export interface PipelineDeps {
    confidence: ConfidenceConfig;
    guidelines: GuidelineStore;
    advisory: AdvisoryModel | null;
    now?: () => Date;
}

export interface AnalysisInput {
    patientId: string;
    vcf: VcfParseResult;
}

export interface BatchReport {
    patientId: string;
    timestamp: string;
    reports: AnalysisReport[];
    bottlenecks: Bottleneck[];
}

interface ResolvedNarrative {
    source: NarrativeSource;
    summary: string;
    mechanism: string;
    recommendation: string | null;
}

// Collaborator failures are logged and treated as absent input.
async function attempt<T>(tag: string, fn: () => Promise<T>): Promise<T | null> {
    try {
        return await fn();
    } catch (e) {
        console.warn(tag, errorMessage(e));
        return null;
    }
}

export function mergeSuggestion(base: RiskAssessment, s: RiskSuggestion): RiskAssessment {
    return {
        ...base,
        gene: s.gene,
        diplotype: s.diplotype,
        phenotype: s.phenotype,
        label: s.label,
        severity: s.severity,
        recommendation: s.recommendation ?? base.recommendation,
        cpicLevel: s.cpicLevel,
    };
}

function resolveNarrative(
    assessment: RiskAssessment,
    explanation: Explanation | null,
    guideline: GuidelineRecord | null,
): ResolvedNarrative {
    if (explanation) return { source: "advisory", ...explanation };
    if (guideline) {
        // Guideline text explains; the rule outcome keeps the recommendation.
        return { source: "guideline", summary: guideline.summary, mechanism: guideline.mechanism, recommendation: null };
    }
    return {
        source: "fallback",
        summary: `Patient exhibits ${assessment.phenotype} phenotype for ${assessment.drug}.`,
        mechanism: "No guideline narrative is available for this drug and phenotype; refer to the published guideline.",
        recommendation: null,
    };
}

export function resolveRecommendation(drug: string, ...candidates: Array<string | null | undefined>): string {
    for (const c of candidates) {
        const text = (c ?? "").trim();
        if (text) return text;
    }
    return fallbackActionFor(drug) ?? GENERIC_ACTION;
}

async function analyze(input: AnalysisInput, drug: string, deps: PipelineDeps, timestamp: string): Promise<AnalysisReport> {
    const { variants } = input.vcf;
    const deterministic = assessDrugRisk(variants, drug);
    const advisory = deps.advisory?.configured ? deps.advisory : null;

    let assessment = deterministic;
    let suggestion: RiskSuggestion | null = null;
    if (advisory) {
        const options = (await attempt("guideline-list-failed", () => deps.guidelines.listForDrug(deterministic.drug))) ?? [];
        suggestion = await attempt("advisory-risk-failed", () => advisory.suggestRisk(
            { drug: deterministic.drug, variants, options },
            { gene: deterministic.gene, diplotype: deterministic.diplotype },
        ));
        if (suggestion) assessment = mergeSuggestion(deterministic, suggestion);
    }

    const guideline = await attempt("guideline-lookup-failed", () => deps.guidelines.getGuideline(assessment.drug, assessment.phenotype));
    const explanation = advisory
        ? await attempt("advisory-explain-failed", () => advisory.explain({ drug: assessment.drug, phenotype: assessment.phenotype, guideline }))
        : null;

    const narrative = resolveNarrative(assessment, explanation, guideline);
    const recommendation = resolveRecommendation(assessment.drug, narrative.recommendation, assessment.recommendation);

    const scored: Narrative | null = narrative.source === "advisory"
        ? { summary: narrative.summary, mechanism: narrative.mechanism, confidencePercent: suggestion?.confidencePercent ?? null }
        : null;
    const confidence = computeHybridConfidence(
        { variants, cpicLevel: assessment.cpicLevel, label: assessment.label, narrative: scored },
        deps.confidence,
    );

    return toAnalysisReport({
        patientId: input.patientId,
        timestamp,
        assessment: { ...assessment, recommendation, confidenceScore: confidence.score },
        recommendation,
        narrative: { source: narrative.source, summary: narrative.summary, mechanism: narrative.mechanism },
        guideline,
        guidelineTitle: guidelineTitleFor(assessment.drug),
        variants,
        vcfParsingSuccess: input.vcf.readable,
        confidence,
        confidenceModel: describeConfidenceModel(deps.confidence),
    });
}

const clock = (deps: PipelineDeps) => (deps.now ?? (() => new Date()))().toISOString();

/** Full single-drug analysis: rules, optional advisory, narrative, confidence, report. */
export async function analyzeDrug(input: AnalysisInput, drug: string, deps: PipelineDeps): Promise<AnalysisReport> {
    return analyze(input, drug, deps, clock(deps));
}

export function distinctDrugs(drugs: readonly string[]): string[] {
    return [...new Set(drugs.map(normalizeDrugName).filter(Boolean))];
}

export async function analyzeBatch(input: AnalysisInput, drugs: readonly string[], deps: PipelineDeps): Promise<BatchReport> {
    const timestamp = clock(deps);
    const names = distinctDrugs(drugs);
    const reports = await Promise.all(names.map((d) => analyze(input, d, deps, timestamp)));
    return {
        patientId: input.patientId,
        timestamp,
        reports,
        bottlenecks: detectBottlenecks(names, input.vcf.variants),
    };
}
