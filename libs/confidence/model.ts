import type { ConfidenceBreakdown, Variant } from "../validation/dto";
import type { ConfidenceConfig } from "../config/confidence";

export interface Narrative {
    summary: string;
    mechanism: string;
    confidencePercent?: number | null;
}

export interface HybridConfidenceInput {
    variants: readonly Variant[];
    cpicLevel: string | null;
    label: string | null;
    narrative: Narrative | null;
}

export interface HybridConfidence {
    score: number;
    breakdown: ConfidenceBreakdown;
}

export interface ConfidenceModelParams {
    w_vcf: number;
    w_cpic: number;
    w_llm: number;
    qual_min: number;
    qual_max: number;
    dp_min: number;
    dp_max: number;
}

const EMPTY_VCF_SCORE = 0.35;
const MISSING_METRIC_SCORE = 0.6;
const NO_NARRATIVE_SCORE = 0.75;

const CPIC_LEVEL_SCORE: Readonly<Record<string, number>> = { A: 1, B: 0.75, C: 0.5, D: 0.25, "N/A": 0.5 };

const HIGH_CUES = ["avoid", "toxic", "toxicity", "ineffective", "life-threatening", "severe"];
const MODERATE_CUES = ["adjust", "reduce", "increase", "monitor", "consider", "dose"];
const LOW_CUES = ["safe", "standard dose", "standard dosing", "routine", "normal"];

export const clamp = (x: number, lo = 0, hi = 1) => Math.max(lo, Math.min(hi, x));

export function roundTo(x: number, digits: number): number {
    const f = 10 ** digits;
    return Math.round(x * f) / f;
}

function normalizeMetric(x: number | null, min: number, max: number): number {
    if (x === null) return MISSING_METRIC_SCORE;
    if (x <= min) return 0;
    if (x >= max) return 1;
    return clamp((x - min) / Math.max(1, max - min));
}

function annotationScore(v: Variant): number {
    const star = v.annotations.star ? 1 : v.allele.startsWith("*") ? 0.5 : 0;
    return (Number(v.annotations.gene) + star + Number(v.annotations.rsid)) / 3;
}

/** q_vcf: call quality, read depth and annotation completeness. */
export function computeVcfQualityScore(variants: readonly Variant[], config: ConfidenceConfig): number {
    if (variants.length === 0) return EMPTY_VCF_SCORE;
    let total = 0;
    for (const v of variants) {
        const q = normalizeMetric(v.qualityScore, config.qualMin, config.qualMax);
        const d = normalizeMetric(v.readDepth, config.dpMin, config.dpMax);
        total += 0.45 * q + 0.35 * d + 0.2 * annotationScore(v);
    }
    return clamp(total / variants.length);
}

/** g_cpic: evidence strength of the guideline level. */
export function computeCpicGuidelineScore(level: string | null | undefined): number {
    const key = (level ?? "N/A").trim().toUpperCase();
    return Object.prototype.hasOwnProperty.call(CPIC_LEVEL_SCORE, key) ? CPIC_LEVEL_SCORE[key] : 0.5;
}

type Tier = "high" | "moderate" | "low" | "unknown";

function expectedTier(label: string): Tier {
    const l = label.toLowerCase();
    if (l.includes("toxic") || l.includes("ineffective")) return "high";
    if (l.includes("adjust")) return "moderate";
    if (l.includes("safe")) return "low";
    return "unknown";
}

/**
 * p_llm: lexical agreement between the risk label and the narrative. Without a
 * narrative the score is a neutral 0.75.
 */
export function computeNarrativeConsistencyScore(label: string | null, narrative: Narrative | null): number {
    if (!narrative) return NO_NARRATIVE_SCORE;

    const text = `${narrative.summary} ${narrative.mechanism}`.toLowerCase();
    const hasHigh = HIGH_CUES.some((c) => text.includes(c));
    const hasModerate = MODERATE_CUES.some((c) => text.includes(c));
    const hasLow = LOW_CUES.some((c) => text.includes(c));

    let base = NO_NARRATIVE_SCORE;
    switch (expectedTier(label ?? "")) {
        case "high":
            base = hasHigh ? 0.92 : hasLow ? 0.35 : 0.65;
            break;
        case "moderate":
            base = hasModerate ? 0.9 : hasHigh ? 0.45 : 0.65;
            break;
        case "low":
            base = hasLow ? 0.92 : hasHigh ? 0.35 : 0.65;
            break;
        case "unknown":
            break;
    }

    const percent = narrative.confidencePercent;
    if (typeof percent === "number" && Number.isFinite(percent)) {
        base = 0.7 * base + 0.3 * clamp(percent / 100);
    }
    return clamp(base);
}

export function computeHybridConfidence(input: HybridConfidenceInput, config: ConfidenceConfig): HybridConfidence {
    const qVcf = computeVcfQualityScore(input.variants, config);
    const gCpic = computeCpicGuidelineScore(input.cpicLevel);
    const pLlm = computeNarrativeConsistencyScore(input.label, input.narrative);
    const { vcf, cpic, llm } = config.weights;

    return {
        score: roundTo(clamp(vcf * qVcf + cpic * gCpic + llm * pLlm), 2),
        breakdown: {
            qVcf: roundTo(qVcf, 3),
            gCpic: roundTo(gCpic, 3),
            pLlm: roundTo(pLlm, 3),
        },
    };
}

export function describeConfidenceModel(config: ConfidenceConfig): ConfidenceModelParams {
    return {
        w_vcf: roundTo(config.weights.vcf, 3),
        w_cpic: roundTo(config.weights.cpic, 3),
        w_llm: roundTo(config.weights.llm, 3),
        qual_min: roundTo(config.qualMin, 3),
        qual_max: roundTo(config.qualMax, 3),
        dp_min: roundTo(config.dpMin, 3),
        dp_max: roundTo(config.dpMax, 3),
    };
}
