import { z } from "zod";
import { CpicLevelSchema, SeveritySchema, type CpicLevel, type RiskLabel, type Severity } from "../validation/dto";
import { normalizePhenotype } from "../pgx/phenotype";
import { AdvisoryError, errorMessage } from "../errors";
import type { Explanation, FallbackCall, RiskSuggestion } from "./types";

const DEFAULT_CONFIDENCE_PERCENT = 70;

const LABELS: Readonly<Record<string, RiskLabel>> = {
    safe: "Safe",
    "adjust dosage": "Adjust Dosage",
    "adjust dose": "Adjust Dosage",
    adjust: "Adjust Dosage",
    toxic: "Toxic",
    ineffective: "Ineffective",
    unknown: "Unknown",
};

const DIPLOTYPE = /^[^\s/]+\/[^\s/]+$/;

const text = z.union([z.string(), z.number()]).transform(String).nullish();

export const RawSuggestionSchema = z.object({
    label: text,
    severity: text,
    phenotype: text,
    diplotype: text,
    gene: text,
    recommendation: text,
    cpic_level: text,
    llm_confidence_percent: z.union([z.number(), z.string()]).nullish(),
});

export const RawExplanationSchema = z.object({
    summary: text,
    mechanism: text,
    recommendation: text,
});

/** Strips markdown fences and surrounding chatter, then parses the JSON object. */
export function extractJson(content: string): unknown {
    let payload = content.trim();
    const fenced = payload.match(/```(?:json)?\s*([\s\S]*?)```/i);
    if (fenced) payload = fenced[1].trim();
    if (!payload.startsWith("{")) {
        const start = payload.indexOf("{");
        const end = payload.lastIndexOf("}");
        if (start === -1 || end <= start) throw new AdvisoryError("advisory reply holds no JSON object");
        payload = payload.slice(start, end + 1);
    }
    try {
        return JSON.parse(payload);
    } catch (e) {
        throw new AdvisoryError(`advisory reply is not valid JSON: ${errorMessage(e)}`);
    }
}

const clean = (v: string | null | undefined) => (v ?? "").trim();

export function normalizeLabel(raw: string | null | undefined): RiskLabel {
    const key = clean(raw).toLowerCase();
    return Object.prototype.hasOwnProperty.call(LABELS, key) ? LABELS[key] : "Unknown";
}

export function normalizeSeverity(raw: string | null | undefined): Severity {
    const parsed = SeveritySchema.safeParse(clean(raw).toLowerCase());
    return parsed.success ? parsed.data : "unknown";
}

export function normalizeCpicLevel(raw: string | null | undefined): CpicLevel {
    const parsed = CpicLevelSchema.safeParse(clean(raw).toUpperCase());
    return parsed.success ? parsed.data : "N/A";
}

export function normalizeConfidencePercent(raw: number | string | null | undefined): number {
    if (raw == null || raw === "") return DEFAULT_CONFIDENCE_PERCENT;
    const n = Number(raw);
    if (!Number.isFinite(n)) return DEFAULT_CONFIDENCE_PERCENT;
    return Math.max(0, Math.min(100, n));
}

export function normalizeSuggestion(raw: unknown, fallback: FallbackCall): RiskSuggestion {
    const parsed = RawSuggestionSchema.safeParse(raw);
    if (!parsed.success) throw new AdvisoryError(`advisory suggestion has an unexpected shape: ${parsed.error.issues[0]?.message}`);
    const s = parsed.data;

    const diplotype = clean(s.diplotype);
    const gene = clean(s.gene);
    const recommendation = clean(s.recommendation);

    return {
        label: normalizeLabel(s.label),
        severity: normalizeSeverity(s.severity),
        phenotype: normalizePhenotype(s.phenotype),
        diplotype: DIPLOTYPE.test(diplotype) ? diplotype : fallback.diplotype,
        gene: gene && gene.toLowerCase() !== "unknown" ? gene : fallback.gene,
        recommendation: recommendation || null,
        cpicLevel: normalizeCpicLevel(s.cpic_level),
        confidencePercent: normalizeConfidencePercent(s.llm_confidence_percent),
    };
}

export function normalizeExplanation(raw: unknown): Explanation {
    const parsed = RawExplanationSchema.safeParse(raw);
    if (!parsed.success) throw new AdvisoryError(`advisory explanation has an unexpected shape: ${parsed.error.issues[0]?.message}`);
    const summary = clean(parsed.data.summary);
    if (!summary) throw new AdvisoryError("advisory explanation has no summary");
    return {
        summary,
        mechanism: clean(parsed.data.mechanism),
        recommendation: clean(parsed.data.recommendation) || null,
    };
}
