import type { ConfidenceBreakdown, CpicLevel, PhenotypeCode, RiskAssessment, RiskLabel, Severity, Variant } from "../validation/dto";
import type { GuidelineRecord } from "../guidelines/types";
import type { ConfidenceModelParams, HybridConfidence } from "../confidence/model";
import { toPhenotypeCode } from "../pgx/phenotype";

export const REPORT_SCHEMA = "pgx.report.v1";
export const MAX_VARIANT_CITATIONS = 10;
export const GUIDELINE_INDEX_URL = "https://cpicpgx.org/guidelines/";

export type NarrativeSource = "advisory" | "guideline" | "fallback";

export interface VariantCitation {
    rsid: string;
    gene: string;
    allele: string;
    function: string;
    genotype: string;
    dbSnpUrl: string;
}

export interface GuidelineCitation {
    type: "guideline" | "reference";
    source: string;
    url: string;
    phenotype: string | null;
    gene: string | null;
    summary: string | null;
    recommendation: string | null;
}

export interface AnalysisReport {
    schema: typeof REPORT_SCHEMA;
    patientId: string;
    drug: string;
    timestamp: string;
    riskAssessment: {
        riskLabel: RiskLabel;
        confidenceScore: number;
        severity: Severity;
    };
    pharmacogenomicProfile: {
        primaryGene: string;
        diplotype: string;
        phenotype: PhenotypeCode;
        detectedVariants: Array<{ rsid: string; chromosome: string; position: string; genotype: string }>;
    };
    clinicalRecommendation: {
        recommendationText: string;
        cpicLevel: CpicLevel;
        guidelineSource: string | null;
    };
    explanation: {
        source: NarrativeSource;
        summary: string;
        mechanism: string;
        variantCitations: VariantCitation[];
        guidelineCitations: GuidelineCitation[];
    };
    qualityMetrics: {
        vcfParsingSuccess: boolean;
        totalVariantsAnalyzed: number;
        confidenceBreakdown: ConfidenceBreakdown;
        confidenceModel: ConfidenceModelParams;
    };
}

export interface ReportInput {
    patientId: string;
    timestamp: string;
    assessment: RiskAssessment;
    recommendation: string;
    narrative: { source: NarrativeSource; summary: string; mechanism: string };
    guideline: GuidelineRecord | null;
    guidelineTitle: string | null;
    variants: readonly Variant[];
    vcfParsingSuccess: boolean;
    confidence: HybridConfidence;
    confidenceModel: ConfidenceModelParams;
}

export function variantCitation(v: Variant): VariantCitation {
    return {
        rsid: v.rsid,
        gene: v.gene,
        allele: v.allele,
        function: v.functionClass,
        genotype: v.genotype,
        dbSnpUrl: `https://www.ncbi.nlm.nih.gov/snp/${v.rsid}`,
    };
}

export function guidelineCitations(g: GuidelineRecord | null): GuidelineCitation[] {
    if (!g) {
        return [{
            type: "reference",
            source: "CPIC Guidelines",
            url: GUIDELINE_INDEX_URL,
            phenotype: null,
            gene: null,
            summary: null,
            recommendation: null,
        }];
    }
    return [{
        type: "guideline",
        source: g.source,
        url: g.url,
        phenotype: g.phenotypeName,
        gene: g.gene,
        summary: g.summary,
        recommendation: g.recommendation,
    }];
}

export function toAnalysisReport(input: ReportInput): AnalysisReport {
    const a = input.assessment;
    const geneVariants = input.variants.filter((v) => v.gene === a.gene);

    return {
        schema: REPORT_SCHEMA,
        patientId: input.patientId,
        drug: a.drug,
        timestamp: input.timestamp,
        riskAssessment: {
            riskLabel: a.label,
            confidenceScore: input.confidence.score,
            severity: a.severity,
        },
        pharmacogenomicProfile: {
            primaryGene: a.gene,
            diplotype: a.diplotype,
            phenotype: toPhenotypeCode(a.phenotype),
            detectedVariants: geneVariants.map((v) => ({
                rsid: v.rsid,
                chromosome: v.chromosome,
                position: v.position,
                genotype: v.genotype,
            })),
        },
        clinicalRecommendation: {
            recommendationText: input.recommendation,
            cpicLevel: a.cpicLevel,
            guidelineSource: input.guideline?.source ?? input.guidelineTitle,
        },
        explanation: {
            ...input.narrative,
            variantCitations: geneVariants.slice(0, MAX_VARIANT_CITATIONS).map(variantCitation),
            guidelineCitations: guidelineCitations(input.guideline),
        },
        qualityMetrics: {
            vcfParsingSuccess: input.vcfParsingSuccess,
            totalVariantsAnalyzed: input.variants.length,
            confidenceBreakdown: input.confidence.breakdown,
            confidenceModel: input.confidenceModel,
        },
    };
}
