import { z } from "zod";

export const ZygositySchema = z.enum(["hom-ref", "het", "hom-alt", "missing"]);
export type Zygosity = z.infer<typeof ZygositySchema>;

export const CpicLevelSchema = z.enum(["A", "B", "C", "D", "N/A"]);
export type CpicLevel = z.infer<typeof CpicLevelSchema>;

export const RiskLabelSchema = z.enum(["Safe", "Adjust Dosage", "Toxic", "Ineffective", "Unknown"]);
export type RiskLabel = z.infer<typeof RiskLabelSchema>;

export const SeveritySchema = z.enum(["none", "low", "moderate", "high", "critical", "unknown"]);
export type Severity = z.infer<typeof SeveritySchema>;

// Enzyme genes use the metabolizer codes; SLCO1B1, TPMT and DPYD use textual tiers.
export const PhenotypeSchema = z.enum([
    "PM",
    "IM",
    "NM",
    "RM",
    "UM",
    "Poor function",
    "Intermediate function",
    "Normal function",
    "Poor metabolizer",
    "Intermediate metabolizer",
    "Normal metabolizer",
    "Unknown",
]);
export type Phenotype = z.infer<typeof PhenotypeSchema>;

// Key shared by guideline records and the report
export const PhenotypeCodeSchema = z.enum(["PM", "IM", "NM", "RM", "UM", "Unknown"]);
export type PhenotypeCode = z.infer<typeof PhenotypeCodeSchema>;

export const VariantSchema = z.object({
    rsid: z.string().min(1),
    gene: z.string().min(1),
    allele: z.string().min(1),           // star allele, e.g. "*4"
    functionClass: z.string().min(1),
    cpicLevel: CpicLevelSchema,
    genotype: z.string().min(1),         // raw GT call, e.g. "0/1"
    zygosity: ZygositySchema,
    qualityScore: z.number().finite().nullable(),
    readDepth: z.number().int().nonnegative().nullable(),
    chromosome: z.string(),
    position: z.string(),
    ref: z.string(),
    alt: z.string(),
    filter: z.string(),
    annotations: z.object({
        gene: z.boolean(),
        star: z.boolean(),
        rsid: z.boolean(),
    }),
});

export type Variant = z.infer<typeof VariantSchema>;

export const RiskAssessmentSchema = z.object({
    drug: z.string().min(1),
    gene: z.string().min(1),
    diplotype: z.string().min(3),
    phenotype: PhenotypeSchema,
    label: RiskLabelSchema,
    severity: SeveritySchema,
    recommendation: z.string().min(1),
    cpicLevel: CpicLevelSchema,
    confidenceScore: z.number().min(0).max(1),
});

export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;

export const ConfidenceBreakdownSchema = z.object({
    qVcf: z.number().min(0).max(1),
    gCpic: z.number().min(0).max(1),
    pLlm: z.number().min(0).max(1),
});

export type ConfidenceBreakdown = z.infer<typeof ConfidenceBreakdownSchema>;
