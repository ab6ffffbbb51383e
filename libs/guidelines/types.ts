import { z } from "zod";
import { PhenotypeCodeSchema, type PhenotypeCode } from "../validation/dto";

export const GuidelineRecordSchema = z.object({
    drug: z.string().min(1),
    gene: z.string().min(1),
    phenotypeCode: PhenotypeCodeSchema,
    phenotypeName: z.string().min(1),
    summary: z.string().min(1),
    mechanism: z.string().min(1),
    recommendation: z.string().min(1),
    source: z.string().min(1),
    url: z.string().url(),
});

export type GuidelineRecord = z.infer<typeof GuidelineRecordSchema>;

export const GuidelineBundleSchema = z.object({
    fallbackActions: z.record(z.string(), z.string().min(1)),
    records: z.array(GuidelineRecordSchema),
});

export type GuidelineBundle = z.infer<typeof GuidelineBundleSchema>;

/**
 * Read side of the guideline knowledge base. `phenotype` may be a code or any
 * text `normalizePhenotype` understands.
 */
export interface GuidelineStore {
    getGuideline(drug: string, phenotype: string): Promise<GuidelineRecord | null>;
    listForDrug(drug: string): Promise<GuidelineRecord[]>;
}

export const guidelineKey = (drug: string, code: PhenotypeCode) => ({
    PK: `DRUG#${drug}`,
    SK: `PHENOTYPE#${code}`,
});
