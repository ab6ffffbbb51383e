import { normalizeDrugName } from "../pgx/markers";
import { normalizePhenotype, toPhenotypeCode } from "../pgx/phenotype";
import { GUIDELINE_BUNDLE } from "./bundle";
import type { GuidelineRecord, GuidelineStore } from "./types";

/** In-memory store over the bundled guideline data. */
export class StaticGuidelineStore implements GuidelineStore {
    private readonly byKey = new Map<string, GuidelineRecord>();

    constructor(records: readonly GuidelineRecord[] = GUIDELINE_BUNDLE.records) {
        for (const r of records) this.byKey.set(`${r.drug}#${r.phenotypeCode}`, r);
    }

    async getGuideline(drug: string, phenotype: string): Promise<GuidelineRecord | null> {
        const code = toPhenotypeCode(normalizePhenotype(phenotype));
        if (code === "Unknown") return null;
        return this.byKey.get(`${normalizeDrugName(drug)}#${code}`) ?? null;
    }

    async listForDrug(drug: string): Promise<GuidelineRecord[]> {
        const key = normalizeDrugName(drug);
        return [...this.byKey.values()]
            .filter((r) => r.drug === key)
            .sort((a, b) => (a.phenotypeCode < b.phenotypeCode ? -1 : a.phenotypeCode > b.phenotypeCode ? 1 : 0));
    }
}
