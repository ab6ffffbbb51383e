import type { PhenotypeCode, Variant } from "../validation/dto";
import { genesForDrug, normalizeDrugName, type Gene } from "../pgx/markers";
import { resolveDiplotype } from "../pgx/diplotype";
import { classifyPhenotype, toPhenotypeCode } from "../pgx/phenotype";

export type BottleneckSeverity = "moderate" | "high" | "critical";

export interface Bottleneck {
    gene: Gene;
    competingDrugs: string[];
    count: number;
    severity: BottleneckSeverity;
    riskLevel: "medium" | "high";
    patientPhenotype: PhenotypeCode;
    warning: string;
    clinicalNote: string;
}

export function patientPhenotypeCode(variants: readonly Variant[], gene: string): PhenotypeCode {
    return toPhenotypeCode(classifyPhenotype(gene, resolveDiplotype(variants, gene)));
}

function clinicalNote(severity: BottleneckSeverity, gene: string, count: number, phenotype: PhenotypeCode): string {
    switch (severity) {
        case "critical":
            return `CRITICAL: ${count} drugs compete for ${gene}. This is a severe metabolic bottleneck even for normal metabolizers; consider alternative therapies.`;
        case "high":
            return `HIGH RISK: ${count} drugs use ${gene} and the patient's ${phenotype} status adds to the risk. Monitor closely.`;
        case "moderate":
            return `MODERATE RISK: ${count} drugs compete for ${gene}, which may reduce metabolic capacity. Consider monitoring drug levels.`;
    }
}

/**
 * Flags every gene that two or more of the requested drugs depend on. Drugs
 * outside the drug/gene map contribute nothing.
 */
export function detectBottlenecks(drugs: readonly string[], variants: readonly Variant[]): Bottleneck[] {
    const byGene = new Map<Gene, string[]>();
    for (const drug of new Set(drugs.map(normalizeDrugName))) {
        for (const gene of genesForDrug(drug)) {
            const list = byGene.get(gene) ?? [];
            list.push(drug);
            byGene.set(gene, list);
        }
    }

    const out: Bottleneck[] = [];
    for (const [gene, competingDrugs] of byGene) {
        const count = competingDrugs.length;
        if (count < 2) continue;

        const patientPhenotype = patientPhenotypeCode(variants, gene);
        const severity: BottleneckSeverity =
            count >= 3 ? "critical"
            : patientPhenotype === "PM" || patientPhenotype === "IM" ? "high"
            : "moderate";

        out.push({
            gene,
            competingDrugs,
            count,
            severity,
            riskLevel: severity === "moderate" ? "medium" : "high",
            patientPhenotype,
            warning: `Metabolic bottleneck: ${count} drugs compete for the ${gene} enzyme`,
            clinicalNote: clinicalNote(severity, gene, count, patientPhenotype),
        });
    }
    return out;
}
