import type { Variant } from "../validation/dto";
import { REFERENCE_ALLELE } from "./markers";

export const DEFAULT_DIPLOTYPE = `${REFERENCE_ALLELE}/${REFERENCE_ALLELE}`;

export function variantsForGene(variants: readonly Variant[], gene: string): Variant[] {
    return variants.filter((v) => v.gene === gene);
}

function allelesFor(v: Variant): string[] {
    switch (v.zygosity) {
        case "hom-alt":
            return [v.allele, v.allele];
        case "het":
            return [REFERENCE_ALLELE, v.allele];
        case "hom-ref":
            return [REFERENCE_ALLELE, REFERENCE_ALLELE];
        case "missing":
            return [];
    }
}

/** Reference allele first, everything else in code-unit order. */
export function compareAlleles(a: string, b: string): number {
    const aRef = a === REFERENCE_ALLELE;
    const bRef = b === REFERENCE_ALLELE;
    if (aRef !== bRef) return aRef ? -1 : 1;
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Two-allele call for one gene.
 *
 * Contributions of every matching row are concatenated and only the first two
 * are kept. This is not haplotype phasing: with several marker rows for one
 * gene the later rows are ignored. Drugs that need per-marker zygosity read the
 * variant rows directly instead.
 */
export function resolveDiplotype(variants: readonly Variant[], gene: string): string {
    const alleles = variantsForGene(variants, gene).flatMap(allelesFor);
    if (alleles.length < 2) return DEFAULT_DIPLOTYPE;
    const [first, second] = alleles.slice(0, 2).sort(compareAlleles);
    return `${first}/${second}`;
}
