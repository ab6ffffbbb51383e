import type { Variant, Zygosity } from "../validation/dto";
import { lookupMarker } from "../pgx/markers";

const GENOTYPES: Record<Zygosity, string> = {
    "hom-ref": "0/0",
    het: "0/1",
    "hom-alt": "1/1",
    missing: "./.",
};

/** Builds a curated-marker variant the way the VCF adapter would. */
export function makeVariant(rsid: string, zygosity: Zygosity, overrides: Partial<Variant> = {}): Variant {
    const marker = lookupMarker(rsid);
    if (!marker) throw new Error(`not a curated marker: ${rsid}`);
    return {
        rsid,
        gene: marker.gene,
        allele: marker.allele,
        functionClass: marker.functionClass,
        cpicLevel: marker.cpicLevel,
        genotype: GENOTYPES[zygosity],
        zygosity,
        qualityScore: null,
        readDepth: null,
        chromosome: "1",
        position: "1000",
        ref: "A",
        alt: "G",
        filter: "PASS",
        annotations: { gene: false, star: false, rsid: true },
        ...overrides,
    };
}
