import type { CpicLevel } from "../validation/dto";

export type Gene = "CYP2D6" | "CYP2C19" | "CYP2C9" | "SLCO1B1" | "TPMT" | "DPYD" | "VKORC1";

export interface MarkerDefinition {
    gene: Gene;
    allele: string;
    functionClass: string;
    cpicLevel: CpicLevel;
}

/** Reference allele used when a call carries no variant copy. */
export const REFERENCE_ALLELE = "*1";

/**
 * Curated pharmacogenomic markers, keyed by dbSNP id. Rows with any other id
 * are dropped by the VCF adapter.
 */
export const MARKERS: Readonly<Record<string, MarkerDefinition>> = {
    // CYP2D6
    rs1065852: { gene: "CYP2D6", allele: "*4", functionClass: "Poor metabolizer", cpicLevel: "A" },
    rs3892097: { gene: "CYP2D6", allele: "*4", functionClass: "Poor metabolizer", cpicLevel: "A" },
    rs5030655: { gene: "CYP2D6", allele: "*6", functionClass: "Poor metabolizer", cpicLevel: "A" },
    rs5030865: { gene: "CYP2D6", allele: "*3", functionClass: "Poor metabolizer", cpicLevel: "A" },

    // CYP2C19
    rs4244285: { gene: "CYP2C19", allele: "*2", functionClass: "Loss of function", cpicLevel: "A" },
    rs4986893: { gene: "CYP2C19", allele: "*3", functionClass: "Loss of function", cpicLevel: "A" },
    rs12248560: { gene: "CYP2C19", allele: "*17", functionClass: "Gain of function", cpicLevel: "A" },

    // CYP2C9
    rs1799853: { gene: "CYP2C9", allele: "*2", functionClass: "Reduced function", cpicLevel: "A" },
    rs1057910: { gene: "CYP2C9", allele: "*3", functionClass: "Reduced function", cpicLevel: "A" },
    rs28371686: { gene: "CYP2C9", allele: "*5", functionClass: "Reduced function", cpicLevel: "A" },
    rs9332131: { gene: "CYP2C9", allele: "*6", functionClass: "Reduced function", cpicLevel: "A" },

    // VKORC1 -1639G>A, warfarin companion marker
    rs9923231: { gene: "VKORC1", allele: "-1639A", functionClass: "Reduced expression", cpicLevel: "A" },

    // SLCO1B1
    rs4149056: { gene: "SLCO1B1", allele: "*5", functionClass: "Reduced function", cpicLevel: "A" },
    rs2306283: { gene: "SLCO1B1", allele: "*1b", functionClass: "Normal function", cpicLevel: "A" },

    // TPMT
    rs1800462: { gene: "TPMT", allele: "*2", functionClass: "Loss of function", cpicLevel: "A" },
    rs1800460: { gene: "TPMT", allele: "*3B", functionClass: "Loss of function", cpicLevel: "A" },
    rs1142345: { gene: "TPMT", allele: "*3C", functionClass: "Loss of function", cpicLevel: "A" },

    // DPYD
    rs3918290: { gene: "DPYD", allele: "*2A", functionClass: "Loss of function", cpicLevel: "A" },
    rs55886062: { gene: "DPYD", allele: "*13", functionClass: "Loss of function", cpicLevel: "A" },
    rs67376798: { gene: "DPYD", allele: "*9B", functionClass: "Reduced function", cpicLevel: "A" },
    rs75017182: { gene: "DPYD", allele: "HapB3", functionClass: "Reduced function", cpicLevel: "A" },
};

export function lookupMarker(rsid: string): MarkerDefinition | null {
    return Object.prototype.hasOwnProperty.call(MARKERS, rsid) ? MARKERS[rsid] : null;
}

export function supportedGenes(): Gene[] {
    return [...new Set(Object.values(MARKERS).map((m) => m.gene))];
}

/**
 * Genes each drug depends on, including drugs without a rule table. Used for
 * polypharmacy bottleneck detection.
 */
export const DRUG_GENES: Readonly<Record<string, readonly Gene[]>> = {
    CODEINE: ["CYP2D6"],
    WARFARIN: ["CYP2C9", "VKORC1"],
    CLOPIDOGREL: ["CYP2C19"],
    SIMVASTATIN: ["SLCO1B1"],
    AZATHIOPRINE: ["TPMT"],
    FLUOROURACIL: ["DPYD"],
    FLUOXETINE: ["CYP2D6"],
    PAROXETINE: ["CYP2D6"],
    RISPERIDONE: ["CYP2D6"],
    TAMOXIFEN: ["CYP2D6"],
    OMEPRAZOLE: ["CYP2C19"],
    PHENYTOIN: ["CYP2C9"],
    IBUPROFEN: ["CYP2C9"],
    DICLOFENAC: ["CYP2C9"],
};

export function genesForDrug(drug: string): readonly Gene[] {
    return Object.prototype.hasOwnProperty.call(DRUG_GENES, drug) ? DRUG_GENES[drug] : [];
}

export function normalizeDrugName(drug: string): string {
    return drug.trim().replace(/\s+/g, " ").toUpperCase();
}
