import { PhenotypeSchema, type Phenotype, type PhenotypeCode } from "../validation/dto";

type PhenotypeTable = Readonly<Record<string, Phenotype>>;

function table(entries: Array<[Phenotype, string[]]>): PhenotypeTable {
    const out: Record<string, Phenotype> = {};
    for (const [phenotype, diplotypes] of entries) {
        for (const d of diplotypes) out[d] = phenotype;
    }
    return Object.freeze(out);
}

// Keys are canonical diplotypes (see resolveDiplotype). Curated, not exhaustive.
const TABLES: Readonly<Record<string, PhenotypeTable>> = {
    CYP2D6: table([
        ["PM", ["*4/*4", "*3/*3", "*5/*5", "*6/*6"]],
        ["IM", ["*1/*4", "*1/*3", "*1/*5", "*1/*6", "*2/*4", "*4/*41"]],
        ["NM", ["*1/*1", "*1/*2", "*2/*2"]],
        ["UM", ["*1/*1xN", "*2/*2xN", "*1/*2xN"]],
    ]),
    CYP2C19: table([
        ["PM", ["*2/*2", "*3/*3", "*2/*3"]],
        ["IM", ["*1/*2", "*1/*3"]],
        ["NM", ["*1/*1"]],
        ["RM", ["*1/*17", "*17/*17"]],
    ]),
    CYP2C9: table([
        ["PM", ["*3/*3", "*2/*3"]],
        ["IM", ["*1/*2", "*1/*3", "*2/*2"]],
        ["NM", ["*1/*1"]],
    ]),
    SLCO1B1: table([
        ["Poor function", ["*5/*5"]],
        ["Intermediate function", ["*1/*5", "*1b/*5"]],
        ["Normal function", ["*1/*1", "*1/*1b", "*1b/*1b"]],
    ]),
    TPMT: table([
        ["Poor metabolizer", ["*2/*2", "*3A/*3A", "*3B/*3B", "*3C/*3C"]],
        ["Intermediate metabolizer", ["*1/*2", "*1/*3A", "*1/*3B", "*1/*3C"]],
        ["Normal metabolizer", ["*1/*1"]],
    ]),
    DPYD: table([
        ["Poor metabolizer", ["*2A/*2A", "*13/*13"]],
        ["Intermediate metabolizer", ["*1/*2A", "*1/*13", "*1/*9B", "*1/HapB3"]],
        ["Normal metabolizer", ["*1/*1"]],
    ]),
};

const has = (o: object, key: string) => Object.prototype.hasOwnProperty.call(o, key);

export function classifyPhenotype(gene: string, diplotype: string): Phenotype {
    if (!has(TABLES, gene)) return "Unknown";
    const t = TABLES[gene];
    return has(t, diplotype) ? t[diplotype] : "Unknown";
}

const CODE_BY_TIER: Readonly<Record<Phenotype, PhenotypeCode>> = {
    PM: "PM",
    IM: "IM",
    NM: "NM",
    RM: "RM",
    UM: "UM",
    "Poor function": "PM",
    "Intermediate function": "IM",
    "Normal function": "NM",
    "Poor metabolizer": "PM",
    "Intermediate metabolizer": "IM",
    "Normal metabolizer": "NM",
    Unknown: "Unknown",
};

export function toPhenotypeCode(phenotype: Phenotype): PhenotypeCode {
    return CODE_BY_TIER[phenotype];
}

const SYNONYMS: Readonly<Record<string, Phenotype>> = {
    pm: "PM",
    im: "IM",
    nm: "NM",
    em: "NM",
    rm: "RM",
    um: "UM",
    urm: "UM",
    "poor metabolizer": "PM",
    "intermediate metabolizer": "IM",
    "normal metabolizer": "NM",
    "extensive metabolizer": "NM",
    "rapid metabolizer": "RM",
    "ultrarapid metabolizer": "UM",
    "ultra-rapid metabolizer": "UM",
    "poor function": "Poor function",
    "decreased function": "Intermediate function",
    "intermediate function": "Intermediate function",
    "normal function": "Normal function",
    unknown: "Unknown",
};

/**
 * Maps free text (advisory output, request parameters) onto the closed
 * phenotype set. Unrecognized text is Unknown.
 */
export function normalizePhenotype(raw: string | null | undefined): Phenotype {
    const trimmed = (raw ?? "").trim();
    const exact = PhenotypeSchema.safeParse(trimmed);
    if (exact.success) return exact.data;
    const key = trimmed.toLowerCase().replace(/\s+/g, " ");
    return has(SYNONYMS, key) ? SYNONYMS[key] : "Unknown";
}
