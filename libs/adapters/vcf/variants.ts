import { parse } from "csv-parse/sync";
import { VariantSchema, type Variant, type Zygosity } from "../../validation/dto";
import { lookupMarker } from "../../pgx/markers";
import { errorMessage } from "../../errors";

export interface VcfParseResult {
    variants: Variant[];
    readable: boolean;       // false only when the input as a whole could not be read
    dataLines: number;       // non-comment, non-blank lines
    skippedLines: number;    // data lines that did not yield a variant
}

const MISSING_CALL = "./.";

export function zygosityOf(genotype: string): Zygosity {
    switch (genotype) {
        case "0/0":
        case "0|0":
            return "hom-ref";
        case "0/1":
        case "1/0":
        case "0|1":
        case "1|0":
            return "het";
        case "1/1":
        case "1|1":
            return "hom-alt";
        default:
            return "missing";
    }
}

function infoValue(info: string, key: string): string | null {
    for (const entry of info.split(";")) {
        const eq = entry.indexOf("=");
        if (eq > 0 && entry.slice(0, eq) === key) return entry.slice(eq + 1) || null;
    }
    return null;
}

function toInt(raw: string | null | undefined): number | null {
    if (raw == null || !/^\d+$/.test(raw)) return null;
    return Number(raw);
}

function toQuality(raw: string): number | null {
    if (raw === "" || raw === ".") return null;
    const n = Number(raw);
    return Number.isFinite(n) ? n : null;
}

function isStringRow(row: unknown): row is string[] {
    return Array.isArray(row) && row.every((c) => typeof c === "string");
}

/**
 * Minimal VCF reader for the curated pharmacogenomic markers.
 * - Drops `#` header/comment lines and blank lines
 * - Requires the 8 fixed columns (CHROM POS ID REF ALT QUAL FILTER INFO)
 * - Keeps a row only when ID is a curated marker
 * - GT from the first sample column, DP from FORMAT/sample before INFO
 */
export function parseVcf(input: Buffer | string): VcfParseResult {
    let rows: string[][];
    try {
        const text = typeof input === "string" ? input : input.toString("utf8");
        const lines = text
            .split(/\r\n|\r|\n/)
            .filter((line) => !line.startsWith("#"))
            .map((line) => line.trim())
            .filter(Boolean);
        const parsed: unknown[] = lines.length === 0 ? [] : parse(lines.join("\n"), {
            delimiter: "\t",
            quote: false,
            relax_column_count: true,
            skip_empty_lines: true,
        });
        rows = parsed.filter(isStringRow);
    } catch (e) {
        console.warn("vcf-unreadable", errorMessage(e));
        return { variants: [], readable: false, dataLines: 0, skippedLines: 0 };
    }

    const variants: Variant[] = [];
    for (const cols of rows) {
        if (cols.length < 8) continue;
        const [chrom, pos, id, ref, alt, qual, filter, info] = cols;

        const marker = lookupMarker(id);
        if (!marker) continue;

        const format = cols[8] ?? "";
        const sample = cols[9];

        let genotype = MISSING_CALL;
        let sampleDepth: number | null = null;
        if (sample !== undefined) {
            const sampleFields = sample.split(":");
            genotype = sampleFields[0] || MISSING_CALL;
            if (format && sample.includes(":")) {
                const dpIndex = format.split(":").indexOf("DP");
                if (dpIndex >= 0) sampleDepth = toInt(sampleFields[dpIndex]);
            }
        }

        const infoGene = infoValue(info, "GENE");
        const starAnnotated = infoValue(info, "STAR") !== null || infoValue(info, "STAR_ALLELE") !== null;

        const candidate = {
            rsid: id,
            gene: infoGene ?? marker.gene,
            allele: marker.allele,
            functionClass: marker.functionClass,
            cpicLevel: marker.cpicLevel,
            genotype,
            zygosity: zygosityOf(genotype),
            qualityScore: toQuality(qual),
            readDepth: sampleDepth ?? toInt(infoValue(info, "DP")),
            chromosome: chrom,
            position: pos,
            ref,
            alt,
            filter,
            annotations: {
                gene: infoGene !== null,
                star: starAnnotated,
                rsid: id !== "" && id !== ".",
            },
        };

        const checked = VariantSchema.safeParse(candidate);
        if (checked.success) variants.push(checked.data);
    }

    return {
        variants,
        readable: true,
        dataLines: rows.length,
        skippedLines: rows.length - variants.length,
    };
}

export function extractVariants(input: Buffer | string): Variant[] {
    return parseVcf(input).variants;
}
