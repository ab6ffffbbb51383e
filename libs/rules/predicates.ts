import type { Phenotype, Variant } from "../validation/dto";
import type { RuleContext } from "./types";

export const phenotypeIn = (...phenotypes: Phenotype[]) =>
    (ctx: RuleContext) => phenotypes.includes(ctx.phenotype);

export const diplotypeContains = (...pairs: string[]) =>
    (ctx: RuleContext) => pairs.some((p) => ctx.diplotype.includes(p));

export const either = (...preds: Array<(ctx: RuleContext) => boolean>) =>
    (ctx: RuleContext) => preds.some((p) => p(ctx));

/**
 * First row of the gene that matches `isRisk` and carries at least one variant
 * copy. Hom-ref and missing calls are passed over; the scan stops at the first
 * carrier even if a later row would be more severe.
 */
export function firstCarrier(rows: readonly Variant[], isRisk: (v: Variant) => boolean): Variant | null {
    for (const v of rows) {
        if (!isRisk(v)) continue;
        if (v.zygosity === "hom-alt" || v.zygosity === "het") return v;
    }
    return null;
}

export const carrierZygosity = (isRisk: (v: Variant) => boolean, zygosity: "het" | "hom-alt") =>
    (ctx: RuleContext) => firstCarrier(ctx.geneVariants, isRisk)?.zygosity === zygosity;
