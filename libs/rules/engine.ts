import type { RiskAssessment, Variant } from "../validation/dto";
import { normalizeDrugName } from "../pgx/markers";
import { DEFAULT_DIPLOTYPE, resolveDiplotype, variantsForGene } from "../pgx/diplotype";
import { classifyPhenotype } from "../pgx/phenotype";
import { RULE_TABLES } from "./tables";
import type { DrugRuleTable, RuleContext, RuleOutcome } from "./types";

export const UNKNOWN_RECOMMENDATION =
    "Insufficient genetic data. Standard dosing recommended with clinical monitoring.";

export function unknownAssessment(drug: string): RiskAssessment {
    return {
        drug: normalizeDrugName(drug) || "UNKNOWN",
        gene: "Unknown",
        diplotype: DEFAULT_DIPLOTYPE,
        phenotype: "Unknown",
        label: "Unknown",
        severity: "unknown",
        recommendation: UNKNOWN_RECOMMENDATION,
        cpicLevel: "N/A",
        confidenceScore: 0.5,
    };
}

export function ruleTableFor(drug: string): DrugRuleTable | null {
    const key = normalizeDrugName(drug);
    return Object.prototype.hasOwnProperty.call(RULE_TABLES, key) ? RULE_TABLES[key] : null;
}

export function supportedDrugs(): string[] {
    return Object.keys(RULE_TABLES);
}

/** Guideline title per supported drug, for references in reports and /health. */
export function guidelineReferences(): Record<string, string> {
    return Object.fromEntries(Object.values(RULE_TABLES).map((t) => [t.drug, t.guideline]));
}

export function guidelineTitleFor(drug: string): string | null {
    return ruleTableFor(drug)?.guideline ?? null;
}

export function buildRuleContext(table: DrugRuleTable, variants: readonly Variant[]): RuleContext {
    const diplotype = resolveDiplotype(variants, table.gene);
    return {
        variants,
        geneVariants: variantsForGene(variants, table.gene),
        diplotype,
        phenotype: classifyPhenotype(table.gene, diplotype),
    };
}

export function evaluateRuleTable(table: DrugRuleTable, ctx: RuleContext): RiskAssessment {
    const matched = table.rules.find((rule) => rule.when(ctx));
    let outcome: RuleOutcome = { ...table.defaults, ...matched?.outcome };
    if (table.amend) outcome = table.amend(ctx, outcome);

    return {
        drug: table.drug,
        gene: table.gene,
        diplotype: ctx.diplotype,
        phenotype: outcome.phenotype ?? ctx.phenotype,
        label: outcome.label,
        severity: outcome.severity,
        recommendation: outcome.recommendation,
        cpicLevel: table.cpicLevel,
        confidenceScore: outcome.confidenceScore,
    };
}

/**
 * Deterministic risk for one drug. Unmapped drug names give the Unknown
 * assessment; this never throws for domain data.
 */
export function assessDrugRisk(variants: readonly Variant[], drug: string): RiskAssessment {
    const table = ruleTableFor(drug);
    if (!table) return unknownAssessment(drug);
    return evaluateRuleTable(table, buildRuleContext(table, variants));
}
