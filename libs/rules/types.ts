import type { CpicLevel, Phenotype, RiskLabel, Severity, Variant } from "../validation/dto";
import type { Gene } from "../pgx/markers";

export interface RuleContext {
    variants: readonly Variant[];
    geneVariants: readonly Variant[];
    diplotype: string;
    phenotype: Phenotype;
}

export interface RuleOutcome {
    label: RiskLabel;
    severity: Severity;
    recommendation: string;
    confidenceScore: number;
    phenotype?: Phenotype;
}

export interface DecisionRule {
    name: string;
    when: (ctx: RuleContext) => boolean;
    outcome: Partial<RuleOutcome>;
}

/**
 * Ordered decision table for one drug. Rules are evaluated first-match-wins
 * over the defaults; `amend` runs last and may extend the recommendation.
 */
export interface DrugRuleTable {
    drug: string;
    gene: Gene;
    cpicLevel: CpicLevel;
    guideline: string;
    defaults: RuleOutcome;
    rules: readonly DecisionRule[];
    amend?: (ctx: RuleContext, outcome: RuleOutcome) => RuleOutcome;
}
