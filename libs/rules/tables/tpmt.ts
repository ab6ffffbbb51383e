import type { Variant } from "../../validation/dto";
import type { DrugRuleTable } from "../types";
import { carrierZygosity } from "../predicates";

const NO_FUNCTION_ALLELES = ["*2", "*3A", "*3B", "*3C"];
const isNoFunction = (v: Variant) => NO_FUNCTION_ALLELES.includes(v.allele);

export const azathioprine: DrugRuleTable = {
    drug: "AZATHIOPRINE",
    gene: "TPMT",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Azathioprine and TPMT (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        phenotype: "Normal metabolizer",
        recommendation: "Use azathioprine at standard dose (2-3 mg/kg/day).",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "no-function-homozygous",
            when: carrierZygosity(isNoFunction, "hom-alt"),
            outcome: {
                label: "Toxic",
                severity: "critical",
                phenotype: "Poor metabolizer",
                recommendation: "AVOID azathioprine. TPMT poor metabolizers risk life-threatening myelosuppression. Use an alternative immunosuppressant (e.g., cyclosporine, tacrolimus) or reduce the dose by 90% with frequent blood counts.",
                confidenceScore: 0.98,
            },
        },
        {
            name: "no-function-heterozygous",
            when: carrierZygosity(isNoFunction, "het"),
            outcome: {
                label: "Adjust Dosage",
                severity: "high",
                phenotype: "Intermediate metabolizer",
                recommendation: "REDUCE azathioprine dose. TPMT intermediate metabolizers need a 30-70% reduction. Start at 30-50% of the standard dose and titrate on tolerance and blood counts.",
                confidenceScore: 0.9,
            },
        },
    ],
};
