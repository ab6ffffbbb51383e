import type { Variant } from "../../validation/dto";
import type { DrugRuleTable } from "../types";
import { carrierZygosity } from "../predicates";

const HIGH_RISK_ALLELES = ["*2A", "*13", "HapB3"];
const isHighRisk = (v: Variant) => HIGH_RISK_ALLELES.includes(v.allele) || v.functionClass === "Loss of function";

export const fluorouracil: DrugRuleTable = {
    drug: "FLUOROURACIL",
    gene: "DPYD",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Fluorouracil and DPYD (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        phenotype: "Normal metabolizer",
        recommendation: "Use fluorouracil at standard dose.",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "high-risk-homozygous",
            when: carrierZygosity(isHighRisk, "hom-alt"),
            outcome: {
                label: "Toxic",
                severity: "critical",
                phenotype: "Poor metabolizer",
                recommendation: "AVOID fluorouracil. DPYD poor metabolizers risk severe, life-threatening myelosuppression, neurotoxicity and gastrointestinal toxicity. Use an alternative chemotherapeutic agent.",
                confidenceScore: 0.98,
            },
        },
        {
            name: "high-risk-heterozygous",
            when: carrierZygosity(isHighRisk, "het"),
            outcome: {
                label: "Toxic",
                severity: "high",
                phenotype: "Intermediate metabolizer",
                recommendation: "REDUCE fluorouracil dose by 50%. DPYD intermediate metabolizers are at increased risk of severe toxicity. Consider alternative chemotherapy or reduce the dose with intensive monitoring.",
                confidenceScore: 0.95,
            },
        },
    ],
};
