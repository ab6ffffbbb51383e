import type { Variant } from "../../validation/dto";
import type { DrugRuleTable } from "../types";
import { carrierZygosity } from "../predicates";

const isC521T = (v: Variant) => v.allele === "*5" || v.rsid === "rs4149056";

// Decided from the raw SLCO1B1 rows, not the classified diplotype.
export const simvastatin: DrugRuleTable = {
    drug: "SIMVASTATIN",
    gene: "SLCO1B1",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Simvastatin and SLCO1B1 (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        phenotype: "Normal function",
        recommendation: "Use simvastatin at standard dose (up to 40mg/day).",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "c521t-homozygous",
            when: carrierZygosity(isC521T, "hom-alt"),
            outcome: {
                label: "Toxic",
                severity: "high",
                phenotype: "Poor function",
                recommendation: "SIGNIFICANTLY REDUCE simvastatin dose or choose another statin. Homozygous SLCO1B1 carriers have about 200% higher statin exposure. Maximum 20mg/day with close monitoring for myopathy.",
                confidenceScore: 0.95,
            },
        },
        {
            name: "c521t-heterozygous",
            when: carrierZygosity(isC521T, "het"),
            outcome: {
                label: "Adjust Dosage",
                severity: "moderate",
                phenotype: "Intermediate function",
                recommendation: "REDUCE simvastatin dose. Heterozygous SLCO1B1 carriers have increased statin exposure. Maximum 40mg/day; consider pravastatin or rosuvastatin if higher doses are needed.",
                confidenceScore: 0.9,
            },
        },
    ],
};
