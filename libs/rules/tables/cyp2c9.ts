import type { DrugRuleTable } from "../types";
import { diplotypeContains, either, phenotypeIn } from "../predicates";

export const VKORC1_MARKER = "rs9923231";

export const warfarin: DrugRuleTable = {
    drug: "WARFARIN",
    gene: "CYP2C9",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Warfarin and CYP2C9/VKORC1 (Level A)",
    defaults: {
        label: "Adjust Dosage",
        severity: "moderate",
        recommendation: "Start with standard warfarin dosing (5mg/day). Monitor INR closely.",
        confidenceScore: 0.8,
    },
    rules: [
        {
            name: "poor-metabolizer",
            when: either(phenotypeIn("PM"), diplotypeContains("*2/*3", "*3/*3")),
            outcome: {
                severity: "high",
                recommendation: "SIGNIFICANTLY REDUCE warfarin dose. CYP2C9 poor metabolizers need 30-50% lower starting doses. Use a pharmacogenetic dosing algorithm and monitor INR frequently.",
                confidenceScore: 0.95,
            },
        },
        {
            name: "intermediate-metabolizer",
            when: either(phenotypeIn("IM"), diplotypeContains("*1/*2", "*1/*3", "*2/*2")),
            outcome: {
                severity: "moderate",
                recommendation: "REDUCE warfarin dose. CYP2C9 intermediate metabolizers need 20-30% lower starting doses. Monitor INR closely.",
                confidenceScore: 0.9,
            },
        },
    ],
    // Any VKORC1 row counts, whatever its genotype or the CYP2C9 result.
    amend: (ctx, outcome) => {
        const companion = ctx.variants.some((v) => v.gene === "VKORC1" || v.rsid === VKORC1_MARKER);
        if (!companion) return outcome;
        return {
            ...outcome,
            recommendation: `${outcome.recommendation} VKORC1 variant detected - consider 40-50% dose reduction.`,
        };
    },
};

export const ibuprofen: DrugRuleTable = {
    drug: "IBUPROFEN",
    gene: "CYP2C9",
    cpicLevel: "B",
    guideline: "CPIC Guideline for Ibuprofen and CYP2C9 (Level B)",
    defaults: {
        label: "Safe",
        severity: "none",
        recommendation: "Use ibuprofen at standard OTC doses (200-400mg every 6 hours).",
        confidenceScore: 0.8,
    },
    rules: [
        {
            name: "poor-metabolizer",
            when: phenotypeIn("PM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "moderate",
                recommendation: "CONSIDER a lower ibuprofen dose or an alternative. Poor metabolizers may have more GI bleeding with chronic use. Use the lowest effective dose for the shortest duration.",
                confidenceScore: 0.85,
            },
        },
    ],
};
