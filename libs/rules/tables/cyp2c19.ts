import type { DrugRuleTable } from "../types";
import { phenotypeIn } from "../predicates";

export const clopidogrel: DrugRuleTable = {
    drug: "CLOPIDOGREL",
    gene: "CYP2C19",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Clopidogrel and CYP2C19 (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        recommendation: "Use clopidogrel at standard dose (75mg/day).",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "poor-metabolizer",
            when: phenotypeIn("PM"),
            outcome: {
                label: "Ineffective",
                severity: "high",
                recommendation: "AVOID clopidogrel. Poor metabolizers form little active metabolite. Use prasugrel or ticagrelor at standard doses.",
                confidenceScore: 0.95,
            },
        },
        {
            name: "intermediate-metabolizer",
            when: phenotypeIn("IM"),
            outcome: {
                label: "Ineffective",
                severity: "moderate",
                recommendation: "CONSIDER an alternative to clopidogrel. Intermediate metabolizers have reduced platelet inhibition; prasugrel or ticagrelor may be more effective.",
                confidenceScore: 0.85,
            },
        },
        {
            name: "rapid-or-ultrarapid",
            when: phenotypeIn("RM", "UM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "low",
                recommendation: "Rapid and ultrarapid metabolizers may form slightly more active metabolite with some added bleeding risk. Standard dosing with monitoring is likely appropriate.",
                confidenceScore: 0.8,
            },
        },
    ],
};

export const omeprazole: DrugRuleTable = {
    drug: "OMEPRAZOLE",
    gene: "CYP2C19",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Omeprazole and CYP2C19 (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        recommendation: "Use omeprazole at standard dose (20mg/day).",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "rapid-or-ultrarapid",
            when: phenotypeIn("RM", "UM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "moderate",
                recommendation: "CONSIDER an increased omeprazole dose. Rapid metabolizers may have low exposure and therapeutic failure. Consider 40mg/day or a PPI less affected by CYP2C19 (e.g., rabeprazole).",
                confidenceScore: 0.9,
            },
        },
        {
            name: "poor-metabolizer",
            when: phenotypeIn("PM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "low",
                recommendation: "CONSIDER a lower omeprazole dose. Poor metabolizers have 5-10x higher exposure, so lower amounts may suffice. Monitor for efficacy.",
                confidenceScore: 0.9,
            },
        },
    ],
};
