import type { DrugRuleTable } from "../types";
import { phenotypeIn } from "../predicates";

export const codeine: DrugRuleTable = {
    drug: "CODEINE",
    gene: "CYP2D6",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Codeine and CYP2D6 (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        recommendation: "Use codeine with standard dosing.",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "poor-metabolizer",
            when: phenotypeIn("PM"),
            outcome: {
                label: "Toxic",
                severity: "high",
                recommendation: "AVOID codeine. Poor metabolizers risk morphine toxicity. Use non-opioid analgesics or opioids that do not depend on CYP2D6 activation (e.g., morphine, hydromorphone).",
                confidenceScore: 0.95,
            },
        },
        {
            name: "rapid-or-ultrarapid",
            when: phenotypeIn("RM", "UM"),
            outcome: {
                label: "Toxic",
                severity: "high",
                recommendation: "AVOID codeine. Ultrarapid metabolizers form morphine quickly and risk life-threatening respiratory depression. Use alternative analgesics.",
                confidenceScore: 0.95,
            },
        },
    ],
};

export const fluoxetine: DrugRuleTable = {
    drug: "FLUOXETINE",
    gene: "CYP2D6",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Fluoxetine and CYP2D6 (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        recommendation: "Use fluoxetine at standard dose (20mg/day). Monitor for side effects.",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "poor-metabolizer",
            when: phenotypeIn("PM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "high",
                recommendation: "REDUCE fluoxetine dose. Poor metabolizers reach 2-4x higher concentrations. Start at 10mg/day and titrate slowly, or choose an antidepressant not metabolized by CYP2D6 (e.g., citalopram, sertraline).",
                confidenceScore: 0.95,
            },
        },
        {
            name: "intermediate-metabolizer",
            when: phenotypeIn("IM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "moderate",
                recommendation: "CONSIDER a lower fluoxetine dose. Intermediate metabolizers may have higher drug levels. Start at 10-15mg/day and monitor for side effects.",
                confidenceScore: 0.9,
            },
        },
    ],
};

export const paroxetine: DrugRuleTable = {
    drug: "PAROXETINE",
    gene: "CYP2D6",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Paroxetine and CYP2D6 (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        recommendation: "Use paroxetine at standard dose (20mg/day).",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "poor-metabolizer",
            when: phenotypeIn("PM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "high",
                recommendation: "REDUCE paroxetine dose. Poor metabolizers have much higher concentrations and more side effects. Start at 10mg/day or choose an antidepressant not metabolized by CYP2D6.",
                confidenceScore: 0.95,
            },
        },
        {
            name: "intermediate-metabolizer",
            when: phenotypeIn("IM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "moderate",
                recommendation: "CONSIDER a lower paroxetine dose. Intermediate metabolizers may have elevated levels. Start at 10-15mg/day and monitor for side effects.",
                confidenceScore: 0.9,
            },
        },
    ],
};

export const risperidone: DrugRuleTable = {
    drug: "RISPERIDONE",
    gene: "CYP2D6",
    cpicLevel: "A",
    guideline: "CPIC Guideline for Risperidone and CYP2D6 (Level A)",
    defaults: {
        label: "Safe",
        severity: "none",
        recommendation: "Use risperidone at standard dose (2-6mg/day).",
        confidenceScore: 0.85,
    },
    rules: [
        {
            name: "poor-metabolizer",
            when: phenotypeIn("PM"),
            outcome: {
                label: "Adjust Dosage",
                severity: "high",
                recommendation: "REDUCE risperidone dose. Poor metabolizers have a higher active fraction. Start at 0.5-1mg/day, titrate slowly and monitor for extrapyramidal side effects.",
                confidenceScore: 0.95,
            },
        },
    ],
};
