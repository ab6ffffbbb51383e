import { analyzeBatch, analyzeDrug, distinctDrugs, resolveRecommendation, type PipelineDeps } from "./pipeline";
import { StaticGuidelineStore } from "../guidelines/static";
import type { GuidelineStore } from "../guidelines/types";
import type { AdvisoryModel, RiskSuggestion } from "../advisory/types";
import type { ConfidenceConfig } from "../config/confidence";
import type { VcfParseResult } from "../adapters";
import { makeVariant } from "../testing/variants";

const confidence: ConfidenceConfig = {
    qualMin: 20,
    qualMax: 200,
    dpMin: 10,
    dpMax: 100,
    weights: { vcf: 0.4, cpic: 0.45, llm: 0.15 },
};

const vcf: VcfParseResult = {
    variants: [makeVariant("rs3892097", "hom-alt")],
    readable: true,
    dataLines: 1,
    skippedLines: 0,
};

const input = { patientId: "PATIENT_TEST0001", vcf };
const now = () => new Date("2026-01-02T03:04:05.000Z");

function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
    return { confidence, guidelines: new StaticGuidelineStore(), advisory: null, now, ...overrides };
}

const suggestion: RiskSuggestion = {
    label: "Adjust Dosage",
    severity: "moderate",
    phenotype: "IM",
    diplotype: "*1/*4",
    gene: "CYP2D6",
    recommendation: "Start low.",
    cpicLevel: "A",
    confidencePercent: 80,
};

function advisory(overrides: Partial<AdvisoryModel> = {}): AdvisoryModel {
    return {
        configured: true,
        suggestRisk: jest.fn(async () => suggestion),
        explain: jest.fn(async () => ({ summary: "Reduced activation.", mechanism: "Consider a lower dose.", recommendation: null })),
        ...overrides,
    };
}

test("deterministic report with a guideline narrative", async () => {
    const report = await analyzeDrug(input, "codeine", deps());

    expect(report.schema).toBe("pgx.report.v1");
    expect(report.patientId).toBe("PATIENT_TEST0001");
    expect(report.drug).toBe("CODEINE");
    expect(report.timestamp).toBe("2026-01-02T03:04:05.000Z");
    expect(report.riskAssessment).toEqual({ riskLabel: "Toxic", confidenceScore: 0.79, severity: "high" });
    expect(report.pharmacogenomicProfile).toEqual({
        primaryGene: "CYP2D6",
        diplotype: "*4/*4",
        phenotype: "PM",
        detectedVariants: [{ rsid: "rs3892097", chromosome: "1", position: "1000", genotype: "1/1" }],
    });
    expect(report.clinicalRecommendation.recommendationText).toMatch(/^AVOID codeine\. Poor metabolizers/);
    expect(report.clinicalRecommendation.guidelineSource).toBe("CPIC Guideline for Codeine and CYP2D6");
    expect(report.explanation.source).toBe("guideline");
    expect(report.explanation.summary).toBe(
        "CYP2D6 poor metabolizers convert very little codeine into morphine, so pain relief is usually inadequate.",
    );
    expect(report.explanation.variantCitations).toEqual([{
        rsid: "rs3892097",
        gene: "CYP2D6",
        allele: "*4",
        function: "Poor metabolizer",
        genotype: "1/1",
        dbSnpUrl: "https://www.ncbi.nlm.nih.gov/snp/rs3892097",
    }]);
    expect(report.explanation.guidelineCitations[0].type).toBe("guideline");
    expect(report.qualityMetrics).toEqual({
        vcfParsingSuccess: true,
        totalVariantsAnalyzed: 1,
        confidenceBreakdown: { qVcf: 0.58, gCpic: 1, pLlm: 0.75 },
        confidenceModel: { w_vcf: 0.4, w_cpic: 0.45, w_llm: 0.15, qual_min: 20, qual_max: 200, dp_min: 10, dp_max: 100 },
    });
});

test("advisory suggestion and explanation are merged and scored", async () => {
    const model = advisory();
    const report = await analyzeDrug(input, "CODEINE", deps({ advisory: model }));

    expect(report.riskAssessment).toEqual({ riskLabel: "Adjust Dosage", confidenceScore: 0.81, severity: "moderate" });
    expect(report.pharmacogenomicProfile.phenotype).toBe("IM");
    expect(report.pharmacogenomicProfile.diplotype).toBe("*1/*4");
    expect(report.clinicalRecommendation.recommendationText).toBe("Start low.");
    expect(report.explanation).toMatchObject({ source: "advisory", summary: "Reduced activation.", mechanism: "Consider a lower dose." });
    expect(report.qualityMetrics.confidenceBreakdown.pLlm).toBe(0.87);

    expect(model.suggestRisk).toHaveBeenCalledWith(
        expect.objectContaining({ drug: "CODEINE" }),
        { gene: "CYP2D6", diplotype: "*4/*4" },
    );
    expect(model.explain).toHaveBeenCalledWith(expect.objectContaining({
        drug: "CODEINE",
        phenotype: "IM",
        guideline: expect.objectContaining({ phenotypeCode: "IM" }),
    }));
});

test("advisory failures leave the deterministic result", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const model = advisory({
        suggestRisk: jest.fn(async () => { throw new Error("HTTP 500"); }),
        explain: jest.fn(async () => { throw new Error("timeout"); }),
    });

    const report = await analyzeDrug(input, "CODEINE", deps({ advisory: model }));
    expect(report.riskAssessment.riskLabel).toBe("Toxic");
    expect(report.explanation.source).toBe("guideline");
    expect(warn).toHaveBeenCalledWith("advisory-risk-failed", "HTTP 500");
    expect(warn).toHaveBeenCalledWith("advisory-explain-failed", "timeout");
    warn.mockRestore();
});

test("unconfigured advisory is never called", async () => {
    const model = advisory({ configured: false });
    await analyzeDrug(input, "CODEINE", deps({ advisory: model }));
    expect(model.suggestRisk).not.toHaveBeenCalled();
    expect(model.explain).not.toHaveBeenCalled();
});

test("guideline store failure falls back to a fixed narrative", async () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const broken: GuidelineStore = {
        getGuideline: async () => { throw new Error("table missing"); },
        listForDrug: async () => [],
    };

    const report = await analyzeDrug(input, "CODEINE", deps({ guidelines: broken }));
    expect(report.explanation.source).toBe("fallback");
    expect(report.explanation.summary).toBe("Patient exhibits PM phenotype for CODEINE.");
    expect(report.explanation.guidelineCitations[0]).toMatchObject({ type: "reference", url: "https://cpicpgx.org/guidelines/" });
    expect(report.clinicalRecommendation.guidelineSource).toBe("CPIC Guideline for Codeine and CYP2D6 (Level A)");
    expect(warn).toHaveBeenCalledWith("guideline-lookup-failed", "table missing");
    warn.mockRestore();
});

test("unmapped drug reports Unknown", async () => {
    const report = await analyzeDrug(input, "aspirin", deps());
    expect(report.drug).toBe("ASPIRIN");
    expect(report.riskAssessment.riskLabel).toBe("Unknown");
    expect(report.pharmacogenomicProfile).toEqual({ primaryGene: "Unknown", diplotype: "*1/*1", phenotype: "Unknown", detectedVariants: [] });
    expect(report.clinicalRecommendation).toEqual({
        recommendationText: "Insufficient genetic data. Standard dosing recommended with clinical monitoring.",
        cpicLevel: "N/A",
        guidelineSource: null,
    });
    expect(report.explanation.source).toBe("fallback");
});

test("recommendation resolution order", () => {
    expect(resolveRecommendation("CODEINE", " ", null, "Second.")).toBe("Second.");
    expect(resolveRecommendation("CODEINE", null)).toBe(
        "Guideline action: avoid codeine for CYP2D6 poor or ultrarapid metabolizers; otherwise dose normally and monitor.",
    );
    expect(resolveRecommendation("ASPIRIN")).toBe(
        "No guideline-based dosing recommendation is available; perform a clinician-reviewed pharmacogenomic assessment.",
    );
});

test("batch analyzes each distinct drug and flags bottlenecks", async () => {
    const batch = await analyzeBatch(input, ["codeine", "CODEINE", " paroxetine", "tamoxifen", ""], deps());

    expect(distinctDrugs(["codeine", "CODEINE", ""])).toEqual(["CODEINE"]);
    expect(batch.patientId).toBe("PATIENT_TEST0001");
    expect(batch.reports.map((r) => [r.drug, r.riskAssessment.riskLabel])).toEqual([
        ["CODEINE", "Toxic"],
        ["PAROXETINE", "Adjust Dosage"],
        ["TAMOXIFEN", "Unknown"],
    ]);
    expect(batch.reports.every((r) => r.timestamp === batch.timestamp)).toBe(true);
    expect(batch.bottlenecks).toHaveLength(1);
    expect(batch.bottlenecks[0]).toMatchObject({ gene: "CYP2D6", count: 3, severity: "critical", patientPhenotype: "PM" });
});
