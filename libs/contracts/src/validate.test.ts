import { validate } from "./validate";
import type { AnalyzeRequestV1 } from "./types";
import { ContractError } from "../../errors";
import { analyzeDrug } from "../../analysis/pipeline";
import { StaticGuidelineStore } from "../../guidelines/static";
import { loadConfidenceConfig } from "../../config/confidence";
import { parseVcf } from "../../adapters";

const request = (body: unknown) => () => validate<AnalyzeRequestV1>("pgx.analyze.request.v1", body);

test("single and batch requests validate", () => {
    expect(request({ drug: "CODEINE", vcf: { text: "" } })).not.toThrow();
    expect(request({ drugs: ["CODEINE", "WARFARIN"], patientId: "P_1", vcf: { s3: { bucket: "uploads", key: "a.vcf" } } })).not.toThrow();
});

test("drug and drugs are mutually exclusive", () => {
    expect(request({ vcf: { text: "" } })).toThrow(ContractError);
    expect(request({ drug: "CODEINE", drugs: ["WARFARIN"], vcf: { text: "" } })).toThrow(ContractError);
});

test("vcf needs exactly one source", () => {
    expect(request({ drug: "CODEINE", vcf: {} })).toThrow(ContractError);
    expect(request({ drug: "CODEINE", vcf: { text: "", s3: { bucket: "uploads", key: "a.vcf" } } })).toThrow(ContractError);
});

test("errors name the failing path", () => {
    try {
        validate("pgx.analyze.request.v1", { drug: "CODEINE", vcf: { text: "" }, extra: 1 });
        throw new Error("expected a contract error");
    } catch (e) {
        expect(e).toBeInstanceOf(ContractError);
        expect(e instanceof ContractError && e.message).toBe(
            "Schema validation failed for pgx.analyze.request.v1: / must NOT have additional properties",
        );
        expect(e instanceof ContractError && e.details[0]?.keyword).toBe("additionalProperties");
    }
});

test("pipeline reports satisfy pgx.report.v1", async () => {
    const vcf = parseVcf("#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tS1\n22\t42524947\trs3892097\tC\tT\t99\tPASS\tGENE=CYP2D6\tGT:DP\t0/1:40\n");
    const deps = { confidence: loadConfidenceConfig({}), guidelines: new StaticGuidelineStore(), advisory: null };

    for (const drug of ["CODEINE", "WARFARIN", "ASPIRIN"]) {
        const report = await analyzeDrug({ patientId: "PATIENT_TEST0001", vcf }, drug, deps);
        expect(() => validate("pgx.report.v1", report)).not.toThrow();
    }
});
