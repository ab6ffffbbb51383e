import { detectBottlenecks } from "./bottlenecks";
import { makeVariant } from "../testing/variants";

test("two drugs on an impaired gene are a high-risk bottleneck", () => {
    expect(detectBottlenecks(["clopidogrel", "OMEPRAZOLE"], [makeVariant("rs4244285", "het")])).toEqual([{
        gene: "CYP2C19",
        competingDrugs: ["CLOPIDOGREL", "OMEPRAZOLE"],
        count: 2,
        severity: "high",
        riskLevel: "high",
        patientPhenotype: "IM",
        warning: "Metabolic bottleneck: 2 drugs compete for the CYP2C19 enzyme",
        clinicalNote: "HIGH RISK: 2 drugs use CYP2C19 and the patient's IM status adds to the risk. Monitor closely.",
    }]);
});

test("two drugs on a normal gene are moderate", () => {
    const [b, ...rest] = detectBottlenecks(["WARFARIN", "IBUPROFEN"], []);
    expect(rest).toEqual([]);
    expect(b.gene).toBe("CYP2C9");
    expect(b.severity).toBe("moderate");
    expect(b.riskLevel).toBe("medium");
    expect(b.patientPhenotype).toBe("NM");
});

test("three drugs are critical whatever the phenotype", () => {
    const [b] = detectBottlenecks(["CODEINE", "PAROXETINE", "TAMOXIFEN"], []);
    expect(b.severity).toBe("critical");
    expect(b.count).toBe(3);
    expect(b.clinicalNote).toBe(
        "CRITICAL: 3 drugs compete for CYP2D6. This is a severe metabolic bottleneck even for normal metabolizers; consider alternative therapies.",
    );
});

test("single users, duplicates and unmapped drugs raise nothing", () => {
    expect(detectBottlenecks(["CODEINE", "ASPIRIN"], [])).toEqual([]);
    expect(detectBottlenecks(["CODEINE", " codeine "], [])).toEqual([]);
    expect(detectBottlenecks([], [])).toEqual([]);
});
