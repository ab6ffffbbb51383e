import { GetCommand, QueryCommand } from "@aws-sdk/lib-dynamodb";
import { StaticGuidelineStore } from "./static";
import { DynamoGuidelineStore, toItem } from "./dynamo";
import { GUIDELINE_BUNDLE, fallbackActionFor } from "./bundle";
import type { GuidelineRecord } from "./types";

const record: GuidelineRecord = {
    drug: "CODEINE",
    gene: "CYP2D6",
    phenotypeCode: "PM",
    phenotypeName: "Poor Metabolizer",
    summary: "Little morphine is formed.",
    mechanism: "Prodrug activation needs CYP2D6.",
    recommendation: "Avoid codeine.",
    source: "Test guideline",
    url: "https://example.org/codeine",
};

describe("StaticGuidelineStore", () => {
    const store = new StaticGuidelineStore();

    test("looks up by drug and phenotype code", async () => {
        const g = await store.getGuideline("codeine", "PM");
        expect(g?.gene).toBe("CYP2D6");
        expect(g?.phenotypeName).toBe("Poor Metabolizer");
    });

    test("phenotype text is normalized first", async () => {
        expect((await store.getGuideline("CLOPIDOGREL", "intermediate metabolizer"))?.phenotypeCode).toBe("IM");
        expect((await store.getGuideline("SIMVASTATIN", "Poor function"))?.phenotypeName).toBe("Poor Function");
        expect((await store.getGuideline("AZATHIOPRINE", "Normal metabolizer"))?.phenotypeCode).toBe("NM");
    });

    test("misses give null", async () => {
        expect(await store.getGuideline("CODEINE", "RM")).toBeNull();
        expect(await store.getGuideline("CODEINE", "not a phenotype")).toBeNull();
        expect(await store.getGuideline("ASPIRIN", "PM")).toBeNull();
    });

    test("lists a drug's records ordered by code", async () => {
        expect((await store.listForDrug("codeine")).map((r) => r.phenotypeCode)).toEqual(["IM", "NM", "PM", "UM"]);
        expect(await store.listForDrug("ASPIRIN")).toEqual([]);
    });

    test("custom records", async () => {
        const custom = new StaticGuidelineStore([record]);
        expect(await custom.getGuideline("CODEINE", "Poor Metabolizer")).toEqual(record);
    });
});

describe("bundled data", () => {
    test("every record has a fallback action for its drug", () => {
        for (const r of GUIDELINE_BUNDLE.records) expect(fallbackActionFor(r.drug)).not.toBeNull();
    });

    test("unknown drug has no fallback action", () => {
        expect(fallbackActionFor("ASPIRIN")).toBeNull();
    });
});

describe("DynamoGuidelineStore", () => {
    test("gets by composite key", async () => {
        const send = jest.fn().mockResolvedValue({ Item: toItem(record) });
        const store = new DynamoGuidelineStore("guidelines", { send });

        expect(await store.getGuideline(" codeine", "poor metabolizer")).toEqual(record);
        const cmd = send.mock.calls[0][0];
        expect(cmd).toBeInstanceOf(GetCommand);
        expect(cmd.input).toEqual({ TableName: "guidelines", Key: { PK: "DRUG#CODEINE", SK: "PHENOTYPE#PM" } });
    });

    test("unknown phenotype skips the table", async () => {
        const send = jest.fn();
        const store = new DynamoGuidelineStore("guidelines", { send });
        expect(await store.getGuideline("CODEINE", "???")).toBeNull();
        expect(send).not.toHaveBeenCalled();
    });

    test("queries a drug partition and drops invalid items", async () => {
        const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
        const send = jest.fn().mockResolvedValue({ Items: [toItem(record), { PK: "DRUG#CODEINE", SK: "PHENOTYPE#XX" }] });
        const store = new DynamoGuidelineStore("guidelines", { send });

        expect(await store.listForDrug("codeine")).toEqual([record]);
        expect(send.mock.calls[0][0]).toBeInstanceOf(QueryCommand);
        expect(send.mock.calls[0][0].input.ExpressionAttributeValues).toEqual({ ":pk": "DRUG#CODEINE", ":prefix": "PHENOTYPE#" });
        expect(warn).toHaveBeenCalledTimes(1);
        warn.mockRestore();
    });

    test("follows LastEvaluatedKey across pages", async () => {
        const pageKey = { PK: "DRUG#CODEINE", SK: "PHENOTYPE#PM" };
        const second = { ...record, phenotypeCode: "UM" as const, phenotypeName: "Ultrarapid Metabolizer" };
        const send = jest.fn()
            .mockResolvedValueOnce({ Items: [toItem(record)], LastEvaluatedKey: pageKey })
            .mockResolvedValueOnce({ Items: [toItem(second)] });
        const store = new DynamoGuidelineStore("guidelines", { send });

        expect(await store.listForDrug("CODEINE")).toEqual([record, second]);
        expect(send).toHaveBeenCalledTimes(2);
        expect(send.mock.calls[0][0].input.ExclusiveStartKey).toBeUndefined();
        expect(send.mock.calls[1][0].input.ExclusiveStartKey).toEqual(pageKey);
    });
});
