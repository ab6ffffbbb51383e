import { BatchWriteCommand } from "@aws-sdk/lib-dynamodb";
import { chunk, createSeedHandler, MAX_ATTEMPTS } from "./handler";
import type { GuidelineRecord } from "../../../libs/guidelines";

const record = (i: number): GuidelineRecord => ({
    drug: `DRUG${i}`,
    gene: "CYP2D6",
    phenotypeCode: "PM",
    phenotypeName: "Poor Metabolizer",
    summary: "s",
    mechanism: "m",
    recommendation: "r",
    source: "Test guideline",
    url: "https://example.org/g",
});

const records = Array.from({ length: 30 }, (_, i) => record(i));
const pause = async () => undefined;

beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
    jest.restoreAllMocks();
});

test("chunk splits into fixed-size slices", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 25)).toEqual([]);
});

test("writes records in batches of 25", async () => {
    const send = jest.fn().mockResolvedValue({});
    const out = await createSeedHandler({ tableName: "guidelines", ddb: { send }, records, pause })();

    expect(out).toEqual({ ok: true, written: 30, batches: 2 });
    expect(send).toHaveBeenCalledTimes(2);
    const first = send.mock.calls[0][0];
    expect(first).toBeInstanceOf(BatchWriteCommand);
    expect(first.input.RequestItems.guidelines).toHaveLength(25);
    expect(first.input.RequestItems.guidelines[0].PutRequest.Item).toEqual({
        PK: "DRUG#DRUG0",
        SK: "PHENOTYPE#PM",
        ...record(0),
    });
    expect(send.mock.calls[1][0].input.RequestItems.guidelines).toHaveLength(5);
});

test("unprocessed items are retried", async () => {
    const leftover = [{ PutRequest: { Item: { PK: "DRUG#DRUG1", SK: "PHENOTYPE#PM" } } }];
    const send = jest.fn()
        .mockResolvedValueOnce({ UnprocessedItems: { guidelines: leftover } })
        .mockResolvedValueOnce({ UnprocessedItems: {} });

    await createSeedHandler({ tableName: "guidelines", ddb: { send }, records: [record(0), record(1)], pause })();

    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[1][0].input.RequestItems).toEqual({ guidelines: leftover });
});

test("gives up after the attempt limit", async () => {
    const leftover = [{ PutRequest: { Item: { PK: "DRUG#DRUG0", SK: "PHENOTYPE#PM" } } }];
    const send = jest.fn().mockResolvedValue({ UnprocessedItems: { guidelines: leftover } });

    await expect(createSeedHandler({ tableName: "guidelines", ddb: { send }, records: [record(0)], pause })())
        .rejects.toThrow(`1 guideline items still unprocessed after ${MAX_ATTEMPTS} attempts`);
    expect(send).toHaveBeenCalledTimes(MAX_ATTEMPTS);
});

test("seeds the bundled data by default", async () => {
    const send = jest.fn().mockResolvedValue({});
    const out = await createSeedHandler({ tableName: "guidelines", ddb: { send }, pause })();
    expect(out.written).toBe(24);
    expect(out.batches).toBe(1);
});
