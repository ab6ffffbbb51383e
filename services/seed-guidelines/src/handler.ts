import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { BatchWriteCommand, DynamoDBDocumentClient, type BatchWriteCommandInput } from "@aws-sdk/lib-dynamodb";

import { GUIDELINE_BUNDLE, toItem, type GuidelineRecord } from "../../../libs/guidelines";

export const BATCH_SIZE = 25; // BatchWriteItem limit
export const MAX_ATTEMPTS = 5;

type WriteRequests = NonNullable<BatchWriteCommandInput["RequestItems"]>[string];

export interface SeedDeps {
    tableName: string;
    ddb: Pick<DynamoDBDocumentClient, "send">;
    records?: readonly GuidelineRecord[];
    pause?: (ms: number) => Promise<void>;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function chunk<T>(items: readonly T[], size: number): T[][] {
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
    return out;
}

async function writeBatch(deps: SeedDeps, requests: WriteRequests) {
    let pending = requests;
    for (let attempt = 1; pending.length > 0; attempt++) {
        if (attempt > MAX_ATTEMPTS) {
            throw new Error(`${pending.length} guideline items still unprocessed after ${MAX_ATTEMPTS} attempts`);
        }
        const res = await deps.ddb.send(new BatchWriteCommand({ RequestItems: { [deps.tableName]: pending } }));
        pending = res.UnprocessedItems?.[deps.tableName] ?? [];
        if (pending.length > 0) await (deps.pause ?? sleep)(50 * 2 ** attempt);
    }
}

/** Upserts the bundled guideline records; safe to re-run. */
export function createSeedHandler(deps: SeedDeps) {
    return async () => {
        const records = deps.records ?? GUIDELINE_BUNDLE.records;
        const batches = chunk(records.map((r) => ({ PutRequest: { Item: toItem(r) } })), BATCH_SIZE);
        for (const batch of batches) await writeBatch(deps, batch);
        console.log("guidelines-seeded", deps.tableName, records.length);
        return { ok: true, written: records.length, batches: batches.length };
    };
}

export const handler = createSeedHandler({
    tableName: process.env.GUIDELINES_TABLE ?? "",
    ddb: DynamoDBDocumentClient.from(new DynamoDBClient({})),
});
