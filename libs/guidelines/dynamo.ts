import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient, GetCommand, QueryCommand, type QueryCommandInput } from "@aws-sdk/lib-dynamodb";

import { normalizeDrugName } from "../pgx/markers";
import { normalizePhenotype, toPhenotypeCode } from "../pgx/phenotype";
import { GuidelineRecordSchema, guidelineKey, type GuidelineRecord, type GuidelineStore } from "./types";

/**
 * Single-table layout:
 *   PK = DRUG#<drug>   SK = PHENOTYPE#<code>
 * Items carry the GuidelineRecord attributes next to the keys.
 */
export class DynamoGuidelineStore implements GuidelineStore {
    constructor(
        private readonly tableName: string,
        private readonly ddb: Pick<DynamoDBDocumentClient, "send"> = DynamoDBDocumentClient.from(new DynamoDBClient({})),
    ) {}

    async getGuideline(drug: string, phenotype: string): Promise<GuidelineRecord | null> {
        const code = toPhenotypeCode(normalizePhenotype(phenotype));
        if (code === "Unknown") return null;

        const res = await this.ddb.send(new GetCommand({
            TableName: this.tableName,
            Key: guidelineKey(normalizeDrugName(drug), code),
        }));
        return res.Item ? toRecord(res.Item) : null;
    }

    async listForDrug(drug: string): Promise<GuidelineRecord[]> {
        const records: GuidelineRecord[] = [];
        let startKey: QueryCommandInput["ExclusiveStartKey"];
        do {
            const res = await this.ddb.send(new QueryCommand({
                TableName: this.tableName,
                KeyConditionExpression: "PK = :pk AND begins_with(SK, :prefix)",
                ExpressionAttributeValues: {
                    ":pk": `DRUG#${normalizeDrugName(drug)}`,
                    ":prefix": "PHENOTYPE#",
                },
                ExclusiveStartKey: startKey,
            }));
            for (const item of res.Items ?? []) {
                const rec = toRecord(item);
                if (rec) records.push(rec);
            }
            startKey = res.LastEvaluatedKey;
        } while (startKey);
        return records;
    }
}

function toRecord(item: Record<string, unknown>): GuidelineRecord | null {
    const parsed = GuidelineRecordSchema.safeParse(item);
    if (!parsed.success) {
        console.warn("guideline-item-invalid", item.PK, item.SK, parsed.error.issues[0]?.message);
        return null;
    }
    return parsed.data;
}

export function toItem(record: GuidelineRecord) {
    return { ...guidelineKey(record.drug, record.phenotypeCode), ...record };
}
