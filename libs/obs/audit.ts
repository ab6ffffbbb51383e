import { LambdaClient, InvokeCommand } from "@aws-sdk/client-lambda";
import { errorMessage } from "../errors";

const lambda = new LambdaClient({});
const AUDIT_FN_ARN = process.env.AUDIT_FN_ARN;

export type AuditEventType = "pgx.analyze.v1" | "pgx.analyze.batch.v1" | "pgx.upload-url.v1";

/** Lean audit record: outcomes and ids only, never genotype data. */
export interface AuditEvent {
    type: AuditEventType;
    requestId: string;
    patientId?: string;
    drugs?: Array<{ drug: string; label: string; confidence: number }>;
    variantCount?: number;
    key?: string;
}

export async function auditFireAndForget(event: AuditEvent) {
    if (!AUDIT_FN_ARN) return;
    try {
        await lambda.send(
            new InvokeCommand({
                FunctionName: AUDIT_FN_ARN,
                InvocationType: "Event",
                Payload: Buffer.from(JSON.stringify(event)),
            })
        );
    } catch (e) {
        console.warn("audit-invoke-failed", errorMessage(e));
    }
}
