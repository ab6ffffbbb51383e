import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { randomUUID } from "crypto";
import type { AuditEvent } from "../../../libs/obs/audit";

export interface AuditWriterDeps {
    bucket: string;
    s3: Pick<S3Client, "send">;
    now?: () => Date;
}

export function auditKey(type: string, at: Date, id: string): string {
    const date = at.toISOString().slice(0, 10); // YYYY-MM-DD
    const hour = String(at.getUTCHours()).padStart(2, "0");
    return `type=${type}/date=${date}/hour=${hour}/${id}.jsonl`;
}

export function createAuditHandler(deps: AuditWriterDeps) {
    return async (event: Partial<AuditEvent>) => {
        const now = (deps.now ?? (() => new Date()))();
        const type = event.type ?? "unknown";
        const key = auditKey(type, now, randomUUID());

        const line = JSON.stringify({
            at: now.toISOString(),
            type,
            requestId: event.requestId,
            payload: event,
        }) + "\n";

        await deps.s3.send(new PutObjectCommand({ Bucket: deps.bucket, Key: key, Body: line, ContentType: "application/x-ndjson" }));
        return { ok: true, key };
    };
}

export const handler = createAuditHandler({
    bucket: process.env.AUDIT_BUCKET ?? "",
    s3: new S3Client({}),
});
