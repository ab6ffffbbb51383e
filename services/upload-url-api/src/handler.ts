import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { randomUUID } from "crypto";
import { z } from "zod";

import { json, parseJsonBody, type HttpEvent, type HttpResult } from "../../../libs/http/response";
import { auditFireAndForget, type AuditEvent } from "../../../libs/obs/audit";
import { metricCount, type MetricName } from "../../../libs/obs/metrics";
import { ContractError, errorMessage } from "../../../libs/errors";

const VCF_CONTENT_TYPE = "text/x-vcf";

const UploadRequestSchema = z.object({
    fileName: z.string().trim().regex(/\.vcf$/i, "fileName must end in .vcf"),
});

export interface UploadUrlDeps {
    bucket: string;
    expiresInSeconds: number;
    presign: (bucket: string, key: string, contentType: string, expiresIn: number) => Promise<string>;
    metricCount: (name: MetricName, value?: number, d?: Record<string, string>) => Promise<void>;
    audit: (event: AuditEvent) => Promise<void>;
    now?: () => Date;
    newId?: () => string;
}

export function createUploadUrlHandler(deps: UploadUrlDeps) {
    return async (event: HttpEvent): Promise<HttpResult> => {
        const requestId = event.requestContext?.requestId ?? randomUUID();
        try {
            const parsed = UploadRequestSchema.safeParse(parseJsonBody(event));
            if (!parsed.success) {
                return json(400, { ok: false, error: parsed.error.issues.map((i) => i.message).join("; ") });
            }

            const date = (deps.now ?? (() => new Date()))().toISOString().slice(0, 10); // UTC YYYY-MM-DD
            const key = `uploads/${date}/${(deps.newId ?? randomUUID)()}.vcf`;
            const uploadUrl = await deps.presign(deps.bucket, key, VCF_CONTENT_TYPE, deps.expiresInSeconds);

            await deps.metricCount("upload_url_issued_count", 1, { service: "upload-url" });
            await deps.audit({ type: "pgx.upload-url.v1", requestId, key });

            return json(200, {
                ok: true,
                bucket: deps.bucket,
                key,
                uploadUrl,
                expiresInSeconds: deps.expiresInSeconds,
                requiredHeaders: { "Content-Type": VCF_CONTENT_TYPE },
                note: "After uploading, call POST /analyze with { vcf: { s3: { bucket, key } }, drug }.",
            });
        } catch (err) {
            if (err instanceof ContractError) return json(400, { ok: false, error: err.message });
            console.error("upload-url-failed", requestId, errorMessage(err));
            return json(500, { ok: false, error: "Internal Error" });
        }
    };
}

const s3 = new S3Client({});

export const handler = createUploadUrlHandler({
    bucket: process.env.UPLOAD_BUCKET ?? "",
    expiresInSeconds: Number(process.env.EXPIRES_SECONDS ?? 900), // 15 min default
    presign: (Bucket, Key, ContentType, expiresIn) =>
        getSignedUrl(s3, new PutObjectCommand({ Bucket, Key, ContentType }), { expiresIn }),
    metricCount,
    audit: auditFireAndForget,
});
