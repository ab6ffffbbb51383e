import { S3Client, GetObjectCommand } from "@aws-sdk/client-s3";
import { randomUUID } from "crypto";

import { validate } from "../../../libs/contracts/src/validate";
import type { AnalyzeRequestV1 } from "../../../libs/contracts/src/types";
import { parseVcf } from "../../../libs/adapters";
import { analyzeBatch, analyzeDrug, type PipelineDeps } from "../../../libs/analysis/pipeline";
import type { AnalysisReport } from "../../../libs/mappers/report";
import { loadConfidenceConfig } from "../../../libs/config/confidence";
import { loadAdvisoryConfig, resolveAdvisoryKey } from "../../../libs/config/advisory";
import { secretReader } from "../../../libs/config/secrets";
import { OpenAiAdvisoryModel } from "../../../libs/advisory";
import { DynamoGuidelineStore, StaticGuidelineStore } from "../../../libs/guidelines";
import { auditFireAndForget, type AuditEvent } from "../../../libs/obs/audit";
import { metricCount, metricMs, type MetricName } from "../../../libs/obs/metrics";
import { json, parseJsonBody, type HttpEvent, type HttpResult } from "../../../libs/http/response";
import { ContractError, errorMessage } from "../../../libs/errors";

export const MAX_VCF_BYTES = 5 * 1024 * 1024;

export interface AnalyzeHandlerDeps {
    pipeline: () => Promise<PipelineDeps>;
    uploadBucket: string | null;
    readObject: (bucket: string, key: string) => Promise<Uint8Array>;
    metricCount: (name: MetricName, value?: number, d?: Record<string, string>) => Promise<void>;
    metricMs: (name: MetricName, ms: number, d?: Record<string, string>) => Promise<void>;
    audit: (event: AuditEvent) => Promise<void>;
    newPatientId?: () => string;
}

const DIMS = { service: "analyze" };

export const generatePatientId = () => `PATIENT_${randomUUID().replace(/-/g, "").slice(0, 8).toUpperCase()}`;

async function loadVcf(vcf: AnalyzeRequestV1["vcf"], deps: AnalyzeHandlerDeps): Promise<Buffer> {
    if ("text" in vcf) {
        const bytes = Buffer.from(vcf.text, "utf8");
        if (bytes.length > MAX_VCF_BYTES) throw new ContractError("VCF payload exceeds the 5 MiB limit");
        return bytes;
    }
    const { bucket, key } = vcf.s3;
    if (!deps.uploadBucket || bucket !== deps.uploadBucket) throw new ContractError(`Bucket ${bucket} is not an upload bucket`);
    const body = await deps.readObject(bucket, key);
    if (body.byteLength > MAX_VCF_BYTES) throw new ContractError("VCF payload exceeds the 5 MiB limit");
    return Buffer.from(body);
}

export function createAnalyzeHandler(deps: AnalyzeHandlerDeps) {
    return async (event: HttpEvent): Promise<HttpResult> => {
        const t0 = Date.now();
        const requestId = event.requestContext?.requestId ?? randomUUID();
        try {
            const body = parseJsonBody(event);
            validate<AnalyzeRequestV1>("pgx.analyze.request.v1", body);

            const pipeline = await deps.pipeline();
            const vcf = parseVcf(await loadVcf(body.vcf, deps));
            if (!vcf.readable) await deps.metricCount("vcf_unreadable_count", 1, DIMS);
            await deps.metricCount("variants_detected_count", vcf.variants.length, DIMS);

            const input = { patientId: body.patientId ?? (deps.newPatientId ?? generatePatientId)(), vcf };

            let reports: AnalysisReport[];
            let result: unknown;
            if (body.drugs) {
                const batch = await analyzeBatch(input, body.drugs, pipeline);
                reports = batch.reports;
                result = batch;
                if (batch.bottlenecks.length > 0) await deps.metricCount("bottleneck_count", batch.bottlenecks.length, DIMS);
            } else {
                const report = await analyzeDrug(input, body.drug ?? "", pipeline);
                reports = [report];
                result = report;
            }
            for (const r of reports) validate<AnalysisReport>("pgx.report.v1", r);

            const advised = reports.filter((r) => r.explanation.source === "advisory").length;
            if (advised > 0) await deps.metricCount("advisory_used_count", advised, DIMS);

            await deps.audit({
                type: body.drugs ? "pgx.analyze.batch.v1" : "pgx.analyze.v1",
                requestId,
                patientId: input.patientId,
                drugs: reports.map((r) => ({ drug: r.drug, label: r.riskAssessment.riskLabel, confidence: r.riskAssessment.confidenceScore })),
                variantCount: vcf.variants.length,
            });
            await deps.metricCount("analyze_success_count", 1, DIMS);
            await deps.metricMs("analyze_duration_ms", Date.now() - t0, DIMS);

            return json(200, result);
        } catch (err) {
            if (err instanceof ContractError) {
                await deps.metricCount("analyze_invalid_count", 1, DIMS);
                return json(400, { ok: false, error: err.message });
            }
            console.error("analyze-failed", requestId, errorMessage(err));
            await deps.metricCount("analyze_error_count", 1, DIMS);
            return json(500, { ok: false, error: "Internal Error" });
        }
    };
}

// Module-scope wiring: config errors fail the cold start.
const s3 = new S3Client({});
const GUIDELINES_TABLE = process.env.GUIDELINES_TABLE;

async function readObject(bucket: string, key: string): Promise<Uint8Array> {
    const out = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if ((out.ContentLength ?? 0) > MAX_VCF_BYTES) throw new ContractError("VCF payload exceeds the 5 MiB limit");
    if (!out.Body) throw new ContractError(`Object ${key} is empty`);
    return out.Body.transformToByteArray();
}

const confidence = loadConfidenceConfig();
const advisoryConfig = loadAdvisoryConfig();
const guidelines = GUIDELINES_TABLE ? new DynamoGuidelineStore(GUIDELINES_TABLE) : new StaticGuidelineStore();

// The advisory key secret is read once per container; a failed read is retried on the next request.
let pipelineReady: Promise<PipelineDeps> | null = null;
function loadPipeline(): Promise<PipelineDeps> {
    if (!pipelineReady) {
        pipelineReady = resolveAdvisoryKey(advisoryConfig, secretReader())
            .then((config) => ({ confidence, guidelines, advisory: new OpenAiAdvisoryModel(config) }))
            .catch((e: unknown) => {
                pipelineReady = null;
                throw e;
            });
    }
    return pipelineReady;
}

export const handler = createAnalyzeHandler({
    pipeline: loadPipeline,
    uploadBucket: process.env.UPLOAD_BUCKET ?? null,
    readObject,
    metricCount,
    metricMs,
    audit: auditFireAndForget,
});
