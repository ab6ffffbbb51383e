import { loadConfidenceConfig, type ConfidenceConfig } from "../../../libs/config/confidence";
import { advisoryKeyConfigured, loadAdvisoryConfig } from "../../../libs/config/advisory";
import { describeConfidenceModel } from "../../../libs/confidence/model";
import { guidelineReferences, supportedDrugs } from "../../../libs/rules/engine";
import { supportedGenes } from "../../../libs/pgx/markers";
import { json, type HttpResult } from "../../../libs/http/response";

export interface HealthDeps {
    confidence: ConfidenceConfig;
    advisoryConfigured: boolean;
    guidelineBackend: "dynamodb" | "static";
    now?: () => Date;
}

export function createHealthHandler(deps: HealthDeps) {
    return async (): Promise<HttpResult> =>
        json(200, {
            ok: true,
            status: "healthy",
            service: "pgx-risk",
            supportedDrugs: supportedDrugs(),
            supportedGenes: supportedGenes(),
            guidelineReferences: guidelineReferences(),
            guidelineBackend: deps.guidelineBackend,
            advisoryConfigured: deps.advisoryConfigured,
            confidenceModel: describeConfidenceModel(deps.confidence),
            timestamp: (deps.now ?? (() => new Date()))().toISOString(),
        });
}

export const handler = createHealthHandler({
    confidence: loadConfidenceConfig(),
    advisoryConfigured: advisoryKeyConfigured(loadAdvisoryConfig()),
    guidelineBackend: process.env.GUIDELINES_TABLE ? "dynamodb" : "static",
});
