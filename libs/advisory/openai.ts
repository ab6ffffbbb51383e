import { z } from "zod";
import type { AdvisoryConfig } from "../config/advisory";
import { AdvisoryError, errorMessage } from "../errors";
import { extractJson, normalizeExplanation, normalizeSuggestion } from "./normalize";
import type {
    AdvisoryModel,
    Explanation,
    ExplanationRequest,
    FallbackCall,
    RiskSuggestion,
    RiskSuggestionRequest,
} from "./types";

export const MAX_PROMPT_VARIANTS = 25;

const SYSTEM_PROMPT = "Return only valid JSON with no markdown.";

const ChatCompletionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable() }),
    })).min(1),
});

type FetchLike = typeof fetch;

export function suggestionPrompt(req: RiskSuggestionRequest): string {
    const variants = req.variants.slice(0, MAX_PROMPT_VARIANTS).map((v) => ({
        rsid: v.rsid,
        gene: v.gene,
        allele: v.allele,
        genotype: v.genotype,
        function: v.functionClass,
        quality_score: v.qualityScore,
        read_depth: v.readDepth,
    }));
    const options = req.options.map((g) => ({
        phenotype_code: g.phenotypeCode,
        phenotype_name: g.phenotypeName,
        gene: g.gene,
        summary: g.summary,
        recommendation: g.recommendation,
        source: g.source,
    }));

    return [
        "You are a pharmacogenomics clinical decision model.",
        `Infer the risk for DRUG=${req.drug} from the VCF variants and guideline options below.`,
        "Allowed labels: Safe, Adjust Dosage, Toxic, Ineffective, Unknown.",
        "Allowed cpic_level: A, B, C, D, N/A.",
        "",
        `Variants (JSON): ${JSON.stringify(variants)}`,
        `Guideline options (JSON): ${JSON.stringify(options)}`,
        "",
        "Return only a JSON object with exactly these keys:",
        '{"label": "...", "severity": "none|low|moderate|high|critical|unknown", "phenotype": "...", "diplotype": "...",',
        ' "gene": "...", "recommendation": "...", "cpic_level": "...", "llm_confidence_percent": 0-100}',
        "If the evidence is insufficient use label \"Unknown\" with a conservative recommendation.",
    ].join("\n");
}

export function explanationPrompt(req: ExplanationRequest): string {
    const shape = '{"summary": "one sentence", "mechanism": "brief biological explanation", "recommendation": "brief clinical recommendation"}';
    const g = req.guideline;
    if (!g) {
        return [
            "Act as a clinical pharmacologist.",
            `Explain why a patient with phenotype ${req.phenotype} has altered risk for ${req.drug}.`,
            `Return only a JSON object: ${shape}`,
        ].join("\n");
    }
    return [
        "Base the answer strictly on this guideline:",
        `DRUG=${g.drug}`,
        `GENE=${g.gene}`,
        `PHENOTYPE=${g.phenotypeName} (${g.phenotypeCode})`,
        `SUMMARY=${g.summary}`,
        `MECHANISM=${g.mechanism}`,
        `RECOMMENDATION=${g.recommendation}`,
        `SOURCE=${g.source}`,
        "",
        `Return only a JSON object: ${shape}`,
    ].join("\n");
}

/** OpenAI-compatible chat completions client. */
export class OpenAiAdvisoryModel implements AdvisoryModel {
    constructor(
        private readonly config: AdvisoryConfig,
        private readonly fetchImpl: FetchLike = fetch,
    ) {}

    get configured(): boolean {
        return this.config.apiKey !== null;
    }

    async suggestRisk(req: RiskSuggestionRequest, fallback: FallbackCall): Promise<RiskSuggestion> {
        return normalizeSuggestion(await this.complete(suggestionPrompt(req)), fallback);
    }

    async explain(req: ExplanationRequest): Promise<Explanation> {
        return normalizeExplanation(await this.complete(explanationPrompt(req)));
    }

    private async complete(prompt: string): Promise<unknown> {
        const { apiKey, baseUrl, model, timeoutMs } = this.config;
        if (apiKey === null) throw new AdvisoryError("advisory model is not configured");

        let res: Response;
        try {
            res = await this.fetchImpl(`${baseUrl}/v1/chat/completions`, {
                method: "POST",
                headers: {
                    authorization: `Bearer ${apiKey}`,
                    "content-type": "application/json",
                },
                body: JSON.stringify({
                    model,
                    temperature: 0.1,
                    messages: [
                        { role: "system", content: SYSTEM_PROMPT },
                        { role: "user", content: prompt },
                    ],
                }),
                signal: AbortSignal.timeout(timeoutMs),
            });
        } catch (e) {
            throw new AdvisoryError(`advisory request failed: ${errorMessage(e)}`);
        }

        const body = await res.text();
        if (!res.ok) throw new AdvisoryError(`advisory HTTP ${res.status}: ${body.slice(0, 240)}`, res.status);

        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch {
            throw new AdvisoryError("advisory response body is not JSON", res.status);
        }
        const parsed = ChatCompletionSchema.safeParse(json);
        if (!parsed.success) throw new AdvisoryError("advisory response has no choices", res.status);

        return extractJson(parsed.data.choices[0].message.content ?? "");
    }
}
