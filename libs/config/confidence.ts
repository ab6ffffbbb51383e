import { z } from "zod";
import { ConfigError } from "../errors";

export interface ConfidenceWeights {
    vcf: number;
    cpic: number;
    llm: number;
}

export interface ConfidenceConfig {
    qualMin: number;
    qualMax: number;
    dpMin: number;
    dpMax: number;
    weights: ConfidenceWeights;
}

export const DEFAULT_WEIGHTS: Readonly<ConfidenceWeights> = Object.freeze({ vcf: 0.4, cpic: 0.45, llm: 0.15 });

// Empty strings count as unset
const tunable = (fallback: number) =>
    z.preprocess(
        (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
        z.coerce.number().finite().default(fallback),
    );

const EnvSchema = z.object({
    CONF_QUAL_MIN: tunable(20),
    CONF_QUAL_MAX: tunable(200),
    CONF_DP_MIN: tunable(10),
    CONF_DP_MAX: tunable(100),
    CONF_W_VCF: tunable(DEFAULT_WEIGHTS.vcf),
    CONF_W_CPIC: tunable(DEFAULT_WEIGHTS.cpic),
    CONF_W_LLM: tunable(DEFAULT_WEIGHTS.llm),
});

export function normalizeWeights(w: ConfidenceWeights): ConfidenceWeights {
    const sum = w.vcf + w.cpic + w.llm;
    if (!(sum > 0)) return { ...DEFAULT_WEIGHTS };
    return { vcf: w.vcf / sum, cpic: w.cpic / sum, llm: w.llm / sum };
}

export function loadConfidenceConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ConfidenceConfig> {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const messages = parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ");
        throw new ConfigError(`Invalid confidence configuration: ${messages}`);
    }
    const e = parsed.data;
    if (e.CONF_QUAL_MIN >= e.CONF_QUAL_MAX) {
        throw new ConfigError(`CONF_QUAL_MIN (${e.CONF_QUAL_MIN}) must be below CONF_QUAL_MAX (${e.CONF_QUAL_MAX})`);
    }
    if (e.CONF_DP_MIN >= e.CONF_DP_MAX) {
        throw new ConfigError(`CONF_DP_MIN (${e.CONF_DP_MIN}) must be below CONF_DP_MAX (${e.CONF_DP_MAX})`);
    }

    return Object.freeze({
        qualMin: e.CONF_QUAL_MIN,
        qualMax: e.CONF_QUAL_MAX,
        dpMin: e.CONF_DP_MIN,
        dpMax: e.CONF_DP_MAX,
        weights: Object.freeze(normalizeWeights({ vcf: e.CONF_W_VCF, cpic: e.CONF_W_CPIC, llm: e.CONF_W_LLM })),
    });
}
