import { z } from "zod";
import { ConfigError } from "../errors";

export interface AdvisoryConfig {
    apiKey: string | null;
    /** Secrets Manager id holding the key; resolved by `resolveAdvisoryKey`. */
    apiKeySecret: string | null;
    baseUrl: string;
    model: string;
    timeoutMs: number;
}

const blankAsUnset = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
    OPENAI_API_KEY: z.preprocess(blankAsUnset, z.string().optional()),
    OPENAI_API_KEY_SECRET: z.preprocess(blankAsUnset, z.string().optional()),
    OPENAI_BASE_URL: z.preprocess(blankAsUnset, z.string().url().default("https://api.openai.com")),
    OPENAI_MODEL: z.preprocess(blankAsUnset, z.string().default("gpt-4.1-mini")),
    ADVISORY_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(45000)),
});

export function loadAdvisoryConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AdvisoryConfig> {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const messages = parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ");
        throw new ConfigError(`Invalid advisory configuration: ${messages}`);
    }
    return Object.freeze({
        apiKey: parsed.data.OPENAI_API_KEY?.trim() ?? null,
        apiKeySecret: parsed.data.OPENAI_API_KEY_SECRET?.trim() ?? null,
        baseUrl: parsed.data.OPENAI_BASE_URL.replace(/\/+$/, ""),
        model: parsed.data.OPENAI_MODEL.trim(),
        timeoutMs: parsed.data.ADVISORY_TIMEOUT_MS,
    });
}

export const advisoryKeyConfigured = (config: AdvisoryConfig) => config.apiKey !== null || config.apiKeySecret !== null;

/** A plain key wins; otherwise the secret is read once and folded into the config. */
export async function resolveAdvisoryKey(
    config: Readonly<AdvisoryConfig>,
    readSecret: (secretId: string) => Promise<string>,
): Promise<Readonly<AdvisoryConfig>> {
    if (config.apiKey !== null || config.apiKeySecret === null) return config;
    return Object.freeze({ ...config, apiKey: await readSecret(config.apiKeySecret) });
}
